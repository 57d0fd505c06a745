import type { IPoint } from "makerjs";
import { pi } from "mathjs";
import type { ParameterSet } from "../drive/parameters";
import { circle_point } from "../math";
import { CIRCLE_RESOLUTION, circle_curve, type Curve } from "./curve";

export function pin_angle(params: ParameterSet, index: number): number {
    return (2 * pi * index) / params.num_external_pins;
}

export function pin_centers(params: ParameterSet): IPoint[] {
    const centers: IPoint[] = [];
    for (let i = 0; i < params.num_external_pins; i++) {
        centers.push(circle_point([0, 0], params.ring_diameter / 2, pin_angle(params, i)));
    }
    return centers;
}

/**
 * The fixed external pins, the reference geometry everything else clears.
 */
export function pin_ring(params: ParameterSet, resolution = CIRCLE_RESOLUTION): Curve[] {
    return pin_centers(params).map((center) =>
        circle_curve("EXTERNAL_PINS", center, params.pin_diameter / 2, resolution)
    );
}
