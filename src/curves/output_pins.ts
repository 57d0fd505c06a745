import type { IPoint } from "makerjs";
import { pi } from "mathjs";
import {
    disk_center,
    disk_rotation,
    type ParameterSet,
} from "../drive/parameters";
import { circle_point, rotate, translate } from "../math";
import { CIRCLE_RESOLUTION, circle_curve, type Curve } from "./curve";

export function output_pin_centers(params: ParameterSet, phi: number): IPoint[] {
    const rotation = disk_rotation(params, phi);
    const centers: IPoint[] = [];
    for (let i = 0; i < params.num_output_pins; i++) {
        const angle = (2 * pi * i) / params.num_output_pins;
        const center = circle_point([0, 0], params.output_disk_diameter / 2, angle);
        centers.push(rotate(center, rotation));
    }
    return centers;
}

/**
 * Pins on the output shaft. They turn with the disk but stay concentric with
 * the ring, so no eccentric offset.
 */
export function output_pins(
    params: ParameterSet,
    phi: number,
    resolution = CIRCLE_RESOLUTION
): Curve[] {
    return output_pin_centers(params, phi).map((center) =>
        circle_curve("OUTPUT_PINS", center, params.output_pin_diameter / 2, resolution)
    );
}

export function output_hole_centers(params: ParameterSet, phi: number): IPoint[] {
    const offset = disk_center(params, phi);
    return output_pin_centers(params, phi).map((center) => translate(center, offset));
}

// Big enough for the pin to orbit a full eccentricity and keep its clearance
export function output_hole_radius(params: ParameterSet): number {
    return params.output_pin_diameter / 2 + params.eccentricity + params.tolerance;
}

/**
 * Holes cut in the disk for the output pins. They ride on the disk, so the
 * pattern follows the eccentric.
 */
export function output_holes(
    params: ParameterSet,
    phi: number,
    resolution = CIRCLE_RESOLUTION
): Curve[] {
    const radius = output_hole_radius(params);
    return output_hole_centers(params, phi).map((center) =>
        circle_curve("OUTPUT_HOLES", center, radius, resolution)
    );
}
