import type { IPoint } from "makerjs";
import { cos, min, pi, round, sin } from "mathjs";
import type { ParameterSet } from "../drive/parameters";
import { circle_point, dot, linspace } from "../math";
import { CIRCLE_RESOLUTION, circle_curve, close_loop, type Curve } from "./curve";

export const DISPLAY_POINTS_PER_PIN = 100;
export const EXPORT_POINTS_PER_PIN = 30;

// Fraction of a pin radius the wall reaches into each pin, and backs off between them
const POCKET_FACTOR = 0.8;
const CLEARANCE_FACTOR = 0.8;

export interface OuterRing {
    inner: Curve;
    outer: Curve;
}

export interface OuterRingOptions {
    points_per_pin?: number;
    resolution?: number;
}

/**
 * The idealised pocketed wall: deepest at each pin angle, furthest out midway
 * between pins.
 */
export function housing_wall_radius(params: ParameterSet, theta: number): number {
    const ring_radius = params.ring_diameter / 2;
    const pin_radius = params.pin_diameter / 2;
    const pocket_depth = pin_radius * POCKET_FACTOR;
    const variation = pocket_depth + pin_radius * CLEARANCE_FACTOR;
    const pin_factor = cos(params.num_external_pins * theta);

    return ring_radius - pocket_depth + (variation * (1 - pin_factor)) / 2;
}

/**
 * Distance from the origin along the ray at `theta` to the near side of the
 * closest pin, or `Infinity` when the ray misses it.
 */
export function pin_intersection_radius(params: ParameterSet, theta: number): number {
    const step = (2 * pi) / params.num_external_pins;
    const pin_radius = params.pin_diameter / 2;
    const center = circle_point([0, 0], params.ring_diameter / 2, round(theta / step) * step);
    const direction: IPoint = [cos(theta), sin(theta)];

    const along = dot(center, direction);
    const discriminant = along * along - (dot(center, center) - pin_radius * pin_radius);
    if (discriminant < 0) {
        return Infinity;
    }

    const near = along - Math.sqrt(discriminant);
    return near > 0 ? near : Infinity;
}

/**
 * Wherever a pin pokes through the idealised wall, the pin's own edge wins.
 */
export function merged_housing_radius(params: ParameterSet, theta: number): number {
    return min(housing_wall_radius(params, theta), pin_intersection_radius(params, theta));
}

/**
 * One open pass around the housing, `points_per_pin` samples per pin.
 */
export function housing_profile(
    params: ParameterSet,
    points_per_pin = DISPLAY_POINTS_PER_PIN
): IPoint[] {
    const samples = params.num_external_pins * points_per_pin;
    return linspace(0, 2 * pi, samples, false).map((theta) =>
        circle_point([0, 0], merged_housing_radius(params, theta), theta)
    );
}

export function outer_ring(params: ParameterSet, options: OuterRingOptions = {}): OuterRing {
    const points_per_pin = options.points_per_pin ?? DISPLAY_POINTS_PER_PIN;
    const resolution = options.resolution ?? CIRCLE_RESOLUTION;
    const outer_radius = params.ring_diameter / 2 + params.outer_ring_width;

    return {
        inner: {
            layer: "OUTER_RING",
            closed: true,
            points: close_loop(housing_profile(params, points_per_pin)),
        },
        outer: circle_curve("OUTER_RING", [0, 0], outer_radius, resolution),
    };
}
