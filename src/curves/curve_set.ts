import { DegenerateGeometryError } from "../drive/errors";
import { lobe_count, type ParameterSet } from "../drive/parameters";
import { magnitude } from "../math";
import { camshaft_bore, eccentric_shaft, eccentric_shaft_radius } from "./camshaft";
import { CIRCLE_RESOLUTION, type CurveSet } from "./curve";
import {
    DISPLAY_POINTS_PER_LOBE,
    EXPORT_POINTS_PER_LOBE,
    cycloid_disk,
    trochoid_derivative,
    trochoid_geometry,
} from "./cycloid_disk";
import { DISPLAY_POINTS_PER_PIN, EXPORT_POINTS_PER_PIN, outer_ring } from "./outer_ring";
import { output_holes, output_pins } from "./output_pins";
import { pin_ring } from "./pin_ring";

export interface CurveResolution {
    circle: number;
    points_per_lobe: number;
    points_per_pin: number;
}

export const DISPLAY_RESOLUTION: CurveResolution = {
    circle: CIRCLE_RESOLUTION,
    points_per_lobe: DISPLAY_POINTS_PER_LOBE,
    points_per_pin: DISPLAY_POINTS_PER_PIN,
};

// Drawings written to disk use the reduced sample counts
export const EXPORT_RESOLUTION: CurveResolution = {
    circle: CIRCLE_RESOLUTION,
    points_per_lobe: EXPORT_POINTS_PER_LOBE,
    points_per_pin: EXPORT_POINTS_PER_PIN,
};

/**
 * Every problem `generate_curve_set` would throw for, without throwing.
 */
export function find_degeneracies(params: ParameterSet): DegenerateGeometryError[] {
    const found: DegenerateGeometryError[] = [];

    if (lobe_count(params) < 2) {
        found.push(
            new DegenerateGeometryError(
                "insufficient_lobes",
                `${params.num_external_pins} external pins give fewer than 2 lobes`
            )
        );
    } else {
        // The derivative only vanishes at t = 0 (and its lobe repeats), when the
        // eccentricity equals the stationary radius
        const g = trochoid_geometry(params);
        if (magnitude(trochoid_derivative(g, 0)) == 0) {
            found.push(
                new DegenerateGeometryError(
                    "zero_derivative",
                    `Eccentricity ${params.eccentricity} equals the stationary radius, the disk profile has cusps`
                )
            );
        }
    }

    if (eccentric_shaft_radius(params) <= 0) {
        found.push(
            new DegenerateGeometryError(
                "non_positive_shaft",
                `Eccentricity ${params.eccentricity} leaves no shaft inside a ${params.camshaft_diameter} camshaft`
            )
        );
    }

    return found;
}

/**
 * All curves of the drive for input phase `phi`, built from scratch.
 */
export function generate_curve_set(
    params: ParameterSet,
    phi: number,
    resolution: CurveResolution = DISPLAY_RESOLUTION
): CurveSet {
    const set: CurveSet = new Map();

    set.set("EXTERNAL_PINS", pin_ring(params, resolution.circle));
    set.set("CYCLOID_DISK", [cycloid_disk(params, phi, resolution.points_per_lobe)]);
    set.set("OUTPUT_PINS", output_pins(params, phi, resolution.circle));
    set.set("OUTPUT_HOLES", output_holes(params, phi, resolution.circle));
    set.set("CAMSHAFT_HOLE", [camshaft_bore(params, resolution.circle)]);
    set.set("ECCENTRIC_CAM", [eccentric_shaft(params, phi, resolution.circle)]);

    if (params.show_outer_ring) {
        const ring = outer_ring(params, {
            points_per_pin: resolution.points_per_pin,
            resolution: resolution.circle,
        });
        set.set("OUTER_RING", [ring.inner, ring.outer]);
    }

    return set;
}
