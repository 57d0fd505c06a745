import type { IPoint } from "makerjs";
import { pi } from "mathjs";
import { DegenerateGeometryError } from "../drive/errors";
import {
    disk_center,
    disk_rotation,
    lobe_count,
    type ParameterSet,
} from "../drive/parameters";
import { linspace, magnitude, rot_ninty_clock } from "../math";
import type { Curve } from "./curve";

export const DISPLAY_POINTS_PER_LOBE = 1500;
export const EXPORT_POINTS_PER_LOBE = 60;

/**
 * Generating circles of the trochoid the pins roll along. `ratio` is
 * (rolling + stationary) / stationary, which works out to L + 1.
 */
export interface TrochoidGeometry {
    lobes: number;
    eccentricity: number;
    rolling_radius: number;
    stationary_radius: number;
    ratio: number;
}

export function trochoid_geometry(params: ParameterSet): TrochoidGeometry {
    const lobes = lobe_count(params);
    if (lobes < 2) {
        throw new DegenerateGeometryError(
            "insufficient_lobes",
            `A disk needs at least 2 lobes, ${params.num_external_pins} external pins give ${lobes}`
        );
    }

    const ring_radius = params.ring_diameter / 2;
    const rolling_radius = (lobes / (lobes + 1)) * ring_radius;
    const stationary_radius = ring_radius / (lobes + 1);

    return {
        lobes,
        eccentricity: params.eccentricity,
        rolling_radius,
        stationary_radius,
        ratio: (rolling_radius + stationary_radius) / stationary_radius,
    };
}

interface TrochoidSample {
    point: IPoint;
    derivative: IPoint;
}

// Point and derivative share their trig. Plain Math, this runs for every
// sample of every frame.
function trochoid_sample(g: TrochoidGeometry, t: number): TrochoidSample {
    const base = g.rolling_radius + g.stationary_radius;
    const q = g.eccentricity / g.stationary_radius;
    const ct = Math.cos(t);
    const st = Math.sin(t);
    const ckt = Math.cos(g.ratio * t);
    const skt = Math.sin(g.ratio * t);

    return {
        point: [base * ct - g.eccentricity * ckt, base * st - g.eccentricity * skt],
        derivative: [base * (-st + q * skt), base * (ct - q * ckt)],
    };
}

export function trochoid_point(g: TrochoidGeometry, t: number): IPoint {
    return trochoid_sample(g, t).point;
}

export function trochoid_derivative(g: TrochoidGeometry, t: number): IPoint {
    return trochoid_sample(g, t).derivative;
}

/**
 * How far the disk outline sits inside the trochoid: a pin radius plus the
 * running clearance.
 */
export function disk_offset(params: ParameterSet): number {
    return params.pin_diameter / 2 + params.tolerance;
}

/**
 * The trochoid offset inwards by `disk_offset`, before the disk is moved to
 * its pose for a phase.
 */
export function offset_profile(
    params: ParameterSet,
    points_per_lobe = DISPLAY_POINTS_PER_LOBE
): IPoint[] {
    const g = trochoid_geometry(params);
    const offset = disk_offset(params);
    const samples = linspace(0, 2 * pi, g.lobes * points_per_lobe);

    return samples.map((t) => {
        const { point: p, derivative: d } = trochoid_sample(g, t);
        const d_mag = magnitude(d);

        if (d_mag == 0 || !Number.isFinite(d_mag)) {
            throw new DegenerateGeometryError(
                "zero_derivative",
                `Disk profile has no normal at t=${t}, eccentricity ${params.eccentricity} meets the stationary radius ${g.stationary_radius}`
            );
        }

        const normal = rot_ninty_clock(d);
        return [p[0] + (offset / d_mag) * normal[0], p[1] + (offset / d_mag) * normal[1]];
    });
}

/**
 * The disk outline for input phase `phi`: all lobes in one closed loop.
 */
export function cycloid_disk(
    params: ParameterSet,
    phi: number,
    points_per_lobe = DISPLAY_POINTS_PER_LOBE
): Curve {
    const rotation = disk_rotation(params, phi);
    const center = disk_center(params, phi);
    // One rotation for the whole frame
    const c = Math.cos(rotation);
    const s = Math.sin(rotation);
    const points: IPoint[] = offset_profile(params, points_per_lobe).map((p) => [
        p[0] * c - p[1] * s + center[0],
        p[0] * s + p[1] * c + center[1],
    ]);
    return { layer: "CYCLOID_DISK", closed: true, points };
}
