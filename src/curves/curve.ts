import type { IPoint } from "makerjs";
import { pi } from "mathjs";
import { centroid, circle_point, linspace } from "../math";

export const LAYER_NAMES = [
    "EXTERNAL_PINS",
    "CYCLOID_DISK",
    "OUTPUT_PINS",
    "OUTPUT_HOLES",
    "CAMSHAFT_HOLE",
    "ECCENTRIC_CAM",
    "OUTER_RING",
    "PIN_CENTERS",
    "CENTER_AXIS",
] as const;

export type LayerName = (typeof LAYER_NAMES)[number];

export interface Curve {
    layer: LayerName;
    /** Closed curves repeat their first point as their last */
    closed: boolean;
    points: IPoint[];
}

export type CurveSet = Map<LayerName, Curve[]>;

export type LineStrip = [number, number, number][];

export const CIRCLE_RESOLUTION = 200;

export function close_loop(points: IPoint[]): IPoint[] {
    if (points.length == 0) {
        return points;
    }
    const first = points[0];
    const last = points[points.length - 1];
    if (first[0] === last[0] && first[1] === last[1]) {
        return points;
    }
    return [...points, [first[0], first[1]]];
}

export function circle_curve(
    layer: LayerName,
    center: IPoint,
    radius: number,
    resolution = CIRCLE_RESOLUTION
): Curve {
    const points = linspace(0, 2 * pi, resolution - 1, false).map((t) =>
        circle_point(center, radius, t)
    );
    return { layer, closed: true, points: close_loop(points) };
}

export function line_strip(curve: Curve): LineStrip {
    return curve.points.map((p) => [p[0], p[1], 0]);
}

export function curve_set_line_strips(set: CurveSet): Map<LayerName, LineStrip[]> {
    const strips = new Map<LayerName, LineStrip[]>();
    for (const [layer, curves] of set) {
        strips.set(layer, curves.map(line_strip));
    }
    return strips;
}

/**
 * Mean of the vertices, counting the repeated closing point once.
 */
export function curve_centroid(curve: Curve): IPoint {
    const points = curve.closed ? curve.points.slice(0, -1) : curve.points;
    return centroid(points);
}
