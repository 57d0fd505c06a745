import MakerJs, { type IPoint } from "makerjs";

export function circle_point(center: IPoint, radius: number, angle: number): IPoint {
    return [center[0] + radius * Math.cos(angle), center[1] + radius * Math.sin(angle)];
}

export function magnitude(a: IPoint): number {
    return Math.sqrt(a[0] * a[0] + a[1] * a[1]);
}

export function dist(a: IPoint, b: IPoint): number {
    return magnitude([b[0] - a[0], b[1] - a[1]]);
}

export function dot(a: IPoint, b: IPoint): number {
    return a[0] * b[0] + a[1] * b[1];
}

// [x, y] -> [-y, x]
export function rot_ninty_clock(a: IPoint): IPoint {
    return [-a[1], a[0]];
}

export function translate(a: IPoint, by: IPoint): IPoint {
    return MakerJs.point.add(a, by);
}

/**
 * Rotates about the origin, counter-clockwise for a positive angle in radians.
 */
export function rotate(a: IPoint, angle: number): IPoint {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return [a[0] * c - a[1] * s, a[0] * s + a[1] * c];
}

/**
 * Evenly spaced samples over [start, end], the end included only when
 * `endpoint` is set.
 */
export function linspace(
    start: number,
    end: number,
    count: number,
    endpoint = true
): number[] {
    if (count <= 0) {
        return [];
    }
    if (count == 1) {
        return [start];
    }
    const divisions = endpoint ? count - 1 : count;
    const step = (end - start) / divisions;
    const result: number[] = new Array(count);
    for (let i = 0; i < count; i++) {
        result[i] = start + step * i;
    }
    if (endpoint) {
        result[count - 1] = end;
    }
    return result;
}

export function centroid(points: IPoint[]): IPoint {
    let x = 0;
    let y = 0;
    for (const p of points) {
        x += p[0];
        y += p[1];
    }
    return [x / points.length, y / points.length];
}
