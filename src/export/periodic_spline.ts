import type { IPoint } from "makerjs";
import { DriveError } from "../drive/errors";

export const SPLINE_DEGREE = 3;

/**
 * A closed uniform cubic B-spline. The first three control points repeat at
 * the end, so the curve over [knots[3], knots[control_points.length]] is one
 * seamless loop.
 */
export interface PeriodicSpline {
    degree: number;
    control_points: IPoint[];
    knots: number[];
    fit_points: IPoint[];
}

// Thomas algorithm, unit sub and super diagonals
function solve_tridiagonal(diag: number[], rhs: number[]): number[] {
    const n = diag.length;
    const c: number[] = new Array(n);
    const d: number[] = new Array(n);

    c[0] = 1 / diag[0];
    d[0] = rhs[0] / diag[0];
    for (let i = 1; i < n; i++) {
        const m = diag[i] - c[i - 1];
        c[i] = 1 / m;
        d[i] = (rhs[i] - d[i - 1]) / m;
    }

    const x: number[] = new Array(n);
    x[n - 1] = d[n - 1];
    for (let i = n - 2; i >= 0; i--) {
        x[i] = d[i] - c[i] * x[i + 1];
    }
    return x;
}

/**
 * Solves x[i-1] + 4 x[i] + x[i+1] = 6 v[i] with indices wrapping around. The
 * corner terms are folded out with Sherman-Morrison, so the cost stays linear.
 */
export function solve_cyclic(values: number[]): number[] {
    const n = values.length;
    const gamma = -4;

    const diag: number[] = new Array(n).fill(4);
    diag[0] = 4 - gamma;
    diag[n - 1] = 4 - 1 / gamma;

    const x = solve_tridiagonal(
        diag,
        values.map((v) => 6 * v)
    );

    const u: number[] = new Array(n).fill(0);
    u[0] = gamma;
    u[n - 1] = 1;
    const z = solve_tridiagonal(diag, u);

    const fact = (x[0] + x[n - 1] / gamma) / (1 + z[0] + z[n - 1] / gamma);
    return x.map((xi, i) => xi - fact * z[i]);
}

/**
 * The closed cubic through `samples` (a loop given without its repeated end
 * point), one knot span per sample. The curve passes through sample i at
 * parameter `knots[3 + i]`.
 */
export function interpolate_periodic(samples: IPoint[]): PeriodicSpline {
    if (samples.length < SPLINE_DEGREE) {
        throw new DriveError(`A closed cubic needs at least 3 samples, got ${samples.length}`);
    }

    const xs = solve_cyclic(samples.map((p) => p[0]));
    const ys = solve_cyclic(samples.map((p) => p[1]));
    const n = samples.length;

    const control_points: IPoint[] = [];
    control_points.push([xs[n - 1], ys[n - 1]]);
    for (let i = 0; i < n; i++) {
        control_points.push([xs[i], ys[i]]);
    }
    control_points.push([xs[0], ys[0]]);
    control_points.push([xs[1], ys[1]]);

    const knots: number[] = [];
    for (let i = 0; i < control_points.length + SPLINE_DEGREE + 1; i++) {
        knots.push(i);
    }

    return {
        degree: SPLINE_DEGREE,
        control_points,
        knots,
        fit_points: samples.map((p) => [p[0], p[1]]),
    };
}

/**
 * de Boor evaluation at parameter `u`.
 */
export function evaluate_spline(spline: PeriodicSpline, u: number): IPoint {
    const p = spline.degree;
    const t = spline.knots;
    const c = spline.control_points;

    let k = p;
    while (k < c.length - 1 && u >= t[k + 1]) {
        k++;
    }

    const d: IPoint[] = [];
    for (let j = 0; j <= p; j++) {
        const cp = c[j + k - p];
        d.push([cp[0], cp[1]]);
    }

    for (let r = 1; r <= p; r++) {
        for (let j = p; j >= r; j--) {
            const alpha = (u - t[j + k - p]) / (t[j + 1 + k - r] - t[j + k - p]);
            d[j] = [
                (1 - alpha) * d[j - 1][0] + alpha * d[j][0],
                (1 - alpha) * d[j - 1][1] + alpha * d[j][1],
            ];
        }
    }

    return d[p];
}
