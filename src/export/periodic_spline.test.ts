import type { IPoint } from "makerjs";
import { describe, expect, it } from "vitest";
import { DriveError } from "../drive/errors";
import { circle_point, dist, linspace } from "../math";
import { evaluate_spline, interpolate_periodic, solve_cyclic } from "./periodic_spline";

describe("solve_cyclic", () => {
    it("leaves constant values alone", () => {
        solve_cyclic([2, 2, 2, 2, 2]).forEach((x) => expect(x).toBeCloseTo(2, 12));
    });

    it("satisfies the wrapped three-term rows", () => {
        const values = [3, -1, 4, 1, -5, 9, 2];
        const x = solve_cyclic(values);
        const n = values.length;
        values.forEach((v, i) => {
            const row = (x[(i + n - 1) % n] + 4 * x[i] + x[(i + 1) % n]) / 6;
            expect(row).toBeCloseTo(v, 12);
        });
    });
});

describe("interpolate_periodic", () => {
    const samples: IPoint[] = linspace(0, 2 * Math.PI, 16, false).map((t) =>
        circle_point([1, -2], 5 + Math.cos(3 * t), t)
    );
    const spline = interpolate_periodic(samples);

    it("wraps the first three control points onto the end", () => {
        expect(spline.degree).toBe(3);
        expect(spline.control_points).toHaveLength(19);
        expect(spline.knots).toEqual(Array.from({ length: 23 }, (_, i) => i));
        expect(spline.control_points.slice(16)).toEqual(spline.control_points.slice(0, 3));
        expect(spline.fit_points).toEqual(samples);
    });

    it("passes through every sample", () => {
        samples.forEach((sample, i) => {
            expect(dist(evaluate_spline(spline, spline.knots[3 + i]), sample)).toBeLessThan(1e-9);
        });
    });

    it("closes on itself", () => {
        const start = evaluate_spline(spline, spline.knots[3]);
        const end = evaluate_spline(spline, spline.knots[spline.control_points.length]);
        expect(dist(start, end)).toBeLessThan(1e-9);
    });

    it("needs three samples", () => {
        expect(() => interpolate_periodic([[0, 0], [1, 0]])).toThrow(DriveError);
    });
});
