import { describe, expect, it } from "vitest";
import { DegenerateGeometryError } from "../drive/errors";
import {
    DEFAULT_PARAMETERS,
    create_parameters,
    disk_center,
    disk_rotation,
    normalize_to_pins,
    type ParameterSet,
} from "../drive/parameters";
import { dist, magnitude, rotate, translate } from "../math";
import { curve_centroid } from "./curve";
import {
    cycloid_disk,
    disk_offset,
    offset_profile,
    trochoid_derivative,
    trochoid_geometry,
    trochoid_point,
} from "./cycloid_disk";

// 12 pins of 5mm sized by normalize_to_pins: ring diameter 41, 11 lobes
const params = normalize_to_pins(
    create_parameters({ num_external_pins: 12, pin_diameter: 5, eccentricity: 1.2, tolerance: 0 })
);

describe("trochoid_geometry", () => {
    it("splits the ring radius between the generating circles", () => {
        const g = trochoid_geometry(params);
        expect(g.lobes).toBe(11);
        expect(g.rolling_radius).toBeCloseTo((11 / 12) * 20.5, 12);
        expect(g.stationary_radius).toBeCloseTo(20.5 / 12, 12);
        expect(g.ratio).toBeCloseTo(12, 12);
    });

    it("matches the derivative to a finite difference", () => {
        const g = trochoid_geometry(params);
        const t = 0.37;
        const h = 1e-6;
        const a = trochoid_point(g, t - h);
        const b = trochoid_point(g, t + h);
        const d = trochoid_derivative(g, t);
        expect(d[0]).toBeCloseTo((b[0] - a[0]) / (2 * h), 4);
        expect(d[1]).toBeCloseTo((b[1] - a[1]) / (2 * h), 4);
    });

    it("refuses fewer than two lobes", () => {
        const two_pins: ParameterSet = { ...DEFAULT_PARAMETERS, num_external_pins: 2 };
        expect(() => trochoid_geometry(two_pins)).toThrow(DegenerateGeometryError);
    });
});

describe("cycloid_disk", () => {
    it("covers every lobe in one closed loop", () => {
        const disk = cycloid_disk(params, 0, 60);
        expect(disk.layer).toBe("CYCLOID_DISK");
        expect(disk.closed).toBe(true);
        expect(disk.points).toHaveLength(11 * 60);
        expect(dist(disk.points[0], disk.points[disk.points.length - 1])).toBeLessThan(1e-9);
    });

    it("orbits the eccentric", () => {
        for (const phi of [0, 0.7, 2.5]) {
            const c = curve_centroid(cycloid_disk(params, phi, 60));
            const center = disk_center(params, phi);
            expect(c[0]).toBeCloseTo(center[0], 6);
            expect(c[1]).toBeCloseTo(center[1], 6);
            expect(magnitude(c)).toBeLessThanOrEqual(params.eccentricity + 1e-6);
        }
    });

    it("returns to its start pose after a full disk revolution", () => {
        const phi = 0.3;
        const a = cycloid_disk(params, phi, 20);
        const b = cycloid_disk(params, phi + 2 * Math.PI * 11, 20);
        a.points.forEach((p, i) => {
            expect(b.points[i][0]).toBeCloseTo(p[0], 8);
            expect(b.points[i][1]).toBeCloseTo(p[1], 8);
        });
    });

    it("offsets inwards by a pin radius plus tolerance", () => {
        // At t = 0 the normal points straight at the center
        const loose = create_parameters({ ...params, tolerance: 0.5 });
        const tight = cycloid_disk(params, 0, 20).points[0];
        const shrunk = cycloid_disk(loose, 0, 20).points[0];

        expect(tight[0]).toBeCloseTo(20.5 - 2.5, 9);
        expect(tight[1]).toBeCloseTo(0, 9);
        expect(shrunk[0]).toBeCloseTo(20.5 - 2.5 - 0.5, 9);
        expect(disk_offset(loose)).toBeGreaterThan(disk_offset(params));
    });

    it("poses the same profile for every phase", () => {
        const profile = offset_profile(params, 30);
        for (const phi of [0.2, 4.1]) {
            const rotation = disk_rotation(params, phi);
            const center = disk_center(params, phi);
            const disk = cycloid_disk(params, phi, 30);
            expect(disk.points).toHaveLength(profile.length);
            disk.points.forEach((p, i) => {
                const expected = translate(rotate(profile[i], rotation), center);
                expect(p[0]).toBeCloseTo(expected[0], 12);
                expect(p[1]).toBeCloseTo(expected[1], 12);
            });
        }
    });

    it("refuses a profile with a vanishing derivative", () => {
        // Stationary radius is 24 / 12 = 2, same as the eccentricity
        const cusp = create_parameters({ num_external_pins: 12, ring_diameter: 48, eccentricity: 2 });
        let caught: unknown;
        try {
            cycloid_disk(cusp, 0, 10);
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(DegenerateGeometryError);
        expect(caught instanceof DegenerateGeometryError ? caught.reason : undefined).toBe(
            "zero_derivative"
        );
    });
});
