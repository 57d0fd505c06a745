import { describe, expect, it } from "vitest";
import { EXPORT_POINTS_PER_LOBE, cycloid_disk } from "../curves/cycloid_disk";
import { DegenerateGeometryError, ExportUnavailableError } from "../drive/errors";
import { create_parameters, normalize_to_pins } from "../drive/parameters";
import { dist } from "../math";
import { build_dxf_plan, render_dxf, type DxfEntity } from "./dxf_export";
import { DXF_LAYERS } from "./layers";
import { evaluate_spline } from "./periodic_spline";

const params = normalize_to_pins(
    create_parameters({
        num_external_pins: 12,
        pin_diameter: 5,
        eccentricity: 1.2,
        num_output_pins: 6,
        output_pin_diameter: 4,
        camshaft_diameter: 8,
        show_outer_ring: true,
    })
);

function on_layer(plan: DxfEntity[], layer: string): DxfEntity[] {
    return plan.filter((e) => e.layer == layer);
}

type GroupPair = [string, string];

// Group code/value pairs of every entity of `type` in a DXF document
function dxf_entities(text: string, type: string): GroupPair[][] {
    const lines = text.split(/\r?\n/).map((line) => line.trim());
    const found: GroupPair[][] = [];
    let current: GroupPair[] | undefined;

    for (let i = 0; i + 1 < lines.length; i += 2) {
        const pair: GroupPair = [lines[i], lines[i + 1]];
        if (pair[0] == "0") {
            current = pair[1] == type ? [] : undefined;
            if (current) {
                found.push(current);
            }
        } else if (current) {
            current.push(pair);
        }
    }
    return found;
}

function group_values(entity: GroupPair[], code: string): string[] {
    return entity.filter((pair) => pair[0] == code).map((pair) => pair[1]);
}

describe("build_dxf_plan", () => {
    const plan = build_dxf_plan(params, 0);

    it("marks the axis and every pin center", () => {
        expect(plan[0]).toEqual({ kind: "point", layer: "CENTER_AXIS", at: [0, 0] });
        const centers = on_layer(plan, "PIN_CENTERS");
        expect(centers).toHaveLength(12);
        centers.forEach((e) => expect(e.kind).toBe("point"));
    });

    it("draws the housing as a closed polyline and a circle", () => {
        const ring = on_layer(plan, "OUTER_RING");
        expect(ring.map((e) => e.kind)).toEqual(["polyline", "circle"]);
        const [inner, outer] = ring;
        if (inner.kind == "polyline") {
            expect(inner.closed).toBe(true);
            expect(inner.points).toHaveLength(12 * 30);
        }
        if (outer.kind == "circle") {
            expect(outer.radius).toBeCloseTo(20.5 + 15, 12);
        }
    });

    it("keeps pins, holes and shafts as true circles", () => {
        const pins = on_layer(plan, "OUTPUT_PINS");
        const holes = on_layer(plan, "OUTPUT_HOLES");
        expect(pins).toHaveLength(6);
        expect(holes).toHaveLength(6);
        holes.forEach((e) => {
            expect(e.kind).toBe("circle");
            if (e.kind == "circle") {
                expect(e.radius).toBeCloseTo(2 + 1.2 + 0.2, 12);
            }
        });

        const [bore] = on_layer(plan, "CAMSHAFT_HOLE");
        const [cam] = on_layer(plan, "ECCENTRIC_CAM");
        expect(bore.kind == "circle" ? bore.radius : NaN).toBeCloseTo(4.2, 12);
        expect(cam.kind == "circle" ? cam.radius : NaN).toBeCloseTo(2.8, 12);
        expect(cam.kind == "circle" ? cam.center : []).toEqual([1.2, 0]);
    });

    it("writes the disk as one closed spline through its export samples", () => {
        const disk = on_layer(plan, "CYCLOID_DISK");
        expect(disk).toHaveLength(1);
        const entity = disk[0];
        expect(entity.kind).toBe("spline");
        if (entity.kind != "spline") {
            return;
        }

        const { spline } = entity;
        const samples = cycloid_disk(params, 0, EXPORT_POINTS_PER_LOBE).points.slice(0, -1);
        expect(spline.fit_points).toHaveLength(11 * 60 - 1);
        expect(spline.control_points).toHaveLength(11 * 60 + 2);
        expect(spline.knots).toHaveLength(11 * 60 + 6);

        let worst = 0;
        samples.forEach((sample, i) => {
            worst = Math.max(worst, dist(evaluate_spline(spline, spline.knots[3 + i]), sample));
        });
        expect(worst).toBeLessThan(1e-6);
    });

    it("only uses drawing layers", () => {
        expect(plan).toHaveLength(1 + 12 + 2 + 6 + 6 + 1 + 1 + 1);
        plan.forEach((e) => expect(DXF_LAYERS).toContain(e.layer));
    });

    it("leaves the housing out when it is hidden", () => {
        const hidden = build_dxf_plan(create_parameters({ ...params, show_outer_ring: false }), 0);
        expect(on_layer(hidden, "OUTER_RING")).toEqual([]);
    });

    it("refuses a shaft with no material", () => {
        const thin = create_parameters({ ...params, eccentricity: 4 });
        expect(() => build_dxf_plan(thin, 0)).toThrow(DegenerateGeometryError);
    });
});

describe("render_dxf", () => {
    it("writes layers and entities", async () => {
        const text = await render_dxf(build_dxf_plan(params, 0.25));
        for (const layer of DXF_LAYERS) {
            expect(text).toContain(layer);
        }
        expect(text).toContain("SPLINE");
        expect(text).toContain("LWPOLYLINE");
        expect(text).toContain("CIRCLE");
        expect(text).toContain("POINT");
        expect(text).toContain("EOF");
    });

    it("keeps closed curves closed in the document", async () => {
        const text = await render_dxf(build_dxf_plan(params, 0));

        const [housing, ...other_polylines] = dxf_entities(text, "LWPOLYLINE");
        expect(other_polylines).toEqual([]);
        expect(group_values(housing, "90")).toEqual(["360"]);
        expect(group_values(housing, "70")).toEqual(["1"]);

        const [disk, ...other_splines] = dxf_entities(text, "SPLINE");
        expect(other_splines).toEqual([]);
        // closed, periodic, planar
        expect(group_values(disk, "70")).toEqual(["11"]);
        expect(group_values(disk, "71")).toEqual(["3"]);
        expect(group_values(disk, "72")).toEqual(["666"]);
        expect(group_values(disk, "73")).toEqual(["662"]);
        expect(group_values(disk, "74")).toEqual(["659"]);

        // Uniform, not clamped: no repeated knots at either end
        const knots = group_values(disk, "40").map(Number);
        expect(knots).toEqual(Array.from({ length: 666 }, (_, i) => i));
    });

    it("reports a writer that cannot be loaded", async () => {
        const missing = () => Promise.reject(new Error("Cannot find module '@tarikjabiri/dxf'"));
        await expect(render_dxf([], missing)).rejects.toBeInstanceOf(ExportUnavailableError);
        await expect(render_dxf([], missing)).rejects.toMatchObject({ format: "dxf" });
    });
});
