import type { IPoint } from "makerjs";
import { camshaft_bore_radius, drawable_shaft_radius } from "../curves/camshaft";
import type { LayerName } from "../curves/curve";
import { EXPORT_POINTS_PER_LOBE, cycloid_disk } from "../curves/cycloid_disk";
import { EXPORT_POINTS_PER_PIN, housing_profile } from "../curves/outer_ring";
import { output_hole_centers, output_hole_radius, output_pin_centers } from "../curves/output_pins";
import { pin_centers } from "../curves/pin_ring";
import { ExportUnavailableError } from "../drive/errors";
import { disk_center, type ParameterSet } from "../drive/parameters";
import { DXF_LAYERS, LAYER_STYLES } from "./layers";
import { interpolate_periodic, type PeriodicSpline } from "./periodic_spline";

export type DxfEntity =
    | { kind: "point"; layer: LayerName; at: IPoint }
    | { kind: "circle"; layer: LayerName; center: IPoint; radius: number }
    | { kind: "polyline"; layer: LayerName; points: IPoint[]; closed: boolean }
    | { kind: "spline"; layer: LayerName; spline: PeriodicSpline };

export type DxfModule = typeof import("@tarikjabiri/dxf");

/**
 * Everything that goes into the engineering drawing for phase `phi`. Curves
 * are re-derived here at export resolution, circles stay true circles.
 */
export function build_dxf_plan(params: ParameterSet, phi: number): DxfEntity[] {
    const plan: DxfEntity[] = [];

    plan.push({ kind: "point", layer: "CENTER_AXIS", at: [0, 0] });

    // Drill points for the external pins
    for (const at of pin_centers(params)) {
        plan.push({ kind: "point", layer: "PIN_CENTERS", at });
    }

    if (params.show_outer_ring) {
        plan.push({
            kind: "polyline",
            layer: "OUTER_RING",
            points: housing_profile(params, EXPORT_POINTS_PER_PIN),
            closed: true,
        });
        plan.push({
            kind: "circle",
            layer: "OUTER_RING",
            center: [0, 0],
            radius: params.ring_diameter / 2 + params.outer_ring_width,
        });
    }

    for (const center of output_pin_centers(params, phi)) {
        plan.push({
            kind: "circle",
            layer: "OUTPUT_PINS",
            center,
            radius: params.output_pin_diameter / 2,
        });
    }

    const hole_radius = output_hole_radius(params);
    for (const center of output_hole_centers(params, phi)) {
        plan.push({ kind: "circle", layer: "OUTPUT_HOLES", center, radius: hole_radius });
    }

    plan.push({
        kind: "circle",
        layer: "CAMSHAFT_HOLE",
        center: [0, 0],
        radius: camshaft_bore_radius(params),
    });

    plan.push({
        kind: "circle",
        layer: "ECCENTRIC_CAM",
        center: disk_center(params, phi),
        radius: drawable_shaft_radius(params),
    });

    // The profile repeats its first sample as its last, the spline closes itself
    const disk = cycloid_disk(params, phi, EXPORT_POINTS_PER_LOBE);
    plan.push({
        kind: "spline",
        layer: "CYCLOID_DISK",
        spline: interpolate_periodic(disk.points.slice(0, -1)),
    });

    return plan;
}

function load_dxf_module(): Promise<DxfModule> {
    return import("@tarikjabiri/dxf");
}

/**
 * Writes the plan as a DXF document. `importer` stands in for the DXF writer
 * module; a writer that cannot be loaded raises `ExportUnavailableError`.
 */
export async function render_dxf(
    plan: DxfEntity[],
    importer: () => Promise<DxfModule> = load_dxf_module
): Promise<string> {
    let dxf_module: DxfModule;
    try {
        dxf_module = await importer();
    } catch (e) {
        throw new ExportUnavailableError(
            "dxf",
            "DXF export needs the @tarikjabiri/dxf package, install it to export drawings",
            { cause: e }
        );
    }

    const { DxfWriter, LWPolylineFlags, SplineFlags, Units, point2d, point3d } = dxf_module;
    const dxf = new DxfWriter();
    dxf.setUnits(Units.Millimeters);

    for (const layer of DXF_LAYERS) {
        dxf.addLayer(layer, LAYER_STYLES[layer].aci, "CONTINUOUS");
    }

    for (const entity of plan) {
        const options = { layerName: entity.layer };
        switch (entity.kind) {
            case "point":
                dxf.addPoint(entity.at[0], entity.at[1], 0, options);
                break;
            case "circle":
                dxf.addCircle(point3d(entity.center[0], entity.center[1], 0), entity.radius, options);
                break;
            case "polyline":
                dxf.addLWPolyline(
                    entity.points.map((p) => ({ point: point2d(p[0], p[1]) })),
                    {
                        ...options,
                        flags: entity.closed ? LWPolylineFlags.Closed : LWPolylineFlags.None,
                    }
                );
                break;
            case "spline":
                dxf.addSpline(
                    {
                        controlPoints: entity.spline.control_points.map((p) => point3d(p[0], p[1], 0)),
                        fitPoints: entity.spline.fit_points.map((p) => point3d(p[0], p[1], 0)),
                        knots: entity.spline.knots,
                        degreeCurve: entity.spline.degree,
                        flags: SplineFlags.Closed | SplineFlags.Periodic | SplineFlags.Planar,
                    },
                    options
                );
                break;
        }
    }

    return dxf.stringify();
}
