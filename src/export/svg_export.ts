import MakerJs from "makerjs";
import type { Curve, CurveSet } from "../curves/curve";
import type { ParameterSet } from "../drive/parameters";
import { curve_to_imodel } from "../utils/makerjs_tools";
import { LAYER_STYLES } from "./layers";

export const SVG_MARGIN = 10;
export const SVG_ACCURACY = 0.001;

/**
 * Half the width of the square view box.
 */
export function svg_view_extent(params: ParameterSet): number {
    const ring_radius = params.ring_diameter / 2;
    return params.show_outer_ring
        ? ring_radius + params.outer_ring_width + SVG_MARGIN
        : ring_radius + SVG_MARGIN;
}

/**
 * Path data in drawing coordinates, y up. makerjs writes SVG with y pointing
 * down, so the model is mirrored first and the flip group stays the only flip.
 */
export function curve_path_data(curve: Curve): string {
    if (curve.points.length < 2) {
        return "";
    }

    const mirrored = MakerJs.model.mirror(curve_to_imodel(curve), false, true);
    const data = MakerJs.exporter.toSVGPathData(mirrored, {
        byLayers: false,
        origin: [0, 0],
        accuracy: SVG_ACCURACY,
    });
    return typeof data === "string" ? data : Object.values(data).join(" ");
}

/**
 * Flat SVG: one stroked path per curve, colored by layer, inside a group that
 * flips y so the drawing reads like the CAD view.
 */
export function render_svg(set: CurveSet, params: ParameterSet): string {
    const m = svg_view_extent(params);
    const lines = [
        `<?xml version="1.0" encoding="UTF-8"?>`,
        `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${-m} ${-m} ${2 * m} ${2 * m}">`,
        `<g transform="scale(1,-1)">`,
    ];

    for (const [layer, curves] of set) {
        const style = LAYER_STYLES[layer];
        for (const curve of curves) {
            lines.push(
                `<path d="${curve_path_data(curve)}" fill="none" stroke="${style.stroke}" stroke-width="${style.stroke_width}"/>`
            );
        }
    }

    lines.push("</g>");
    lines.push("</svg>");
    return lines.join("\n");
}
