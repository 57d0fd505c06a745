import type { LayerName } from "../curves/curve";

export interface LayerStyle {
    /** AutoCAD color index for the DXF layer table */
    aci: number;
    stroke: string;
    stroke_width: number;
}

export const LAYER_STYLES: Record<LayerName, LayerStyle> = {
    EXTERNAL_PINS: { aci: 8, stroke: "#666666", stroke_width: 0.5 },
    CYCLOID_DISK: { aci: 1, stroke: "#FF4444", stroke_width: 0.8 },
    OUTPUT_PINS: { aci: 3, stroke: "#44FF44", stroke_width: 0.5 },
    OUTPUT_HOLES: { aci: 6, stroke: "#FF44FF", stroke_width: 0.5 },
    CAMSHAFT_HOLE: { aci: 5, stroke: "#4444FF", stroke_width: 0.6 },
    ECCENTRIC_CAM: { aci: 2, stroke: "#FFAA00", stroke_width: 0.5 },
    OUTER_RING: { aci: 8, stroke: "#888888", stroke_width: 0.6 },
    PIN_CENTERS: { aci: 7, stroke: "#FFFFFF", stroke_width: 0.5 },
    CENTER_AXIS: { aci: 4, stroke: "#00FFFF", stroke_width: 0.5 },
};

// Layers of the engineering drawing, in the order they are declared
export const DXF_LAYERS: LayerName[] = [
    "CYCLOID_DISK",
    "OUTPUT_PINS",
    "OUTPUT_HOLES",
    "CAMSHAFT_HOLE",
    "ECCENTRIC_CAM",
    "OUTER_RING",
    "PIN_CENTERS",
    "CENTER_AXIS",
];

export const EXPORT_FORMATS = ["dxf", "svg"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function is_export_format(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((f) => f === value);
}
