import { rename, rm, writeFile } from "fs/promises";
import { EXPORT_RESOLUTION, generate_curve_set } from "../curves/curve_set";
import { ExportUnavailableError, ExportWriteError } from "../drive/errors";
import type { ParameterSet } from "../drive/parameters";
import { build_dxf_plan, render_dxf } from "./dxf_export";
import { EXPORT_FORMATS, is_export_format } from "./layers";
import { render_svg } from "./svg_export";

/**
 * The drawing for a frozen phase as document text.
 */
export async function export_drawing(
    format: string,
    params: ParameterSet,
    phi: number
): Promise<string> {
    if (!is_export_format(format)) {
        throw new ExportUnavailableError(
            format,
            `Unknown export format "${format}", expected one of ${EXPORT_FORMATS.join(", ")}`
        );
    }

    switch (format) {
        case "dxf":
            return render_dxf(build_dxf_plan(params, phi));
        case "svg":
            return render_svg(generate_curve_set(params, phi, EXPORT_RESOLUTION), params);
    }
}

/**
 * Exports and writes the drawing. The document goes to a `.partial` file that
 * is renamed into place, a failed write leaves nothing behind.
 */
export async function write_drawing(
    path: string,
    format: string,
    params: ParameterSet,
    phi: number
): Promise<void> {
    const document = await export_drawing(format, params, phi);
    const partial = path + ".partial";

    try {
        await writeFile(partial, document, "utf8");
        await rename(partial, path);
    } catch (e) {
        await rm(partial, { force: true });
        throw new ExportWriteError(path, e);
    }

    console.log("Wrote " + format.toUpperCase() + " : " + path);
}
