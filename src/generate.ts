import { mkdir } from "fs/promises";
import { join } from "path";
import { camshaft_bore_radius, eccentric_shaft_radius } from "./curves/camshaft";
import { find_degeneracies, generate_curve_set } from "./curves/curve_set";
import { disk_offset, trochoid_geometry } from "./curves/cycloid_disk";
import { output_hole_radius } from "./curves/output_pins";
import { load_drive_config } from "./drive/drive_config";
import { ExportUnavailableError } from "./drive/errors";
import { lobe_count } from "./drive/parameters";
import { write_drawing } from "./export/write_export";
import { curve_set_extents } from "./utils/makerjs_tools";

const DEFAULT_DRIVE = "drives/default_drive.json";

async function main(args: string[]) {
    const config_path = args[0] ?? DEFAULT_DRIVE;
    const config = await load_drive_config(config_path);
    const params = config.parameters;

    const problems = find_degeneracies(params);
    if (problems.length > 0) {
        console.error("\n==== DEGENERATE GEOMETRY ====");
        problems.forEach((p) => console.error("=> " + p.message));
        process.exitCode = 1;
        return;
    }

    const g = trochoid_geometry(params);
    console.log("\n==== DRIVE : " + config.name + " ====");
    console.log("Reduction        : " + lobe_count(params) + ":1");
    console.log("External pins    : " + params.num_external_pins);
    console.log("Output pins      : " + params.num_output_pins);
    console.log("Stationary radius: " + g.stationary_radius.toPrecision(5));
    console.log("Disk offset      : " + disk_offset(params).toPrecision(5));
    console.log("Output hole r    : " + output_hole_radius(params).toPrecision(5));
    console.log("Camshaft bore r  : " + camshaft_bore_radius(params).toPrecision(5));
    console.log("Eccentric r      : " + eccentric_shaft_radius(params).toPrecision(5));
    console.log("Phase            : " + config.phase);

    const extents = curve_set_extents(generate_curve_set(params, config.phase));
    const width = extents.high[0] - extents.low[0];
    const height = extents.high[1] - extents.low[1];
    console.log("Drawing extents  : " + width.toPrecision(5) + " x " + height.toPrecision(5));

    console.log("\n==== EXPORT ====");
    await mkdir(config.output_dir, { recursive: true });
    for (const format of config.formats) {
        const path = join(config.output_dir, config.name + "." + format);
        await write_drawing(path, format, params, config.phase);
    }
}

main(process.argv.slice(2)).catch((e: unknown) => {
    if (e instanceof ExportUnavailableError) {
        console.error("Export unavailable (" + e.format + "): " + e.message);
    } else {
        console.error(e instanceof Error ? e.message : e);
    }
    process.exitCode = 1;
});
