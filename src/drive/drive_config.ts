import { readFile } from "fs/promises";
import { z } from "zod";
import { EXPORT_FORMATS, type ExportFormat } from "../export/layers";
import { DriveError, InvalidParametersError } from "./errors";
import { create_parameters, parameter_schema, type ParameterSet } from "./parameters";

const format_schema = z.enum(EXPORT_FORMATS);

export const drive_config_schema = z
    .object({
        name: z.string().min(1).default("cycloidal_drive"),
        phase: z.number().finite().default(0),
        parameters: parameter_schema.partial().default({}),
        formats: z.array(format_schema).min(1).default([...EXPORT_FORMATS]),
        output_dir: z.string().min(1).default("out"),
    })
    .strict();

export interface DriveConfig {
    name: string;
    phase: number;
    parameters: ParameterSet;
    formats: ExportFormat[];
    output_dir: string;
}

export function parse_drive_config(raw: unknown): DriveConfig {
    const result = drive_config_schema.safeParse(raw);
    if (!result.success) {
        throw new InvalidParametersError(
            result.error.issues.map((issue) => ({
                field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
                message: issue.message,
            }))
        );
    }

    const config = result.data;
    return {
        name: config.name,
        phase: config.phase,
        parameters: create_parameters(config.parameters),
        formats: config.formats,
        output_dir: config.output_dir,
    };
}

export async function load_drive_config(path: string): Promise<DriveConfig> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, "utf8"));
    } catch (e) {
        throw new DriveError(`Could not read drive config ${path}`, { cause: e });
    }
    return parse_drive_config(raw);
}
