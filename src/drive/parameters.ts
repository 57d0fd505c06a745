import type { IPoint } from "makerjs";
import { cos, pi, round, sin } from "mathjs";
import { z } from "zod";
import { InvalidParametersError, type ParameterIssue } from "./errors";

const length = z.number().finite().positive();

export const parameter_schema = z
    .object({
        eccentricity: length,
        num_external_pins: z.number().int().min(3),
        num_output_pins: z.number().int().min(3),
        ring_diameter: length,
        pin_diameter: length,
        output_disk_diameter: length,
        output_pin_diameter: length,
        camshaft_diameter: length,
        tolerance: z.number().finite().min(0),
        show_outer_ring: z.boolean(),
        outer_ring_width: length,
    })
    .strict();

/**
 * Design variables of one drive. All lengths share a unit (millimetres in
 * the exporters). Built through `create_parameters`, never mutated.
 */
export type ParameterSet = Readonly<z.infer<typeof parameter_schema>>;

export type ParameterInput = Partial<ParameterSet>;

export const DEFAULT_PARAMETERS: ParameterSet = Object.freeze({
    eccentricity: 1.4,
    num_external_pins: 24,
    num_output_pins: 7,
    ring_diameter: 80.0,
    pin_diameter: 5.0,
    output_disk_diameter: 50.0,
    output_pin_diameter: 10.0,
    camshaft_diameter: 20.0,
    tolerance: 0.2,
    show_outer_ring: false,
    outer_ring_width: 15.0,
});

export function create_parameters(input: ParameterInput = {}): ParameterSet {
    const result = parameter_schema.safeParse({ ...DEFAULT_PARAMETERS, ...input });
    if (!result.success) {
        const issues: ParameterIssue[] = result.error.issues.map((issue) => ({
            field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
            message: issue.message,
        }));
        throw new InvalidParametersError(issues);
    }

    const parsed = result.data;

    // The pin ring only works with an even pin count, odd counts round up
    const pins = parsed.num_external_pins;
    return Object.freeze({
        ...parsed,
        num_external_pins: pins % 2 == 0 ? pins : pins + 1,
    });
}

export function with_parameters(
    params: ParameterSet,
    changes: ParameterInput
): ParameterSet {
    return create_parameters({ ...params, ...changes });
}

/**
 * Sizes the ring and output disk from the pin count and pin diameter, leaving
 * one and a quarter pin diameters of wall between neighbouring pins.
 */
export function normalize_to_pins(params: ParameterSet): ParameterSet {
    const n = params.num_external_pins;
    const d = params.pin_diameter;
    const ring_diameter = (d * n + 1.25 * d * (n - 1)) / pi;
    const output_disk_diameter = (2 / 3) * ring_diameter;

    return with_parameters(params, {
        ring_diameter: round(ring_diameter, 1),
        output_disk_diameter: round(output_disk_diameter, 1),
    });
}

export function lobe_count(params: ParameterSet): number {
    return params.num_external_pins - 1;
}

/**
 * Where the orbiting disk (and the eccentric shaft) sits for input phase `phi`.
 */
export function disk_center(params: ParameterSet, phi: number): IPoint {
    return [params.eccentricity * cos(phi), params.eccentricity * sin(phi)];
}

/**
 * The disk turns backwards at 1/L of the input speed.
 */
export function disk_rotation(params: ParameterSet, phi: number): number {
    return -phi / lobe_count(params);
}
