export class DriveError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type DegeneracyReason =
    | "zero_derivative"
    | "non_positive_shaft"
    | "insufficient_lobes";

/**
 * The parameters describe geometry that cannot be drawn. Raised instead of
 * clamping so callers can refuse to render or export.
 */
export class DegenerateGeometryError extends DriveError {
    constructor(readonly reason: DegeneracyReason, message: string) {
        super(message);
    }
}

export interface ParameterIssue {
    field: string;
    message: string;
}

export class InvalidParametersError extends DriveError {
    constructor(readonly issues: ParameterIssue[]) {
        super(
            "Invalid drive parameters: " +
                issues.map((i) => `${i.field} (${i.message})`).join(", ")
        );
    }
}

export class ExportUnavailableError extends DriveError {
    constructor(readonly format: string, message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ExportWriteError extends DriveError {
    constructor(readonly path: string, cause: unknown) {
        super(
            `Could not write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { cause }
        );
    }
}
