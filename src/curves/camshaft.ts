import { DegenerateGeometryError } from "../drive/errors";
import { disk_center, type ParameterSet } from "../drive/parameters";
import { CIRCLE_RESOLUTION, circle_curve, type Curve } from "./curve";

export function camshaft_bore_radius(params: ParameterSet): number {
    return params.camshaft_diameter / 2 + params.tolerance;
}

/**
 * Can come out zero or negative, see `drawable_shaft_radius`.
 */
export function eccentric_shaft_radius(params: ParameterSet): number {
    return (params.camshaft_diameter - 2 * params.eccentricity) / 2;
}

export function drawable_shaft_radius(params: ParameterSet): number {
    const radius = eccentric_shaft_radius(params);
    if (radius <= 0) {
        throw new DegenerateGeometryError(
            "non_positive_shaft",
            `Eccentricity ${params.eccentricity} leaves no shaft inside a ${params.camshaft_diameter} camshaft`
        );
    }
    return radius;
}

export function camshaft_bore(params: ParameterSet, resolution = CIRCLE_RESOLUTION): Curve {
    return circle_curve("CAMSHAFT_HOLE", [0, 0], camshaft_bore_radius(params), resolution);
}

export function eccentric_shaft(
    params: ParameterSet,
    phi: number,
    resolution = CIRCLE_RESOLUTION
): Curve {
    return circle_curve(
        "ECCENTRIC_CAM",
        disk_center(params, phi),
        drawable_shaft_radius(params),
        resolution
    );
}
