import MakerJs, { models, type IModel, type IModelMap, type IPoint } from "makerjs";
import type { Curve, CurveSet } from "../curves/curve";

export function points_to_imodel(loop: boolean, points: IPoint[]): IModel {
    return new models.ConnectTheDots(loop, points);
}

export function curve_to_imodel(curve: Curve): IModel {
    // ConnectTheDots closes the loop itself
    const points = curve.closed ? curve.points.slice(0, -1) : curve.points;
    return points_to_imodel(curve.closed, points);
}

/**
 * The curve set as a makerjs model tree: one child model per layer, tagged
 * with the layer name, holding one model per curve.
 */
export function curve_set_to_model(set: CurveSet): IModel {
    const layer_models: IModelMap = {};
    for (const [layer, curves] of set) {
        const children: IModelMap = {};
        curves.forEach((curve, i) => {
            children[layer.toLowerCase() + "_" + i] = curve_to_imodel(curve);
        });
        layer_models[layer] = { layer, models: children };
    }
    return { models: layer_models };
}

export function curve_set_extents(set: CurveSet): MakerJs.IMeasureWithCenter {
    return MakerJs.measure.modelExtents(curve_set_to_model(set));
}
