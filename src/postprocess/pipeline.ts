import {ClassCatalog} from "../catalog/class-catalog";
import {ImageDetection, ModelDetection} from "../types/detection.types";
import {PreprocessTransform, RawOutputTensor} from "../types/tensor.types";
import {BoxEncoding, decodeBoxes} from "./box-decoder";
import {mapToImageSpace} from "./coordinate-mapper";
import {nonMaxSuppression} from "./nms";
import {resolveTensorLayout} from "./tensor-layout";

export type PostprocessOptions = {
    confidenceThreshold: number;
    iouThreshold: number;
    catalog?: ClassCatalog;
    classAwareNms?: boolean;
};

export type ModelSpaceResult = {
    encoding: BoxEncoding | null;   // null: output could not be interpreted
    candidates: number;             // boxes left after the confidence filter
    suppressed: boolean;            // whether NMS ran
    detections: ModelDetection[];
};

const EMPTY: ModelSpaceResult = { encoding: null, candidates: 0, suppressed: false, detections: [] };

/**
 * Layout → decode → NMS, all in model-input pixels.
 * Unreadable output is reported as "no detections", never thrown.
 */
export function detectInModelSpace(tensor: RawOutputTensor, options: PostprocessOptions): ModelSpaceResult {
    const layout = resolveTensorLayout(tensor.dims);
    if (!layout) return { ...EMPTY, detections: [] };

    const decoded = decodeBoxes(tensor.data, layout, options.confidenceThreshold, options.catalog);
    if (!decoded) return { ...EMPTY, detections: [] };

    const { encoding, detections } = decoded;
    if (encoding === 'pre-suppressed' || detections.length === 0) {
        return { encoding, candidates: detections.length, suppressed: false, detections };
    }

    return {
        encoding,
        candidates: detections.length,
        suppressed: true,
        detections: nonMaxSuppression(detections, options.iouThreshold, { classAware: options.classAwareNms }),
    };
}

/** Full pipeline: raw tensor → detections in original-image pixels, in suppression order. */
export function postprocessOutput(
    tensor: RawOutputTensor,
    transform: PreprocessTransform,
    options: PostprocessOptions
): ImageDetection[] {
    const { detections } = detectInModelSpace(tensor, options);
    if (detections.length === 0) return [];
    return mapToImageSpace(detections, transform);
}
