export * from "./types/detection.types";
export * from "./types/tensor.types";
export type { ImageSource } from "./types/image-source";

export { ClassCatalog } from "./catalog/class-catalog";
export { DetectionSettings, DEFAULT_THRESHOLDS, thresholdsSchema } from "./config/detection-settings";
export type { DetectionThresholds } from "./config/detection-settings";

export { computeLetterbox, unletterboxBox } from "./postprocess/letterbox";
export { resolveTensorLayout, CHANNEL_FIRST_MAX_ATTRIBUTES } from "./postprocess/tensor-layout";
export { decodeBoxes, selectBoxEncoding } from "./postprocess/box-decoder";
export type { BoxEncoding, DecodedBoxes } from "./postprocess/box-decoder";
export { calculateIoU, nonMaxSuppression } from "./postprocess/nms";
export type { NmsOptions } from "./postprocess/nms";
export { mapFromLetterbox, mapFromResize, mapToImageSpace, clipToImage } from "./postprocess/coordinate-mapper";
export { detectInModelSpace, postprocessOutput } from "./postprocess/pipeline";
export type { PostprocessOptions, ModelSpaceResult } from "./postprocess/pipeline";

export type { IDetector, InferenceProvider, DetectionOutput } from "./interfaces/detector.interface";
export { FramePreprocessor, toPlanarFloat } from "./processors/frame-preprocessor";
export type { PreprocessMode } from "./processors/frame-preprocessor";
export { OnnxInferenceProvider } from "./inference/onnx-inference-provider";
export type { OnnxInferenceOptions } from "./inference/onnx-inference-provider";
export { OnnxObjectDetector } from "./detectors/onnx-object.detector";
export type { OnnxObjectDetectorOptions } from "./detectors/onnx-object.detector";
export { DetectionLoop } from "./live/detection-loop";
export type { FrameSource, FrameResult, DetectionLoopOptions } from "./live/detection-loop";
export { colorForLabel } from "./utils/label-color";
