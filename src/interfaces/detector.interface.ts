import {ImageSource} from "../types/image-source";
import {ImageDetection} from "../types/detection.types";
import {PreparedInput, RawOutputTensor} from "../types/tensor.types";

export type DetectionOutput = {
    detections: ImageDetection[];   // suppression order, original-image pixels
    width: number;                  // upright size of the analysed image
    height: number;
};

export interface IDetector {
    isReady(): boolean;
    initialize(): Promise<void>;
    detectObjects(src: ImageSource): Promise<DetectionOutput>;
}

/** Runs the network: planar CHW input in, first detection output out. */
export interface InferenceProvider {
    isReady(): boolean;
    initialize(): Promise<void>;
    run(input: PreparedInput): Promise<RawOutputTensor>;
}
