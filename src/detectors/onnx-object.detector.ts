import * as syncFs from "fs";
import path from "path";
import {ClassCatalog} from "../catalog/class-catalog";
import {DetectionSettings} from "../config/detection-settings";
import {DetectionOutput, IDetector, InferenceProvider} from "../interfaces/detector.interface";
import {OnnxInferenceProvider} from "../inference/onnx-inference-provider";
import {FramePreprocessor, PreprocessMode} from "../processors/frame-preprocessor";
import {clipToImage, mapToImageSpace} from "../postprocess/coordinate-mapper";
import {detectInModelSpace} from "../postprocess/pipeline";
import {ImageSource} from "../types/image-source";

export type OnnxObjectDetectorOptions = {
    modelPath?: string;
    /** Replaces the ONNX session, e.g. with another runtime. */
    inference?: InferenceProvider;
    inputSize?: number;
    /** 'letterbox' for camera frames, 'resize' for picked images. */
    mode?: PreprocessMode;
    settings?: DetectionSettings;
    classNames?: string[];
    classAwareNms?: boolean;
    /** Clamp mapped boxes to the image bounds. */
    clip?: boolean;
    debug?: boolean;
};

/**
 * Object detector over an ONNX export of unknown layout.
 *
 * The output tensor shape decides how boxes are decoded (see box-decoder),
 * so the same class serves pre-suppressed exports and raw anchor outputs.
 * Thresholds are read from `settings` on every call.
 */
export class OnnxObjectDetector implements IDetector {
    private modelPath: string = './models/yolo/model.onnx';
    private readonly inference: InferenceProvider;
    private readonly preprocessor: FramePreprocessor;
    private readonly settings: DetectionSettings;
    private readonly mode: PreprocessMode;
    private readonly catalog: ClassCatalog;
    private readonly classAwareNms: boolean;
    private readonly clip: boolean;
    private readonly debug: boolean;

    constructor(options?: OnnxObjectDetectorOptions) {
        this.modelPath = options?.modelPath ?? this.modelPath;
        this.debug = options?.debug ?? false;
        this.inference = options?.inference ?? new OnnxInferenceProvider(this.modelPath, { debug: this.debug });
        this.preprocessor = new FramePreprocessor({ inputSize: options?.inputSize ?? 640 });
        this.settings = options?.settings ?? new DetectionSettings();
        this.mode = options?.mode ?? 'letterbox';
        this.classAwareNms = options?.classAwareNms ?? false;
        this.clip = options?.clip ?? false;
        this.catalog = options?.classNames?.length
            ? ClassCatalog.fromNames(options.classNames)
            : this.detectAndReadClassesTxt() ?? ClassCatalog.coco();
    }

    isReady(): boolean { return this.inference.isReady(); }
    public get classNames() { return this.catalog.names; }

    private detectAndReadClassesTxt(): ClassCatalog | null {
        const classesPath = path.join(path.dirname(this.modelPath), 'classes.txt');
        if (!syncFs.existsSync(classesPath)) {
            return null;
        }
        const catalog = ClassCatalog.fromFile(classesPath);
        this.log(`Classes loaded from ${classesPath}: ${catalog.size}`);
        return catalog;
    }

    log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }

    async initialize(): Promise<void> {
        this.log(`Initializing detector (${this.mode}, ${this.catalog.size} classes)`);
        await this.inference.initialize();
    }

    async detectObjects(src: ImageSource): Promise<DetectionOutput> {
        if (!this.inference.isReady()) {
            throw new Error("Detector is not initialized");
        }

        const input = await this.preprocessor.prepare(src, this.mode);
        const output = await this.inference.run(input);

        const { confidenceThreshold, iouThreshold } = this.settings.snapshot;
        const result = detectInModelSpace(output, {
            confidenceThreshold,
            iouThreshold,
            catalog: this.catalog,
            classAwareNms: this.classAwareNms,
        });

        if (this.debug) {
            this.log(`Output ${output.dims.join('x')} decoded as ${result.encoding ?? 'unsupported'}`);
            this.log(`Candidates above ${confidenceThreshold}: ${result.candidates}`);
            this.log(`After NMS (${result.suppressed ? `iou ${iouThreshold}` : 'skipped'}): ${result.detections.length}`);
        }

        const mapped = mapToImageSpace(result.detections, input.transform);
        const detections = this.clip
            ? clipToImage(mapped, input.originalWidth, input.originalHeight)
            : mapped;

        return { detections, width: input.originalWidth, height: input.originalHeight };
    }
}
