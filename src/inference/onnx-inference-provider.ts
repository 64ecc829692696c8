import { promises as fs } from "fs";
import path from "path";
import * as ort from "onnxruntime-web";
import {InferenceProvider} from "../interfaces/detector.interface";
import {PreparedInput, RawOutputTensor} from "../types/tensor.types";

export type OnnxInferenceOptions = {
    /** Output to read; defaults to the first rank-3 output. */
    outputName?: string;
    debug?: boolean;
};

/**
 * ONNX Runtime session over a detection model. Only the session lives here;
 * decoding the output is the post-processing pipeline's job.
 */
export class OnnxInferenceProvider implements InferenceProvider {
    private session: ort.InferenceSession | null = null;
    private readonly outputName?: string;
    private readonly debug: boolean;

    constructor(private readonly model: string | Uint8Array, options?: OnnxInferenceOptions) {
        this.outputName = options?.outputName;
        this.debug = options?.debug ?? false;
    }

    isReady(): boolean { return this.session !== null; }

    log(text: string) {
        if (this.debug) {
            console.log(text);
        }
    }

    async initialize(): Promise<void> {
        const bytes = await this.loadModelBytes();

        try {
            this.session = await ort.InferenceSession.create(bytes);
            this.log('ONNX session ready');
            this.log(`   Inputs: ${JSON.stringify(this.session.inputNames)}`);
            this.log(`   Outputs: ${JSON.stringify(this.session.outputNames)}`);
        } catch (e) {
            console.error("Failed to create ONNX session:", e);
            throw e;
        }
    }

    private async loadModelBytes(): Promise<Uint8Array> {
        if (typeof this.model !== 'string') return this.model;

        this.log(`Loading model: ${path.basename(this.model)}`);
        const fileExists = await fs.access(this.model).then(() => true, () => false);
        if (!fileExists) {
            throw new Error(`Model not found: ${this.model}`);
        }
        return fs.readFile(this.model);
    }

    async run(input: PreparedInput): Promise<RawOutputTensor> {
        if (!this.session) {
            throw new Error("ONNX session is not initialized");
        }

        const feeds: Record<string, ort.Tensor> = {
            [this.session.inputNames[0]]: new ort.Tensor('float32', input.data, input.dims),
        };
        const results = await this.session.run(feeds);

        const output = this.pickDetOutput(results);
        if (!(output.data instanceof Float32Array)) {
            throw new Error(`Unsupported output type ${output.type}, expected float32`);
        }
        this.log(`Output shape: ${output.dims.join('x')}`);

        return { data: output.data, dims: output.dims };
    }

    private pickDetOutput(results: Record<string, ort.Tensor>): ort.Tensor {
        if (this.outputName) {
            const named = results[this.outputName];
            if (!named) throw new Error(`Model has no output named '${this.outputName}'`);
            return named;
        }

        const names = Object.keys(results);
        const ranked = names.find((name) => results[name].dims.length === 3);
        const chosen = ranked ?? names[0];
        if (chosen === undefined) {
            throw new Error("Model returned no outputs");
        }
        if (!ranked) {
            this.log(`No rank-3 output, falling back to '${chosen}'`);
        }
        return results[chosen];
    }
}
