import sharp from "sharp";
import {openSharp} from "../utils/open-sharp";
import {ImageSource} from "../types/image-source";
import {PreparedInput, PreprocessTransform} from "../types/tensor.types";
import {computeLetterbox} from "../postprocess/letterbox";

/**
 * `letterbox` keeps the aspect ratio and pads (camera frames);
 * `resize` stretches straight to the square input (picked images).
 */
export type PreprocessMode = 'letterbox' | 'resize';

type RawImage = { data: Buffer; width: number; height: number };

const CHANNELS = 3;

/** HWC interleaved RGB bytes → planar CHW floats in [0..1]. */
export function toPlanarFloat(rgb: Uint8Array, width: number, height: number): Float32Array {
    const area = width * height;
    const planar = new Float32Array(CHANNELS * area);
    for (let i = 0; i < area; i++) {
        planar[i]            = rgb[i * CHANNELS] / 255;       // R
        planar[area + i]     = rgb[i * CHANNELS + 1] / 255;   // G
        planar[2 * area + i] = rgb[i * CHANNELS + 2] / 255;   // B
    }
    return planar;
}

export class FramePreprocessor {
    private readonly inputSize: number;
    private readonly padValue: number;

    constructor(options?: { inputSize?: number; padValue?: number }) {
        this.inputSize = options?.inputSize ?? 640;
        this.padValue = options?.padValue ?? 114;
    }

    async getImageSize(src: ImageSource): Promise<{ width: number; height: number }> {
        const { width, height } = await this.decode(src);
        return { width, height };
    }

    async prepare(src: ImageSource, mode: PreprocessMode = 'letterbox'): Promise<PreparedInput> {
        const image = await this.decode(src);
        const T = this.inputSize;

        const { pixels, transform } = mode === 'letterbox'
            ? await this.letterbox(image)
            : await this.stretch(image);

        return {
            data: toPlanarFloat(pixels, T, T),
            dims: [1, CHANNELS, T, T],
            transform,
            originalWidth: image.width,
            originalHeight: image.height,
        };
    }

    // Upright sRGB pixels without alpha; the sizes here are post-rotation.
    private async decode(src: ImageSource): Promise<RawImage> {
        const { sh, filename } = openSharp(src);
        const { data, info } = await sh
            .toColorspace('srgb')
            .removeAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true })
            .catch((err: unknown) => {
                throw new Error(`Failed to decode image${filename ? ` ${filename}` : ''}`, { cause: err });
            });

        if (!info.width || !info.height) {
            throw new Error(`Invalid image size: ${info.width}x${info.height}`);
        }
        return { data, width: info.width, height: info.height };
    }

    private fromRaw(image: RawImage) {
        return sharp(image.data, { raw: { width: image.width, height: image.height, channels: CHANNELS } });
    }

    private async letterbox(image: RawImage): Promise<{ pixels: Buffer; transform: PreprocessTransform }> {
        const T = this.inputSize;
        const params = computeLetterbox(image.width, image.height, T, T);
        if (!params) {
            throw new Error(`Cannot letterbox ${image.width}x${image.height} into ${T}x${T}`);
        }
        const { resizedWidth: newW, resizedHeight: newH, padX, padY } = params;

        const resized = await this.fromRaw(image)
            .resize(newW, newH, { fit: 'fill', kernel: 'lanczos3' })
            .raw()
            .toBuffer();

        const canvas = Buffer.alloc(T * T * CHANNELS, this.padValue);
        for (let y = 0; y < newH; y++) {
            const srcStart = y * newW * CHANNELS;
            const dstStart = ((padY + y) * T + padX) * CHANNELS;
            resized.copy(canvas, dstStart, srcStart, srcStart + newW * CHANNELS);
        }

        return { pixels: canvas, transform: { kind: 'letterbox', params } };
    }

    private async stretch(image: RawImage): Promise<{ pixels: Buffer; transform: PreprocessTransform }> {
        const T = this.inputSize;
        const pixels = await this.fromRaw(image)
            .resize(T, T, { fit: 'fill', kernel: 'lanczos3' })
            .raw()
            .toBuffer();

        return {
            pixels,
            transform: {
                kind: 'resize',
                originalWidth: image.width,
                originalHeight: image.height,
                modelWidth: T,
                modelHeight: T,
            },
        };
    }
}
