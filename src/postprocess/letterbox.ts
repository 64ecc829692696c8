import {BoxGeometry} from "../types/detection.types";
import {LetterboxParams} from "../types/tensor.types";

const isPositive = (v: number) => Number.isFinite(v) && v > 0;

/**
 * Fit an image of any aspect ratio into the target size without distortion.
 *
 * The resized content is centered; when the leftover is odd the extra pixel
 * ends up on the right/bottom. Returns null when a dimension is not positive
 * or the resized content would collapse to zero pixels.
 */
export function computeLetterbox(
    origW: number,
    origH: number,
    targetW: number,
    targetH: number
): LetterboxParams | null {
    if (!isPositive(origW) || !isPositive(origH) || !isPositive(targetW) || !isPositive(targetH)) {
        return null;
    }

    const scale = Math.min(targetW / origW, targetH / origH);
    const resizedWidth = Math.floor(origW * scale);
    const resizedHeight = Math.floor(origH * scale);
    if (resizedWidth <= 0 || resizedHeight <= 0) return null;

    const padX = Math.floor((targetW - resizedWidth) / 2);
    const padY = Math.floor((targetH - resizedHeight) / 2);

    return { scale, padX, padY, resizedWidth, resizedHeight };
}

/** Inverse of the letterbox for box geometry (top-left + extent). */
export function unletterboxBox<B extends BoxGeometry>(box: B, params: LetterboxParams): B {
    const { scale, padX, padY } = params;
    return {
        ...box,
        x: (box.x - padX) / scale,
        y: (box.y - padY) / scale,
        width: box.width / scale,
        height: box.height / scale,
    };
}
