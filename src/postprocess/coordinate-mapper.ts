import {ImageDetection, ModelDetection} from "../types/detection.types";
import {LetterboxParams, PreprocessTransform} from "../types/tensor.types";
import {unletterboxBox} from "./letterbox";

const isPositive = (v: number) => Number.isFinite(v) && v > 0;

const hasFiniteGeometry = (d: ImageDetection) =>
    Number.isFinite(d.x) && Number.isFinite(d.y) && Number.isFinite(d.width) && Number.isFinite(d.height);

/** Live-capture path: the frame was letterboxed into the model input. */
export function mapFromLetterbox(
    detections: readonly ModelDetection[],
    params: LetterboxParams
): ImageDetection[] {
    if (!isPositive(params.scale)) return [];

    return detections
        .map((d): ImageDetection => ({ ...unletterboxBox(d, params), space: 'image' }))
        .filter(hasFiniteGeometry);
}

/** Static-image path: plain stretch resize, no padding to undo. */
export function mapFromResize(
    detections: readonly ModelDetection[],
    originalWidth: number,
    originalHeight: number,
    modelWidth: number,
    modelHeight: number
): ImageDetection[] {
    if (![originalWidth, originalHeight, modelWidth, modelHeight].every(isPositive)) return [];

    const scaleX = originalWidth / modelWidth;
    const scaleY = originalHeight / modelHeight;

    return detections
        .map((d): ImageDetection => ({
            ...d,
            space: 'image',
            x: d.x * scaleX,
            y: d.y * scaleY,
            width: d.width * scaleX,
            height: d.height * scaleY,
        }))
        .filter(hasFiniteGeometry);
}

/**
 * Applies the inverse of whichever preprocessing produced the model input.
 * The two inverses are not interchangeable; apply exactly once per detection.
 */
export function mapToImageSpace(
    detections: readonly ModelDetection[],
    transform: PreprocessTransform
): ImageDetection[] {
    switch (transform.kind) {
        case 'letterbox':
            return mapFromLetterbox(detections, transform.params);
        case 'resize':
            return mapFromResize(
                detections,
                transform.originalWidth,
                transform.originalHeight,
                transform.modelWidth,
                transform.modelHeight
            );
    }
}

/** Clamp boxes to the frame; boxes left without area are dropped. */
export function clipToImage(
    detections: readonly ImageDetection[],
    width: number,
    height: number
): ImageDetection[] {
    const clipped: ImageDetection[] = [];
    for (const d of detections) {
        const x1 = Math.max(0, d.x);
        const y1 = Math.max(0, d.y);
        const x2 = Math.min(width, d.x + d.width);
        const y2 = Math.min(height, d.y + d.height);
        if (x2 <= x1 || y2 <= y1) continue;
        clipped.push({ ...d, x: x1, y: y1, width: x2 - x1, height: y2 - y1 });
    }
    return clipped;
}
