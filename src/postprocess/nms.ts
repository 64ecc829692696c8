import {BoxGeometry, CoordinateSpace, Detection} from "../types/detection.types";

export type NmsOptions = {
    /**
     * Only let boxes of the same class suppress each other.
     * Off by default: suppression is class-agnostic, so overlapping boxes of
     * different classes compete. Turning it on changes results.
     */
    classAware?: boolean;
};

/** Intersection-over-union of two top-left/extent rectangles. */
export function calculateIoU(a: BoxGeometry, b: BoxGeometry): number {
    const x1 = Math.max(a.x, b.x);
    const y1 = Math.max(a.y, b.y);
    const x2 = Math.min(a.x + a.width, b.x + b.width);
    const y2 = Math.min(a.y + a.height, b.y + b.height);

    const intersectionArea = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
    if (intersectionArea <= 0) return 0;

    const unionArea = a.width * a.height + b.width * b.height - intersectionArea;
    return unionArea > 0 ? intersectionArea / unionArea : 0;
}

/**
 * Greedy NMS: keep the most confident box, drop everything overlapping it by
 * at least `iouThreshold`, repeat. Output is in confidence-descending order;
 * equal confidences keep their input order.
 */
export function nonMaxSuppression<S extends CoordinateSpace>(
    detections: readonly Detection<S>[],
    iouThreshold: number,
    options: NmsOptions = {}
): Detection<S>[] {
    let remaining = [...detections].sort((a, b) => b.confidence - a.confidence);
    const selected: Detection<S>[] = [];

    while (remaining.length > 0) {
        const [current, ...rest] = remaining;
        selected.push(current);

        remaining = rest.filter((box) => {
            if (options.classAware && box.classIndex !== current.classIndex) {
                return true;
            }
            return calculateIoU(current, box) < iouThreshold;
        });
    }

    return selected;
}
