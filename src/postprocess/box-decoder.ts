import {ClassCatalog} from "../catalog/class-catalog";
import {ModelDetection} from "../types/detection.types";
import {TensorLayout} from "../types/tensor.types";

/**
 * Per-box encodings found in detector exports:
 *
 * - `pre-suppressed`: [x1, y1, x2, y2, score, classIndex], NMS already done by the model
 * - `objectness`:     [cx, cy, w, h, objectness, cls0..clsN-1]
 * - `class-scores`:   [cx, cy, w, h, cls0..clsN-1]
 *
 * The two center-form encodings share a shape signature, so the layout
 * decides: box-first tensors are read with an objectness channel,
 * channel-first tensors without one. Both conventions come from real exports
 * and unifying them changes results for one of the two layouts.
 */
export type BoxEncoding = 'pre-suppressed' | 'objectness' | 'class-scores';

export type DecodedBoxes = {
    encoding: BoxEncoding;
    detections: ModelDetection[];
};

const PRE_SUPPRESSED_ATTRIBUTES = 6;
const OBJECTNESS_INDEX = 4;

type Reader = (box: number, attribute: number) => number;

function createReader(data: ArrayLike<number>, layout: TensorLayout): Reader {
    const { numBoxes, elemPerBox, boxesFirst } = layout;
    return boxesFirst
        ? (box, attribute) => data[box * elemPerBox + attribute]
        : (box, attribute) => data[attribute * numBoxes + box];
}

export function selectBoxEncoding(layout: TensorLayout): BoxEncoding | null {
    if (layout.elemPerBox === PRE_SUPPRESSED_ATTRIBUTES) return 'pre-suppressed';
    if (layout.elemPerBox < 5) return null;
    // 4 box values + objectness leave no room for a class channel
    if (layout.elemPerBox - 5 <= 0) return null;
    return layout.boxesFirst ? 'objectness' : 'class-scores';
}

const isUsableBox = (x: number, y: number, w: number, h: number, score: number) =>
    Number.isFinite(x) && Number.isFinite(y) && Number.isFinite(w) && Number.isFinite(h) &&
    Number.isFinite(score) && w > 0 && h > 0;

function decodePreSuppressed(
    read: Reader,
    numBoxes: number,
    threshold: number,
    catalog: ClassCatalog
): ModelDetection[] {
    const detections: ModelDetection[] = [];

    for (let i = 0; i < numBoxes; i++) {
        const x1 = read(i, 0);
        const y1 = read(i, 1);
        const x2 = read(i, 2);
        const y2 = read(i, 3);
        const score = read(i, 4);
        const classIndex = Math.trunc(read(i, 5));

        if (score < threshold) continue;

        const width = x2 - x1;
        const height = y2 - y1;
        if (!isUsableBox(x1, y1, width, height, score)) continue;

        detections.push({
            space: 'model',
            x: x1,
            y: y1,
            width,
            height,
            label: catalog.labelFor(classIndex),
            classIndex,
            confidence: score,
        });
    }

    return detections;
}

function decodeCenterForm(
    read: Reader,
    layout: TensorLayout,
    withObjectness: boolean,
    threshold: number,
    catalog: ClassCatalog
): ModelDetection[] {
    const firstClass = withObjectness ? OBJECTNESS_INDEX + 1 : OBJECTNESS_INDEX;
    const detections: ModelDetection[] = [];

    for (let i = 0; i < layout.numBoxes; i++) {
        const objectness = withObjectness ? read(i, OBJECTNESS_INDEX) : 1;

        // strict > keeps the lowest class index on ties, all-zero rows included
        let bestScore = objectness * read(i, firstClass), bestClass = 0;
        for (let c = firstClass + 1; c < layout.elemPerBox; c++) {
            const score = objectness * read(i, c);
            if (score > bestScore) { bestScore = score; bestClass = c - firstClass; }
        }

        if (bestScore < threshold) continue;

        const cx = read(i, 0);
        const cy = read(i, 1);
        const w = read(i, 2);
        const h = read(i, 3);
        const x = cx - w / 2;
        const y = cy - h / 2;
        if (!isUsableBox(x, y, w, h, bestScore)) continue;

        detections.push({
            space: 'model',
            x,
            y,
            width: w,
            height: h,
            label: catalog.labelFor(bestClass),
            classIndex: bestClass,
            confidence: bestScore,
        });
    }

    return detections;
}

/**
 * Extracts candidate boxes above the confidence threshold, unsorted and not
 * yet suppressed (unless the encoding says the model already did it).
 * Returns null when the layout matches no encoding or the buffer is short.
 */
export function decodeBoxes(
    data: ArrayLike<number>,
    layout: TensorLayout,
    confidenceThreshold: number,
    catalog: ClassCatalog = ClassCatalog.coco()
): DecodedBoxes | null {
    const encoding = selectBoxEncoding(layout);
    if (encoding === null) return null;
    if (data.length < layout.numBoxes * layout.elemPerBox) return null;

    const read = createReader(data, layout);

    switch (encoding) {
        case 'pre-suppressed':
            return { encoding, detections: decodePreSuppressed(read, layout.numBoxes, confidenceThreshold, catalog) };
        case 'objectness':
            return { encoding, detections: decodeCenterForm(read, layout, true, confidenceThreshold, catalog) };
        case 'class-scores':
            return { encoding, detections: decodeCenterForm(read, layout, false, confidenceThreshold, catalog) };
    }
}
