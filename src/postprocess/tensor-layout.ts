import {TensorLayout} from "../types/tensor.types";

/**
 * Largest attribute count still read as channel-first.
 *
 * Exports put either a small attribute axis (4 box values + classes) next to a
 * large anchor axis, or the reverse. A model with more than 300 classes and
 * fewer boxes than classes is read the wrong way round; changing the constant
 * changes how existing exports decode.
 */
export const CHANNEL_FIRST_MAX_ATTRIBUTES = 300;

const isDimension = (v: number | undefined): v is number => v !== undefined && Number.isInteger(v) && v > 0;

/** [1, C, N] or [1, N, C] → box count and attributes per box. */
export function resolveTensorLayout(dims: readonly number[]): TensorLayout | null {
    if (dims.length !== 3 || dims[0] !== 1) return null;

    const [, d1, d2] = dims;
    if (!isDimension(d1) || !isDimension(d2)) return null;

    if (d1 <= CHANNEL_FIRST_MAX_ATTRIBUTES && d2 > d1) {
        return { elemPerBox: d1, numBoxes: d2, boxesFirst: false };
    }
    return { numBoxes: d1, elemPerBox: d2, boxesFirst: true };
}
