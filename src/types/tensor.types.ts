/** Flat detector output plus its shape, e.g. [1, 84, 8400]. */
export type RawOutputTensor = {
    data: ArrayLike<number>;
    dims: readonly number[];
};

export type TensorLayout = {
    numBoxes: number;
    elemPerBox: number;
    boxesFirst: boolean;        // [1, N, C] when true, [1, C, N] otherwise
};

export type LetterboxParams = {
    scale: number;
    padX: number;
    padY: number;
    resizedWidth: number;
    resizedHeight: number;
};

/** How the model input was produced from the original image. */
export type PreprocessTransform =
    | { kind: 'letterbox'; params: LetterboxParams }
    | { kind: 'resize'; originalWidth: number; originalHeight: number; modelWidth: number; modelHeight: number };

/** Planar CHW float input ready for inference, values in [0..1]. */
export type PreparedInput = {
    data: Float32Array;
    dims: [1, 3, number, number];
    transform: PreprocessTransform;
    originalWidth: number;
    originalHeight: number;
};
