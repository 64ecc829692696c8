export type CoordinateSpace = 'model' | 'image';

/**
 * One labeled box. `space` tells which pixel grid the geometry lives in:
 * the square model input ('model') or the original picture ('image').
 */
export type Detection<S extends CoordinateSpace = CoordinateSpace> = Readonly<{
    space: S;
    x: number;                  // top-left corner
    y: number;
    width: number;
    height: number;
    label: string;
    classIndex: number;
    confidence: number;         // 0..1
}>;

export type ModelDetection = Detection<'model'>;
export type ImageDetection = Detection<'image'>;

export type BoxGeometry = Pick<Detection, 'x' | 'y' | 'width' | 'height'>;
