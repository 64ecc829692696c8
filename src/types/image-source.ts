export type ImageSource =
    | string                  // file path
    | Buffer                  // encoded bytes (jpeg, png, webp...)
    | { data: Buffer; filename?: string; capturedAt?: number }; // camera frame
