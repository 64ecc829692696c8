import sharp, { Sharp } from 'sharp';
import path from 'node:path';
import type { ImageSource } from '../types/image-source';

/**
 * Opens the source with EXIF orientation applied, so every size read from
 * the pipeline is the upright (post-rotation) one.
 */
export function openSharp(src: ImageSource): { sh: Sharp; filename?: string } {
    if (typeof src === 'string') {
        return { sh: sharp(src).rotate(), filename: path.basename(src) };
    }
    if (Buffer.isBuffer(src)) {
        return { sh: sharp(src).rotate() };
    }
    // camera frame
    return { sh: sharp(src.data).rotate(), filename: src.filename };
}
