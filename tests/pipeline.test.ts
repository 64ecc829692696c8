import { describe, expect, it } from 'vitest';
import { computeLetterbox } from '../src/postprocess/letterbox';
import { detectInModelSpace, postprocessOutput } from '../src/postprocess/pipeline';
import { PreprocessTransform } from '../src/types/tensor.types';
import { channelFirst } from './fixtures';

const thresholds = { confidenceThreshold: 0.5, iouThreshold: 0.45 };

const zeroRow = [0, 0, 0, 0, 0, 0, 0];

// 8 boxes x (4 geometry + 3 classes), channel-first [1, 7, 8]
const anchors = {
    dims: [1, 7, 8],
    data: channelFirst([
        [100, 100, 40, 40, 0.1, 0.8, 0.05],     // bicycle
        [102, 100, 40, 40, 0.7, 0.1, 0.1],      // person, overlaps the bicycle
        [300, 300, 20, 20, 0, 0, 0.6],          // car
        zeroRow, zeroRow, zeroRow, zeroRow, zeroRow,
    ]),
};

describe('detectInModelSpace', () => {
    it('decodes, filters and suppresses across classes', () => {
        const result = detectInModelSpace(anchors, thresholds);

        expect(result.encoding).toBe('class-scores');
        expect(result.candidates).toBe(3);
        expect(result.suppressed).toBe(true);
        expect(result.detections.map(d => d.label)).toEqual(['bicycle', 'car']);
        expect(result.detections[0]).toMatchObject({ space: 'model', x: 80, y: 80, width: 40, height: 40 });
        expect(result.detections[1]).toMatchObject({ x: 290, y: 290, width: 20, height: 20 });
    });

    it('keeps overlapping boxes of different classes with class-aware NMS', () => {
        const result = detectInModelSpace(anchors, { ...thresholds, classAwareNms: true });
        expect(result.detections.map(d => d.label)).toEqual(['bicycle', 'person', 'car']);
    });

    it('passes pre-suppressed output through without NMS', () => {
        const data = new Float32Array(300 * 6);
        data.set([10, 10, 50, 60, 0.9, 3], 0);
        data.set([12, 10, 52, 60, 0.8, 3], 6);

        const result = detectInModelSpace({ dims: [1, 300, 6], data }, thresholds);

        expect(result.encoding).toBe('pre-suppressed');
        expect(result.suppressed).toBe(false);
        expect(result.detections).toHaveLength(2);
        expect(result.detections[0]).toMatchObject({ x: 10, y: 10, width: 40, height: 50, label: 'motorcycle' });
        expect(result.detections[0]?.confidence).toBeCloseTo(0.9, 6);
    });

    it('skips NMS when nothing passes the threshold', () => {
        const data = channelFirst([zeroRow, zeroRow, zeroRow, zeroRow, zeroRow, zeroRow, zeroRow, zeroRow]);
        const result = detectInModelSpace({ dims: [1, 7, 8], data }, thresholds);

        expect(result).toEqual({ encoding: 'class-scores', candidates: 0, suppressed: false, detections: [] });
    });

    it('reports uninterpretable output as no detections', () => {
        expect(detectInModelSpace({ dims: [2, 84, 8400], data: new Float32Array(0) }, thresholds))
            .toEqual({ encoding: null, candidates: 0, suppressed: false, detections: [] });
        expect(detectInModelSpace({ dims: [1, 10, 3], data: new Float32Array(30) }, thresholds).detections).toEqual([]);
    });
});

describe('postprocessOutput', () => {
    it('returns live-capture detections in frame pixels', () => {
        const params = computeLetterbox(1280, 720, 640, 640);
        expect(params).not.toBeNull();
        if (!params) return;

        const detections = postprocessOutput(anchors, { kind: 'letterbox', params }, thresholds);

        expect(detections).toHaveLength(2);
        expect(detections[0]).toMatchObject({ space: 'image', label: 'bicycle', x: 160, y: -120, width: 80, height: 80 });
        expect(detections[1]).toMatchObject({ space: 'image', label: 'car', x: 580, y: 300, width: 40, height: 40 });
    });

    it('returns picked-image detections in image pixels', () => {
        const transform: PreprocessTransform = {
            kind: 'resize',
            originalWidth: 1280,
            originalHeight: 960,
            modelWidth: 640,
            modelHeight: 640,
        };
        const [first] = postprocessOutput(anchors, transform, thresholds);
        expect(first).toMatchObject({ label: 'bicycle', x: 160, y: 120, width: 80, height: 60 });
    });

    it('returns an empty list for a non-unit batch', () => {
        const params = computeLetterbox(1280, 720, 640, 640);
        if (!params) throw new Error('letterbox expected');
        expect(postprocessOutput({ dims: [2, 84, 8400], data: new Float32Array(0) }, { kind: 'letterbox', params }, thresholds)).toEqual([]);
    });
});
