import { describe, expect, it } from 'vitest';
import { calculateIoU, nonMaxSuppression } from '../src/postprocess/nms';
import { ModelDetection } from '../src/types/detection.types';

function box(x: number, y: number, width: number, height: number, confidence: number, classIndex = 0): ModelDetection {
    return { space: 'model', x, y, width, height, confidence, classIndex, label: `class-${classIndex}` };
}

describe('calculateIoU', () => {
    it('divides overlap by union', () => {
        expect(calculateIoU(box(0, 0, 10, 10, 1), box(5, 0, 10, 10, 1))).toBeCloseTo(1 / 3, 10);
        expect(calculateIoU(box(0, 0, 10, 10, 1), box(0, 0, 10, 10, 1))).toBe(1);
    });

    it('is zero for touching, disjoint and empty boxes', () => {
        expect(calculateIoU(box(0, 0, 10, 10, 1), box(10, 0, 10, 10, 1))).toBe(0);
        expect(calculateIoU(box(0, 0, 10, 10, 1), box(50, 50, 10, 10, 1))).toBe(0);
        expect(calculateIoU(box(5, 5, 0, 0, 1), box(5, 5, 0, 0, 1))).toBe(0);
    });
});

describe('nonMaxSuppression', () => {
    it('keeps only the most confident of two heavily overlapping boxes', () => {
        const weaker = box(0, 0, 10, 10, 0.7);
        const stronger = box(1, 0, 10, 10, 0.9);
        expect(nonMaxSuppression([weaker, stronger], 0.45)).toEqual([stronger]);
    });

    it('keeps boxes that overlap less than the threshold, most confident first', () => {
        const a = box(0, 0, 10, 10, 0.7);
        const b = box(8, 0, 10, 10, 0.9);
        expect(nonMaxSuppression([a, b], 0.45)).toEqual([b, a]);
    });

    it('suppresses at exactly the threshold', () => {
        const a = box(0, 0, 10, 10, 0.9);
        const b = box(5, 0, 10, 10, 0.8);
        expect(nonMaxSuppression([a, b], 1 / 3)).toEqual([a]);
    });

    it('lets different classes suppress each other by default', () => {
        const person = box(0, 0, 10, 10, 0.9, 0);
        const dog = box(1, 0, 10, 10, 0.8, 16);
        expect(nonMaxSuppression([person, dog], 0.45)).toEqual([person]);
    });

    it('keeps overlapping boxes of different classes when class-aware', () => {
        const person = box(0, 0, 10, 10, 0.9, 0);
        const dog = box(1, 0, 10, 10, 0.8, 16);
        const otherPerson = box(1, 1, 10, 10, 0.7, 0);
        expect(nonMaxSuppression([otherPerson, dog, person], 0.45, { classAware: true })).toEqual([person, dog]);
    });

    it('keeps input order for equal confidences', () => {
        const first = box(0, 0, 10, 10, 0.5);
        const second = box(100, 0, 10, 10, 0.5);
        const third = box(200, 0, 10, 10, 0.5);
        expect(nonMaxSuppression([first, second, third], 0.45)).toEqual([first, second, third]);
    });

    it('returns its own output unchanged', () => {
        const candidates = [
            box(0, 0, 10, 10, 0.6),
            box(2, 2, 10, 10, 0.95),
            box(30, 30, 12, 8, 0.4),
            box(31, 30, 12, 8, 0.8),
            box(60, 0, 5, 5, 0.3),
        ];
        const once = nonMaxSuppression(candidates, 0.45);
        expect(nonMaxSuppression(once, 0.45)).toEqual(once);
        expect(once.map(d => d.confidence)).toEqual([0.95, 0.8, 0.3]);
    });

    it('does not reorder the caller\'s array', () => {
        const input = [box(0, 0, 10, 10, 0.1), box(50, 0, 10, 10, 0.9)];
        nonMaxSuppression(input, 0.45);
        expect(input.map(d => d.confidence)).toEqual([0.1, 0.9]);
    });

    it('returns nothing for nothing', () => {
        expect(nonMaxSuppression([], 0.45)).toEqual([]);
    });
});
