import { describe, expect, it } from 'vitest';
import { colorForLabel } from '../src/utils/label-color';

describe('colorForLabel', () => {
    it('derives a hex color from the label hash', () => {
        expect(colorForLabel('a')).toBe('#6bd926');
    });

    it('covers hues across the color wheel', () => {
        expect(colorForLabel('person')).toBe('#d9a626');
        expect(colorForLabel('dog')).toBe('#a926d9');
        expect(colorForLabel('car')).toBe('#d92662');
    });

    it('is stable across calls and well-formed', () => {
        const first = colorForLabel('traffic light');
        expect(colorForLabel('traffic light')).toBe(first);
        expect(first).toMatch(/^#[0-9a-f]{6}$/);
    });

    it('prefers the palette', () => {
        expect(colorForLabel('person', { person: '#22c55e' })).toBe('#22c55e');
        expect(colorForLabel('dog', { person: '#22c55e' })).toMatch(/^#[0-9a-f]{6}$/);
    });
});
