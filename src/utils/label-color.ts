const SATURATION = 0.7;
const LIGHTNESS = 0.5;

const colorCache = new Map<string, string>();

function labelHue(label: string): number {
    let hash = 0;
    for (let i = 0; i < label.length; i++) hash = (hash * 31 + label.charCodeAt(i)) | 0;
    return Math.abs(hash) % 360;
}

function hueToHex(hue: number): string {
    const chroma = (1 - Math.abs(2 * LIGHTNESS - 1)) * SATURATION;
    const second = chroma * (1 - Math.abs((hue / 60) % 2 - 1));
    const base = LIGHTNESS - chroma / 2;

    const sectors: ReadonlyArray<readonly [number, number, number]> = [
        [chroma, second, 0],
        [second, chroma, 0],
        [0, chroma, second],
        [0, second, chroma],
        [second, 0, chroma],
        [chroma, 0, second],
    ];
    const rgb = sectors[Math.floor(hue / 60) % 6];

    return `#${rgb.map(v => Math.round(255 * (v + base)).toString(16).padStart(2, '0')).join('')}`;
}

/**
 * Stable overlay color for a label: palette entry if given, otherwise a hue
 * derived from the label hash (70% saturation, 50% lightness).
 */
export function colorForLabel(label: string, palette?: Record<string, string>): string {
    const fixed = palette?.[label];
    if (fixed) return fixed;

    const cached = colorCache.get(label);
    if (cached) return cached;

    const color = hueToHex(labelHue(label));
    colorCache.set(label, color);
    return color;
}
