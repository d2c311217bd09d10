export type Rgba = [number, number, number, number];

/** Accepts `#rrggbb`, or `#rrggbbaa` where the embedded alpha wins over `alpha`. */
export function hexToRgba(hex: string, alpha: number = 1.0): Rgba {
    const r = parseInt(hex.slice(1, 3), 16) / 255;
    const g = parseInt(hex.slice(3, 5), 16) / 255;
    const b = parseInt(hex.slice(5, 7), 16) / 255;
    const a = hex.length === 9 ? parseInt(hex.slice(7, 9), 16) / 255 : alpha;
    return [r, g, b, a];
}
