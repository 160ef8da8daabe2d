/**
 * Text measurements in characters (Unicode code points), not UTF-16 units.
 * Cursor positions and keyframe indices share this measure.
 */
export function charLength(text: string): number {
    return Array.from(text).length;
}

export function sliceChars(text: string, start: number, end?: number): string {
    return Array.from(text).slice(start, end).join('');
}

/**
 * Inserts `insertion` before the character at `col`.
 */
export function insertAt(text: string, col: number, insertion: string): string {
    const chars = Array.from(text);
    chars.splice(col, 0, insertion);
    return chars.join('');
}

/**
 * Removes the character at `col`. Out of range positions leave the text as is.
 */
export function removeAt(text: string, col: number): string {
    const chars = Array.from(text);
    if (col < 0 || col >= chars.length) return text;
    chars.splice(col, 1);
    return chars.join('');
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}
