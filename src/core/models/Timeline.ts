import type { AnimationData, LyricLine } from "./AnimationData";
import { charLength } from "../utils/TextMetrics";

export function createLine(text: string, start: number, end: number, part?: string): LyricLine {
    const line: LyricLine = { text, start, end, keyframes: [] };
    if (part !== undefined) {
        line.part = part;
    }
    return line;
}

/**
 * Appends a new line and returns it so keyframes can be chained onto it.
 */
export function addLine(data: AnimationData, text: string, start: number, end: number): LyricLine {
    const line = createLine(text, start, end);
    data.lines.push(line);
    return line;
}

export function lineDuration(line: LyricLine): number {
    return line.end - line.start;
}

export function relativeTime(line: LyricLine, time: number): number {
    return time - line.start;
}

/**
 * Interpolates the highlight position at `relTime`.
 *
 * Times that no keyframe pair brackets (including times before the first
 * keyframe) resolve to the last keyframe's index.
 */
export function getCurrentIndex(line: LyricLine, relTime: number): number {
    const kfs = line.keyframes;
    if (kfs.length === 0) return 0;

    for (let i = 0; i < kfs.length - 1; i++) {
        const k1 = kfs[i];
        const k2 = kfs[i + 1];
        if (relTime >= k1.time && relTime <= k2.time) {
            const span = k2.time - k1.time;
            if (span === 0) return k1.index;
            const t = (relTime - k1.time) / span;
            return k1.index + (k2.index - k1.index) * t;
        }
    }

    return kfs[kfs.length - 1].index;
}

/**
 * Stable sort by time; equal times keep their relative order.
 */
export function sortKeyframes(line: LyricLine): void {
    line.keyframes.sort((a, b) => {
        const diff = a.time - b.time;
        return Number.isNaN(diff) ? 0 : diff;
    });
}

export function addKeyframe(line: LyricLine, time: number, index: number): LyricLine {
    line.keyframes.push({ time, index });
    sortKeyframes(line);
    return line;
}

/**
 * Adds a keyframe whose position is given as a fraction (0.0 - 1.0) of the line's text.
 */
export function addKeyframeAtPercent(line: LyricLine, time: number, pct: number): LyricLine {
    return addKeyframe(line, time, charLength(line.text) * pct);
}

/**
 * Index of the keyframe nearest to `relTime`, first one on ties.
 */
export function findClosestKeyframe(line: LyricLine, relTime: number): number | null {
    let best: number | null = null;
    let bestDist = Infinity;

    for (let i = 0; i < line.keyframes.length; i++) {
        const dist = Math.abs(line.keyframes[i].time - relTime);
        if (best === null || dist < bestDist) {
            bestDist = dist;
            best = i;
        }
    }

    return best;
}

export function cloneAnimation(data: AnimationData): AnimationData {
    return structuredClone(data);
}

/**
 * Built-in session used when nothing has been loaded.
 */
export function createDemoAnimation(): AnimationData {
    const data: AnimationData = { lines: [] };

    const first = addLine(data, "City of stars", 0.0, 3.42);
    addKeyframeAtPercent(first, 0.0, 0.0);
    addKeyframeAtPercent(first, 1.2, 0.7);
    addKeyframeAtPercent(first, 3.42, 1.0);

    const second = addLine(data, "You never shined so brightly", 3.42 + 0.5, 3.42 + 0.5 + 7.112);
    addKeyframeAtPercent(second, 0.0, 0.0);
    addKeyframeAtPercent(second, 0.4, 0.2);
    addKeyframeAtPercent(second, 5.4, 0.9);
    addKeyframeAtPercent(second, 7.0, 1.0);

    return data;
}
