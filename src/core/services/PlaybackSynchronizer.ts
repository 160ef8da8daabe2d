import type { AnimationData, LyricLine } from "../models/AnimationData";

/**
 * Handles time-based line lookup.
 * Lines are scanned in order; overlapping lines resolve to the first one.
 */
export class PlaybackSynchronizer {
    /**
     * Finds the line whose [start, end] range contains the time.
     * @param data Complete animation data.
     * @param time Playhead time in seconds.
     * @returns The line index, or null between lines.
     */
    public findActiveLineIndex(data: AnimationData, time: number): number | null {
        const idx = data.lines.findIndex(l => time >= l.start && time <= l.end);
        return idx === -1 ? null : idx;
    }

    /**
     * Fallback scroll target when no line contains the time:
     * the first line that has already started, else the first line.
     */
    public findScrollIndex(data: AnimationData, time: number): number {
        const active = this.findActiveLineIndex(data, time);
        if (active !== null) return active;

        const started = data.lines.findIndex(l => time >= l.start);
        return started === -1 ? 0 : started;
    }

    /**
     * Calculates the progress (0.0 - 1.0) through the line's duration.
     * @param line The line.
     * @param time Playhead time in seconds.
     */
    public calculateLineProgress(line: LyricLine, time: number): number {
        const duration = line.end - line.start;
        if (duration <= 0) return 1;

        const elapsed = time - line.start;
        return Math.min(1, Math.max(0, elapsed / duration));
    }
}
