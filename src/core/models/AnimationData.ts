/**
 * A single timing point within a line.
 */
export interface Keyframe {
    /** Seconds relative to the start of the containing line */
    time: number;

    /** Fractional character position the highlight has reached at `time` */
    index: number;
}

/**
 * Represents a single line of lyrics with its highlight keyframes.
 */
export interface LyricLine {
    /** Text content */
    text: string;

    /**
     * Optional section label (e.g. "chorus").
     * Sticky in the document format: it applies until the next label.
     */
    part?: string;

    /** Absolute start time in seconds */
    start: number;

    /** Absolute end time in seconds, never before `start` */
    end: number;

    /**
     * Sorted ascending by `time`.
     * The last entry is the boundary keyframe, coupled to `end`.
     */
    keyframes: Keyframe[];
}

/**
 * The complete authored timing for a song.
 */
export interface AnimationData {
    lines: LyricLine[];
}
