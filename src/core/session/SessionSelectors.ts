import type { LyricLine } from "../models/AnimationData";
import { getCurrentIndex, lineDuration, relativeTime } from "../models/Timeline";
import { DEFAULT_EDITOR_CONFIG, type EditorConfig } from "../config/EditorConfig";
import { PlaybackSynchronizer } from "../services/PlaybackSynchronizer";
import { charLength, clamp } from "../utils/TextMetrics";
import type { SessionState } from "./SessionState";

const synchronizer = new PlaybackSynchronizer();

export interface CharHighlight {
    char: string;
    /** The highlight has reached this character */
    played: boolean;
    /** 0.0 - 1.0 lead-in glow for characters just ahead of the highlight */
    glow: number;
}

export interface KeyframeLabel {
    label: string;
    /** The playhead sits on this keyframe */
    isNear: boolean;
    isActive: boolean;
}

export function activeLineIndex(state: SessionState): number | null {
    return synchronizer.findActiveLineIndex(state.data, state.currentTime);
}

/**
 * Line shown in focus mode: the focus lock, else whatever is playing.
 */
export function displayLineIndex(state: SessionState): number | null {
    const idx = state.focusLineIndex ?? activeLineIndex(state);
    return idx !== null && idx < state.data.lines.length ? idx : null;
}

/**
 * Playhead relative to the displayed line, clamped to the line's duration.
 */
export function headerRelativeTime(state: SessionState): number {
    const idx = displayLineIndex(state);
    if (idx === null) return 0;

    const line = state.data.lines[idx];
    return clamp(relativeTime(line, state.currentTime), 0, lineDuration(line));
}

export function modeLabel(state: SessionState): string {
    switch (state.viewMode) {
        case 'list':
            return "LINE MODE [ESC] | TEXT EDIT [E] | [Q] Quit | [SPACE] Play";
        case 'focus':
            return "FULL MODE [ESC] | [Q] Quit | [SPACE] Play";
        case 'textEdit':
            return "DONE [ESC]";
    }
}

export function modeHint(state: SessionState): string {
    if (state.viewMode === 'list' && state.manualScroll) {
        return "MANUAL SCROLLING (Press ESC to Auto)";
    }
    if (state.viewMode === 'focus') {
        return "[N] Next Line | [P] Prev Line";
    }
    return "";
}

export function editModeLabel(state: SessionState): string {
    return state.editMode === 'time' ? "EDIT: TIME" : "EDIT: PROGRESS";
}

/**
 * Per-character highlight for a line at an absolute playhead time.
 */
export function charHighlights(
    line: LyricLine,
    currentTime: number,
    config: EditorConfig = DEFAULT_EDITOR_CONFIG
): CharHighlight[] {
    const target = getCurrentIndex(line, relativeTime(line, currentTime));

    return Array.from(line.text).map((char, i) => {
        if (target >= i) {
            return { char, played: true, glow: 1 };
        }
        const dist = i - target;
        return { char, played: false, glow: clamp(1 - dist / config.glowWidth, 0, 1) };
    });
}

export function keyframeLabels(
    state: SessionState,
    lineIndex: number,
    config: EditorConfig = DEFAULT_EDITOR_CONFIG
): KeyframeLabel[] {
    const line = state.data.lines[lineIndex];
    if (!line) return [];

    const relTime = relativeTime(line, state.currentTime);
    const len = Math.max(1, charLength(line.text));

    return line.keyframes.map((k, ki) => ({
        label: `KF${ki}: ${k.time.toFixed(2)}s|${((k.index / len) * 100).toFixed(0)}%`,
        isNear: Math.abs(k.time - relTime) < config.keyframeNearWindow,
        isActive: state.activeKeyframeIndex === ki && state.focusLineIndex === lineIndex,
    }));
}
