import type { AnimationData } from "../models/AnimationData";
import { EMPTY_HISTORY, type UndoHistory } from "./UndoHistory";

export type ViewMode = 'list' | 'focus' | 'textEdit';

/** Which keyframe field the adjust command changes in focus mode */
export type EditMode = 'time' | 'progress';

export interface SessionState {
    readonly data: AnimationData;

    /** Playhead in seconds */
    readonly currentTime: number;
    readonly isPlaying: boolean;

    readonly viewMode: ViewMode;
    readonly editMode: EditMode;

    /** Line the list view is scrolled to */
    readonly scrollOffset: number;

    /** Stops the list view following the playhead */
    readonly manualScroll: boolean;

    /** Line locked for focus playback and text editing */
    readonly focusLineIndex: number | null;

    /** Selected keyframe within the focus line */
    readonly activeKeyframeIndex: number | null;

    /** Text edit cursor, in characters */
    readonly cursorCol: number;

    readonly history: UndoHistory;
}

export function createSessionState(data: AnimationData): SessionState {
    return {
        data,
        currentTime: 0,
        isPlaying: false,
        viewMode: 'list',
        editMode: 'time',
        scrollOffset: 0,
        manualScroll: false,
        focusLineIndex: null,
        activeKeyframeIndex: null,
        cursorCol: 0,
        history: EMPTY_HISTORY,
    };
}
