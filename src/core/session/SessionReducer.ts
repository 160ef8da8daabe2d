import type { AnimationData, LyricLine } from "../models/AnimationData";
import {
    addKeyframe,
    cloneAnimation,
    createLine,
    findClosestKeyframe,
    getCurrentIndex,
    relativeTime,
    sortKeyframes,
} from "../models/Timeline";
import { DEFAULT_EDITOR_CONFIG, type EditorConfig } from "../config/EditorConfig";
import { PlaybackSynchronizer } from "../services/PlaybackSynchronizer";
import { charLength, clamp, insertAt, removeAt, sliceChars } from "../utils/TextMetrics";
import type { Direction, SessionCommand, SessionCommandType } from "./Commands";
import type { SessionState, ViewMode } from "./SessionState";
import { pushSnapshot, undoSnapshot } from "./UndoHistory";

const synchronizer = new PlaybackSynchronizer();

/**
 * Commands each view mode accepts. Anything else is a no-op in that mode.
 */
export const MODE_COMMANDS: Readonly<Record<ViewMode, readonly SessionCommandType[]>> = {
    list: [
        'togglePlay', 'seek', 'enterTextEdit', 'escape', 'pageList',
        'undo', 'export', 'quit',
    ],
    focus: [
        'togglePlay', 'seek', 'enterTextEdit', 'escape', 'stepLine', 'toggleEditMode',
        'addKeyframe', 'removeKeyframe', 'adjustKeyframe', 'jumpKeyframe',
        'undo', 'export', 'quit',
    ],
    textEdit: [
        'escape', 'moveCursor', 'navigateLine', 'moveLine', 'insertText',
        'backspace', 'splitLine', 'undo',
    ],
};

export function isCommandAvailable(mode: ViewMode, type: SessionCommandType): boolean {
    return MODE_COMMANDS[mode].includes(type);
}

/**
 * Applies one command. The input state is never mutated; commands that
 * change the model work on a copy of it.
 */
export function applyCommand(
    state: SessionState,
    command: SessionCommand,
    config: EditorConfig = DEFAULT_EDITOR_CONFIG
): SessionState {
    if (!isCommandAvailable(state.viewMode, command.type)) return state;

    switch (command.type) {
        case 'togglePlay':
            return { ...state, isPlaying: !state.isPlaying };
        case 'seek':
            return seek(state, command.direction, config);
        case 'enterTextEdit':
            return enterTextEdit(state);
        case 'escape':
            return toggleViewMode(state);
        case 'stepLine':
            return stepLine(state, command.direction);
        case 'pageList':
            return pageList(state, command.direction);
        case 'toggleEditMode':
            return { ...state, editMode: state.editMode === 'time' ? 'progress' : 'time' };
        case 'addKeyframe':
            return addKeyframeAtPlayhead(state);
        case 'removeKeyframe':
            return removeNearestKeyframe(state);
        case 'adjustKeyframe':
            return adjustKeyframe(state, command.direction, config);
        case 'jumpKeyframe':
            return jumpKeyframe(state, command.direction, config);
        case 'moveCursor':
            return moveCursor(state, command.direction);
        case 'navigateLine':
            return navigateLine(state, command.direction);
        case 'moveLine':
            return moveLine(state, command.direction);
        case 'insertText':
            return insertText(state, command.text);
        case 'backspace':
            return backspace(state);
        case 'splitLine':
            return splitLine(state, config);
        case 'undo':
            return undo(state);
        case 'export':
        case 'quit':
            // Handled by the host; the session itself is unchanged
            return state;
        default: {
            const unhandled: never = command;
            return unhandled;
        }
    }
}

/**
 * Advances the playhead by `elapsed` seconds and re-derives scroll and focus.
 */
export function tick(state: SessionState, elapsed: number): SessionState {
    const { data, viewMode } = state;
    let { currentTime, focusLineIndex, scrollOffset } = state;

    if (state.isPlaying) {
        currentTime += elapsed;

        if (viewMode === 'focus') {
            if (focusLineIndex !== null) {
                const line = data.lines[focusLineIndex];
                if (line) {
                    if (currentTime > line.end) {
                        currentTime = line.start;
                    } else if (currentTime < line.start) {
                        currentTime = line.start;
                    }
                }
            } else {
                focusLineIndex = synchronizer.findActiveLineIndex(data, currentTime);
            }
        } else if (viewMode === 'list') {
            // Playback flows across lines in the overview
            focusLineIndex = null;
        }
    }

    if (!state.manualScroll) {
        const active = synchronizer.findActiveLineIndex(data, currentTime);
        if (active !== null) {
            scrollOffset = active;
            if (viewMode === 'focus' && focusLineIndex === null) {
                focusLineIndex = active;
            }
        } else {
            scrollOffset = synchronizer.findScrollIndex(data, currentTime);
        }
    }

    if (
        currentTime === state.currentTime
        && focusLineIndex === state.focusLineIndex
        && scrollOffset === state.scrollOffset
    ) {
        return state;
    }
    return { ...state, currentTime, focusLineIndex, scrollOffset };
}

/**
 * The line keyframe commands act on: the focus lock, else the line under the playhead.
 */
export function resolveEditLine(state: SessionState): number | null {
    const idx = state.focusLineIndex ?? synchronizer.findActiveLineIndex(state.data, state.currentTime);
    return idx !== null && idx < state.data.lines.length ? idx : null;
}

/**
 * Copies the model and hands the copy of line `idx` to `edit`.
 */
function editLine(
    state: SessionState,
    idx: number,
    edit: (line: LyricLine, data: AnimationData) => Partial<SessionState>,
    snapshot = false
): SessionState {
    const data = cloneAnimation(state.data);
    const changes = edit(data.lines[idx], data);
    return {
        ...state,
        ...changes,
        data,
        history: snapshot ? pushSnapshot(state.history, state.data) : state.history,
    };
}

function seek(state: SessionState, direction: Direction, config: EditorConfig): SessionState {
    const currentTime = Math.max(0, state.currentTime + direction * config.seekStep);
    return {
        ...state,
        currentTime,
        activeKeyframeIndex: null,
        focusLineIndex: state.viewMode === 'focus'
            ? synchronizer.findActiveLineIndex(state.data, currentTime)
            : state.focusLineIndex,
    };
}

function enterTextEdit(state: SessionState): SessionState {
    const focusLineIndex = state.focusLineIndex ?? state.scrollOffset;
    const line = state.data.lines[focusLineIndex];
    return {
        ...state,
        viewMode: 'textEdit',
        focusLineIndex,
        cursorCol: line ? charLength(line.text) : 0,
    };
}

function toggleViewMode(state: SessionState): SessionState {
    switch (state.viewMode) {
        case 'focus':
            return { ...state, viewMode: 'list', focusLineIndex: null };
        case 'list':
            return {
                ...state,
                viewMode: 'focus',
                manualScroll: false,
                focusLineIndex: synchronizer.findActiveLineIndex(state.data, state.currentTime),
                activeKeyframeIndex: null,
            };
        case 'textEdit':
            return { ...state, viewMode: 'list', focusLineIndex: null };
    }
}

function stepLine(state: SessionState, direction: Direction): SessionState {
    if (state.focusLineIndex === null) return state;

    const target = state.focusLineIndex + direction;
    const line = state.data.lines[target];
    if (target < 0 || !line) return state;

    return { ...state, focusLineIndex: target, currentTime: line.start };
}

function pageList(state: SessionState, direction: Direction): SessionState {
    const len = state.data.lines.length;
    if (len === 0) return { ...state, manualScroll: true };

    const scrollOffset = clamp(state.scrollOffset + direction, 0, len - 1);
    return {
        ...state,
        manualScroll: true,
        scrollOffset,
        currentTime: state.data.lines[scrollOffset].start,
        focusLineIndex: null,
        activeKeyframeIndex: null,
    };
}

function addKeyframeAtPlayhead(state: SessionState): SessionState {
    const idx = resolveEditLine(state);
    if (idx === null) return state;

    return editLine(state, idx, line => {
        const relTime = Math.max(0, relativeTime(line, state.currentTime));
        addKeyframe(line, relTime, getCurrentIndex(line, relTime));
        return {};
    }, true);
}

function removeNearestKeyframe(state: SessionState): SessionState {
    const idx = resolveEditLine(state);
    if (idx === null) return state;

    const source = state.data.lines[idx];
    // A line always keeps at least one keyframe
    if (source.keyframes.length <= 1) return state;

    const removed = findClosestKeyframe(source, relativeTime(source, state.currentTime));
    if (removed === null) return state;

    const active = state.activeKeyframeIndex;
    let activeKeyframeIndex: number | null = active;
    if (active === removed) {
        activeKeyframeIndex = null;
    } else if (active !== null && active > removed) {
        activeKeyframeIndex = active - 1;
    }

    return editLine(state, idx, line => {
        line.keyframes.splice(removed, 1);
        return { activeKeyframeIndex };
    }, true);
}

function adjustKeyframe(state: SessionState, direction: Direction, config: EditorConfig): SessionState {
    const idx = resolveEditLine(state);
    const ki = state.activeKeyframeIndex;
    if (idx === null || ki === null || ki >= state.data.lines[idx].keyframes.length) return state;

    return editLine(state, idx, line => {
        const kf = line.keyframes[ki];

        if (state.editMode === 'progress') {
            kf.index = clamp(kf.index + direction * config.progressNudge, 0, charLength(line.text));
            return {};
        }

        kf.time = Math.max(0, kf.time + direction * config.timeNudge);
        if (ki === line.keyframes.length - 1) {
            // Boundary keyframe drags the line end along
            line.end = Math.max(line.start + kf.time, line.start + config.minLineDuration);
            kf.time = line.end - line.start;
        }

        sortKeyframes(line);
        return { activeKeyframeIndex: line.keyframes.indexOf(kf) };
    });
}

function jumpKeyframe(state: SessionState, direction: Direction, config: EditorConfig): SessionState {
    const idx = resolveEditLine(state);
    if (idx === null) return state;

    const lines = state.data.lines;
    const line = lines[idx];
    const relTime = relativeTime(line, state.currentTime);

    let found = -1;
    if (direction > 0) {
        found = line.keyframes.findIndex(k => k.time > relTime + config.jumpEpsilon);
    } else {
        for (let i = line.keyframes.length - 1; i >= 0; i--) {
            if (line.keyframes[i].time < relTime - config.jumpEpsilon) {
                found = i;
                break;
            }
        }
    }

    if (found !== -1) {
        return {
            ...state,
            activeKeyframeIndex: found,
            currentTime: line.start + line.keyframes[found].time,
            isPlaying: false,
        };
    }

    const target = idx + direction;
    const adjacent = lines[target];
    if (target < 0 || !adjacent) {
        return { ...state, isPlaying: false };
    }

    const count = adjacent.keyframes.length;
    return {
        ...state,
        focusLineIndex: target,
        currentTime: adjacent.start,
        activeKeyframeIndex: count === 0 ? null : direction > 0 ? 0 : count - 1,
        isPlaying: false,
    };
}

/**
 * Focus line for text editing, if it still exists.
 */
function textLine(state: SessionState): number | null {
    const idx = state.focusLineIndex;
    return idx !== null && idx < state.data.lines.length ? idx : null;
}

function moveCursor(state: SessionState, direction: Direction): SessionState {
    const idx = textLine(state);
    if (idx === null) return state;

    const len = charLength(state.data.lines[idx].text);
    if (direction < 0 && state.cursorCol > 0) {
        return { ...state, cursorCol: state.cursorCol - 1 };
    }
    if (direction > 0 && state.cursorCol < len) {
        return { ...state, cursorCol: state.cursorCol + 1 };
    }
    return state;
}

function navigateLine(state: SessionState, direction: Direction): SessionState {
    const idx = textLine(state);
    if (idx === null) return state;

    const target = idx + direction;
    const line = state.data.lines[target];
    if (target < 0 || !line) return state;

    return {
        ...state,
        focusLineIndex: target,
        cursorCol: Math.min(state.cursorCol, charLength(line.text)),
    };
}

function moveLine(state: SessionState, direction: Direction): SessionState {
    const idx = textLine(state);
    if (idx === null) return state;

    const target = idx + direction;
    if (target < 0 || target >= state.data.lines.length) return state;

    return editLine(state, idx, (line, data) => {
        data.lines[idx] = data.lines[target];
        data.lines[target] = line;
        return { focusLineIndex: target };
    }, true);
}

function insertText(state: SessionState, text: string): SessionState {
    const idx = textLine(state);
    if (idx === null || text === "") return state;

    return editLine(state, idx, line => {
        const col = Math.min(state.cursorCol, charLength(line.text));
        line.text = insertAt(line.text, col, text);
        return { cursorCol: col + charLength(text) };
    });
}

function backspace(state: SessionState): SessionState {
    const idx = textLine(state);
    if (idx === null) return state;

    if (state.cursorCol > 0) {
        return editLine(state, idx, line => {
            const col = Math.min(state.cursorCol, charLength(line.text));
            line.text = removeAt(line.text, col - 1);
            return { cursorCol: Math.max(0, col - 1) };
        });
    }

    if (idx === 0) return state;

    // Merge into the previous line
    return editLine(state, idx, (line, data) => {
        const prev = data.lines[idx - 1];
        const prevLen = charLength(prev.text);
        prev.text += line.text;
        data.lines.splice(idx, 1);
        return { focusLineIndex: idx - 1, cursorCol: prevLen };
    }, true);
}

function splitLine(state: SessionState, config: EditorConfig): SessionState {
    const idx = textLine(state);
    if (idx === null) return state;

    return editLine(state, idx, (line, data) => {
        const col = Math.min(state.cursorCol, charLength(line.text));
        const right = sliceChars(line.text, col);
        line.text = sliceChars(line.text, 0, col);

        // The new line follows on from the old end with a placeholder duration
        const created = createLine(right, line.end, line.end + config.splitLineDuration);
        data.lines.splice(idx + 1, 0, created);
        return { focusLineIndex: idx + 1, cursorCol: 0 };
    }, true);
}

function undo(state: SessionState): SessionState {
    const restored = undoSnapshot(state.history);
    if (!restored) return state;

    const { data, history } = restored;
    const len = data.lines.length;

    // Keep indices valid against the restored lines
    let focusLineIndex = state.focusLineIndex;
    if (focusLineIndex !== null && focusLineIndex >= len) {
        focusLineIndex = len > 0 ? len - 1 : null;
    }
    const focusLine = focusLineIndex !== null ? data.lines[focusLineIndex] : undefined;
    const cursorCol = focusLine ? Math.min(state.cursorCol, charLength(focusLine.text)) : 0;
    const activeKeyframeIndex = focusLine && state.activeKeyframeIndex !== null
        && state.activeKeyframeIndex < focusLine.keyframes.length
        ? state.activeKeyframeIndex
        : null;

    return {
        ...state,
        data,
        history,
        focusLineIndex,
        cursorCol,
        activeKeyframeIndex,
        scrollOffset: len > 0 ? Math.min(state.scrollOffset, len - 1) : 0,
    };
}
