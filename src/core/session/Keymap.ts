import type { SessionCommand } from "./Commands";
import type { ViewMode } from "./SessionState";
import { charLength } from "../utils/TextMetrics";

/**
 * A key event as produced by the host. `key` uses `KeyboardEvent.key` names.
 */
export interface KeyInput {
    key: string;
    ctrl?: boolean;
    alt?: boolean;
    meta?: boolean;
    kind?: 'press' | 'repeat' | 'release';
}

const CONTROL_KEYS = new Map<string, SessionCommand>([
    ['q', { type: 'quit' }],
    [' ', { type: 'togglePlay' }],
    ['e', { type: 'enterTextEdit' }],
    ['s', { type: 'export' }],
    ['Escape', { type: 'escape' }],
    ['ArrowLeft', { type: 'seek', direction: -1 }],
    ['ArrowRight', { type: 'seek', direction: 1 }],
    ['PageUp', { type: 'pageList', direction: -1 }],
    ['PageDown', { type: 'pageList', direction: 1 }],
    ['n', { type: 'stepLine', direction: 1 }],
    ['p', { type: 'stepLine', direction: -1 }],
    ['t', { type: 'toggleEditMode' }],
    ['f', { type: 'addKeyframe' }],
    ['g', { type: 'removeKeyframe' }],
    ['Delete', { type: 'removeKeyframe' }],
    ['ArrowUp', { type: 'adjustKeyframe', direction: 1 }],
    ['ArrowDown', { type: 'adjustKeyframe', direction: -1 }],
    ['k', { type: 'jumpKeyframe', direction: 1 }],
    ['j', { type: 'jumpKeyframe', direction: -1 }],
]);

const TEXT_EDIT_KEYS = new Map<string, SessionCommand>([
    ['Escape', { type: 'escape' }],
    ['ArrowLeft', { type: 'moveCursor', direction: -1 }],
    ['ArrowRight', { type: 'moveCursor', direction: 1 }],
    ['ArrowUp', { type: 'navigateLine', direction: -1 }],
    ['ArrowDown', { type: 'navigateLine', direction: 1 }],
    ['Backspace', { type: 'backspace' }],
    ['Enter', { type: 'splitLine' }],
]);

/**
 * Translates a key event into a command for the given mode.
 * Returns null for releases and unbound keys. Whether the mode accepts the
 * command is decided by the session dispatch table.
 */
export function resolveKey(mode: ViewMode, input: KeyInput): SessionCommand | null {
    if (input.kind === 'release') return null;

    // Ctrl+Z, or Cmd+Z on macOS
    if ((input.ctrl || input.meta) && input.key.toLowerCase() === 'z') {
        return { type: 'undo' };
    }

    if (mode !== 'textEdit') {
        return CONTROL_KEYS.get(input.key) ?? null;
    }

    if (input.alt && (input.key === 'ArrowUp' || input.key === 'ArrowDown')) {
        return { type: 'moveLine', direction: input.key === 'ArrowUp' ? -1 : 1 };
    }

    const bound = TEXT_EDIT_KEYS.get(input.key);
    if (bound) return bound;

    // Printable characters only; named keys like "Shift" are longer than one character
    if (charLength(input.key) === 1 && !input.ctrl && !input.meta && !/\p{Cc}/u.test(input.key)) {
        return { type: 'insertText', text: input.key };
    }

    return null;
}
