export type Direction = 1 | -1;

/**
 * Discrete user commands. Key events are translated into these by the keymap;
 * which of them a mode accepts is listed in the session dispatch table.
 */
export type SessionCommand =
    | { type: 'togglePlay' }
    | { type: 'seek'; direction: Direction }
    | { type: 'enterTextEdit' }
    | { type: 'escape' }
    | { type: 'stepLine'; direction: Direction }
    | { type: 'pageList'; direction: Direction }
    | { type: 'toggleEditMode' }
    | { type: 'addKeyframe' }
    | { type: 'removeKeyframe' }
    | { type: 'adjustKeyframe'; direction: Direction }
    | { type: 'jumpKeyframe'; direction: Direction }
    | { type: 'moveCursor'; direction: Direction }
    | { type: 'navigateLine'; direction: Direction }
    | { type: 'moveLine'; direction: Direction }
    | { type: 'insertText'; text: string }
    | { type: 'backspace' }
    | { type: 'splitLine' }
    | { type: 'undo' }
    | { type: 'export' }
    | { type: 'quit' };

export type SessionCommandType = SessionCommand['type'];
