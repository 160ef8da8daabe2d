/**
 * Step sizes and limits used by the edit session.
 * All times are in seconds, positions in characters.
 */
export interface EditorConfig {
    /** Playhead step for seek commands */
    seekStep: number;

    /** Keyframe time change per adjust command in Time mode */
    timeNudge: number;

    /** Keyframe index change per adjust command in Progress mode */
    progressNudge: number;

    /** Shortest line the boundary keyframe can shrink to */
    minLineDuration: number;

    /** Keyframes closer than this to the playhead are skipped when jumping */
    jumpEpsilon: number;

    /** Duration given to the line created by a split */
    splitLineDuration: number;

    /** Characters ahead of the highlight that still glow */
    glowWidth: number;

    /** Keyframes within this distance of the playhead are shown as current */
    keyframeNearWindow: number;
}

export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = Object.freeze({
    seekStep: 0.5,
    timeNudge: 0.05,
    progressNudge: 0.5,
    minLineDuration: 0.01,
    jumpEpsilon: 0.01,
    splitLineDuration: 2.0,
    glowWidth: 2.5,
    keyframeNearWindow: 0.1,
});

export function resolveEditorConfig(overrides?: Partial<EditorConfig>): EditorConfig {
    return { ...DEFAULT_EDITOR_CONFIG, ...overrides };
}
