import type { AnimationData } from "../models/AnimationData";
import { createDemoAnimation } from "../models/Timeline";
import type { AnimationCodec, DecodeResult } from "../interfaces/AnimationCodec";
import { KeyframeDocumentCodec, safeDecode } from "../parsers/KeyframeDocumentCodec";
import { resolveEditorConfig, type EditorConfig } from "../config/EditorConfig";
import type { SessionCommand } from "../session/Commands";
import { resolveKey, type KeyInput } from "../session/Keymap";
import { applyCommand, tick } from "../session/SessionReducer";
import { createSessionState, type SessionState } from "../session/SessionState";
import { Logger } from "../utils/Logger";

/**
 * What the host loop should do after a key event.
 */
export type SessionSignal = 'continue' | 'export' | 'quit';

export interface EditSessionOptions {
    /** Initial model. Defaults to the built-in demo. */
    data?: AnimationData;
    config?: Partial<EditorConfig>;
    /** Millisecond clock used to measure tick deltas */
    clock?: () => number;
    codec?: AnimationCodec;
}

type SessionListener = (state: SessionState) => void;

/**
 * Main facade for the host loop to interact with.
 * Owns the session value and replaces it on every command or tick.
 */
export class EditSession {
    private state: SessionState;
    private readonly config: EditorConfig;
    private readonly clock: () => number;
    private readonly codec: AnimationCodec;
    private lastTick: number;
    private listeners: SessionListener[] = [];

    constructor(options: EditSessionOptions = {}) {
        this.config = resolveEditorConfig(options.config);
        this.clock = options.clock ?? (() => performance.now());
        this.codec = options.codec ?? new KeyframeDocumentCodec();
        this.state = createSessionState(options.data ?? createDemoAnimation());
        this.lastTick = this.clock();
    }

    public getState(): SessionState {
        return this.state;
    }

    public getConfig(): EditorConfig {
        return this.config;
    }

    public subscribe(listener: SessionListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public dispatch(command: SessionCommand): SessionState {
        const previous = this.state;
        const next = applyCommand(previous, command, this.config);

        if (next.viewMode !== previous.viewMode) {
            Logger.debug(`[EditSession] Mode ${previous.viewMode} -> ${next.viewMode}`);
        }
        if (next.history !== previous.history) {
            Logger.debug(`[EditSession] Snapshot stored before ${command.type}`, { snapshots: next.history.index });
        }
        if (command.type === 'undo' && next !== previous) {
            Logger.info(`[EditSession] Undo restored ${next.data.lines.length} lines`);
        }

        this.setState(next);
        return next;
    }

    /**
     * Routes a key event through the keymap for the current mode.
     */
    public handleKey(input: KeyInput): SessionSignal {
        const command = resolveKey(this.state.viewMode, input);
        if (!command) return 'continue';

        this.dispatch(command);

        if (command.type === 'quit') return 'quit';
        if (command.type === 'export') return 'export';
        return 'continue';
    }

    /**
     * Advances the playhead by the wall-clock time since the previous update.
     * @param now Clock reading in milliseconds.
     */
    public update(now: number = this.clock()): SessionState {
        const elapsed = Math.max(0, now - this.lastTick) / 1000;
        this.lastTick = now;
        this.setState(tick(this.state, elapsed));
        return this.state;
    }

    /**
     * Serializes the current model.
     */
    public compile(): string {
        return this.codec.encode(this.state.data);
    }

    /**
     * Replaces the session with a decoded document. A rejected document
     * leaves the current session untouched.
     */
    public load(document: string): DecodeResult {
        const result = safeDecode(this.codec, document);
        if (result.ok) {
            Logger.info(`[EditSession] Loaded document with ${result.data.lines.length} lines`);
            this.setState(createSessionState(result.data));
        }
        return result;
    }

    private setState(next: SessionState) {
        if (next === this.state) return;
        this.state = next;
        this.listeners.forEach(l => l(next));
    }
}
