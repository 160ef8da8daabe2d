import type { AnimationData } from "../models/AnimationData";
import { cloneAnimation } from "../models/Timeline";

/**
 * Linear undo stack of full model copies.
 * `index` points one past the most recent snapshot that undo would restore.
 */
export interface UndoHistory {
    readonly snapshots: readonly AnimationData[];
    readonly index: number;
}

export const EMPTY_HISTORY: UndoHistory = { snapshots: [], index: 0 };

/**
 * Stores a copy of `data`, dropping any snapshots after the cursor first.
 */
export function pushSnapshot(history: UndoHistory, data: AnimationData): UndoHistory {
    const kept = history.snapshots.slice(0, history.index);
    return {
        snapshots: [...kept, cloneAnimation(data)],
        index: kept.length + 1,
    };
}

export function canUndo(history: UndoHistory): boolean {
    return history.index > 0 && history.index <= history.snapshots.length;
}

/**
 * Steps back one snapshot. The returned data is a fresh copy, so later edits
 * never reach the stored snapshot.
 */
export function undoSnapshot(history: UndoHistory): { history: UndoHistory; data: AnimationData } | null {
    if (!canUndo(history)) return null;

    const index = history.index - 1;
    return {
        history: { snapshots: history.snapshots, index },
        data: cloneAnimation(history.snapshots[index]),
    };
}
