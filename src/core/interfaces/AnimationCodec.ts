import type { AnimationData } from "../models/AnimationData";

/**
 * Interface for text serialization strategies of the timing model.
 * Design Pattern: Strategy Pattern.
 */
export interface AnimationCodec {
    /**
     * Serializes the model into a document.
     */
    encode(data: AnimationData): string;

    /**
     * Parses a document back into the model.
     * @throws DocumentFormatError when the document structure is invalid.
     */
    decode(document: string): AnimationData;
}

export type DecodeResult =
    | { ok: true; data: AnimationData }
    | { ok: false; error: Error };
