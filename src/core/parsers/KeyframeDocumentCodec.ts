import type { AnimationCodec, DecodeResult } from "../interfaces/AnimationCodec";
import type { AnimationData, Keyframe, LyricLine } from "../models/AnimationData";
import { createLine, sortKeyframes } from "../models/Timeline";
import { DocumentFormatError } from "../errors";
import { charLength } from "../utils/TextMetrics";
import { Logger } from "../utils/Logger";

export const DATA_SECTION_SPLIT_MARKER = "[//]";
export const LINE_BY_LINE_TIMESTAMP_MARKER = "[lbl]";
export const LINE_SYLLABLE_KEYFRAME_MARKER = "[lsk]";

/**
 * Reads and writes the line-oriented keyframe document:
 *
 * ```
 * City of stars
 *
 * [chorus]
 * You never shined so brightly
 * [//]
 * [lbl][0.000/3.420,3.920/11.032]
 * [lsk][(0.000/0.000,1.200/0.700),(0.000/0.000,7.000/1.000)]
 * ```
 *
 * Keyframe positions are stored as a fraction of the line's length, so a
 * decoded index only matches the encoded one while the text keeps its length.
 */
export class KeyframeDocumentCodec implements AnimationCodec {
    // Control characters plus the characters the grammar reserves
    private static RESERVED_REGEX = /[\p{Cc}\/\[\]]/gu;
    private static DECIMAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
    private static GROUP_SPLIT = "),(";

    public encode(data: AnimationData): string {
        const lineStrings: string[] = [];
        const linesTimestamp: string[] = [];
        const linesKeyframes: string[] = [];

        for (const line of data.lines) {
            const sanitized = KeyframeDocumentCodec.sanitize(line.text);
            if (line.part !== undefined) {
                lineStrings.push(`\n[${line.part}]\n${sanitized}`);
            } else {
                lineStrings.push(sanitized);
            }

            linesTimestamp.push(`${formatNumber(line.start)}/${formatNumber(line.end)}`);

            const lineLen = charLength(line.text);
            const kfs = line.keyframes.map(kf => {
                const pct = lineLen > 0 ? kf.index / lineLen : 0;
                return `${formatNumber(kf.time)}/${formatNumber(pct)}`;
            });
            linesKeyframes.push(`(${kfs.join(",")})`);
        }

        return `${lineStrings.join("\n")}\n${DATA_SECTION_SPLIT_MARKER}\n`
            + `${LINE_BY_LINE_TIMESTAMP_MARKER}[${linesTimestamp.join(",")}]\n`
            + `${LINE_SYLLABLE_KEYFRAME_MARKER}[${linesKeyframes.join(",")}]`;
    }

    public decode(document: string): AnimationData {
        const sections = document.split(DATA_SECTION_SPLIT_MARKER);
        if (sections.length < 2) {
            throw new DocumentFormatError('MISSING_SEPARATOR', `Missing ${DATA_SECTION_SPLIT_MARKER} separator`);
        }

        const lines = this.parseText(sections[0].trim());
        const dataSection = sections[1].trim();

        const lblRaw = KeyframeDocumentCodec.extractBlock(dataSection, LINE_BY_LINE_TIMESTAMP_MARKER);
        const lskRaw = KeyframeDocumentCodec.extractBlock(dataSection, LINE_SYLLABLE_KEYFRAME_MARKER);

        // Only a document without lines reads an empty block as zero entries;
        // otherwise `[]` is a single empty entry that leaves start and end at 0
        const tsPairs = lblRaw === "" && lines.length === 0 ? [] : lblRaw.split(",");
        if (tsPairs.length !== lines.length) {
            throw new DocumentFormatError(
                'LINE_COUNT_MISMATCH',
                `Line count mismatch with timestamps (${lines.length} lines, ${tsPairs.length} timestamps)`
            );
        }

        tsPairs.forEach((pair, i) => {
            const parts = pair.split("/");
            if (parts.length === 2) {
                lines[i].start = parseDecimal(parts[0]);
                lines[i].end = parseDecimal(parts[1]);
            }
        });

        const kfGroups = lskRaw.split(KeyframeDocumentCodec.GROUP_SPLIT);
        kfGroups.slice(0, lines.length).forEach((group, i) => {
            const line = lines[i];
            const cleanGroup = group.replace(/^[()]+|[()]+$/g, "");
            const lineLen = charLength(line.text);

            for (const entry of cleanGroup.split(",")) {
                const keyframe = parseKeyframe(entry, lineLen);
                if (keyframe) {
                    line.keyframes.push(keyframe);
                }
            }
            sortKeyframes(line);
        });

        Logger.debug(`[KeyframeDocumentCodec] Decoded ${lines.length} lines`);
        return { lines };
    }

    private parseText(textSection: string): LyricLine[] {
        const lines: LyricLine[] = [];
        let currentPart: string | undefined;

        for (const rawLine of textSection.split(/\r?\n/)) {
            const trimmed = rawLine.trim();
            if (!trimmed) continue;

            if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
                currentPart = trimmed.slice(1, -1);
            } else {
                lines.push(createLine(trimmed, 0, 0, currentPart));
            }
        }

        return lines;
    }

    /**
     * Text enclosed by the first bracket pair after `marker`.
     * Brackets do not nest: the first `]` closes the block.
     */
    private static extractBlock(section: string, marker: string): string {
        const markerAt = section.indexOf(marker);
        if (markerAt === -1) {
            throw new DocumentFormatError('MISSING_MARKER', `Missing ${marker}`);
        }

        const open = section.indexOf("[", markerAt + marker.length);
        if (open === -1) {
            throw new DocumentFormatError('MISSING_BRACKET', `Missing [ after ${marker}`);
        }

        const close = section.indexOf("]", open);
        if (close === -1) {
            throw new DocumentFormatError('MISSING_BRACKET', `Missing ] after ${marker}`);
        }

        return section.substring(open + 1, close);
    }

    public static sanitize(text: string): string {
        return text.replace(KeyframeDocumentCodec.RESERVED_REGEX, "");
    }

    /**
     * Parses a plain decimal number. Anything else reads as 0.
     */
    public static parseDecimal(raw: string): number {
        if (!KeyframeDocumentCodec.DECIMAL_REGEX.test(raw)) return 0;
        const value = parseFloat(raw);
        return Number.isFinite(value) ? value : 0;
    }
}

const parseDecimal = KeyframeDocumentCodec.parseDecimal;

/**
 * Three decimals, with exact halves rounded to even (`0.0625` -> `0.062`).
 * `toFixed` alone rounds those halves up.
 */
function formatNumber(value: number): string {
    const thousandths = value * 1000;
    const floor = Math.floor(thousandths);
    // Only odd multiples of 1/16 land exactly on a half thousandth
    if (thousandths - floor === 0.5 && Number.isInteger(value * 16)) {
        const even = floor % 2 === 0 ? floor : floor + 1;
        return (even / 1000).toFixed(3);
    }
    return value.toFixed(3);
}

/**
 * `time/pct` entry; entries without a `/` carry no keyframe.
 */
function parseKeyframe(entry: string, lineLen: number): Keyframe | null {
    const slash = entry.indexOf("/");
    if (slash === -1) return null;

    const time = parseDecimal(entry.substring(0, slash));
    const pct = parseDecimal(entry.substring(slash + 1));
    return { time, index: pct * lineLen };
}

/**
 * Decodes without throwing; structural failures come back as the error.
 */
export function safeDecode(codec: AnimationCodec, document: string): DecodeResult {
    try {
        return { ok: true, data: codec.decode(document) };
    } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e));
        Logger.warn(`[KeyframeDocumentCodec] Rejected document: ${error.message}`);
        return { ok: false, error };
    }
}
