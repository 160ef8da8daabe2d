import { describe, it, expect } from 'vitest';
import { KeyframeDocumentCodec, safeDecode } from './KeyframeDocumentCodec';
import { createDemoAnimation, createLine, addKeyframe } from '../models/Timeline';
import type { AnimationData } from '../models/AnimationData';
import type { DecodeResult } from '../interfaces/AnimationCodec';
import { DocumentFormatError } from '../errors';

function failureReason(result: DecodeResult): string | null {
    if (result.ok) return null;
    return result.error instanceof DocumentFormatError ? result.error.reason : result.error.message;
}

describe('KeyframeDocumentCodec', () => {
    const codec = new KeyframeDocumentCodec();

    it('should encode the demo document exactly', () => {
        const doc = codec.encode(createDemoAnimation());

        expect(doc).toBe(
            'City of stars\n' +
            'You never shined so brightly\n' +
            '[//]\n' +
            '[lbl][0.000/3.420,3.920/11.032]\n' +
            '[lsk][(0.000/0.000,1.200/0.700,3.420/1.000),(0.000/0.000,0.400/0.200,5.400/0.900,7.000/1.000)]'
        );
    });

    it('should emit part headers preceded by a blank line', () => {
        const data: AnimationData = {
            lines: [
                createLine('Intro', 0, 1),
                createLine('Hello', 1, 2, 'chorus'),
            ]
        };

        expect(codec.encode(data)).toBe(
            'Intro\n\n[chorus]\nHello\n[//]\n[lbl][0.000/1.000,1.000/2.000]\n[lsk][(),()]'
        );
    });

    it('should strip reserved and control characters from text', () => {
        const data: AnimationData = { lines: [createLine('a/b[c]\td', 0, 1)] };
        const doc = codec.encode(data);

        expect(doc.split('\n')[0]).toBe('abcd');
    });

    it('should round trip the demo', () => {
        const original = createDemoAnimation();
        const decoded = codec.decode(codec.encode(original));

        expect(decoded.lines).toHaveLength(2);
        decoded.lines.forEach((line, i) => {
            const src = original.lines[i];
            expect(line.text).toBe(src.text);
            expect(line.part).toBeUndefined();
            expect(line.start).toBeCloseTo(src.start, 3);
            expect(line.end).toBeCloseTo(src.end, 3);
            expect(line.keyframes).toHaveLength(src.keyframes.length);
            line.keyframes.forEach((kf, k) => {
                expect(kf.time).toBeCloseTo(src.keyframes[k].time, 3);
                expect(kf.index).toBeCloseTo(src.keyframes[k].index, 1);
            });
        });
    });

    it('should keep section labels sticky until changed', () => {
        const doc = `Intro line

[verse]
First
Second
[chorus]
Third
[//]
[lbl][0.000/1.000,1.000/2.000,2.000/3.000,3.000/4.000]
[lsk][(),(),(),()]`;
        const data = codec.decode(doc);

        expect(data.lines.map(l => l.part)).toEqual([undefined, 'verse', 'verse', 'chorus']);
        expect(data.lines.map(l => l.text)).toEqual(['Intro line', 'First', 'Second', 'Third']);
        expect(data.lines[3].start).toBe(3);
        expect(data.lines[3].end).toBe(4);
        expect(data.lines[0].keyframes).toEqual([]);
    });

    it('should scale percentages by the decoded text length and sort keyframes', () => {
        const doc = `abcd
[//]
[lbl][1.000/2.000]
[lsk][(0.800/1.000,0.000/0.000,0.400/0.500)]`;
        const line = codec.decode(doc).lines[0];

        expect(line.keyframes).toEqual([
            { time: 0, index: 0 },
            { time: 0.4, index: 2 },
            { time: 0.8, index: 4 },
        ]);
    });

    it('should default unparsable numbers to zero', () => {
        const doc = `abcd
[//]
[lbl][oops/2.500]
[lsk][(x/0.500,1.000/y)]`;
        const line = codec.decode(doc).lines[0];

        expect(line.start).toBe(0);
        expect(line.end).toBe(2.5);
        expect(line.keyframes).toEqual([
            { time: 0, index: 2 },
            { time: 1, index: 0 },
        ]);
    });

    it('should ignore keyframe groups beyond the line count', () => {
        const doc = `one
[//]
[lbl][0.000/1.000]
[lsk][(0.000/0.000),(0.500/1.000)]`;
        const data = codec.decode(doc);

        expect(data.lines).toHaveLength(1);
        expect(data.lines[0].keyframes).toEqual([{ time: 0, index: 0 }]);
    });

    it('should round trip an empty document', () => {
        const doc = codec.encode({ lines: [] });

        expect(doc).toBe('\n[//]\n[lbl][]\n[lsk][]');
        expect(codec.decode(doc)).toEqual({ lines: [] });
    });

    it('should read empty blocks as one blank entry for a single line', () => {
        const result = safeDecode(codec, 'Hello\n[//]\n[lbl][]\n[lsk][]');

        expect(result).toEqual({
            ok: true,
            data: { lines: [{ text: 'Hello', start: 0, end: 0, keyframes: [] }] },
        });
    });

    it('should still reject empty blocks for several lines', () => {
        const result = safeDecode(codec, 'one\ntwo\n[//]\n[lbl][]\n[lsk][]');
        expect(failureReason(result)).toBe('LINE_COUNT_MISMATCH');
    });

    it('should measure percentages in code points', () => {
        const data: AnimationData = { lines: [createLine('a😀b', 0, 1)] };
        addKeyframe(data.lines[0], 0.5, 3);

        const doc = codec.encode(data);
        expect(doc.split('\n')[3]).toBe('[lsk][(0.500/1.000)]');
        expect(codec.decode(doc).lines[0].keyframes).toEqual([{ time: 0.5, index: 3 }]);
    });

    it('should round exact halves to even', () => {
        const data: AnimationData = { lines: [createLine('abcdefgh', 0.0625, 0.1875)] };
        addKeyframe(data.lines[0], 0.0625, 0.5);
        addKeyframe(data.lines[0], 0.125, 1.5);

        const [, , lbl, lsk] = codec.encode(data).split('\n');
        expect(lbl).toBe('[lbl][0.062/0.188]');
        expect(lsk).toBe('[lsk][(0.062/0.062,0.125/0.188)]');
    });

    it('should fail when the separator is missing', () => {
        expect(() => codec.decode('City of stars\n[lbl][0.000/1.000]\n[lsk][()]')).toThrowError(
            'Format error: Missing [//] separator'
        );
        expect(failureReason(safeDecode(codec, 'no separator here'))).toBe('MISSING_SEPARATOR');
    });

    it('should fail when timestamps do not match the line count', () => {
        const doc = `one
two
[//]
[lbl][0.000/1.000]
[lsk][(),()]`;

        expect(failureReason(safeDecode(codec, doc))).toBe('LINE_COUNT_MISMATCH');
        expect(() => codec.decode(doc)).toThrowError(DocumentFormatError);
    });

    it('should fail on missing markers and brackets', () => {
        const missingMarker = safeDecode(codec, 'one\n[//]\n[lbl][0.000/1.000]');
        const missingOpen = safeDecode(codec, 'one\n[//]\n[lbl][0.000/1.000]\n[lsk]');
        const missingClose = safeDecode(codec, 'one\n[//]\n[lbl][0.000/1.000\n[lsk][()');

        expect(failureReason(missingMarker)).toBe('MISSING_MARKER');
        expect(failureReason(missingOpen)).toBe('MISSING_BRACKET');
        expect(failureReason(missingClose)).toBe('MISSING_BRACKET');
    });

    it('should return decoded data from safeDecode', () => {
        const data: AnimationData = { lines: [createLine('Hi', 0, 1)] };
        addKeyframe(data.lines[0], 0.5, 1);

        const result = safeDecode(codec, codec.encode(data));
        expect(result).toEqual({ ok: true, data });
    });
});
