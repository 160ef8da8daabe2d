import { describe, it, expect } from 'vitest';
import {
    addKeyframe,
    addKeyframeAtPercent,
    addLine,
    cloneAnimation,
    createDemoAnimation,
    createLine,
    findClosestKeyframe,
    getCurrentIndex,
    lineDuration,
    relativeTime,
    sortKeyframes,
} from './Timeline';
import type { AnimationData } from './AnimationData';

describe('Timeline interpolation', () => {
    const demo = createDemoAnimation();
    const first = demo.lines[0];

    it('should build the demo lines', () => {
        expect(demo.lines).toHaveLength(2);
        expect(first.text).toBe('City of stars');
        expect(first.start).toBe(0);
        expect(first.end).toBe(3.42);
        expect(first.keyframes.map(k => k.time)).toEqual([0, 1.2, 3.42]);
        expect(demo.lines[1].start).toBeCloseTo(3.92, 6);
        expect(demo.lines[1].end).toBeCloseTo(11.032, 6);
    });

    it('should interpolate between keyframes', () => {
        expect(getCurrentIndex(first, 0)).toBe(0);
        expect(getCurrentIndex(first, 1.2)).toBeCloseTo(9.1, 6);
        expect(getCurrentIndex(first, 0.6)).toBeCloseTo(4.55, 6);
        expect(getCurrentIndex(first, 3.42)).toBeCloseTo(13, 6);
    });

    it('should measure times relative to the line', () => {
        const line = createLine('abc', 2, 5);

        expect(lineDuration(line)).toBe(3);
        expect(relativeTime(line, 3.5)).toBe(1.5);
        expect(relativeTime(line, 1)).toBe(-1);
    });

    it('should return 0 without keyframes', () => {
        expect(getCurrentIndex(createLine('abc', 0, 1), 0.5)).toBe(0);
    });

    it('should return the last index for unbracketed times', () => {
        const line = createLine('abcdefghij', 0, 4);
        addKeyframe(line, 1, 2);
        addKeyframe(line, 3, 8);

        // Before the first keyframe resolves to the last one as well
        expect(getCurrentIndex(line, 0.5)).toBe(8);
        expect(getCurrentIndex(line, 3.5)).toBe(8);
    });

    it('should not divide by a zero-length interval', () => {
        const line = createLine('abcd', 0, 2);
        addKeyframe(line, 1, 1);
        addKeyframe(line, 1, 3);

        expect(getCurrentIndex(line, 1)).toBe(1);
    });

    it('should be non-decreasing for monotone keyframes', () => {
        let previous = -Infinity;
        for (let t = 0; t <= 3.42; t += 0.01) {
            const value = getCurrentIndex(first, t);
            expect(value).toBeGreaterThanOrEqual(previous);
            previous = value;
        }
    });
});

describe('Timeline mutation helpers', () => {
    it('should keep keyframes sorted when adding', () => {
        const line = createLine('hello', 0, 2);
        addKeyframe(line, 1.5, 4);
        addKeyframe(line, 0.2, 1);
        addKeyframe(line, 0.9, 2);

        expect(line.keyframes.map(k => k.time)).toEqual([0.2, 0.9, 1.5]);
    });

    it('should sort stably on equal times', () => {
        const line = createLine('hello', 0, 2);
        line.keyframes = [
            { time: 1, index: 3 },
            { time: 0, index: 0 },
            { time: 1, index: 1 },
        ];
        sortKeyframes(line);

        expect(line.keyframes).toEqual([
            { time: 0, index: 0 },
            { time: 1, index: 3 },
            { time: 1, index: 1 },
        ]);
    });

    it('should add keyframes by percentage of the character length', () => {
        const line = createLine('héllo', 0, 1);
        addKeyframeAtPercent(line, 0.5, 0.4);

        expect(line.keyframes).toEqual([{ time: 0.5, index: 2 }]);
    });

    it('should find the closest keyframe with ties going to the first', () => {
        const line = createLine('hello', 0, 2);
        addKeyframe(line, 0, 0);
        addKeyframe(line, 1, 2);
        addKeyframe(line, 2, 5);

        expect(findClosestKeyframe(line, 0.4)).toBe(0);
        expect(findClosestKeyframe(line, 0.5)).toBe(0);
        expect(findClosestKeyframe(line, 1.6)).toBe(2);
        expect(findClosestKeyframe(createLine('x', 0, 1), 0)).toBeNull();
    });

    it('should append lines', () => {
        const data: AnimationData = { lines: [] };
        const line = addLine(data, 'one', 1, 2);

        expect(data.lines).toEqual([{ text: 'one', start: 1, end: 2, keyframes: [] }]);
        expect(line).toBe(data.lines[0]);
    });

    it('should clone deeply', () => {
        const data = createDemoAnimation();
        const copy = cloneAnimation(data);
        copy.lines[0].keyframes[0].index = 5;
        copy.lines[0].text = 'changed';

        expect(data.lines[0].keyframes[0].index).toBe(0);
        expect(data.lines[0].text).toBe('City of stars');
        expect(cloneAnimation(data)).toEqual(data);
    });
});
