import { describe, it, expect } from 'vitest';
import { charLength, sliceChars, insertAt, removeAt, clamp } from './TextMetrics';

describe('TextMetrics', () => {
    it('should count characters rather than code units', () => {
        expect(charLength('stars')).toBe(5);
        expect(charLength('héllo')).toBe(5);
        expect(charLength('a😀b')).toBe(3);
        expect(charLength('')).toBe(0);
    });

    it('should slice by character', () => {
        expect(sliceChars('a😀bc', 0, 2)).toBe('a😀');
        expect(sliceChars('a😀bc', 2)).toBe('bc');
    });

    it('should insert and remove at character positions', () => {
        expect(insertAt('a😀c', 2, 'b')).toBe('a😀bc');
        expect(insertAt('abc', 3, 'd')).toBe('abcd');
        expect(removeAt('a😀c', 1)).toBe('ac');
        expect(removeAt('abc', 5)).toBe('abc');
        expect(removeAt('abc', -1)).toBe('abc');
    });

    it('should clamp values', () => {
        expect(clamp(5, 0, 3)).toBe(3);
        expect(clamp(-1, 0, 3)).toBe(0);
        expect(clamp(2, 0, 3)).toBe(2);
    });
});
