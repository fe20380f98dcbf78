import { describe, it, expect } from 'vitest';
import { applyReplacements, parseReplacementJson, parseReplacementNote } from '../src/processors/replacements.js';

describe('Replacement Tests', () => {
    describe('applyReplacements', () => {
        it('should replace whole words only', () => {
            const map = { Mehady: 'Mehdi' };

            expect(applyReplacements('ask Mehady', map)).toBe('ask Mehdi');
            expect(applyReplacements('Mehadystuff', map)).toBe('Mehadystuff');
        });

        it('should replace every occurrence', () => {
            expect(applyReplacements('teh cat sat on teh mat', { teh: 'the' })).toBe('the cat sat on the mat');
        });

        it('should be case-sensitive', () => {
            expect(applyReplacements('Teh end', { teh: 'the' })).toBe('Teh end');
        });

        it('should prefer the longer key', () => {
            const map = { 'new york': 'New York', new: 'NEW' };

            expect(applyReplacements('new york is new', map)).toBe('New York is NEW');
        });

        it('should treat accented letters as word characters', () => {
            expect(applyReplacements('café cafe', { caf: 'X' })).toBe('café cafe');
        });

        it('should escape regex characters in keys', () => {
            expect(applyReplacements('call a.b now', { 'a.b': 'Alice Bob' })).toBe('call Alice Bob now');
            expect(applyReplacements('call axb now', { 'a.b': 'Alice Bob' })).toBe('call axb now');
        });

        it('should return the text unchanged for an empty map', () => {
            expect(applyReplacements('anything', {})).toBe('anything');
        });
    });

    describe('parseReplacementNote', () => {
        it('should parse arrow pairs and skip comments', () => {
            const content = [
                '# NoteBridge Replacements - work',
                '',
                '# teh -> the',
                '- teh -> the',
                '1. recieve -> receive',
                'no arrow here',
                ' -> empty',
            ].join('\n');

            expect(parseReplacementNote(content)).toEqual({ teh: 'the', recieve: 'receive' });
        });

        it('should handle CRLF line endings', () => {
            expect(parseReplacementNote('Mehady -> Mehdi\r\nfoo -> bar\r\n')).toEqual({ Mehady: 'Mehdi', foo: 'bar' });
        });
    });

    describe('parseReplacementJson', () => {
        it('should skip underscore keys and non-string values', () => {
            const map = parseReplacementJson({ _comment: 'ignored', teh: 'the', count: 5 });

            expect(map).toEqual({ teh: 'the' });
        });

        it('should reject a non-object', () => {
            expect(() => parseReplacementJson(['teh', 'the'])).toThrow();
        });
    });
});
