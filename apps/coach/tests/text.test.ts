import { describe, expect, it } from '@jest/globals';
import { ConfigError } from '../src/lib/errors';
import { countWords, estimateDuration, normalize, tokenize } from '../src/lib/text';

describe('normalize', () => {
    it('removes punctuation and lowercases', () => {
        expect(normalize('Hello, World!')).toBe('hello world');
        expect(normalize("I'm good, thank you!")).toBe('im good thank you');
    });

    it('returns an empty string for punctuation-only input', () => {
        expect(normalize('')).toBe('');
        expect(normalize('...!?')).toBe('');
    });

    it('strips typographic quotes and symbols too', () => {
        expect(normalize('“Ship it” — $5 + tax')).toBe('ship it  5  tax');
    });

    it('is idempotent', () => {
        const samples = ['Good Morning, Team!', "We're on-track; no blockers.", '  spaced   out  ', 'ÀÉÎ (test)'];
        for (const sample of samples) {
            expect(normalize(normalize(sample))).toBe(normalize(sample));
        }
    });
});

describe('tokenize', () => {
    it('splits normalized text on any whitespace', () => {
        expect(tokenize('  Good\tmorning,\n team! ')).toEqual(['good', 'morning', 'team']);
    });

    it('returns no tokens for empty input', () => {
        expect(tokenize('?!')).toEqual([]);
    });
});

describe('estimateDuration', () => {
    it('divides word count by speaking rate and rounds to hundredths', () => {
        expect(estimateDuration('one two three four five six seven', 3, 1)).toBe(2.33);
        expect(estimateDuration('one two three four five six seven eight nine ten', 2, 1)).toBe(5);
    });

    it('never returns less than the minimum duration', () => {
        expect(estimateDuration('good morning team', 2.5, 3)).toBe(3);
        expect(estimateDuration('', 2, 1.5)).toBe(1.5);
        for (const text of ['', 'one', 'one two three four']) {
            expect(estimateDuration(text, 10, 0.75)).toBeGreaterThanOrEqual(0.75);
        }
    });

    it('rejects a non-positive speaking rate', () => {
        expect(() => estimateDuration('hello', 0, 1)).toThrow(ConfigError);
        expect(() => estimateDuration('hello', -2, 1)).toThrow(ConfigError);
    });

    it('counts raw words, punctuation included', () => {
        expect(countWords("Yes - I'm done.")).toBe(4);
    });
});
