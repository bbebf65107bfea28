import { ConfigError } from './errors.js';

const PUNCTUATION = /[\p{P}\p{S}]/gu;

/**
 * Strip punctuation and symbols, then lowercase. Whitespace is left as-is.
 */
export function normalize(text: string): string {
    return text.replace(PUNCTUATION, '').toLowerCase();
}

export function tokenize(text: string): string[] {
    return normalize(text).split(/\s+/).filter(token => token.length > 0);
}

export function countWords(text: string): number {
    return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Recording length for an expected line: word count over speaking rate,
 * rounded to hundredths and never shorter than `minDuration`.
 */
export function estimateDuration(text: string, wordsPerSecond: number, minDuration: number): number {
    if (!Number.isFinite(wordsPerSecond) || wordsPerSecond <= 0) {
        throw new ConfigError('wordsPerSecond must be greater than 0', [`got ${wordsPerSecond}`]);
    }

    const seconds = Math.round((countWords(text) / wordsPerSecond) * 100) / 100;
    return Math.max(seconds, minDuration);
}
