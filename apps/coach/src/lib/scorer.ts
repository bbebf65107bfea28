/**
 * Pronunciation Scorer
 *
 * Compares what was transcribed with what the user was asked to say, word by word.
 *
 * - positional: pairs token i with token i, up to the shorter sequence. A single
 *   inserted or dropped word shifts every later comparison.
 * - aligned: minimal edit script over tokens (Levenshtein), reporting
 *   substitutions, insertions and deletions.
 */

import type {
    AnnotatedToken,
    Mismatch,
    ScoreResult,
    ScoringMode,
    TokenStatus,
    TurnVerdict,
} from '@standup-coach/shared';
import { tokenize } from './text.js';

export type TokenStyles = Record<TokenStatus, (text: string) => string>;

type EditOperation =
    | { type: 'match'; spoken: string; expected: string }
    | { type: 'substitution'; spoken: string; expected: string }
    | { type: 'insertion'; spoken: string }
    | { type: 'deletion'; expected: string };

export function score(transcribed: string, expected: string, mode: ScoringMode = 'positional'): ScoreResult {
    return mode === 'aligned'
        ? scoreAligned(transcribed, expected)
        : scorePositional(transcribed, expected);
}

export function scorePositional(transcribed: string, expected: string): ScoreResult {
    const spokenWords = tokenize(transcribed);
    const expectedWords = tokenize(expected);
    const compared = Math.min(spokenWords.length, expectedWords.length);

    const mismatches: Mismatch[] = [];
    const tokens: AnnotatedToken[] = [];

    for (let i = 0; i < compared; i++) {
        const spoken = spokenWords[i];
        const wanted = expectedWords[i];
        if (spoken === wanted) {
            tokens.push({ text: spoken, status: 'match' });
        } else {
            mismatches.push({ kind: 'substitution', spoken, expected: wanted });
            tokens.push({ text: spoken, status: 'mismatch' });
        }
    }

    return buildResult('positional', mismatches, tokens, compared);
}

export function scoreAligned(transcribed: string, expected: string): ScoreResult {
    const operations = alignTokens(tokenize(transcribed), tokenize(expected));

    const mismatches: Mismatch[] = [];
    const tokens: AnnotatedToken[] = [];

    for (const op of operations) {
        switch (op.type) {
            case 'match':
                tokens.push({ text: op.spoken, status: 'match' });
                break;
            case 'substitution':
                mismatches.push({ kind: 'substitution', spoken: op.spoken, expected: op.expected });
                tokens.push({ text: op.spoken, status: 'mismatch' });
                break;
            case 'insertion':
                mismatches.push({ kind: 'insertion', spoken: op.spoken, expected: null });
                tokens.push({ text: op.spoken, status: 'mismatch' });
                break;
            case 'deletion':
                mismatches.push({ kind: 'deletion', spoken: null, expected: op.expected });
                break;
        }
    }

    return buildResult('aligned', mismatches, tokens, operations.length);
}

/**
 * Edit script turning `expected` into `spoken`, in reading order.
 * Ties are broken towards diagonal moves, then insertions, then deletions.
 */
function alignTokens(spoken: string[], expected: string[]): EditOperation[] {
    const rows = spoken.length;
    const cols = expected.length;

    // distance[i][j]: edits between spoken[0..i) and expected[0..j)
    const distance: number[][] = Array.from({ length: rows + 1 }, (_, i) =>
        Array.from({ length: cols + 1 }, (_, j) => (i === 0 ? j : j === 0 ? i : 0))
    );

    for (let i = 1; i <= rows; i++) {
        for (let j = 1; j <= cols; j++) {
            const cost = spoken[i - 1] === expected[j - 1] ? 0 : 1;
            distance[i][j] = Math.min(
                distance[i - 1][j - 1] + cost,
                distance[i - 1][j] + 1,
                distance[i][j - 1] + 1
            );
        }
    }

    const operations: EditOperation[] = [];
    let i = rows;
    let j = cols;

    while (i > 0 || j > 0) {
        if (i > 0 && j > 0) {
            const same = spoken[i - 1] === expected[j - 1];
            if (distance[i][j] === distance[i - 1][j - 1] + (same ? 0 : 1)) {
                operations.push(same
                    ? { type: 'match', spoken: spoken[i - 1], expected: expected[j - 1] }
                    : { type: 'substitution', spoken: spoken[i - 1], expected: expected[j - 1] });
                i--;
                j--;
                continue;
            }
        }
        if (i > 0 && distance[i][j] === distance[i - 1][j] + 1) {
            operations.push({ type: 'insertion', spoken: spoken[i - 1] });
            i--;
        } else {
            operations.push({ type: 'deletion', expected: expected[j - 1] });
            j--;
        }
    }

    return operations.reverse();
}

function buildResult(
    mode: ScoringMode,
    mismatches: Mismatch[],
    tokens: AnnotatedToken[],
    comparedPositions: number
): ScoreResult {
    return {
        mode,
        mismatches,
        tokens,
        annotatedText: tokens.map(token => token.text).join(' '),
        comparedPositions,
    };
}

/**
 * Nothing spoken (or nothing compared) is reported separately from a clean run,
 * since an empty comparison also has no mismatches.
 */
export function verdictFor(result: ScoreResult): TurnVerdict {
    if (result.comparedPositions === 0 || result.tokens.length === 0) {
        return 'no-speech';
    }
    return result.mismatches.length === 0 ? 'perfect' : 'needs-practice';
}

export function renderAnnotated(tokens: AnnotatedToken[], styles: TokenStyles): string {
    return tokens.map(token => styles[token.status](token.text)).join(' ');
}

export function describeMismatch(mismatch: Mismatch): string {
    switch (mismatch.kind) {
        case 'substitution':
            return `said "${mismatch.spoken}" instead of "${mismatch.expected}"`;
        case 'insertion':
            return `extra word "${mismatch.spoken}"`;
        case 'deletion':
            return `missed "${mismatch.expected}"`;
    }
}
