/**
 * Word Segmenter
 *
 * Cuts a recording into one WAV clip per transcribed word. Timings are resolved at
 * millisecond resolution. Offsets past either end of the recording are clamped;
 * words whose start falls after their end are not exported and come back as failures.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { PcmAudio, WordExport, WordTiming } from '@standup-coach/shared';
import { logger } from './metrics.js';
import { describeError, err, ok, stageError } from './result.js';
import { durationOf, encodeWav } from './wav.js';

export interface SegmentOptions {
    /**
     * Remove everything already in the output directory first. Defaults to true,
     * so clips from an earlier recording never survive.
     */
    clearExisting?: boolean;
}

export interface SampleRange {
    startSample: number;
    endSample: number;
    clamped: boolean;
}

export function wordFileName(index: number, word: string): string {
    const safeWord = word.trim().replace(/[/\\\0]/g, '_');
    return `word_${index}_${safeWord}.wav`;
}

function secondsToSample(seconds: number, sampleRate: number): number {
    const ms = Math.trunc(seconds * 1000);
    return Math.floor((ms * sampleRate) / 1000);
}

/**
 * Resolve a word timing to sample offsets inside the recording, or null when
 * the timing cannot describe a slice.
 */
export function resolveSampleRange(timing: WordTiming, audio: PcmAudio): SampleRange | null {
    if (!Number.isFinite(timing.start) || !Number.isFinite(timing.end)) {
        return null;
    }

    const total = audio.samples.length;
    const rawStart = secondsToSample(timing.start, audio.sampleRate);
    const rawEnd = secondsToSample(timing.end, audio.sampleRate);
    const startSample = Math.min(Math.max(rawStart, 0), total);
    const endSample = Math.min(Math.max(rawEnd, 0), total);

    if (startSample > endSample) {
        return null;
    }

    return {
        startSample,
        endSample,
        clamped: startSample !== rawStart || endSample !== rawEnd,
    };
}

async function resetDirectory(outputDir: string, clearExisting: boolean): Promise<void> {
    if (clearExisting) {
        await fs.rm(outputDir, { recursive: true, force: true });
    }
    await fs.mkdir(outputDir, { recursive: true });
}

export async function segmentByWord(
    audio: PcmAudio,
    words: readonly WordTiming[],
    outputDir: string,
    options: SegmentOptions = {}
): Promise<WordExport[]> {
    const { clearExisting = true } = options;
    await resetDirectory(outputDir, clearExisting);

    const results: WordExport[] = [];

    for (const [position, timing] of words.entries()) {
        const index = position + 1;
        const range = resolveSampleRange(timing, audio);

        if (!range) {
            const message = `Invalid timing for "${timing.word}" (${timing.start}s to ${timing.end}s)`;
            logger.warn({ index, word: timing.word, start: timing.start, end: timing.end }, 'Skipping word with invalid timing');
            results.push(err({ index, word: timing.word, error: stageError('invalid-timing', message) }));
            continue;
        }

        if (range.clamped) {
            logger.debug({ index, word: timing.word }, 'Word timing clamped to recording bounds');
        }

        const filePath = path.join(outputDir, wordFileName(index, timing.word));
        const slice: PcmAudio = {
            samples: audio.samples.slice(range.startSample, range.endSample),
            sampleRate: audio.sampleRate,
            channels: 1,
        };

        try {
            await fs.writeFile(filePath, encodeWav(slice));
            logger.debug({ index, word: timing.word, seconds: durationOf(slice) }, 'Word clip written');
            results.push(ok({
                index,
                word: timing.word,
                path: filePath,
                start: range.startSample / audio.sampleRate,
                end: range.endSample / audio.sampleRate,
                clamped: range.clamped,
            }));
        } catch (error) {
            logger.error({ error, index, word: timing.word, filePath }, 'Word clip export failed');
            results.push(err({
                index,
                word: timing.word,
                error: stageError('io', `Could not write ${filePath}: ${describeError(error)}`, error),
            }));
        }
    }

    return results;
}
