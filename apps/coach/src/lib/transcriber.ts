/**
 * Whisper transcription through Groq
 *
 * Two passes over the same recording: plain text for scoring, and word-level
 * timestamps for splitting the recording.
 */

import { createReadStream } from 'fs';
import type Groq from 'groq-sdk';
import type { Recording, Result, Transcriber, WordTiming } from '@standup-coach/shared';
import type { GroqConfig } from '../config.js';
import { logger, metrics } from './metrics.js';
import { describeError, err, ok, stageError } from './result.js';
import { rateLimit } from './groq.js';

function isWordTiming(value: unknown): value is WordTiming {
    if (typeof value !== 'object' || value === null) return false;
    return 'word' in value && typeof value.word === 'string'
        && 'start' in value && typeof value.start === 'number'
        && 'end' in value && typeof value.end === 'number';
}

/**
 * Extract word timings from a verbose transcription payload, dropping malformed entries.
 */
export function readWordTimings(payload: unknown): WordTiming[] {
    if (typeof payload !== 'object' || payload === null || !('words' in payload)) {
        return [];
    }
    const { words } = payload;
    if (!Array.isArray(words)) {
        return [];
    }
    return words
        .filter(isWordTiming)
        .map(({ word, start, end }) => ({ word: word.trim(), start, end }));
}

export class GroqTranscriber implements Transcriber {
    constructor(
        private readonly client: Groq,
        private readonly config: GroqConfig,
        private readonly correlationId: string
    ) {}

    async transcribe(recording: Recording): Promise<Result<string>> {
        const startTime = Date.now();
        const correlationId = this.correlationId;

        try {
            await rateLimit();
            metrics.incrementCounter('requests');
            metrics.logEvent({ type: 'stt.request_start', timestamp: startTime, correlationId });

            const transcription = await this.client.audio.transcriptions.create({
                file: createReadStream(recording.path),
                model: this.config.speechModel,
                language: this.config.language,
                response_format: 'json',
            });

            const durationMs = Date.now() - startTime;
            metrics.trackLatency('stt', durationMs);
            metrics.logEvent({
                type: 'stt.request_complete',
                timestamp: Date.now(),
                correlationId,
                durationMs,
                data: { textLength: transcription.text.length },
            });

            return ok(transcription.text.trim());
        } catch (error) {
            metrics.incrementCounter('errors');
            logger.error({ error, correlationId }, 'STT transcription failed');
            return err(stageError('transcription', `Transcription failed: ${describeError(error)}`, error));
        }
    }

    async transcribeWithTimestamps(recording: Recording): Promise<Result<WordTiming[]>> {
        const startTime = Date.now();
        const correlationId = this.correlationId;

        try {
            await rateLimit();
            metrics.incrementCounter('requests');
            metrics.logEvent({ type: 'stt.timed_request_start', timestamp: startTime, correlationId });

            const transcription = await this.client.audio.transcriptions.create({
                file: createReadStream(recording.path),
                model: this.config.speechModel,
                language: this.config.language,
                response_format: 'verbose_json',
                timestamp_granularities: ['word'],
            });

            const words = readWordTimings(transcription);
            const durationMs = Date.now() - startTime;
            metrics.trackLatency('stt', durationMs);
            metrics.logEvent({
                type: 'stt.timed_request_complete',
                timestamp: Date.now(),
                correlationId,
                durationMs,
                data: { wordCount: words.length },
            });

            return ok(words);
        } catch (error) {
            metrics.incrementCounter('errors');
            logger.error({ error, correlationId }, 'Timed STT transcription failed');
            return err(stageError('transcription', `Timed transcription failed: ${describeError(error)}`, error));
        }
    }
}
