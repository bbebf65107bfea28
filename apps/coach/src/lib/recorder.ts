/// <reference path="../types/node-record-lpcm16.d.ts" />
/**
 * Microphone capture through sox / rec / arecord
 */

import { record as startRecording } from 'node-record-lpcm16';
import type { RecordOptions, Recording as LpcmRecording } from 'node-record-lpcm16';
import type { PcmAudio, Recorder, Result } from '@standup-coach/shared';
import type { AudioConfig } from '../config.js';
import { logger, metrics } from './metrics.js';
import { describeError, err, ok, stageError } from './result.js';
import { pcmFromBuffer } from './wav.js';

export type StartRecording = (options?: RecordOptions) => LpcmRecording;

/**
 * Pad with silence or cut so the buffer holds exactly `sampleRate * duration` samples.
 */
export function fitToDuration(audio: PcmAudio, durationSeconds: number): PcmAudio {
    const expected = Math.trunc(audio.sampleRate * durationSeconds);
    if (audio.samples.length === expected) {
        return audio;
    }

    const samples = new Int16Array(expected);
    samples.set(audio.samples.subarray(0, expected));
    return { ...audio, samples };
}

export class MicRecorder implements Recorder {
    constructor(
        private readonly config: AudioConfig,
        private readonly start: StartRecording = startRecording
    ) {}

    async record(durationSeconds: number): Promise<Result<PcmAudio>> {
        const startTime = Date.now();

        try {
            const raw = await this.capture(durationSeconds);
            const audio = fitToDuration(pcmFromBuffer(raw, this.config.sampleRate), durationSeconds);
            metrics.trackLatency('record', Date.now() - startTime);
            logger.debug({ durationSeconds, samples: audio.samples.length }, 'Recording captured');
            return ok(audio);
        } catch (error) {
            metrics.incrementCounter('errors');
            logger.error({ error, recorder: this.config.recorder }, 'Recording failed');
            return err(stageError('audio', `Recording failed: ${describeError(error)}`, error));
        }
    }

    private capture(durationSeconds: number): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const recording = this.start({
                sampleRate: this.config.sampleRate,
                channels: 1,
                audioType: 'raw',
                recorder: this.config.recorder,
                threshold: 0,
                endOnSilence: false,
            });

            const chunks: Buffer[] = [];
            const stream = recording.stream();
            let stopped = false;
            let settled = false;

            const settle = (error?: unknown) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (error === undefined) {
                    resolve(Buffer.concat(chunks));
                } else {
                    reject(error instanceof Error ? error : new Error(String(error)));
                }
            };

            const timer = setTimeout(() => {
                stopped = true;
                recording.stop();
            }, durationSeconds * 1000);

            stream.on('data', (chunk: Buffer) => chunks.push(chunk));
            // The library reports a failed exit as a string error on the stream
            stream.on('error', (error: unknown) => {
                if (!settled) {
                    stopped = true;
                    recording.stop();
                }
                settle(error);
            });

            // Spawn failures (e.g. the recorder binary is missing) arrive here
            recording.process.on('error', (error: Error) => settle(error));
            recording.process.on('close', (code: number | null) => {
                if (code === 0 || (code === null && stopped)) {
                    settle();
                } else {
                    settle(new Error(`${this.config.recorder} exited with code ${code}`));
                }
            });
        });
    }
}
