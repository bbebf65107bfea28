/**
 * Session configuration
 *
 * Built once at startup from the environment and passed explicitly to every component.
 */

import Joi from 'joi';
import type { ScoringMode } from '@standup-coach/shared';
import { ConfigError } from './lib/errors.js';

export type RecorderProgram = 'sox' | 'rec' | 'arecord';

export interface GroqConfig {
    apiKey: string;
    dialogueModel: string;
    speechModel: string;
    language: string;
}

export interface AudioConfig {
    sampleRate: number;
    recorder: RecorderProgram;
    recordingPath: string;
}

export interface TimingConfig {
    wordsPerSecond: number;
    minRecordDuration: number;
}

export interface SessionConfig {
    userName: string;
    outputDir: string;
    scoringMode: ScoringMode;
    groq: GroqConfig;
    audio: AudioConfig;
    timing: TimingConfig;
}

interface EnvShape {
    GROQ_API_KEY: string;
    WORDS_PER_SECOND: number;
    MIN_RECORD_DURATION: number;
    SAMPLERATE: number;
    OUTPUT_DIR: string;
    RECORDING_FILE: string;
    USER_NAME: string;
    STT_MODEL: string;
    STT_LANGUAGE: string;
    DIALOGUE_MODEL: string;
    SCORING_MODE: ScoringMode;
    RECORDER: RecorderProgram;
}

const envSchema = Joi.object<EnvShape>({
    GROQ_API_KEY: Joi.string().trim().required(),
    WORDS_PER_SECOND: Joi.number().greater(0).required(),
    MIN_RECORD_DURATION: Joi.number().min(0).required(),
    SAMPLERATE: Joi.number().integer().positive().required(),
    OUTPUT_DIR: Joi.string().trim().default('split_audio'),
    RECORDING_FILE: Joi.string().trim().default('recorded_audio.wav'),
    USER_NAME: Joi.string().trim().default('Developer'),
    STT_MODEL: Joi.string().trim().default('whisper-large-v3-turbo'),
    STT_LANGUAGE: Joi.string().trim().default('en'),
    DIALOGUE_MODEL: Joi.string().trim().default('llama-3.3-70b-versatile'),
    SCORING_MODE: Joi.string().valid('positional', 'aligned').default('aligned'),
    RECORDER: Joi.string().valid('sox', 'rec', 'arecord').default('sox'),
}).unknown(true);

/**
 * Validate the environment and build the session configuration.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
    const defined = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const { error, value } = envSchema.validate(defined, { abortEarly: false, convert: true });
    if (error || value === undefined) {
        throw new ConfigError('Invalid configuration', error ? error.details.map(d => d.message) : []);
    }

    return {
        userName: value.USER_NAME,
        outputDir: value.OUTPUT_DIR,
        scoringMode: value.SCORING_MODE,
        groq: {
            apiKey: value.GROQ_API_KEY,
            dialogueModel: value.DIALOGUE_MODEL,
            speechModel: value.STT_MODEL,
            language: value.STT_LANGUAGE,
        },
        audio: {
            sampleRate: value.SAMPLERATE,
            recorder: value.RECORDER,
            recordingPath: value.RECORDING_FILE,
        },
        timing: {
            wordsPerSecond: value.WORDS_PER_SECOND,
            minRecordDuration: value.MIN_RECORD_DURATION,
        },
    };
}
