/**
 * Practice Turn State Machine (XState v5)
 *
 * One conversation turn, run exactly once:
 * promptShown -> recording -> transcribing -> scoring -> segmenting -> reported
 *
 * Every stage resolves to a Result. A failed stage leaves its empty value in
 * context, records the error and the turn moves on, so it always gets reported.
 */

import { assign, fromPromise, setup } from 'xstate';
import type {
    ConversationTurn,
    PcmAudio,
    Recorder,
    Recording,
    Result,
    ScoreResult,
    StageError,
    StageErrorKind,
    Transcriber,
    TurnReport,
    TurnStage,
    WordExport,
    WordTiming,
} from '@standup-coach/shared';
import type { SessionConfig } from '../../config.js';
import { logger, metrics } from '../metrics.js';
import { describeError, err, ok, stageError } from '../result.js';
import { score as scorePronunciation, verdictFor } from '../scorer.js';
import { segmentByWord } from '../segmenter.js';
import type { SessionConsole } from '../terminal.js';
import { estimateDuration } from '../text.js';
import { writeWav } from '../wav.js';

export interface TurnInput {
    turn: ConversationTurn;
    index: number;
    total: number;
}

export interface TurnContext extends TurnInput {
    durationSeconds: number;
    recording: Recording | null;
    transcript: string;
    words: WordTiming[];
    score: ScoreResult | null;
    wordExports: WordExport[];
    errors: StageError[];
}

export interface TurnDependencies {
    recorder: Recorder;
    transcriber: Transcriber;
    console: SessionConsole;
    config: SessionConfig;
}

interface TranscriptionOutput {
    text: Result<string>;
    words: Result<WordTiming[]>;
}

function unexpected(kind: StageErrorKind, stage: TurnStage, error: unknown): StageError {
    logger.error({ error, stage }, 'Turn stage failed unexpectedly');
    return stageError(kind, `${stage} failed: ${describeError(error)}`, error);
}

function enter(stage: TurnStage) {
    return ({ context }: { context: TurnContext }) => {
        logger.debug({ stage, turn: context.index + 1 }, 'Entering turn stage');
    };
}

async function captureRecording(deps: TurnDependencies, durationSeconds: number): Promise<Result<Recording>> {
    const { recordingPath } = deps.config.audio;

    deps.console.showRecording(durationSeconds);
    const captured = await deps.recorder.record(durationSeconds);
    if (!captured.ok) {
        return captured;
    }

    try {
        await writeWav(recordingPath, captured.value);
    } catch (error) {
        logger.error({ error, recordingPath }, 'Could not write recording');
        return err(stageError('io', `Could not write ${recordingPath}: ${describeError(error)}`, error));
    }

    deps.console.showRecordingComplete();
    return ok({ audio: captured.value, path: recordingPath });
}

async function transcribeRecording(transcriber: Transcriber, recording: Recording | null): Promise<TranscriptionOutput> {
    if (!recording) {
        return { text: ok(''), words: ok([]) };
    }

    const text = await transcriber.transcribe(recording);
    const words = await transcriber.transcribeWithTimestamps(recording);
    return { text, words };
}

async function segmentRecording(
    audio: PcmAudio,
    words: WordTiming[],
    outputDir: string
): Promise<Result<WordExport[]>> {
    const startTime = Date.now();
    try {
        const exported = await segmentByWord(audio, words, outputDir);
        metrics.trackLatency('segment', Date.now() - startTime);
        return ok(exported);
    } catch (error) {
        metrics.incrementCounter('errors');
        logger.error({ error, outputDir }, 'Could not prepare word clip directory');
        return err(stageError('io', `Could not prepare ${outputDir}: ${describeError(error)}`, error));
    }
}

export function buildTurnReport(context: TurnContext, config: SessionConfig): TurnReport {
    const score = context.score
        ?? scorePronunciation(context.transcript, context.turn.expectedResponse, config.scoringMode);

    return {
        index: context.index,
        total: context.total,
        turn: context.turn,
        durationSeconds: context.durationSeconds,
        transcript: context.transcript,
        words: context.words,
        score,
        wordExports: context.wordExports,
        verdict: verdictFor(score),
        errors: context.errors,
    };
}

export function createTurnMachine(deps: TurnDependencies) {
    const { config } = deps;
    const silence: PcmAudio = { samples: new Int16Array(0), sampleRate: config.audio.sampleRate, channels: 1 };

    return setup({
        types: {
            context: {} as TurnContext,
            input: {} as TurnInput,
            output: {} as TurnReport,
        },
        actors: {
            showPrompt: fromPromise<void, TurnInput>(({ input }) =>
                deps.console.showTurn(input.turn, { index: input.index, total: input.total })
            ),
            recordAudio: fromPromise<Result<Recording>, { durationSeconds: number }>(({ input }) =>
                captureRecording(deps, input.durationSeconds)
            ),
            transcribeAudio: fromPromise<TranscriptionOutput, { recording: Recording | null }>(({ input }) =>
                transcribeRecording(deps.transcriber, input.recording)
            ),
            segmentWords: fromPromise<Result<WordExport[]>, { audio: PcmAudio; words: WordTiming[] }>(({ input }) =>
                segmentRecording(input.audio, input.words, config.outputDir)
            ),
        },
    }).createMachine({
        id: 'turn',
        initial: 'promptShown',
        context: ({ input }) => ({
            ...input,
            durationSeconds: estimateDuration(
                input.turn.expectedResponse,
                config.timing.wordsPerSecond,
                config.timing.minRecordDuration
            ),
            recording: null,
            transcript: '',
            words: [],
            score: null,
            wordExports: [],
            errors: [],
        }),
        output: ({ context }) => buildTurnReport(context, config),
        states: {
            promptShown: {
                entry: enter('promptShown'),
                invoke: {
                    src: 'showPrompt',
                    input: ({ context }) => ({ turn: context.turn, index: context.index, total: context.total }),
                    onDone: { target: 'recording' },
                    onError: {
                        target: 'recording',
                        actions: assign({
                            errors: ({ context, event }) => [...context.errors, unexpected('io', 'promptShown', event.error)],
                        }),
                    },
                },
            },
            recording: {
                entry: enter('recording'),
                invoke: {
                    src: 'recordAudio',
                    input: ({ context }) => ({ durationSeconds: context.durationSeconds }),
                    onDone: {
                        target: 'transcribing',
                        actions: assign(({ context, event }) => event.output.ok
                            ? { recording: event.output.value }
                            : { errors: [...context.errors, event.output.error] }),
                    },
                    onError: {
                        target: 'transcribing',
                        actions: assign({
                            errors: ({ context, event }) => [...context.errors, unexpected('audio', 'recording', event.error)],
                        }),
                    },
                },
            },
            transcribing: {
                entry: enter('transcribing'),
                invoke: {
                    src: 'transcribeAudio',
                    input: ({ context }) => ({ recording: context.recording }),
                    onDone: {
                        target: 'scoring',
                        actions: assign(({ context, event }) => {
                            const { text, words } = event.output;
                            const errors = [...context.errors];
                            if (!text.ok) errors.push(text.error);
                            if (!words.ok) errors.push(words.error);
                            return {
                                transcript: text.ok ? text.value : '',
                                words: words.ok ? words.value : [],
                                errors,
                            };
                        }),
                    },
                    onError: {
                        target: 'scoring',
                        actions: assign({
                            errors: ({ context, event }) => [...context.errors, unexpected('transcription', 'transcribing', event.error)],
                        }),
                    },
                },
            },
            scoring: {
                entry: [
                    enter('scoring'),
                    assign({
                        score: ({ context }) =>
                            scorePronunciation(context.transcript, context.turn.expectedResponse, config.scoringMode),
                    }),
                ],
                always: { target: 'segmenting' },
            },
            segmenting: {
                entry: enter('segmenting'),
                invoke: {
                    src: 'segmentWords',
                    // Runs even without a recording so the previous turn's clips are cleared
                    input: ({ context }) => ({ audio: context.recording?.audio ?? silence, words: context.words }),
                    onDone: {
                        target: 'reported',
                        actions: assign(({ context, event }) => event.output.ok
                            ? { wordExports: event.output.value }
                            : { errors: [...context.errors, event.output.error] }),
                    },
                    onError: {
                        target: 'reported',
                        actions: assign({
                            errors: ({ context, event }) => [...context.errors, unexpected('io', 'segmenting', event.error)],
                        }),
                    },
                },
            },
            reported: {
                type: 'final',
                entry: [
                    enter('reported'),
                    ({ context }) => deps.console.reportTurn(buildTurnReport(context, config)),
                ],
            },
        },
    });
}

export type TurnMachine = ReturnType<typeof createTurnMachine>;
