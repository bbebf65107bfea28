import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type {
    ConversationTurn,
    DialogueSource,
    PcmAudio,
    Recorder,
    Recording,
    Result,
    SessionSummary,
    Transcriber,
    TurnReport,
    WordTiming,
} from '@standup-coach/shared';
import type { SessionConfig } from '../src/config';
import { err, ok, stageError } from '../src/lib/result';
import { runSession } from '../src/lib/session';
import type { SessionConsole, TurnPosition } from '../src/lib/terminal';
import { readWav } from '../src/lib/wav';

const SAMPLE_RATE = 16000;

function oneSecond(): PcmAudio {
    return { samples: new Int16Array(SAMPLE_RATE).fill(300), sampleRate: SAMPLE_RATE, channels: 1 };
}

class FixedDialogue implements DialogueSource {
    constructor(private readonly result: Result<ConversationTurn[]>) {}

    getConversation(): Promise<Result<ConversationTurn[]>> {
        return Promise.resolve(this.result);
    }
}

class FakeRecorder implements Recorder {
    readonly durations: number[] = [];

    constructor(private readonly capture: () => Promise<Result<PcmAudio>> = () => Promise.resolve(ok(oneSecond()))) {}

    record(durationSeconds: number): Promise<Result<PcmAudio>> {
        this.durations.push(durationSeconds);
        return this.capture();
    }
}

class ScriptedTranscriber implements Transcriber {
    readonly recordings: Recording[] = [];

    constructor(
        private readonly texts: Result<string>[],
        private readonly timings: Result<WordTiming[]>[] = []
    ) {}

    async transcribe(recording: Recording): Promise<Result<string>> {
        this.recordings.push(recording);
        return this.texts.shift() ?? ok('');
    }

    async transcribeWithTimestamps(): Promise<Result<WordTiming[]>> {
        return this.timings.shift() ?? ok([]);
    }
}

class FakeConsole implements SessionConsole {
    readonly positions: TurnPosition[] = [];
    readonly recordingDurations: number[] = [];
    readonly reports: TurnReport[] = [];
    readonly summaries: SessionSummary[] = [];
    completedRecordings = 0;

    async showTurn(_turn: ConversationTurn, position: TurnPosition): Promise<void> {
        this.positions.push(position);
    }

    showRecording(durationSeconds: number): void {
        this.recordingDurations.push(durationSeconds);
    }

    showRecordingComplete(): void {
        this.completedRecordings++;
    }

    reportTurn(report: TurnReport): void {
        this.reports.push(report);
    }

    reportSession(summary: SessionSummary): void {
        this.summaries.push(summary);
    }
}

describe('runSession', () => {
    let workDir: string;
    let config: SessionConfig;

    beforeEach(async () => {
        workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'standup-coach-session-'));
        config = {
            userName: 'Sam',
            outputDir: path.join(workDir, 'split_audio'),
            scoringMode: 'aligned',
            groq: {
                apiKey: 'test-key',
                dialogueModel: 'test-chat-model',
                speechModel: 'test-speech-model',
                language: 'en',
            },
            audio: {
                sampleRate: SAMPLE_RATE,
                recorder: 'sox',
                recordingPath: path.join(workDir, 'recorded_audio.wav'),
            },
            timing: {
                wordsPerSecond: 2,
                minRecordDuration: 1,
            },
        };
    });

    afterEach(async () => {
        await fs.rm(workDir, { recursive: true, force: true });
    });

    it('records, scores and splits a turn with a mistake', async () => {
        const recorder = new FakeRecorder();
        const transcriber = new ScriptedTranscriber(
            [ok('good evening team')],
            [ok([
                { word: 'good', start: 0, end: 0.25 },
                { word: 'evening', start: 0.25, end: 0.625 },
                { word: 'team', start: 0.625, end: 0.875 },
            ])]
        );
        const terminal = new FakeConsole();
        const dialogue = new FixedDialogue(ok([{ prompt: 'Say hello to the team.', expectedResponse: 'Good morning team.' }]));

        const summary = await runSession({ dialogue, recorder, transcriber, console: terminal }, config, 'test-session');

        expect(recorder.durations).toEqual([1.5]);
        expect(terminal.recordingDurations).toEqual([1.5]);
        expect(terminal.completedRecordings).toBe(1);
        expect(transcriber.recordings.map(recording => recording.path)).toEqual([config.audio.recordingPath]);
        expect((await readWav(config.audio.recordingPath)).samples.length).toBe(SAMPLE_RATE);

        const [report] = summary.turns;
        expect(report.transcript).toBe('good evening team');
        expect(report.verdict).toBe('needs-practice');
        expect(report.score.mismatches).toEqual([{ kind: 'substitution', spoken: 'evening', expected: 'morning' }]);
        expect(report.errors).toEqual([]);
        expect(report.wordExports.every(entry => entry.ok)).toBe(true);
        expect((await fs.readdir(config.outputDir)).sort())
            .toEqual(['word_1_good.wav', 'word_2_evening.wav', 'word_3_team.wav']);

        expect(summary.correlationId).toBe('test-session');
        expect(summary.usedFallback).toBe(false);
        expect(summary.perfectTurns).toBe(0);
        expect(terminal.reports).toEqual([report]);
        expect(terminal.summaries).toEqual([summary]);
    });

    it('falls back to the built-in conversation when generation fails', async () => {
        const transcriber = new ScriptedTranscriber([ok("I'm good, thank you"), ok('my name is Sam')]);
        const terminal = new FakeConsole();
        const dialogue = new FixedDialogue(err(stageError('network', 'Dialogue request failed: offline')));

        const summary = await runSession(
            { dialogue, recorder: new FakeRecorder(), transcriber, console: terminal },
            config,
            'test-session'
        );

        expect(summary.usedFallback).toBe(true);
        expect(summary.turns.map(report => report.turn.prompt)).toEqual(['Hello! How are you today?', "What's your name?"]);
        expect(summary.perfectTurns).toBe(2);
        expect(terminal.positions).toEqual([{ index: 0, total: 2 }, { index: 1, total: 2 }]);
    });

    it('falls back when the generated conversation is empty', async () => {
        const summary = await runSession(
            {
                dialogue: new FixedDialogue(ok([])),
                recorder: new FakeRecorder(),
                transcriber: new ScriptedTranscriber([]),
                console: new FakeConsole(),
            },
            config,
            'test-session'
        );

        expect(summary.usedFallback).toBe(true);
        expect(summary.turns).toHaveLength(2);
    });

    it('reports a turn with no speech when transcription fails', async () => {
        const failure = err(stageError('transcription', 'Transcription failed: offline'));
        const transcriber = new ScriptedTranscriber([failure], [failure]);
        const dialogue = new FixedDialogue(ok([{ prompt: 'Any blockers?', expectedResponse: 'No blockers.' }]));

        const summary = await runSession(
            { dialogue, recorder: new FakeRecorder(), transcriber, console: new FakeConsole() },
            config,
            'test-session'
        );

        const [report] = summary.turns;
        expect(report.transcript).toBe('');
        expect(report.verdict).toBe('no-speech');
        expect(report.errors.map(error => error.kind)).toEqual(['transcription', 'transcription']);
        expect(report.wordExports).toEqual([]);
    });

    it('skips transcription when the recorder fails', async () => {
        const recorder = new FakeRecorder(() => Promise.resolve(err(stageError('audio', 'Recording failed: sox not found'))));
        const transcriber = new ScriptedTranscriber([ok('never used')]);
        const terminal = new FakeConsole();
        const dialogue = new FixedDialogue(ok([{ prompt: 'Any blockers?', expectedResponse: 'No blockers.' }]));

        const summary = await runSession({ dialogue, recorder, transcriber, console: terminal }, config, 'test-session');

        const [report] = summary.turns;
        expect(transcriber.recordings).toEqual([]);
        expect(terminal.completedRecordings).toBe(0);
        expect(report.errors).toEqual([{ kind: 'audio', message: 'Recording failed: sox not found' }]);
        expect(report.verdict).toBe('no-speech');
    });

    it('keeps the session going when the recorder throws', async () => {
        const recorder = new FakeRecorder(() => Promise.reject(new Error('mic unplugged')));
        const transcriber = new ScriptedTranscriber([ok('no blockers')]);
        const terminal = new FakeConsole();
        const dialogue = new FixedDialogue(ok([
            { prompt: 'Any blockers?', expectedResponse: 'No blockers.' },
            { prompt: 'Anything else?', expectedResponse: 'That is all.' },
        ]));

        const summary = await runSession({ dialogue, recorder, transcriber, console: terminal }, config, 'test-session');

        expect(summary.turns).toHaveLength(2);
        expect(summary.turns[0].errors).toEqual([
            expect.objectContaining({ kind: 'audio', message: 'recording failed: mic unplugged' }),
        ]);
        expect(transcriber.recordings).toEqual([]);
        expect(terminal.reports).toHaveLength(2);
    });

    it('leaves only the latest turn\'s clips in the output directory', async () => {
        const transcriber = new ScriptedTranscriber(
            [ok('alpha beta'), ok('gamma')],
            [
                ok([{ word: 'alpha', start: 0, end: 0.25 }, { word: 'beta', start: 0.25, end: 0.5 }]),
                ok([{ word: 'gamma', start: 0, end: 0.5 }]),
            ]
        );
        const dialogue = new FixedDialogue(ok([
            { prompt: 'First line.', expectedResponse: 'alpha beta' },
            { prompt: 'Second line.', expectedResponse: 'gamma' },
        ]));

        const summary = await runSession(
            { dialogue, recorder: new FakeRecorder(), transcriber, console: new FakeConsole() },
            config,
            'test-session'
        );

        expect(summary.perfectTurns).toBe(2);
        expect(await fs.readdir(config.outputDir)).toEqual(['word_1_gamma.wav']);
    });
});
