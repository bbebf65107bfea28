// Shared types for Standup Coach

export type TurnStage =
    | 'promptShown'
    | 'recording'
    | 'transcribing'
    | 'scoring'
    | 'segmenting'
    | 'reported';

export type Result<T, E = StageError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export type StageErrorKind =
    | 'config'
    | 'network'
    | 'parse'
    | 'audio'
    | 'transcription'
    | 'io'
    | 'invalid-timing';

export interface StageError {
    kind: StageErrorKind;
    message: string;
    cause?: unknown;
}

export interface ConversationTurn {
    readonly prompt: string;
    readonly expectedResponse: string;
}

/**
 * Mono 16-bit signed PCM held in memory.
 */
export interface PcmAudio {
    samples: Int16Array;
    sampleRate: number;
    channels: 1;
}

/**
 * A recording together with the transient WAV file it was written to.
 */
export interface Recording {
    audio: PcmAudio;
    path: string;
}

export interface WordTiming {
    word: string;
    /** Seconds from the start of the recording */
    start: number;
    end: number;
}

export interface WordFile {
    /** 1-based position in the timing sequence */
    index: number;
    word: string;
    path: string;
    start: number;
    end: number;
    clamped: boolean;
}

export interface WordExportFailure {
    index: number;
    word: string;
    error: StageError;
}

export type WordExport = Result<WordFile, WordExportFailure>;

export type ScoringMode = 'positional' | 'aligned';

export type MismatchKind = 'substitution' | 'insertion' | 'deletion';

export interface Mismatch {
    kind: MismatchKind;
    spoken: string | null;
    expected: string | null;
}

export type TokenStatus = 'match' | 'mismatch';

export interface AnnotatedToken {
    text: string;
    status: TokenStatus;
}

export interface ScoreResult {
    mode: ScoringMode;
    mismatches: Mismatch[];
    tokens: AnnotatedToken[];
    annotatedText: string;
    /** Zero means nothing was compared, which is not a real match */
    comparedPositions: number;
}

export type TurnVerdict = 'perfect' | 'needs-practice' | 'no-speech';

export interface TurnReport {
    index: number;
    total: number;
    turn: ConversationTurn;
    durationSeconds: number;
    transcript: string;
    words: WordTiming[];
    score: ScoreResult;
    wordExports: WordExport[];
    verdict: TurnVerdict;
    errors: StageError[];
}

export interface SessionSummary {
    correlationId: string;
    usedFallback: boolean;
    turns: TurnReport[];
    perfectTurns: number;
}

// External collaborators

export interface DialogueSource {
    getConversation(): Promise<Result<ConversationTurn[]>>;
}

export interface Recorder {
    record(durationSeconds: number): Promise<Result<PcmAudio>>;
}

export interface Transcriber {
    transcribe(recording: Recording): Promise<Result<string>>;
    transcribeWithTimestamps(recording: Recording): Promise<Result<WordTiming[]>>;
}
