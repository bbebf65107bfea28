declare module 'node-record-lpcm16' {
    import type { ChildProcess } from 'child_process';
    import type { Readable } from 'stream';

    export interface RecordOptions {
        sampleRate?: number;
        channels?: number;
        compress?: boolean;
        threshold?: number;
        thresholdStart?: number | null;
        thresholdEnd?: number | null;
        silence?: string;
        recorder?: 'sox' | 'rec' | 'arecord';
        endOnSilence?: boolean;
        audioType?: string;
        device?: string | null;
    }

    export interface Recording {
        /** The spawned sox / rec / arecord process */
        process: ChildProcess;
        stream(): Readable;
        stop(): void;
    }

    export function record(options?: RecordOptions): Recording;
}
