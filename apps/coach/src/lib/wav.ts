/**
 * 16-bit PCM mono WAV encoding and decoding
 */

import { promises as fs } from 'fs';
import type { PcmAudio } from '@standup-coach/shared';

const HEADER_SIZE = 44;
const BITS_PER_SAMPLE = 16;
const BYTES_PER_SAMPLE = BITS_PER_SAMPLE / 8;
const PCM_FORMAT = 1;

export function durationOf(audio: PcmAudio): number {
    return audio.samples.length / audio.sampleRate;
}

export function pcmFromBuffer(raw: Buffer, sampleRate: number): PcmAudio {
    const samples = new Int16Array(Math.floor(raw.length / BYTES_PER_SAMPLE));
    for (let i = 0; i < samples.length; i++) {
        samples[i] = raw.readInt16LE(i * BYTES_PER_SAMPLE);
    }
    return { samples, sampleRate, channels: 1 };
}

export function encodeWav(audio: PcmAudio): Buffer {
    const dataSize = audio.samples.length * BYTES_PER_SAMPLE;
    const buffer = Buffer.alloc(HEADER_SIZE + dataSize);

    // RIFF chunk descriptor
    buffer.write('RIFF', 0);
    buffer.writeUInt32LE(36 + dataSize, 4); // Chunk size
    buffer.write('WAVE', 8);

    // "fmt " sub-chunk
    buffer.write('fmt ', 12);
    buffer.writeUInt32LE(16, 16); // Subchunk1 size
    buffer.writeUInt16LE(PCM_FORMAT, 20);
    buffer.writeUInt16LE(audio.channels, 22);
    buffer.writeUInt32LE(audio.sampleRate, 24);
    buffer.writeUInt32LE(audio.sampleRate * audio.channels * BYTES_PER_SAMPLE, 28); // Byte rate
    buffer.writeUInt16LE(audio.channels * BYTES_PER_SAMPLE, 32); // Block align
    buffer.writeUInt16LE(BITS_PER_SAMPLE, 34);

    // "data" sub-chunk
    buffer.write('data', 36);
    buffer.writeUInt32LE(dataSize, 40);

    for (let i = 0; i < audio.samples.length; i++) {
        buffer.writeInt16LE(audio.samples[i], HEADER_SIZE + i * BYTES_PER_SAMPLE);
    }

    return buffer;
}

/**
 * Decode a PCM WAV file. Chunks other than "fmt " and "data" are skipped.
 */
export function decodeWav(buffer: Buffer): PcmAudio {
    if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
        throw new Error('Not a RIFF/WAVE file');
    }

    let sampleRate: number | null = null;
    let offset = 12;

    while (offset + 8 <= buffer.length) {
        const chunkId = buffer.toString('ascii', offset, offset + 4);
        const chunkSize = buffer.readUInt32LE(offset + 4);
        const body = offset + 8;

        if (chunkId === 'fmt ') {
            const format = buffer.readUInt16LE(body);
            const channels = buffer.readUInt16LE(body + 2);
            const bits = buffer.readUInt16LE(body + 14);
            if (format !== PCM_FORMAT || bits !== BITS_PER_SAMPLE) {
                throw new Error(`Unsupported WAV encoding (format ${format}, ${bits}-bit)`);
            }
            if (channels !== 1) {
                throw new Error(`Expected mono audio, got ${channels} channels`);
            }
            sampleRate = buffer.readUInt32LE(body + 4);
        } else if (chunkId === 'data') {
            if (sampleRate === null) {
                throw new Error('WAV data chunk precedes fmt chunk');
            }
            const end = Math.min(body + chunkSize, buffer.length);
            return pcmFromBuffer(buffer.subarray(body, end), sampleRate);
        }

        // Chunks are padded to an even size
        offset = body + chunkSize + (chunkSize % 2);
    }

    throw new Error('WAV file has no data chunk');
}

export async function writeWav(filePath: string, audio: PcmAudio): Promise<void> {
    await fs.writeFile(filePath, encodeWav(audio));
}

export async function readWav(filePath: string): Promise<PcmAudio> {
    return decodeWav(await fs.readFile(filePath));
}
