#!/usr/bin/env node
/**
 * Standup Coach
 *
 * Spoken practice for daily standups:
 * 1. Generate a standup script with Groq
 * 2. Prompt the user line by line and record each answer
 * 3. Transcribe with Whisper, score pronunciation, split the recording per word
 */

import './env.js';
import { loadConfig } from './config.js';
import { GroqDialogueSource } from './lib/dialogue.js';
import { createGroqClient, verifySpeechModel } from './lib/groq.js';
import { logger, metrics } from './lib/metrics.js';
import { MicRecorder } from './lib/recorder.js';
import { runSession } from './lib/session.js';
import { TerminalConsole } from './lib/terminal.js';
import { GroqTranscriber } from './lib/transcriber.js';

async function main(): Promise<void> {
    // Fatal preconditions: nothing below runs if these fail
    const config = loadConfig(process.env);
    const groq = createGroqClient(config.groq);
    await verifySpeechModel(groq, config.groq.speechModel);

    console.clear();

    const correlationId = metrics.generateCorrelationId();
    const terminal = new TerminalConsole();

    try {
        await runSession(
            {
                dialogue: new GroqDialogueSource(groq, config.groq, config.userName, correlationId),
                recorder: new MicRecorder(config.audio),
                transcriber: new GroqTranscriber(groq, config.groq, correlationId),
                console: terminal,
            },
            config,
            correlationId
        );
    } finally {
        terminal.close();
    }
}

main().catch((error: unknown) => {
    logger.fatal({ error }, 'Standup Coach could not start');
    process.exitCode = 1;
});
