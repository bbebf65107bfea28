/**
 * Groq API Client for Standup Coach
 *
 * Provides:
 * - A configured client shared by dialogue generation and transcription
 * - Client-side request spacing (Groq has rate limits)
 * - The startup check that the configured speech model exists
 */

import Groq from 'groq-sdk';
import type { GroqConfig } from '../config.js';
import { StartupError } from './errors.js';
import { logger } from './metrics.js';
import { describeError } from './result.js';

export interface ModelLookup {
    models: {
        retrieve(model: string): Promise<unknown>;
    };
}

export function createGroqClient(config: GroqConfig): Groq {
    return new Groq({ apiKey: config.apiKey });
}

// Rate limiting state
let lastRequestTime = 0;
const MIN_REQUEST_INTERVAL_MS = 100; // 10 req/sec max

export async function rateLimit(): Promise<void> {
    const now = Date.now();
    const elapsed = now - lastRequestTime;
    if (elapsed < MIN_REQUEST_INTERVAL_MS) {
        await new Promise(resolve => setTimeout(resolve, MIN_REQUEST_INTERVAL_MS - elapsed));
    }
    lastRequestTime = Date.now();
}

/**
 * Abort before any turn runs when the speech model cannot be found.
 */
export async function verifySpeechModel(client: ModelLookup, model: string): Promise<void> {
    try {
        await rateLimit();
        await client.models.retrieve(model);
        logger.info({ model }, 'Speech model available');
    } catch (error) {
        throw new StartupError(`Speech model "${model}" is not available: ${describeError(error)}`, { cause: error });
    }
}
