/**
 * Dialogue source: asks the chat model for a standup script and parses it into turns.
 */

import type Groq from 'groq-sdk';
import type { ConversationTurn, DialogueSource, Result } from '@standup-coach/shared';
import type { GroqConfig } from '../config.js';
import { logger, metrics } from './metrics.js';
import { describeError, err, ok, stageError } from './result.js';
import { rateLimit } from './groq.js';

export function buildStandupPrompt(userName: string): string {
    return `You are simulating a daily standup meeting of at least one minute for a software engineering team with only:
- Scrum Master (AI, facilitates the meeting).
- ${userName} (User, Software Engineer).

The team is building a payment system that needs:
- A scalable and concurrent backend to handle high transaction volumes.
- A robust database architecture to keep data consistent.
- A fast and friendly frontend for payment interactions.

Each participant gives a brief, realistic update in the standard standup format:
1. What did you work on yesterday?
2. What are you working on today?
3. Any blockers?

Rules:
- Vary the updates on every run.
- Keep the tone conversational and natural.
- Respond strictly with a JSON array where every entry has both an "AI" key and a "User" key.
- Do not include AI lines without a matching User reply.
- Return ONLY the JSON array, with no explanations, names, roles or formatting around it.`;
}

export function defaultConversation(userName: string): ConversationTurn[] {
    return [
        { prompt: 'Hello! How are you today?', expectedResponse: "I'm good, thank you!" },
        { prompt: "What's your name?", expectedResponse: `My name is ${userName}.` },
    ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Parse the model's reply. Markdown code fences are tolerated; entries missing
 * either side of the exchange are dropped.
 */
export function parseConversation(text: string): Result<ConversationTurn[]> {
    const body = text
        .trim()
        .replace(/^```(?:json)?\s*/i, '')
        .replace(/\s*```$/, '')
        .trim();

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (error) {
        return err(stageError('parse', `Dialogue is not valid JSON: ${describeError(error)}`, error));
    }

    if (!Array.isArray(parsed)) {
        return err(stageError('parse', 'Dialogue is not a JSON array'));
    }

    const turns: ConversationTurn[] = [];
    for (const entry of parsed) {
        if (isRecord(entry) && typeof entry.AI === 'string' && typeof entry.User === 'string') {
            turns.push({ prompt: entry.AI, expectedResponse: entry.User });
        }
    }
    return ok(turns);
}

export class GroqDialogueSource implements DialogueSource {
    constructor(
        private readonly client: Groq,
        private readonly config: GroqConfig,
        private readonly userName: string,
        private readonly correlationId: string
    ) {}

    async getConversation(): Promise<Result<ConversationTurn[]>> {
        const startTime = Date.now();
        const correlationId = this.correlationId;

        try {
            await rateLimit();
            metrics.incrementCounter('requests');
            metrics.logEvent({ type: 'dialogue.request_start', timestamp: startTime, correlationId });

            const completion = await this.client.chat.completions.create({
                model: this.config.dialogueModel,
                messages: [{ role: 'user', content: buildStandupPrompt(this.userName) }],
                temperature: 0.9,
            });

            const content = completion.choices[0]?.message?.content || '';
            const durationMs = Date.now() - startTime;
            metrics.trackLatency('dialogue', durationMs);

            const turns = parseConversation(content);
            metrics.logEvent({
                type: 'dialogue.request_complete',
                timestamp: Date.now(),
                correlationId,
                durationMs,
                data: { turns: turns.ok ? turns.value.length : 0 },
            });

            if (!turns.ok) {
                metrics.incrementCounter('errors');
                logger.error({ correlationId, error: turns.error.message }, 'Could not parse dialogue');
            }
            return turns;
        } catch (error) {
            metrics.incrementCounter('errors');
            logger.error({ error, correlationId }, 'Dialogue generation failed');
            return err(stageError('network', `Dialogue request failed: ${describeError(error)}`, error));
        }
    }
}
