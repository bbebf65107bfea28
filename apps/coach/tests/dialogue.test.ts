import { describe, expect, it, jest } from '@jest/globals';
import Groq from 'groq-sdk';
import {
    buildStandupPrompt,
    defaultConversation,
    GroqDialogueSource,
    parseConversation,
} from '../src/lib/dialogue';

const groqConfig = {
    apiKey: 'test-key',
    dialogueModel: 'test-chat-model',
    speechModel: 'test-speech-model',
    language: 'en',
};

describe('parseConversation', () => {
    it('maps AI/User pairs to turns', () => {
        const result = parseConversation(JSON.stringify([
            { AI: 'What did you work on yesterday?', User: 'I fixed the ledger sync.' },
            { AI: 'Any blockers?', User: 'None today.' },
        ]));

        expect(result).toEqual({
            ok: true,
            value: [
                { prompt: 'What did you work on yesterday?', expectedResponse: 'I fixed the ledger sync.' },
                { prompt: 'Any blockers?', expectedResponse: 'None today.' },
            ],
        });
    });

    it('accepts a reply wrapped in a json code fence', () => {
        const reply = '```json\n[{"AI": "Morning!", "User": "Good morning."}]\n```';
        expect(parseConversation(reply)).toEqual({
            ok: true,
            value: [{ prompt: 'Morning!', expectedResponse: 'Good morning.' }],
        });
    });

    it('drops entries without both sides', () => {
        const result = parseConversation('[{"AI": "Hello"}, {"User": "Hi"}, {"AI": "Ready?", "User": "Yes."}, 7]');
        expect(result).toEqual({ ok: true, value: [{ prompt: 'Ready?', expectedResponse: 'Yes.' }] });
    });

    it('fails on text that is not JSON', () => {
        const result = parseConversation('Sure! Here is your standup.');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('parse');
        }
    });

    it('fails on JSON that is not an array', () => {
        expect(parseConversation('{"AI": "x", "User": "y"}')).toEqual({
            ok: false,
            error: { kind: 'parse', message: 'Dialogue is not a JSON array' },
        });
    });
});

describe('defaultConversation', () => {
    it('greets the user by name', () => {
        expect(defaultConversation('Sam')).toEqual([
            { prompt: 'Hello! How are you today?', expectedResponse: "I'm good, thank you!" },
            { prompt: "What's your name?", expectedResponse: 'My name is Sam.' },
        ]);
    });
});

describe('buildStandupPrompt', () => {
    it('names the user and asks for a JSON array', () => {
        const prompt = buildStandupPrompt('Sam');
        expect(prompt).toContain('- Sam (User, Software Engineer).');
        expect(prompt).toContain('Return ONLY the JSON array');
    });
});

describe('GroqDialogueSource', () => {
    it('returns a network error when the request fails', async () => {
        const client = new Groq({ apiKey: 'test-key' });
        jest.spyOn(client.chat.completions, 'create').mockRejectedValue(new Error('connection refused'));

        const source = new GroqDialogueSource(client, groqConfig, 'Sam', 'test-correlation');
        const result = await source.getConversation();

        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.kind).toBe('network');
            expect(result.error.message).toBe('Dialogue request failed: connection refused');
        }
    });
});
