/**
 * Session Orchestrator
 *
 * Fetches the conversation, then runs each turn to completion before starting the next.
 */

import { createActor, toPromise } from 'xstate';
import type {
    DialogueSource,
    Recorder,
    SessionSummary,
    Transcriber,
    TurnReport,
} from '@standup-coach/shared';
import type { SessionConfig } from '../config.js';
import { defaultConversation } from './dialogue.js';
import { logger, metrics } from './metrics.js';
import { unwrapOr } from './result.js';
import { createTurnMachine } from './state/turn-machine.js';
import type { TurnInput, TurnMachine } from './state/turn-machine.js';
import type { SessionConsole } from './terminal.js';

export interface SessionDependencies {
    dialogue: DialogueSource;
    recorder: Recorder;
    transcriber: Transcriber;
    console: SessionConsole;
}

export async function runTurn(machine: TurnMachine, input: TurnInput): Promise<TurnReport> {
    const actor = createActor(machine, { input });
    const done = toPromise(actor);
    actor.start();
    return done;
}

export async function runSession(
    deps: SessionDependencies,
    config: SessionConfig,
    correlationId: string = metrics.generateCorrelationId()
): Promise<SessionSummary> {
    metrics.incrementCounter('sessions');
    logger.info({ correlationId, userName: config.userName, scoringMode: config.scoringMode }, 'Session started');

    const generated = unwrapOr(await deps.dialogue.getConversation(), []);
    const usedFallback = generated.length === 0;
    const turns = usedFallback ? defaultConversation(config.userName) : generated;

    if (usedFallback) {
        logger.warn({ correlationId }, 'No dialogue generated, using the built-in conversation');
    }

    const machine = createTurnMachine({ ...deps, config });
    const reports: TurnReport[] = [];

    for (const [index, turn] of turns.entries()) {
        metrics.incrementCounter('turns');
        try {
            reports.push(await runTurn(machine, { turn, index, total: turns.length }));
        } catch (error) {
            metrics.incrementCounter('errors');
            logger.error({ error, correlationId, turn: index + 1 }, 'Turn could not be completed');
        }
    }

    const summary: SessionSummary = {
        correlationId,
        usedFallback,
        turns: reports,
        perfectTurns: reports.filter(report => report.verdict === 'perfect').length,
    };

    deps.console.reportSession(summary);
    const eventCount = metrics.getEvents().filter(event => event.correlationId === correlationId).length;
    logger.info({ correlationId, eventCount, metrics: metrics.getSummary() }, 'Session complete - final metrics');

    return summary;
}
