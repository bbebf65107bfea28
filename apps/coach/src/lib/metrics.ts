/**
 * Structured Metrics Logger for Standup Coach
 *
 * Provides:
 * - Structured logging with Pino (pretty-printed to stderr)
 * - Counters and per-stage latency aggregation
 * - Event correlation via correlationId
 */

import pino from 'pino';

export type LatencyStage = 'dialogue' | 'record' | 'stt' | 'segment';
export type CounterType = 'sessions' | 'turns' | 'requests' | 'errors';

export interface MetricEvent {
    type: string;
    timestamp: number;
    correlationId: string;
    durationMs?: number;
    data?: Record<string, unknown>;
}

export interface MetricsSummary {
    sessionCount: number;
    turnCount: number;
    avgDialogueLatencyMs: number;
    avgRecordLatencyMs: number;
    avgSttLatencyMs: number;
    avgSegmentLatencyMs: number;
    errorRate: number;
}

function createLogger(): pino.Logger {
    const isTest = process.env.NODE_ENV === 'test';
    const level = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

    // The pretty transport runs on a worker thread, which tests must not leave behind
    if (isTest) {
        return pino({ level });
    }

    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: { colorize: true, destination: 2 },
        },
    });
}

export class MetricsCollector {
    private logger: pino.Logger;
    private events: MetricEvent[] = [];
    private counters: Record<CounterType, number> = {
        sessions: 0,
        turns: 0,
        requests: 0,
        errors: 0,
    };
    private latencies: Record<LatencyStage, number[]> = {
        dialogue: [],
        record: [],
        stt: [],
        segment: [],
    };

    constructor(logger: pino.Logger = createLogger()) {
        this.logger = logger;
    }

    generateCorrelationId(): string {
        return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
    }

    logEvent(event: MetricEvent): void {
        this.events.push(event);
        this.logger.debug({ event }, `[${event.type}]`);

        // Keep only last 1000 events
        if (this.events.length > 1000) {
            this.events.shift();
        }
    }

    trackLatency(stage: LatencyStage, durationMs: number): void {
        this.latencies[stage].push(durationMs);

        // Keep only last 100 measurements
        if (this.latencies[stage].length > 100) {
            this.latencies[stage].shift();
        }
    }

    incrementCounter(type: CounterType): void {
        this.counters[type]++;
    }

    private getAvgLatency(stage: LatencyStage): number {
        const latencies = this.latencies[stage];
        if (latencies.length === 0) return 0;
        return Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length);
    }

    getSummary(): MetricsSummary {
        return {
            sessionCount: this.counters.sessions,
            turnCount: this.counters.turns,
            avgDialogueLatencyMs: this.getAvgLatency('dialogue'),
            avgRecordLatencyMs: this.getAvgLatency('record'),
            avgSttLatencyMs: this.getAvgLatency('stt'),
            avgSegmentLatencyMs: this.getAvgLatency('segment'),
            errorRate: this.counters.requests > 0
                ? this.counters.errors / this.counters.requests
                : 0,
        };
    }

    getEvents(): readonly MetricEvent[] {
        return this.events;
    }

    getLogger(): pino.Logger {
        return this.logger;
    }
}

// Singleton instance
export const metrics = new MetricsCollector();
export const logger = metrics.getLogger();
