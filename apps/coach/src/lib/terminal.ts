/**
 * Terminal console: shows prompts, waits for the user, prints turn results.
 */

import chalk from 'chalk';
import * as readline from 'readline/promises';
import type { ConversationTurn, SessionSummary, TurnReport } from '@standup-coach/shared';
import { describeMismatch, renderAnnotated } from './scorer.js';
import type { TokenStyles } from './scorer.js';

export interface TurnPosition {
    index: number;
    total: number;
}

export interface SessionConsole {
    showTurn(turn: ConversationTurn, position: TurnPosition): Promise<void>;
    showRecording(durationSeconds: number): void;
    showRecordingComplete(): void;
    reportTurn(report: TurnReport): void;
    reportSession(summary: SessionSummary): void;
}

export type Write = (line: string) => void;

const tokenStyles: TokenStyles = {
    match: chalk.green,
    mismatch: chalk.red,
};

/**
 * Turn a report into the lines shown to the user.
 */
export function formatTurnReport(report: TurnReport, styles: TokenStyles = tokenStyles): string[] {
    const { score } = report;
    const lines = [
        '',
        '=== PRONUNCIATION RESULTS ===',
        `Expected: ${chalk.cyan(report.turn.expectedResponse)}`,
        `Spoken:   ${renderAnnotated(score.tokens, styles)}`,
    ];

    const exported = report.wordExports.filter(entry => entry.ok).length;
    if (report.words.length === 0) {
        lines.push(chalk.red('No words detected.'));
    } else {
        lines.push(`Audio split per word: ${exported}/${report.words.length} clips`);
    }

    switch (report.verdict) {
        case 'perfect':
            lines.push(`Mistakes: ${chalk.green('No mistakes!')}`);
            lines.push(chalk.green('Great! Moving to the next conversation.'));
            break;
        case 'needs-practice':
            lines.push('Mistakes:');
            for (const mismatch of score.mismatches) {
                lines.push(`  - ${describeMismatch(mismatch)}`);
            }
            lines.push(chalk.red('Try again!'));
            break;
        case 'no-speech':
            lines.push(chalk.yellow('Nothing to compare: no speech was recognised.'));
            break;
    }

    for (const error of report.errors) {
        lines.push(chalk.gray(`(${error.kind}) ${error.message}`));
    }

    lines.push('', `--- Turn ${report.index + 1}/${report.total} complete ---`, '');
    return lines;
}

export function formatSessionSummary(summary: SessionSummary): string[] {
    const lines = [
        '=== SESSION COMPLETE ===',
        `Turns: ${summary.turns.length}, without mistakes: ${summary.perfectTurns}`,
    ];
    if (summary.usedFallback) {
        lines.push(chalk.yellow('The generated dialogue was unavailable; the built-in conversation was used.'));
    }
    return lines;
}

export class TerminalConsole implements SessionConsole {
    private readonly rl: readline.Interface;

    constructor(
        private readonly write: Write = line => process.stdout.write(`${line}\n`),
        private readonly pauseMs = 1000
    ) {
        this.rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    }

    async showTurn(turn: ConversationTurn, position: TurnPosition): Promise<void> {
        this.write(`\n[${position.index + 1}/${position.total}] ${chalk.cyan(turn.prompt)}`);
        await new Promise(resolve => setTimeout(resolve, this.pauseMs));
        this.write(`\nNow say: ${chalk.yellow(turn.expectedResponse)}`);
        await this.rl.question('Press ENTER to start recording...');
    }

    showRecording(durationSeconds: number): void {
        this.write(`\nSpeak for ${durationSeconds} seconds...`);
    }

    showRecordingComplete(): void {
        this.write('Recording complete!');
    }

    reportTurn(report: TurnReport): void {
        formatTurnReport(report).forEach(line => this.write(line));
    }

    reportSession(summary: SessionSummary): void {
        formatSessionSummary(summary).forEach(line => this.write(line));
    }

    close(): void {
        this.rl.close();
    }
}
