import type winston from 'winston';
import { CurveError } from './CurveError.js';

interface Compensation {
    label: string;
    undo: () => Promise<void>;
}

/**
 * SettlementJournal — records each completed transfer of a trade together
 * with the transfer that reverses it.
 *
 * Flow:
 * 1. Every asset movement is recorded right after it succeeds
 * 2. Notifications are deferred until the trade commits
 * 3. On failure the recorded movements are reversed, newest first, and the
 *    deferred notifications are dropped
 */
export class SettlementJournal {
    private readonly entries: Compensation[] = [];
    private readonly deferred: Array<() => void> = [];

    constructor(private readonly logger: winston.Logger) { }

    record(label: string, undo: () => Promise<void>): void {
        this.entries.push({ label, undo });
    }

    defer(effect: () => void): void {
        this.deferred.push(effect);
    }

    size(): number {
        return this.entries.length;
    }

    /**
     * The trade is final: forget the reversals and run deferred effects.
     */
    commit(): void {
        this.entries.length = 0;
        const effects = this.deferred.splice(0);
        for (const effect of effects) effect();
    }

    /**
     * Reverse every recorded movement. A reversal that fails leaves the
     * ledgers inconsistent, so it is raised as an invariant error after the
     * remaining reversals have been attempted.
     */
    async rollback(): Promise<void> {
        this.deferred.length = 0;
        const failures: string[] = [];
        while (this.entries.length > 0) {
            const entry = this.entries.pop();
            if (!entry) break;
            try {
                await entry.undo();
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                this.logger.error('Rollback step failed', { step: entry.label, error: message });
                failures.push(`${entry.label}: ${message}`);
            }
        }
        if (failures.length > 0) {
            throw new CurveError('INVARIANT', `Rollback incomplete: ${failures.join('; ')}`);
        }
    }
}
