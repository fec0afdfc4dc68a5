import { logger } from './logger.js';
import { systemClock, type Clock } from './retry.js';
import { halfWrittenChildren, type PartialTransitionFailure, type RecordOutcome } from '../types/index.js';

/**
 * Per-run counters. One instance per run, owned by the orchestrator and
 * dropped when the process exits.
 */

export interface CampaignRunStats {
    attempted: number;
    succeeded: number;
    failed: number;
    ineligible: number;
    partial: number;
}

export interface RunSummary extends CampaignRunStats {
    name: string;
    durationSeconds: number;
    successRate: string;
    partialFailures: PartialTransitionFailure[];
}

export class RunStats {
    private counters: CampaignRunStats = {
        attempted: 0,
        succeeded: 0,
        failed: 0,
        ineligible: 0,
        partial: 0,
    };
    private partialFailures: PartialTransitionFailure[] = [];
    private readonly startTime: number;

    constructor(
        private readonly name: string,
        private readonly clock: Clock = systemClock,
    ) {
        this.startTime = clock.now().getTime();
    }

    increment(metric: keyof CampaignRunStats, amount: number = 1) {
        this.counters[metric] += amount;
    }

    /**
     * Tally one record. Partial transitions count as failed as well as partial:
     * the record did not fully advance. Half-written children are kept for
     * reconciliation even when another child of the record failed outright.
     */
    record(outcome: RecordOutcome) {
        this.increment('attempted');
        switch (outcome.status) {
            case 'succeeded':
                this.increment('succeeded');
                break;
            case 'ineligible':
                this.increment('ineligible');
                break;
            case 'partial':
                this.increment('failed');
                this.increment('partial');
                break;
            case 'failed':
                this.increment('failed');
                break;
        }
        this.partialFailures.push(...halfWrittenChildren(outcome));
    }

    getSummary(): RunSummary {
        const durationSeconds = Math.floor((this.clock.now().getTime() - this.startTime) / 1000);
        return {
            name: this.name,
            ...this.counters,
            durationSeconds,
            successRate: this.calculateSuccessRate(),
            partialFailures: [...this.partialFailures],
        };
    }

    private calculateSuccessRate(): string {
        if (this.counters.attempted === 0) return '0%';
        return `${((this.counters.succeeded / this.counters.attempted) * 100).toFixed(1)}%`;
    }

    logSummary() {
        const { partialFailures, ...summary } = this.getSummary();
        logger.info(`📊 ${this.name} summary`, { metadata: summary });
        for (const failure of partialFailures) {
            logger.warn(`Needs reconciliation: opportunity ${failure.childId} on lead ${failure.leadId} moved ${failure.from} → ${failure.to} but the lead write failed`);
        }
    }
}
