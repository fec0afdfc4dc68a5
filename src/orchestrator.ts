import { logger, logSuccess } from './utils/logger.js';
import { RunStats, type RunSummary } from './utils/metrics.js';
import { errorMessage } from './utils/errors.js';
import { systemClock, type Clock } from './utils/retry.js';
import { halfWrittenChildren, type PartialTransitionFailure, type RecordOutcome } from './types/index.js';

export interface CampaignRunOptions<T> {
    name: string;
    /** Records in pagination order */
    records: T[];
    process: (record: T) => Promise<RecordOutcome>;
    /** Label for status lines (default: the record's id) */
    describe?: (record: T) => string;
    clock?: Clock;
    delayBetweenRecordsMs?: number;
    /** Called for every child/parent pair left half-written */
    onPartial?: (failure: PartialTransitionFailure) => void;
    /** Called when `process` throws; the record is then counted as failed */
    onUnexpectedError?: (record: T, error: unknown) => Promise<void>;
}

const DEFAULT_DELAY_BETWEEN_RECORDS_MS = 1000;

function statusLine(outcome: RecordOutcome): string {
    switch (outcome.status) {
        case 'succeeded':
            return outcome.message ? `Success - ${outcome.message}` : 'Success';
        case 'ineligible':
            return `Skipped - ${outcome.reason}`;
        case 'partial':
            return `Partial - ${outcome.failures.length} lead update(s) failed after the opportunity moved`;
        case 'failed':
            return outcome.routedToError ? `Error - ${outcome.reason} (moved to Error)` : `Error - ${outcome.reason}`;
    }
}

/**
 * Process records one at a time, in order, and tally what happened.
 * A throw while processing one record is logged and counted; the run goes on.
 */
export async function runCampaign<T extends { id: string }>(options: CampaignRunOptions<T>): Promise<RunSummary> {
    const clock = options.clock ?? systemClock;
    const delayMs = options.delayBetweenRecordsMs ?? DEFAULT_DELAY_BETWEEN_RECORDS_MS;
    const describe = options.describe ?? ((record: T) => record.id);
    const stats = new RunStats(options.name, clock);
    const total = options.records.length;

    logger.info(`${options.name}: processing ${total} record(s)`);

    for (const [index, record] of options.records.entries()) {
        let outcome: RecordOutcome;
        try {
            outcome = await options.process(record);
        } catch (error) {
            const reason = errorMessage(error);
            logger.error(`${options.name}: unexpected error on ${record.id}`, { error });
            let routedToError = false;
            if (options.onUnexpectedError) {
                try {
                    await options.onUnexpectedError(record, error);
                    routedToError = true;
                } catch (routeError) {
                    logger.error(`${options.name}: could not route ${record.id} to Error: ${errorMessage(routeError)}`);
                }
            }
            outcome = { status: 'failed', leadId: record.id, reason, transitions: [], routedToError };
        }

        stats.record(outcome);
        for (const failure of halfWrittenChildren(outcome)) {
            options.onPartial?.(failure);
        }

        const line = `[${index + 1}/${total}] ${describe(record)}: ${statusLine(outcome)}`;
        if (outcome.status === 'succeeded') {
            logSuccess(line);
        } else if (outcome.status === 'ineligible') {
            logger.info(line);
        } else {
            logger.warn(line);
        }

        if (index < total - 1) {
            await clock.sleep(delayMs);
        }
    }

    stats.logSummary();
    return stats.getSummary();
}
