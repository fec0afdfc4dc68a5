import type { CloseClient } from '../../tools/close.js';
import type { Registry } from '../../config/registry.js';
import { createStageMachine, holdsTable } from '../../campaign/stages.js';
import { StageTransitionEngine } from '../../campaign/engine.js';
import { RecordResolver } from '../../campaign/resolver.js';
import { runCampaign } from '../../orchestrator.js';
import { logger } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { RunSummary } from '../../utils/metrics.js';
import type { LeadRef, RecordOutcome, SearchQuery } from '../../types/index.js';

export interface HoldsConfig {
    close: CloseClient;
    registry: Registry;
    clock?: Clock;
    delayBetweenRecordsMs?: number;
    pageDelayMs?: number;
}

/**
 * Releases one held citation per lead: the Hold opportunity with the oldest
 * citation date goes back to Unpaid.
 */
export class HoldsAgent {
    private readonly clock: Clock;

    constructor(private readonly config: HoldsConfig) {
        this.clock = config.clock ?? systemClock;
    }

    async run(query: SearchQuery): Promise<RunSummary> {
        const { close, registry } = this.config;
        const holdStatusId = registry.opportunityStatuses.hold;

        const machine = createStageMachine('holds', registry.opportunityStatuses, holdsTable());
        const engine = new StageTransitionEngine({
            machine,
            selection: { kind: 'oldest', fieldId: registry.opportunityFields.citationDate },
            writer: close,
            clock: this.clock,
        });
        const resolver = new RecordResolver(close);

        logger.info('Holds: fetching leads');
        const leads = await close.searchAll(query, { pageDelayMs: this.config.pageDelayMs });

        return runCampaign<LeadRef>({
            name: 'Release holds',
            records: leads,
            clock: this.clock,
            delayBetweenRecordsMs: this.config.delayBetweenRecordsMs,
            describe: lead => lead.displayName || lead.id,
            process: async (lead): Promise<RecordOutcome> => {
                const resolved = await resolver.resolveLead(lead, {
                    childFilter: child => child.statusId === holdStatusId,
                });
                if (!resolved) {
                    return { status: 'failed', leadId: lead.id, reason: 'No data found', transitions: [], routedToError: false };
                }
                return engine.advance(resolved);
            },
        });
    }
}
