import type { CloseClient } from '../../tools/close.js';
import type { Registry } from '../../config/registry.js';
import { createStageMachine, followUpTable, roundOneTable } from '../../campaign/stages.js';
import { ErrorStageRouter, StageTransitionEngine, type SelectionPolicy } from '../../campaign/engine.js';
import { RecordResolver } from '../../campaign/resolver.js';
import { runCampaign } from '../../orchestrator.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { RunSummary } from '../../utils/metrics.js';
import type { LeadRef, RecordOutcome, SearchQuery } from '../../types/index.js';

export type MailerRound = 'round-one' | 'follow-up';

export interface MailerRoundsConfig {
    close: CloseClient;
    registry: Registry;
    clock?: Clock;
    delayBetweenRecordsMs?: number;
    pageDelayMs?: number;
}

const ROUND_LABELS: Record<MailerRound, string> = {
    'round-one': 'Round one mailers',
    'follow-up': 'Follow-up mailers',
};

/**
 * Moves opportunities through the mailer rounds.
 *
 * - round-one: the first Unpaid opportunity of each lead goes to Round 1
 * - follow-up: every Round 1 / Round 2 opportunity moves up one round
 */
export class MailerRoundsAgent {
    private readonly close: CloseClient;
    private readonly registry: Registry;
    private readonly clock: Clock;
    private readonly resolver: RecordResolver;
    private readonly errorRoute: ErrorStageRouter;

    constructor(private readonly config: MailerRoundsConfig) {
        this.close = config.close;
        this.registry = config.registry;
        this.clock = config.clock ?? systemClock;
        this.resolver = new RecordResolver(this.close);
        this.errorRoute = new ErrorStageRouter(this.close, this.registry.leadStatuses.error, 'Mailer Error', this.clock);
    }

    async run(round: MailerRound, query: SearchQuery): Promise<RunSummary> {
        const table = round === 'round-one' ? roundOneTable(this.registry) : followUpTable(this.registry);
        const machine = createStageMachine(round, this.registry.opportunityStatuses, table);
        const selection: SelectionPolicy = round === 'round-one' ? { kind: 'first' } : { kind: 'each' };

        const engine = new StageTransitionEngine({
            machine,
            selection,
            writer: this.close,
            errorRoute: this.errorRoute,
            clock: this.clock,
        });

        logger.info(`${ROUND_LABELS[round]}: fetching leads`);
        const leads = await this.close.searchAll(query, {
            pageDelayMs: this.config.pageDelayMs,
            onPage: (_page, total) => logger.debug(`Fetched ${total} leads so far`),
        });

        return runCampaign<LeadRef>({
            name: ROUND_LABELS[round],
            records: leads,
            clock: this.clock,
            delayBetweenRecordsMs: this.config.delayBetweenRecordsMs,
            describe: lead => `${lead.id} (${lead.displayName || 'Unknown'})`,
            process: async (lead): Promise<RecordOutcome> => {
                const resolved = await this.resolver.resolveLead(lead, {
                    // Search hits without a status still need their detail read
                    childFilter: child => child.statusId === undefined || machine.ruleFor(child.statusId) !== undefined,
                });
                if (!resolved) {
                    return { status: 'failed', leadId: lead.id, reason: 'No data found', transitions: [], routedToError: false };
                }
                return engine.advance(resolved);
            },
            onUnexpectedError: async (lead, error) => {
                await this.errorRoute.route(lead.id, errorMessage(error));
            },
        });
    }
}
