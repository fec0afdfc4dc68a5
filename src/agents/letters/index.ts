import type { CloseClient } from '../../tools/close.js';
import type { PostGridClient } from '../../tools/postgrid.js';
import { customKey, type Registry } from '../../config/registry.js';
import { ErrorStageRouter } from '../../campaign/engine.js';
import { runCampaign } from '../../orchestrator.js';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { formatCrmDate } from '../../utils/dates.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { RunSummary } from '../../utils/metrics.js';
import type { LeadRef, Opportunity, RecordOutcome, SearchQuery } from '../../types/index.js';
import { assembleLetter, roundStageOf, toLetterRequest, validateLetter } from './letter-data.js';

export interface LettersConfig {
    close: CloseClient;
    postgrid: PostGridClient;
    registry: Registry;
    clock?: Clock;
    delayBetweenRecordsMs?: number;
    pageDelayMs?: number;
}

/**
 * Prints and mails the collection letter for each lead in a mailer round.
 * A lead that cannot be mailed is moved to Error with a note saying why.
 */
export class LettersAgent {
    private readonly clock: Clock;
    private readonly errorRoute: ErrorStageRouter;

    constructor(private readonly config: LettersConfig) {
        this.clock = config.clock ?? systemClock;
        this.errorRoute = new ErrorStageRouter(config.close, config.registry.leadStatuses.error, 'PostGrid Error', this.clock);
    }

    async run(query: SearchQuery): Promise<RunSummary> {
        logger.info('Letters: fetching leads');
        const leads = await this.config.close.searchAll(query, { pageDelayMs: this.config.pageDelayMs });

        return runCampaign<LeadRef>({
            name: 'Letters',
            records: leads,
            clock: this.clock,
            delayBetweenRecordsMs: this.config.delayBetweenRecordsMs,
            process: lead => this.sendLetter(lead.id),
            onUnexpectedError: async (lead, error) => {
                await this.errorRoute.route(lead.id, errorMessage(error));
            },
        });
    }

    async sendLetter(leadId: string): Promise<RecordOutcome> {
        const { close, postgrid, registry } = this.config;

        const lead = await close.getLead(leadId);
        const opportunities = await close.listOpportunities(leadId);
        if (!lead.found || !opportunities.found) {
            return this.fail(leadId, 'No data found');
        }

        const opportunity = await this.roundOpportunity(opportunities.record);
        const letter = assembleLetter(lead.record, opportunity, registry);

        const problem = validateLetter(letter);
        if (problem) {
            return this.fail(leadId, problem);
        }

        const today = formatCrmDate(this.clock.now());
        const result = await postgrid.createLetter(toLetterRequest(letter, today));
        if (!result.success) {
            return this.fail(leadId, `Error ${result.status ?? 'Unknown'} - ${result.error}`);
        }

        const update = await close.updateLead(leadId, { [customKey(registry.leadFields.letterSendDate)]: today });
        if (!update.ok) {
            const message = `letter ${result.letterId} sent but the send date was not saved (${update.status})`;
            logger.warn(`Lead ${leadId}: ${message}`);
            return {
                status: 'partial',
                leadId,
                transitions: [{ childId: result.letterId, from: 'unsent', to: 'sent', childOk: true, parentOk: false, message }],
                failures: [{ leadId, childId: result.letterId, from: 'unsent', to: 'sent', childOk: true, parentOk: false, message }],
            };
        }

        return { status: 'succeeded', leadId, transitions: [], message: `letter ${result.letterId}` };
    }

    /** First opportunity in a mailer round, with its detail when it can be read. */
    private async roundOpportunity(opportunities: Opportunity[]): Promise<Opportunity | undefined> {
        const listed = opportunities.find(opportunity => roundStageOf(opportunity.statusId, this.config.registry) !== undefined);
        if (!listed) return undefined;

        const detail = await this.config.close.getOpportunity(listed.id);
        if (!detail.found) return listed;
        return { ...detail.record, statusId: detail.record.statusId ?? listed.statusId, valueFormatted: detail.record.valueFormatted ?? listed.valueFormatted };
    }

    private async fail(leadId: string, message: string): Promise<RecordOutcome> {
        const routed = await this.errorRoute.route(leadId, message);
        return { status: 'failed', leadId, reason: message, transitions: [], routedToError: routed.statusOk };
    }
}
