import type { CloseClient } from '../../tools/close.js';
import { customKey, type Registry } from '../../config/registry.js';
import { loadQuery } from '../../config/index.js';
import { createCloseClient, type Runtime } from '../../bootstrap.js';
import { CrossAccountLookup, RecordResolver, formatBusinessAddress } from '../../campaign/resolver.js';
import { runCampaign } from '../../orchestrator.js';
import { logger } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { RunSummary } from '../../utils/metrics.js';
import type { FieldValue, LeadRef, Opportunity, RecordOutcome, SearchQuery } from '../../types/index.js';

export interface MissingLotConfig {
    close: CloseClient;
    /** The account that holds the lots, searched by lot UID */
    secondary: CloseClient;
    registry: Registry;
    clock?: Clock;
    delayBetweenRecordsMs?: number;
    pageDelayMs?: number;
}

function filled(value: FieldValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
}

type LotFill =
    | { kind: 'skipped'; reason: string }
    | { kind: 'updated'; address: string }
    | { kind: 'failed'; reason: string };

/**
 * Fills in the lot address of opportunities that lack one, using the
 * business address of the lot's record in the secondary account.
 */
export class MissingLotAgent {
    private readonly clock: Clock;
    private readonly resolver: RecordResolver;
    private readonly lookup: CrossAccountLookup;

    constructor(private readonly config: MissingLotConfig) {
        this.clock = config.clock ?? systemClock;
        this.resolver = new RecordResolver(config.close);
        this.lookup = new CrossAccountLookup(config.secondary, config.registry.secondaryLeadFields.lotUid);
    }

    async run(query: SearchQuery): Promise<RunSummary> {
        logger.info('Missing lot addresses: fetching leads');
        const leads = await this.config.close.searchAll(query, { pageDelayMs: this.config.pageDelayMs });

        return runCampaign<LeadRef>({
            name: 'Missing lot addresses',
            records: leads,
            clock: this.clock,
            delayBetweenRecordsMs: this.config.delayBetweenRecordsMs,
            describe: lead => lead.displayName || lead.id,
            process: lead => this.fillLead(lead),
        });
    }

    async fillLead(ref: LeadRef): Promise<RecordOutcome> {
        const resolved = await this.resolver.resolveLead(ref);
        if (!resolved) {
            return { status: 'failed', leadId: ref.id, reason: 'No data found', transitions: [], routedToError: false };
        }

        let updated = 0;
        const failures: string[] = [];
        const skipped: string[] = [];

        for (const opportunity of resolved.opportunities) {
            const fill = await this.fillOpportunity(opportunity);
            if (fill.kind === 'updated') {
                updated++;
                logger.info(`Updated opportunity ${opportunity.id} - added lot address: ${fill.address}`);
            } else if (fill.kind === 'failed') {
                failures.push(fill.reason);
            } else {
                skipped.push(fill.reason);
            }
        }

        if (failures.length > 0) {
            return { status: 'failed', leadId: ref.id, reason: failures.join('; '), transitions: [], routedToError: false };
        }
        if (updated === 0) {
            return { status: 'ineligible', leadId: ref.id, reason: skipped.join('; ') || 'no opportunities' };
        }
        return { status: 'succeeded', leadId: ref.id, transitions: [], message: `${updated} lot address(es) filled` };
    }

    private async fillOpportunity(opportunity: Opportunity): Promise<LotFill> {
        const { opportunityFields } = this.config.registry;

        if (filled(opportunity.fields[opportunityFields.lotAddress])) {
            return { kind: 'skipped', reason: `${opportunity.id} already has a lot address` };
        }

        const lotUid = filled(opportunity.fields[opportunityFields.lotUid]);
        if (!lotUid) {
            return { kind: 'skipped', reason: `${opportunity.id} is missing both lot address and lot UID` };
        }

        const lot = await this.lookup.findFirst(lotUid);
        const address = lot ? formatBusinessAddress(lot.addresses) : null;
        if (!address) {
            return { kind: 'skipped', reason: `no business address found for lot UID ${lotUid}` };
        }

        const result = await this.config.close.updateOpportunity(opportunity.id, {
            [customKey(opportunityFields.lotAddress)]: address,
        });
        if (!result.ok) {
            return { kind: 'failed', reason: `update of ${opportunity.id} failed (${result.status})` };
        }
        opportunity.fields[opportunityFields.lotAddress] = address;
        return { kind: 'updated', address };
    }
}

export async function runMissingLot(runtime: Runtime, queryName: string = 'missing-lot'): Promise<RunSummary> {
    const agent = new MissingLotAgent({
        close: createCloseClient(runtime, 'primary'),
        secondary: createCloseClient(runtime, 'secondary'),
        registry: runtime.registry,
        clock: runtime.clock,
    });
    return agent.run(loadQuery(runtime.config, queryName));
}
