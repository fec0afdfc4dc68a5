import type { CloseClient } from '../../tools/close.js';
import type { SalesRep } from '../../config/index.js';
import { customKey, type Registry } from '../../config/registry.js';
import { runCampaign } from '../../orchestrator.js';
import { logger, logSuccess } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { LeadRef, RecordOutcome, SearchQuery } from '../../types/index.js';

export interface AssignmentConfig {
    close: CloseClient;
    registry: Registry;
    reps: SalesRep[];
    clock?: Clock;
    /** Leads each rep should hold (default: 400) */
    target?: number;
    writeDelayMs?: number;
    repDelayMs?: number;
    pageDelayMs?: number;
}

export interface RepAssignment {
    name: string;
    userId: string;
    has: number;
    needs: number;
    assigned: number;
    /** Share of the target that had to be topped up, as a whole percentage */
    workedPercent: number;
}

const DEFAULT_TARGET = 400;
const DEFAULT_WRITE_DELAY_MS = 200;
const DEFAULT_REP_DELAY_MS = 1000;
const MAX_PAGE_LIMIT = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy of `query` with `userId` placed in the first field condition on
 * `fieldId`. The query is walked through nested `queries` lists.
 */
export function injectRepId(query: SearchQuery, fieldId: string, userId: string): SearchQuery {
    const copy = structuredClone(query);

    const visit = (node: unknown): boolean => {
        if (!isRecord(node)) return false;

        const field = node.field;
        const condition = node.condition;
        if (node.type === 'field_condition' && isRecord(field) && field.custom_field_id === fieldId && isRecord(condition)) {
            condition.object_ids = [userId];
            return true;
        }

        const children = node.queries;
        if (Array.isArray(children)) {
            return children.some(child => visit(child));
        }
        return false;
    };

    if (!visit(copy.query)) {
        logger.warn(`No condition on field ${fieldId} in the counting query; counting every lead`);
    }
    return copy;
}

export function leadsNeeded(has: number, target: number): number {
    return Math.max(0, target - has);
}

export function workedPercent(needed: number, target: number): number {
    return target > 0 ? Math.round((needed / target) * 100) : 0;
}

/**
 * Tops every rep up to the target from the reservoir of unassigned leads.
 * Reps are handled one after another, so each one sees what the previous
 * one left in the reservoir.
 */
export class AssignmentAgent {
    private readonly clock: Clock;
    private readonly target: number;

    constructor(private readonly config: AssignmentConfig) {
        this.clock = config.clock ?? systemClock;
        this.target = config.target ?? DEFAULT_TARGET;
    }

    async run(countQuery: SearchQuery, reservoirQuery: SearchQuery): Promise<RepAssignment[]> {
        const rows: RepAssignment[] = [];
        const { reps } = this.config;

        for (const [index, rep] of reps.entries()) {
            logger.info(`Processing ${rep.name}...`);
            rows.push(await this.assignRep(rep, countQuery, reservoirQuery));

            if (index < reps.length - 1) {
                await this.clock.sleep(this.config.repDelayMs ?? DEFAULT_REP_DELAY_MS);
            }
        }
        return rows;
    }

    async countLeads(rep: SalesRep, countQuery: SearchQuery): Promise<number> {
        const query = injectRepId(countQuery, this.config.registry.leadFields.assignedRep, rep.userId);
        const leads = await this.config.close.searchAll(query, { pageDelayMs: this.config.pageDelayMs });
        return leads.length;
    }

    private async assignRep(rep: SalesRep, countQuery: SearchQuery, reservoirQuery: SearchQuery): Promise<RepAssignment> {
        const has = await this.countLeads(rep, countQuery);
        const needs = leadsNeeded(has, this.target);
        const row: RepAssignment = {
            name: rep.name,
            userId: rep.userId,
            has,
            needs,
            assigned: 0,
            workedPercent: workedPercent(needs, this.target),
        };
        if (needs === 0) return row;

        logger.info(`Assigning ${needs} leads to ${rep.name}...`);
        const leads = await this.pullFromReservoir(reservoirQuery, needs);
        const fieldKey = customKey(this.config.registry.leadFields.assignedRep);

        const summary = await runCampaign<LeadRef>({
            name: `Assign to ${rep.name}`,
            records: leads,
            clock: this.clock,
            delayBetweenRecordsMs: this.config.writeDelayMs ?? DEFAULT_WRITE_DELAY_MS,
            process: async (lead): Promise<RecordOutcome> => {
                const result = await this.config.close.updateLead(lead.id, { [fieldKey]: rep.userId });
                return result.ok
                    ? { status: 'succeeded', leadId: lead.id, transitions: [] }
                    : { status: 'failed', leadId: lead.id, reason: `update failed (${result.status})`, transitions: [], routedToError: false };
            },
        });

        row.assigned = summary.succeeded;
        logSuccess(`Assigned ${row.assigned} leads to ${rep.name}`);
        return row;
    }

    private async pullFromReservoir(reservoirQuery: SearchQuery, needed: number): Promise<LeadRef[]> {
        const query = structuredClone(reservoirQuery);
        if (query.limit === undefined || query.limit === null) {
            query.limit = Math.min(MAX_PAGE_LIMIT, needed);
        }
        const leads = await this.config.close.searchAll(query, { target: needed, pageDelayMs: this.config.pageDelayMs });
        return leads.slice(0, needed);
    }
}

/** `Name | Has | Needs | Assigned | Worked%` table for the console. */
export function formatAssignmentTable(rows: RepAssignment[]): string {
    const line = '-'.repeat(70);
    const header = `${'Name'.padEnd(20)} ${'Has'.padEnd(8)} ${'Needs'.padEnd(8)} ${'Assigned'.padEnd(10)} ${'Worked'.padEnd(8)}`;
    const body = rows.map(row =>
        `${row.name.padEnd(20)} ${String(row.has).padEnd(8)} ${String(row.needs).padEnd(8)} ${String(row.assigned).padEnd(10)} ${row.workedPercent}%`,
    );
    return [line, header, line, ...body, line].join('\n');
}
