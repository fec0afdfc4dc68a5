import type { CloseClient } from '../tools/close.js';
import { logger } from '../utils/logger.js';
import type { Address, Lead, LeadRef, Opportunity, OpportunityRef, ResolvedLead, SearchQuery } from '../types/index.js';

export type RecordReader = Pick<CloseClient, 'getLead' | 'getOpportunity'>;

export interface ResolveOptions {
    /** Only children passing this filter have their detail fetched */
    childFilter?: (child: OpportunityRef) => boolean;
}

/**
 * Turns a search hit into the full records a transition needs: the lead
 * detail, then the detail of each child opportunity in listed order.
 */
export class RecordResolver {
    constructor(private readonly crm: RecordReader) {}

    /** null when the lead detail cannot be read ("no data"). */
    async resolveLead(ref: LeadRef, options: ResolveOptions = {}): Promise<ResolvedLead | null> {
        const detail = await this.crm.getLead(ref.id);
        if (!detail.found) {
            logger.warn(`No data for lead ${ref.id} (${detail.reason})`);
            return null;
        }

        const lead = detail.record;
        const children = lead.opportunities.length > 0 ? lead.opportunities : ref.opportunities;
        const opportunities: Opportunity[] = [];

        for (const child of children) {
            if (options.childFilter && !options.childFilter(child)) continue;

            const opportunity = await this.crm.getOpportunity(child.id);
            if (!opportunity.found) {
                logger.warn(`Skipping opportunity ${child.id} of lead ${ref.id} (${opportunity.reason})`);
                continue;
            }
            opportunities.push(opportunity.record);
        }

        return {
            id: lead.id,
            displayName: lead.displayName || ref.displayName,
            lead,
            opportunities,
        };
    }
}

export type SecondaryReader = Pick<CloseClient, 'search' | 'getLead'>;

/** Search for leads whose text field `fieldId` has a word starting with `value`. */
export function buildFieldPrefixQuery(fieldId: string, value: string, limit: number = 10): SearchQuery {
    return {
        limit,
        query: {
            negate: false,
            type: 'and',
            queries: [
                { negate: false, object_type: 'lead', type: 'object_type' },
                {
                    negate: false,
                    type: 'field_condition',
                    field: { type: 'custom_field', custom_field_id: fieldId },
                    condition: { type: 'text', mode: 'beginning_of_words', value },
                },
            ],
        },
        results_limit: null,
        sort: [],
        _fields: { lead: ['id', 'display_name'] },
    };
}

/** Looks a record up in a second CRM account by a shared key field. */
export class CrossAccountLookup {
    constructor(
        private readonly secondary: SecondaryReader,
        private readonly keyFieldId: string,
    ) {}

    async findFirst(key: string | undefined): Promise<Lead | null> {
        const value = key?.trim();
        if (!value) return null;

        const result = await this.secondary.search(buildFieldPrefixQuery(this.keyFieldId, value));
        if (!result.ok) {
            logger.error(`Secondary account search failed for ${value}: ${result.message}`);
            return null;
        }

        const first = result.page.items[0];
        if (!first) return null;

        const detail = await this.secondary.getLead(first.id);
        if (!detail.found) {
            logger.error(`Could not read secondary lead ${first.id} (${detail.reason})`);
            return null;
        }
        return detail.record;
    }
}

function formatAddress(address: Address): string {
    const parts: string[] = [];
    if (address.address_1) parts.push(address.address_1);
    if (address.address_2) parts.push(address.address_2);
    if (address.city) {
        const cityLine = [address.city, address.state, address.zipcode].filter((part): part is string => Boolean(part));
        parts.push(cityLine.join(', '));
    }
    return parts.join(' ');
}

/** The `business` address if the lead has one, else its first address. */
export function formatBusinessAddress(addresses: Address[]): string | null {
    const business = addresses.find(address => address.label?.toLowerCase() === 'business');
    const chosen = business ?? addresses[0];
    if (!chosen) return null;

    const formatted = formatAddress(chosen);
    return formatted || null;
}
