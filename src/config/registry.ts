import { z } from 'zod';
import { loadJsonFile, type Config } from './index.js';
import { logger } from '../utils/logger.js';

/**
 * Field and status registry: semantic name → CRM id.
 *
 * Built once from config/registry.json. Code never spells a `cf_` or `stat_`
 * id inline; it goes through this object.
 */

const FieldId = z.string().regex(/^cf_/, 'custom field ids start with cf_');
const StatusId = z.string().regex(/^stat_/, 'status ids start with stat_');
const TemplateId = z.string().min(1);

export const RegistrySchema = z.object({
    opportunityFields: z.object({
        citationNumber: FieldId,
        citationDate: FieldId,
        citationTime: FieldId,
        lotAddress: FieldId,
        lotUid: FieldId,
        citationImageUrl: FieldId,
        fineAmount: FieldId,
        serviceFee: FieldId,
        mailerDates: FieldId,
        template: FieldId,
    }),
    leadFields: z.object({
        lastMailDate: FieldId,
        letterSendDate: FieldId,
        assignedRep: FieldId,
    }),
    // Lead custom fields read by display name from the lead's `custom` object
    leadCustomNames: z.object({
        mailingAddress: z.string().min(1),
        lastMailDate: z.string().min(1),
        make: z.string().min(1),
        model: z.string().min(1),
    }),
    secondaryLeadFields: z.object({
        lotUid: FieldId,
    }),
    opportunityStatuses: z.object({
        unpaid: StatusId,
        hold: StatusId,
        round_1: StatusId,
        round_2: StatusId,
        round_3: StatusId,
    }),
    leadStatuses: z.object({
        error: StatusId,
    }),
    templates: z.object({
        round_1: TemplateId,
        round_2: TemplateId,
        round_3: TemplateId,
    }),
});

export type Registry = z.infer<typeof RegistrySchema>;
export type OpportunityStage = keyof Registry['opportunityStatuses'];

export function loadRegistry(config: Config): Registry {
    return loadJsonFile(config.paths.registry, RegistrySchema, 'field registry');
}

/** `custom.cf_...`: the key a field takes in update bodies and detail responses. */
export function customKey(fieldId: string): string {
    return `custom.${fieldId}`;
}

export interface CustomFieldSource {
    listCustomFields(objectType: 'lead' | 'opportunity'): Promise<{ found: true; record: { id: string }[] } | { found: false }>;
}

export interface RegistryCheck {
    checked: boolean;
    unknownFields: string[];
}

/**
 * Compare the registry's field ids with the account's custom field schema.
 * Unknown ids are logged, not fatal: the schema endpoint may be unavailable to
 * a restricted key.
 */
export async function validateRegistry(registry: Registry, source: CustomFieldSource): Promise<RegistryCheck> {
    const leadFields = await source.listCustomFields('lead');
    const opportunityFields = await source.listCustomFields('opportunity');

    if (!leadFields.found || !opportunityFields.found) {
        logger.warn('Could not fetch the custom field schema; skipping registry validation');
        return { checked: false, unknownFields: [] };
    }

    const knownLead = new Set(leadFields.record.map(field => field.id));
    const knownOpportunity = new Set(opportunityFields.record.map(field => field.id));

    const unknownFields = [
        ...Object.entries(registry.leadFields)
            .filter(([, id]) => !knownLead.has(id))
            .map(([name, id]) => `lead.${name} (${id})`),
        ...Object.entries(registry.opportunityFields)
            .filter(([, id]) => !knownOpportunity.has(id))
            .map(([name, id]) => `opportunity.${name} (${id})`),
    ];

    for (const field of unknownFields) {
        logger.warn(`Registry field not found in CRM schema: ${field}`);
    }
    return { checked: true, unknownFields };
}
