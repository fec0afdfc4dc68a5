import { z } from 'zod';

// ============================================================================
// Raw CRM payloads
// ============================================================================

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export type FieldValue = z.infer<typeof FieldValueSchema>;

/**
 * Custom field values keyed by field id (`cf_...`). Sparse: a missing key means
 * "not set", which is not the same as an empty string.
 */
export type CustomFields = Record<string, FieldValue>;

/** Body of a partial update, keyed the way the CRM expects (`status_id`, `custom.cf_...`). */
export type FieldPatch = Record<string, FieldValue>;

/** Structured search document. Opaque apart from `cursor`, `limit` and `_fields`. */
export type SearchQuery = Record<string, unknown>;

export const OpportunityRefSchema = z.object({
    id: z.string(),
    status_id: z.string().nullish(),
    status_label: z.string().nullish(),
}).passthrough();

export const LeadRefSchema = z.object({
    id: z.string(),
    display_name: z.string().nullish(),
    opportunities: z.array(OpportunityRefSchema).nullish(),
}).passthrough();

export const SearchResponseSchema = z.object({
    data: z.array(z.unknown()).nullish(),
    cursor: z.string().nullish(),
}).passthrough();

export const AddressSchema = z.object({
    label: z.string().nullish(),
    address_1: z.string().nullish(),
    address_2: z.string().nullish(),
    city: z.string().nullish(),
    state: z.string().nullish(),
    zipcode: z.string().nullish(),
    country: z.string().nullish(),
}).passthrough();
export type Address = z.infer<typeof AddressSchema>;

export const ContactSchema = z.object({
    id: z.string(),
    display_name: z.string().nullish(),
    name: z.string().nullish(),
    emails: z.array(z.object({ email: z.string().nullish() }).passthrough()).nullish(),
}).passthrough();
export type Contact = z.infer<typeof ContactSchema>;

export const LeadDetailSchema = z.object({
    id: z.string(),
    display_name: z.string().nullish(),
    name: z.string().nullish(),
    status_id: z.string().nullish(),
    contacts: z.array(ContactSchema).nullish(),
    addresses: z.array(AddressSchema).nullish(),
    opportunities: z.array(OpportunityRefSchema).nullish(),
    custom: z.record(z.unknown()).nullish(),
}).passthrough();

export const OpportunityDetailSchema = z.object({
    id: z.string(),
    lead_id: z.string().nullish(),
    status_id: z.string().nullish(),
    status_label: z.string().nullish(),
    display_name: z.string().nullish(),
    value_formatted: z.string().nullish(),
}).passthrough();

export const ListResponseSchema = z.object({
    data: z.array(z.unknown()).nullish(),
}).passthrough();

export const EmailAccountSchema = z.object({
    id: z.string(),
    email: z.string().nullish(),
}).passthrough();
export type EmailAccount = z.infer<typeof EmailAccountSchema>;

export const CustomFieldDefinitionSchema = z.object({
    id: z.string(),
    name: z.string().nullish(),
}).passthrough();
export type CustomFieldDefinition = z.infer<typeof CustomFieldDefinitionSchema>;

export const UploadTargetSchema = z.object({
    upload: z.object({
        url: z.string(),
        fields: z.record(z.string()),
    }),
    download: z.object({
        url: z.string(),
    }),
});
export type UploadTarget = z.infer<typeof UploadTargetSchema>;

export const ActivityReportRowSchema = z.object({
    user_id: z.string().nullish(),
}).catchall(z.union([z.number(), z.string(), z.null()]));
export type ActivityReportRow = z.infer<typeof ActivityReportRowSchema>;

// ============================================================================
// Domain records
// ============================================================================

export interface OpportunityRef {
    id: string;
    statusId?: string;
    statusLabel?: string;
}

export interface LeadRef {
    id: string;
    displayName: string;
    opportunities: OpportunityRef[];
}

export interface Opportunity extends OpportunityRef {
    leadId?: string;
    displayName?: string;
    valueFormatted?: string;
    fields: CustomFields;
}

export interface Lead {
    id: string;
    displayName: string;
    name: string;
    statusId?: string;
    contacts: Contact[];
    addresses: Address[];
    opportunities: OpportunityRef[];
    /** Custom fields by id. */
    fields: CustomFields;
    /** Custom fields by display name, as the `custom` object returns them. */
    custom: CustomFields;
}

/** A lead with the child opportunities a transition needs, each with full detail. */
export interface ResolvedLead {
    id: string;
    displayName: string;
    lead: Lead;
    opportunities: Opportunity[];
}

// ============================================================================
// Transition outcomes
// ============================================================================

export interface ChildTransition {
    childId: string;
    from: string;
    to: string;
    childOk: boolean;
    /** null when the transition declares no parent write */
    parentOk: boolean | null;
    message?: string;
}

/** Child write succeeded, parent write failed: the record is half-advanced remotely. */
export interface PartialTransitionFailure {
    leadId: string;
    childId: string;
    from: string;
    to: string;
    childOk: true;
    parentOk: false;
    message: string;
}

export type RecordOutcome =
    | { status: 'succeeded'; leadId: string; transitions: ChildTransition[]; message?: string }
    | { status: 'ineligible'; leadId: string; reason: string }
    | { status: 'partial'; leadId: string; transitions: ChildTransition[]; failures: PartialTransitionFailure[] }
    | {
        status: 'failed';
        leadId: string;
        reason: string;
        transitions: ChildTransition[];
        routedToError: boolean;
        /** Other children of the same record left half-written before or after the failing one */
        failures?: PartialTransitionFailure[];
    };

export type RecordStatus = RecordOutcome['status'];

/** Every half-written child an outcome reports, whatever its status. */
export function halfWrittenChildren(outcome: RecordOutcome): PartialTransitionFailure[] {
    switch (outcome.status) {
        case 'partial':
            return outcome.failures;
        case 'failed':
            return outcome.failures ?? [];
        default:
            return [];
    }
}
