import { z } from 'zod';
import { RequestExecutor, type ApiRequest, type ExecuteResult } from './executor.js';
import { fetchAll, type Page } from './paginator.js';
import { logger } from '../utils/logger.js';
import { HttpStatusError } from '../utils/errors.js';
import { systemClock, withRetry, type Clock } from '../utils/retry.js';
import {
    ActivityReportRowSchema,
    ContactSchema,
    CustomFieldDefinitionSchema,
    EmailAccountSchema,
    FieldValueSchema,
    LeadDetailSchema,
    LeadRefSchema,
    ListResponseSchema,
    OpportunityDetailSchema,
    OpportunityRefSchema,
    SearchResponseSchema,
    UploadTargetSchema,
    type ActivityReportRow,
    type Contact,
    type CustomFieldDefinition,
    type CustomFields,
    type EmailAccount,
    type FieldPatch,
    type Lead,
    type LeadRef,
    type Opportunity,
    type OpportunityRef,
    type SearchQuery,
    type UploadTarget,
} from '../types/index.js';

/**
 * Close CRM client.
 *
 * Every call goes through the RequestExecutor and comes back as a tagged
 * result; nothing here throws on an HTTP failure.
 */

export type SearchResult<T> =
    | { ok: true; page: Page<T> }
    | { ok: false; status: number; message: string };

export type DetailResult<T> =
    | { found: true; record: T }
    | { found: false; reason: 'rejected' | 'malformed' | 'invalid' | 'empty'; status?: number };

export type WriteResult =
    | { ok: true; body?: unknown }
    | { ok: false; status: number; message: string };

export interface SearchAllOptions {
    target?: number;
    pageDelayMs?: number;
    onPage?: (page: Page<LeadRef>, total: number, pageNumber: number) => void;
}

export interface OutboundEmail {
    leadId: string;
    contactId?: string;
    to: string[];
    subject: string;
    bodyText: string;
    sender?: string;
    createdByName?: string;
    emailAccountId?: string;
    attachments?: { url: string; filename: string; contentType: string; size: number }[];
}

export interface ActivityReportRequest {
    start: string;
    end: string;
    users: string[];
    metrics: string[];
}

export interface CloseClientOptions {
    /** Used for the presigned upload, which does not go through the CRM executor */
    fetchFn?: typeof fetch;
    clock?: Clock;
}

const DEFAULT_SEARCH_FIELDS = { lead: ['id', 'display_name', 'opportunities'] };

const CreatedRecordSchema = z.object({ id: z.string() }).passthrough();

type OpportunityRefRaw = z.infer<typeof OpportunityRefSchema>;

function toOpportunityRef(raw: OpportunityRefRaw): OpportunityRef {
    return {
        id: raw.id,
        statusId: raw.status_id ?? undefined,
        statusLabel: raw.status_label ?? undefined,
    };
}

function toLeadRef(raw: z.infer<typeof LeadRefSchema>): LeadRef {
    return {
        id: raw.id,
        displayName: raw.display_name ?? '',
        opportunities: (raw.opportunities ?? []).map(toOpportunityRef),
    };
}

/** Multi-value custom fields come back as arrays; they are stored comma-joined. */
function toFieldValue(value: unknown): CustomFields[string] | undefined {
    const parsed = FieldValueSchema.safeParse(value);
    if (parsed.success) return parsed.data;
    if (Array.isArray(value)) {
        return value.map(item => String(item)).join(',');
    }
    return undefined;
}

/** Collect the `custom.cf_...` keys of a detail payload into a map keyed by field id. */
export function extractCustomFields(record: Record<string, unknown>): CustomFields {
    const fields: CustomFields = {};
    for (const [key, value] of Object.entries(record)) {
        if (!key.startsWith('custom.')) continue;
        const fieldValue = toFieldValue(value);
        if (fieldValue !== undefined) {
            fields[key.slice('custom.'.length)] = fieldValue;
        }
    }
    return fields;
}

function toNamedCustomFields(custom: Record<string, unknown> | null | undefined): CustomFields {
    const fields: CustomFields = {};
    for (const [name, value] of Object.entries(custom ?? {})) {
        const fieldValue = toFieldValue(value);
        if (fieldValue !== undefined) {
            fields[name] = fieldValue;
        }
    }
    return fields;
}

function toLead(raw: z.infer<typeof LeadDetailSchema>): Lead {
    return {
        id: raw.id,
        displayName: raw.display_name ?? '',
        name: raw.name ?? raw.display_name ?? '',
        statusId: raw.status_id ?? undefined,
        contacts: raw.contacts ?? [],
        addresses: raw.addresses ?? [],
        opportunities: (raw.opportunities ?? []).map(toOpportunityRef),
        fields: extractCustomFields(raw),
        custom: toNamedCustomFields(raw.custom),
    };
}

function toOpportunity(raw: z.infer<typeof OpportunityDetailSchema>): Opportunity {
    return {
        id: raw.id,
        leadId: raw.lead_id ?? undefined,
        statusId: raw.status_id ?? undefined,
        statusLabel: raw.status_label ?? undefined,
        displayName: raw.display_name ?? undefined,
        valueFormatted: raw.value_formatted ?? undefined,
        fields: extractCustomFields(raw),
    };
}

function parseItems<T, R>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, map: (raw: T) => R, label: string): R[] {
    const records: R[] = [];
    for (const item of items) {
        const parsed = schema.safeParse(item);
        if (parsed.success) {
            records.push(map(parsed.data));
        } else {
            logger.warn(`Skipping ${label} that does not match the expected shape`);
        }
    }
    return records;
}

export class CloseClient {
    private readonly fetchFn: typeof fetch;
    private readonly clock: Clock;

    constructor(
        private readonly executor: RequestExecutor,
        options: CloseClientOptions = {},
    ) {
        this.fetchFn = options.fetchFn ?? fetch;
        this.clock = options.clock ?? systemClock;
    }

    // ========================================================================
    // Search
    // ========================================================================

    async search(query: SearchQuery, cursor?: string): Promise<SearchResult<LeadRef>> {
        const body: SearchQuery = { ...query, cursor: cursor ?? null };
        const result = await this.executor.execute({ method: 'POST', path: '/data/search/', body, kind: 'read' });

        if (result.outcome === 'rejected') {
            return { ok: false, status: result.status, message: result.message };
        }
        if (result.outcome === 'malformed') {
            return { ok: true, page: { items: [] } };
        }

        const parsed = SearchResponseSchema.safeParse(result.body ?? {});
        if (!parsed.success) {
            logger.warn('Search response did not match the expected shape');
            return { ok: true, page: { items: [] } };
        }

        return {
            ok: true,
            page: {
                items: parseItems(parsed.data.data ?? [], LeadRefSchema, toLeadRef, 'search result'),
                cursor: parsed.data.cursor ?? undefined,
            },
        };
    }

    /**
     * Follow a saved search to its last page (or to `target` results).
     * A rejected page ends the walk with what was collected so far.
     */
    async searchAll(query: SearchQuery, options: SearchAllOptions = {}): Promise<LeadRef[]> {
        const base: SearchQuery = structuredClone(query);
        if (base._fields === undefined) {
            base._fields = DEFAULT_SEARCH_FIELDS;
        }

        return fetchAll<LeadRef>(
            async (cursor) => {
                const result = await this.search(base, cursor);
                if (!result.ok) {
                    logger.error(`Search failed with status ${result.status}: ${result.message}`);
                    return { items: [] };
                }
                return result.page;
            },
            { target: options.target, pageDelayMs: options.pageDelayMs, onPage: options.onPage, clock: this.clock },
        );
    }

    // ========================================================================
    // Reads
    // ========================================================================

    async getLead(leadId: string): Promise<DetailResult<Lead>> {
        const result = await this.executor.execute({ method: 'GET', path: `/lead/${leadId}/` });
        return this.toDetail(result, LeadDetailSchema, toLead, `lead ${leadId}`);
    }

    async getOpportunity(opportunityId: string): Promise<DetailResult<Opportunity>> {
        const result = await this.executor.execute({ method: 'GET', path: `/opportunity/${opportunityId}/` });
        return this.toDetail(result, OpportunityDetailSchema, toOpportunity, `opportunity ${opportunityId}`);
    }

    async listOpportunities(leadId: string): Promise<DetailResult<Opportunity[]>> {
        const result = await this.executor.execute({ method: 'GET', path: '/opportunity/', query: { lead_id: leadId } });
        return this.toList(result, OpportunityDetailSchema, toOpportunity, `opportunities of ${leadId}`);
    }

    async getContact(contactId: string): Promise<DetailResult<Contact>> {
        const result = await this.executor.execute({ method: 'GET', path: `/contact/${contactId}/` });
        return this.toDetail(result, ContactSchema, contact => contact, `contact ${contactId}`);
    }

    async listEmailAccounts(): Promise<DetailResult<EmailAccount[]>> {
        const result = await this.executor.execute({ method: 'GET', path: '/email_account/' });
        return this.toList(result, EmailAccountSchema, account => account, 'email accounts');
    }

    async listCustomFields(objectType: 'lead' | 'opportunity'): Promise<DetailResult<CustomFieldDefinition[]>> {
        const result = await this.executor.execute({ method: 'GET', path: `/custom_field/${objectType}/` });
        return this.toList(result, CustomFieldDefinitionSchema, field => field, `${objectType} custom fields`);
    }

    async activityReport(request: ActivityReportRequest): Promise<DetailResult<ActivityReportRow[]>> {
        const result = await this.executor.execute({
            method: 'POST',
            path: '/report/activity/',
            kind: 'read',
            body: {
                datetime_range: { start: request.start, end: request.end },
                users: request.users,
                type: 'comparison',
                metrics: request.metrics,
            },
        });
        return this.toList(result, ActivityReportRowSchema, row => row, 'activity report');
    }

    // ========================================================================
    // Writes
    // ========================================================================

    async updateLead(leadId: string, patch: FieldPatch): Promise<WriteResult> {
        return this.write({ method: 'PUT', path: `/lead/${leadId}/`, body: patch });
    }

    async updateOpportunity(opportunityId: string, patch: FieldPatch): Promise<WriteResult> {
        return this.write({ method: 'PUT', path: `/opportunity/${opportunityId}/`, body: patch });
    }

    async createNote(leadId: string, noteHtml: string): Promise<WriteResult> {
        return this.write({ method: 'POST', path: '/activity/note/', body: { lead_id: leadId, note_html: noteHtml } });
    }

    /** Queue an email in the outbox; returns the created activity id. */
    async sendEmail(email: OutboundEmail): Promise<DetailResult<{ id: string }>> {
        const body: Record<string, unknown> = {
            lead_id: email.leadId,
            direction: 'outbound',
            status: 'outbox',
            subject: email.subject,
            to: email.to,
            body_text: email.bodyText,
        };
        if (email.contactId) body.contact_id = email.contactId;
        if (email.sender) body.sender = email.sender;
        if (email.createdByName) body.created_by_name = email.createdByName;
        if (email.emailAccountId) body.email_account_id = email.emailAccountId;
        if (email.attachments) {
            body.attachments = email.attachments.map(attachment => ({
                url: attachment.url,
                filename: attachment.filename,
                content_type: attachment.contentType,
                size: attachment.size,
            }));
        }

        const result = await this.executor.execute({ method: 'POST', path: '/activity/email/', body, kind: 'read' });
        return this.toDetail(result, CreatedRecordSchema, created => ({ id: created.id }), 'email activity');
    }

    // ========================================================================
    // File upload (two-phase: ask the CRM for a target, then post the file to it)
    // ========================================================================

    async requestUpload(filename: string, contentType: string): Promise<DetailResult<UploadTarget>> {
        const result = await this.executor.execute({
            method: 'POST',
            path: '/files/upload/',
            body: { filename, content_type: contentType },
            kind: 'read',
        });
        return this.toDetail(result, UploadTargetSchema, target => target, 'upload target');
    }

    /** Post the file to the presigned target. Retries 5xx and network errors; returns false once they run out. */
    async uploadFile(target: UploadTarget, filename: string, content: string, contentType: string): Promise<boolean> {
        try {
            await withRetry(async () => {
                const form = new FormData();
                for (const [key, value] of Object.entries(target.upload.fields)) {
                    form.append(key, value);
                }
                form.append('file', new Blob([content], { type: contentType }), filename);

                const response = await this.fetchFn(target.upload.url, { method: 'POST', body: form });
                if (response.status < 200 || response.status >= 300) {
                    throw new HttpStatusError(response.status, (await response.text()).slice(0, 200));
                }
            }, { maxAttempts: 3, operationName: 'File upload', clock: this.clock });
            return true;
        } catch (error) {
            logger.error(`Upload of ${filename} failed`, { error });
            return false;
        }
    }

    // ========================================================================
    // Result mapping
    // ========================================================================

    private async write(request: ApiRequest): Promise<WriteResult> {
        const result = await this.executor.execute({ ...request, kind: 'write' });
        switch (result.outcome) {
            case 'ok':
                return { ok: true, body: result.body };
            case 'malformed':
                return { ok: true };
            case 'rejected':
                return { ok: false, status: result.status, message: result.message };
        }
    }

    private toDetail<T, R>(
        result: ExecuteResult,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        map: (raw: T) => R,
        label: string,
    ): DetailResult<R> {
        if (result.outcome === 'rejected') {
            return { found: false, reason: 'rejected', status: result.status };
        }
        if (result.outcome === 'malformed') {
            return { found: false, reason: 'malformed', status: result.status };
        }
        if (result.body === undefined) {
            return { found: false, reason: 'empty', status: result.status };
        }

        const parsed = schema.safeParse(result.body);
        if (!parsed.success) {
            logger.warn(`Unexpected payload for ${label}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
            return { found: false, reason: 'invalid', status: result.status };
        }
        return { found: true, record: map(parsed.data) };
    }

    private toList<T, R>(
        result: ExecuteResult,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        map: (raw: T) => R,
        label: string,
    ): DetailResult<R[]> {
        const list = this.toDetail(result, ListResponseSchema, body => body.data ?? [], label);
        if (!list.found) return list;
        return { found: true, record: parseItems(list.record, schema, map, label) };
    }
}
