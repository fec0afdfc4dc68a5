import { writeFileSync } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { format } from 'date-fns';
import type { CloseClient } from '../../tools/close.js';
import { mentionGroup, type SlackNotifier } from '../../tools/slack.js';
import { logger, logSuccess } from '../../utils/logger.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import { loadQuery, type Config } from '../../config/index.js';
import { createCloseClient, createSlackNotifier, type Runtime } from '../../bootstrap.js';
import type { Contact, LeadRef, SearchQuery } from '../../types/index.js';

export interface FindOwnerConfig {
    close: CloseClient;
    slack: SlackNotifier;
    handoff: Config['handoff'];
    sender: Config['sender'];
    salesGroupId?: string;
    clock?: Clock;
    /** Leads to collect before the list is handed off (default: 300) */
    target?: number;
    /** Where the CSV is written (default: working directory) */
    outputDir?: string;
    pageDelayMs?: number;
}

export interface OwnerRow {
    id: string;
    address: string;
    city: string;
    state: string;
    zipcode: string;
}

export type FindOwnerResult =
    | { status: 'below-target'; count: number; needed: number }
    | { status: 'upload-failed'; count: number; csvPath: string }
    | { status: 'email-failed'; count: number; csvPath: string }
    | { status: 'sent'; count: number; csvPath: string; emailId: string };

export const OWNER_CSV_COLUMNS = ['id', 'address', 'city', 'state', 'zipcode'] as const;

const DEFAULT_TARGET = 300;

export function toOwnerCsv(rows: OwnerRow[]): string {
    return stringify(rows, { header: true, columns: [...OWNER_CSV_COLUMNS] });
}

export function firstEmail(contact: Contact): string | undefined {
    return contact.emails?.find(entry => entry.email)?.email ?? undefined;
}

/**
 * Collects the leads waiting in the Find Owner queue. Below the target the
 * sales channel is told how many are missing; at the target the list goes
 * out as a CSV attached to an email to the handoff contact.
 */
export class FindOwnerAgent {
    private readonly clock: Clock;
    private readonly target: number;

    constructor(private readonly config: FindOwnerConfig) {
        this.clock = config.clock ?? systemClock;
        this.target = config.target ?? DEFAULT_TARGET;
    }

    async run(query: SearchQuery): Promise<FindOwnerResult> {
        const { slack, salesGroupId } = this.config;

        logger.info('Counting leads in the Find Owner queue...');
        const rows = await this.collectRows(query);
        const count = rows.length;
        logger.info(`Found ${count} leads in the Find Owner queue`);

        if (count < this.target) {
            const needed = this.target - count;
            await slack.post(mentionGroup(
                salesGroupId,
                `We currently have ${count} leads in the Find Owner queue. We need ${needed} more to reach our goal of ${this.target} before sending the list over.`,
            ));
            return { status: 'below-target', count, needed };
        }

        await slack.post(mentionGroup(salesGroupId, "We've reached our goal in the Find Owner queue and have sent all leads over."));
        return this.handOff(rows);
    }

    async collectRows(query: SearchQuery): Promise<OwnerRow[]> {
        const refs = await this.config.close.searchAll(query, { target: this.target, pageDelayMs: this.config.pageDelayMs });
        const rows: OwnerRow[] = [];

        for (const ref of refs) {
            const row = await this.toRow(ref);
            if (row) rows.push(row);
        }
        return rows;
    }

    private async toRow(ref: LeadRef): Promise<OwnerRow | null> {
        const detail = await this.config.close.getLead(ref.id);
        if (!detail.found) return null;

        const address = detail.record.addresses[0];
        return {
            id: detail.record.id,
            address: address?.address_1 ?? '',
            city: address?.city ?? '',
            state: address?.state ?? '',
            zipcode: address?.zipcode ?? '',
        };
    }

    private async handOff(rows: OwnerRow[]): Promise<FindOwnerResult> {
        const { close, handoff } = this.config;
        const now = this.clock.now();
        const count = rows.length;

        const filename = `find_owner_leads_${format(now, 'MM_dd_yyyy')}.csv`;
        const csv = toOwnerCsv(rows);
        const csvPath = path.resolve(this.config.outputDir ?? '.', filename);
        writeFileSync(csvPath, csv, 'utf8');
        logger.info(`Wrote ${count} leads to ${csvPath}`);

        const target = await close.requestUpload(filename, 'text/csv');
        if (!target.found) {
            logger.error('Could not get an upload target. Attach the CSV to an email by hand.');
            return { status: 'upload-failed', count, csvPath };
        }
        if (!(await close.uploadFile(target.record, filename, csv, 'text/csv'))) {
            logger.error('File upload failed. Attach the CSV to an email by hand.');
            return { status: 'upload-failed', count, csvPath };
        }

        const leadId = handoff.leadId;
        const contactId = handoff.contactId;
        if (!leadId || !contactId) {
            logger.error('HANDOFF_LEAD_ID and HANDOFF_CONTACT_ID are needed to email the list');
            return { status: 'email-failed', count, csvPath };
        }

        const recipient = await this.recipientEmail(contactId);
        if (!recipient) {
            logger.error(`No email address for contact ${contactId} and no HANDOFF_FALLBACK_EMAIL`);
            return { status: 'email-failed', count, csvPath };
        }

        const email = await close.sendEmail({
            leadId,
            contactId,
            to: [recipient],
            subject: `${format(now, 'MM/dd/yy')} Find Owners`,
            bodyText: this.emailBody(),
            sender: this.senderHeader(),
            createdByName: this.config.sender.name,
            emailAccountId: await this.emailAccountId(),
            attachments: [{ url: target.record.download.url, filename, contentType: 'text/csv', size: Buffer.byteLength(csv) }],
        });
        if (!email.found) {
            logger.error('Failed to send the email. Attach the CSV to an email by hand.');
            return { status: 'email-failed', count, csvPath };
        }

        logSuccess(`Email sent with id ${email.record.id}`);
        return { status: 'sent', count, csvPath, emailId: email.record.id };
    }

    private async recipientEmail(contactId: string): Promise<string | undefined> {
        const contact = await this.config.close.getContact(contactId);
        const email = contact.found ? firstEmail(contact.record) : undefined;
        if (email) return email;

        const fallback = this.config.handoff.fallbackEmail;
        if (fallback) {
            logger.info(`Using fallback email for recipient: ${fallback}`);
        }
        return fallback;
    }

    private async emailAccountId(): Promise<string | undefined> {
        const senderEmail = this.config.sender.email;
        if (!senderEmail) return undefined;

        const accounts = await this.config.close.listEmailAccounts();
        const account = accounts.found ? accounts.record.find(entry => entry.email === senderEmail) : undefined;
        if (!account) {
            logger.warn(`No email account for ${senderEmail}; the email may stay in the outbox`);
        }
        return account?.id;
    }

    private senderHeader(): string | undefined {
        const { email, name } = this.config.sender;
        if (!email) return undefined;
        return name ? `"${name}" <${email}>` : email;
    }

    private emailBody(): string {
        const signature = this.config.sender.name ?? '';
        return [
            'Hi,',
            '',
            'We have another list of Find Owners for you to process. Please see the attached file and let us know when you are ready for our review and payment.',
            '',
            'Best,',
            signature,
        ].join('\n');
    }
}

/** Build the agent from configuration and run it on a saved query. */
export async function runFindOwner(runtime: Runtime, queryName: string = 'find-owner'): Promise<FindOwnerResult> {
    const { config } = runtime;
    const agent = new FindOwnerAgent({
        close: createCloseClient(runtime),
        slack: createSlackNotifier(runtime),
        handoff: config.handoff,
        sender: config.sender,
        salesGroupId: config.slack.salesGroupId,
        clock: runtime.clock,
    });
    return agent.run(loadQuery(config, queryName));
}
