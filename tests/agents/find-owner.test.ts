import { mkdtempSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { FindOwnerAgent, toOwnerCsv } from '../../src/agents/find-owner/index.js';
import { CloseClient } from '../../src/tools/close.js';
import { RequestExecutor } from '../../src/tools/executor.js';
import { SlackNotifier } from '../../src/tools/slack.js';
import { DOWNLOAD_URL, FakeClock, FakeCrm, jsonResponse, scriptedFetch } from '../helpers/fake-crm.js';

const CSV = [
    'id,address,city,state,zipcode',
    'lead_1,12 Main St,Charlotte,NC,28202',
    'lead_2,9 Oak Ave,Raleigh,NC,27601',
    '',
].join('\n');

function setup(target: number, contactEmails: Array<{ email: string }> = [{ email: 'owners@vendor.test' }]) {
    const crm = new FakeCrm();
    const clock = new FakeClock();
    crm.addLead({ id: 'lead_1', addresses: [{ address_1: '12 Main St', city: 'Charlotte', state: 'NC', zipcode: '28202' }] });
    crm.addLead({ id: 'lead_2', addresses: [{ address_1: '9 Oak Ave', city: 'Raleigh', state: 'NC', zipcode: '27601' }] });
    crm.contacts.set('cont_handoff', { id: 'cont_handoff', emails: contactEmails });
    crm.emailAccounts = [{ id: 'emailacct_1', email: 'ops@example.test' }];

    const executor = new RequestExecutor({ baseUrl: 'https://api.crm.test/api/v1', apiKey: 'test-key', clock, fetchFn: crm.fetchFn });
    const slack = scriptedFetch([jsonResponse(200, { ok: true })]);
    const outputDir = mkdtempSync(path.join(tmpdir(), 'find-owner-'));

    const agent = new FindOwnerAgent({
        close: new CloseClient(executor, { clock, fetchFn: crm.fetchFn }),
        slack: new SlackNotifier({ botToken: 'test-token', channelId: 'C123', fetchFn: slack.fetchFn }),
        handoff: { leadId: 'lead_handoff', contactId: 'cont_handoff', fallbackEmail: 'backup@vendor.test' },
        sender: { email: 'ops@example.test', name: 'Ops Team' },
        salesGroupId: 'S123',
        clock,
        target,
        outputDir,
    });
    return { crm, agent, slackCalls: slack.calls, outputDir };
}

describe('toOwnerCsv', () => {
    it('writes the header and one line per lead', () => {
        const csv = toOwnerCsv([
            { id: 'lead_1', address: '12 Main St', city: 'Charlotte', state: 'NC', zipcode: '28202' },
            { id: 'lead_2', address: '9 Oak Ave', city: 'Raleigh', state: 'NC', zipcode: '27601' },
        ]);

        expect(csv).toBe(CSV);
    });
});

describe('FindOwnerAgent', () => {
    it('tells the channel how many leads are missing below the target', async () => {
        const { crm, agent, slackCalls } = setup(3);

        const result = await agent.run({ query: {} });

        expect(result).toEqual({ status: 'below-target', count: 2, needed: 1 });
        expect(slackCalls[0].body).toEqual({
            channel: 'C123',
            text: '<!subteam^S123> We currently have 2 leads in the Find Owner queue. We need 1 more to reach our goal of 3 before sending the list over.',
        });
        expect(crm.uploads).toEqual([]);
        expect(crm.sentEmails).toEqual([]);
    });

    it('uploads the list and emails it once the target is reached', async () => {
        const { crm, agent, slackCalls, outputDir } = setup(2);

        const result = await agent.run({ query: {} });

        const csvPath = path.resolve(outputDir, 'find_owner_leads_03_15_2024.csv');
        expect(result).toEqual({ status: 'sent', count: 2, csvPath, emailId: 'acti_1' });
        expect(readFileSync(csvPath, 'utf8')).toBe(CSV);
        expect(slackCalls[0].headers.get('authorization')).toBe('Bearer test-token');
        expect(slackCalls[0].body).toMatchObject({
            text: "<!subteam^S123> We've reached our goal in the Find Owner queue and have sent all leads over.",
        });
        expect(crm.uploads).toHaveLength(1);
        expect(crm.sentEmails[0]).toMatchObject({
            lead_id: 'lead_handoff',
            contact_id: 'cont_handoff',
            direction: 'outbound',
            status: 'outbox',
            subject: '03/15/24 Find Owners',
            to: ['owners@vendor.test'],
            sender: '"Ops Team" <ops@example.test>',
            email_account_id: 'emailacct_1',
            attachments: [{
                url: DOWNLOAD_URL,
                filename: 'find_owner_leads_03_15_2024.csv',
                content_type: 'text/csv',
                size: Buffer.byteLength(CSV),
            }],
        });
    });

    it('falls back to the configured address when the contact has no email', async () => {
        const { crm, agent } = setup(2, []);

        await agent.run({ query: {} });

        expect(crm.sentEmails[0]).toMatchObject({ to: ['backup@vendor.test'] });
    });

    it('stops before emailing when the upload target cannot be had', async () => {
        const { crm, agent } = setup(2);
        crm.failingPaths.add('/files/upload/');

        const result = await agent.run({ query: {} });

        expect(result.status).toBe('upload-failed');
        expect(crm.sentEmails).toEqual([]);
    });
});
