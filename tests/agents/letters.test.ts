import { describe, expect, it } from 'vitest';
import { LettersAgent } from '../../src/agents/letters/index.js';
import {
    formatMonetaryValue,
    mailerDatesForRound,
    parseMailingAddress,
    splitOnFirstSpace,
    validateLetter,
} from '../../src/agents/letters/letter-data.js';
import { PostGridClient } from '../../src/tools/postgrid.js';
import { CloseClient } from '../../src/tools/close.js';
import { RequestExecutor } from '../../src/tools/executor.js';
import { FakeClock, FakeCrm, jsonResponse, scriptedFetch, testRegistry } from '../helpers/fake-crm.js';

const fields = testRegistry.opportunityFields;

describe('letter data', () => {
    it('splits on the first space only', () => {
        expect(splitOnFirstSpace('ABC123 North Carolina')).toEqual(['ABC123', 'North Carolina']);
        expect(splitOnFirstSpace('ABC123')).toEqual(['ABC123', '']);
    });

    it('parses mailing addresses with one, two or three parts', () => {
        expect(parseMailingAddress('12 Main St, Charlotte, NC 28202')).toEqual({
            address: '12 Main St',
            address2: '',
            city: 'Charlotte',
            provinceOrState: 'NC',
            postalOrZip: '28202',
            countryCode: 'US',
        });
        expect(parseMailingAddress('12 Main St, Charlotte')).toMatchObject({ address: '12 Main St', city: 'Charlotte', postalOrZip: '' });
        expect(parseMailingAddress('PO Box 9')).toMatchObject({ address: 'PO Box 9', city: '' });
        expect(parseMailingAddress('')).toBeNull();
    });

    it('formats money the way the letter prints it', () => {
        expect(formatMonetaryValue(0)).toBe('0');
        expect(formatMonetaryValue('50.0')).toBe('50');
        expect(formatMonetaryValue(65.5)).toBe('65.50');
        expect(formatMonetaryValue('n/a')).toBe('n/a');
        expect(formatMonetaryValue(null)).toBe('');
    });

    it('prints earlier mailer dates by round', () => {
        const dates = '2024-01-10,2024-02-01,2024-03-01';

        expect(mailerDatesForRound('round_1', dates)).toEqual({ firstMailer: '', secondMailer: '' });
        expect(mailerDatesForRound('round_2', dates)).toEqual({ firstMailer: '01/10/2024', secondMailer: '' });
        expect(mailerDatesForRound('round_3', dates)).toEqual({ firstMailer: '01/10/2024', secondMailer: '02/01/2024' });
    });

    it('names the first problem that blocks a letter', () => {
        const base = {
            firstName: 'Jane', lastName: 'Driver', address: '12 Main St', address2: '', city: '', provinceOrState: '',
            postalOrZip: '', countryCode: 'US', plateNumber: '', plateLocation: '', make: '', model: '', lastMailDate: '',
            value: '', citationNumber: '', citationDate: '', citationTime: '', lotLocation: '', citationImageUrl: '',
            fineAmount: '', serviceFee: '', firstMailer: '', secondMailer: '', template: 'template_round_1',
        };

        expect(validateLetter(base)).toBeNull();
        expect(validateLetter({ ...base, template: '' })).toBe('No template ID found');
        expect(validateLetter({ ...base, lastName: '' })).toBe('Missing required contact information');
    });
});

function setup(postgridSteps: Response[], opportunity: Record<string, unknown> = {}) {
    const crm = new FakeCrm();
    const clock = new FakeClock();
    crm.addLead(
        {
            id: 'lead_1',
            display_name: 'ABC123 North Carolina',
            name: 'ABC123 North Carolina',
            contacts: [{ id: 'cont_1', display_name: 'Jane Q Driver' }],
            custom: {
                'Current Mailing Address': '12 Main St, Charlotte, NC 28202',
                'Make': 'Honda',
                'Model': 'Civic',
                'Last Mail Date': '2024-02-01',
            },
        },
        [{
            id: 'opp_1',
            status_id: testRegistry.opportunityStatuses.round_2,
            value_formatted: '$65.50',
            [`custom.${fields.citationNumber}`]: 'C-1001',
            [`custom.${fields.citationDate}`]: '2024-01-05',
            [`custom.${fields.citationTime}`]: '14:30',
            [`custom.${fields.lotAddress}`]: '500 Elm St',
            [`custom.${fields.fineAmount}`]: 50,
            [`custom.${fields.serviceFee}`]: '15.5',
            [`custom.${fields.mailerDates}`]: '2024-01-10,2024-02-01',
            [`custom.${fields.template}`]: 'template_round_2',
            ...opportunity,
        }],
    );

    const executor = new RequestExecutor({ baseUrl: 'https://api.crm.test/api/v1', apiKey: 'test-key', clock, fetchFn: crm.fetchFn });
    const vendor = scriptedFetch(postgridSteps);
    const agent = new LettersAgent({
        close: new CloseClient(executor, { clock }),
        postgrid: new PostGridClient({
            apiKey: 'test-secret',
            baseUrl: 'https://api.postgrid.test/print-mail/v1',
            senderContactId: 'contact_sender',
            fetchFn: vendor.fetchFn,
        }),
        registry: testRegistry,
        clock,
        delayBetweenRecordsMs: 0,
    });
    return { crm, agent, vendorCalls: vendor.calls };
}

describe('LettersAgent', () => {
    it('mails the letter and records the send date', async () => {
        const { crm, agent, vendorCalls } = setup([jsonResponse(200, { id: 'letter_abc' })]);

        const outcome = await agent.sendLetter('lead_1');

        expect(outcome).toEqual({ status: 'succeeded', leadId: 'lead_1', transitions: [], message: 'letter letter_abc' });
        expect(crm.leads.get('lead_1')).toMatchObject({ 'custom.cf_letter_send_date': '03/15/2024' });

        expect(vendorCalls[0].url).toBe('https://api.postgrid.test/print-mail/v1/letters');
        expect(vendorCalls[0].headers.get('x-api-key')).toBe('test-secret');
        const form = new URLSearchParams(String(vendorCalls[0].body));
        expect(form.get('to[firstName]')).toBe('Jane');
        expect(form.get('to[lastName]')).toBe('Q Driver');
        expect(form.get('to[postalOrZip]')).toBe('28202');
        expect(form.get('from')).toBe('contact_sender');
        expect(form.get('template')).toBe('template_round_2');
        expect(form.get('description')).toBe('Invoice C-1001 (03/15/2024)');
        expect(form.get('mergeVariables[value]')).toBe('65.50');
        expect(form.get('mergeVariables[plate location]')).toBe('North Carolina');
        expect(form.get('mergeVariables[citation date]')).toBe('01/05/2024');
        expect(form.get('mergeVariables[last mail date]')).toBe('02/01/2024');
        expect(form.get('mergeVariables[fine amount]')).toBe('50');
        expect(form.get('mergeVariables[service fee]')).toBe('15.50');
        expect(form.get('mergeVariables[first mailer]')).toBe('01/10/2024');
        expect(form.get('mergeVariables[second mailer]')).toBe('');
    });

    it('moves the lead to Error when the vendor rejects the letter', async () => {
        const { crm, agent } = setup([
            jsonResponse(422, { error: { type: 'validation_error', message: 'Invalid address' } }),
        ]);

        const outcome = await agent.sendLetter('lead_1');

        expect(outcome).toMatchObject({ status: 'failed', reason: 'Error 422 - Invalid address', routedToError: true });
        expect(crm.leads.get('lead_1')).toMatchObject({ status_id: 'stat_error' });
        expect(crm.notes).toEqual([{
            leadId: 'lead_1',
            html: '<body><p><strong>PostGrid Error (03/15/2024):</strong> Error 422 - Invalid address</p></body>',
        }]);
    });

    it('does not call the vendor for a letter without a template', async () => {
        const { agent, vendorCalls } = setup([], { [`custom.${fields.template}`]: '' });

        const outcome = await agent.sendLetter('lead_1');

        expect(outcome).toMatchObject({ status: 'failed', reason: 'No template ID found' });
        expect(vendorCalls).toEqual([]);
    });

    it('reports a letter whose send date could not be saved as partial', async () => {
        const { crm, agent } = setup([jsonResponse(200, { id: 'letter_abc' })]);
        crm.failingWrites.add('/lead/lead_1/');

        const outcome = await agent.sendLetter('lead_1');

        expect(outcome).toMatchObject({
            status: 'partial',
            failures: [{
                leadId: 'lead_1',
                childId: 'letter_abc',
                from: 'unsent',
                to: 'sent',
                childOk: true,
                parentOk: false,
                message: 'letter letter_abc sent but the send date was not saved (500)',
            }],
        });
    });

    it('routes a lead that cannot be read', async () => {
        const { crm, agent } = setup([]);
        crm.failingPaths.add('/lead/lead_1/');

        const outcome = await agent.sendLetter('lead_1');

        expect(outcome).toMatchObject({ status: 'failed', reason: 'No data found', routedToError: false });
    });
});
