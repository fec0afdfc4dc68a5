import { describe, expect, it } from 'vitest';
import { StageTransitionEngine, ErrorStageRouter, buildErrorNote, selectOldest } from '../../src/campaign/engine.js';
import { createStageMachine, followUpTable, holdsTable, roundOneTable } from '../../src/campaign/stages.js';
import { runCampaign } from '../../src/orchestrator.js';
import type { OpportunityStage } from '../../src/config/registry.js';
import type { Lead, Opportunity, ResolvedLead } from '../../src/types/index.js';
import { FakeClock, RecordingWriter, testRegistry } from '../helpers/fake-crm.js';

const statuses = testRegistry.opportunityStatuses;

function opportunity(id: string, statusId: string, fields: Opportunity['fields'] = {}): Opportunity {
    return { id, statusId, fields };
}

function resolved(opportunities: Opportunity[], id = 'lead_1'): ResolvedLead {
    const lead: Lead = {
        id,
        displayName: 'ABC123 NC',
        name: 'ABC123 NC',
        contacts: [],
        addresses: [],
        opportunities: opportunities.map(child => ({ id: child.id, statusId: child.statusId })),
        fields: {},
        custom: {},
    };
    return { id, displayName: lead.displayName, lead, opportunities };
}

describe('createStageMachine', () => {
    it('maps status ids to stages and rules', () => {
        const machine = createStageMachine('follow-up', statuses, followUpTable(testRegistry));

        expect(machine.stageOf('stat_round_3')).toBe('round_3');
        expect(machine.ruleFor('stat_round_2')?.to).toBe('round_3');
        expect(machine.ruleFor('stat_round_3')).toBeUndefined();
        expect(machine.describeSources()).toBe('round_1, round_2');
    });

    it('rejects a rule filed under the wrong source stage', () => {
        const table = { unpaid: { from: 'hold' as const, to: 'unpaid' as const, mutate: () => ({ child: {} }) } };

        expect(() => createStageMachine<OpportunityStage>('broken', statuses, table)).toThrow('rule under "unpaid" starts from "hold"');
    });
});

describe('selectOldest', () => {
    const field = testRegistry.opportunityFields.citationDate;

    it('picks the oldest date across formats and skips unparseable ones', () => {
        const candidates = [
            opportunity('opp_a', statuses.hold, { [field]: '3/1/2024' }),
            opportunity('opp_b', statuses.hold, { [field]: '01-15-2024' }),
            opportunity('opp_c', statuses.hold, { [field]: 'not-a-date' }),
        ];

        expect(selectOldest(candidates, field)?.id).toBe('opp_b');
    });

    it('keeps the first candidate on a tie', () => {
        const candidates = [
            opportunity('opp_a', statuses.hold, { [field]: '01/15/2024' }),
            opportunity('opp_b', statuses.hold, { [field]: '2024-01-15' }),
        ];

        expect(selectOldest(candidates, field)?.id).toBe('opp_a');
    });

    it('leaves out a date with a two-digit year', () => {
        const candidates = [
            opportunity('opp_a', statuses.hold, { [field]: '01/15/2024' }),
            opportunity('opp_b', statuses.hold, { [field]: '3/1/24' }),
        ];

        expect(selectOldest(candidates, field)?.id).toBe('opp_a');
    });

    it('returns undefined when nothing parses', () => {
        expect(selectOldest([opportunity('opp_a', statuses.hold, { [field]: '' })], field)).toBeUndefined();
    });
});

describe('StageTransitionEngine', () => {
    const { mailerDates, template } = testRegistry.opportunityFields;

    it('moves the first unpaid opportunity to round 1 and stamps the lead', async () => {
        const writer = new RecordingWriter();
        const engine = new StageTransitionEngine({
            machine: createStageMachine('round-one', statuses, roundOneTable(testRegistry)),
            selection: { kind: 'first' },
            writer,
            clock: new FakeClock(),
        });
        const citationNumber = testRegistry.opportunityFields.citationNumber;
        const first = opportunity('opp_1', statuses.unpaid, { [citationNumber]: 'C-1001' });
        const record = resolved([first, opportunity('opp_2', statuses.unpaid, { [citationNumber]: 'C-1002' })]);

        const outcome = await engine.advance(record);

        expect(outcome.status).toBe('succeeded');
        expect(writer.opportunityWrites).toEqual([{
            id: 'opp_1',
            patch: {
                status_id: 'stat_round_1',
                'custom.cf_mailer_dates': '03/15/2024',
                'custom.cf_template': 'template_round_1',
            },
        }]);
        expect(writer.leadWrites).toEqual([{ id: 'lead_1', patch: { 'custom.cf_last_mail_date': '03/15/2024' } }]);
        expect(first.statusId).toBe('stat_round_1');
        expect(first.fields[mailerDates]).toBe('03/15/2024');
    });

    it('reports a half-written record as partial', async () => {
        const writer = new RecordingWriter();
        writer.failLeadWrites = true;
        const engine = new StageTransitionEngine({
            machine: createStageMachine('follow-up', statuses, followUpTable(testRegistry)),
            selection: { kind: 'each' },
            writer,
            clock: new FakeClock(),
        });

        const outcome = await engine.advance(resolved([opportunity('opp_1', statuses.round_1, { [mailerDates]: '01/01/2024' })]));

        expect(writer.opportunityWrites[0].patch).toEqual({
            status_id: 'stat_round_2',
            'custom.cf_mailer_dates': '01/01/2024,03/15/2024',
            [`custom.${template}`]: 'template_round_2',
        });
        expect(outcome).toEqual({
            status: 'partial',
            leadId: 'lead_1',
            transitions: [{
                childId: 'opp_1',
                from: 'round_1',
                to: 'round_2',
                childOk: true,
                parentOk: false,
                message: 'lead update failed (500)',
            }],
            failures: [{
                leadId: 'lead_1',
                childId: 'opp_1',
                from: 'round_1',
                to: 'round_2',
                childOk: true,
                parentOk: false,
                message: 'lead update failed (500)',
            }],
        });
    });

    it('fails without touching the lead when the opportunity write is rejected', async () => {
        const writer = new RecordingWriter();
        writer.failOpportunityWrites = true;
        const engine = new StageTransitionEngine({
            machine: createStageMachine('follow-up', statuses, followUpTable(testRegistry)),
            selection: { kind: 'each' },
            writer,
            clock: new FakeClock(),
        });

        const outcome = await engine.advance(resolved([opportunity('opp_1', statuses.round_2)]));

        expect(outcome.status).toBe('failed');
        expect(outcome.status === 'failed' && outcome.reason).toBe('opportunity update failed (400)');
        expect(writer.leadWrites).toEqual([]);
    });

    it('keeps a half-written child on a record that failed on another child', async () => {
        const writer = new RecordingWriter();
        writer.rejectedOpportunities.add('opp_a');
        writer.failLeadWrites = true;
        const engine = new StageTransitionEngine({
            machine: createStageMachine('follow-up', statuses, followUpTable(testRegistry)),
            selection: { kind: 'each' },
            writer,
            clock: new FakeClock(),
        });
        const record = resolved([
            opportunity('opp_a', statuses.round_1),
            opportunity('opp_b', statuses.round_2),
        ]);
        const reported: string[] = [];

        const summary = await runCampaign({
            name: 'Follow-up',
            records: [record],
            process: lead => engine.advance(lead),
            clock: new FakeClock(),
            onPartial: failure => reported.push(failure.childId),
        });

        expect(summary).toMatchObject({ attempted: 1, failed: 1, partial: 0 });
        expect(summary.partialFailures.map(failure => failure.childId)).toEqual(['opp_b']);
        expect(reported).toEqual(['opp_b']);
        expect(writer.opportunityWrites.map(write => write.id)).toEqual(['opp_a', 'opp_b']);
        expect(writer.leadWrites).toHaveLength(1);
    });

    it('skips a record with no opportunity in a source stage', async () => {
        const writer = new RecordingWriter();
        const engine = new StageTransitionEngine({
            machine: createStageMachine('round-one', statuses, roundOneTable(testRegistry)),
            selection: { kind: 'first' },
            writer,
        });

        const outcome = await engine.advance(resolved([opportunity('opp_1', statuses.round_3)]));

        expect(outcome).toEqual({ status: 'ineligible', leadId: 'lead_1', reason: 'no opportunity in unpaid' });
        expect(writer.opportunityWrites).toEqual([]);
    });

    it('releases only the oldest hold and leaves the lead alone', async () => {
        const writer = new RecordingWriter();
        const dateField = testRegistry.opportunityFields.citationDate;
        const engine = new StageTransitionEngine({
            machine: createStageMachine('holds', statuses, holdsTable()),
            selection: { kind: 'oldest', fieldId: dateField },
            writer,
        });

        const outcome = await engine.advance(resolved([
            opportunity('opp_new', statuses.hold, { [dateField]: '02/01/2024' }),
            opportunity('opp_old', statuses.hold, { [dateField]: '2023-12-24' }),
        ]));

        expect(outcome.status).toBe('succeeded');
        expect(writer.opportunityWrites).toEqual([{ id: 'opp_old', patch: { status_id: 'stat_unpaid' } }]);
        expect(writer.leadWrites).toEqual([]);
    });

    it('moves a record missing a required field to Error with a note', async () => {
        const writer = new RecordingWriter();
        const clock = new FakeClock();
        const citationNumber = testRegistry.opportunityFields.citationNumber;
        const machine = createStageMachine<OpportunityStage>('letters', statuses, {
            round_1: { from: 'round_1', to: 'round_2', requiredFields: [citationNumber], mutate: () => ({ child: {} }) },
        });
        const engine = new StageTransitionEngine({
            machine,
            selection: { kind: 'each' },
            writer,
            errorRoute: new ErrorStageRouter(writer, 'stat_error', 'Mailer Error', clock),
            clock,
        });

        const outcome = await engine.advance(resolved([opportunity('opp_1', statuses.round_1, { [citationNumber]: '  ' })]));

        expect(outcome).toEqual({
            status: 'failed',
            leadId: 'lead_1',
            reason: 'Missing required field(s) cf_citation_number on opp_1',
            transitions: [],
            routedToError: true,
        });
        expect(writer.opportunityWrites).toEqual([]);
        expect(writer.leadWrites).toEqual([{ id: 'lead_1', patch: { status_id: 'stat_error' } }]);
        expect(writer.notes).toEqual([{
            leadId: 'lead_1',
            html: '<body><p><strong>Mailer Error (03/15/2024):</strong> Missing required field(s) cf_citation_number on opp_1</p></body>',
        }]);
    });
});

describe('ErrorStageRouter', () => {
    it('reports a failed status write', async () => {
        const writer = new RecordingWriter();
        writer.failLeadWrites = true;
        const router = new ErrorStageRouter(writer, 'stat_error', 'PostGrid Error', new FakeClock());

        expect(await router.route('lead_1', 'No data found')).toEqual({ statusOk: false, noteOk: true });
        expect(writer.notes).toHaveLength(1);
    });

    it('escapes the note text', () => {
        expect(buildErrorNote('PostGrid Error', '03/15/2024', 'Error 422 - <bad> & "worse"')).toBe(
            '<body><p><strong>PostGrid Error (03/15/2024):</strong> Error 422 - &lt;bad&gt; &amp; &quot;worse&quot;</p></body>',
        );
    });
});
