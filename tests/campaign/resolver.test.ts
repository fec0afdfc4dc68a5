import { describe, expect, it } from 'vitest';
import { CrossAccountLookup, RecordResolver, buildFieldPrefixQuery, formatBusinessAddress } from '../../src/campaign/resolver.js';
import { CloseClient } from '../../src/tools/close.js';
import { RequestExecutor } from '../../src/tools/executor.js';
import { FakeClock, FakeCrm } from '../helpers/fake-crm.js';

function clientFor(crm: FakeCrm): CloseClient {
    const clock = new FakeClock();
    const executor = new RequestExecutor({ baseUrl: 'https://api.crm.test/api/v1', apiKey: 'test-key', clock, fetchFn: crm.fetchFn });
    return new CloseClient(executor, { clock });
}

describe('formatBusinessAddress', () => {
    it('prefers the business address', () => {
        expect(formatBusinessAddress([
            { label: 'mailing', address_1: 'PO Box 1' },
            { label: 'business', address_1: '500 Elm St', city: 'Durham', state: 'NC', zipcode: '27701' },
        ])).toBe('500 Elm St Durham, NC, 27701');
    });

    it('falls back to the first address and drops missing parts', () => {
        expect(formatBusinessAddress([{ label: 'other', address_1: '9 Oak Ave', city: 'Raleigh', zipcode: '27601' }])).toBe('9 Oak Ave Raleigh, 27601');
    });

    it('returns null when there is nothing to print', () => {
        expect(formatBusinessAddress([])).toBeNull();
        expect(formatBusinessAddress([{ label: 'business' }])).toBeNull();
    });
});

describe('buildFieldPrefixQuery', () => {
    it('matches the key at the beginning of words', () => {
        const query = buildFieldPrefixQuery('cf_lot', 'LOT-7');

        expect(query.limit).toBe(10);
        expect(JSON.stringify(query.query)).toContain('"condition":{"type":"text","mode":"beginning_of_words","value":"LOT-7"}');
    });
});

describe('RecordResolver', () => {
    it('reads each child that passes the filter', async () => {
        const crm = new FakeCrm();
        crm.addLead({ id: 'lead_1', display_name: 'ABC123 NC' }, [
            { id: 'opp_1', status_id: 'stat_hold' },
            { id: 'opp_2', status_id: 'stat_unpaid' },
            { id: 'opp_3', status_id: 'stat_hold' },
        ]);
        crm.opportunities.delete('opp_3');

        const resolved = await new RecordResolver(clientFor(crm)).resolveLead(
            { id: 'lead_1', displayName: '', opportunities: [] },
            { childFilter: child => child.statusId === 'stat_hold' },
        );

        expect(resolved?.displayName).toBe('ABC123 NC');
        expect(resolved?.opportunities.map(child => child.id)).toEqual(['opp_1']);
    });

    it('returns null when the lead cannot be read', async () => {
        const crm = new FakeCrm();

        expect(await new RecordResolver(clientFor(crm)).resolveLead({ id: 'lead_x', displayName: '', opportunities: [] })).toBeNull();
    });
});

describe('CrossAccountLookup', () => {
    it('does not search for a blank key', async () => {
        const crm = new FakeCrm();

        expect(await new CrossAccountLookup(clientFor(crm), 'cf_lot').findFirst('  ')).toBeNull();
        expect(crm.calls).toEqual([]);
    });
});
