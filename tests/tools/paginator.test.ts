import { describe, expect, it } from 'vitest';
import { fetchAll, type Page } from '../../src/tools/paginator.js';
import { FakeClock } from '../helpers/fake-crm.js';

function pagesOf(pages: Page<number>[]) {
    const cursors: Array<string | undefined> = [];
    const fetchPage = async (cursor?: string): Promise<Page<number>> => {
        cursors.push(cursor);
        const page = pages[cursors.length - 1];
        if (!page) throw new Error('fetched past the last page');
        return page;
    };
    return { fetchPage, cursors };
}

describe('fetchAll', () => {
    it('follows an empty page that still carries a cursor', async () => {
        const clock = new FakeClock();
        const { fetchPage, cursors } = pagesOf([
            { items: [1, 2], cursor: 'a' },
            { items: [], cursor: 'b' },
            { items: [3] },
        ]);

        const items = await fetchAll(fetchPage, { clock });

        expect(items).toEqual([1, 2, 3]);
        expect(cursors).toEqual([undefined, 'a', 'b']);
        expect(clock.sleeps).toEqual([500, 500]);
    });

    it('stops once the target is reached and keeps the last page whole', async () => {
        const clock = new FakeClock();
        const { fetchPage, cursors } = pagesOf([
            { items: [1, 2], cursor: 'a' },
            { items: [3, 4], cursor: 'b' },
            { items: [5, 6], cursor: 'c' },
        ]);

        const items = await fetchAll(fetchPage, { clock, target: 3, pageDelayMs: 100 });

        expect(items).toEqual([1, 2, 3, 4]);
        expect(cursors).toHaveLength(2);
        expect(clock.sleeps).toEqual([100]);
    });

    it('does not sleep after a single page', async () => {
        const clock = new FakeClock();
        const { fetchPage } = pagesOf([{ items: [] }]);

        expect(await fetchAll(fetchPage, { clock })).toEqual([]);
        expect(clock.sleeps).toEqual([]);
    });

    it('reports running totals per page', async () => {
        const clock = new FakeClock();
        const { fetchPage } = pagesOf([{ items: [1], cursor: 'a' }, { items: [2, 3] }]);
        const totals: Array<[number, number]> = [];

        await fetchAll(fetchPage, { clock, onPage: (_page, total, pageNumber) => totals.push([pageNumber, total]) });

        expect(totals).toEqual([[1, 1], [2, 3]]);
    });
});
