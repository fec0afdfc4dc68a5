import { systemClock, type Clock } from '../utils/retry.js';

export interface Page<T> {
    items: T[];
    /** Absent (or empty) when this is the last page */
    cursor?: string;
}

export interface FetchAllOptions<T> {
    /** Stop once this many items have accumulated. The last page is kept whole. */
    target?: number;
    /** Pause between page requests (default: 500) */
    pageDelayMs?: number;
    clock?: Clock;
    onPage?: (page: Page<T>, total: number, pageNumber: number) => void;
}

const DEFAULT_PAGE_DELAY_MS = 500;

/**
 * Walk a cursor-paginated listing to the end. A missing cursor is the only
 * end signal: an empty page that carries a cursor is followed.
 */
export async function fetchAll<T>(
    fetchPage: (cursor?: string) => Promise<Page<T>>,
    options: FetchAllOptions<T> = {},
): Promise<T[]> {
    const clock = options.clock ?? systemClock;
    const pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    const all: T[] = [];

    let cursor: string | undefined;
    let pageNumber = 0;

    for (;;) {
        const page = await fetchPage(cursor);
        pageNumber++;
        all.push(...page.items);
        options.onPage?.(page, all.length, pageNumber);

        if (options.target !== undefined && all.length >= options.target) {
            break;
        }
        if (!page.cursor) {
            break;
        }

        cursor = page.cursor;
        await clock.sleep(pageDelayMs);
    }

    return all;
}
