import { format, startOfMonth, subDays, subMonths } from 'date-fns';
import type { CloseClient } from '../../tools/close.js';
import type { SalesRep } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { formatDuration } from '../../utils/dates.js';
import { systemClock, type Clock } from '../../utils/retry.js';
import type { ActivityReportRow } from '../../types/index.js';

export interface ActivityConfig {
    close: CloseClient;
    reps: SalesRep[];
    clock?: Clock;
}

export interface ReportWindow {
    /** First day of last month, 00:00 */
    start: Date;
    /** First day of this month, 00:00 (exclusive) */
    end: Date;
}

export interface RepActivity {
    name: string;
    totalCalls: number;
    outboundCalls: number;
    inboundCalls: number;
    totalDurationSeconds: number;
    formattedDuration: string;
    wonOpportunities: number;
}

export const ACTIVITY_METRICS = {
    outboundCalls: 'calls.outbound.all.count',
    inboundCalls: 'calls.inbound.all.count',
    totalCalls: 'calls.all.all.count',
    totalDuration: 'calls.all.all.sum_duration',
    wonOpportunities: 'opportunities.won.all.count',
} as const;

export function previousMonthWindow(now: Date): ReportWindow {
    const end = startOfMonth(now);
    return { start: subMonths(end, 1), end };
}

function reportTimestamp(date: Date): string {
    return format(date, "yyyy-MM-dd'T'00:00:00'Z'");
}

export function metricValue(row: ActivityReportRow | undefined, metric: string): number {
    const value = row?.[metric];
    const parsed = typeof value === 'string' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : 0;
}

/** Last month's call volume, talk time and won deals for each rep. */
export class ActivityReportAgent {
    private readonly clock: Clock;

    constructor(private readonly config: ActivityConfig) {
        this.clock = config.clock ?? systemClock;
    }

    async run(): Promise<{ window: ReportWindow; reps: RepActivity[] }> {
        const window = previousMonthWindow(this.clock.now());
        logger.info(`Analyzing data from ${format(window.start, 'yyyy-MM-dd')} to ${format(subDays(window.end, 1), 'yyyy-MM-dd')}`);

        const reps: RepActivity[] = [];
        for (const rep of this.config.reps) {
            logger.info(`Processing data for ${rep.name}...`);
            reps.push(await this.repActivity(rep, window));
        }

        reps.sort((a, b) => b.totalDurationSeconds - a.totalDurationSeconds);
        return { window, reps };
    }

    private async repActivity(rep: SalesRep, window: ReportWindow): Promise<RepActivity> {
        const report = await this.config.close.activityReport({
            start: reportTimestamp(window.start),
            end: reportTimestamp(window.end),
            users: [rep.userId],
            metrics: Object.values(ACTIVITY_METRICS),
        });
        if (!report.found) {
            logger.warn(`No activity data for ${rep.name} (${report.reason})`);
        }

        const row = report.found ? report.record.find(entry => entry.user_id === rep.userId) : undefined;
        const totalDurationSeconds = metricValue(row, ACTIVITY_METRICS.totalDuration);

        return {
            name: rep.name,
            totalCalls: metricValue(row, ACTIVITY_METRICS.totalCalls),
            outboundCalls: metricValue(row, ACTIVITY_METRICS.outboundCalls),
            inboundCalls: metricValue(row, ACTIVITY_METRICS.inboundCalls),
            totalDurationSeconds,
            formattedDuration: formatDuration(totalDurationSeconds),
            wonOpportunities: metricValue(row, ACTIVITY_METRICS.wonOpportunities),
        };
    }
}

export function formatActivityTable(reps: RepActivity[]): string {
    const line = '='.repeat(90);
    const header = `${'Name'.padEnd(20)} ${'Total Calls'.padEnd(15)} ${'Total Call Time'.padEnd(20)} ${'Won Opportunities'.padEnd(20)}`;
    const body = reps.map(rep =>
        `${rep.name.padEnd(20)} ${String(rep.totalCalls).padEnd(15)} ${rep.formattedDuration.padEnd(20)} ${String(rep.wonOpportunities).padEnd(20)}`,
    );
    return ['Sales Rep Performance Summary', line, header, '-'.repeat(90), ...body, line].join('\n');
}
