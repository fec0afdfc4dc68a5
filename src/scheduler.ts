/**
 * Mailer campaign scheduler
 *
 * Runs the find-owner handoff and the missing lot address fill on cron
 * schedules.
 *
 * Usage:
 *   npm run scheduler        - Run scheduler (stays running)
 *   npm run scheduler:once   - Run both jobs once immediately
 */

import cron from 'node-cron';
import { bootstrap, type Runtime } from './bootstrap.js';
import { runFindOwner } from './agents/find-owner/index.js';
import { runMissingLot } from './agents/missing-lot/index.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger, logSuccess } from './utils/logger.js';

export interface ScheduledJob {
    name: string;
    schedule: string;
    run: () => Promise<void>;
}

/**
 * Wrap a job so a tick that fires while the previous run is still going
 * is skipped. Errors are logged; the next tick runs as normal.
 */
export function nonOverlapping(name: string, run: () => Promise<void>): () => Promise<boolean> {
    let running = false;

    return async () => {
        if (running) {
            logger.warn(`${name} is still running, skipping this tick`);
            return false;
        }

        running = true;
        const started = Date.now();
        try {
            await run();
            logSuccess(`${name} finished in ${((Date.now() - started) / 1000).toFixed(1)}s`);
        } catch (error) {
            logger.error(`${name} failed: ${errorMessage(error)}`, { error });
        } finally {
            running = false;
        }
        return true;
    };
}

export function schedulerJobs(runtime: Runtime): ScheduledJob[] {
    const { schedule } = runtime.config;
    return [
        {
            name: 'Find owner',
            schedule: schedule.findOwner,
            run: async () => {
                const result = await runFindOwner(runtime);
                logger.info(`Find owner: ${result.status} (${result.count} leads)`);
            },
        },
        {
            name: 'Missing lot addresses',
            schedule: schedule.missingLot,
            run: async () => {
                await runMissingLot(runtime);
            },
        },
    ];
}

function startScheduler(runtime: Runtime): void {
    const { timezone } = runtime.config.schedule;
    const jobs = schedulerJobs(runtime);

    for (const job of jobs) {
        if (!cron.validate(job.schedule)) {
            throw new ConfigError(`Invalid cron expression for ${job.name}: "${job.schedule}"`);
        }
    }

    const tasks = jobs.map(job => {
        const tick = nonOverlapping(job.name, job.run);
        logger.info(`📅 ${job.name}: ${job.schedule} (${timezone})`);
        return cron.schedule(
            job.schedule,
            async () => {
                await tick();
            },
            { scheduled: true, timezone }
        );
    });

    const stop = () => {
        tasks.forEach(task => task.stop());
        process.exit(0);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);

    logSuccess('✅ Scheduler started. Waiting for next scheduled run...');
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    console.log(`
╔═══════════════════════════════════════════════════════════════╗
║          📬 MAILER CAMPAIGN SCHEDULER                         ║
╚═══════════════════════════════════════════════════════════════╝
`);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
Usage: npx tsx src/scheduler.ts [options]

Options:
  --once, -o     Run both jobs once immediately and exit
  --help, -h     Show this help message

Environment Variables:
  FIND_OWNER_SCHEDULE    Cron expression (default: "0 9 * * 1-5")
  MISSING_LOT_SCHEDULE   Cron expression (default: "30 6 * * *")
  SCHEDULE_TIMEZONE      Timezone (default: "America/New_York")
`);
        return;
    }

    const runtime = bootstrap();

    if (args.includes('--once') || args.includes('-o')) {
        logger.info('Running jobs once (--once flag)');
        for (const job of schedulerJobs(runtime)) {
            await nonOverlapping(job.name, job.run)();
        }
        return;
    }

    startScheduler(runtime);
}

if (import.meta.url === `file://${process.argv[1]}`) {
    main().catch((error: unknown) => {
        logger.error(`Scheduler failed: ${errorMessage(error)}`, { error });
        process.exit(1);
    });
}
