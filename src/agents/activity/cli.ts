#!/usr/bin/env node
import { ActivityReportAgent, formatActivityTable } from './index.js';
import { bootstrap, createCloseClient, runCli } from '../../bootstrap.js';
import { loadSalesReps } from '../../config/index.js';

async function main() {
    console.log('\n📈 Sales rep activity');
    console.log('═══════════════════════════════════════════════════════════════\n');

    const runtime = bootstrap();
    const agent = new ActivityReportAgent({
        close: createCloseClient(runtime),
        reps: loadSalesReps(runtime.config),
        clock: runtime.clock,
    });

    const { reps } = await agent.run();
    console.log(`\n${formatActivityTable(reps)}`);
}

runCli('activity', main);
