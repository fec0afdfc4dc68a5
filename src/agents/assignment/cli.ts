#!/usr/bin/env node
import { AssignmentAgent, formatAssignmentTable } from './index.js';
import { bootstrap, createCloseClient, runCli } from '../../bootstrap.js';
import { loadQuery, loadSalesReps } from '../../config/index.js';

async function main() {
    console.log('\n👥 Lead assignment');
    console.log('═══════════════════════════════════════════════════════════════\n');

    const runtime = bootstrap();
    const close = createCloseClient(runtime);
    const reps = loadSalesReps(runtime.config);
    const countQuery = loadQuery(runtime.config, 'assignment-count');
    const reservoirQuery = loadQuery(runtime.config, 'assignment-reservoir');

    const targetArg = process.argv[2] ? parseInt(process.argv[2], 10) : undefined;
    const target = targetArg !== undefined && !isNaN(targetArg) ? targetArg : undefined;

    const agent = new AssignmentAgent({ close, registry: runtime.registry, reps, clock: runtime.clock, target });
    const rows = await agent.run(countQuery, reservoirQuery);

    console.log('\nSummary');
    console.log(formatAssignmentTable(rows));
}

runCli('assignment', main);
