#!/usr/bin/env node
import { HoldsAgent } from './index.js';
import { bootstrap, createCloseClient, runCli } from '../../bootstrap.js';
import { loadQuery } from '../../config/index.js';

async function main() {
    console.log('\n⏸️  Release holds');
    console.log('═══════════════════════════════════════════════════════════════\n');

    const runtime = bootstrap();
    const close = createCloseClient(runtime);
    const query = loadQuery(runtime.config, process.argv[2] ?? 'holds');

    await new HoldsAgent({ close, registry: runtime.registry, clock: runtime.clock }).run(query);
}

runCli('holds', main);
