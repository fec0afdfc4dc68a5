#!/usr/bin/env node
import { runFindOwner } from './index.js';
import { bootstrap, runCli } from '../../bootstrap.js';

async function main() {
    console.log('\n🔎 Find owner handoff');
    console.log('═══════════════════════════════════════════════════════════════\n');

    const result = await runFindOwner(bootstrap(), process.argv[2]);
    console.log(`\nResult: ${result.status} (${result.count} leads)`);
}

runCli('find-owner', main);
