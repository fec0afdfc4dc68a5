#!/usr/bin/env node
import { runMissingLot } from './index.js';
import { bootstrap, runCli } from '../../bootstrap.js';

async function main() {
    console.log('\n📍 Missing lot addresses');
    console.log('═══════════════════════════════════════════════════════════════\n');

    await runMissingLot(bootstrap(), process.argv[2]);
}

runCli('missing-lot', main);
