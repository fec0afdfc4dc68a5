#!/usr/bin/env node
import { LettersAgent } from './index.js';
import { bootstrap, createCloseClient, createPostGridClient, runCli } from '../../bootstrap.js';
import { loadQuery } from '../../config/index.js';

async function main() {
    console.log('\n✉️  Collection letters');
    console.log('═══════════════════════════════════════════════════════════════\n');

    const runtime = bootstrap();
    const close = createCloseClient(runtime);
    const postgrid = createPostGridClient(runtime);
    const query = loadQuery(runtime.config, process.argv[2] ?? 'letters');

    await new LettersAgent({ close, postgrid, registry: runtime.registry, clock: runtime.clock }).run(query);
}

runCli('letters', main);
