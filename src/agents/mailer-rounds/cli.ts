#!/usr/bin/env node
import { MailerRoundsAgent, type MailerRound } from './index.js';
import { bootstrap, createCloseClient, runCli } from '../../bootstrap.js';
import { loadQuery } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

const QUERY_FILES: Record<MailerRound, string> = {
    'round-one': 'round-one',
    'follow-up': 'follow-up',
};

function parseRound(arg: string | undefined): MailerRound {
    if (arg === 'round-one' || arg === 'follow-up') return arg;
    throw new ConfigError(`Usage: mailer-rounds <round-one|follow-up> [query.json]`);
}

async function main() {
    const [roundArg, queryArg] = process.argv.slice(2);
    const round = parseRound(roundArg);

    console.log(`\n📬 Mailer rounds: ${round}`);
    console.log('═══════════════════════════════════════════════════════════════\n');

    const runtime = bootstrap();
    const close = createCloseClient(runtime);
    const query = loadQuery(runtime.config, queryArg ?? QUERY_FILES[round]);

    const agent = new MailerRoundsAgent({ close, registry: runtime.registry, clock: runtime.clock });
    await agent.run(round, query);
}

runCli('mailer-rounds', main);
