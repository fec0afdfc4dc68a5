/**
 * Check the field registry against the CRM account's custom field schema
 *
 * Usage: npx tsx scripts/validate-registry.ts
 */

import { bootstrap, createCloseClient, runCli } from '../src/bootstrap.js';
import { validateRegistry } from '../src/config/registry.js';

async function main() {
  console.log('\n🗂️  Validating field registry\n');

  const runtime = bootstrap();
  const check = await validateRegistry(runtime.registry, createCloseClient(runtime));

  if (!check.checked) {
    console.log('⚠️  Schema unavailable, nothing checked');
    return;
  }
  if (check.unknownFields.length === 0) {
    console.log('✅ All registry fields exist in the CRM');
    return;
  }

  console.log(`❌ ${check.unknownFields.length} unknown field(s):`);
  for (const field of check.unknownFields) {
    console.log(`   • ${field}`);
  }
  process.exitCode = 1;
}

runCli('validate-registry', main);
