/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints how the environment was loaded without running anything else.
 */

import { KNOWN_ENV_KEYS, getEnvDiagnostics, initEnv, resolveClientsDir, resolveDataDir } from '@exclusion/config';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from files: ${keysLoaded.length}`);
console.log(`   Data dir: ${resolveDataDir()}`);
console.log(`   Clients dir: ${resolveClientsDir()}`);

const diagnostics = getEnvDiagnostics(KNOWN_ENV_KEYS);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.keys) {
  const status = key.present ? '✅' : '⚪';
  const value = key.value ? ` = ${key.value}` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${value}${source}`);
}

// Structured JSON output (for machine parsing)
console.log('\n📊 Structured Output (JSON):');
console.log(
  JSON.stringify(
    {
      event: 'env.diagnostics',
      envFilePath,
      envFileExists: loaded,
      envLocalFilePath,
      envLocalFileExists: localLoaded,
      keysLoadedCount: keysLoaded.length,
      variables: diagnostics.keys,
      warnings: diagnostics.warnings,
    },
    null,
    2
  )
);

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}
