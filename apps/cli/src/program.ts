/**
 * `exclusion` command-line interface
 */

import { Command } from 'commander';
import { ENGINE_VERSION, SECTION_NAMES } from '@exclusion/core';
import {
  KNOWN_ENV_KEYS,
  createLogger,
  getEnvDiagnostics,
  listClientConfigs,
  loadClientConfig,
  referenceCacheDir,
  resolveClientsDir,
  resolveDataDir,
} from '@exclusion/config';
import { buildReferenceCache, describeCache, listCacheMonths } from '@exclusion/reference';
import { listRuns } from '@exclusion/history';
import { runExclusionCheck } from './runner.js';

const logger = createLogger('cli');

export interface ProgramIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: ProgramIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface DataDirOption {
  dataDir?: string;
}

interface CacheBuildOptions extends DataDirOption {
  month: string;
  oig: string;
  sam: string;
}

interface CacheStatusOptions extends DataDirOption {
  month?: string;
}

interface RunCommandOptions extends DataDirOption {
  client: string;
  month: string;
  staff?: string;
  board?: string;
  vendors?: string;
  oig?: string;
  sam?: string;
  clientsDir?: string;
}

interface RunsOptions extends DataDirOption {
  client?: string;
}

function formatBytes(bytes: number): string {
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function buildProgram(io: ProgramIO = consoleIO): Command {
  // Failures print one line and set exit status 1; the stack goes to the log
  const guarded =
    <A extends unknown[]>(name: string, fn: (...args: A) => Promise<void> | void) =>
    async (...args: A): Promise<void> => {
      try {
        await fn(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(
          { event: 'cli.command.failed', command: name, error: message, stack: error instanceof Error ? error.stack : undefined },
          `${name} failed`
        );
        io.err(`❌ ${message}`);
        process.exitCode = 1;
      }
    };

  const program = new Command();
  program
    .name('exclusion')
    .description('Monthly OIG/SAM exclusion screening for staff, board and vendor rosters')
    .version(ENGINE_VERSION);

  program
    .command('clients')
    .description('List client configurations')
    .option('--dir <dir>', 'clients directory (default EXCLUSION_CLIENTS_DIR or <repo>/clients)')
    .action(
      guarded('clients', (options: { dir?: string }) => {
        const dir = options.dir ?? resolveClientsDir();
        const entries = listClientConfigs(dir);
        if (entries.length === 0) {
          io.out(`No client configurations in ${dir}`);
          return;
        }
        for (const entry of entries) {
          io.out(entry.ok ? `✅ ${entry.name}  ${entry.path}` : `❌ ${entry.name}  ${entry.path}\n   ${entry.error}`);
        }
      })
    );

  program
    .command('validate')
    .description('Validate one client configuration file')
    .argument('<config>', 'path to the YAML file')
    .action(
      guarded('validate', (path: string) => {
        const config = loadClientConfig(path);
        const sections = SECTION_NAMES.filter((section) => config[section] !== undefined);
        io.out(`✅ ${path} is valid`);
        io.out(`   Client: ${config.client_name}`);
        io.out(`   Sections: ${sections.length > 0 ? sections.join(', ') : '(none, all columns auto-resolved)'}`);
      })
    );

  const cache = program.command('cache').description('Monthly reference cache');

  cache
    .command('build')
    .description('Build the reference cache for a month from the OIG and SAM files')
    .requiredOption('--month <YYYY-MM>', 'month the lists were published')
    .requiredOption('--oig <file>', 'OIG LEIE CSV')
    .requiredOption('--sam <file>', 'SAM exclusions CSV')
    .option('--data-dir <dir>', 'data directory (default EXCLUSION_DATA_DIR)')
    .action(
      guarded('cache build', async (options: CacheBuildOptions) => {
        const summary = await buildReferenceCache({
          dataDir: options.dataDir ?? resolveDataDir(),
          month: options.month,
          oigPath: options.oig,
          samPath: options.sam,
        });
        io.out(`✅ Reference cache built for ${summary.month}: ${summary.path}`);
        io.out(`   OIG people: ${summary.counts.oig_people}, entities: ${summary.counts.oig_entities}`);
        io.out(`   SAM people: ${summary.counts.sam_people}, entities: ${summary.counts.sam_entities}`);
        io.out(`   Took ${(summary.durationMs / 1000).toFixed(1)}s`);
      })
    );

  cache
    .command('status')
    .description('Show one month\'s cache, or list the months that have one')
    .option('--month <YYYY-MM>', 'month to describe')
    .option('--data-dir <dir>', 'data directory (default EXCLUSION_DATA_DIR)')
    .action(
      guarded('cache status', (options: CacheStatusOptions) => {
        const dataDir = options.dataDir ?? resolveDataDir();

        if (!options.month) {
          const months = listCacheMonths(dataDir);
          if (months.length === 0) {
            io.out(`No reference caches in ${referenceCacheDir(dataDir)}`);
            return;
          }
          for (const month of months) io.out(month);
          return;
        }

        const status = describeCache(dataDir, options.month);
        if (!status.exists) {
          io.out(`❌ No reference cache for ${status.month} (expected ${status.path})`);
          process.exitCode = 1;
          return;
        }
        io.out(`✅ Reference cache for ${status.month}: ${status.path}`);
        if (status.sizeBytes !== undefined) io.out(`   Size: ${formatBytes(status.sizeBytes)}`);
        for (const [key, value] of Object.entries(status.meta ?? {})) {
          io.out(`   ${key}: ${value}`);
        }
      })
    );

  program
    .command('run')
    .description('Screen a client\'s rosters for a month')
    .requiredOption('--client <client>', 'client name, file stem or YAML path')
    .requiredOption('--month <YYYY-MM>', 'screening month (its reference cache must exist)')
    .option('--staff <file>', 'staff roster (CSV or Excel)')
    .option('--board <file>', 'board roster (CSV or Excel)')
    .option('--vendors <file>', 'vendor roster (CSV or Excel)')
    .option('--oig <file>', 'OIG list file, hashed into the run metadata')
    .option('--sam <file>', 'SAM list file, hashed into the run metadata')
    .option('--data-dir <dir>', 'data directory (default EXCLUSION_DATA_DIR)')
    .option('--clients-dir <dir>', 'clients directory (default EXCLUSION_CLIENTS_DIR)')
    .action(
      guarded('run', async (options: RunCommandOptions) => {
        const output = await runExclusionCheck(options);
        const { metadata } = output;

        io.out(`✅ Run complete: ${output.runDir}`);
        io.out(`   Audit workbook: ${output.auditPath}`);
        for (const section of SECTION_NAMES) {
          const path = output.reportPaths[section];
          if (path) io.out(`   ${section} report: ${path}`);
        }
        io.out(`   Screened: staff ${metadata.staff_count}, board ${metadata.board_count}, vendors ${metadata.vendor_count}`);
        io.out(`   Confirmed exclusions: ${metadata.confirmed_count}`);
        io.out(`   Rows needing review: ${metadata.review_count}`);
        for (const section of SECTION_NAMES) {
          const warnings = metadata.sections[section]?.warnings.length ?? 0;
          if (warnings > 0) io.out(`   ⚠️  ${section}: ${warnings} row warning(s), see metadata.json`);
        }
      })
    );

  program
    .command('runs')
    .description('List past runs, newest first')
    .option('--client <client>', 'only this client')
    .option('--data-dir <dir>', 'data directory (default EXCLUSION_DATA_DIR)')
    .action(
      guarded('runs', (options: RunsOptions) => {
        const runs = listRuns(options.dataDir ?? resolveDataDir(), options.client);
        if (runs.length === 0) {
          io.out('No runs recorded');
          return;
        }
        for (const run of runs) {
          io.out(
            `${run.month}  ${run.client}  ${run.timestamp}  confirmed=${run.confirmedCount} review=${run.reviewCount}  ${run.dir}`
          );
        }
      })
    );

  program
    .command('env')
    .description('Environment diagnostics')
    .action(
      guarded('env', () => {
        const diagnostics = getEnvDiagnostics(KNOWN_ENV_KEYS);
        io.out(`Repo root: ${diagnostics.repoRoot}`);
        io.out(`.env file: ${diagnostics.envFilePath} (${diagnostics.envFileExists ? 'found' : 'missing'})`);
        io.out(`Data dir: ${resolveDataDir()}`);
        io.out(`Clients dir: ${resolveClientsDir()}`);
        for (const key of diagnostics.keys) {
          const source = key.source ? ` [from ${key.source}]` : '';
          io.out(`${key.present ? '✅' : '⚪'} ${key.key}${key.value ? ` = ${key.value}` : ''}${source}`);
        }
        for (const warning of diagnostics.warnings) io.out(`⚠️  ${warning}`);
      })
    );

  return program;
}
