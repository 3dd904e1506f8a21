/**
 * Repository bootstrap
 *
 * Usage: npm run setup:git [-- <dir>]
 *
 * Runs `git init` only when the directory has no .git yet, then stages
 * everything and prints the short status. Nothing here rewrites history.
 */

import { execFileSync } from 'child_process';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { fileURLToPath } from 'url';

export type GitRunner = (args: string[], cwd: string) => string;

export interface SetupResult {
  initialized: boolean;
  status: string;
}

export const runGit: GitRunner = (args, cwd) =>
  execFileSync('git', args, { cwd, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'inherit'] });

export const NEXT_STEPS = [
  'Next steps:',
  '  1. Review the staged files: git status',
  '  2. Commit: git commit -m "Initial commit"',
  '  3. Add a remote: git remote add origin <url>',
  '  4. Push: git push -u origin main',
  '',
  '.gitignore keeps client rosters and run output, OIG/SAM list files and',
  'reference caches, virtual environments, node_modules and build output',
  'out of version control.',
];

export function setupGitRepository(
  dir: string,
  git: GitRunner = runGit,
  print: (line: string) => void = console.log
): SetupResult {
  const root = resolve(dir);
  const initialized = !existsSync(join(root, '.git'));

  if (initialized) {
    git(['init'], root);
    print(`✅ Initialized git repository in ${root}`);
  } else {
    print(`ℹ️  Git repository already exists in ${root}`);
  }

  git(['add', '.'], root);
  const status = git(['status', '--short'], root);

  print('📋 Status:');
  print(status.trimEnd() || '   (nothing to commit)');
  print('');
  for (const line of NEXT_STEPS) print(line);

  return { initialized, status };
}

function exitStatus(error: unknown): number {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 1;
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  try {
    setupGitRepository(process.argv[2] ?? process.cwd());
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = exitStatus(error);
  }
}
