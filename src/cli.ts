#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { Command, InvalidArgumentError } from 'commander';
import { loadEnvFromProcess, type Env } from './lib/env';
import { ConfigError, UpdaterError, errorMessage } from './lib/errors';
import { createUpdater } from './services';
import { validateUpdateRequest, type RepoUpdater } from './services/updater';

const VERSION = '1.0.0';

interface CliOptions {
  repo: string;
  prompt: string;
  baseBranch: string;
  newBranch?: string;
  pattern?: string;
  createFile: string[];
  model?: string;
  maxTokens?: number;
  preview: boolean;
  yes: boolean;
  json: boolean;
}

export interface CliDeps {
  loadEnv?: () => Env;
  createUpdater?: (env: Env) => RepoUpdater;
  confirm?: (question: string) => Promise<boolean>;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

async function askYesNo(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const confirm = deps.confirm ?? askYesNo;

  const program = new Command()
    .name('ai-branch-updater')
    .description('Update a GitHub repository with AI-generated changes on a new branch')
    .version(VERSION, '-v, --version', 'Output the current version')
    .requiredOption('-r, --repo <url>', 'GitHub repository URL (e.g. https://github.com/user/repo)')
    .requiredOption('-p, --prompt <text>', "Instruction for code changes (e.g. 'Add error handling')")
    .option('-b, --base-branch <name>', 'Base branch to create the new branch from', 'main')
    .option('-n, --new-branch <name>', 'Name for the new branch (generated when omitted)')
    .option('--pattern <glob>', "Only send files matching this glob (e.g. '*.py')")
    .option('--create-file <path>', 'Allow the AI to create this new file (repeatable)', collect, [])
    .option('--model <name>', 'Model override')
    .option('--max-tokens <n>', 'Output token limit for the AI call', positiveInt)
    .option('--preview', 'Show the proposed changes without committing', false)
    .option('-y, --yes', 'Commit without asking for confirmation', false)
    .option('--json', 'Print the result as JSON', false)
    .action(async (options: CliOptions) => {
      try {
        await execute(options, { ...deps, print, confirm });
      } catch (error) {
        printError(`Error: ${describe(error)}`);
        process.exitCode = 1;
      }
    });

  program.exitOverride();
  return program;
}

function describe(error: unknown): string {
  if (error instanceof UpdaterError) return `[${error.code}] ${error.message}`;
  if (error instanceof ConfigError) return `${error.message} (set it in the environment or .env)`;
  return errorMessage(error);
}

async function execute(
  options: CliOptions,
  deps: CliDeps & { print: (line: string) => void; confirm: (q: string) => Promise<boolean> }
): Promise<void> {
  const { print, confirm } = deps;
  const env = (deps.loadEnv ?? loadEnvFromProcess)();
  const updater = (deps.createUpdater ?? createUpdater)(env);

  const req = validateUpdateRequest(
    {
      repo_url: options.repo,
      prompt: options.prompt,
      base_branch: options.baseBranch,
      new_branch: options.newBranch,
      file_pattern: options.pattern,
      create_files: options.createFile,
      model: options.model,
      max_tokens: options.maxTokens,
    },
    updater.limits
  );

  const plan = await updater.preview(req);
  const { ref } = plan.snapshot;
  const changes = plan.changeSet.changes;

  if (!options.json) {
    print(`Repository: ${ref.owner}/${ref.repo} (${ref.baseBranch})`);
    print(`Files sent to the AI: ${plan.snapshot.files.length}, skipped: ${plan.snapshot.skipped.length}`);
  }

  if (changes.length === 0) {
    if (options.json) print(JSON.stringify({ success: true, files_changed: [], commits: 0 }));
    else print('No files were modified by the AI.');
    return;
  }

  if (options.preview) {
    if (options.json) {
      print(JSON.stringify({ success: true, files_to_update: changes.length, changes }));
    } else {
      print(`Preview mode - no changes committed. ${changes.length} file(s) would be changed:`);
      for (const c of changes) print(`  - ${c.path}${c.created ? ' (new)' : ''}`);
    }
    return;
  }

  if (!options.json) {
    print(`${changes.length} file(s) will be updated:`);
    for (const c of changes) print(`  - ${c.path}${c.created ? ' (new)' : ''}`);
  }

  if (!options.yes) {
    const ok = await confirm(`Create branch '${plan.branch}' and commit changes? [y/N]: `);
    if (!ok) {
      print('Aborted.');
      return;
    }
  }

  const { result } = await updater.apply(plan, req.prompt);
  if (options.json) {
    print(
      JSON.stringify({
        success: true,
        branch: result.branch,
        commits: result.commits,
        files_changed: result.filesChanged,
        commit_sha: result.commitSha,
      })
    );
    return;
  }
  print('Success!');
  print(`Branch: ${result.branch}`);
  print(`Commit: ${(result.commitSha ?? '').slice(0, 7)}`);
  print(`Files changed: ${result.filesChanged.length}`);
  print(`View changes: https://${ref.host}/${ref.owner}/${ref.repo}/compare/${result.branch}`);
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv, deps: CliDeps = {}): Promise<void> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version; those are not failures
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void runCli();
}
