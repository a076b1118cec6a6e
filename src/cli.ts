/**
 * dirapps CLI - Manage directory applications and their relationships
 *
 * Commands:
 * - apps: Read applications
 * - owners / policies: List, add and remove reference edges
 * - diff: Show what a manifest would change
 * - sync: Apply a manifest's relationships
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  appsGetCommand,
  appsListCommand,
  relationListCommand,
  relationAddCommand,
  relationRemoveCommand,
  diffCommand,
  syncCommand,
} from './commands/index.js';
import type { RelationName } from './reconcilers/relationships/index.js';
import { createClient, type DirectoryClient } from './api/client.js';
import { printResult, error } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 *
 * The client is created on first use so that a missing token only fails
 * commands that reach the directory.
 */
function createContext(options: GlobalOptions): CommandContext {
  let client: DirectoryClient | undefined;
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    getClient() {
      client ??= createClient({ debug: options.verbose });
      return client;
    },
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('dirapps')
  .description('CLI tool for managing directory applications')
  .version(VERSION)
  .addOption(
    new Option('--dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * Run a command handler, print its result and exit with its status
 */
async function run<T>(label: string, handler: (ctx: CommandContext) => Promise<CommandResult<T>>): Promise<void> {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = await handler(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (ctx.outputFormat === 'json') {
      printResult({ success: false, message: `${label} failed`, errors: [message] }, ctx.outputFormat);
    } else {
      error(`${label} failed: ${message}`);
    }
    process.exit(1);
  }
}

/**
 * apps command - Read applications
 */
const apps = program
  .command('apps')
  .description('Read directory applications');

apps
  .command('get')
  .description('Show one application')
  .argument('<id>', 'Application object id')
  .action(async (id: string) => {
    await run('Get application', (ctx) => appsGetCommand(ctx, { id }));
  });

apps
  .command('list')
  .description('List applications')
  .option('--filter <expr>', 'OData $filter expression')
  .option('--top <n>', 'Return at most n applications', parsePositiveInt)
  .action(async (cmdOpts: { filter?: string; top?: number }) => {
    await run('List applications', (ctx) => appsListCommand(ctx, cmdOpts));
  });

/**
 * owners / policies commands - Edit reference edges of one application
 */
function relationCommand(name: string, relation: RelationName, noun: string): void {
  const group = program
    .command(name)
    .description(`Manage ${noun} of an application`);

  group
    .command('list')
    .description(`List ${noun}`)
    .argument('<appId>', 'Application object id')
    .action(async (applicationId: string) => {
      await run(`List ${noun}`, (ctx) => relationListCommand(ctx, relation, { applicationId }));
    });

  group
    .command(name === 'policies' ? 'assign' : 'add')
    .description(`Add ${noun}; ids already present are left as they are`)
    .argument('<appId>', 'Application object id')
    .argument('<ids...>', 'Directory object ids')
    .action(async (applicationId: string, ids: string[]) => {
      await run(`Add ${noun}`, (ctx) => relationAddCommand(ctx, relation, { applicationId, ids }));
    });

  group
    .command('remove')
    .description(`Remove ${noun}; ids already absent are skipped`)
    .argument('<appId>', 'Application object id')
    .argument('<ids...>', 'Directory object ids')
    .action(async (applicationId: string, ids: string[]) => {
      await run(`Remove ${noun}`, (ctx) => relationRemoveCommand(ctx, relation, { applicationId, ids }));
    });
}

relationCommand('owners', 'owners', 'owners');
relationCommand('policies', 'tokenIssuancePolicies', 'token issuance policies');

/**
 * diff command - Show pending manifest changes
 */
program
  .command('diff')
  .description('Show what sync would change')
  .argument('<manifest>', 'Path to the manifest file')
  .action(async (manifest: string) => {
    await run('Diff', (ctx) => diffCommand(ctx, { manifest }));
  });

/**
 * sync command - Apply a manifest
 */
program
  .command('sync')
  .description('Make application relationships match a manifest')
  .argument('<manifest>', 'Path to the manifest file')
  .action(async (manifest: string) => {
    await run('Sync', (ctx) => syncCommand(ctx, { manifest }));
  });

// Parse and execute
await program.parseAsync();
