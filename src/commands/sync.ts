/**
 * sync command - Apply a manifest's relationships to the directory
 */

import type { CommandContext, CommandResult } from '../types.js';
import { loadManifest, desiredRelations, ManifestError, type Manifest } from '../manifest/index.js';
import {
  reconcileRelationship,
  formatPlanSummary,
  type RelationshipSyncResult,
} from '../reconcilers/relationships/index.js';
import {
  header,
  verbose,
  success,
  dryRunNotice,
  printPlan,
  printEdges,
  describeError,
  error as printError,
} from '../utils/output.js';

export interface SyncOptions {
  /** Path to the manifest file */
  manifest: string;
}

export interface SyncResult {
  results: RelationshipSyncResult[];
  applied: number;
  dryRun: boolean;
}

/**
 * Reconcile every relation listed in the manifest
 *
 * Applications are independent: a failure on one is reported and sync moves
 * on to the next. Within an application, the remaining relations are skipped.
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions
): Promise<CommandResult<SyncResult>> {
  const { options: globalOpts, outputFormat } = ctx;
  const dryRun = globalOpts.dryRun;

  verbose(`Loading manifest ${options.manifest}`, globalOpts.verbose);

  let manifest: Manifest;
  try {
    manifest = await loadManifest(options.manifest);
  } catch (err) {
    if (!(err instanceof ManifestError)) throw err;
    if (outputFormat === 'human') printError(err.message);
    return { success: false, message: err.message, errors: [err.message] };
  }

  if (outputFormat === 'human') {
    if (dryRun) dryRunNotice();
    header('Sync');
  }

  const client = ctx.getClient();
  const results: RelationshipSyncResult[] = [];
  const errors: string[] = [];

  for (const entry of manifest.applications) {
    const label = entry.name ? `${entry.name} (${entry.id})` : entry.id;

    for (const { relation, ids } of desiredRelations(entry)) {
      const result = await reconcileRelationship(client.transport, entry.id, relation, ids, {
        prune: entry.prune,
        logger: client.logger,
        dryRun,
      });
      results.push(result);

      verbose(`${label}: ${formatPlanSummary(result.plan)}`, globalOpts.verbose);
      if (outputFormat === 'human') {
        printPlan(label, result.plan);
        printEdges(result.edges);
      }

      if (!result.success) {
        const message = `${label}: ${result.error ? describeError(result.error) : `failed to sync ${relation}`}`;
        errors.push(message);
        if (outputFormat === 'human') printError(message);
        break;
      }
    }
  }

  const applied = results.reduce(
    (count, result) => count + result.edges.filter((edge) => edge.outcome === 'applied').length,
    0
  );

  if (errors.length > 0) {
    return {
      success: false,
      message: `Sync failed for ${errors.length} application(s)`,
      data: { results, applied, dryRun },
      errors,
    };
  }

  if (outputFormat === 'human' && !dryRun) {
    success(`Applied ${applied} edge change(s)`);
  }

  return {
    success: true,
    message: dryRun ? 'Dry run complete' : `Sync complete: ${applied} edge change(s)`,
    data: { results, applied, dryRun },
  };
}
