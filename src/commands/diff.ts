/**
 * diff command - Show what sync would change for each application in a manifest
 */

import type { CommandContext, CommandResult } from '../types.js';
import { loadManifest, desiredRelations, ManifestError, type Manifest } from '../manifest/index.js';
import {
  reconcileRelationship,
  planHasChanges,
  type RelationshipPlan,
} from '../reconcilers/relationships/index.js';
import { printPlan, info, verbose, header, describeError, error as printError } from '../utils/output.js';

export interface DiffOptions {
  /** Path to the manifest file */
  manifest: string;
}

export interface ApplicationDiff {
  applicationId: string;
  name?: string;
  plans: RelationshipPlan[];
}

export interface DiffResult {
  applications: ApplicationDiff[];
  /** Number of edges that would be added or removed */
  changes: number;
}

/**
 * Compare a manifest with the live relationships of its applications
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions
): Promise<CommandResult<DiffResult>> {
  const { options: globalOpts, outputFormat } = ctx;

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
    header('Relationship Diff');
  }

  const client = ctx.getClient();
  const applications: ApplicationDiff[] = [];
  const errors: string[] = [];
  let changes = 0;

  for (const entry of manifest.applications) {
    const label = entry.name ? `${entry.name} (${entry.id})` : entry.id;
    const diff: ApplicationDiff = { applicationId: entry.id, name: entry.name, plans: [] };

    for (const { relation, ids } of desiredRelations(entry)) {
      const result = await reconcileRelationship(client.transport, entry.id, relation, ids, {
        prune: entry.prune,
        logger: client.logger,
        dryRun: true,
      });

      if (!result.success) {
        const message = `${label}: ${result.error ? describeError(result.error) : `failed to read ${relation}`}`;
        errors.push(message);
        if (outputFormat === 'human') printError(message);
        continue;
      }

      diff.plans.push(result.plan);
      changes += result.plan.toAdd.length + result.plan.toRemove.length;
      if (outputFormat === 'human') printPlan(label, result.plan);
    }

    applications.push(diff);
  }

  if (outputFormat === 'human' && errors.length === 0 && !applications.some((app) => app.plans.some(planHasChanges))) {
    info('Everything is in sync');
  }

  if (errors.length > 0) {
    return {
      success: false,
      message: `Diff failed for ${errors.length} relation(s)`,
      data: { applications, changes },
      errors,
    };
  }

  return {
    success: true,
    message: changes === 0 ? 'No changes' : `${changes} change(s) pending`,
    data: { applications, changes },
  };
}
