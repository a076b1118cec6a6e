/**
 * owners / policies commands - Inspect and edit reference edges of an application
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { ApplicationsClient, OperationResult } from '../api/applications.js';
import type { DirectoryError } from '../api/errors.js';
import type { EdgeResult, RelationName } from '../reconcilers/relationships/index.js';
import {
  header,
  info,
  success,
  printEdges,
  printTable,
  dryRunNotice,
  describeError,
  error as printError,
} from '../utils/output.js';

const LABELS: Record<RelationName, string> = {
  owners: 'Owners',
  tokenIssuancePolicies: 'Token issuance policies',
};

export interface RelationTarget {
  id: string;
  displayName?: string;
}

async function listTargets(
  applications: ApplicationsClient,
  relation: RelationName,
  applicationId: string
): Promise<OperationResult<RelationTarget[]>> {
  if (relation === 'owners') {
    const result = await applications.listOwners(applicationId);
    return result.success ? { ...result, data: result.data.map((id) => ({ id })) } : result;
  }

  const result = await applications.listTokenIssuancePolicy(applicationId);
  if (!result.success) return result;
  const targets: RelationTarget[] = [];
  for (const policy of result.data) {
    if (policy.id) targets.push({ id: policy.id, displayName: policy.displayName });
  }
  return { ...result, data: targets };
}

function failure(ctx: CommandContext, result: { error: DirectoryError }): CommandResult<never> {
  const message = describeError(result.error);
  if (ctx.outputFormat === 'human') printError(message);
  return { success: false, message, errors: [message] };
}

export interface RelationListOptions {
  applicationId: string;
}

export async function relationListCommand(
  ctx: CommandContext,
  relation: RelationName,
  options: RelationListOptions
): Promise<CommandResult<{ targets: RelationTarget[] }>> {
  const result = await listTargets(ctx.getClient().applications, relation, options.applicationId);
  if (!result.success) return failure(ctx, result);

  if (ctx.outputFormat === 'human') {
    header(`${LABELS[relation]} of ${options.applicationId}`);
    printTable(
      result.data.map((target) => ({ id: target.id, displayName: target.displayName })),
      relation === 'owners' ? ['id'] : ['id', 'displayName']
    );
  }

  return {
    success: true,
    message: `Found ${result.data.length} ${relation === 'owners' ? 'owner(s)' : 'policy assignment(s)'}`,
    data: { targets: result.data },
  };
}

export interface RelationEditOptions {
  applicationId: string;
  ids: string[];
}

export interface RelationEditResult {
  edges: EdgeResult[];
  /** Present in dry-run mode: ids that would change */
  planned?: string[];
}

/**
 * Preview an edit: the ids whose presence in the live relation would change
 */
async function planEdit(
  ctx: CommandContext,
  relation: RelationName,
  action: 'add' | 'remove',
  options: RelationEditOptions
): Promise<CommandResult<RelationEditResult>> {
  const listed = await listTargets(ctx.getClient().applications, relation, options.applicationId);
  if (!listed.success) return failure(ctx, listed);

  const live = new Set(listed.data.map((target) => target.id));
  const planned = options.ids.filter((id) => (action === 'add' ? !live.has(id) : live.has(id)));

  if (ctx.outputFormat === 'human') {
    dryRunNotice();
    if (planned.length === 0) {
      info('Nothing to change');
    }
    for (const id of planned) {
      info(`Would ${action} ${id}`);
    }
  }

  return {
    success: true,
    message: `Dry run: ${planned.length} edge(s) would change`,
    data: { edges: [], planned },
  };
}

function edited(
  ctx: CommandContext,
  relation: RelationName,
  action: 'add' | 'remove',
  result: OperationResult<EdgeResult[]>
): CommandResult<RelationEditResult> {
  if (!result.success) return failure(ctx, result);

  const changed = result.data.filter((edge) => edge.outcome === 'applied').length;
  if (ctx.outputFormat === 'human') {
    header(LABELS[relation]);
    printEdges(result.data);
    success(`${action === 'add' ? 'Added' : 'Removed'} ${changed} edge(s)`);
  }

  return {
    success: true,
    message: `${changed} of ${result.data.length} edge(s) changed`,
    data: { edges: result.data },
  };
}

export async function relationAddCommand(
  ctx: CommandContext,
  relation: RelationName,
  options: RelationEditOptions
): Promise<CommandResult<RelationEditResult>> {
  if (ctx.options.dryRun) {
    return planEdit(ctx, relation, 'add', options);
  }

  const applications = ctx.getClient().applications;
  const refs = options.ids.map((id) => ({ id }));
  const result =
    relation === 'owners'
      ? await applications.addOwners({ id: options.applicationId, owners: refs })
      : await applications.assignTokenIssuancePolicy({ id: options.applicationId, tokenIssuancePolicies: refs });

  return edited(ctx, relation, 'add', result);
}

export async function relationRemoveCommand(
  ctx: CommandContext,
  relation: RelationName,
  options: RelationEditOptions
): Promise<CommandResult<RelationEditResult>> {
  if (ctx.options.dryRun) {
    return planEdit(ctx, relation, 'remove', options);
  }

  const applications = ctx.getClient().applications;
  const result =
    relation === 'owners'
      ? await applications.removeOwners(options.applicationId, options.ids)
      : await applications.removeTokenIssuancePolicy({ id: options.applicationId }, options.ids);

  return edited(ctx, relation, 'remove', result);
}
