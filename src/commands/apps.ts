/**
 * apps command - Read applications from the directory
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { Application } from '../api/types.js';
import { header, info, printTable, verbose, error as printError, describeError } from '../utils/output.js';

export interface AppsGetOptions {
  id: string;
}

export async function appsGetCommand(
  ctx: CommandContext,
  options: AppsGetOptions
): Promise<CommandResult<{ application: Application }>> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Fetching application ${options.id}`, globalOpts.verbose);

  const result = await ctx.getClient().applications.get(options.id);
  if (!result.success) {
    const message = describeError(result.error);
    if (outputFormat === 'human') printError(message);
    return { success: false, message, errors: [message] };
  }

  const application = result.data;
  if (outputFormat === 'human') {
    header(application.displayName ?? options.id);
    info(`Object ID: ${application.id ?? options.id}`);
    if (application.appId) info(`Application (client) ID: ${application.appId}`);
    if (application.signInAudience) info(`Sign-in audience: ${application.signInAudience}`);
    if (application.createdDateTime) info(`Created: ${application.createdDateTime}`);
    if (application.identifierUris?.length) info(`Identifier URIs: ${application.identifierUris.join(', ')}`);
    if (application.tags?.length) info(`Tags: ${application.tags.join(', ')}`);
  }

  return { success: true, message: `Application ${options.id}`, data: { application } };
}

export interface AppsListOptions {
  filter?: string;
  top?: number;
}

export async function appsListCommand(
  ctx: CommandContext,
  options: AppsListOptions = {}
): Promise<CommandResult<{ applications: Application[] }>> {
  const { outputFormat } = ctx;

  const result = await ctx.getClient().applications.list({
    filter: options.filter,
    top: options.top,
    select: ['id', 'appId', 'displayName'],
  });
  if (!result.success) {
    const message = describeError(result.error);
    if (outputFormat === 'human') printError(message);
    return { success: false, message, errors: [message] };
  }

  const applications = result.data;
  if (outputFormat === 'human') {
    header('Applications');
    printTable(
      applications.map((app) => ({ id: app.id, appId: app.appId, displayName: app.displayName })),
      ['id', 'appId', 'displayName']
    );
  }

  return {
    success: true,
    message: `Found ${applications.length} application(s)`,
    data: { applications },
  };
}
