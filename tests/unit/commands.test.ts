/**
 * Unit Tests: CLI commands
 *
 * Commands run against a client over a scripted directory. JSON output mode
 * keeps them quiet; one test checks human output.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  appsGetCommand,
  appsListCommand,
  diffCommand,
  relationAddCommand,
  relationListCommand,
  relationRemoveCommand,
  syncCommand,
} from '../../src/commands/index.js';
import { createClient } from '../../src/api/client.js';
import type { CommandContext, GlobalOptions } from '../../src/types.js';
import { BASE_URL, NO_RETRY, odataError, quietLogger, scriptedFetch, type ScriptedFetch } from './helpers.js';

const DENIED = odataError('Authorization_RequestDenied', 'Insufficient privileges to complete the operation.');
const OWNERS = '/beta/applications/app-1/owners';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'dirapps-commands-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

function createContext(script: ScriptedFetch, options: Partial<GlobalOptions> = {}): CommandContext {
  const client = createClient(
    {
      accessToken: 'test-token',
      baseUrl: BASE_URL,
      tenantId: 'tenant-1',
      retry: NO_RETRY,
      fetch: script.fetch,
      logger: quietLogger,
    },
    { env: {}, settingsPath: join(dir, 'settings.yaml') }
  );
  const globalOptions: GlobalOptions = { dryRun: false, json: true, verbose: false, ...options };
  return {
    options: globalOptions,
    outputFormat: globalOptions.json ? 'json' : 'human',
    getClient: () => client,
  };
}

function manifestFile(name: string, lines: string[]): string {
  const file = join(dir, name);
  writeFileSync(file, ['apiVersion: dirapps/v1', 'applications:', ...lines, ''].join('\n'));
  return file;
}

// =============================================================================
// apps
// =============================================================================

describe('apps', () => {
  it('gets one application', async () => {
    const script = scriptedFetch({
      'GET /beta/applications/app-1': { status: 200, body: { id: 'app-1', displayName: 'Payroll' } },
    });

    const result = await appsGetCommand(createContext(script), { id: 'app-1' });

    expect(result).toEqual({
      success: true,
      message: 'Application app-1',
      data: { application: { id: 'app-1', displayName: 'Payroll' } },
    });
  });

  it('describes a failed read', async () => {
    const script = scriptedFetch({ 'GET /beta/applications/app-1': { status: 403, body: DENIED } });

    const result = await appsGetCommand(createContext(script), { id: 'app-1' });

    const message =
      'applications.get: Directory API error (403): Insufficient privileges to complete the operation. (HTTP 403)';
    expect(result).toEqual({ success: false, message, errors: [message] });
  });

  it('lists applications with a narrow select', async () => {
    const script = scriptedFetch({
      'GET /beta/applications': {
        status: 200,
        body: { value: [{ id: 'app-1', appId: 'client-1', displayName: 'Payroll' }] },
      },
    });

    const result = await appsListCommand(createContext(script));

    expect(result.message).toBe('Found 1 application(s)');
    expect(script.requests[0]?.url.searchParams.get('$select')).toBe('id,appId,displayName');
  });
});

// =============================================================================
// owners / policies
// =============================================================================

describe('relation commands', () => {
  it('lists policy assignments', async () => {
    const script = scriptedFetch({
      'GET /beta/tenant-1/applications/app-1/tokenIssuancePolicies': {
        status: 200,
        body: { value: [{ id: 'policy-1', displayName: 'Short' }] },
      },
    });

    const result = await relationListCommand(createContext(script), 'tokenIssuancePolicies', {
      applicationId: 'app-1',
    });

    expect(result.message).toBe('Found 1 policy assignment(s)');
    expect(result.data?.targets).toEqual([{ id: 'policy-1', displayName: 'Short' }]);
  });

  it('prints owners as a table in human mode', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const script = scriptedFetch({ [`GET ${OWNERS}`]: { status: 200, body: { value: [{ id: 'user-1' }] } } });

    await relationListCommand(createContext(script, { json: false }), 'owners', { applicationId: 'app-1' });

    expect(log).toHaveBeenCalledWith('user-1');
  });

  it('previews an add in dry-run mode', async () => {
    const script = scriptedFetch({ [`GET ${OWNERS}`]: { status: 200, body: { value: [{ id: 'user-1' }] } } });

    const result = await relationAddCommand(createContext(script, { dryRun: true }), 'owners', {
      applicationId: 'app-1',
      ids: ['user-1', 'user-2'],
    });

    expect(result).toEqual({
      success: true,
      message: 'Dry run: 1 edge(s) would change',
      data: { edges: [], planned: ['user-2'] },
    });
    expect(script.sent(`POST ${OWNERS}/$ref`)).toHaveLength(0);
  });

  it('adds owners', async () => {
    const script = scriptedFetch({ [`POST ${OWNERS}/$ref`]: { status: 204 } });

    const result = await relationAddCommand(createContext(script), 'owners', {
      applicationId: 'app-1',
      ids: ['user-2'],
    });

    expect(result.message).toBe('1 of 1 edge(s) changed');
    expect(result.data?.edges[0]?.outcome).toBe('applied');
  });

  it('reports a denied add', async () => {
    const script = scriptedFetch({ [`POST ${OWNERS}/$ref`]: { status: 403, body: DENIED } });

    const result = await relationAddCommand(createContext(script), 'owners', {
      applicationId: 'app-1',
      ids: ['user-2'],
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe(
      'applications.addOwners: Directory API error (403): Insufficient privileges to complete the operation. (HTTP 403)'
    );
  });

  it('removes a policy that is not assigned without a delete', async () => {
    const script = scriptedFetch({
      'GET /beta/tenant-1/applications/app-1/tokenIssuancePolicies': { status: 200, body: { value: [] } },
    });

    const result = await relationRemoveCommand(createContext(script), 'tokenIssuancePolicies', {
      applicationId: 'app-1',
      ids: ['policy-1'],
    });

    expect(result.message).toBe('0 of 1 edge(s) changed');
    expect(script.requests).toHaveLength(1);
  });
});

// =============================================================================
// diff / sync
// =============================================================================

describe('diff', () => {
  it('shows the plan for each listed relation', async () => {
    const manifest = manifestFile('diff.yaml', ['  - id: app-1', '    name: Payroll', '    owners: [user-1, user-2]']);
    const script = scriptedFetch({
      [`GET ${OWNERS}`]: { status: 200, body: { value: [{ id: 'user-1' }, { id: 'user-3' }] } },
    });

    const result = await diffCommand(createContext(script), { manifest });

    expect(result).toEqual({
      success: true,
      message: '1 change(s) pending',
      data: {
        changes: 1,
        applications: [
          {
            applicationId: 'app-1',
            name: 'Payroll',
            plans: [
              { relation: 'owners', toAdd: ['user-2'], toRemove: [], unchanged: ['user-1'], retained: ['user-3'] },
            ],
          },
        ],
      },
    });
    expect(script.requests).toHaveLength(1);
  });

  it('reports a missing manifest', async () => {
    const manifest = join(dir, 'nope.yaml');

    const result = await diffCommand(createContext(scriptedFetch({})), { manifest });

    expect(result.success).toBe(false);
    expect(result.message).toBe(`Manifest file not found: ${manifest}`);
  });
});

describe('sync', () => {
  const pruning = ['  - id: app-1', '    owners: [user-1, user-2]', '    prune: true'];
  const routes = {
    [`GET ${OWNERS}`]: { status: 200, body: { value: [{ id: 'user-1' }, { id: 'user-3' }] } },
    [`POST ${OWNERS}/$ref`]: { status: 204 },
    [`DELETE ${OWNERS}/user-3/$ref`]: { status: 204 },
  };

  it('applies adds and prunes', async () => {
    const script = scriptedFetch(routes);

    const result = await syncCommand(createContext(script), { manifest: manifestFile('sync.yaml', pruning) });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Sync complete: 2 edge change(s)');
    expect(result.data?.applied).toBe(2);
  });

  it('sends no mutations with --dry-run', async () => {
    const script = scriptedFetch(routes);

    const result = await syncCommand(createContext(script, { dryRun: true }), {
      manifest: manifestFile('sync-dry.yaml', pruning),
    });

    expect(result.message).toBe('Dry run complete');
    expect(result.data?.results[0]?.dryRun).toBe(true);
    expect(script.requests.map((request) => request.method)).toEqual(['GET']);
  });

  it('moves on to the next application after a failure', async () => {
    const script = scriptedFetch({
      [`GET ${OWNERS}`]: { status: 403, body: DENIED },
      'GET /beta/applications/app-2/owners': { status: 200, body: { value: [{ id: 'user-1' }] } },
    });
    const manifest = manifestFile('sync-fail.yaml', [
      '  - id: app-1',
      '    owners: [user-1]',
      '  - id: app-2',
      '    owners: [user-1]',
    ]);

    const result = await syncCommand(createContext(script), { manifest });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Sync failed for 1 application(s)');
    expect(result.errors).toEqual([
      'app-1: Directory API error (403): Insufficient privileges to complete the operation. (HTTP 403)',
    ]);
    expect(result.data?.results).toHaveLength(2);
  });
});
