/**
 * Unit Tests: Manifest loading and validation
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ManifestError, desiredRelations, loadManifest, parseManifest } from '../../src/manifest/index.js';
import { rejectionOf, thrownBy } from './helpers.js';

const VALID = `
apiVersion: dirapps/v1
applications:
  - id: " app-1 "
    name: Payroll
    owners: [user-1, user-2]
    prune: true
  - id: app-2
    tokenIssuancePolicies: [policy-1]
`;

describe('parseManifest', () => {
  it('reads entries and trims ids', () => {
    expect(parseManifest(VALID)).toEqual({
      apiVersion: 'dirapps/v1',
      applications: [
        { id: 'app-1', name: 'Payroll', owners: ['user-1', 'user-2'], prune: true },
        { id: 'app-2', tokenIssuancePolicies: ['policy-1'] },
      ],
    });
  });

  it('rejects another API version', () => {
    const err = thrownBy(() => parseManifest('apiVersion: dirapps/v2\napplications: []\n'));

    expect(err).toBeInstanceOf(ManifestError);
    expect(err).toMatchObject({
      code: 'INVALID_API_VERSION',
      message: 'Unsupported API version: dirapps/v2. Expected: dirapps/v1',
    });
  });

  it('collects every validation error', () => {
    const err = thrownBy(() =>
      parseManifest(
        ['apiVersion: dirapps/v1', 'applications:', '  - id: app-1', '    owners: [user-1, 3]', '  - id: app-1', ''].join(
          '\n'
        )
      )
    );

    expect(err).toBeInstanceOf(ManifestError);
    expect(err).toMatchObject({
      code: 'MANIFEST_VALIDATION_ERROR',
      message:
        'Manifest validation failed:\n' +
        '  - applications[0].owners[1] must be a non-empty string\n' +
        '  - applications[1].id "app-1" is listed more than once',
    });
  });

  it('requires apiVersion and applications', () => {
    const err = thrownBy(() => parseManifest('name: nothing\n'));

    expect(err).toMatchObject({
      details: {
        errors: ['Missing required field: apiVersion', 'Missing or invalid field: applications (must be a list)'],
      },
    });
  });

  it('reports YAML syntax errors', () => {
    expect(thrownBy(() => parseManifest('apiVersion: [\n'))).toMatchObject({ code: 'MANIFEST_PARSE_ERROR' });
  });
});

describe('loadManifest', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dirapps-manifest-'));
    writeFileSync(join(dir, 'apps.yaml'), VALID);
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves relative paths against the base path', async () => {
    const manifest = await loadManifest('apps.yaml', dir);
    expect(manifest.applications.map((entry) => entry.id)).toEqual(['app-1', 'app-2']);
  });

  it('reports a missing file', async () => {
    const err = await rejectionOf(loadManifest('missing.yaml', dir));

    expect(err).toMatchObject({
      code: 'MANIFEST_NOT_FOUND',
      message: `Manifest file not found: ${join(dir, 'missing.yaml')}`,
    });
  });
});

describe('desiredRelations', () => {
  it('lists only the relations an entry names, in sync order', () => {
    expect(desiredRelations({ id: 'app-1', tokenIssuancePolicies: ['policy-1'], owners: [] })).toEqual([
      { relation: 'owners', ids: [] },
      { relation: 'tokenIssuancePolicies', ids: ['policy-1'] },
    ]);
    expect(desiredRelations({ id: 'app-1' })).toEqual([]);
  });
});
