/**
 * Unit Tests: Applications façade
 *
 * Each operation returns an OperationResult; errors carry the operation name.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createApplicationsClient } from '../../src/api/applications.js';
import { ApiRequestError, PreconditionError, TransportError } from '../../src/api/errors.js';
import { createTransport, type DirectoryTransport } from '../../src/api/transport.js';
import { BASE_URL, NO_RETRY, odataError, quietLogger, scriptedFetch, scriptedTransport, type ScriptedResponse } from './helpers.js';

function client(routes: Record<string, ScriptedResponse | ScriptedResponse[]>, retry = NO_RETRY) {
  const script = scriptedFetch(routes);
  return { script, applications: createApplicationsClient(scriptedTransport(script, retry), quietLogger) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('applications.get', () => {
  it('returns a failure result when no token can be acquired', async () => {
    const script = scriptedFetch({});
    const transport = createTransport({
      baseUrl: BASE_URL,
      apiVersion: 'beta',
      timeout: 1000,
      tokenProvider: () => Promise.reject(new Error('token endpoint unreachable')),
      retry: NO_RETRY,
      fetch: script.fetch,
      logger: quietLogger,
    });

    const result = await createApplicationsClient(transport, quietLogger).get('app-1');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.status).toBe(0);
    expect(result.error).toBeInstanceOf(TransportError);
    expect(result.error.operation).toBe('applications.get');
    expect(script.requests).toHaveLength(0);
  });

  it('decodes the application', async () => {
    const { applications } = client({
      'GET /beta/applications/app-1': {
        status: 200,
        body: { id: 'app-1', appId: 'client-1', displayName: 'Payroll', unknownField: true },
      },
    });

    const result = await applications.get('app-1');

    expect(result).toEqual({
      success: true,
      status: 200,
      acceptedBy: 'status',
      data: { id: 'app-1', appId: 'client-1', displayName: 'Payroll' },
    });
  });

  it('rejects a missing id without a request', async () => {
    const { applications, script } = client({});

    const result = await applications.get('');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.status).toBe(0);
    expect(result.error).toBeInstanceOf(PreconditionError);
    expect(result.error.message).toBe('application id is required');
    expect(result.error.operation).toBe('applications.get');
    expect(script.requests).toHaveLength(0);
  });

  it('returns the last 404 after consistency retries run out', async () => {
    const { applications, script } = client(
      { 'GET /beta/applications/app-1': { status: 404 } },
      { ...NO_RETRY, consistencyRetries: 2 }
    );

    const result = await applications.get('app-1');

    expect(result).toMatchObject({ success: false, status: 404 });
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ApiRequestError);
    expect(result.error.operation).toBe('applications.get');
    expect(script.requests).toHaveLength(3);
  });

  it('encodes ids in the path', async () => {
    const { applications, script } = client({ 'GET /beta/applications/a%2Fb': { status: 200, body: { id: 'a/b' } } });

    const result = await applications.get('a/b');

    expect(result.success).toBe(true);
    expect(script.requests[0]?.url.pathname).toBe('/beta/applications/a%2Fb');
  });

  it('rethrows errors outside the client taxonomy', async () => {
    const broken: DirectoryTransport = {
      request: () => Promise.reject(new Error('boom')),
      referenceUrl: (id) => id,
    };

    await expect(createApplicationsClient(broken, quietLogger).get('app-1')).rejects.toThrow('boom');
  });
});

describe('applications.list', () => {
  it('returns one page when top is set', async () => {
    const { applications, script } = client({
      'GET /beta/applications': [
        { status: 200, body: { value: [{ id: 'app-1' }], '@odata.nextLink': 'https://directory.test/beta/applications?$skiptoken=x' } },
        { status: 200, body: { value: [{ id: 'app-2' }] } },
      ],
    });

    const result = await applications.list({ top: 1, select: ['id'] });

    expect(result.success && result.data).toEqual([{ id: 'app-1' }]);
    expect(script.requests).toHaveLength(1);
    expect(script.requests[0]?.url.searchParams.get('$top')).toBe('1');
  });
});

describe('applications.update', () => {
  it('patches the application and retries an entitlement conflict', async () => {
    const { applications, script } = client(
      {
        'PATCH /beta/applications/app-1': [
          {
            status: 400,
            body: odataError(
              'CannotDeleteOrUpdateEnabledEntitlement',
              'Permission (scope or role) cannot be deleted or updated unless disabled first.'
            ),
          },
          { status: 204 },
        ],
      },
      { ...NO_RETRY, consistencyRetries: 2 }
    );

    const result = await applications.update({ id: 'app-1', displayName: 'Payroll v2' });

    expect(result).toEqual({ success: true, status: 204, acceptedBy: 'status', data: undefined });
    expect(script.requests).toHaveLength(2);
    expect(script.requests[1]?.body).toBe('{"id":"app-1","displayName":"Payroll v2"}');
  });

  it('needs the application id', async () => {
    const { applications } = client({});

    const result = await applications.update({ displayName: 'x' });

    expect(result).toMatchObject({ success: false, status: 0 });
  });
});

describe('applications.create', () => {
  it('asks for full metadata and accepts 201', async () => {
    const { applications, script } = client({
      'POST /beta/applications': { status: 201, body: { id: 'app-9', displayName: 'New' } },
    });

    const result = await applications.create({ displayName: 'New' });

    expect(result.success && result.data).toEqual({ id: 'app-9', displayName: 'New' });
    expect(script.requests[0]?.headers.get('Accept')).toBe('application/json; odata.metadata=full');
  });
});

describe('password credentials', () => {
  it('wraps the credential and decodes the secret', async () => {
    const { applications, script } = client({
      'POST /beta/applications/app-1/addPassword': { status: 200, body: { keyId: 'key-1', secretText: 'test-secret' } },
    });

    const result = await applications.addPassword('app-1', { displayName: 'ci' });

    expect(result.success && result.data).toEqual({ keyId: 'key-1', secretText: 'test-secret' });
    expect(script.requests[0]?.body).toBe('{"passwordCredential":{"displayName":"ci"}}');
  });

  it('removes by key id', async () => {
    const { applications, script } = client({ 'POST /beta/applications/app-1/removePassword': { status: 204 } });

    const result = await applications.removePassword('app-1', 'key-1');

    expect(result.success).toBe(true);
    expect(script.requests[0]?.body).toBe('{"keyId":"key-1"}');
  });
});

describe('owners', () => {
  it('lists owner ids', async () => {
    const { applications } = client({
      'GET /beta/applications/app-1/owners': { status: 200, body: { value: [{ id: 'user-1' }, { id: 'user-2' }] } },
    });

    const result = await applications.listOwners('app-1');

    expect(result).toEqual({ success: true, status: 200, acceptedBy: 'status', data: ['user-1', 'user-2'] });
  });

  it('reports an add that changed nothing as classifier-accepted', async () => {
    const { applications } = client({
      'POST /beta/applications/app-1/owners/$ref': {
        status: 400,
        body: odataError('Request_BadRequest', 'One or more added object references already exist'),
      },
    });

    const result = await applications.addOwners({ id: 'app-1', owners: [{ id: 'user-1' }] });

    expect(result).toMatchObject({ success: true, status: 400, acceptedBy: 'classifier' });
    expect(result.success && result.data.map((edge) => edge.outcome)).toEqual(['already-satisfied']);
  });

  it('stamps the operation on batch preconditions', async () => {
    const { applications } = client({});

    const result = await applications.addOwners({ id: 'app-1' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('cannot add owners: no owners given');
    expect(result.error.operation).toBe('applications.addOwners');
  });

  it('rejects an owner without an id or reference URL', async () => {
    const { applications, script } = client({ 'POST /beta/applications/app-1/owners/$ref': { status: 204 } });

    const result = await applications.addOwners({ id: 'app-1', owners: [{ displayName: 'Unnamed' }] });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(PreconditionError);
    expect(result.error.message).toBe('cannot add owners: reference 0 has no id');
    expect(script.requests).toHaveLength(0);
  });

  it('removes owners after checking each edge', async () => {
    const { applications, script } = client({
      'GET /beta/applications/app-1/owners/user-1/$ref': { status: 200, body: { id: 'user-1' } },
      'DELETE /beta/applications/app-1/owners/user-1/$ref': { status: 204 },
    });

    const result = await applications.removeOwners('app-1', ['user-1']);

    expect(result).toMatchObject({ success: true, status: 204, acceptedBy: 'status' });
    expect(script.requests.map((request) => request.method)).toEqual(['GET', 'DELETE']);
  });
});

describe('token issuance policies', () => {
  it('lists under the tenant', async () => {
    const { applications } = client({
      'GET /beta/tenant-1/applications/app-1/tokenIssuancePolicies': {
        status: 200,
        body: { value: [{ id: 'policy-1', definition: ['{}'], isOrganizationDefault: false }] },
      },
    });

    const result = await applications.listTokenIssuancePolicy('app-1');

    expect(result.success && result.data).toEqual([
      { id: 'policy-1', definition: ['{}'], isOrganizationDefault: false },
    ]);
  });

  it('removes nothing from an application without policies', async () => {
    const { applications, script } = client({
      'GET /beta/tenant-1/applications/app-1/tokenIssuancePolicies': { status: 200, body: { value: [] } },
    });

    const result = await applications.removeTokenIssuancePolicy({ id: 'app-1' }, ['policy-1']);

    expect(result).toMatchObject({ success: true, status: 204, acceptedBy: 'classifier' });
    expect(script.requests).toHaveLength(1);
  });

  it('assigns by reference', async () => {
    const { applications, script } = client({
      'POST /beta/applications/app-1/tokenIssuancePolicies/$ref': { status: 204 },
    });

    const result = await applications.assignTokenIssuancePolicy({
      id: 'app-1',
      tokenIssuancePolicies: [{ id: 'policy-1' }],
    });

    expect(result).toMatchObject({ success: true, status: 204, acceptedBy: 'status' });
    expect(script.requests[0]?.body).toBe('{"@odata.id":"https://directory.test/beta/directoryObjects/policy-1"}');
  });
});

describe('logo', () => {
  it('uploads bytes with the given content type', async () => {
    const { applications, script } = client({ 'PUT /beta/applications/app-1/logo': { status: 204 } });

    const result = await applications.uploadLogo('app-1', 'image/png', new Uint8Array([137, 80, 78, 71]));

    expect(result.success).toBe(true);
    expect(script.requests[0]?.headers.get('Content-Type')).toBe('image/png');
  });
});

describe('federated identity credentials', () => {
  it('requires the credential id on update', async () => {
    const { applications } = client({});

    const result = await applications.updateFederatedIdentityCredential('app-1', { name: 'gh' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('credential id is required');
  });

  it('creates and decodes a credential', async () => {
    const { applications } = client({
      'POST /beta/applications/app-1/federatedIdentityCredentials': {
        status: 201,
        body: { id: 'fic-1', name: 'gh', issuer: 'https://issuer.test', subject: 'repo:x', audiences: ['api'] },
      },
    });

    const result = await applications.createFederatedIdentityCredential('app-1', { name: 'gh' });

    expect(result.success && result.data).toEqual({
      id: 'fic-1',
      name: 'gh',
      issuer: 'https://issuer.test',
      subject: 'repo:x',
      audiences: ['api'],
    });
  });
});

describe('deleted applications', () => {
  it('restores from the deleted items', async () => {
    const { applications, script } = client({
      'POST /beta/directory/deletedItems/app-1/restore': { status: 200, body: { id: 'app-1' } },
    });

    const result = await applications.restoreDeleted('app-1');

    expect(result.success && result.data).toEqual({ id: 'app-1' });
    expect(script.requests).toHaveLength(1);
  });
});
