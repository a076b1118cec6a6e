/**
 * Applications sub-client
 *
 * One method per verb and entity. Each method declares its accepted statuses,
 * its consistency retry policy and, for reference edges, its outcome
 * classifier, then decodes the body. Failures in the client error taxonomy
 * are returned, never thrown, so callers can branch on `status` alone.
 */

import type {
  Application,
  ApplicationExtension,
  DirectoryObject,
  FederatedIdentityCredential,
  ODataQuery,
  PasswordCredential,
  TokenIssuancePolicy,
} from './types.js';
import type { DirectoryResponse, DirectoryTransport, RequestInput } from './transport.js';
import { PreconditionError, isDirectoryError, type DirectoryError } from './errors.js';
import { RETRY_ON_ENTITLEMENT_CONFLICT, RETRY_ON_NOT_FOUND } from './policies.js';
import {
  decodeApplication,
  decodeApplicationExtension,
  decodeDirectoryObject,
  decodeEntity,
  decodeFederatedIdentityCredential,
  decodeList,
  decodePasswordCredential,
  decodeTokenIssuancePolicy,
  encodeApplication,
  encodeJson,
} from './codec.js';
import type { ApiLogger } from './logger.js';
import {
  addReferences,
  listRelation,
  removeReferencesChecked,
  removeReferencesListed,
  type EdgeResult,
  type ReconcileResult,
} from '../reconcilers/relationships/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of a façade operation
 */
export type OperationResult<T> =
  | {
      success: true;
      status: number;
      data: T;
      /** 'classifier' when the directory's error response meant the end state already held */
      acceptedBy: 'status' | 'classifier';
    }
  | {
      success: false;
      status: number;
      error: DirectoryError;
    };

/**
 * Per-call options
 */
export interface OperationOptions {
  signal?: AbortSignal;
}

/**
 * Applications sub-client
 */
export interface ApplicationsClient {
  list(query?: ODataQuery, options?: OperationOptions): Promise<OperationResult<Application[]>>;
  create(application: Application, options?: OperationOptions): Promise<OperationResult<Application>>;
  get(id: string, query?: ODataQuery, options?: OperationOptions): Promise<OperationResult<Application>>;
  getDeleted(id: string, query?: ODataQuery, options?: OperationOptions): Promise<OperationResult<Application>>;
  update(application: Application, options?: OperationOptions): Promise<OperationResult<void>>;
  delete(id: string, options?: OperationOptions): Promise<OperationResult<void>>;
  deletePermanently(id: string, options?: OperationOptions): Promise<OperationResult<void>>;
  listDeleted(query?: ODataQuery, options?: OperationOptions): Promise<OperationResult<Application[]>>;
  restoreDeleted(id: string, options?: OperationOptions): Promise<OperationResult<Application>>;

  addPassword(
    applicationId: string,
    credential: PasswordCredential,
    options?: OperationOptions
  ): Promise<OperationResult<PasswordCredential>>;
  removePassword(applicationId: string, keyId: string, options?: OperationOptions): Promise<OperationResult<void>>;

  listOwners(id: string, options?: OperationOptions): Promise<OperationResult<string[]>>;
  getOwner(applicationId: string, ownerId: string, options?: OperationOptions): Promise<OperationResult<DirectoryObject>>;
  addOwners(application: Application, options?: OperationOptions): Promise<OperationResult<EdgeResult[]>>;
  removeOwners(
    applicationId: string,
    ownerIds: readonly string[] | undefined,
    options?: OperationOptions
  ): Promise<OperationResult<EdgeResult[]>>;

  listExtensions(
    id: string,
    query?: ODataQuery,
    options?: OperationOptions
  ): Promise<OperationResult<ApplicationExtension[]>>;
  createExtension(
    extension: ApplicationExtension,
    applicationId: string,
    options?: OperationOptions
  ): Promise<OperationResult<ApplicationExtension>>;
  deleteExtension(applicationId: string, extensionId: string, options?: OperationOptions): Promise<OperationResult<void>>;

  uploadLogo(
    applicationId: string,
    contentType: string,
    data: Uint8Array,
    options?: OperationOptions
  ): Promise<OperationResult<void>>;

  listFederatedIdentityCredentials(
    applicationId: string,
    query?: ODataQuery,
    options?: OperationOptions
  ): Promise<OperationResult<FederatedIdentityCredential[]>>;
  getFederatedIdentityCredential(
    applicationId: string,
    credentialId: string,
    query?: ODataQuery,
    options?: OperationOptions
  ): Promise<OperationResult<FederatedIdentityCredential>>;
  createFederatedIdentityCredential(
    applicationId: string,
    credential: FederatedIdentityCredential,
    options?: OperationOptions
  ): Promise<OperationResult<FederatedIdentityCredential>>;
  updateFederatedIdentityCredential(
    applicationId: string,
    credential: FederatedIdentityCredential,
    options?: OperationOptions
  ): Promise<OperationResult<void>>;
  deleteFederatedIdentityCredential(
    applicationId: string,
    credentialId: string,
    options?: OperationOptions
  ): Promise<OperationResult<void>>;

  assignTokenIssuancePolicy(application: Application, options?: OperationOptions): Promise<OperationResult<EdgeResult[]>>;
  listTokenIssuancePolicy(applicationId: string, options?: OperationOptions): Promise<OperationResult<TokenIssuancePolicy[]>>;
  removeTokenIssuancePolicy(
    application: Application,
    policyIds: readonly string[] | undefined,
    options?: OperationOptions
  ): Promise<OperationResult<EdgeResult[]>>;
}

// =============================================================================
// Helpers
// =============================================================================

interface Accepted<T> {
  status: number;
  data: T;
  acceptedBy: 'status' | 'classifier';
}

function accepted<T>(response: DirectoryResponse, data: T): Accepted<T> {
  return { status: response.status, data, acceptedBy: response.acceptedBy };
}

function requireId(value: string | undefined, what: string): string {
  if (!value) {
    throw new PreconditionError(`${what} is required`);
  }
  return value;
}

function segment(id: string): string {
  return encodeURIComponent(id);
}

/**
 * Batch results from the relationship reconciler, as a façade result. A batch
 * counts as classifier-accepted when no edge needed a change.
 */
function fromBatch(result: ReconcileResult): Accepted<EdgeResult[]> {
  if (!result.success && result.error) {
    throw result.error;
  }
  const changed = result.edges.length === 0 || result.edges.some((edge) => edge.outcome === 'applied');
  return { status: result.status, data: result.edges, acceptedBy: changed ? 'status' : 'classifier' };
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create the applications sub-client over a directory transport
 */
export function createApplicationsClient(transport: DirectoryTransport, log: ApiLogger): ApplicationsClient {
  async function run<T>(operation: string, fn: () => Promise<Accepted<T>>): Promise<OperationResult<T>> {
    try {
      const result = await fn();
      return { success: true, ...result };
    } catch (err) {
      if (!isDirectoryError(err)) {
        throw err;
      }
      if (err.operation === undefined) {
        err.operation = operation;
      }
      log.debug(`${operation} failed`, { status: err.status, error: err.name });
      return { success: false, status: err.status, error: err };
    }
  }

  function send(input: RequestInput, options: OperationOptions): Promise<DirectoryResponse> {
    return transport.request({ ...input, signal: options.signal });
  }

  return {
    list(query = {}, options = {}) {
      return run('applications.list', async () => {
        const response = await send(
          {
            method: 'GET',
            uri: { entity: '/applications' },
            query,
            validStatusCodes: [200],
            disablePaging: (query.top ?? 0) > 0,
          },
          options
        );
        return accepted(response, decodeList(response.body, response.status).map(decodeApplication));
      });
    },

    create(application, options = {}) {
      return run('applications.create', async () => {
        const response = await send(
          {
            method: 'POST',
            uri: { entity: '/applications' },
            query: { metadata: 'full' },
            body: encodeApplication(application),
            validStatusCodes: [201],
          },
          options
        );
        return accepted(response, decodeApplication(decodeEntity(response.body, response.status)));
      });
    },

    get(id, query = {}, options = {}) {
      return run('applications.get', async () => {
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(requireId(id, 'application id'))}` },
            query,
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeApplication(decodeEntity(response.body, response.status)));
      });
    },

    getDeleted(id, query = {}, options = {}) {
      return run('applications.getDeleted', async () => {
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/directory/deletedItems/${segment(requireId(id, 'application id'))}` },
            query,
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeApplication(decodeEntity(response.body, response.status)));
      });
    },

    update(application, options = {}) {
      return run('applications.update', async () => {
        const id = requireId(application.id, 'application id');
        const response = await send(
          {
            method: 'PATCH',
            uri: { entity: `/applications/${segment(id)}` },
            body: encodeApplication(application),
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_ENTITLEMENT_CONFLICT,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    delete(id, options = {}) {
      return run('applications.delete', async () => {
        const response = await send(
          {
            method: 'DELETE',
            uri: { entity: `/applications/${segment(requireId(id, 'application id'))}` },
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    deletePermanently(id, options = {}) {
      return run('applications.deletePermanently', async () => {
        const response = await send(
          {
            method: 'DELETE',
            uri: { entity: `/directory/deletedItems/${segment(requireId(id, 'application id'))}` },
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    listDeleted(query = {}, options = {}) {
      return run('applications.listDeleted', async () => {
        const response = await send(
          {
            method: 'GET',
            uri: { entity: '/directory/deletedItems/microsoft.graph.application' },
            query,
            validStatusCodes: [200],
            disablePaging: (query.top ?? 0) > 0,
          },
          options
        );
        return accepted(response, decodeList(response.body, response.status).map(decodeApplication));
      });
    },

    restoreDeleted(id, options = {}) {
      return run('applications.restoreDeleted', async () => {
        const response = await send(
          {
            method: 'POST',
            uri: { entity: `/directory/deletedItems/${segment(requireId(id, 'application id'))}/restore` },
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeApplication(decodeEntity(response.body, response.status)));
      });
    },

    // -------------------------------------------------------------------------
    // Password credentials
    // -------------------------------------------------------------------------

    addPassword(applicationId, credential, options = {}) {
      return run('applications.addPassword', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'POST',
            uri: { entity: `/applications/${segment(id)}/addPassword` },
            body: encodeJson({ passwordCredential: credential }),
            validStatusCodes: [200, 201],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodePasswordCredential(decodeEntity(response.body, response.status)));
      });
    },

    removePassword(applicationId, keyId, options = {}) {
      return run('applications.removePassword', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'POST',
            uri: { entity: `/applications/${segment(id)}/removePassword` },
            body: encodeJson({ keyId: requireId(keyId, 'key id') }),
            validStatusCodes: [200, 204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    // -------------------------------------------------------------------------
    // Owners
    // -------------------------------------------------------------------------

    listOwners(id, options = {}) {
      return run('applications.listOwners', async () => {
        const listed = await listRelation(transport, requireId(id, 'application id'), 'owners', {
          signal: options.signal,
          logger: log,
        });
        const ids = listed.targets.map((owner) => owner.id).filter((ownerId): ownerId is string => !!ownerId);
        return { status: listed.status, data: ids, acceptedBy: 'status' as const };
      });
    },

    getOwner(applicationId, ownerId, options = {}) {
      return run('applications.getOwner', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(id)}/owners/${segment(requireId(ownerId, 'owner id'))}/$ref` },
            query: { select: ['id', 'url'] },
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeDirectoryObject(decodeEntity(response.body, response.status)));
      });
    },

    addOwners(application, options = {}) {
      return run('applications.addOwners', async () => {
        const refs = application.owners?.map((owner) => ({
          id: owner.id ?? owner.odataId ?? '',
          odataId: owner.odataId,
        }));
        const result = await addReferences(transport, application.id, 'owners', refs, {
          signal: options.signal,
          logger: log,
        });
        return fromBatch(result);
      });
    },

    removeOwners(applicationId, ownerIds, options = {}) {
      return run('applications.removeOwners', async () => {
        const result = await removeReferencesChecked(transport, applicationId, 'owners', ownerIds, {
          signal: options.signal,
          logger: log,
        });
        return fromBatch(result);
      });
    },

    // -------------------------------------------------------------------------
    // Extension properties
    // -------------------------------------------------------------------------

    listExtensions(id, query = {}, options = {}) {
      return run('applications.listExtensions', async () => {
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(requireId(id, 'application id'))}/extensionProperties` },
            query,
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeList(response.body, response.status).map(decodeApplicationExtension));
      });
    },

    createExtension(extension, applicationId, options = {}) {
      return run('applications.createExtension', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'POST',
            uri: { entity: `/applications/${segment(id)}/extensionProperties` },
            body: encodeJson(extension),
            validStatusCodes: [201],
          },
          options
        );
        return accepted(response, decodeApplicationExtension(decodeEntity(response.body, response.status)));
      });
    },

    deleteExtension(applicationId, extensionId, options = {}) {
      return run('applications.deleteExtension', async () => {
        const id = requireId(applicationId, 'application id');
        const extId = requireId(extensionId, 'extension id');
        const response = await send(
          {
            method: 'DELETE',
            uri: { entity: `/applications/${segment(id)}/extensionProperties/${segment(extId)}` },
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    // -------------------------------------------------------------------------
    // Logo
    // -------------------------------------------------------------------------

    uploadLogo(applicationId, contentType, data, options = {}) {
      return run('applications.uploadLogo', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'PUT',
            uri: { entity: `/applications/${segment(id)}/logo` },
            body: data,
            contentType: requireId(contentType, 'content type'),
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    // -------------------------------------------------------------------------
    // Federated identity credentials
    // -------------------------------------------------------------------------

    listFederatedIdentityCredentials(applicationId, query = {}, options = {}) {
      return run('applications.listFederatedIdentityCredentials', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(id)}/federatedIdentityCredentials` },
            query,
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(
          response,
          decodeList(response.body, response.status).map(decodeFederatedIdentityCredential)
        );
      });
    },

    getFederatedIdentityCredential(applicationId, credentialId, query = {}, options = {}) {
      return run('applications.getFederatedIdentityCredential', async () => {
        const id = requireId(applicationId, 'application id');
        const credId = requireId(credentialId, 'credential id');
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(id)}/federatedIdentityCredentials/${segment(credId)}` },
            query,
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(
          response,
          decodeFederatedIdentityCredential(decodeEntity(response.body, response.status))
        );
      });
    },

    createFederatedIdentityCredential(applicationId, credential, options = {}) {
      return run('applications.createFederatedIdentityCredential', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'POST',
            uri: { entity: `/applications/${segment(id)}/federatedIdentityCredentials` },
            body: encodeJson(credential),
            validStatusCodes: [201],
          },
          options
        );
        return accepted(
          response,
          decodeFederatedIdentityCredential(decodeEntity(response.body, response.status))
        );
      });
    },

    updateFederatedIdentityCredential(applicationId, credential, options = {}) {
      return run('applications.updateFederatedIdentityCredential', async () => {
        const id = requireId(applicationId, 'application id');
        const credId = requireId(credential.id, 'credential id');
        const response = await send(
          {
            method: 'PATCH',
            uri: { entity: `/applications/${segment(id)}/federatedIdentityCredentials/${segment(credId)}` },
            body: encodeJson(credential),
            validStatusCodes: [204],
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    deleteFederatedIdentityCredential(applicationId, credentialId, options = {}) {
      return run('applications.deleteFederatedIdentityCredential', async () => {
        const id = requireId(applicationId, 'application id');
        const credId = requireId(credentialId, 'credential id');
        const response = await send(
          {
            method: 'DELETE',
            uri: { entity: `/applications/${segment(id)}/federatedIdentityCredentials/${segment(credId)}` },
            validStatusCodes: [204],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, undefined);
      });
    },

    // -------------------------------------------------------------------------
    // Token issuance policies
    // -------------------------------------------------------------------------

    assignTokenIssuancePolicy(application, options = {}) {
      return run('applications.assignTokenIssuancePolicy', async () => {
        const refs = application.tokenIssuancePolicies?.map((policy) => ({
          id: policy.id ?? policy.odataId ?? '',
          odataId: policy.odataId,
        }));
        const result = await addReferences(transport, application.id, 'tokenIssuancePolicies', refs, {
          signal: options.signal,
          logger: log,
        });
        return fromBatch(result);
      });
    },

    listTokenIssuancePolicy(applicationId, options = {}) {
      return run('applications.listTokenIssuancePolicy', async () => {
        const id = requireId(applicationId, 'application id');
        const response = await send(
          {
            method: 'GET',
            uri: { entity: `/applications/${segment(id)}/tokenIssuancePolicies`, hasTenantId: true },
            validStatusCodes: [200],
            consistencyFailureFunc: RETRY_ON_NOT_FOUND,
          },
          options
        );
        return accepted(response, decodeList(response.body, response.status).map(decodeTokenIssuancePolicy));
      });
    },

    removeTokenIssuancePolicy(application, policyIds, options = {}) {
      return run('applications.removeTokenIssuancePolicy', async () => {
        const result = await removeReferencesListed(
          transport,
          application.id,
          'tokenIssuancePolicies',
          policyIds,
          { signal: options.signal, logger: log }
        );
        return fromBatch(result);
      });
    },
  };
}
