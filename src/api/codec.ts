/**
 * JSON encoding/decoding of directory entities
 *
 * Wire names that are not valid identifiers (`@odata.id`, `@odata.type`,
 * `owners@odata.bind`) are mapped to and from the camelCase fields of the
 * entity types here, so nothing else deals with them. Decoders keep only
 * fields of the expected JSON type.
 */

import type {
  Application,
  ApplicationExtension,
  DirectoryObject,
  FederatedIdentityCredential,
  PasswordCredential,
  TokenIssuancePolicy,
} from './types.js';
import { CodecError } from './errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Serialize a payload, reporting failures as a marshal CodecError
 */
export function encodeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch (err) {
    throw new CodecError('marshal', err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Body of a `$ref` POST: `{"@odata.id": "..."}`
 */
export function encodeReference(ref: DirectoryObject): string {
  if (!ref.odataId) {
    throw new CodecError('marshal', `reference ${ref.id ?? '(no id)'} has no @odata.id`);
  }
  return encodeJson({ '@odata.id': ref.odataId });
}

/**
 * Wire form of an application. Owners are bound by reference; token issuance
 * policies are only ever linked through their own `$ref` endpoint.
 */
export function encodeApplication(application: Application): string {
  const { odataId, odataType, owners, tokenIssuancePolicies: _policies, ...rest } = application;
  const wire: Record<string, unknown> = { ...rest };

  if (odataId !== undefined) wire['@odata.id'] = odataId;
  if (odataType !== undefined) wire['@odata.type'] = odataType;
  if (owners !== undefined) {
    wire['owners@odata.bind'] = owners
      .map((owner) => owner.odataId)
      .filter((id): id is string => id !== undefined);
  }

  return encodeJson(wire);
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Parse a response body, reporting failures as an unmarshal CodecError
 */
export function decodeJson(text: string, status = 0): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CodecError('unmarshal', err instanceof Error ? err.message : String(err), {
      cause: err,
      status,
    });
  }
}

/**
 * Decode a flat entity body
 */
export function decodeEntity(text: string, status = 0): Record<string, unknown> {
  const parsed = decodeJson(text, status);
  if (!isRecord(parsed)) {
    throw new CodecError('unmarshal', 'expected a JSON object', { status });
  }
  return parsed;
}

/**
 * Decode a `{"value": [...]}` list envelope
 */
export function decodeList(text: string, status = 0): Record<string, unknown>[] {
  const parsed = decodeEntity(text, status);
  const value = parsed.value;
  if (!Array.isArray(value)) {
    throw new CodecError('unmarshal', 'expected a "value" array', { status });
  }
  return value.filter(isRecord);
}

// =============================================================================
// Field Readers
// =============================================================================

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  return typeof value === 'boolean' ? value : undefined;
}

function readStringArray(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Drop keys whose value is undefined
 */
function compact<T extends object>(entity: T): T {
  for (const key of Object.keys(entity)) {
    if (Reflect.get(entity, key) === undefined) {
      Reflect.deleteProperty(entity, key);
    }
  }
  return entity;
}

// =============================================================================
// Entity Decoders
// =============================================================================

/**
 * Decode a directory object reference. `$ref` reads return `url` rather than
 * `@odata.id`; either is accepted.
 */
export function decodeDirectoryObject(raw: Record<string, unknown>): DirectoryObject {
  return compact({
    id: readString(raw, 'id'),
    odataId: readString(raw, '@odata.id') ?? readString(raw, 'url'),
    odataType: readString(raw, '@odata.type'),
    displayName: readString(raw, 'displayName'),
  });
}

export function decodeTokenIssuancePolicy(raw: Record<string, unknown>): TokenIssuancePolicy {
  return compact({
    ...decodeDirectoryObject(raw),
    definition: readStringArray(raw, 'definition'),
    isOrganizationDefault: readBoolean(raw, 'isOrganizationDefault'),
  });
}

export function decodePasswordCredential(raw: Record<string, unknown>): PasswordCredential {
  return compact({
    keyId: readString(raw, 'keyId'),
    displayName: readString(raw, 'displayName'),
    startDateTime: readString(raw, 'startDateTime'),
    endDateTime: readString(raw, 'endDateTime'),
    hint: readString(raw, 'hint'),
    secretText: readString(raw, 'secretText'),
    customKeyIdentifier: readString(raw, 'customKeyIdentifier'),
  });
}

export function decodeFederatedIdentityCredential(
  raw: Record<string, unknown>
): FederatedIdentityCredential {
  return compact({
    id: readString(raw, 'id'),
    name: readString(raw, 'name'),
    description: readString(raw, 'description'),
    issuer: readString(raw, 'issuer'),
    subject: readString(raw, 'subject'),
    audiences: readStringArray(raw, 'audiences'),
  });
}

export function decodeApplicationExtension(raw: Record<string, unknown>): ApplicationExtension {
  return compact({
    id: readString(raw, 'id'),
    name: readString(raw, 'name'),
    dataType: readString(raw, 'dataType'),
    targetObjects: readStringArray(raw, 'targetObjects'),
    isSyncedFromOnPremises: readBoolean(raw, 'isSyncedFromOnPremises'),
  });
}

export function decodeApplication(raw: Record<string, unknown>): Application {
  const credentials = raw.passwordCredentials;

  return compact({
    ...decodeDirectoryObject(raw),
    appId: readString(raw, 'appId'),
    description: readString(raw, 'description'),
    signInAudience: readString(raw, 'signInAudience'),
    identifierUris: readStringArray(raw, 'identifierUris'),
    tags: readStringArray(raw, 'tags'),
    createdDateTime: readString(raw, 'createdDateTime'),
    deletedDateTime: readString(raw, 'deletedDateTime'),
    passwordCredentials: Array.isArray(credentials)
      ? credentials.filter(isRecord).map(decodePasswordCredential)
      : undefined,
  });
}
