/**
 * Manifest YAML loading
 *
 * Reads a manifest file and validates its structure into typed entries.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ApplicationManifestEntry, Manifest } from './types.js';
import { ManifestError } from './types.js';

/** Current supported API version for manifest files */
export const SUPPORTED_API_VERSION = 'dirapps/v1';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readIdList(value: unknown, path: string, errors: string[]): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    errors.push(`${path} must be a list of object ids`);
    return undefined;
  }

  const ids: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === 'string' && item.trim().length > 0) {
      ids.push(item.trim());
    } else {
      errors.push(`${path}[${index}] must be a non-empty string`);
    }
  });
  return ids;
}

function readEntry(value: unknown, index: number, errors: string[]): ApplicationManifestEntry | undefined {
  const path = `applications[${index}]`;
  if (!isRecord(value)) {
    errors.push(`${path} must be a mapping`);
    return undefined;
  }

  const { id, name, owners, tokenIssuancePolicies, prune } = value;

  if (typeof id !== 'string' || id.trim().length === 0) {
    errors.push(`Missing required field: ${path}.id`);
    return undefined;
  }
  if (name !== undefined && typeof name !== 'string') {
    errors.push(`${path}.name must be a string`);
  }
  if (prune !== undefined && typeof prune !== 'boolean') {
    errors.push(`${path}.prune must be true or false`);
  }

  const entry: ApplicationManifestEntry = { id: id.trim() };
  if (typeof name === 'string') entry.name = name;

  const ownerIds = readIdList(owners, `${path}.owners`, errors);
  if (ownerIds) entry.owners = ownerIds;

  const policyIds = readIdList(tokenIssuancePolicies, `${path}.tokenIssuancePolicies`, errors);
  if (policyIds) entry.tokenIssuancePolicies = policyIds;

  if (typeof prune === 'boolean') entry.prune = prune;

  return entry;
}

/**
 * Validate a parsed manifest document
 *
 * @throws ManifestError if the document is not a valid manifest
 */
export function validateManifest(document: unknown, sourcePath?: string): Manifest {
  if (!isRecord(document)) {
    throw new ManifestError('Manifest must be a YAML mapping', 'MANIFEST_VALIDATION_ERROR', {
      path: sourcePath,
    });
  }

  const errors: string[] = [];

  const apiVersion = document.apiVersion;
  if (apiVersion === undefined) {
    errors.push('Missing required field: apiVersion');
  } else if (apiVersion !== SUPPORTED_API_VERSION) {
    throw new ManifestError(
      `Unsupported API version: ${String(apiVersion)}. Expected: ${SUPPORTED_API_VERSION}`,
      'INVALID_API_VERSION',
      { found: apiVersion, expected: SUPPORTED_API_VERSION, path: sourcePath }
    );
  }

  const applications: ApplicationManifestEntry[] = [];
  const rawApplications = document.applications;
  if (!Array.isArray(rawApplications)) {
    errors.push('Missing or invalid field: applications (must be a list)');
  } else {
    const seen = new Set<string>();
    rawApplications.forEach((raw, index) => {
      const entry = readEntry(raw, index, errors);
      if (!entry) return;
      if (seen.has(entry.id)) {
        errors.push(`applications[${index}].id "${entry.id}" is listed more than once`);
        return;
      }
      seen.add(entry.id);
      applications.push(entry);
    });
  }

  if (errors.length > 0) {
    throw new ManifestError(
      `Manifest validation failed:\n  - ${errors.join('\n  - ')}`,
      'MANIFEST_VALIDATION_ERROR',
      { errors, path: sourcePath }
    );
  }

  return { apiVersion: SUPPORTED_API_VERSION, applications };
}

/**
 * Parse manifest YAML text
 */
export function parseManifest(content: string, sourcePath?: string): Manifest {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw new ManifestError(
      `Failed to parse manifest YAML: ${err instanceof Error ? err.message : String(err)}`,
      'MANIFEST_PARSE_ERROR',
      { path: sourcePath, originalError: err }
    );
  }
  return validateManifest(document, sourcePath);
}

/**
 * Load and validate a manifest file
 *
 * @throws ManifestError if loading, parsing or validation fails
 */
export async function loadManifest(manifestPath: string, basePath?: string): Promise<Manifest> {
  const absolutePath = isAbsolute(manifestPath)
    ? manifestPath
    : resolve(basePath ?? process.cwd(), manifestPath);

  if (!existsSync(absolutePath)) {
    throw new ManifestError(`Manifest file not found: ${absolutePath}`, 'MANIFEST_NOT_FOUND', {
      path: absolutePath,
    });
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ManifestError(
      `Failed to read manifest file: ${err instanceof Error ? err.message : String(err)}`,
      'MANIFEST_NOT_FOUND',
      { path: absolutePath, originalError: err }
    );
  }

  return parseManifest(content, absolutePath);
}
