/**
 * Loading variables files into a VariableCollection
 *
 * Files are JSON, or YAML when the path ends in .yaml/.yml. Every problem in
 * the file is collected before a single FormatError is thrown, so one run
 * reports all of them.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as yaml from 'yaml';
import type { RemoteVariable } from '../../api/types.js';
import {
  FormatError,
  type FormatIssue,
  duplicateKey,
  invalidFieldType,
  invalidKey,
  invalidVariableType,
  missingRequiredField,
} from './errors.js';
import {
  VARIABLE_KEY_PATTERN,
  VARIABLE_TYPES,
  type Variable,
  type VariableCollection,
  type VariableType,
} from './types.js';

/**
 * True for paths the YAML reader/writer should handle
 */
export function isYamlPath(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVariableType(value: unknown): value is VariableType {
  return VARIABLE_TYPES.some((type) => type === value);
}

/**
 * Read an optional boolean flag, defaulting to false
 */
function readFlag(
  entry: Record<string, unknown>,
  field: 'protected' | 'masked',
  path: string,
  issues: FormatIssue[]
): boolean {
  const value = entry[field];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    issues.push(invalidFieldType(path, field, 'boolean', value));
    return false;
  }
  return value;
}

/**
 * Validate one entry of the `variables` array
 */
function parseEntry(
  entry: unknown,
  path: string,
  issues: FormatIssue[]
): Variable | undefined {
  if (!isRecord(entry)) {
    issues.push({
      code: 'INVALID_ENTRY',
      message: 'Each variable must be an object',
      path,
    });
    return undefined;
  }

  const before = issues.length;
  const { key, value = '', description, variable_type: variableType = 'env_var' } = entry;

  if (key === undefined || key === null || key === '') {
    issues.push(missingRequiredField(path, 'key'));
  } else if (typeof key !== 'string') {
    issues.push(invalidFieldType(path, 'key', 'string', key));
  } else if (!VARIABLE_KEY_PATTERN.test(key)) {
    issues.push(invalidKey(path, key));
  }

  if (typeof value !== 'string') {
    issues.push(invalidFieldType(path, 'value', 'string', value));
  }

  if (description !== undefined && description !== null && typeof description !== 'string') {
    issues.push(invalidFieldType(path, 'description', 'string', description));
  }

  if (!isVariableType(variableType)) {
    issues.push(invalidVariableType(path, variableType));
  }

  const isProtected = readFlag(entry, 'protected', path, issues);
  const masked = readFlag(entry, 'masked', path, issues);

  if (
    issues.length > before ||
    typeof key !== 'string' ||
    typeof value !== 'string' ||
    !isVariableType(variableType)
  ) {
    return undefined;
  }

  return {
    key,
    value,
    variableType,
    protected: isProtected,
    masked,
    ...(typeof description === 'string' && description.length > 0 ? { description } : {}),
  };
}

/**
 * Validate a parsed variables document and index it by key
 *
 * @throws FormatError listing every problem found
 */
export function parseVariableDocument(
  document: unknown,
  source?: string
): VariableCollection {
  const where = source ? ` in ${source}` : '';

  if (!isRecord(document)) {
    throw new FormatError(`Invalid variables file${where}`, [
      { code: 'INVALID_DOCUMENT', message: 'Expected an object at the top level', path: '$' },
    ], source);
  }

  if (!Array.isArray(document.variables)) {
    throw new FormatError(`Invalid variables file${where}`, [
      {
        code: 'MISSING_VARIABLES',
        message: "'variables' key not found or not a list",
        path: 'variables',
      },
    ], source);
  }

  const issues: FormatIssue[] = [];
  const collection = new Map<string, Variable>();
  const firstSeen = new Map<string, string>();

  document.variables.forEach((entry: unknown, index: number) => {
    const path = `variables[${index}]`;
    const variable = parseEntry(entry, path, issues);
    if (!variable) return;

    const existing = firstSeen.get(variable.key);
    if (existing) {
      issues.push(duplicateKey(path, variable.key, existing));
      return;
    }
    firstSeen.set(variable.key, path);
    collection.set(variable.key, variable);
  });

  if (issues.length > 0) {
    throw new FormatError(
      `Invalid variables file${where}: ${issues.length} problem(s)`,
      issues,
      source
    );
  }

  return collection;
}

/**
 * Parse the text of a variables file
 */
export function parseVariableFileContent(
  content: string,
  filePath: string
): VariableCollection {
  let document: unknown;
  try {
    document = isYamlPath(filePath) ? yaml.parse(content) : JSON.parse(content);
  } catch (err) {
    throw new FormatError(`Cannot parse ${filePath}`, [
      {
        code: 'INVALID_DOCUMENT',
        message: err instanceof Error ? err.message : String(err),
        path: '$',
      },
    ], filePath);
  }
  return parseVariableDocument(document, filePath);
}

/**
 * Read and validate a variables file
 */
export async function loadVariableFile(filePath: string): Promise<VariableCollection> {
  const content = await readFile(filePath, 'utf-8');
  return parseVariableFileContent(content, filePath);
}

/**
 * Convert a remote variable into the reconciler's model
 */
export function variableFromRemote(remote: RemoteVariable): Variable {
  return {
    key: remote.key,
    value: remote.value ?? '',
    variableType: remote.variable_type ?? 'env_var',
    protected: remote.protected ?? false,
    masked: remote.masked ?? false,
  };
}

/**
 * Index the remote list by key. The remote schema is trusted; a repeated key
 * (other environment scopes) keeps its first occurrence.
 */
export function collectionFromRemote(remote: readonly RemoteVariable[]): VariableCollection {
  const collection = new Map<string, Variable>();
  for (const item of remote) {
    if (!collection.has(item.key)) {
      collection.set(item.key, variableFromRemote(item));
    }
  }
  return collection;
}
