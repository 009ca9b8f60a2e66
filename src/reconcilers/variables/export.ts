/**
 * Building and writing variables files from the remote store
 */

import { writeFile } from 'node:fs/promises';
import * as yaml from 'yaml';
import type { RemoteVariable } from '../../api/types.js';
import { isYamlPath, variableFromRemote } from './parse.js';
import {
  MASKED_EXPORT_DESCRIPTION,
  REDACTED_VALUE,
  type VariableFile,
  type VariableFileEntry,
} from './types.js';

export interface ExportOptions {
  projectId: string;
  gitlabUrl: string;
  /** Write the real value of masked variables */
  includeMasked?: boolean;
  /** Export timestamp (default: now) */
  exportedAt?: Date;
}

/**
 * Convert one remote variable into a file entry
 */
export function toFileEntry(remote: RemoteVariable, includeMasked: boolean): VariableFileEntry {
  const variable = variableFromRemote(remote);
  const withheld = variable.masked && !includeMasked;

  return {
    key: variable.key,
    value: withheld ? REDACTED_VALUE : variable.value,
    protected: variable.protected,
    masked: variable.masked,
    variable_type: variable.variableType,
    description: withheld ? MASKED_EXPORT_DESCRIPTION : '',
  };
}

/**
 * Split the remote list into one variable per key and the keys seen again.
 * A key defined for several environment scopes is listed once per scope;
 * the first occurrence is kept, as in collectionFromRemote.
 */
export function uniqueByKey(remote: readonly RemoteVariable[]): {
  variables: RemoteVariable[];
  repeated: string[];
} {
  const seen = new Set<string>();
  const variables: RemoteVariable[] = [];
  const repeated: string[] = [];

  for (const item of remote) {
    if (seen.has(item.key)) {
      if (!repeated.includes(item.key)) repeated.push(item.key);
      continue;
    }
    seen.add(item.key);
    variables.push(item);
  }

  return { variables, repeated };
}

/**
 * Build the export document for a project's variables
 */
export function buildExportDocument(
  remote: readonly RemoteVariable[],
  options: ExportOptions
): VariableFile {
  const includeMasked = options.includeMasked ?? false;
  const { variables } = uniqueByKey(remote);

  return {
    variables: variables.map((item) => toFileEntry(item, includeMasked)),
    metadata: {
      project_id: options.projectId,
      exported_at: (options.exportedAt ?? new Date()).toISOString(),
      total_variables: variables.length,
      gitlab_url: options.gitlabUrl.replace(/\/+$/, ''),
    },
  };
}

/**
 * Serialize a document: YAML for .yaml/.yml paths, JSON otherwise
 */
export function serializeVariableFile(document: VariableFile, filePath: string): string {
  if (isYamlPath(filePath)) {
    return yaml.stringify(document);
  }
  return JSON.stringify(document, null, 2) + '\n';
}

export async function writeVariableFile(document: VariableFile, filePath: string): Promise<void> {
  await writeFile(filePath, serializeVariableFile(document, filePath), 'utf-8');
}
