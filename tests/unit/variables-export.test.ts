/**
 * Unit Tests: Variables Export
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  buildExportDocument,
  uniqueByKey,
  toFileEntry,
  serializeVariableFile,
  writeVariableFile,
} from '../../src/reconcilers/variables/export.js';
import { loadVariableFile, parseVariableDocument } from '../../src/reconcilers/variables/parse.js';
import { remote } from '../helpers/fake-gitlab.js';

const exportedAt = new Date('2024-03-01T12:00:00.000Z');

describe('toFileEntry', () => {
  it('withholds masked values by default', () => {
    expect(toFileEntry(remote('TOKEN', 'test-secret', { masked: true }), false)).toEqual({
      key: 'TOKEN',
      value: '',
      protected: false,
      masked: true,
      variable_type: 'env_var',
      description: 'Masked value not exported',
    });
  });

  it('includes masked values when asked', () => {
    const entry = toFileEntry(remote('TOKEN', 'test-secret', { masked: true }), true);
    expect(entry.value).toBe('test-secret');
    expect(entry.description).toBe('');
  });

  it('exports plain variables unchanged', () => {
    expect(
      toFileEntry(remote('CERT', 'pem', { protected: true, variable_type: 'file' }), false)
    ).toEqual({
      key: 'CERT',
      value: 'pem',
      protected: true,
      masked: false,
      variable_type: 'file',
      description: '',
    });
  });
});

describe('buildExportDocument', () => {
  it('adds metadata', () => {
    const document = buildExportDocument([remote('A', '1'), remote('B', '2')], {
      projectId: '42',
      gitlabUrl: 'https://gitlab.example.com/',
      exportedAt,
    });

    expect(document.metadata).toEqual({
      project_id: '42',
      exported_at: '2024-03-01T12:00:00.000Z',
      total_variables: 2,
      gitlab_url: 'https://gitlab.example.com',
    });
    expect(document.variables.map((entry) => entry.key)).toEqual(['A', 'B']);
  });
});

describe('uniqueByKey', () => {
  it('keeps the first entry of a key listed for several scopes', () => {
    const production = remote('API_URL', 'https://api.example.com', { environment_scope: 'production' });
    const staging = remote('API_URL', 'https://staging.example.com', { environment_scope: 'staging' });

    expect(uniqueByKey([production, remote('A', '1'), staging])).toEqual({
      variables: [production, remote('A', '1')],
      repeated: ['API_URL'],
    });
  });
});

describe('buildExportDocument with repeated keys', () => {
  it('writes each key once so the document loads back', () => {
    const document = buildExportDocument(
      [
        remote('API_URL', 'https://api.example.com', { environment_scope: 'production' }),
        remote('API_URL', 'https://staging.example.com', { environment_scope: 'staging' }),
      ],
      { projectId: '42', gitlabUrl: 'https://gitlab.example.com', exportedAt }
    );

    expect(document.metadata?.total_variables).toBe(1);
    const collection = parseVariableDocument(document);
    expect([...collection.keys()]).toEqual(['API_URL']);
    expect(collection.get('API_URL')?.value).toBe('https://api.example.com');
  });
});

describe('serializeVariableFile', () => {
  const document = buildExportDocument([remote('A', '1')], {
    projectId: '42',
    gitlabUrl: 'https://gitlab.example.com',
    exportedAt,
  });

  it('writes indented JSON with a trailing newline', () => {
    const text = serializeVariableFile(document, 'vars.json');
    expect(text.startsWith('{\n  "variables": [\n')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(document);
  });

  it('writes YAML for .yaml paths', () => {
    const text = serializeVariableFile(document, 'vars.yaml');
    expect(text.split('\n')[0]).toBe('variables:');
    expect(text).toContain('  - key: A\n');
  });
});

describe('writeVariableFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gitlab-vars-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('produces a file that loads back as the same variables', async () => {
    const file = join(dir, 'vars.yml');
    const document = buildExportDocument(
      [remote('A', '1', { protected: true }), remote('S', 'test-secret', { masked: true })],
      { projectId: 'group/app', gitlabUrl: 'https://gitlab.example.com', exportedAt }
    );

    await writeVariableFile(document, file);
    const collection = await loadVariableFile(file);

    expect(collection.get('A')).toEqual({
      key: 'A',
      value: '1',
      variableType: 'env_var',
      protected: true,
      masked: false,
    });
    expect(collection.get('S')).toEqual({
      key: 'S',
      value: '',
      variableType: 'env_var',
      protected: false,
      masked: true,
      description: 'Masked value not exported',
    });
    expect(await readFile(file, 'utf-8')).toContain('project_id: group/app');
  });
});
