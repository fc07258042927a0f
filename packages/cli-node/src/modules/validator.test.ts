/**
 * Tests for capability specification validation
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { validateCapabilityFile, validateCapabilitySpec } from './validator.js';

function specDocument(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    apiVersion: 'agent-composer/v1',
    kind: 'CapabilitySpecification',
    metadata: { name: 'memory-management', version: '1.0.0', created: '2025-01-15' },
    spec: { purpose: 'Keep notes between sessions' },
    behaviors: [
      { name: 'recall', trigger: ['remember'], protocol: ['Search notes'], output: 'summary' },
    ],
    contracts: [{ name: 'notes-dir', assertion: 'directory_exists', path: 'notes' }],
    ...overrides,
  };
}

// =============================================================================
// Structure
// =============================================================================

describe('validateCapabilitySpec structure', () => {
  it('should accept a complete specification', () => {
    expect(validateCapabilitySpec(specDocument())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('should reject an empty document', () => {
    expect(validateCapabilitySpec(null).errors).toEqual(['Empty specification file']);
  });

  it('should require behaviors', () => {
    const doc = specDocument();
    delete doc.behaviors;
    expect(validateCapabilitySpec(doc).errors).toEqual(['behaviors is required']);
  });

  it('should require at least one behavior', () => {
    expect(validateCapabilitySpec(specDocument({ behaviors: [] })).errors).toEqual([
      'behaviors must NOT have fewer than 1 items',
    ]);
  });

  it('should check apiVersion and kind', () => {
    const result = validateCapabilitySpec(specDocument({ apiVersion: 'v0', kind: 'Module' }));
    expect(result.errors).toEqual([
      "apiVersion must be 'agent-composer/v1'",
      "kind must be 'CapabilitySpecification'",
    ]);
  });

  it('should check the created date format', () => {
    const result = validateCapabilitySpec(specDocument({
      metadata: { name: 'memory-management', version: '1.0.0', created: 'yesterday' },
    }));
    expect(result.errors).toEqual(['metadata.created must match format "date"']);
  });

  it('should accept explicit and implicit triggers', () => {
    const result = validateCapabilitySpec(specDocument({
      behaviors: [{
        name: 'recall',
        trigger: { explicit: ['remember'], implicit: ['session start'] },
        protocol: [],
        output: { format: 'markdown' },
      }],
    }));
    expect(result.valid).toBe(true);
  });

  it('should fold trigger shape errors into one message', () => {
    const result = validateCapabilitySpec(specDocument({
      behaviors: [{ name: 'recall', trigger: 5, protocol: [], output: 'summary' }],
    }));
    expect(result.errors).toEqual(['behaviors[0].trigger has an unsupported shape']);
  });

  it('should reject an unknown contract assertion', () => {
    const result = validateCapabilitySpec(specDocument({
      contracts: [{ name: 'notes-dir', assertion: 'path_exists', path: 'notes' }],
    }));
    expect(result.errors).toEqual([
      'contracts[0].assertion must be one of: directory_exists, file_exists, file_contains, custom',
    ]);
  });
});

// =============================================================================
// Semantics
// =============================================================================

describe('validateCapabilitySpec semantics', () => {
  it('should reject duplicate behavior and contract names', () => {
    const behavior = { name: 'recall', trigger: [], protocol: [], output: '' };
    const contract = { name: 'notes-dir', assertion: 'custom' };
    const result = validateCapabilitySpec(specDocument({
      behaviors: [behavior, behavior],
      contracts: [contract, contract],
    }));
    expect(result.errors).toEqual(['Duplicate behavior name: recall', 'Duplicate contract name: notes-dir']);
  });

  it('should reject a capability listing itself as a prerequisite', () => {
    const result = validateCapabilitySpec(specDocument({
      spec: { prerequisites: ['memory-management@^1.0.0'] },
    }));
    expect(result.errors).toEqual(["Capability 'memory-management' lists itself as a prerequisite"]);
  });

  it('should reject a spec name that differs from the metadata name', () => {
    const result = validateCapabilitySpec(specDocument({ spec: { name: 'memory' } }));
    expect(result.errors).toEqual(["spec.name 'memory' does not match metadata.name 'memory-management'"]);
  });

  it('should require the fields each assertion reads', () => {
    const result = validateCapabilitySpec(specDocument({
      contracts: [
        { name: 'readme', assertion: 'file_contains', path: 'README.md' },
        { name: 'notes-dir', assertion: 'directory_exists' },
      ],
    }));
    expect(result.errors).toEqual([
      "Contract 'readme' (file_contains) requires 'path' and 'pattern'",
      "Contract 'notes-dir' (directory_exists) requires 'path'",
    ]);
  });

  it('should reject an invalid configuration schema', () => {
    const result = validateCapabilitySpec(specDocument({ spec: { config_schema: { type: 'nonsense' } } }));
    expect(result.valid).toBe(false);
    expect(result.errors[0].startsWith('spec.config_schema is not a valid JSON Schema: ')).toBe(true);
  });

  it('should warn about naming, deprecation and missing contracts', () => {
    const result = validateCapabilitySpec(specDocument({
      metadata: { name: 'MemoryManagement', version: '1.0.0', status: 'deprecated' },
      contracts: [],
    }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      "Name 'MemoryManagement' should be lowercase with hyphens (e.g. 'memory-management')",
      "Capability 'MemoryManagement' is deprecated",
      'No contracts defined - consider adding validation contracts',
    ]);
  });

  it('should warn about repeated prerequisites', () => {
    const result = validateCapabilitySpec(specDocument({
      spec: { prerequisites: ['note-taking', { name: 'note-taking', version: '^1.0.0' }] },
    }));
    expect(result.warnings).toEqual(["Prerequisite 'note-taking' is listed more than once"]);
  });
});

// =============================================================================
// Files
// =============================================================================

describe('validateCapabilityFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'validator-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should validate a YAML file and keep dates as strings', async () => {
    const file = path.join(dir, 'memory.yaml');
    await fs.writeFile(file, [
      'apiVersion: agent-composer/v1',
      'kind: CapabilitySpecification',
      'metadata:',
      '  name: memory-management',
      '  version: "1.0.0"',
      '  created: 2025-01-15',
      'behaviors:',
      '  - name: recall',
      '    trigger: [remember]',
      '    protocol: [Search notes]',
      '    output: summary',
      'contracts:',
      '  - name: notes-dir',
      '    assertion: directory_exists',
      '    path: notes',
    ].join('\n'));

    expect(await validateCapabilityFile(file)).toEqual({ file, valid: true, errors: [], warnings: [] });
  });

  it('should report YAML syntax errors', async () => {
    const file = path.join(dir, 'broken.yaml');
    await fs.writeFile(file, 'metadata: [unclosed');

    const result = await validateCapabilityFile(file);
    expect(result.valid).toBe(false);
    expect(result.errors[0].startsWith('Invalid YAML: ')).toBe(true);
  });

  it('should report a missing file', async () => {
    const result = await validateCapabilityFile(path.join(dir, 'missing.yaml'));
    expect(result.errors[0].startsWith('Cannot read file: ')).toBe(true);
  });
});
