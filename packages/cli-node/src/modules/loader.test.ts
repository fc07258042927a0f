/**
 * Tests for capability loading
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  SPECS_ENV,
  defineCapability,
  getDefaultSearchPaths,
  listCapabilities,
  loadCapability,
  parseCapabilitySpec,
  parsePrerequisite,
} from './loader.js';

const MEMORY_SPEC = `apiVersion: agent-composer/v1
kind: CapabilitySpecification
metadata:
  name: memory-management
  version: "1.2.0"
spec:
  display_name: Memory Management
  purpose: Keep notes between sessions
  prerequisites:
    - note-taking@^1.0.0
  composable_with: [all]
behaviors:
  - name: recall
    trigger:
      explicit: [remember]
      implicit: [session start]
    protocol: [Search notes, Summarize]
    output: summary
contracts:
  - name: notes-dir
    assertion: directory_exists
    path: notes
`;

describe('parsePrerequisite', () => {
  it('should split name and constraint', () => {
    expect(parsePrerequisite('note-taking@^1.0.0')).toEqual({ name: 'note-taking', version: '^1.0.0' });
    expect(parsePrerequisite('note-taking')).toEqual({ name: 'note-taking' });
  });

  it('should accept the object form', () => {
    expect(parsePrerequisite({ name: 'note-taking', version: '~1.2.0' })).toEqual({ name: 'note-taking', version: '~1.2.0' });
    expect(parsePrerequisite({ name: 'note-taking' })).toEqual({ name: 'note-taking' });
  });
});

describe('parseCapabilitySpec', () => {
  it('should convert a document into a capability', () => {
    const result = parseCapabilitySpec({
      apiVersion: 'agent-composer/v1',
      kind: 'CapabilitySpecification',
      metadata: { name: 'planner', version: '2.0.0' },
      spec: { category: 'planning', config_schema: { type: 'object' } },
      behaviors: [{ name: 'plan', trigger: { explicit: ['plan'], implicit: ['new task'] }, protocol: ['Outline'], output: 'plan' }],
      contracts: [{ name: 'plan-file', assertion: 'file_exists', path: 'PLAN.md' }],
    }, '/specs/planner.yaml');

    expect(result).toEqual({
      ok: true,
      warnings: [],
      capability: {
        name: 'planner',
        version: '2.0.0',
        category: 'planning',
        prerequisites: [],
        behaviors: [{ name: 'plan', triggers: ['plan', 'new task'], protocol: ['Outline'], output: 'plan' }],
        contracts: [{ name: 'plan-file', assertion: 'file_exists', path: 'PLAN.md' }],
        composableWith: [],
        configSchema: { type: 'object' },
        location: '/specs/planner.yaml',
      },
    });
  });

  it('should return errors for an invalid document', () => {
    const result = parseCapabilitySpec({ kind: 'CapabilitySpecification' });
    expect(result.ok).toBe(false);
  });
});

describe('defineCapability', () => {
  it('should fill defaults', () => {
    expect(defineCapability({ name: 'planner', behaviors: [{ name: 'plan' }] })).toEqual({
      name: 'planner',
      version: '1.0.0',
      prerequisites: [],
      behaviors: [{ name: 'plan', triggers: [], protocol: [], output: '' }],
      contracts: [],
      composableWith: [],
    });
  });

  it('should parse prerequisite strings', () => {
    expect(defineCapability({ name: 'writer', prerequisites: ['planner@^1.0.0'] }).prerequisites).toEqual([
      { name: 'planner', version: '^1.0.0' },
    ]);
  });
});

// =============================================================================
// Files
// =============================================================================

describe('capability files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'loader-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a single specification', async () => {
    const file = path.join(dir, 'memory.yaml');
    await fs.writeFile(file, MEMORY_SPEC);

    const capability = await loadCapability(file);
    expect(capability.name).toBe('memory-management');
    expect(capability.displayName).toBe('Memory Management');
    expect(capability.prerequisites).toEqual([{ name: 'note-taking', version: '^1.0.0' }]);
    expect(capability.behaviors[0].triggers).toEqual(['remember', 'session start']);
    expect(capability.composableWith).toEqual(['all']);
    expect(capability.location).toBe(file);
  });

  it('should throw for an invalid specification', async () => {
    const file = path.join(dir, 'invalid.yaml');
    await fs.writeFile(file, 'apiVersion: agent-composer/v1\nkind: CapabilitySpecification\nmetadata:\n  name: x\n  version: "1.0.0"\n');

    await expect(loadCapability(file)).rejects.toThrow(
      `Invalid capability specification ${file}: behaviors is required`
    );
  });

  it('should scan search paths, skipping other kinds and reporting invalid files', async () => {
    await fs.writeFile(path.join(dir, 'valid.yaml'), MEMORY_SPEC);
    await fs.writeFile(path.join(dir, 'invalid.yaml'), 'apiVersion: agent-composer/v1\nkind: CapabilitySpecification\nmetadata:\n  name: x\n  version: "1.0.0"\n');
    await fs.writeFile(path.join(dir, 'other.yaml'), 'kind: Something\n');
    await fs.writeFile(path.join(dir, 'broken.yaml'), 'key: [unclosed');
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a spec');

    const scan = await listCapabilities([path.join(dir, 'missing'), dir]);

    expect(scan.capabilities.map(c => c.name)).toEqual(['memory-management']);
    expect(scan.invalid.map(i => path.basename(i.file))).toEqual(['broken.yaml', 'invalid.yaml']);
    expect(scan.invalid[0].errors[0].startsWith('Invalid YAML: ')).toBe(true);
    expect(scan.invalid[1].errors).toEqual(['behaviors is required']);
  });
});

// =============================================================================
// Search Paths
// =============================================================================

describe('getDefaultSearchPaths', () => {
  const saved = { specs: process.env[SPECS_ENV], home: process.env.HOME };

  afterEach(() => {
    if (saved.specs === undefined) delete process.env[SPECS_ENV];
    else process.env[SPECS_ENV] = saved.specs;
    if (saved.home === undefined) delete process.env.HOME;
    else process.env.HOME = saved.home;
  });

  it('should order explicit, environment, project and home paths', () => {
    process.env[SPECS_ENV] = ['/opt/specs', 'shared'].join(path.delimiter);
    process.env.HOME = '/home/tester';

    expect(getDefaultSearchPaths('/work', ['extra', '/work/capabilities'])).toEqual([
      '/work/extra',
      '/work/capabilities',
      '/opt/specs',
      '/work/shared',
      '/work/.agents/capabilities',
      '/home/tester/.agents/capabilities',
    ]);
  });
});
