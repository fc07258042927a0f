/**
 * Tests for contract verification against an agent directory
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { verifyContracts } from './verifier.js';

describe('verifyContracts', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'verify-'));
    await fs.mkdir(path.join(root, 'notes'));
    await fs.writeFile(path.join(root, 'README.md'), '# Memory\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should report each contract in order', async () => {
    const checks = await verifyContracts(root, [
      { name: 'notes-dir', assertion: 'directory_exists', path: 'notes' },
      { name: 'readme', assertion: 'file_exists', path: 'README.md' },
      { name: 'readme-title', assertion: 'file_contains', path: 'README.md', pattern: 'Memory' },
      { name: 'readme-usage', assertion: 'file_contains', path: 'README.md', pattern: 'Usage' },
      { name: 'plan', assertion: 'file_exists', path: 'PLAN.md' },
      { name: 'readme-dir', assertion: 'directory_exists', path: 'README.md' },
      { name: 'review', assertion: 'custom' },
      { name: 'unnamed', assertion: 'file_exists' },
    ]);

    expect(checks.map(c => [c.name, c.passed, c.message])).toEqual([
      ['notes-dir', true, 'Directory exists: notes'],
      ['readme', true, 'File exists: README.md'],
      ['readme-title', true, "README.md contains 'Memory'"],
      ['readme-usage', false, "README.md does not contain 'Usage'"],
      ['plan', false, 'File not found: PLAN.md'],
      ['readme-dir', false, 'Directory not found: README.md'],
      ['review', true, 'Custom contract requires manual validation'],
      ['unnamed', false, "Contract 'unnamed' has no path"],
    ]);
  });

  it('should not find file contents in a directory', async () => {
    const [result] = await verifyContracts(root, [
      { name: 'notes-index', assertion: 'file_contains', path: 'notes', pattern: 'x' },
    ]);
    expect(result).toEqual({
      name: 'notes-index',
      assertion: 'file_contains',
      passed: false,
      message: 'File not found: notes',
    });
  });
});
