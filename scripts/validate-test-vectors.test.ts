/**
 * Runs the composition test vectors as part of the test suite
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { defaultVectorsDir, TestVectorRunner } from './validate-test-vectors.js';

describe('composition test vectors', () => {
  it('should pass every vector', async () => {
    const runner = new TestVectorRunner(defaultVectorsDir());
    const { passed, failed } = await runner.runAllTests();

    expect(runner.results.filter(r => !r.passed)).toEqual([]);
    expect(failed).toBe(0);
    expect(passed).toBe(16);
  });

  it('should report the codes of a rejected vector', async () => {
    const runner = new TestVectorRunner(defaultVectorsDir());
    const result = await runner.runTestVector(path.join(defaultVectorsDir(), 'invalid', 'circular-dependency.json'));

    expect(result).toMatchObject({
      file: path.join('test-vectors', 'invalid', 'circular-dependency.json'),
      name: 'Circular dependency',
      passed: true,
      status: 'fail',
      errorCodes: ['COMP-004'],
      warningCodes: [],
      error: 'COMP-004: Circular dependency: cycle-a → cycle-b → cycle-a',
    });
  });

  describe('malformed vectors', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should fail a vector without a manifest', async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vectors-'));
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, JSON.stringify({ $test: { name: 'Broken', expects: 'accept' }, capabilities: [] }));

      const result = await new TestVectorRunner(dir).runTestVector(file);
      expect(result.passed).toBe(false);
      expect(result.error).toBe('Malformed test vector: manifest is required');
    });
  });
});
