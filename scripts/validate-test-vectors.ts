#!/usr/bin/env tsx
/**
 * Composition Test Vector Runner
 *
 * Runs every vector in spec/test-vectors/: builds a store from the vector's
 * capability specifications, composes its manifest and compares the outcome
 * with the expected status and codes.
 *
 * Usage:
 *   npx tsx scripts/validate-test-vectors.ts
 *   npx tsx scripts/validate-test-vectors.ts --verbose
 *   npx tsx scripts/validate-test-vectors.ts --json
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import {
  CompositionEngine,
  InMemoryCapabilityStore,
  parseCapabilitySpec,
  type ValidationResult,
} from '../packages/cli-node/src/index.js';
import { ajv, describeSchemaErrors } from '../packages/cli-node/src/modules/schemas.js';

interface TestMeta {
  name: string;
  description?: string;
  expects: 'accept' | 'reject';
  error_codes?: string[];
  warning_codes?: string[];
}

interface TestVector {
  $test: TestMeta;
  capabilities: unknown[];
  manifest: unknown;
  options?: {
    strict_prerequisites?: boolean;
  };
}

export interface TestResult {
  file: string;
  name: string;
  expects: 'accept' | 'reject';
  passed: boolean;
  status?: ValidationResult['status'];
  errorCodes: string[];
  warningCodes: string[];
  error?: string;
}

const TEST_VECTOR_SCHEMA = {
  type: 'object',
  required: ['$test', 'capabilities', 'manifest'],
  properties: {
    $test: {
      type: 'object',
      required: ['name', 'expects'],
      properties: {
        name: { type: 'string' },
        description: { type: 'string' },
        expects: { enum: ['accept', 'reject'] },
        error_codes: { type: 'array', items: { type: 'string' } },
        warning_codes: { type: 'array', items: { type: 'string' } },
      },
    },
    capabilities: { type: 'array' },
    options: {
      type: 'object',
      properties: { strict_prerequisites: { type: 'boolean' } },
    },
  },
};

const isTestVector = ajv.compile<TestVector>(TEST_VECTOR_SCHEMA);

/** Sorted distinct codes */
function codes(entries: readonly { code: string }[]): string[] {
  return [...new Set(entries.map(e => e.code))].sort();
}

function sameCodes(actual: string[], expected: string[] | undefined): boolean {
  if (expected === undefined) return true;
  const wanted = [...new Set(expected)].sort();
  return actual.length === wanted.length && actual.every((code, i) => code === wanted[i]);
}

export class TestVectorRunner {
  public results: TestResult[] = [];

  constructor(private readonly vectorsDir: string) {}

  async runTestVector(testFile: string): Promise<TestResult> {
    const file = path.relative(path.dirname(this.vectorsDir), testFile);
    const fallbackName = path.basename(testFile, '.json');
    const failure = (expects: TestResult['expects'], error: string, name = fallbackName): TestResult => ({
      file,
      name,
      expects,
      passed: false,
      errorCodes: [],
      warningCodes: [],
      error,
    });

    const data: unknown = JSON.parse(fs.readFileSync(testFile, 'utf-8'));
    if (!isTestVector(data)) {
      const problems = describeSchemaErrors(isTestVector.errors, '', 'vector').map(p => p.message);
      return failure('accept', `Malformed test vector: ${problems.join('; ')}`);
    }

    const meta = data.$test;
    const store = new InMemoryCapabilityStore();
    for (const [index, document] of data.capabilities.entries()) {
      const parsed = parseCapabilitySpec(document, `${file}#capabilities[${index}]`);
      if (!parsed.ok) {
        return failure(meta.expects, `capabilities[${index}]: ${parsed.errors.join('; ')}`, meta.name);
      }
      store.register(parsed.capability);
    }

    const engine = new CompositionEngine({
      store,
      includePrerequisites: data.options?.strict_prerequisites !== true,
    });
    const { result } = await engine.compose(data.manifest);

    const errorCodes = codes(result.errors);
    const warningCodes = codes(result.warnings);
    const accepted = result.status !== 'fail';
    const passed =
      (meta.expects === 'accept' ? accepted : !accepted) &&
      sameCodes(errorCodes, meta.error_codes) &&
      sameCodes(warningCodes, meta.warning_codes);

    const testResult: TestResult = {
      file,
      name: meta.name,
      expects: meta.expects,
      passed,
      status: result.status,
      errorCodes,
      warningCodes,
    };
    if (result.errors.length > 0) {
      testResult.error = result.errors.map(e => `${e.code}: ${e.message}`).join('; ');
    }
    return testResult;
  }

  async runAllTests(): Promise<{ passed: number; failed: number }> {
    if (!fs.existsSync(this.vectorsDir)) {
      console.error(`Error: Test vectors directory not found: ${this.vectorsDir}`);
      return { passed: 0, failed: 0 };
    }

    const findJsonFiles = (dir: string): string[] => {
      const files: string[] = [];
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          files.push(...findJsonFiles(fullPath));
        } else if (entry.name.endsWith('.json')) {
          files.push(fullPath);
        }
      }
      return files.sort();
    };

    let passed = 0;
    let failed = 0;
    for (const testFile of findJsonFiles(this.vectorsDir)) {
      const result = await this.runTestVector(testFile);
      this.results.push(result);
      if (result.passed) {
        passed++;
      } else {
        failed++;
      }
    }
    return { passed, failed };
  }

  printResults(verbose = false): boolean {
    console.log('\n' + '='.repeat(60));
    console.log('Composition Test Vector Validation');
    console.log('='.repeat(60) + '\n');

    const printGroup = (tests: TestResult[], title: string) => {
      console.log(`\n${title}`);
      console.log('-'.repeat(40));

      for (const result of tests) {
        const status = result.passed ? '✅ PASS' : '❌ FAIL';
        console.log(`  ${status}: ${result.name}`);

        if (verbose && !result.passed) {
          console.log(`         Expected: ${result.expects}`);
          console.log(`         Got status: ${result.status ?? 'none'}`);
          console.log(`         Errors: ${result.errorCodes.join(', ') || 'none'}`);
          console.log(`         Warnings: ${result.warningCodes.join(', ') || 'none'}`);
          if (result.error) {
            console.log(`         Detail: ${result.error}`);
          }
        }
      }
    };

    printGroup(this.results.filter(r => r.expects === 'accept'), 'Compositions that should be accepted');
    printGroup(this.results.filter(r => r.expects === 'reject'), 'Compositions that should be rejected');

    const passed = this.results.filter(r => r.passed).length;
    const total = this.results.length;

    console.log('\n' + '='.repeat(60));
    console.log(`Results: ${passed}/${total} passed, ${total - passed} failed`);
    console.log('='.repeat(60) + '\n');

    return passed === total;
  }
}

/** spec/test-vectors beside this script's parent directory */
export function defaultVectorsDir(): string {
  return path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'spec', 'test-vectors');
}

// CLI
async function main() {
  const { values } = parseArgs({
    options: {
      verbose: { type: 'boolean', short: 'v', default: false },
      json: { type: 'boolean', default: false },
      'vectors-dir': { type: 'string' },
    },
  });

  const vectorsDir = values['vectors-dir'] ?? defaultVectorsDir();
  const runner = new TestVectorRunner(vectorsDir);
  const { passed, failed } = await runner.runAllTests();

  if (values.json) {
    console.log(JSON.stringify({ passed, failed, total: passed + failed, results: runner.results }, null, 2));
    process.exit(failed === 0 ? 0 : 1);
  }
  process.exit(runner.printResults(values.verbose) ? 0 : 1);
}

// Run CLI if executed directly
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  });
}
