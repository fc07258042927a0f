/**
 * Contract Verifier - checks composed contracts against an agent directory.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Contract, ContractAssertion } from '../types.js';
import { errorMessage } from './errors.js';

export interface ContractCheck {
  name: string;
  assertion: ContractAssertion;
  passed: boolean;
  message: string;
}

async function statOrNull(target: string) {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function check(agentRoot: string, contract: Contract): Promise<ContractCheck> {
  const result = (passed: boolean, message: string): ContractCheck => ({
    name: contract.name,
    assertion: contract.assertion,
    passed,
    message,
  });

  if (contract.assertion === 'custom') {
    return result(true, 'Custom contract requires manual validation');
  }
  if (!contract.path) {
    return result(false, `Contract '${contract.name}' has no path`);
  }

  const target = path.resolve(agentRoot, contract.path);
  const stats = await statOrNull(target);

  switch (contract.assertion) {
    case 'directory_exists':
      return stats?.isDirectory()
        ? result(true, `Directory exists: ${contract.path}`)
        : result(false, `Directory not found: ${contract.path}`);
    case 'file_exists':
      return stats?.isFile()
        ? result(true, `File exists: ${contract.path}`)
        : result(false, `File not found: ${contract.path}`);
    case 'file_contains': {
      if (!stats?.isFile()) {
        return result(false, `File not found: ${contract.path}`);
      }
      const content = await fs.readFile(target, 'utf-8');
      const pattern = contract.pattern ?? '';
      return content.includes(pattern)
        ? result(true, `${contract.path} contains '${pattern}'`)
        : result(false, `${contract.path} does not contain '${pattern}'`);
    }
  }
}

/**
 * Evaluate each contract in order. I/O errors fail that contract only.
 */
export async function verifyContracts(agentRoot: string, contracts: readonly Contract[]): Promise<ContractCheck[]> {
  const checks: ContractCheck[] = [];
  for (const contract of contracts) {
    try {
      checks.push(await check(agentRoot, contract));
    } catch (error) {
      checks.push({
        name: contract.name,
        assertion: contract.assertion,
        passed: false,
        message: `Cannot check ${contract.path ?? contract.name}: ${errorMessage(error)}`,
      });
    }
  }
  return checks;
}
