/**
 * Tests for contract merging
 */

import { describe, it, expect } from 'vitest';
import type { Contract } from '../types.js';
import { assertionBody, mergeContracts } from './contracts.js';
import type { GraphNode } from './graph.js';
import { defineCapability } from './loader.js';

function node(index: number, name: string, contracts: Contract[]): GraphNode {
  return { index, capability: defineCapability({ name, contracts }) };
}

const notesDir: Contract = { name: 'notes-dir', assertion: 'directory_exists', path: 'notes', description: 'Notes live here' };

describe('assertionBody', () => {
  it('should ignore the description', () => {
    expect(assertionBody(notesDir)).toBe(assertionBody({ ...notesDir, description: 'Other wording' }));
  });

  it('should distinguish paths', () => {
    expect(assertionBody(notesDir)).not.toBe(assertionBody({ ...notesDir, path: 'memory' }));
  });
});

describe('mergeContracts', () => {
  it('should collapse identical contracts and record every declarer', () => {
    const result = mergeContracts([
      node(0, 'memory', [notesDir]),
      node(1, 'journal', [{ ...notesDir, description: 'Journal entries live here' }]),
    ]);

    expect(result.errors).toEqual([]);
    expect(result.contracts).toEqual([{ ...notesDir, declaredBy: ['memory', 'journal'] }]);
  });

  it('should keep distinct contracts in order', () => {
    const readme: Contract = { name: 'readme', assertion: 'file_contains', path: 'README.md', pattern: 'Memory' };
    const result = mergeContracts([node(0, 'memory', [notesDir]), node(1, 'docs', [readme])]);

    expect(result.contracts.map(c => c.name)).toEqual(['notes-dir', 'readme']);
  });

  it('should reject a name bound to different assertions', () => {
    const result = mergeContracts([
      node(0, 'memory', [notesDir]),
      node(1, 'journal', [{ name: 'notes-dir', assertion: 'directory_exists', path: 'journal' }]),
    ]);

    expect(result.errors).toEqual([{
      code: 'COMP-006',
      kind: 'ContractConflict',
      message: "Contract 'notes-dir' is declared differently by 'memory' and 'journal'",
      suggestion: "Align the 'notes-dir' contract in both capabilities or remove one of them; contracts are never overridden",
      capabilities: ['memory', 'journal'],
      contract: 'notes-dir',
    }]);
  });
});
