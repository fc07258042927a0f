/**
 * Contract Merger - collects contracts across capabilities.
 *
 * Identical contracts declared twice collapse into one; a name bound to two
 * different assertions is an error under every conflict strategy.
 */

import type { CompositionIssue, Contract, MergedContract } from '../types.js';
import { stableStringify } from './canonical.js';
import { issue } from './errors.js';
import type { GraphNode } from './graph.js';

export interface ContractMergeResult {
  contracts: MergedContract[];
  errors: CompositionIssue[];
}

/** The part of a contract that must match for two declarations to be the same */
export function assertionBody(contract: Contract): string {
  return stableStringify({
    assertion: contract.assertion,
    path: contract.path ?? null,
    pattern: contract.pattern ?? null,
  });
}

export function mergeContracts(ordered: readonly GraphNode[]): ContractMergeResult {
  const byName = new Map<string, MergedContract>();
  const errors: CompositionIssue[] = [];

  for (const node of ordered) {
    const owner = node.capability.name;
    for (const contract of node.capability.contracts) {
      const existing = byName.get(contract.name);
      if (!existing) {
        byName.set(contract.name, { ...contract, declaredBy: [owner] });
        continue;
      }
      if (assertionBody(existing) === assertionBody(contract)) {
        if (!existing.declaredBy.includes(owner)) existing.declaredBy.push(owner);
        continue;
      }
      const first = existing.declaredBy[0];
      errors.push(issue(
        'COMP-006',
        `Contract '${contract.name}' is declared differently by '${first}' and '${owner}'`,
        `Align the '${contract.name}' contract in both capabilities or remove one of them; contracts are never overridden`,
        { capabilities: [first, owner], contract: contract.name }
      ));
    }
  }

  return { contracts: [...byName.values()], errors };
}
