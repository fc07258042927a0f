/**
 * Conflict Detector - finds behaviors declared by more than one capability
 * and settles them with the requested strategy.
 */

import {
  isRecord,
  type Behavior,
  type CompositionIssue,
  type CompositionWarning,
  type ConflictResolution,
  type OutputDefinition,
  type ResolvedBehavior,
} from '../types.js';
import { structurallyEqual } from './canonical.js';
import { issue, warning } from './errors.js';
import type { GraphNode } from './graph.js';

export interface BehaviorConflict {
  behavior: string;
  /** First declarer in canonical order, then the newcomer */
  capabilities: [string, string];
}

export interface ConflictReport {
  behaviors: ResolvedBehavior[];
  conflicts: BehaviorConflict[];
  errors: CompositionIssue[];
  warnings: CompositionWarning[];
}

interface Declaration {
  capability: string;
  /** Position in appearance order */
  appearance: number;
  behavior: Behavior;
}

const STRATEGY_HINT = "set conflict_resolution to 'first-wins', 'last-wins' or 'merge'";

function quoted(names: readonly string[]): string {
  return names.map(name => `'${name}'`).join(', ');
}

function resolved(declaration: Declaration, resolution: ResolvedBehavior['resolution'], contributors: string[]): ResolvedBehavior {
  return {
    ...declaration.behavior,
    owner: declaration.capability,
    contributors,
    resolution,
  };
}

// =============================================================================
// Merging
// =============================================================================

export type OutputMerge = { ok: true; output: OutputDefinition } | { ok: false };

/**
 * Outputs merge when they are equal, or when both are objects that agree on
 * every key they share.
 */
export function mergeOutputs(a: OutputDefinition, b: OutputDefinition): OutputMerge {
  if (structurallyEqual(a, b)) {
    return { ok: true, output: a };
  }
  if (isRecord(a) && isRecord(b)) {
    for (const key of Object.keys(b)) {
      if (key in a && !structurallyEqual(a[key], b[key])) {
        return { ok: false };
      }
    }
    return { ok: true, output: { ...a, ...b } };
  }
  return { ok: false };
}

type BehaviorMerge =
  | { ok: true; behavior: ResolvedBehavior }
  | { ok: false; merged: string[]; rejected: string };

function mergeDeclarations(declarations: Declaration[]): BehaviorMerge {
  const [first, ...rest] = declarations;
  const triggers = [...first.behavior.triggers];
  const protocol = [...first.behavior.protocol];
  const contributors = [first.capability];
  let output = first.behavior.output;

  for (const next of rest) {
    const merged = mergeOutputs(output, next.behavior.output);
    if (!merged.ok) {
      return { ok: false, merged: [...contributors], rejected: next.capability };
    }
    output = merged.output;
    for (const trigger of next.behavior.triggers) {
      if (!triggers.includes(trigger)) triggers.push(trigger);
    }
    protocol.push(...next.behavior.protocol);
    contributors.push(next.capability);
  }

  return {
    ok: true,
    behavior: {
      ...first.behavior,
      triggers,
      protocol,
      output,
      owner: first.capability,
      contributors,
      resolution: 'merge',
    },
  };
}

// =============================================================================
// Trigger Overlap
// =============================================================================

function triggerOverlaps(behaviors: readonly ResolvedBehavior[]): CompositionWarning[] {
  const byPhrase = new Map<string, { phrase: string; uses: ResolvedBehavior[] }>();
  for (const behavior of behaviors) {
    for (const trigger of behavior.triggers) {
      const key = trigger.trim().toLowerCase();
      const entry = byPhrase.get(key) ?? { phrase: trigger, uses: [] };
      if (!entry.uses.includes(behavior)) entry.uses.push(behavior);
      byPhrase.set(key, entry);
    }
  }

  const warnings: CompositionWarning[] = [];
  for (const { phrase, uses } of byPhrase.values()) {
    const owners = [...new Set(uses.map(b => b.owner))];
    if (uses.length < 2 || owners.length < 2) continue;
    const described = uses.map(b => `'${b.name}' (${b.owner})`).join(', ');
    warnings.push(warning('COMP-102', `Trigger '${phrase}' activates several behaviors: ${described}`, owners));
  }
  return warnings;
}

// =============================================================================
// Detection
// =============================================================================

/**
 * Scan every behavior of the ordered capabilities, then settle each collision.
 * All collisions are reported, not only the first.
 */
export function detectConflicts(ordered: readonly GraphNode[], strategy: ConflictResolution): ConflictReport {
  const declarations = new Map<string, Declaration[]>();
  const conflicts: BehaviorConflict[] = [];

  for (const node of ordered) {
    for (const behavior of node.capability.behaviors) {
      const declaration = { capability: node.capability.name, appearance: node.index, behavior };
      const existing = declarations.get(behavior.name);
      if (!existing) {
        declarations.set(behavior.name, [declaration]);
        continue;
      }
      conflicts.push({ behavior: behavior.name, capabilities: [existing[0].capability, declaration.capability] });
      existing.push(declaration);
    }
  }

  const behaviors: ResolvedBehavior[] = [];
  const errors: CompositionIssue[] = [];
  const warnings: CompositionWarning[] = [];

  for (const [name, declared] of declarations) {
    if (declared.length === 1) {
      behaviors.push(resolved(declared[0], 'sole', [declared[0].capability]));
      continue;
    }

    const byAppearance = [...declared].sort((a, b) => a.appearance - b.appearance);
    const declarers = byAppearance.map(d => d.capability);

    switch (strategy) {
      case 'error':
        for (const conflict of conflicts.filter(c => c.behavior === name)) {
          const [first, second] = conflict.capabilities;
          errors.push(issue(
            'COMP-002',
            `Behavior '${name}' is declared by both '${first}' and '${second}'`,
            `Remove one of the capabilities, rename the behavior, or ${STRATEGY_HINT}`,
            { capabilities: [first, second], behavior: name }
          ));
        }
        break;

      case 'first-wins':
      case 'last-wins': {
        const winner = strategy === 'first-wins' ? byAppearance[0] : byAppearance[byAppearance.length - 1];
        behaviors.push(resolved(winner, strategy, [winner.capability]));
        warnings.push(warning(
          'COMP-101',
          `Behavior '${name}' is declared by ${quoted(declarers)}; ${strategy} keeps '${winner.capability}'`,
          declarers
        ));
        break;
      }

      case 'merge': {
        const merged = mergeDeclarations(byAppearance);
        if (merged.ok) {
          behaviors.push(merged.behavior);
          warnings.push(warning('COMP-101', `Behavior '${name}' merged from ${quoted(declarers)}`, declarers));
        } else {
          errors.push(issue(
            'COMP-002',
            `Behavior '${name}' from '${merged.rejected}' cannot be merged with ${quoted(merged.merged)}: outputs are incompatible`,
            `Make the output definitions of '${name}' compatible, or use 'first-wins' or 'last-wins'`,
            { capabilities: [...merged.merged, merged.rejected], behavior: name }
          ));
        }
        break;
      }
    }
  }

  warnings.push(...triggerOverlaps(behaviors));
  return { behaviors, conflicts, errors, warnings };
}
