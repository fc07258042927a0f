/**
 * Composition Evaluator - normalization, finalization and the equality used
 * by the composition laws (identity, idempotency, commutativity, associativity).
 */

import type { ValidateFunction } from 'ajv';
import type {
  CapabilityReference,
  CompositionIssue,
  CompositionWarning,
  MergedContract,
  ResolvedCapability,
} from '../types.js';
import { stableStringify } from './canonical.js';
import { errorMessage, issue, warning } from './errors.js';
import type { PrerequisiteGraph } from './graph.js';
import { ajv, describeSchemaErrors } from './schemas.js';

// =============================================================================
// Normalization
// =============================================================================

export interface NormalizedReferences {
  references: CapabilityReference[];
  warnings: CompositionWarning[];
}

/**
 * Drop repeated capability names, keeping the first occurrence.
 */
export function normalizeReferences(references: readonly CapabilityReference[]): NormalizedReferences {
  const kept = new Map<string, CapabilityReference>();
  const warnings: CompositionWarning[] = [];

  for (const reference of references) {
    const first = kept.get(reference.name);
    if (!first) {
      kept.set(reference.name, reference);
      continue;
    }
    const detail = (first.version ?? '*') === (reference.version ?? '*')
      ? ''
      : ` (keeping version '${first.version ?? '*'}', ignoring '${reference.version ?? '*'}')`;
    warnings.push(warning('COMP-001', `Capability '${reference.name}' is listed more than once${detail}`, [reference.name]));
  }

  return { references: [...kept.values()], warnings };
}

/**
 * References for composing more capabilities onto an existing lineage.
 */
export function extendReferences(
  lineage: readonly CapabilityReference[],
  additions: readonly CapabilityReference[]
): CapabilityReference[] {
  return [...lineage, ...additions];
}

// =============================================================================
// Finalization
// =============================================================================

export function finalizeCapabilities(graph: PrerequisiteGraph, order: readonly number[]): ResolvedCapability[] {
  return order.map(index => {
    const node = graph.node(index);
    const resolved: ResolvedCapability = {
      name: node.capability.name,
      version: node.capability.version,
      requested: node.reference !== undefined,
      requiredBy: graph.dependentsOf(index).map(i => graph.node(i).capability.name).sort(),
      definition: node.capability,
    };
    if (node.reference?.config !== undefined) {
      resolved.config = node.reference.config;
    }
    return resolved;
  });
}

// =============================================================================
// Configuration
// =============================================================================

const compiledConfigSchemas = new WeakMap<object, ValidateFunction>();

function configValidator(schema: Record<string, unknown>): ValidateFunction {
  let validate = compiledConfigSchemas.get(schema);
  if (!validate) {
    validate = ajv.compile(schema);
    compiledConfigSchemas.set(schema, validate);
  }
  return validate;
}

/**
 * Check each capability's manifest config against its configuration schema.
 * A capability without config is checked as if given `{}`.
 */
export function validateConfigs(capabilities: readonly ResolvedCapability[]): CompositionIssue[] {
  const errors: CompositionIssue[] = [];

  for (const capability of capabilities) {
    const schema = capability.definition.configSchema;
    if (!schema) continue;

    let validate: ValidateFunction;
    try {
      validate = configValidator(schema);
    } catch (error) {
      errors.push(issue(
        'COMP-010',
        `Configuration schema of '${capability.name}' cannot be compiled: ${errorMessage(error)}`,
        `Fix config_schema in the definition of '${capability.name}'`,
        { capabilities: [capability.name] }
      ));
      continue;
    }

    if (!validate(capability.config ?? {})) {
      const problems = describeSchemaErrors(validate.errors, 'config', 'config').map(p => p.message);
      errors.push(issue(
        'COMP-010',
        `Configuration for '${capability.name}' is invalid: ${problems.join('; ')}`,
        capability.requested
          ? `Fix the config block of '${capability.name}' in the manifest`
          : `List '${capability.name}' in the manifest with a config block matching its schema`,
        { capabilities: [capability.name] }
      ));
    }
  }
  return errors;
}

// =============================================================================
// Composability
// =============================================================================

/**
 * Warn about capabilities that name the templates they compose with and
 * mention neither this template nor "all".
 */
export function checkComposability(
  capabilities: readonly ResolvedCapability[],
  baseTemplate: string
): CompositionWarning[] {
  const template = baseTemplate.toLowerCase();
  const warnings: CompositionWarning[] = [];

  for (const capability of capabilities) {
    const targets = capability.definition.composableWith.map(t => t.toLowerCase());
    if (targets.length === 0) continue;
    if (targets.some(t => /\ball\b/.test(t) || t.includes(template))) continue;
    warnings.push(warning(
      'COMP-103',
      `Capability '${capability.name}' may not be compatible with base template '${baseTemplate}' (composable with: ${capability.definition.composableWith.join(', ')})`,
      [capability.name]
    ));
  }
  return warnings;
}

// =============================================================================
// Equality
// =============================================================================

export interface CompositionShape {
  capabilities: readonly ResolvedCapability[];
  contracts: readonly MergedContract[];
}

/**
 * Canonical fingerprint of a composition: finalized capabilities with their
 * config, and merged contracts.
 */
export function compositionSignature(composition: CompositionShape): string {
  return stableStringify({
    capabilities: composition.capabilities.map(c => ({ id: `${c.name}@${c.version}`, config: c.config })),
    contracts: composition.contracts.map(c => ({
      name: c.name,
      assertion: c.assertion,
      path: c.path,
      pattern: c.pattern,
      declaredBy: [...c.declaredBy].sort(),
    })),
  });
}

export function sameComposition(a: CompositionShape, b: CompositionShape): boolean {
  return compositionSignature(a) === compositionSignature(b);
}
