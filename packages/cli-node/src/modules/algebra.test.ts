/**
 * Tests for normalization, evaluation and composition equality
 */

import { describe, it, expect } from 'vitest';
import type { Capability, ResolvedCapability } from '../types.js';
import {
  checkComposability,
  compositionSignature,
  extendReferences,
  normalizeReferences,
  sameComposition,
  validateConfigs,
} from './algebra.js';
import { defineCapability } from './loader.js';

function resolvedCapability(definition: Capability, config?: Record<string, unknown>): ResolvedCapability {
  const resolved: ResolvedCapability = {
    name: definition.name,
    version: definition.version,
    requested: true,
    requiredBy: [],
    definition,
  };
  if (config) resolved.config = config;
  return resolved;
}

// =============================================================================
// Normalization
// =============================================================================

describe('normalizeReferences', () => {
  it('should keep the first occurrence of each name', () => {
    const result = normalizeReferences([{ name: 'planner' }, { name: 'writer' }, { name: 'planner' }]);

    expect(result.references).toEqual([{ name: 'planner' }, { name: 'writer' }]);
    expect(result.warnings).toEqual([{
      code: 'COMP-001',
      message: "Capability 'planner' is listed more than once",
      capabilities: ['planner'],
    }]);
  });

  it('should mention the ignored version', () => {
    const result = normalizeReferences([
      { name: 'planner', version: '^1.0.0' },
      { name: 'planner', version: '^2.0.0' },
    ]);

    expect(result.references).toEqual([{ name: 'planner', version: '^1.0.0' }]);
    expect(result.warnings[0].message).toBe(
      "Capability 'planner' is listed more than once (keeping version '^1.0.0', ignoring '^2.0.0')"
    );
  });

  it('should treat a missing version as *', () => {
    const result = normalizeReferences([{ name: 'planner' }, { name: 'planner', version: '*' }]);
    expect(result.warnings[0].message).toBe("Capability 'planner' is listed more than once");
  });
});

describe('extendReferences', () => {
  it('should append additions to the lineage', () => {
    expect(extendReferences([{ name: 'planner' }], [{ name: 'writer' }])).toEqual([{ name: 'planner' }, { name: 'writer' }]);
  });
});

// =============================================================================
// Configuration
// =============================================================================

describe('validateConfigs', () => {
  const configured = defineCapability({
    name: 'note-taking',
    configSchema: {
      type: 'object',
      required: ['maxNotes'],
      properties: { maxNotes: { type: 'integer' } },
    },
  });

  it('should accept a matching config', () => {
    expect(validateConfigs([resolvedCapability(configured, { maxNotes: 20 })])).toEqual([]);
  });

  it('should check a missing config as an empty object', () => {
    const errors = validateConfigs([resolvedCapability(configured)]);

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: 'COMP-010',
      kind: 'InvalidCapabilityConfig',
      message: "Configuration for 'note-taking' is invalid: config.maxNotes is required",
      suggestion: "Fix the config block of 'note-taking' in the manifest",
      capabilities: ['note-taking'],
    });
  });

  it('should describe type mismatches', () => {
    const errors = validateConfigs([resolvedCapability(configured, { maxNotes: 'many' })]);
    expect(errors[0].message).toBe("Configuration for 'note-taking' is invalid: config.maxNotes must be integer");
  });

  it('should skip capabilities without a schema', () => {
    expect(validateConfigs([resolvedCapability(defineCapability({ name: 'planner' }), { anything: true })])).toEqual([]);
  });
});

// =============================================================================
// Composability
// =============================================================================

describe('checkComposability', () => {
  it('should warn when the template is not among the declared ones', () => {
    const warnings = checkComposability(
      [resolvedCapability(defineCapability({ name: 'reviewer', composableWith: ['supervisor'] }))],
      'advisor'
    );

    expect(warnings).toEqual([{
      code: 'COMP-103',
      message: "Capability 'reviewer' may not be compatible with base template 'advisor' (composable with: supervisor)",
      capabilities: ['reviewer'],
    }]);
  });

  it('should accept "all", a matching template, or no declaration', () => {
    const capabilities = [
      resolvedCapability(defineCapability({ name: 'a', composableWith: ['All agents'] })),
      resolvedCapability(defineCapability({ name: 'b', composableWith: ['Advisor'] })),
      resolvedCapability(defineCapability({ name: 'c' })),
    ];
    expect(checkComposability(capabilities, 'advisor')).toEqual([]);
  });
});

// =============================================================================
// Equality
// =============================================================================

describe('compositionSignature', () => {
  const planner = resolvedCapability(defineCapability({ name: 'planner' }));

  it('should ignore contract declarer order', () => {
    const contract = { name: 'plan-file', assertion: 'file_exists' as const, path: 'PLAN.md' };
    const a = { capabilities: [planner], contracts: [{ ...contract, declaredBy: ['planner', 'writer'] }] };
    const b = { capabilities: [planner], contracts: [{ ...contract, declaredBy: ['writer', 'planner'] }] };

    expect(sameComposition(a, b)).toBe(true);
  });

  it('should include config', () => {
    const configured = resolvedCapability(defineCapability({ name: 'planner' }), { depth: 2 });
    expect(compositionSignature({ capabilities: [planner], contracts: [] })).not.toBe(
      compositionSignature({ capabilities: [configured], contracts: [] })
    );
  });
});
