/**
 * JSON Schemas for manifests and capability specification files, compiled with Ajv.
 *
 * The compiled validators double as type guards for the raw (snake_case) documents.
 */

import _Ajv from 'ajv';
import _addFormats from 'ajv-formats';
import type { ErrorObject } from 'ajv';
import { CONFLICT_RESOLUTIONS, CONTRACT_ASSERTIONS, type ContractAssertion, type ConflictResolution } from '../types.js';

// Handle ESM/CJS interop
const Ajv = _Ajv.default;
const addFormats = _addFormats.default;

export const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export const API_VERSION = 'agent-composer/v1';
export const CAPABILITY_KIND = 'CapabilitySpecification';

/** Pattern used to reject blank strings */
const NOT_BLANK = '\\S';

// =============================================================================
// Raw Document Types
// =============================================================================

export interface CapabilityReferenceDocument {
  name: string;
  version?: string;
  config?: Record<string, unknown>;
}

export interface CompositionBlockDocument {
  base_template: string;
  capabilities: CapabilityReferenceDocument[];
  composition_rules?: {
    conflict_resolution?: ConflictResolution;
  };
}

export interface ManifestMetadataDocument {
  name: string;
  version?: string;
  agent_type?: string;
  description?: string;
}

export interface TriggerDocument {
  explicit?: string[];
  implicit?: string[];
}

export interface BehaviorDocument {
  name: string;
  display_name?: string;
  description?: string;
  trigger: string[] | TriggerDocument;
  protocol: string[];
  output: string | Record<string, unknown>;
  reference?: string;
}

export interface ContractDocument {
  name: string;
  assertion: ContractAssertion;
  path?: string;
  pattern?: string;
  description?: string;
}

export type PrerequisiteDocument = string | { name: string; version?: string };

export interface CapabilitySpecDocument {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    version: string;
    status?: 'draft' | 'stable' | 'deprecated';
    created?: string;
    author?: string;
  };
  spec?: {
    name?: string;
    display_name?: string;
    category?: string;
    purpose?: string;
    prerequisites?: PrerequisiteDocument[];
    composable_with?: string[];
    config_schema?: Record<string, unknown>;
  };
  behaviors: BehaviorDocument[];
  contracts?: ContractDocument[];
  adoption?: Record<string, unknown>;
}

// =============================================================================
// Schemas
// =============================================================================

const stringList = { type: 'array', items: { type: 'string' } };
const nonBlank = { type: 'string', pattern: NOT_BLANK };

export const COMPOSITION_BLOCK_SCHEMA = {
  type: 'object',
  required: ['base_template', 'capabilities'],
  properties: {
    base_template: nonBlank,
    capabilities: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        properties: {
          name: nonBlank,
          version: { type: 'string' },
          config: { type: 'object' },
        },
      },
    },
    composition_rules: {
      type: 'object',
      properties: {
        conflict_resolution: { enum: [...CONFLICT_RESOLUTIONS] },
      },
    },
  },
};

export const MANIFEST_METADATA_SCHEMA = {
  type: 'object',
  required: ['name'],
  properties: {
    name: nonBlank,
    version: { type: 'string' },
    agent_type: { type: 'string' },
    description: { type: 'string' },
  },
};

const BEHAVIOR_SCHEMA = {
  type: 'object',
  required: ['name', 'trigger', 'protocol', 'output'],
  properties: {
    name: nonBlank,
    display_name: { type: 'string' },
    description: { type: 'string' },
    trigger: {
      anyOf: [
        stringList,
        {
          type: 'object',
          properties: { explicit: stringList, implicit: stringList },
          additionalProperties: false,
        },
      ],
    },
    protocol: stringList,
    output: { type: ['string', 'object'] },
    reference: { type: 'string' },
  },
};

const CONTRACT_SCHEMA = {
  type: 'object',
  required: ['name', 'assertion'],
  properties: {
    name: nonBlank,
    assertion: { enum: [...CONTRACT_ASSERTIONS] },
    path: { type: 'string' },
    pattern: { type: 'string' },
    description: { type: 'string' },
  },
};

export const CAPABILITY_SPEC_SCHEMA = {
  type: 'object',
  required: ['apiVersion', 'kind', 'metadata', 'behaviors'],
  properties: {
    apiVersion: { const: API_VERSION },
    kind: { const: CAPABILITY_KIND },
    metadata: {
      type: 'object',
      required: ['name', 'version'],
      properties: {
        name: nonBlank,
        version: nonBlank,
        status: { enum: ['draft', 'stable', 'deprecated'] },
        created: { type: 'string', format: 'date' },
        author: { type: 'string' },
      },
    },
    spec: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        display_name: { type: 'string' },
        category: { type: 'string' },
        purpose: { type: 'string' },
        prerequisites: {
          type: 'array',
          items: {
            anyOf: [
              nonBlank,
              {
                type: 'object',
                required: ['name'],
                properties: { name: nonBlank, version: { type: 'string' } },
                additionalProperties: false,
              },
            ],
          },
        },
        composable_with: stringList,
        config_schema: { type: 'object' },
      },
    },
    behaviors: { type: 'array', minItems: 1, items: BEHAVIOR_SCHEMA },
    contracts: { type: 'array', items: CONTRACT_SCHEMA },
    adoption: { type: 'object' },
  },
};

// =============================================================================
// Compiled Validators
// =============================================================================

export const isCompositionBlock = ajv.compile<CompositionBlockDocument>(COMPOSITION_BLOCK_SCHEMA);
export const isManifestMetadata = ajv.compile<ManifestMetadataDocument>(MANIFEST_METADATA_SCHEMA);
export const isCapabilitySpecDocument = ajv.compile<CapabilitySpecDocument>(CAPABILITY_SPEC_SCHEMA);

// =============================================================================
// Error Formatting
// =============================================================================

export interface SchemaProblem {
  /** Dotted location, e.g. "capabilities[0].name" ("" for the document root) */
  path: string;
  /** Human readable sentence including the location */
  message: string;
}

/** Convert a JSON pointer ("/capabilities/0/name") to "capabilities[0].name" */
export function pointerToPath(pointer: string, prefix = ''): string {
  let result = prefix;
  for (const segment of pointer.split('/').slice(1)) {
    const key = segment.replace(/~1/g, '/').replace(/~0/g, '~');
    if (/^\d+$/.test(key)) {
      result += `[${key}]`;
    } else {
      result += result ? `.${key}` : key;
    }
  }
  return result;
}

function describe(error: ErrorObject, location: string): string {
  const params: Record<string, unknown> = error.params;
  switch (error.keyword) {
    case 'required':
      return `${location} is required`;
    case 'enum': {
      const allowed = Array.isArray(params.allowedValues) ? params.allowedValues.map(String) : [];
      return `${location} must be one of: ${allowed.join(', ')}`;
    }
    case 'const':
      return `${location} must be '${String(params.allowedValue)}'`;
    case 'pattern':
      return params.pattern === NOT_BLANK ? `${location} must not be blank` : `${location} ${error.message ?? 'is invalid'}`;
    case 'anyOf':
      return `${location} has an unsupported shape`;
    default:
      return `${location} ${error.message ?? 'is invalid'}`;
  }
}

/**
 * Turn Ajv errors into one problem per violation.
 * Errors nested under a failing `anyOf` are folded into that single problem.
 */
export function describeSchemaErrors(
  errors: ErrorObject[] | null | undefined,
  prefix = '',
  rootLabel = 'document'
): SchemaProblem[] {
  if (!errors) return [];
  const anyOfPointers = errors.filter(e => e.keyword === 'anyOf').map(e => e.instancePath);
  const problems: SchemaProblem[] = [];
  const seen = new Set<string>();

  for (const error of errors) {
    const folded = error.keyword !== 'anyOf' && anyOfPointers.some(
      pointer => error.instancePath === pointer || error.instancePath.startsWith(`${pointer}/`)
    );
    if (folded) continue;

    let pointer = error.instancePath;
    if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
      pointer = `${pointer}/${error.params.missingProperty}`;
    }
    const path = pointerToPath(pointer, prefix);
    const message = describe(error, path || rootLabel);
    if (!seen.has(message)) {
      seen.add(message);
      problems.push({ path, message });
    }
  }
  return problems;
}
