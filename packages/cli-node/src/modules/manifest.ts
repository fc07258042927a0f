/**
 * Manifest Parser - turns a composition manifest document into a typed request.
 *
 * Accepts either a bare composition block or a wrapped manifest
 * (`metadata` + `composition`). Never fetches capability content.
 */

import * as fs from 'node:fs/promises';
import * as yaml from 'js-yaml';
import {
  CONFLICT_RESOLUTIONS,
  isRecord,
  type CapabilityReference,
  type CompositionIssue,
  type CompositionRequest,
  type ManifestMetadata,
} from '../types.js';
import { errorMessage, issue } from './errors.js';
import {
  describeSchemaErrors,
  isCompositionBlock,
  isManifestMetadata,
  type CompositionBlockDocument,
  type SchemaProblem,
} from './schemas.js';

export type ManifestParseResult =
  | { ok: true; request: CompositionRequest }
  | { ok: false; errors: CompositionIssue[] };

const GENERIC_SUGGESTION =
  'A manifest needs base_template, a capabilities list and optionally composition_rules.conflict_resolution';

function invalidManifest(message: string, suggestion = GENERIC_SUGGESTION): CompositionIssue {
  return issue('COMP-009', message, suggestion);
}

function suggestionFor(path: string): string {
  if (path.endsWith('base_template')) {
    return "Set base_template to a registered template id (e.g. 'advisor')";
  }
  if (path.endsWith('conflict_resolution')) {
    return `Use one of: ${CONFLICT_RESOLUTIONS.join(', ')}`;
  }
  if (/capabilities\[\d+\]/.test(path)) {
    return 'Each capability entry needs a non-empty name, an optional version string and an optional config object';
  }
  if (path.startsWith('metadata')) {
    return 'metadata needs a non-empty name';
  }
  return GENERIC_SUGGESTION;
}

function toIssues(problems: SchemaProblem[]): CompositionIssue[] {
  return problems.map(problem => invalidManifest(problem.message, suggestionFor(problem.path)));
}

function toReference(entry: CompositionBlockDocument['capabilities'][number]): CapabilityReference {
  const reference: CapabilityReference = { name: entry.name.trim() };
  if (entry.version !== undefined) reference.version = entry.version;
  if (entry.config !== undefined) reference.config = entry.config;
  return reference;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse an already deserialized manifest document.
 */
export function parseManifest(document: unknown): ManifestParseResult {
  if (document === null || document === undefined) {
    return { ok: false, errors: [invalidManifest('Manifest is empty')] };
  }
  if (!isRecord(document)) {
    return { ok: false, errors: [invalidManifest('Manifest must be an object')] };
  }

  const wrapped = 'composition' in document;
  const block = wrapped ? document.composition : document;
  const prefix = wrapped ? 'composition' : '';
  const errors: CompositionIssue[] = [];

  let metadata: ManifestMetadata | undefined;
  if (wrapped && document.metadata !== undefined) {
    if (isManifestMetadata(document.metadata)) {
      const raw = document.metadata;
      metadata = { name: raw.name };
      if (raw.version !== undefined) metadata.version = raw.version;
      if (raw.agent_type !== undefined) metadata.agentType = raw.agent_type;
      if (raw.description !== undefined) metadata.description = raw.description;
    } else {
      errors.push(...toIssues(describeSchemaErrors(isManifestMetadata.errors, 'metadata', 'metadata')));
    }
  }

  if (!isRecord(block)) {
    errors.push(invalidManifest('composition must be an object'));
    return { ok: false, errors };
  }
  if (!isCompositionBlock(block)) {
    errors.push(...toIssues(describeSchemaErrors(isCompositionBlock.errors, prefix, 'manifest')));
    return { ok: false, errors };
  }
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const request: CompositionRequest = {
    baseTemplate: block.base_template.trim(),
    capabilities: block.capabilities.map(toReference),
    conflictResolution: block.composition_rules?.conflict_resolution ?? 'error',
  };
  if (metadata) request.metadata = metadata;
  return { ok: true, request };
}

/**
 * Parse manifest text (YAML or JSON).
 */
export function parseManifestText(text: string, filename?: string): ManifestParseResult {
  let document: unknown;
  try {
    document = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename });
  } catch (error) {
    return {
      ok: false,
      errors: [invalidManifest(`Manifest is not valid YAML or JSON: ${errorMessage(error)}`, 'Fix the syntax error')],
    };
  }
  return parseManifest(document);
}

/**
 * Read and parse a manifest file.
 */
export async function loadManifest(filePath: string): Promise<ManifestParseResult> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    return {
      ok: false,
      errors: [invalidManifest(`Cannot read manifest ${filePath}: ${errorMessage(error)}`, 'Check the manifest path')],
    };
  }
  return parseManifestText(text, filePath);
}

// =============================================================================
// Programmatic Requests
// =============================================================================

/**
 * Check a request built in code rather than parsed from a document.
 */
export function validateRequest(request: CompositionRequest): CompositionIssue[] {
  const errors: CompositionIssue[] = [];
  if (request.baseTemplate.trim() === '') {
    errors.push(invalidManifest('base_template must not be blank', suggestionFor('base_template')));
  }
  if (!CONFLICT_RESOLUTIONS.includes(request.conflictResolution)) {
    errors.push(invalidManifest(
      `conflict_resolution must be one of: ${CONFLICT_RESOLUTIONS.join(', ')}`,
      suggestionFor('conflict_resolution')
    ));
  }
  request.capabilities.forEach((reference, index) => {
    if (reference.name.trim() === '') {
      errors.push(invalidManifest(`capabilities[${index}].name must not be blank`, suggestionFor(`capabilities[${index}]`)));
    }
    if (reference.config !== undefined && !isRecord(reference.config)) {
      errors.push(invalidManifest(`capabilities[${index}].config must be object`, suggestionFor(`capabilities[${index}]`)));
    }
  });
  return errors;
}
