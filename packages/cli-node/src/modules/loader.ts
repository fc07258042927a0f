/**
 * Capability Loader - read capability specification files from search paths
 * and convert them into Capability definitions.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import {
  isRecord,
  type Behavior,
  type Capability,
  type Contract,
  type OutputDefinition,
  type PrerequisiteRef,
} from '../types.js';
import { errorMessage } from './errors.js';
import {
  CAPABILITY_KIND,
  type BehaviorDocument,
  type CapabilitySpecDocument,
  type PrerequisiteDocument,
} from './schemas.js';
import { inspectCapabilitySpec } from './validator.js';

/** Environment variable holding extra search paths, separated by the platform path delimiter */
export const SPECS_ENV = 'AGENT_COMPOSER_SPECS';

export const SPEC_EXTENSIONS = ['.yaml', '.yml', '.json'];

export interface InvalidCapabilityFile {
  file: string;
  errors: string[];
}

export interface CapabilityScan {
  capabilities: Capability[];
  invalid: InvalidCapabilityFile[];
}

export type CapabilityParseResult =
  | { ok: true; capability: Capability; warnings: string[] }
  | { ok: false; errors: string[]; warnings: string[] };

// =============================================================================
// Conversion
// =============================================================================

/** Parse "name" or "name@constraint" */
export function parsePrerequisite(entry: PrerequisiteDocument): PrerequisiteRef {
  if (typeof entry !== 'string') {
    return entry.version !== undefined ? { name: entry.name, version: entry.version } : { name: entry.name };
  }
  const at = entry.indexOf('@');
  if (at <= 0) {
    return { name: entry.trim() };
  }
  return { name: entry.slice(0, at).trim(), version: entry.slice(at + 1).trim() };
}

function toBehavior(doc: BehaviorDocument): Behavior {
  const triggers = Array.isArray(doc.trigger)
    ? doc.trigger
    : [...(doc.trigger.explicit ?? []), ...(doc.trigger.implicit ?? [])];
  const behavior: Behavior = {
    name: doc.name,
    triggers,
    protocol: doc.protocol,
    output: doc.output,
  };
  if (doc.display_name !== undefined) behavior.displayName = doc.display_name;
  if (doc.description !== undefined) behavior.description = doc.description;
  return behavior;
}

/**
 * Convert a structurally valid specification document into a Capability.
 */
export function toCapability(doc: CapabilitySpecDocument, location?: string): Capability {
  const spec = doc.spec ?? {};
  const capability: Capability = {
    name: doc.metadata.name,
    version: doc.metadata.version,
    prerequisites: (spec.prerequisites ?? []).map(parsePrerequisite),
    behaviors: doc.behaviors.map(toBehavior),
    contracts: (doc.contracts ?? []).map(contract => ({ ...contract })),
    composableWith: spec.composable_with ?? [],
  };
  if (spec.display_name !== undefined) capability.displayName = spec.display_name;
  if (spec.category !== undefined) capability.category = spec.category;
  if (spec.purpose !== undefined) capability.purpose = spec.purpose;
  if (spec.config_schema !== undefined) capability.configSchema = spec.config_schema;
  if (location !== undefined) capability.location = location;
  return capability;
}

/**
 * Validate a deserialized specification document and convert it.
 */
export function parseCapabilitySpec(doc: unknown, location?: string): CapabilityParseResult {
  const inspection = inspectCapabilitySpec(doc);
  if (!inspection.document || !inspection.valid) {
    return { ok: false, errors: inspection.errors, warnings: inspection.warnings };
  }
  return { ok: true, capability: toCapability(inspection.document, location), warnings: inspection.warnings };
}

// =============================================================================
// Programmatic Definitions
// =============================================================================

export interface BehaviorDefinition {
  name: string;
  displayName?: string;
  description?: string;
  triggers?: string[];
  protocol?: string[];
  output?: OutputDefinition;
}

export interface CapabilityDefinition {
  name: string;
  version?: string;
  displayName?: string;
  category?: string;
  purpose?: string;
  prerequisites?: Array<string | PrerequisiteRef>;
  behaviors?: BehaviorDefinition[];
  contracts?: Contract[];
  composableWith?: string[];
  configSchema?: Record<string, unknown>;
}

/**
 * Build a Capability in code, filling defaults (version 1.0.0, empty lists).
 */
export function defineCapability(definition: CapabilityDefinition): Capability {
  const { behaviors, prerequisites, contracts, composableWith, version, ...rest } = definition;
  return {
    ...rest,
    version: version ?? '1.0.0',
    prerequisites: (prerequisites ?? []).map(parsePrerequisite),
    behaviors: (behaviors ?? []).map(b => ({
      ...b,
      triggers: b.triggers ?? [],
      protocol: b.protocol ?? [],
      output: b.output ?? '',
    })),
    contracts: contracts ?? [],
    composableWith: composableWith ?? [],
  };
}

// =============================================================================
// Files
// =============================================================================

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Read a YAML or JSON document. Dates stay strings.
 */
export async function readDocument(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  return yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath });
}

/**
 * Load a single capability specification file. Throws when it is invalid.
 */
export async function loadCapability(filePath: string): Promise<Capability> {
  const parsed = parseCapabilitySpec(await readDocument(filePath), filePath);
  if (!parsed.ok) {
    throw new Error(`Invalid capability specification ${filePath}: ${parsed.errors.join('; ')}`);
  }
  return parsed.capability;
}

/**
 * Scan search paths for capability specification files.
 * Documents of another kind are ignored; invalid specifications are reported.
 */
export async function listCapabilities(searchPaths: string[]): Promise<CapabilityScan> {
  const capabilities: Capability[] = [];
  const invalid: InvalidCapabilityFile[] = [];

  for (const basePath of searchPaths) {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(basePath, { withFileTypes: true });
    } catch (error) {
      // Path doesn't exist, skip
      if (isMissingPath(error)) continue;
      throw error;
    }

    const files = entries
      .filter(entry => entry.isFile() && SPEC_EXTENSIONS.includes(path.extname(entry.name)))
      .map(entry => entry.name)
      .sort();

    for (const fileName of files) {
      const filePath = path.join(basePath, fileName);
      let doc: unknown;
      try {
        doc = await readDocument(filePath);
      } catch (error) {
        invalid.push({ file: filePath, errors: [`Invalid YAML: ${errorMessage(error)}`] });
        continue;
      }
      if (!isRecord(doc) || doc.kind !== CAPABILITY_KIND) continue;

      const parsed = parseCapabilitySpec(doc, filePath);
      if (parsed.ok) {
        capabilities.push(parsed.capability);
      } else {
        invalid.push({ file: filePath, errors: parsed.errors });
      }
    }
  }

  return { capabilities, invalid };
}

/**
 * Search paths in priority order: explicit paths, AGENT_COMPOSER_SPECS, then the
 * project and home conventions.
 */
export function getDefaultSearchPaths(cwd: string, extraPaths: string[] = []): string[] {
  const home = process.env.HOME || '';
  const fromEnv = (process.env[SPECS_ENV] ?? '').split(path.delimiter).filter(Boolean);
  const paths = [
    ...extraPaths.map(p => path.resolve(cwd, p)),
    ...fromEnv.map(p => path.resolve(cwd, p)),
    path.join(cwd, 'capabilities'),
    path.join(cwd, '.agents', 'capabilities'),
  ];
  if (home) {
    paths.push(path.join(home, '.agents', 'capabilities'));
  }
  return [...new Set(paths)];
}
