/**
 * Capability Validator - validate capability specification documents and files.
 */

import * as fs from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { errorMessage } from './errors.js';
import {
  ajv,
  describeSchemaErrors,
  isCapabilitySpecDocument,
  type CapabilitySpecDocument,
  type ContractDocument,
} from './schemas.js';

// =============================================================================
// Types
// =============================================================================

export interface SpecValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface SpecInspection extends SpecValidationResult {
  /** Present when the document passed the structural checks */
  document?: CapabilitySpecDocument;
}

export interface FileValidationResult extends SpecValidationResult {
  file: string;
}

const KEBAB_CASE = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

// =============================================================================
// Semantic Checks
// =============================================================================

function findDuplicates(names: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}

function checkContract(contract: ContractDocument, errors: string[]): void {
  switch (contract.assertion) {
    case 'file_contains':
      if (!contract.path || contract.pattern === undefined) {
        errors.push(`Contract '${contract.name}' (file_contains) requires 'path' and 'pattern'`);
      }
      break;
    case 'directory_exists':
    case 'file_exists':
      if (!contract.path) {
        errors.push(`Contract '${contract.name}' (${contract.assertion}) requires 'path'`);
      }
      break;
    case 'custom':
      break;
  }
}

function checkDocument(doc: CapabilitySpecDocument, errors: string[], warnings: string[]): void {
  const name = doc.metadata.name;

  if (doc.spec?.name !== undefined && doc.spec.name !== name) {
    errors.push(`spec.name '${doc.spec.name}' does not match metadata.name '${name}'`);
  }
  if (!KEBAB_CASE.test(name)) {
    warnings.push(`Name '${name}' should be lowercase with hyphens (e.g. 'memory-management')`);
  }
  if (doc.metadata.status === 'deprecated') {
    warnings.push(`Capability '${name}' is deprecated`);
  }

  // Prerequisites
  const prerequisites = (doc.spec?.prerequisites ?? []).map(p =>
    typeof p === 'string' ? p.split('@')[0].trim() : p.name
  );
  if (prerequisites.includes(name)) {
    errors.push(`Capability '${name}' lists itself as a prerequisite`);
  }
  for (const duplicate of findDuplicates(prerequisites)) {
    warnings.push(`Prerequisite '${duplicate}' is listed more than once`);
  }

  // Behaviors
  for (const duplicate of findDuplicates(doc.behaviors.map(b => b.name))) {
    errors.push(`Duplicate behavior name: ${duplicate}`);
  }
  for (const behavior of doc.behaviors) {
    if (behavior.reference?.startsWith('/')) {
      warnings.push(`Behavior '${behavior.name}' uses an absolute reference path: ${behavior.reference}`);
    }
  }

  // Contracts
  const contracts = doc.contracts ?? [];
  if (contracts.length === 0) {
    warnings.push('No contracts defined - consider adding validation contracts');
  }
  for (const duplicate of findDuplicates(contracts.map(c => c.name))) {
    errors.push(`Duplicate contract name: ${duplicate}`);
  }
  for (const contract of contracts) {
    checkContract(contract, errors);
  }

  // Configuration schema
  const configSchema = doc.spec?.config_schema;
  if (configSchema !== undefined && ajv.validateSchema(configSchema) === false) {
    errors.push(`spec.config_schema is not a valid JSON Schema: ${ajv.errorsText(ajv.errors)}`);
  }
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Run structural and semantic checks, keeping the typed document when it is well-formed.
 */
export function inspectCapabilitySpec(doc: unknown): SpecInspection {
  if (doc === null || doc === undefined) {
    return { valid: false, errors: ['Empty specification file'], warnings: [] };
  }
  if (!isCapabilitySpecDocument(doc)) {
    const errors = describeSchemaErrors(isCapabilitySpecDocument.errors, '', 'specification').map(p => p.message);
    return { valid: false, errors, warnings: [] };
  }

  const errors: string[] = [];
  const warnings: string[] = [];
  checkDocument(doc, errors, warnings);
  return { valid: errors.length === 0, errors, warnings, document: doc };
}

/**
 * Validate a capability specification document.
 */
export function validateCapabilitySpec(doc: unknown): SpecValidationResult {
  const { valid, errors, warnings } = inspectCapabilitySpec(doc);
  return { valid, errors, warnings };
}

/**
 * Read a specification file (YAML or JSON) and validate it.
 */
export async function validateCapabilityFile(filePath: string): Promise<FileValidationResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    return { file: filePath, valid: false, errors: [`Cannot read file: ${errorMessage(error)}`], warnings: [] };
  }

  let doc: unknown;
  try {
    doc = yaml.load(content, { schema: yaml.CORE_SCHEMA, filename: filePath });
  } catch (error) {
    return { file: filePath, valid: false, errors: [`Invalid YAML: ${errorMessage(error)}`], warnings: [] };
  }

  return { file: filePath, ...validateCapabilitySpec(doc) };
}
