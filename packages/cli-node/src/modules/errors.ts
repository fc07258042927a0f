/**
 * Composition error and warning codes, plus constructors for structured issues.
 */

import type {
  CompositionErrorCode,
  CompositionErrorKind,
  CompositionIssue,
  CompositionWarning,
  CompositionWarningCode,
} from '../types.js';

// =============================================================================
// Error Codes
// =============================================================================

export const COMPOSITION_ERRORS = {
  'COMP-002': 'BehaviorOverlap',
  'COMP-003': 'PrerequisiteMissing',
  'COMP-004': 'CircularDependency',
  'COMP-005': 'VersionIncompatibility',
  'COMP-006': 'ContractConflict',
  'COMP-007': 'UnknownBaseTemplate',
  'COMP-008': 'CapabilityNotFound',
  'COMP-009': 'InvalidManifest',
  'COMP-010': 'InvalidCapabilityConfig',
  'COMP-011': 'StoreFailure',
} as const satisfies Record<CompositionErrorCode, CompositionErrorKind>;

export const COMPOSITION_WARNINGS = {
  'COMP-001': 'DuplicateCapability',
  'COMP-101': 'BehaviorResolved',
  'COMP-102': 'TriggerOverlap',
  'COMP-103': 'Composability',
} as const satisfies Record<CompositionWarningCode, string>;

// =============================================================================
// Constructors
// =============================================================================

type IssueDetails = Omit<CompositionIssue, 'code' | 'kind' | 'message' | 'suggestion'>;

export function issue(
  code: CompositionErrorCode,
  message: string,
  suggestion: string,
  details: IssueDetails = {}
): CompositionIssue {
  return {
    code,
    kind: COMPOSITION_ERRORS[code],
    message,
    suggestion,
    ...details,
  };
}

export function warning(
  code: CompositionWarningCode,
  message: string,
  capabilities?: string[]
): CompositionWarning {
  return capabilities ? { code, message, capabilities } : { code, message };
}

/** Render an issue as a single line, e.g. for CLI output */
export function formatIssue(entry: CompositionIssue): string {
  return `${entry.code} ${entry.kind}: ${entry.message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
