/**
 * Agent Composer - Core Types
 * Capability definitions, composition requests, validation results and composed agents.
 */

// =============================================================================
// Conflict Resolution
// =============================================================================

/** Policy applied when two capabilities declare the same behavior name */
export type ConflictResolution = 'error' | 'first-wins' | 'last-wins' | 'merge';

export const CONFLICT_RESOLUTIONS: readonly ConflictResolution[] = [
  'error',
  'first-wins',
  'last-wins',
  'merge',
];

/** Strategies whose outcome depends on the order capabilities were listed in */
export function isOrderSensitive(strategy: ConflictResolution): boolean {
  return strategy === 'first-wins' || strategy === 'last-wins';
}

// =============================================================================
// Capability Definitions
// =============================================================================

/** Output definition of a behavior: free text or a structured description */
export type OutputDefinition = string | { [key: string]: unknown };

export interface Behavior {
  name: string;
  displayName?: string;
  description?: string;
  /** Phrases or events that activate the behavior */
  triggers: string[];
  /** Ordered protocol steps */
  protocol: string[];
  output: OutputDefinition;
}

export type ContractAssertion = 'directory_exists' | 'file_exists' | 'file_contains' | 'custom';

export const CONTRACT_ASSERTIONS: readonly ContractAssertion[] = [
  'directory_exists',
  'file_exists',
  'file_contains',
  'custom',
];

/** A named invariant the composed agent must satisfy */
export interface Contract {
  name: string;
  assertion: ContractAssertion;
  path?: string;
  pattern?: string;
  description?: string;
}

export interface PrerequisiteRef {
  name: string;
  /** Version constraint, e.g. "^1.0.0" */
  version?: string;
}

export interface Capability {
  // Identity
  name: string;
  version: string;

  // Descriptive
  displayName?: string;
  category?: string;
  purpose?: string;

  // Structure
  prerequisites: PrerequisiteRef[];
  behaviors: Behavior[];
  contracts: Contract[];

  /** Base templates this capability is meant for ("all" or template ids) */
  composableWith: string[];

  /** JSON Schema for per-capability configuration in a manifest */
  configSchema?: Record<string, unknown>;

  /** Where the definition was loaded from */
  location?: string;
}

// =============================================================================
// Composition Request
// =============================================================================

export interface CapabilityReference {
  name: string;
  /** Version constraint ("*", "1.2.3", "^1.0.0", "~1.2.0", ">=1.0.0", ...) */
  version?: string;
  config?: Record<string, unknown>;
}

export interface ManifestMetadata {
  name: string;
  version?: string;
  agentType?: string;
  description?: string;
}

export interface CompositionRequest {
  metadata?: ManifestMetadata;
  baseTemplate: string;
  capabilities: CapabilityReference[];
  conflictResolution: ConflictResolution;
}

// =============================================================================
// Issues
// =============================================================================

export type CompositionErrorCode =
  | 'COMP-002'
  | 'COMP-003'
  | 'COMP-004'
  | 'COMP-005'
  | 'COMP-006'
  | 'COMP-007'
  | 'COMP-008'
  | 'COMP-009'
  | 'COMP-010'
  | 'COMP-011';

export type CompositionWarningCode = 'COMP-001' | 'COMP-101' | 'COMP-102' | 'COMP-103';

export type CompositionErrorKind =
  | 'BehaviorOverlap'
  | 'PrerequisiteMissing'
  | 'CircularDependency'
  | 'VersionIncompatibility'
  | 'ContractConflict'
  | 'UnknownBaseTemplate'
  | 'CapabilityNotFound'
  | 'InvalidManifest'
  | 'InvalidCapabilityConfig'
  | 'StoreFailure';

/** A fatal problem found while composing */
export interface CompositionIssue {
  code: CompositionErrorCode;
  kind: CompositionErrorKind;
  message: string;
  /** Actionable fix, always present */
  suggestion: string;
  /** Capabilities involved, in the order they are named in the message */
  capabilities?: string[];
  behavior?: string;
  contract?: string;
  /** Cycle path for circular dependencies, first node repeated at the end */
  path?: string[];
}

export interface CompositionWarning {
  code: CompositionWarningCode;
  message: string;
  capabilities?: string[];
}

// =============================================================================
// Validation Result
// =============================================================================

export type ValidationStatus = 'pass' | 'fail' | 'warning';

export type CompositionStage =
  | 'parse'
  | 'resolve'
  | 'graph'
  | 'conflicts'
  | 'contracts'
  | 'evaluate'
  | 'instantiate';

/** Stage trace entry */
export interface StageTrace {
  stage: CompositionStage;
  durationMs: number;
  success: boolean;
  reason?: string;
}

export interface ResolvedCapability {
  name: string;
  version: string;
  /** True when listed in the request, false when pulled in as a prerequisite */
  requested: boolean;
  /** Names of resolved capabilities that declare this one as a prerequisite */
  requiredBy: string[];
  config?: Record<string, unknown>;
  definition: Capability;
}

export type BehaviorResolution = 'sole' | 'first-wins' | 'last-wins' | 'merge';

export interface ResolvedBehavior extends Behavior {
  /** Capability whose definition won (first contributor for merges) */
  owner: string;
  /** Every capability that contributed to the final definition */
  contributors: string[];
  resolution: BehaviorResolution;
}

export interface MergedContract extends Contract {
  declaredBy: string[];
}

export interface ValidationResult {
  status: ValidationStatus;
  errors: CompositionIssue[];
  warnings: CompositionWarning[];
  /** Finalized capability set in canonical order (empty on failure) */
  capabilities: ResolvedCapability[];
  behaviors: ResolvedBehavior[];
  contracts: MergedContract[];
  trace: StageTrace[];
}

// =============================================================================
// Templates and Agents
// =============================================================================

export interface TemplateShape {
  id: string;
  displayName: string;
  description: string;
}

export interface ComposedAgent {
  name: string;
  baseTemplate: TemplateShape;
  conflictResolution: ConflictResolution;
  capabilities: ResolvedCapability[];
  behaviors: ResolvedBehavior[];
  contracts: MergedContract[];
  /** Normalized capability references that produced this agent */
  lineage: CapabilityReference[];
  metadata?: ManifestMetadata;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

export type CapabilityLookup =
  | { ok: true; capability: Capability }
  | { ok: false; reason: 'not_found'; message: string }
  | { ok: false; reason: 'version_mismatch'; message: string; available: string[] };

/** Source of capability definitions */
export interface CapabilityStore {
  resolve(name: string, versionConstraint?: string): Promise<CapabilityLookup>;
}

/** A store that can also enumerate its definitions */
export interface ListableCapabilityStore extends CapabilityStore {
  list(): Capability[] | Promise<Capability[]>;
}

export type TemplateLookup =
  | { ok: true; template: TemplateShape }
  | { ok: false; message: string };

/** Source of base templates */
export interface TemplateRegistry {
  resolve(templateId: string): Promise<TemplateLookup>;
  list(): Promise<TemplateShape[]>;
}

// =============================================================================
// Command Types
// =============================================================================

export interface CommandContext {
  cwd: string;
  /** Extra capability search paths, searched before the defaults */
  specPaths?: string[];
  verbose?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// =============================================================================
// Utility Functions
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
