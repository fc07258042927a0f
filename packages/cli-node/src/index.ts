/**
 * Agent Composer - Main Entry Point
 *
 * Exports all public APIs for programmatic use.
 */

// Types
export type {
  ConflictResolution,
  OutputDefinition,
  Behavior,
  ContractAssertion,
  Contract,
  PrerequisiteRef,
  Capability,
  CapabilityReference,
  ManifestMetadata,
  CompositionRequest,
  CompositionErrorCode,
  CompositionWarningCode,
  CompositionErrorKind,
  CompositionIssue,
  CompositionWarning,
  ValidationStatus,
  CompositionStage,
  StageTrace,
  ResolvedCapability,
  BehaviorResolution,
  ResolvedBehavior,
  MergedContract,
  ValidationResult,
  TemplateShape,
  ComposedAgent,
  CapabilityLookup,
  CapabilityStore,
  ListableCapabilityStore,
  TemplateLookup,
  TemplateRegistry,
  CommandContext,
  CommandResult,
} from './types.js';
export { CONFLICT_RESOLUTIONS, CONTRACT_ASSERTIONS, isOrderSensitive } from './types.js';

// Modules
export {
  // Engine
  CompositionEngine,
  composeAgent,
  validateComposition,
  type CompositionEngineOptions,
  type CompositionOutcome,
  // Manifest
  parseManifest,
  parseManifestText,
  loadManifest,
  type ManifestParseResult,
  // Capabilities
  defineCapability,
  loadCapability,
  listCapabilities,
  parseCapabilitySpec,
  getDefaultSearchPaths,
  validateCapabilitySpec,
  validateCapabilityFile,
  type CapabilityDefinition,
  type SpecValidationResult,
  // Stores and templates
  InMemoryCapabilityStore,
  FileCapabilityStore,
  InMemoryTemplateRegistry,
  DEFAULT_TEMPLATES,
  versionMatches,
  combineConstraints,
  compareVersions,
  // Stages
  PrerequisiteGraph,
  buildPrerequisiteGraph,
  detectConflicts,
  mergeContracts,
  instantiateAgent,
  // Algebra
  normalizeReferences,
  compositionSignature,
  sameComposition,
  // Contracts
  verifyContracts,
  type ContractCheck,
  // Errors
  COMPOSITION_ERRORS,
  COMPOSITION_WARNINGS,
  formatIssue,
} from './modules/index.js';

// Server
export { serve as serveHttp, createServer } from './server/index.js';

// MCP
export { serve as serveMcp, createMcpServer } from './mcp/index.js';

// Commands
export { validate, compose, check, verify, list, templates } from './commands/index.js';
