/**
 * Composition Engine - validates a composition manifest and instantiates the agent.
 *
 * Stages run in order and stop at the first failing one:
 *   parse → resolve → graph → conflicts → contracts → evaluate → instantiate
 * Each stage is timed and recorded in the result trace.
 */

import type {
  CapabilityReference,
  CapabilityStore,
  ComposedAgent,
  CompositionIssue,
  CompositionRequest,
  CompositionStage,
  CompositionWarning,
  MergedContract,
  ResolvedBehavior,
  ResolvedCapability,
  StageTrace,
  TemplateRegistry,
  ValidationResult,
  ValidationStatus,
} from '../types.js';
import { checkComposability, extendReferences, finalizeCapabilities, normalizeReferences, validateConfigs } from './algebra.js';
import { deepFreeze } from './canonical.js';
import { detectConflicts } from './conflicts.js';
import { mergeContracts } from './contracts.js';
import { errorMessage, issue } from './errors.js';
import { buildPrerequisiteGraph, cycleIssue, type GraphBuildOptions, type PrerequisiteGraph } from './graph.js';
import { instantiateAgent } from './instantiator.js';
import { loadManifest, parseManifest, parseManifestText, validateRequest, type ManifestParseResult } from './manifest.js';
import { InMemoryTemplateRegistry } from './templates.js';

// =============================================================================
// Types
// =============================================================================

export interface CompositionEngineOptions extends GraphBuildOptions {
  store: CapabilityStore;
  /** Defaults to the built-in templates */
  templates?: TemplateRegistry;
}

export interface CompositionOutcome {
  result: ValidationResult;
  /** Present unless the result failed */
  agent?: ComposedAgent;
  /** The request after duplicate references were dropped */
  request?: CompositionRequest;
}

interface StageOutput<T> {
  value?: T;
  errors?: CompositionIssue[];
  warnings?: CompositionWarning[];
}

type StageResult<T> = { ok: true; value: T } | { ok: false };

interface Composition {
  capabilities: ResolvedCapability[];
  behaviors: ResolvedBehavior[];
  contracts: MergedContract[];
}

// =============================================================================
// Run State
// =============================================================================

class CompositionRun {
  readonly errors: CompositionIssue[] = [];
  readonly warnings: CompositionWarning[] = [];
  readonly trace: StageTrace[] = [];

  /**
   * Run one stage. A thrown error becomes a COMP-011 issue for that stage.
   */
  async stage<T>(stage: CompositionStage, body: () => StageOutput<T> | Promise<StageOutput<T>>): Promise<StageResult<T>> {
    const started = Date.now();
    let output: StageOutput<T>;
    try {
      output = await body();
    } catch (error) {
      output = {
        errors: [issue(
          'COMP-011',
          `Unexpected failure during ${stage}: ${errorMessage(error)}`,
          'Check the capability store and template registry, then retry'
        )],
      };
    }

    const errors = output.errors ?? [];
    this.errors.push(...errors);
    this.warnings.push(...(output.warnings ?? []));

    const entry: StageTrace = { stage, durationMs: Date.now() - started, success: errors.length === 0 };
    if (errors.length > 0) entry.reason = errors[0].message;
    this.trace.push(entry);

    if (errors.length > 0 || output.value === undefined) {
      return { ok: false };
    }
    return { ok: true, value: output.value };
  }

  status(): ValidationStatus {
    if (this.errors.length > 0) return 'fail';
    return this.warnings.length > 0 ? 'warning' : 'pass';
  }

  result(composition: Composition): ValidationResult {
    const result: ValidationResult = {
      status: this.status(),
      errors: this.errors,
      warnings: this.warnings,
      capabilities: composition.capabilities,
      behaviors: composition.behaviors,
      contracts: composition.contracts,
      trace: this.trace,
    };
    return deepFreeze(result);
  }

  failed(request?: CompositionRequest): CompositionOutcome {
    const result = this.result({ capabilities: [], behaviors: [], contracts: [] });
    return request ? { result, request: deepFreeze(request) } : { result };
  }
}

// =============================================================================
// Engine
// =============================================================================

export class CompositionEngine {
  private readonly store: CapabilityStore;
  private readonly templates: TemplateRegistry;
  private readonly graphOptions: GraphBuildOptions;

  constructor(options: CompositionEngineOptions) {
    this.store = options.store;
    this.templates = options.templates ?? new InMemoryTemplateRegistry();
    this.graphOptions = {
      includePrerequisites: options.includePrerequisites ?? true,
      parallelLookups: options.parallelLookups ?? true,
    };
  }

  /**
   * Compose from a deserialized manifest document.
   */
  async compose(document: unknown): Promise<CompositionOutcome> {
    return this.fromParsed(() => parseManifest(document));
  }

  /**
   * Compose from manifest text (YAML or JSON).
   */
  async composeText(text: string): Promise<CompositionOutcome> {
    return this.fromParsed(() => parseManifestText(text));
  }

  /**
   * Compose from a manifest file.
   */
  async composeFile(filePath: string): Promise<CompositionOutcome> {
    return this.fromParsed(() => loadManifest(filePath));
  }

  /**
   * Compose from a request built in code.
   */
  async composeRequest(request: CompositionRequest): Promise<CompositionOutcome> {
    const run = new CompositionRun();
    const checked = await run.stage<CompositionRequest>('parse', () => {
      const errors = validateRequest(request);
      return errors.length > 0 ? { errors } : { value: request };
    });
    return checked.ok ? this.execute(checked.value, run) : run.failed();
  }

  /**
   * Validate a manifest document without keeping the agent.
   */
  async validate(document: unknown): Promise<ValidationResult> {
    const { result } = await this.compose(document);
    return result;
  }

  /**
   * Compose more capabilities onto an existing agent. The agent's lineage is
   * recomposed with the additions, so extending in steps gives the same agent
   * as composing everything at once.
   */
  async extend(agent: ComposedAgent, references: readonly CapabilityReference[]): Promise<CompositionOutcome> {
    const request: CompositionRequest = {
      baseTemplate: agent.baseTemplate.id,
      capabilities: extendReferences(agent.lineage, references),
      conflictResolution: agent.conflictResolution,
    };
    if (agent.metadata) request.metadata = agent.metadata;
    return this.composeRequest(request);
  }

  private async fromParsed(parse: () => ManifestParseResult | Promise<ManifestParseResult>): Promise<CompositionOutcome> {
    const run = new CompositionRun();
    const parsed = await run.stage<CompositionRequest>('parse', async () => {
      const result = await parse();
      return result.ok ? { value: result.request } : { errors: result.errors };
    });
    return parsed.ok ? this.execute(parsed.value, run) : run.failed();
  }

  private async execute(original: CompositionRequest, run: CompositionRun): Promise<CompositionOutcome> {
    const normalized = normalizeReferences(original.capabilities);
    run.warnings.push(...normalized.warnings);
    // The run owns its copy; configs and metadata end up frozen in the result
    const request: CompositionRequest = structuredClone({ ...original, capabilities: normalized.references });

    const built = await run.stage<PrerequisiteGraph>('resolve', async () => {
      const result = await buildPrerequisiteGraph(request.capabilities, this.store, this.graphOptions);
      return result.ok ? { value: result.graph } : { errors: result.errors };
    });
    if (!built.ok) return run.failed(request);
    const graph = built.value;

    const sorted = await run.stage<number[]>('graph', () => {
      const result = graph.topologicalSort();
      return result.ok ? { value: result.order } : { errors: [cycleIssue(graph, result.cycle)] };
    });
    if (!sorted.ok) return run.failed(request);
    const order = sorted.value;
    const ordered = order.map(index => graph.node(index));

    const behaviors = await run.stage<ResolvedBehavior[]>('conflicts', () => {
      const report = detectConflicts(ordered, request.conflictResolution);
      return { value: report.behaviors, errors: report.errors, warnings: report.warnings };
    });
    if (!behaviors.ok) return run.failed(request);

    const contracts = await run.stage<MergedContract[]>('contracts', () => {
      const merged = mergeContracts(ordered);
      return { value: merged.contracts, errors: merged.errors };
    });
    if (!contracts.ok) return run.failed(request);

    const capabilities = await run.stage<ResolvedCapability[]>('evaluate', () => {
      const finalized = finalizeCapabilities(graph, order);
      return {
        value: finalized,
        errors: validateConfigs(finalized),
        warnings: checkComposability(finalized, request.baseTemplate),
      };
    });
    if (!capabilities.ok) return run.failed(request);

    const composition: Composition = {
      capabilities: capabilities.value,
      behaviors: behaviors.value,
      contracts: contracts.value,
    };

    const agent = await run.stage<ComposedAgent>('instantiate', async () => {
      const result = await instantiateAgent(request, { status: run.status(), ...composition }, this.templates);
      return result.ok ? { value: result.agent } : { errors: [result.error] };
    });
    if (!agent.ok) return run.failed(request);

    return { result: run.result(composition), agent: deepFreeze(agent.value), request: deepFreeze(request) };
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Compose a manifest document in one call.
 */
export async function composeAgent(document: unknown, options: CompositionEngineOptions): Promise<CompositionOutcome> {
  return new CompositionEngine(options).compose(document);
}

/**
 * Validate a manifest document in one call.
 */
export async function validateComposition(document: unknown, options: CompositionEngineOptions): Promise<ValidationResult> {
  return new CompositionEngine(options).validate(document);
}
