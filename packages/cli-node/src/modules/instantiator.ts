/**
 * Agent Instantiator - binds a passing composition to its base template.
 */

import type {
  ComposedAgent,
  CompositionIssue,
  CompositionRequest,
  TemplateLookup,
  TemplateRegistry,
  ValidationResult,
} from '../types.js';
import { errorMessage, issue } from './errors.js';

export type InstantiationResult =
  | { ok: true; agent: ComposedAgent }
  | { ok: false; error: CompositionIssue };

type Composition = Pick<ValidationResult, 'status' | 'capabilities' | 'behaviors' | 'contracts'>;

/**
 * @throws Error when called with a failed composition
 */
export async function instantiateAgent(
  request: CompositionRequest,
  composition: Composition,
  registry: TemplateRegistry
): Promise<InstantiationResult> {
  if (composition.status === 'fail') {
    throw new Error('Cannot instantiate an agent from a failed composition');
  }

  let lookup: TemplateLookup;
  try {
    lookup = await registry.resolve(request.baseTemplate);
  } catch (error) {
    return {
      ok: false,
      error: issue(
        'COMP-011',
        `Template registry failed while resolving '${request.baseTemplate}': ${errorMessage(error)}`,
        'Check that the template registry is reachable and retry'
      ),
    };
  }

  if (!lookup.ok) {
    const known = (await registry.list()).map(t => t.id);
    return {
      ok: false,
      error: issue(
        'COMP-007',
        lookup.message,
        known.length > 0
          ? `Use one of the registered templates: ${known.join(', ')}`
          : 'Register the template before composing onto it'
      ),
    };
  }

  const agent: ComposedAgent = {
    name: request.metadata?.name ?? request.baseTemplate,
    baseTemplate: lookup.template,
    conflictResolution: request.conflictResolution,
    capabilities: composition.capabilities,
    behaviors: composition.behaviors,
    contracts: composition.contracts,
    lineage: request.capabilities,
  };
  if (request.metadata) agent.metadata = request.metadata;
  return { ok: true, agent };
}
