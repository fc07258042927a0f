/**
 * Base template registry.
 */

import type { TemplateLookup, TemplateRegistry, TemplateShape } from '../types.js';

export const DEFAULT_TEMPLATES: readonly TemplateShape[] = [
  { id: 'worker', displayName: 'Worker', description: 'Executes well-defined tasks' },
  { id: 'advisor', displayName: 'Advisor', description: 'Gives guidance and recommendations without acting on them' },
  { id: 'supervisor', displayName: 'Supervisor', description: 'Coordinates and reviews the work of other agents' },
  { id: 'consultant', displayName: 'Consultant', description: 'Takes on bounded advisory engagements' },
  { id: 'developer', displayName: 'Developer', description: 'Builds and maintains software' },
  { id: 'spec-engineer', displayName: 'Spec Engineer', description: 'Writes and maintains specifications' },
];

export class InMemoryTemplateRegistry implements TemplateRegistry {
  private readonly templates = new Map<string, TemplateShape>();

  constructor(templates: Iterable<TemplateShape> = DEFAULT_TEMPLATES) {
    for (const template of templates) {
      this.register(template);
    }
  }

  register(template: TemplateShape): this {
    this.templates.set(template.id, template);
    return this;
  }

  async resolve(templateId: string): Promise<TemplateLookup> {
    const template = this.templates.get(templateId);
    if (!template) {
      return { ok: false, message: `Base template '${templateId}' is not registered` };
    }
    return { ok: true, template };
  }

  async list(): Promise<TemplateShape[]> {
    return [...this.templates.values()];
  }
}
