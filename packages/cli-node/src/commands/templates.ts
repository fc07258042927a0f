/**
 * agc templates - List the base templates agents can be composed onto
 */

import type { CommandResult, TemplateRegistry, TemplateShape } from '../types.js';
import { InMemoryTemplateRegistry } from '../modules/index.js';

export async function templates(
  registry: TemplateRegistry = new InMemoryTemplateRegistry()
): Promise<CommandResult<{ templates: TemplateShape[] }>> {
  return { success: true, data: { templates: await registry.list() } };
}
