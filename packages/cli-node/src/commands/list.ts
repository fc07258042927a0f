/**
 * agc list - List capabilities found on the search paths
 */

import type { CommandContext, CommandResult } from '../types.js';
import { getDefaultSearchPaths, type InvalidCapabilityFile } from '../modules/index.js';
import { createFileStore } from './shared.js';

export interface CapabilitySummary {
  name: string;
  version: string;
  purpose?: string;
  prerequisites: string[];
  behaviors: string[];
  location?: string;
}

export interface ListData {
  searchPaths: string[];
  capabilities: CapabilitySummary[];
  invalid: InvalidCapabilityFile[];
}

export async function list(ctx: CommandContext): Promise<CommandResult<ListData>> {
  const store = createFileStore(ctx);
  const capabilities = await store.list();
  const invalid = await store.invalidFiles();

  return {
    success: true,
    data: {
      searchPaths: getDefaultSearchPaths(ctx.cwd, ctx.specPaths),
      capabilities: capabilities.map(c => ({
        name: c.name,
        version: c.version,
        purpose: c.purpose,
        prerequisites: c.prerequisites.map(p => (p.version ? `${p.name}@${p.version}` : p.name)),
        behaviors: c.behaviors.map(b => b.name),
        location: c.location,
      })),
      invalid,
    },
  };
}
