/**
 * Helpers shared by the composition commands.
 */

import type { CommandContext, CompositionIssue, StageTrace } from '../types.js';
import {
  CompositionEngine,
  FileCapabilityStore,
  formatIssue,
  getDefaultSearchPaths,
} from '../modules/index.js';

export interface EngineOptions {
  /** Require prerequisites to be listed instead of resolving them */
  strictPrerequisites?: boolean;
}

export function createFileStore(ctx: CommandContext): FileCapabilityStore {
  return new FileCapabilityStore(getDefaultSearchPaths(ctx.cwd, ctx.specPaths));
}

export function createEngine(ctx: CommandContext, options: EngineOptions = {}) {
  const store = createFileStore(ctx);
  const engine = new CompositionEngine({
    store,
    includePrerequisites: !options.strictPrerequisites,
  });
  return { store, engine };
}

/** Print skipped capability files to stderr */
export async function reportInvalidFiles(store: FileCapabilityStore): Promise<void> {
  for (const invalid of await store.invalidFiles()) {
    console.error(`⚠️ Skipped ${invalid.file}`);
    for (const error of invalid.errors) {
      console.error(`   ${error}`);
    }
  }
}

export function printTrace(trace: readonly StageTrace[]): void {
  console.error('--- Composition Trace ---');
  let total = 0;
  for (const entry of trace) {
    const status = entry.success ? '✅ OK' : '❌ FAILED';
    console.error(`${status} ${entry.stage} (${entry.durationMs}ms)`);
    if (entry.reason) {
      console.error(`   Reason: ${entry.reason}`);
    }
    total += entry.durationMs;
  }
  console.error(`--- Total: ${total}ms ---`);
}

export function describeErrors(errors: readonly CompositionIssue[]): string {
  return errors.map(e => `${formatIssue(e)}\n  → ${e.suggestion}`).join('\n');
}
