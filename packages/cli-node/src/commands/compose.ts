/**
 * agc compose - Compose an agent from a manifest
 */

import * as path from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { createEngine, describeErrors, printTrace, reportInvalidFiles, type EngineOptions } from './shared.js';

export interface ComposeOptions extends EngineOptions {
  /** Include the full validation result and stage trace */
  trace?: boolean;
  /** Verbose mode */
  verbose?: boolean;
}

export async function compose(
  manifestPath: string,
  ctx: CommandContext,
  options: ComposeOptions = {}
): Promise<CommandResult> {
  const { engine, store } = createEngine(ctx, options);
  const outcome = await engine.composeFile(path.resolve(ctx.cwd, manifestPath));

  if (options.verbose) {
    await reportInvalidFiles(store);
    printTrace(outcome.result.trace);
  }

  if (options.trace) {
    // Include full result with trace
    return {
      success: outcome.agent !== undefined,
      data: {
        ok: outcome.agent !== undefined,
        agent: outcome.agent,
        result: outcome.result,
      },
    };
  }

  if (outcome.agent) {
    return { success: true, data: outcome.agent };
  }
  return {
    success: false,
    error: describeErrors(outcome.result.errors),
    data: outcome.result,
  };
}
