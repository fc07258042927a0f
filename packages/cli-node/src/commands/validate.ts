/**
 * agc validate - Validate a composition manifest without building the agent
 */

import * as path from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { createEngine, describeErrors, printTrace, reportInvalidFiles, type EngineOptions } from './shared.js';

export interface ValidateOptions extends EngineOptions {
  verbose?: boolean;
}

export async function validate(
  manifestPath: string,
  ctx: CommandContext,
  options: ValidateOptions = {}
): Promise<CommandResult> {
  const { engine, store } = createEngine(ctx, options);
  const { result } = await engine.composeFile(path.resolve(ctx.cwd, manifestPath));

  if (options.verbose) {
    await reportInvalidFiles(store);
    printTrace(result.trace);
  }

  if (result.status === 'fail') {
    return { success: false, error: describeErrors(result.errors), data: result };
  }
  return { success: true, data: result };
}
