/**
 * agc verify - Compose a manifest and check its contracts against an agent directory
 */

import * as path from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { verifyContracts } from '../modules/index.js';
import { createEngine, describeErrors, type EngineOptions } from './shared.js';

export interface VerifyOptions extends EngineOptions {
  /** Agent directory the contracts are checked against (defaults to cwd) */
  root?: string;
}

export async function verify(
  manifestPath: string,
  ctx: CommandContext,
  options: VerifyOptions = {}
): Promise<CommandResult> {
  const { engine } = createEngine(ctx, options);
  const outcome = await engine.composeFile(path.resolve(ctx.cwd, manifestPath));
  if (!outcome.agent) {
    return { success: false, error: describeErrors(outcome.result.errors), data: outcome.result };
  }

  const root = path.resolve(ctx.cwd, options.root ?? '.');
  const checks = await verifyContracts(root, outcome.agent.contracts);
  const failed = checks.filter(c => !c.passed);

  if (ctx.verbose) {
    for (const entry of checks) {
      console.error(`${entry.passed ? '✅' : '❌'} ${entry.name}: ${entry.message}`);
    }
  }

  const data = { agent: outcome.agent.name, root, passed: checks.length - failed.length, total: checks.length, checks };
  if (failed.length > 0) {
    return {
      success: false,
      error: failed.map(c => `Contract '${c.name}' failed: ${c.message}`).join('\n'),
      data,
    };
  }
  return { success: true, data };
}
