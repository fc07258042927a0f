/**
 * agc check - Validate capability specification files
 *
 * Accepts files and directories; directories are scanned (non-recursively)
 * for YAML and JSON files.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import { SPEC_EXTENSIONS, validateCapabilityFile, type FileValidationResult } from '../modules/index.js';

async function expand(target: string): Promise<string[]> {
  const stats = await fs.stat(target).catch(() => null);
  if (!stats?.isDirectory()) {
    return [target];
  }
  const entries = await fs.readdir(target, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && SPEC_EXTENSIONS.includes(path.extname(entry.name)))
    .map(entry => path.join(target, entry.name))
    .sort();
}

export async function check(targets: string[], ctx: CommandContext): Promise<CommandResult> {
  if (targets.length === 0) {
    return { success: false, error: 'No specification files given' };
  }

  const files: string[] = [];
  for (const target of targets) {
    files.push(...await expand(path.resolve(ctx.cwd, target)));
  }

  const results: FileValidationResult[] = [];
  for (const file of files) {
    results.push(await validateCapabilityFile(file));
  }

  const invalid = results.filter(r => !r.valid);
  if (ctx.verbose) {
    for (const result of results) {
      console.error(`${result.valid ? '✅' : '❌'} ${result.file}`);
      for (const warning of result.warnings) {
        console.error(`   ⚠️ ${warning}`);
      }
    }
  }

  const data = { total: results.length, valid: results.length - invalid.length, results };
  if (invalid.length > 0) {
    return {
      success: false,
      error: invalid.map(r => `${r.file}:\n${r.errors.map(e => `  - ${e}`).join('\n')}`).join('\n'),
      data,
    };
  }
  return { success: true, data };
}
