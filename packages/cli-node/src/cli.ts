#!/usr/bin/env node
/**
 * Agent Composer CLI
 *
 * agc validate <manifest>            - Validate a composition manifest
 * agc compose <manifest>             - Compose the agent and print it
 * agc check <spec...>                - Validate capability specification files
 * agc verify <manifest> --root <dir> - Check composed contracts against a directory
 * agc list                           - List capabilities on the search paths
 * agc templates                      - List base templates
 * agc serve                          - HTTP API server
 * agc mcp                            - MCP server (stdio)
 */

import { parseArgs } from 'node:util';
import { check, compose, list, templates, validate, verify } from './commands/index.js';
import type { CommandContext, CommandResult } from './types.js';

const VERSION = '0.1.0';

/** Exit code for invalid compositions and failed checks */
const EXIT_FAILED = 1;
/** Exit code for usage errors */
const EXIT_USAGE = 2;

function usage(message: string): never {
  console.error(message);
  process.exit(EXIT_USAGE);
}

function output(result: CommandResult, pretty: boolean): void {
  if (!result.success) {
    console.error(`Error: ${result.error ?? 'Command failed'}`);
    if (result.data !== undefined) {
      console.log(JSON.stringify(result.data, null, pretty ? 2 : 0));
    }
    process.exit(EXIT_FAILED);
  }
  console.log(JSON.stringify(result.data, null, pretty ? 2 : 0));
}

function parseOptions(args: string[]) {
  return parseArgs({
    args,
    options: {
      specs: { type: 'string', short: 's', multiple: true },
      'strict-prerequisites': { type: 'boolean', default: false },
      root: { type: 'string', short: 'r' },
      pretty: { type: 'boolean', default: false },
      trace: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'V', default: false },
      // Server options
      host: { type: 'string', short: 'H' },
      port: { type: 'string', short: 'P' },
    },
    allowPositionals: true,
  });
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  if (command === '--version' || command === '-v') {
    console.log(`Agent Composer v${VERSION}`);
    process.exit(0);
  }

  // Parse common options
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(args.slice(1));
  } catch (e) {
    usage(`Error: ${e instanceof Error ? e.message : e}\nRun "agc --help" for usage.`);
  }
  const { values, positionals } = parsed;

  const ctx: CommandContext = {
    cwd: process.cwd(),
    specPaths: values.specs ?? [],
    verbose: values.verbose,
  };
  const engineOptions = { strictPrerequisites: values['strict-prerequisites'] };

  try {
    switch (command) {
      case 'validate': {
        const manifest = positionals[0];
        if (!manifest) usage('Usage: agc validate <manifest> [--specs <dir>] [--strict-prerequisites]');

        const result = await validate(manifest, ctx, { ...engineOptions, verbose: values.verbose });
        output(result, values.pretty);
        break;
      }

      case 'compose': {
        const manifest = positionals[0];
        if (!manifest) usage('Usage: agc compose <manifest> [--specs <dir>] [--trace] [--pretty]');

        const result = await compose(manifest, ctx, {
          ...engineOptions,
          trace: values.trace,
          verbose: values.verbose,
        });
        output(result, values.pretty);
        break;
      }

      case 'check': {
        if (positionals.length === 0) usage('Usage: agc check <spec-file-or-dir...>');

        const result = await check(positionals, ctx);
        output(result, values.pretty);
        break;
      }

      case 'verify': {
        const manifest = positionals[0];
        if (!manifest) usage('Usage: agc verify <manifest> --root <agent-dir>');

        const result = await verify(manifest, ctx, { ...engineOptions, root: values.root });
        output(result, values.pretty);
        break;
      }

      case 'list': {
        const result = await list(ctx);
        const data = result.data;
        if (!result.success || !data) {
          output(result, values.pretty);
          break;
        }

        if (data.capabilities.length === 0) {
          console.log('No capabilities found.');
          console.log(`Search paths: ${data.searchPaths.join(', ')}`);
        } else {
          console.log('Available Capabilities:');
          console.log('');
          for (const c of data.capabilities) {
            console.log(`  ${c.name} (v${c.version})`);
            if (c.purpose) console.log(`    ${c.purpose}`);
            if (c.prerequisites.length > 0) console.log(`    requires: ${c.prerequisites.join(', ')}`);
            if (c.location) console.log(`    ${c.location}`);
            console.log('');
          }
        }
        for (const invalid of data.invalid) {
          console.error(`⚠️ Skipped ${invalid.file}: ${invalid.errors.join('; ')}`);
        }
        break;
      }

      case 'templates': {
        const result = await templates();
        for (const t of result.data?.templates ?? []) {
          console.log(`  ${t.id.padEnd(16)} ${t.description}`);
        }
        break;
      }

      case 'serve': {
        const { serve } = await import('./server/http.js');
        const port = values.port ? parseInt(values.port, 10) : 8000;
        const host = values.host || '0.0.0.0';
        console.log('Starting Agent Composer HTTP Server...');
        await serve({
          host,
          port,
          cwd: ctx.cwd,
          specPaths: ctx.specPaths,
          strictPrerequisites: values['strict-prerequisites'],
        });
        break;
      }

      case 'mcp': {
        const { serve: serveMcp } = await import('./mcp/server.js');
        await serveMcp({
          cwd: ctx.cwd,
          specPaths: ctx.specPaths,
          strictPrerequisites: values['strict-prerequisites'],
        });
        break;
      }

      default:
        usage(`Unknown command: ${command}\nRun "agc --help" for usage.`);
    }
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : e}`);
    if (values.verbose && e instanceof Error) {
      console.error(e.stack);
    }
    process.exit(EXIT_FAILED);
  }
}

function printHelp() {
  console.log(`
Agent Composer v${VERSION}
Compose agents from base templates and capabilities

USAGE:
  agc <command> [options]

COMMANDS:
  validate <manifest>   Validate a composition manifest
  compose <manifest>    Compose the agent and print it as JSON
  check <spec...>       Validate capability specification files or directories
  verify <manifest>     Check the composed contracts against an agent directory
  list                  List capabilities on the search paths
  templates             List base templates
  serve                 Start HTTP API server
  mcp                   Start MCP server (stdio)

OPTIONS:
  -s, --specs <dir>         Extra capability search path (repeatable)
  --strict-prerequisites    Require prerequisites to be listed in the manifest
  -r, --root <dir>          Agent directory for verify (default: cwd)
  --trace                   Include the validation result and stage trace
  --pretty                  Pretty-print JSON output
  -V, --verbose             Print stage trace and skipped files to stderr
  -H, --host <host>         Server host (default: 0.0.0.0)
  -P, --port <port>         Server port (default: 8000)
  -v, --version             Show version
  -h, --help                Show this help

EXAMPLES:
  agc validate agent.yaml --specs ./capabilities
  agc compose agent.yaml --pretty
  agc check capabilities/
  agc verify agent.yaml --root ./my-agent
  agc serve --port 8080

ENVIRONMENT:
  AGENT_COMPOSER_SPECS      Extra search paths (path-delimiter separated)
  AGENT_COMPOSER_API_KEY    Bearer token required by the HTTP server
`);
}

main().catch(e => {
  console.error('Fatal error:', e);
  process.exit(1);
});
