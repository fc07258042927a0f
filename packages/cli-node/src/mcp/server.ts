/**
 * Agent Composer MCP Server
 *
 * Provides MCP (Model Context Protocol) tools for validating and composing agents.
 *
 * Start with:
 *   agc mcp
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import {
  CompositionEngine,
  FileCapabilityStore,
  InMemoryTemplateRegistry,
  errorMessage,
  getDefaultSearchPaths,
} from '../modules/index.js';
import type { ListableCapabilityStore, TemplateRegistry } from '../types.js';

const VERSION = '0.1.0';

// =============================================================================
// Types
// =============================================================================

export interface McpServerOptions {
  cwd?: string;
  specPaths?: string[];
  strictPrerequisites?: boolean;
  store?: ListableCapabilityStore;
  templates?: TemplateRegistry;
}

export interface ToolContext {
  store: ListableCapabilityStore;
  templates: TemplateRegistry;
  strictPrerequisites: boolean;
}

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function textResult(data: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

// =============================================================================
// Tools
// =============================================================================

const manifestInput: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    manifest: {
      type: ['string', 'object'],
      description: 'Composition manifest as YAML/JSON text or as an object',
    },
    strict_prerequisites: {
      type: 'boolean',
      description: 'Require prerequisites to be listed in the manifest (optional)',
    },
  },
  required: ['manifest'],
};

export const TOOLS: Tool[] = [
  {
    name: 'composition_validate',
    description: 'Validate an agent composition manifest and return errors, warnings and the resolved capabilities',
    inputSchema: manifestInput,
  },
  {
    name: 'composition_compose',
    description: 'Compose an agent from a manifest and return its capabilities, behaviors and contracts',
    inputSchema: manifestInput,
  },
  {
    name: 'capability_list',
    description: 'List the capabilities available for composition',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'capability_info',
    description: 'Get the full definition of a capability',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Capability name, e.g. "memory-management"' },
        version: { type: 'string', description: 'Version constraint (optional), e.g. "^1.0.0"' },
      },
      required: ['name'],
    },
  },
  {
    name: 'template_list',
    description: 'List the base templates agents can be composed onto',
    inputSchema: { type: 'object', properties: {} },
  },
];

async function runComposition(args: Record<string, unknown>, context: ToolContext) {
  const { manifest, strict_prerequisites: strict } = args;
  if (manifest === undefined) {
    return undefined;
  }
  const engine = new CompositionEngine({
    store: context.store,
    templates: context.templates,
    includePrerequisites: !(strict === true || context.strictPrerequisites),
  });
  return typeof manifest === 'string' ? engine.composeText(manifest) : engine.compose(manifest);
}

/**
 * Execute one tool call. Failures are reported in the result, never thrown.
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown> = {},
  context: ToolContext
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'composition_validate': {
        const outcome = await runComposition(args, context);
        if (!outcome) return textResult({ ok: false, error: 'Missing required argument: manifest' }, true);
        return textResult(outcome.result);
      }

      case 'composition_compose': {
        const outcome = await runComposition(args, context);
        if (!outcome) return textResult({ ok: false, error: 'Missing required argument: manifest' }, true);
        return textResult(
          { ok: outcome.agent !== undefined, agent: outcome.agent, result: outcome.result },
          outcome.agent === undefined
        );
      }

      case 'capability_list': {
        const capabilities = await context.store.list();
        return textResult({
          capabilities: capabilities.map(c => ({
            name: c.name,
            version: c.version,
            purpose: c.purpose,
            prerequisites: c.prerequisites.map(p => p.name),
            behaviors: c.behaviors.map(b => b.name),
          })),
          count: capabilities.length,
        });
      }

      case 'capability_info': {
        const { name: capabilityName, version } = args;
        if (typeof capabilityName !== 'string') {
          return textResult({ ok: false, error: 'Missing required argument: name' }, true);
        }
        const lookup = await context.store.resolve(capabilityName, typeof version === 'string' ? version : undefined);
        return lookup.ok
          ? textResult({ ok: true, capability: lookup.capability })
          : textResult({ ok: false, error: lookup.message }, true);
      }

      case 'template_list':
        return textResult({ templates: await context.templates.list() });

      default:
        return textResult({ ok: false, error: `Unknown tool: ${name}` }, true);
    }
  } catch (error) {
    return textResult({ ok: false, error: errorMessage(error) }, true);
  }
}

// =============================================================================
// Server Setup
// =============================================================================

export function createMcpServer(options: McpServerOptions = {}): Server {
  const cwd = options.cwd ?? process.cwd();
  const context: ToolContext = {
    store: options.store ?? new FileCapabilityStore(getDefaultSearchPaths(cwd, options.specPaths)),
    templates: options.templates ?? new InMemoryTemplateRegistry(),
    strictPrerequisites: options.strictPrerequisites ?? false,
  };

  const server = new Server(
    {
      name: 'agent-composer',
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, context);
  });

  // Resources
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    const capabilities = await context.store.list();
    return {
      resources: [
        {
          uri: 'composer://capabilities',
          name: 'All Capabilities',
          description: 'Names and versions of every available capability',
          mimeType: 'application/json',
        },
        ...capabilities.map(c => ({
          uri: `composer://capability/${c.name}`,
          name: c.name,
          description: c.purpose || `Capability: ${c.name}`,
          mimeType: 'application/json',
        })),
      ],
    };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    if (uri === 'composer://capabilities') {
      const capabilities = await context.store.list();
      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(capabilities.map(c => `${c.name}@${c.version}`), null, 2),
          },
        ],
      };
    }

    const match = uri.match(/^composer:\/\/capability\/(.+)$/);
    if (match) {
      const lookup = await context.store.resolve(match[1]);
      return {
        contents: [
          lookup.ok
            ? { uri, mimeType: 'application/json', text: JSON.stringify(lookup.capability, null, 2) }
            : { uri, mimeType: 'text/plain', text: lookup.message },
        ],
      };
    }

    return {
      contents: [
        {
          uri,
          mimeType: 'text/plain',
          text: `Unknown resource: ${uri}`,
        },
      ],
    };
  });

  return server;
}

// =============================================================================
// Server Start
// =============================================================================

export async function serve(options: McpServerOptions = {}): Promise<void> {
  const server = createMcpServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Agent Composer MCP Server started');
}
