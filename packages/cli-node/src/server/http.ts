/**
 * Agent Composer HTTP API Server
 *
 * Start with:
 *   agc serve --port 8000
 *
 * Environment variables:
 *   AGENT_COMPOSER_API_KEY - Bearer token required for POST routes (optional)
 */

import http from 'node:http';
import { URL } from 'node:url';
import {
  CompositionEngine,
  FileCapabilityStore,
  InMemoryTemplateRegistry,
  getDefaultSearchPaths,
  type CompositionOutcome,
} from '../modules/index.js';
import { isRecord, type Capability, type ListableCapabilityStore, type TemplateRegistry } from '../types.js';

const VERSION = '0.1.0';

export const API_KEY_ENV = 'AGENT_COMPOSER_API_KEY';

// =============================================================================
// Types
// =============================================================================

interface ComposeRequestBody {
  manifest: unknown;
  strictPrerequisites: boolean;
}

interface CapabilityInfo {
  name: string;
  version: string;
  displayName?: string;
  category?: string;
  purpose?: string;
  prerequisites: string[];
  behaviors: string[];
  contracts: string[];
}

// =============================================================================
// Helpers
// =============================================================================

function jsonResponse(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, Authorization',
  });
  res.end(JSON.stringify(data, null, 2));
}

function parseBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => (body += chunk));
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function verifyApiKey(req: http.IncomingMessage, expectedKey: string | undefined): boolean {
  if (!expectedKey) return true; // No auth required

  const authHeader = req.headers.authorization;
  if (!authHeader) return false;

  const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : authHeader;
  return token === expectedKey;
}

function toCapabilityInfo(capability: Capability): CapabilityInfo {
  return {
    name: capability.name,
    version: capability.version,
    displayName: capability.displayName,
    category: capability.category,
    purpose: capability.purpose,
    prerequisites: capability.prerequisites.map(p => (p.version ? `${p.name}@${p.version}` : p.name)),
    behaviors: capability.behaviors.map(b => b.name),
    contracts: capability.contracts.map(c => c.name),
  };
}

/**
 * Read `{ manifest, strict_prerequisites? }`. Returns an error message when the body is unusable.
 */
async function readComposeBody(req: http.IncomingMessage): Promise<ComposeRequestBody | string> {
  let body: unknown;
  try {
    body = JSON.parse(await parseBody(req));
  } catch {
    return 'Invalid JSON body';
  }
  if (!isRecord(body) || body.manifest === undefined) {
    return 'Missing required field: manifest';
  }
  let strictPrerequisites = false;
  if (body.strict_prerequisites !== undefined) {
    if (typeof body.strict_prerequisites !== 'boolean') {
      return 'strict_prerequisites must be a boolean';
    }
    strictPrerequisites = body.strict_prerequisites;
  }
  return { manifest: body.manifest, strictPrerequisites };
}

// =============================================================================
// Server
// =============================================================================

export interface ServeOptions {
  host?: string;
  port?: number;
  cwd?: string;
  /** Extra capability search paths */
  specPaths?: string[];
  /** Default for requests that do not set strict_prerequisites */
  strictPrerequisites?: boolean;
  /** Replaces the file store built from the search paths */
  store?: ListableCapabilityStore;
  templates?: TemplateRegistry;
  /** Overrides AGENT_COMPOSER_API_KEY */
  apiKey?: string;
}

export function createServer(options: ServeOptions = {}): http.Server {
  const { cwd = process.cwd() } = options;
  const store = options.store ?? new FileCapabilityStore(getDefaultSearchPaths(cwd, options.specPaths));
  const templates = options.templates ?? new InMemoryTemplateRegistry();

  async function composeFromRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<CompositionOutcome | undefined> {
    if (!verifyApiKey(req, options.apiKey ?? process.env[API_KEY_ENV])) {
      jsonResponse(res, 401, {
        error: 'Missing or invalid API Key. Use header: Authorization: Bearer <your-api-key>',
      });
      return undefined;
    }

    const body = await readComposeBody(req);
    if (typeof body === 'string') {
      jsonResponse(res, 400, { error: body });
      return undefined;
    }

    const engine = new CompositionEngine({
      store,
      templates,
      includePrerequisites: !(body.strictPrerequisites || options.strictPrerequisites),
    });
    return typeof body.manifest === 'string'
      ? engine.composeText(body.manifest)
      : engine.compose(body.manifest);
  }

  const server = http.createServer(async (req, res) => {
    let url: URL;
    try {
      url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    } catch {
      jsonResponse(res, 400, { error: 'Invalid request URL' });
      return;
    }
    const path = url.pathname;
    const method = req.method?.toUpperCase();

    // Handle CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type, Authorization',
      });
      res.end();
      return;
    }

    try {
      // Route requests
      if (path === '/' && method === 'GET') {
        jsonResponse(res, 200, {
          name: 'Agent Composer API',
          version: VERSION,
          endpoints: {
            validate: 'POST /validate',
            compose: 'POST /compose',
            capabilities: 'GET /capabilities',
            capability_info: 'GET /capabilities/{name}',
            templates: 'GET /templates',
            health: 'GET /health',
          },
        });
      } else if (path === '/health' && method === 'GET') {
        jsonResponse(res, 200, { status: 'healthy', version: VERSION });
      } else if (path === '/templates' && method === 'GET') {
        const list = await templates.list();
        jsonResponse(res, 200, { templates: list, count: list.length });
      } else if (path === '/capabilities' && method === 'GET') {
        const capabilities = (await store.list()).map(toCapabilityInfo);
        jsonResponse(res, 200, { capabilities, count: capabilities.length });
      } else if (path.startsWith('/capabilities/') && method === 'GET') {
        const name = decodeURIComponent(path.slice('/capabilities/'.length));
        const lookup = await store.resolve(name, url.searchParams.get('version') ?? undefined);
        if (lookup.ok) {
          jsonResponse(res, 200, lookup.capability);
        } else {
          jsonResponse(res, 404, { error: lookup.message });
        }
      } else if (path === '/validate' && method === 'POST') {
        const outcome = await composeFromRequest(req, res);
        if (outcome) jsonResponse(res, 200, outcome.result);
      } else if (path === '/compose' && method === 'POST') {
        const outcome = await composeFromRequest(req, res);
        if (outcome) {
          jsonResponse(res, outcome.agent ? 200 : 422, {
            ok: outcome.agent !== undefined,
            agent: outcome.agent,
            result: outcome.result,
          });
        }
      } else {
        jsonResponse(res, 404, { error: 'Not found' });
      }
    } catch (error) {
      if (error instanceof URIError) {
        jsonResponse(res, 400, { error: `Malformed URL encoding: ${error.message}` });
        return;
      }
      console.error('Server error:', error);
      jsonResponse(res, 500, {
        error: error instanceof Error ? error.message : 'Internal server error',
      });
    }
  });

  return server;
}

export async function serve(options: ServeOptions = {}): Promise<void> {
  const { host = '0.0.0.0', port = 8000 } = options;

  const server = createServer(options);

  return new Promise((resolve, reject) => {
    server.on('error', reject);
    server.listen(port, host, () => {
      console.log(`Agent Composer HTTP Server running at http://${host}:${port}`);
      console.log('Endpoints:');
      console.log('  GET  /                   - API info');
      console.log('  GET  /health             - Health check');
      console.log('  GET  /templates          - List base templates');
      console.log('  GET  /capabilities       - List capabilities');
      console.log('  GET  /capabilities/:name - Capability definition');
      console.log('  POST /validate           - Validate a manifest');
      console.log('  POST /compose            - Compose an agent');
      resolve();
    });
  });
}
