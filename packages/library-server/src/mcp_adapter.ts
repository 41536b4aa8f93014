/**
 * Minimal MCP adapter implementing a subset of the Model Context Protocol
 * over stdio using JSON-RPC 2.0. Exposes the library tools via tools/list
 * and tools/call.
 */
import readline from 'readline';
import { errorMessage } from './errors';
import { isRecord } from './guards';
import type { LibraryOrchestrator } from './orchestrator';
import { MATCH_TYPES } from './search';
import { BOOK_FIELDS, call_tool, MAX_LIMIT } from './tools';

export const SERVER_INFO = { name: 'libris', version: '0.1.0' };
export const PROTOCOL_VERSION = '2024-11-05';

type RpcId = string | number | null;

export interface RpcRequest {
  jsonrpc: '2.0';
  id?: RpcId;
  method: string;
  params?: unknown;
}

export interface RpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export const tools = [
  {
    name: 'list_books',
    description: 'List available books with optional pagination',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'integer', minimum: 0, maximum: MAX_LIMIT, description: 'Maximum number of books to return (default 50, 0 for all)' },
        offset: { type: 'integer', minimum: 0, description: 'Number of books to skip (default 0)' },
        include_fields: {
          type: 'array',
          items: { type: 'string', enum: [...BOOK_FIELDS] },
          description: 'Optional fields to include: author, published, path',
        },
      },
      required: [],
    },
  },
  {
    name: 'search_books',
    description: 'Search book metadata by title, author, or publication year',
    inputSchema: {
      type: 'object',
      properties: { query: { type: 'string', description: 'Title, author name, or year' } },
      required: ['query'],
    },
  },
  {
    name: 'find_topic',
    description: 'Find passages on a topic with book, author and section attribution; filters can be combined',
    inputSchema: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'Topic to search for' },
        topics: { type: 'array', items: { type: 'string' }, description: 'Several topics; any may match' },
        book_filter: { type: 'string', description: 'Restrict to a book title' },
        author_filter: { type: 'string', description: 'Restrict to an author' },
        limit: { type: 'integer', minimum: 0, maximum: MAX_LIMIT, description: 'Maximum number of results (default 10, 0 for all)' },
        offset: { type: 'integer', minimum: 0, description: 'Number of results to skip (default 0)' },
        match_type: { type: 'string', enum: [...MATCH_TYPES], description: 'How filters compare: exact or fuzzy (default fuzzy)' },
      },
      anyOf: [{ required: ['topic'] }, { required: ['topics'] }],
    },
  },
];

function isRpcId(value: unknown): value is RpcId | undefined {
  return value === undefined || value === null || typeof value === 'string' || typeof value === 'number';
}

function isRpcRequest(value: unknown): value is RpcRequest {
  return isRecord(value) && typeof value.method === 'string' && isRpcId(value.id);
}

function ok(id: RpcId, result: unknown): RpcResponse {
  return { jsonrpc: '2.0', id, result };
}

function err(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message, data } };
}

/** Returns the response for a request, or undefined for notifications. */
export async function handle(orchestrator: LibraryOrchestrator, req: RpcRequest): Promise<RpcResponse | undefined> {
  // notifications (no id) never get a response
  if (req.id === null || req.id === undefined) return undefined;
  const id = req.id;
  try {
    switch (req.method) {
      case 'initialize':
        return ok(id, { protocolVersion: PROTOCOL_VERSION, capabilities: { tools: {} }, serverInfo: SERVER_INFO });
      case 'ping':
        return ok(id, {});
      case 'tools/list':
        return ok(id, { tools });
      case 'tools/call': {
        const params = isRecord(req.params) ? req.params : {};
        const name = typeof params.name === 'string' ? params.name : '';
        const payload = await call_tool(orchestrator, name, params.arguments);
        return ok(id, { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] });
      }
      default:
        return err(id, -32601, 'Method not found', { method: req.method });
    }
  } catch (e) {
    return err(id, -32000, errorMessage(e) || 'Internal error');
  }
}

/** Parses one input line; malformed JSON yields a parse error response. */
export async function handleLine(orchestrator: LibraryOrchestrator, line: string): Promise<RpcResponse | undefined> {
  const s = line.trim();
  if (!s) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(s);
  } catch (e) {
    return err(null, -32700, 'Parse error', { message: errorMessage(e) });
  }
  if (!isRpcRequest(parsed)) {
    const id = isRecord(parsed) && isRpcId(parsed.id) ? parsed.id ?? null : null;
    return err(id, -32600, 'Invalid Request');
  }
  return handle(orchestrator, parsed);
}

export function startAdapter(
  orchestrator: LibraryOrchestrator,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): readline.Interface {
  const write = (res: RpcResponse) => output.write(JSON.stringify(res) + '\n');
  const rl = readline.createInterface({ input, terminal: false });
  rl.on('line', line => {
    void handleLine(orchestrator, line).then(
      res => {
        if (res) write(res);
      },
      e => console.error('[mcp] error handling message:', e),
    );
  });
  return rl;
}
