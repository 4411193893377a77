/**
 * transports/stdio.ts
 *
 * JSON-RPC 2.0 over stdin/stdout, for binding daemons that spawn the
 * server as a child process and talk over pipes.
 *
 * Protocol:
 *   Client sends:  { "jsonrpc": "2.0", "id": N, "method": "commands/list" | "commands/call", "params": {...} }
 *   Server sends:  { "jsonrpc": "2.0", "id": N, "result": {...} }
 *                  or { "jsonrpc": "2.0", "id": N, "error": { "code": N, "message": "..." } }
 *
 * Input is newline-delimited JSON (one complete JSON object per line).
 */

import * as readline from 'readline';
import { CommandRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/stdio');

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;

type RpcId = number | string | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number | string;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRequest(value: unknown): value is JsonRpcRequest {
  if (!isRecord(value)) return false;
  const idOk = typeof value.id === 'number' || typeof value.id === 'string';
  const paramsOk = value.params === undefined || isRecord(value.params);
  return value.jsonrpc === '2.0' && idOk && typeof value.method === 'string' && paramsOk;
}

function failure(id: RpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: data === undefined ? { code, message } : { code, message, data } };
}

function requestId(value: unknown): RpcId {
  if (isRecord(value) && (typeof value.id === 'number' || typeof value.id === 'string')) return value.id;
  return null;
}

/**
 * Handles one decoded request. Command failures are reported inside a
 * successful response (the result envelope carries success: false);
 * JSON-RPC errors are reserved for protocol problems.
 */
const RPC_METHODS = ['initialize', 'commands/list', 'commands/call', 'ping'] as const;

export async function handleRpcRequest(registry: CommandRegistry, request: unknown): Promise<JsonRpcResponse> {
  if (!isRequest(request)) {
    return failure(requestId(request), RPC_INVALID_REQUEST, 'Invalid JSON-RPC 2.0 request');
  }

  const { id, method, params = {} } = request;

  switch (method) {
    case 'initialize':
      return {
        jsonrpc: '2.0',
        id,
        result: {
          serverInfo: { name: 'stepwise-wm', version: '1.0.0' },
          methods: RPC_METHODS
        }
      };

    case 'commands/list':
      return {
        jsonrpc: '2.0',
        id,
        result: {
          commands: registry.list().map(c => ({
            name: c.name,
            description: c.description,
            inputSchema: c.parameters
          }))
        }
      };

    case 'commands/call': {
      const name = params.name;
      const args = params.arguments ?? {};
      if (typeof name !== 'string' || !isRecord(args)) {
        return failure(id, RPC_INVALID_PARAMS, 'commands/call needs "name" and an optional "arguments" object');
      }
      const correlationId = typeof params.correlationId === 'string' ? params.correlationId : generateCorrelationId();
      const result = await registry.invoke({
        command: name,
        args,
        meta: { source: 'stdio', timestamp: Date.now(), correlationId }
      });
      return { jsonrpc: '2.0', id, result: { ...result, correlationId } };
    }

    case 'ping':
      return { jsonrpc: '2.0', id, result: { pong: true, commands: registry.list().length } };

    default:
      return failure(id, RPC_METHOD_NOT_FOUND, `Unknown method: "${method}"`);
  }
}

/** Decodes one input line; undefined for a blank line. */
export async function handleRpcLine(registry: CommandRegistry, line: string): Promise<JsonRpcResponse | undefined> {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  let request: unknown;
  try {
    request = JSON.parse(trimmed);
  } catch (e) {
    log.warn({ raw: trimmed, error: errorMessage(e) }, 'Failed to parse JSON-RPC request');
    return failure(null, RPC_PARSE_ERROR, 'Parse error');
  }

  try {
    return await handleRpcRequest(registry, request);
  } catch (e) {
    log.error({ error: errorMessage(e) }, 'Stdio handler error');
    return failure(requestId(request), RPC_INTERNAL_ERROR, errorMessage(e));
  }
}

export function startStdioTransport(
  registry: CommandRegistry,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
  onClose: () => void = () => process.exit(0)
): readline.Interface {
  log.info('Stdio transport started, listening on stdin');

  const rl = readline.createInterface({ input, terminal: false });

  // Responses go out in request order.
  let queue: Promise<void> = Promise.resolve();

  rl.on('line', (line: string) => {
    queue = queue
      .then(() => handleRpcLine(registry, line))
      .then(response => {
        if (response) output.write(JSON.stringify(response) + '\n');
      })
      .catch((e: unknown) => {
        log.error({ error: errorMessage(e) }, 'Critical error in stdio line handler');
      });
  });

  rl.on('close', () => {
    log.info('Stdin closed, shutting down stdio transport');
    void queue.then(onClose);
  });

  return rl;
}
