import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Writable } from 'stream';
import { CommandRegistry } from '../core/registry';
import { DEFAULT_SESSION_CONFIG } from '../core/config';
import { Runtime, createRuntime } from '../core/runtime';
import { VirtualDesktop } from '../platform/virtual_desktop';
import {
  RPC_INVALID_PARAMS,
  RPC_INVALID_REQUEST,
  RPC_METHOD_NOT_FOUND,
  RPC_PARSE_ERROR,
  handleRpcLine,
  handleRpcRequest,
  startStdioTransport
} from '../transports/stdio';
import { SINGLE_SCREEN } from './helpers';

describe('stdio transport', () => {
  let dir: string;
  let runtime: Runtime;
  let registry: CommandRegistry;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwise-stdio-'));
    const desktop = new VirtualDesktop({
      screens: SINGLE_SCREEN,
      windows: [{ id: 7, app: 'Editor', frame: { x: 100, y: 100, w: 600, h: 400 } }],
      focusedId: 7
    });
    runtime = createRuntime({ ...DEFAULT_SESSION_CONFIG, policyDir: dir }, { registry: new CommandRegistry(), platform: desktop });
    registry = runtime.registry;
  });

  afterEach(() => {
    runtime.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('answers the handshake and ping', async () => {
    const init = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 1, method: 'initialize' });
    expect(init).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        serverInfo: { name: 'stepwise-wm', version: '1.0.0' },
        methods: ['initialize', 'commands/list', 'commands/call', 'ping']
      }
    });

    const ping = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 2, method: 'ping' });
    expect(ping).toEqual({ jsonrpc: '2.0', id: 2, result: { pong: true, commands: 14 } });
  });

  it('lists commands with their input schemas', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 'a', method: 'commands/list' });
    const result = response.result;
    if (typeof result !== 'object' || result === null || !('commands' in result) || !Array.isArray(result.commands)) {
      throw new Error('unexpected commands/list result');
    }
    expect(result.commands).toHaveLength(14);
    expect(result.commands).toContainEqual(expect.objectContaining({ name: 'window.center', inputSchema: expect.any(Object) }));
  });

  it('dispatches commands/call and echoes the correlation id', async () => {
    const response = await handleRpcRequest(registry, {
      jsonrpc: '2.0',
      id: 3,
      method: 'commands/call',
      params: { name: 'window.maximize', arguments: {}, correlationId: 'corr-1' }
    });
    expect(response.id).toBe(3);
    expect(response.result).toMatchObject({
      success: true,
      correlationId: 'corr-1',
      data: { applied: true, step: 'max-height', frame: { x: 100, y: 0, w: 600, h: 900 } }
    });
  });

  it('reports command failures inside the result', async () => {
    const response = await handleRpcRequest(registry, {
      jsonrpc: '2.0',
      id: 4,
      method: 'commands/call',
      params: { name: 'window.nope' }
    });
    expect(response.error).toBeUndefined();
    expect(response.result).toMatchObject({ success: false, error: { code: 'UNKNOWN_COMMAND' } });
  });

  it('maps protocol problems onto JSON-RPC error codes', async () => {
    expect((await handleRpcRequest(registry, { id: 5, method: 'ping' })).error?.code).toBe(RPC_INVALID_REQUEST);
    expect((await handleRpcRequest(registry, { jsonrpc: '2.0', id: 6, method: 'tools/list' })).error?.code).toBe(RPC_METHOD_NOT_FOUND);
    expect(
      (await handleRpcRequest(registry, { jsonrpc: '2.0', id: 7, method: 'commands/call', params: { arguments: {} } })).error?.code
    ).toBe(RPC_INVALID_PARAMS);
    expect((await handleRpcLine(registry, '{ nope'))?.error?.code).toBe(RPC_PARSE_ERROR);
    expect(await handleRpcLine(registry, '   ')).toBeUndefined();
  });

  it('answers newline-delimited requests in order', async () => {
    const input = new PassThrough();
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf-8'));
        callback();
      }
    });

    const closed = new Promise<void>(resolve => {
      startStdioTransport(registry, input, output, resolve);
    });
    input.write(JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'ping' }) + '\n');
    input.write('\n');
    input.write(JSON.stringify({ jsonrpc: '2.0', id: 2, method: 'commands/call', params: { name: 'focus.highlight' } }) + '\n');
    input.end();
    await closed;

    const responses = chunks.join('').trim().split('\n').map(line => JSON.parse(line));
    expect(responses.map(r => r.id)).toEqual([1, 2]);
    expect(responses[1].result).toMatchObject({ success: true, data: { applied: true, id: 7, appName: 'Editor' } });
  });
});
