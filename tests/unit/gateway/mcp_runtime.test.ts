import { describe, it, expect, afterEach } from '@jest/globals';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { loadAppConfig } from '../../../src/config/app.js';
import { NotFoundError, UpstreamUnavailableError } from '../../../src/core/errors.js';
import { McpRemoteRuntime, runtimeEnvironment } from '../../../src/gateway/mcp_runtime.js';
import { silentLogger } from '../../../src/util/logging.js';
import { ORIGINAL_SOURCE } from '../../helpers/fakes.js';

const config = { ...loadAppConfig({}).runtime, timeoutSec: 2 };

const servers: Server[] = [];

const SourceArgs = z.object({ class_name: z.string(), method_name: z.string() });
const EvalArgs = z.object({ code: z.string() });

const text = (value: string, isError = false) => ({ content: [{ type: 'text' as const, text: value }], isError });

/** In-process stand-in for the Pharo MCP server, already listening on one end of a linked pair. */
async function fakePharo(): Promise<{ clientSide: Transport; evaluated: string[]; server: Server }> {
  const server = new Server({ name: 'fake-pharo', version: '0.0.1' }, { capabilities: { tools: {} } });
  const evaluated: string[] = [];

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      { name: 'get_method_source', inputSchema: { type: 'object' as const, properties: { class_name: {}, method_name: {} } } },
      { name: 'eval', inputSchema: { type: 'object' as const, properties: { code: {} } } },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    if (name === 'get_method_source') {
      const { class_name, method_name } = SourceArgs.parse(args);
      if (class_name === 'Calculator' && method_name === 'sum:with:') return text(ORIGINAL_SOURCE);
      if (class_name === 'Locked') return text('Error: image is busy', true);
      return text(`Error: method ${class_name}>>${method_name} not found`, true);
    }
    if (name === 'eval') {
      const { code } = EvalArgs.parse(args);
      evaluated.push(code);
      return text(code === '3 + 4' ? '7' : 'nil');
    }
    return text(`Unknown tool: ${name}`, true);
  });

  const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
  await server.connect(serverSide);
  servers.push(server);
  return { clientSide, evaluated, server };
}

/** Hands out the given transports in order and counts how often it was asked. */
function factoryOf(transports: Transport[]): { next: () => Transport; calls: () => number } {
  let calls = 0;
  return {
    next: () => {
      const transport = transports[calls++];
      if (!transport) throw new Error('no transport left');
      return transport;
    },
    calls: () => calls,
  };
}

const failingTransport = (start: () => Promise<void>): Transport => ({
  start,
  send: async () => undefined,
  close: async () => undefined,
});

afterEach(async () => {
  await Promise.all(servers.splice(0).map((s) => s.close()));
});

describe('McpRemoteRuntime', () => {
  it('connects on first use and reuses the connection', async () => {
    const pharo = await fakePharo();
    const factory = factoryOf([pharo.clientSide]);
    const runtime = new McpRemoteRuntime(config, silentLogger(), factory.next);

    expect(factory.calls()).toBe(0);
    expect(await runtime.fetchSource('Calculator', 'sum:with:')).toBe(ORIGINAL_SOURCE);
    expect(await runtime.evaluate('3 + 4')).toBe('7');
    expect(factory.calls()).toBe(1);
    expect(pharo.evaluated).toEqual(['3 + 4']);
    await runtime.close();
  });

  it('reports a missing method as NotFound', async () => {
    const pharo = await fakePharo();
    const runtime = new McpRemoteRuntime(config, silentLogger(), factoryOf([pharo.clientSide]).next);

    const failure = runtime.fetchSource('Calculator', 'missing');
    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow('Method Calculator>>missing not found: Error: method Calculator>>missing not found');
    await runtime.close();
  });

  it('reports other runtime errors as unavailable', async () => {
    const pharo = await fakePharo();
    const runtime = new McpRemoteRuntime(config, silentLogger(), factoryOf([pharo.clientSide]).next);

    await expect(runtime.fetchSource('Locked', 'foo')).rejects.toThrow(
      new UpstreamUnavailableError('Pharo runtime could not read Locked>>foo: Error: image is busy'),
    );
    await runtime.close();
  });

  it('returns evaluation text without judging it', async () => {
    const pharo = await fakePharo();
    const runtime = new McpRemoteRuntime(config, silentLogger(), factoryOf([pharo.clientSide]).next);

    expect(await runtime.evaluate("Calculator compile: ('x')")).toBe('nil');
    await runtime.close();
  });

  it('fails with UpstreamUnavailable when the server cannot start, then retries', async () => {
    const pharo = await fakePharo();
    const factory = factoryOf([
      failingTransport(async () => {
        throw new Error('spawn uv ENOENT');
      }),
      pharo.clientSide,
    ]);
    const runtime = new McpRemoteRuntime(config, silentLogger(), factory.next);

    const failure = runtime.fetchSource('Calculator', 'sum:with:');
    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toThrow('Cannot reach Pharo runtime: Error: spawn uv ENOENT');

    expect(await runtime.fetchSource('Calculator', 'sum:with:')).toBe(ORIGINAL_SOURCE);
    expect(factory.calls()).toBe(2);
    await runtime.close();
  });

  it('gives up connecting after the configured timeout', async () => {
    const hanging = failingTransport(() => new Promise<void>(() => undefined));
    const runtime = new McpRemoteRuntime({ ...config, timeoutSec: 0.05 }, silentLogger(), () => hanging);

    await expect(runtime.evaluate('1')).rejects.toThrow('Cannot reach Pharo runtime: timed out after 50ms');
  });

  it('reconnects after close', async () => {
    const first = await fakePharo();
    const second = await fakePharo();
    const factory = factoryOf([first.clientSide, second.clientSide]);
    const runtime = new McpRemoteRuntime(config, silentLogger(), factory.next);

    await runtime.evaluate('3 + 4');
    await runtime.close();
    await runtime.evaluate('3 + 4');

    expect(factory.calls()).toBe(2);
    expect(first.evaluated).toEqual(['3 + 4']);
    expect(second.evaluated).toEqual(['3 + 4']);
    await runtime.close();
  });

  it('reconnects when the server drops the connection', async () => {
    const first = await fakePharo();
    const second = await fakePharo();
    const factory = factoryOf([first.clientSide, second.clientSide]);
    const runtime = new McpRemoteRuntime(config, silentLogger(), factory.next);

    expect(await runtime.evaluate('3 + 4')).toBe('7');
    await first.server.close();

    expect(await runtime.evaluate('3 + 4')).toBe('7');
    expect(factory.calls()).toBe(2);
    expect(second.evaluated).toEqual(['3 + 4']);
    await runtime.close();
  });

  it('does not reach the server for an already cancelled call', async () => {
    const pharo = await fakePharo();
    const factory = factoryOf([pharo.clientSide]);
    const runtime = new McpRemoteRuntime(config, silentLogger(), factory.next);
    const controller = new AbortController();
    controller.abort();

    await expect(runtime.evaluate('3 + 4', controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(factory.calls()).toBe(0);
    expect(pharo.evaluated).toEqual([]);
  });
});

describe('runtimeEnvironment', () => {
  const saved = process.env.LLM_API_KEY;

  afterEach(() => {
    if (saved === undefined) delete process.env.LLM_API_KEY;
    else process.env.LLM_API_KEY = saved;
  });

  it('passes the server URL and keeps service secrets out of the child', () => {
    process.env.LLM_API_KEY = 'test-secret';

    const env = runtimeEnvironment({ ...config, serverUrl: 'http://localhost:8086' });

    expect(env.PHARO_SERVER_URL).toBe('http://localhost:8086');
    expect(env.LLM_API_KEY).toBeUndefined();
    expect(Object.values(env)).not.toContain('test-secret');
  });
});
