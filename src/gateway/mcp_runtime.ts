import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { timeout, TimeoutStrategy, TaskCancelledError } from 'cockatiel';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { AppConfig } from '../config/app.js';
import { NotFoundError, UpstreamUnavailableError } from '../core/errors.js';
import type { RemoteRuntime } from './tool_gateway.js';

export type RuntimeConfig = AppConfig['runtime'];

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

const NOT_FOUND = /not found|does not exist|doesn'?t exist|no such|doesNotUnderstand|key not found/i;

/**
 * Pharo runtime reached through an MCP stdio server. The connection is made
 * on first use and kept for the life of the process; a failed attempt is
 * dropped so the next call tries again.
 */
export class McpRemoteRuntime implements RemoteRuntime {
  private connecting?: Promise<Client>;

  constructor(
    private readonly config: RuntimeConfig,
    private readonly log: Logger,
    private readonly transportFactory: () => Transport = () => stdioTransport(config),
  ) {}

  async fetchSource(className: string, methodName: string, signal?: AbortSignal): Promise<string> {
    const result = await this.callTool(this.config.sourceTool, { class_name: className, method_name: methodName }, signal);
    const text = result.text.trim();
    const reportsMissing = NOT_FOUND.test(text) && (result.isError || /^error\b/i.test(text));
    if (reportsMissing || text === '' || text === 'nil') {
      throw new NotFoundError(`Method ${className}>>${methodName} not found: ${text || 'empty source'}`);
    }
    if (result.isError) {
      throw new UpstreamUnavailableError(`Pharo runtime could not read ${className}>>${methodName}: ${text}`);
    }
    return result.text;
  }

  async evaluate(expression: string, signal?: AbortSignal): Promise<string> {
    const result = await this.callTool(this.config.evalTool, { code: expression }, signal);
    return result.text;
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    this.connecting = undefined;
    if (!pending) return;
    try {
      const client = await pending;
      await client.close();
    } catch (err) {
      this.log.debug({ err }, 'mcp:close failed');
    }
  }

  private get timeoutMs(): number {
    return Math.round(this.config.timeoutSec * 1000);
  }

  private connect(): Promise<Client> {
    if (this.connecting) return this.connecting;
    const attempt = this.openClient();
    this.connecting = attempt;
    attempt.then(
      (client) => {
        client.onclose = () => {
          if (this.connecting !== attempt) return;
          this.connecting = undefined;
          this.log.warn('mcp:connection closed, reconnecting on next call');
        };
      },
      () => {
        if (this.connecting === attempt) this.connecting = undefined;
      },
    );
    return attempt;
  }

  private async openClient(): Promise<Client> {
    const client = new Client({ name: 'pharo-refactor-agent', version: '1.0.0' });
    this.log.info({ command: this.config.command, serverUrl: this.config.serverUrl }, 'mcp:connecting');
    try {
      await timeout(this.timeoutMs, TimeoutStrategy.Aggressive).execute(() => client.connect(this.transportFactory()));
    } catch (err) {
      await client.close().catch((closeErr: unknown) => this.log.debug({ err: closeErr }, 'mcp:close after failed connect'));
      const reason = err instanceof TaskCancelledError ? `timed out after ${this.timeoutMs}ms` : String(err);
      throw new UpstreamUnavailableError(`Cannot reach Pharo runtime: ${reason}`, { cause: err });
    }
    this.log.info('mcp:connected');
    return client;
  }

  private async callTool(
    name: string,
    args: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<{ text: string; isError: boolean }> {
    signal?.throwIfAborted();
    const client = await this.connect();
    let raw: unknown;
    try {
      raw = await client.callTool({ name, arguments: args }, undefined, {
        timeout: this.timeoutMs,
        ...(signal ? { signal } : {}),
      });
    } catch (err) {
      throw new UpstreamUnavailableError(`Pharo runtime call ${name} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    const parsed = ToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamUnavailableError(`Pharo runtime returned an unexpected ${name} result`);
    }
    const text = parsed.data.content
      .map((part) => (part.type === 'text' && typeof part.text === 'string' ? part.text : ''))
      .join('');
    this.log.debug({ tool: name, isError: parsed.data.isError ?? false, length: text.length }, 'mcp:tool');
    return { text, isError: parsed.data.isError ?? false };
  }
}

/**
 * Environment handed to the runtime server: the SDK's safe default set
 * (PATH, HOME and the like) plus the Pharo server URL. Service secrets such
 * as the LLM API key stay in this process.
 */
export function runtimeEnvironment(config: RuntimeConfig): Record<string, string> {
  return { ...getDefaultEnvironment(), PHARO_SERVER_URL: config.serverUrl };
}

function stdioTransport(config: RuntimeConfig): Transport {
  return new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: runtimeEnvironment(config),
    ...(config.cwd ? { cwd: config.cwd } : {}),
  });
}
