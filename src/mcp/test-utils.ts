/**
 * Shared test utilities for MCP tool/resource/prompt tests
 *
 * createMockServer() captures handler registrations regardless of
 * argument count: the handler is always the last argument.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolResult } from './with-error-tracking.js';

export type CapturedHandler = (...args: unknown[]) => unknown;

export interface ResourceResult {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
}

export interface PromptResult {
  messages: Array<{ role: string; content: { type: string; text: string } }>;
}

export interface MockServer {
  /** Pass to registerXxx functions in place of a real McpServer */
  server: McpServer;
  registered: string[];
  callTool(name: string, args?: Record<string, unknown>): Promise<ToolResult>;
  readResource(uri: string): Promise<ResourceResult>;
  getPrompt(name: string, args: Record<string, string | undefined>): PromptResult;
}

/**
 * Create a mock MCP server that captures tool/resource/prompt handlers.
 *
 * Usage:
 *   const mock = createMockServer();
 *   registerXxxTools(mock.server, session);
 *   const result = await mock.callTool('tool_name', { arg: 'value' });
 */
export function createMockServer(): MockServer {
  const handlers = new Map<string, CapturedHandler>();
  const registered: string[] = [];

  const capture = (...args: unknown[]): void => {
    const name = args[0];
    const handler = args[args.length - 1];
    if (typeof name === 'string' && typeof handler === 'function') {
      handlers.set(name, (...callArgs: unknown[]) => handler(...callArgs));
      registered.push(name);
    }
  };

  const handlerFor = (name: string): CapturedHandler => {
    const handler = handlers.get(name);
    if (!handler) throw new Error(`No handler registered for ${name}`);
    return handler;
  };

  // Only the registration methods are ever called by the code under test
  const server = { tool: capture, resource: capture, prompt: capture } as unknown as McpServer;

  return {
    server,
    registered,
    callTool: async (name, args = {}) => await handlerFor(name)(args) as ToolResult,
    readResource: async (uri) => await handlerFor(uri)(new URL(uri)) as ResourceResult,
    getPrompt: (name, args) => handlerFor(name)(args) as PromptResult,
  };
}
