import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { TestInvocationEngine } from './rspec/engine.js';
import { RunnerError, RunnerErrorCode, isValidationError } from './shared/errors.js';
import { logger } from './shared/logger.js';
import { RUN_TEST_TOOL, ToolRegistry, runTestInput } from './tool-registry.js';

export const SERVER_INFO = { name: 'rspec-runner-mcp', version: '0.1.0' } as const;

type TextResult = { content: Array<{ type: 'text'; text: string }> };

const respond = (text: string): TextResult => ({ content: [{ type: 'text' as const, text }] });

export function listTools(registry: ToolRegistry) {
  return registry.getAllTools().map(t => ({
    name: t.name,
    description: t.description,
    inputSchema: zodToJsonSchema(t.inputSchema),
  }));
}

/**
 * Resolve one tools/call. A test run that fails is a normal result; only bad
 * input (InvalidParams) and a runner that cannot be started (InternalError)
 * become protocol errors.
 */
export async function handleToolCall(
  engine: TestInvocationEngine,
  toolName: string,
  args: Record<string, unknown>,
  signal?: AbortSignal
): Promise<TextResult> {
  switch (toolName) {
    case RUN_TEST_TOOL: {
      const parsed = runTestInput.safeParse(args);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join('; ');
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${toolName}: ${detail}`);
      }
      const { file, line_numbers } = parsed.data;
      try {
        return respond(await engine.runTest({ file, lineNumbers: line_numbers }, signal));
      } catch (err) {
        throw toMcpError(toolName, err);
      }
    }
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
  }
}

function toMcpError(toolName: string, err: unknown): McpError {
  if (isValidationError(err)) {
    logger.warn({ tool: toolName, code: err.code, error: err.message }, 'Rejected tool arguments');
    return new McpError(ErrorCode.InvalidParams, err.message, { code: err.code });
  }
  if (err instanceof RunnerError) {
    const level = err.code === RunnerErrorCode.CANCELLED ? 'info' : 'error';
    logger[level]({ tool: toolName, code: err.code, error: err.message }, 'Tool execution failed');
    return new McpError(ErrorCode.InternalError, err.message, { ...err.context, code: err.code });
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error({ tool: toolName, error: message }, 'Tool execution error');
  return new McpError(ErrorCode.InternalError, message);
}

/** One MCP server instance; the SSE transport creates one per session. */
export function createServer(engine: TestInvocationEngine, registry = new ToolRegistry()): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(registry),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(engine, name, args ?? {}, extra.signal);
  });

  return server;
}
