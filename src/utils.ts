import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { OperationTimeoutError, ToolArgumentError } from './errors.js';
import { errorMessage, type StructuredLogger } from './logger.js';
import type { SessionManager } from './session-manager.js';
import type { DiffusionSession } from './types.js';

export const CONNECT_TOOL_NAME = 'connect';
export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

export function toolResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function toolError(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export function jsonResult(payload: unknown): CallToolResult {
  return toolResult(JSON.stringify(payload, null, 2));
}

export function noActiveSession(): CallToolResult {
  return toolError(`Error: No active Diffusion session. Please connect first using ${CONNECT_TOOL_NAME}`);
}

/** `tool : arg1 , arg2` label used in logs and error results. */
export function toolOperation(toolName: string, ...args: string[]): string {
  return args.length === 0 ? toolName : `${toolName} : ${args.join(' , ')}`;
}

/**
 * Settle with the promise, or reject with an OperationTimeoutError once
 * `timeoutMs` has elapsed. The timer never outlives the race.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Errors caused by the request itself (bad arguments, refusals reported by
 * the server, timeouts) as opposed to defects in this process.
 */
export function isExpectedError(error: unknown): boolean {
  if (error instanceof OperationTimeoutError || error instanceof ToolArgumentError) return true;
  return !(error instanceof TypeError || error instanceof ReferenceError);
}

export function toolFailure(operation: string, error: unknown, logger: StructuredLogger): CallToolResult {
  if (isExpectedError(error)) {
    logger.warn('tool_failed', { operation, error: errorMessage(error) });
  } else {
    logger.error('tool_failed_unexpectedly', {
      operation,
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  return toolError(`Error ${operation}: ${errorMessage(error)}`);
}

export interface ToolContext {
  sessions: SessionManager;
  logger: StructuredLogger;
  timeoutMs: number;
}

/**
 * Run one backing-server operation for a caller: resolve the caller's
 * session, bound the call by the tool timeout and map failures to an error
 * result.
 */
export async function withSession(
  ctx: ToolContext,
  callerId: string,
  operation: string,
  run: (session: DiffusionSession) => Promise<CallToolResult>
): Promise<CallToolResult> {
  const session = ctx.sessions.get(callerId);
  if (!session) return noActiveSession();

  try {
    return await withTimeout(run(session), ctx.timeoutMs);
  } catch (error) {
    return toolFailure(operation, error, ctx.logger);
  }
}

/**
 * Builds a line-oriented text report.
 */
export class ToolResponse {
  private readonly lines: string[] = [];

  addLine(line = ''): this {
    this.lines.push(line);
    return this;
  }

  toString(): string {
    return this.lines.map((line) => `${line}\n`).join('');
  }

  toResult(): CallToolResult {
    return toolResult(this.toString());
  }
}

export function trimmed(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const result = value.trim();
  return result.length > 0 ? result : undefined;
}
