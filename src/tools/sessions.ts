import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { SessionProperties } from '../types.js';
import { jsonResult, toolOperation, trimmed, withSession, type ToolContext } from '../utils.js';

export const sessionTools = {
  get_sessions: {
    description:
      'Lists the ids of the sessions connected to the server, optionally only those matching a session filter ' +
      "such as $Principal is 'admin'. Needs VIEW_SESSION and REGISTER_HANDLER permissions. See the 'sessions' context.",
  },
  get_session_details: {
    description:
      'Retrieves the fixed and user properties of a Diffusion session by session ID. ' +
      'Defaults to the session this server holds for you. ' +
      "Needs VIEW_SESSION permission. See the 'sessions' context.",
  },
};

const CLIENT_TYPES: Record<string, string> = {
  JAVASCRIPT_BROWSER: 'JavaScript (browser)',
  NODE_JS: 'Node.js',
  JAVA: 'Java',
  DOTNET: '.NET',
  C: 'C',
  IOS: 'iOS',
  ANDROID: 'Android',
  PYTHON: 'Python',
  OTHER: 'Other',
};

function formatStartTime(value: string): string {
  if (!/^\d+$/.test(value)) return value;
  const date = new Date(Number(value));
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
}

/**
 * Human-readable copies of the well-known fixed properties. Unknown keys and
 * values that do not parse are left untouched.
 */
export function formatSessionProperties(properties: SessionProperties): SessionProperties {
  const formatted: SessionProperties = { ...properties };
  const startTime = formatted.$StartTime;
  if (startTime !== undefined) formatted.$StartTime = formatStartTime(startTime);
  const clientType = formatted.$ClientType;
  if (clientType !== undefined) formatted.$ClientType = CLIENT_TYPES[clientType] ?? clientType;
  return formatted;
}

export async function handleGetSessionDetails(
  ctx: ToolContext,
  callerId: string,
  args: { sessionId?: string }
): Promise<CallToolResult> {
  const requested = trimmed(args.sessionId);
  return withSession(ctx, callerId, toolOperation('get_session_details', requested ?? 'own'), async (session) => {
    const sessionId = requested ?? session.sessionId;
    const properties = formatSessionProperties(await session.clientsApi().getSessionProperties(sessionId));
    ctx.logger.debug('session_details_retrieved', { sessionId, count: Object.keys(properties).length });
    return jsonResult({ sessionId, properties, propertyCount: Object.keys(properties).length });
  });
}

export async function handleGetSessions(
  ctx: ToolContext,
  callerId: string,
  args: { filter?: string }
): Promise<CallToolResult> {
  const filter = trimmed(args.filter);
  return withSession(ctx, callerId, toolOperation('get_sessions', ...(filter !== undefined ? [filter] : [])), async (session) => {
    const sessionIds = await session.clientsApi().listSessions(filter);
    ctx.logger.debug('sessions_listed', { count: sessionIds.length, filter });
    return jsonResult({ count: sessionIds.length, ...(filter !== undefined ? { filter } : {}), sessionIds });
  });
}
