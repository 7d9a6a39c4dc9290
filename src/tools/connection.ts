import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { errorMessage } from '../logger.js';
import { toolError, toolResult, trimmed, type ToolContext } from '../utils.js';

export const connectionTools = {
  connect: {
    description:
      'Connects to a Diffusion server with the provided credentials and optional session properties. ' +
      'Session properties can be used with session trees for routing and access control. ' +
      'Returns success or failure reason. ' +
      'The session times out if it has not been used for more than 5 minutes and you will have to reconnect. ' +
      "Before connecting read the 'introduction' context to understand what can be done once a session has been connected. " +
      "For more information about sessions see the 'sessions' context.",
  },
  disconnect: {
    description: 'Disconnects from the current Diffusion server session if one exists.',
  },
};

export interface ConnectArgs {
  url: string;
  principal: string;
  password: string;
  sessionProperties?: Record<string, string>;
}

export async function handleConnect(ctx: ToolContext, callerId: string, args: ConnectArgs): Promise<CallToolResult> {
  const url = trimmed(args.url) ?? '';
  const principal = trimmed(args.principal) ?? '';
  const password = args.password.trim();
  const properties = args.sessionProperties ?? {};

  ctx.logger.info('connect_requested', { callerId, url, principal });

  try {
    const session = await ctx.sessions.connect(callerId, principal, password, url, properties);
    let message = `Successfully connected to Diffusion server at ${url} with session id ${session.sessionId}`;
    if (Object.keys(properties).length > 0) {
      message += `. Session properties: ${JSON.stringify(properties)}`;
    }
    return toolResult(message);
  } catch (error) {
    ctx.logger.warn('connect_failed', { callerId, url, error: errorMessage(error) });
    return toolError(`Error connecting to Diffusion server: ${errorMessage(error)}`);
  }
}

export async function handleDisconnect(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  try {
    const session = await ctx.sessions.disconnect(callerId);
    return toolResult(
      session ? 'Successfully disconnected from Diffusion server' : 'No active Diffusion session to disconnect'
    );
  } catch (error) {
    return toolError(`Error disconnecting from Diffusion server: ${errorMessage(error)}`);
  }
}
