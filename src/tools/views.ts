import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolArgumentError } from '../errors.js';
import type {
  ConnectionOptionName,
  RemoteServerCheck,
  RemoteServerDefinition,
  RemoteServerInfo,
  RemoteServerTypeName,
  SecondaryServerOptions,
  TopicViewInfo,
} from '../types.js';
import { jsonResult, toolError, toolOperation, ToolResponse, trimmed, withSession, type ToolContext } from '../utils.js';

export const REMOTE_SERVER_TYPES = ['SECONDARY_INITIATOR', 'PRIMARY_INITIATOR', 'SECONDARY_ACCEPTOR'] as const;
export const CONNECTION_OPTIONS = [
  'CONNECTION_TIMEOUT',
  'INPUT_BUFFER_SIZE',
  'MAXIMUM_QUEUE_SIZE',
  'OUTPUT_BUFFER_SIZE',
  'RECONNECTION_TIMEOUT',
  'RECOVERY_BUFFER_SIZE',
  'RETRY_DELAY',
  'WRITE_TIMEOUT',
] as const;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export const topicViewTools = {
  create_topic_view: {
    description:
      'Creates a topic view, or replaces an existing view with the same name. ' +
      'The specification is written in the topic view DSL, e.g. "map ?sensors// to views/<path(1)>". ' +
      "Needs MODIFY_TOPIC_VIEWS permission. See the 'topic_views' context.",
  },
  get_topic_view: {
    description: "Retrieves a named topic view with its specification and roles. Needs READ_TOPIC_VIEWS permission.",
  },
  list_topic_views: {
    description: 'Lists the topic views defined on the server with their specifications and roles.',
  },
  remove_topic_view: {
    description: 'Removes a named topic view and the reference topics it created.',
  },
  create_remote_server: {
    description:
      'Creates a remote server configuration. A SECONDARY_INITIATOR needs url, a PRIMARY_INITIATOR needs urls and ' +
      'connector, a SECONDARY_ACCEPTOR needs primaryHostName. Needs CONTROL_SERVER permission. ' +
      "See the 'remote_servers' context before creating one.",
  },
  list_remote_servers: {
    description: "Lists the remote servers configured on the server. See the 'remote_servers' context.",
  },
  check_remote_server: {
    description: 'Checks the connection state of a named remote server.',
  },
  remove_remote_server: {
    description: 'Removes a named remote server configuration.',
  },
};

function viewPayload(view: TopicViewInfo) {
  return { name: view.name, specification: view.specification, roles: [...view.roles].sort() };
}

export async function handleCreateTopicView(
  ctx: ToolContext,
  callerId: string,
  args: { name: string; specification: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('create_topic_view', name), async (session) => {
    const view = await session.topicViewsApi().create(name, args.specification.trim());
    ctx.logger.info('topic_view_created', { name: view.name });
    return jsonResult({ created: true, view: viewPayload(view) });
  });
}

export async function handleGetTopicView(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('get_topic_view', name), async (session) => {
    const view = await session.topicViewsApi().get(name);
    if (!view) return toolError(`Topic view '${name}' not found`);
    return jsonResult({ ...viewPayload(view), exists: true });
  });
}

export async function handleListTopicViews(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_topic_views', async (session) => {
    const views = await session.topicViewsApi().list();
    return jsonResult({ count: views.length, views: views.map(viewPayload) });
  });
}

export async function handleRemoveTopicView(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('remove_topic_view', name), async (session) => {
    await session.topicViewsApi().remove(name);
    return jsonResult({ name, removed: true });
  });
}

export interface CreateRemoteServerArgs {
  type: RemoteServerTypeName;
  name: string;
  url?: string;
  urls?: string[];
  connector?: string;
  primaryHostName?: string;
  principal?: string;
  password?: string;
  connectionOptions?: Partial<Record<ConnectionOptionName, string>>;
  missingTopicNotificationFilter?: string;
  retryDelay?: number;
}

/** The definition for the requested remote server type, checking its required arguments. */
export function remoteServerDefinition(args: CreateRemoteServerArgs): RemoteServerDefinition {
  const name = args.name.trim();
  const principal = trimmed(args.principal);
  const filter = trimmed(args.missingTopicNotificationFilter);
  const secondary: SecondaryServerOptions = {
    connectionOptions: args.connectionOptions ?? {},
    ...(principal !== undefined ? { principal } : {}),
    ...(args.password !== undefined ? { password: args.password } : {}),
    ...(filter !== undefined ? { missingTopicNotificationFilter: filter } : {}),
  };

  switch (args.type) {
    case 'SECONDARY_INITIATOR': {
      const url = trimmed(args.url);
      if (url === undefined) throw new ToolArgumentError('URL is required for SECONDARY_INITIATOR');
      return { type: args.type, name, url, ...secondary };
    }
    case 'PRIMARY_INITIATOR': {
      const urls = (args.urls ?? []).map((url) => url.trim()).filter((url) => url.length > 0);
      if (urls.length === 0) throw new ToolArgumentError('URLs list is required for PRIMARY_INITIATOR');
      const connector = trimmed(args.connector);
      if (connector === undefined) throw new ToolArgumentError('Connector is required for PRIMARY_INITIATOR');
      return { type: args.type, name, urls, connector, retryDelay: args.retryDelay ?? DEFAULT_RETRY_DELAY_MS };
    }
    case 'SECONDARY_ACCEPTOR': {
      const primaryHostName = trimmed(args.primaryHostName);
      if (primaryHostName === undefined) throw new ToolArgumentError('primaryHostName is required for SECONDARY_ACCEPTOR');
      return { type: args.type, name, primaryHostName, ...secondary };
    }
    default:
      throw new ToolArgumentError(`Invalid remote server type: ${String(args.type)}`);
  }
}

function describeSecondaryServer(response: ToolResponse, server: RemoteServerInfo): void {
  response.addLine(`Principal: ${server.principal ? server.principal : '<anonymous>'}`);
  if (server.missingTopicNotificationFilter) {
    response.addLine(`Missing Topic Notification Filter: ${server.missingTopicNotificationFilter}`);
  }
  const options = Object.entries(server.connectionOptions ?? {});
  if (options.length > 0) {
    response.addLine('Connection Options:');
    for (const [key, value] of options) response.addLine(`  ${key}: ${value}`);
  }
}

export async function handleCreateRemoteServer(
  ctx: ToolContext,
  callerId: string,
  args: CreateRemoteServerArgs
): Promise<CallToolResult> {
  let definition: RemoteServerDefinition;
  try {
    definition = remoteServerDefinition(args);
  } catch (error) {
    if (error instanceof ToolArgumentError) return toolError(`Invalid parameters: ${error.message}`);
    throw error;
  }

  return withSession(ctx, callerId, toolOperation('create_remote_server', definition.name), async (session) => {
    const server = await session.remoteServersApi().create(definition);
    ctx.logger.info('remote_server_created', { name: server.name, type: server.type });

    const response = new ToolResponse()
      .addLine('=== Remote Server Created ===')
      .addLine(`Name: ${server.name}`)
      .addLine(`Type: ${server.type}`)
      .addLine();
    if (server.type === 'PRIMARY_INITIATOR') {
      response
        .addLine(`URLs: ${(server.urls ?? []).join(', ')}`)
        .addLine(`Connector: ${server.connector ?? ''}`)
        .addLine(`Retry Delay: ${server.retryDelay ?? DEFAULT_RETRY_DELAY_MS} ms`);
    } else if (server.type === 'SECONDARY_ACCEPTOR') {
      response.addLine(`Primary Host Name: ${server.primaryHostName ?? ''}`);
      describeSecondaryServer(response, server);
    } else {
      response.addLine(`URL: ${server.url ?? ''}`);
      describeSecondaryServer(response, server);
    }
    return response.addLine().addLine('Remote server has been successfully created and is now available.').toResult();
  });
}

export async function handleListRemoteServers(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_remote_servers', async (session) => {
    const servers = await session.remoteServersApi().list();
    const response = new ToolResponse()
      .addLine('=== Remote Servers ===')
      .addLine(`Total: ${servers.length}`)
      .addLine();

    if (servers.length === 0) {
      response.addLine('No remote servers configured.');
    }
    servers.forEach((server, i) => {
      response.addLine(`${i + 1}. ${server.name}`).addLine(`   Type: ${server.type}`);
    });
    return response.toResult();
  });
}

function describeConnectionState(check: RemoteServerCheck): string[] {
  switch (check.connectionState.toUpperCase()) {
    case 'INACTIVE':
      return ['The remote server is currently inactive.'];
    case 'CONNECTED':
      return ['The remote server is successfully connected and operational.'];
    case 'RETRYING':
      return ['The connection has failed and is currently retrying.'];
    case 'FAILED':
      return ['The connection has failed.'];
    case 'MISSING':
      return ['The remote server is not known to this server.'];
    default:
      return [];
  }
}

export async function handleCheckRemoteServer(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('check_remote_server', name), async (session) => {
    const check = await session.remoteServersApi().check(name);
    ctx.logger.info('remote_server_checked', { name, connectionState: check.connectionState });

    const response = new ToolResponse()
      .addLine('=== Remote Server Status ===')
      .addLine(`Name: ${name}`)
      .addLine(`Connection State: ${check.connectionState}`)
      .addLine();
    for (const line of describeConnectionState(check)) response.addLine(line);
    if (check.failureMessage) {
      response.addLine().addLine('Failure reason:').addLine(`  ${check.failureMessage}`);
    }
    return response.toResult();
  });
}

export async function handleRemoveRemoteServer(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('remove_remote_server', name), async (session) => {
    await session.remoteServersApi().remove(name);
    return jsonResult({ name, removed: true });
  });
}
