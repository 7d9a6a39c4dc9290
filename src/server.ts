import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { SERVER_NAME, SERVER_VERSION } from './config.js';
import { connectionTools, handleConnect, handleDisconnect } from './tools/connection.js';
import { contextTools, GuideLibrary, handleGetContext } from './tools/context.js';
import {
  handleCreateSessionMetricCollector,
  handleCreateTopicMetricCollector,
  handleFetchMetrics,
  handleListMetricAlerts,
  handleListSessionMetricCollectors,
  handleListTopicMetricCollectors,
  handleRemoveMetricAlert,
  handleRemoveSessionMetricCollector,
  handleRemoveTopicMetricCollector,
  handleSetMetricAlert,
  METRICS_FILTER_TYPES,
  METRICS_FORMATS,
  metricTools,
} from './tools/metrics.js';
import {
  ANONYMOUS_CONNECTION_ACTIONS,
  GLOBAL_PERMISSIONS,
  handleAddPrincipal,
  handleAssignPrincipalRoles,
  handleDeisolatePath,
  handleGetSecurity,
  handleGetSystemAuthentication,
  handleIgnoreClientProposedProperty,
  handleIsolatePath,
  handleLockRoleToPrincipal,
  handleRemovePrincipal,
  handleRemoveRolePathPermissions,
  handleSetAnonymousConnectionPolicy,
  handleSetPrincipalPassword,
  handleSetRoleDefaultPathPermissions,
  handleSetRoleGlobalPermissions,
  handleSetRoleIncludes,
  handleSetRolePathPermissions,
  handleSetRolesForAnonymousSessions,
  handleSetRolesForNamedSessions,
  handleTrustClientProposedProperty,
  PATH_PERMISSIONS,
  securityTools,
} from './tools/security.js';
import { handleGetSessionDetails, handleGetSessions, sessionTools } from './tools/sessions.js';
import {
  handleGetBranchMappingTable,
  handleListSessionTreeBranches,
  handlePutBranchMappingTable,
  handleRemoveBranchMappingTable,
  sessionTreeTools,
} from './tools/sessiontrees.js';
import {
  handleAddTopic,
  handleFetchTopic,
  handleFetchTopics,
  handleRemoveTopics,
  handleTimeSeriesValueRangeQuery,
  handleUpdateTopic,
  RANGE_QUERY_VALUE_TYPES,
  TIME_SERIES_EVENT_TYPES,
  TOPIC_TYPES,
  topicTools,
  UPDATABLE_TOPIC_TYPES,
} from './tools/topics.js';
import {
  CONNECTION_OPTIONS,
  handleCheckRemoteServer,
  handleCreateRemoteServer,
  handleCreateTopicView,
  handleGetTopicView,
  handleListRemoteServers,
  handleListTopicViews,
  handleRemoveRemoteServer,
  handleRemoveTopicView,
  REMOTE_SERVER_TYPES,
  topicViewTools,
} from './tools/views.js';
import type { ToolContext } from './utils.js';

/** Caller id used when the transport has no MCP session of its own. */
export const STDIO_CALLER_ID = 'stdio';

export function callerIdOf(extra: { sessionId?: string }): string {
  return extra.sessionId ?? STDIO_CALLER_ID;
}

export interface ServerDependencies {
  tools: ToolContext;
  guides: GuideLibrary;
}

export function createServer(deps: ServerDependencies): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerTools(server, deps);
  return server;
}

function registerTools(server: McpServer, { tools: ctx, guides }: ServerDependencies) {
  const name = z.string().min(1);

  // --- Connection ---

  server.tool(
    'connect',
    connectionTools.connect.description,
    {
      url: z.string().min(1).describe('Diffusion server URL, e.g. ws://localhost:8080 or wss://example.com'),
      principal: z.string().min(1).describe('Principal (user name) to authenticate as'),
      password: z.string().describe('Password for the principal'),
      sessionProperties: z
        .record(z.string())
        .optional()
        .describe('Optional user session properties, e.g. {"$Region": "EU"}'),
    },
    (args, extra) => handleConnect(ctx, callerIdOf(extra), args)
  );

  server.tool('disconnect', connectionTools.disconnect.description, (extra) => handleDisconnect(ctx, callerIdOf(extra)));

  // --- Topics ---

  server.tool(
    'add_topic',
    topicTools.add_topic.description,
    {
      topicPath: name.describe('Path of the topic to create'),
      type: z.enum(TOPIC_TYPES).optional().describe('Topic type (default JSON)'),
      initialValue: z.string().optional().describe('Optional initial value, as JSON for JSON topics'),
      compression: z.enum(['off', 'low', 'medium', 'high']).optional(),
      conflation: z.enum(['off', 'conflate', 'unsubscribe', 'always']).optional(),
      dontRetainValue: z.boolean().optional(),
      owner: z.string().optional().describe('Session property expression naming the topic owner'),
      persistent: z.boolean().optional(),
      priority: z.enum(['low', 'default', 'high']).optional(),
      publishValuesOnly: z.boolean().optional(),
      removal: z.string().optional().describe("Removal policy, e.g. 'when time after 1h'"),
      tidyOnUnsubscribe: z.boolean().optional(),
      timeSeriesEventValueType: z.enum(TIME_SERIES_EVENT_TYPES).optional().describe('Required for TIME_SERIES topics'),
      timeSeriesRetainedRange: z.string().optional(),
      timeSeriesSubscriptionRange: z.string().optional(),
      validateValues: z.boolean().optional(),
    },
    (args, extra) => handleAddTopic(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'remove_topics',
    topicTools.remove_topics.description,
    { topicSelector: name.describe('Selector of the topics to remove, e.g. >sensors//') },
    (args, extra) => handleRemoveTopics(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'update_topic',
    topicTools.update_topic.description,
    {
      topicPath: name.describe('Path of the topic to update'),
      type: z.enum(UPDATABLE_TOPIC_TYPES).optional().describe('Topic type (default JSON)'),
      value: z.string().describe('New value, as JSON for JSON topics'),
    },
    (args, extra) => handleUpdateTopic(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'fetch_topics',
    topicTools.fetch_topics.description,
    {
      topicSelector: z.string().optional().describe('Topic selector (default ?.*// for all topics)'),
      number: z.number().int().min(1).max(10_000).optional().describe('Maximum topics to return'),
      values: z.boolean().optional().describe('Include values (JSON topics only)'),
      after: z.string().optional().describe('Only topics after this path, for paging'),
    },
    (args, extra) => handleFetchTopics(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'fetch_topic',
    topicTools.fetch_topic.description,
    { topicPath: name.describe('Path of the topic to fetch') },
    (args, extra) => handleFetchTopic(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'time_series_value_range_query',
    topicTools.time_series_value_range_query.description,
    {
      topicPath: name.describe('Path of the time series topic'),
      eventValueType: z.enum(RANGE_QUERY_VALUE_TYPES).describe('Event value type of the time series'),
      fromSequence: z.number().int().min(0).optional().describe('Start at this sequence number'),
      fromTimestamp: z.string().optional().describe('Start at this ISO-8601 timestamp'),
      fromLast: z.number().int().min(1).optional().describe('Start this many events before the end'),
      toSequence: z.number().int().min(0).optional().describe('End at this sequence number'),
      toTimestamp: z.string().optional().describe('End at this ISO-8601 timestamp'),
      next: z.number().int().min(1).optional().describe('Select this many events from the start'),
      maxResults: z.number().int().min(1).max(1000).optional().describe('Maximum events to return (default 100)'),
    },
    (args, extra) => handleTimeSeriesValueRangeQuery(ctx, callerIdOf(extra), args)
  );

  // --- Sessions ---

  server.tool(
    'get_session_details',
    sessionTools.get_session_details.description,
    { sessionId: z.string().optional().describe('Session ID (default: your own session)') },
    (args, extra) => handleGetSessionDetails(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'get_sessions',
    sessionTools.get_sessions.description,
    { filter: z.string().optional().describe("Session filter, e.g. $Principal is 'admin'") },
    (args, extra) => handleGetSessions(ctx, callerIdOf(extra), args)
  );

  // --- Session trees ---

  const sessionTreeBranch = name.describe('Session tree branch path');

  server.tool(
    'put_branch_mapping_table',
    sessionTreeTools.put_branch_mapping_table.description,
    {
      sessionTreeBranch,
      branchMappings: z
        .array(
          z.object({
            sessionFilter: name.describe('Session filter selecting the sessions'),
            topicTreeBranch: name.describe('Topic tree branch those sessions see'),
          })
        )
        .min(1)
        .describe('Mappings in priority order'),
    },
    (args, extra) => handlePutBranchMappingTable(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'get_branch_mapping_table',
    sessionTreeTools.get_branch_mapping_table.description,
    { sessionTreeBranch },
    (args, extra) => handleGetBranchMappingTable(ctx, callerIdOf(extra), args)
  );

  server.tool('list_session_tree_branches', sessionTreeTools.list_session_tree_branches.description, (extra) =>
    handleListSessionTreeBranches(ctx, callerIdOf(extra))
  );

  server.tool(
    'remove_branch_mapping_table',
    sessionTreeTools.remove_branch_mapping_table.description,
    { sessionTreeBranch },
    (args, extra) => handleRemoveBranchMappingTable(ctx, callerIdOf(extra), args)
  );

  // --- Topic views and remote servers ---

  server.tool(
    'create_topic_view',
    topicViewTools.create_topic_view.description,
    {
      name: name.describe('Topic view name'),
      specification: name.describe('Topic view specification'),
    },
    (args, extra) => handleCreateTopicView(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'get_topic_view',
    topicViewTools.get_topic_view.description,
    { name: name.describe('Topic view name') },
    (args, extra) => handleGetTopicView(ctx, callerIdOf(extra), args)
  );

  server.tool('list_topic_views', topicViewTools.list_topic_views.description, (extra) =>
    handleListTopicViews(ctx, callerIdOf(extra))
  );

  server.tool(
    'remove_topic_view',
    topicViewTools.remove_topic_view.description,
    { name: name.describe('Topic view name') },
    (args, extra) => handleRemoveTopicView(ctx, callerIdOf(extra), args)
  );

  server.tool('list_remote_servers', topicViewTools.list_remote_servers.description, (extra) =>
    handleListRemoteServers(ctx, callerIdOf(extra))
  );

  server.tool(
    'create_remote_server',
    topicViewTools.create_remote_server.description,
    {
      type: z.enum(REMOTE_SERVER_TYPES).describe('Remote server type'),
      name: name.describe('Remote server name'),
      url: z.string().optional().describe('URL of the primary server (SECONDARY_INITIATOR)'),
      urls: z.array(z.string()).optional().describe('URLs of the secondary servers (PRIMARY_INITIATOR)'),
      connector: z.string().optional().describe('Connector the secondary servers connect to (PRIMARY_INITIATOR)'),
      primaryHostName: z.string().optional().describe('Host name of the primary server (SECONDARY_ACCEPTOR)'),
      principal: z.string().optional().describe('Principal the secondary server connects as'),
      password: z.string().optional().describe('Password for the principal'),
      connectionOptions: z
        .record(z.enum(CONNECTION_OPTIONS), z.string())
        .optional()
        .describe('Connection options, e.g. {"RECONNECTION_TIMEOUT": "60000"}'),
      missingTopicNotificationFilter: z.string().optional().describe('Topic selector for missing topic notifications'),
      retryDelay: z.number().int().min(0).optional().describe('Retry delay in milliseconds (PRIMARY_INITIATOR)'),
    },
    (args, extra) => handleCreateRemoteServer(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'check_remote_server',
    topicViewTools.check_remote_server.description,
    { name: name.describe('Remote server name') },
    (args, extra) => handleCheckRemoteServer(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'remove_remote_server',
    topicViewTools.remove_remote_server.description,
    { name: name.describe('Remote server name') },
    (args, extra) => handleRemoveRemoteServer(ctx, callerIdOf(extra), args)
  );

  // --- Metrics ---

  server.tool('list_session_metric_collectors', metricTools.list_session_metric_collectors.description, (extra) =>
    handleListSessionMetricCollectors(ctx, callerIdOf(extra))
  );

  server.tool('list_topic_metric_collectors', metricTools.list_topic_metric_collectors.description, (extra) =>
    handleListTopicMetricCollectors(ctx, callerIdOf(extra))
  );

  server.tool(
    'remove_session_metric_collector',
    metricTools.remove_session_metric_collector.description,
    { name: name.describe('Collector name') },
    (args, extra) => handleRemoveSessionMetricCollector(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'remove_topic_metric_collector',
    metricTools.remove_topic_metric_collector.description,
    { name: name.describe('Collector name') },
    (args, extra) => handleRemoveTopicMetricCollector(ctx, callerIdOf(extra), args)
  );

  const exportToPrometheus = z.boolean().optional().describe('Export the metrics to Prometheus (default false)');
  const maximumGroups = z.number().int().min(0).optional().describe('Maximum groups, 0 for unlimited (default)');

  server.tool(
    'create_session_metric_collector',
    metricTools.create_session_metric_collector.description,
    {
      name: name.describe('Collector name'),
      sessionFilter: name.describe('Session filter selecting the sessions, e.g. $ClientType is \'JAVA\''),
      groupByProperties: z.string().optional().describe('Comma-separated session property names to group by'),
      exportToPrometheus,
      maximumGroups,
      removeMetricsWithNoMatches: z.boolean().optional().describe('Remove groups with no matching sessions'),
    },
    (args, extra) => handleCreateSessionMetricCollector(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'create_topic_metric_collector',
    metricTools.create_topic_metric_collector.description,
    {
      name: name.describe('Collector name'),
      topicSelector: name.describe('Topic selector, e.g. ?sensors//'),
      exportToPrometheus,
      maximumGroups,
      groupByTopicType: z.boolean().optional().describe('Group metrics by topic type'),
      groupByTopicView: z.boolean().optional().describe('Group metrics by the topic view that created the topic'),
      groupByPathPrefixParts: z.number().int().min(0).optional().describe('Group by this many leading path parts'),
    },
    (args, extra) => handleCreateTopicMetricCollector(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'fetch_metrics',
    metricTools.fetch_metrics.description,
    {
      server: z.string().optional().describe("Server name, or 'current' for the connected server (default: all)"),
      filter: z.string().optional().describe('Comma-separated metric names, or a regular expression'),
      filterType: z.enum(METRICS_FILTER_TYPES).optional().describe("How to read the filter (default 'names')"),
      format: z.enum(METRICS_FORMATS).optional().describe("Result detail (default 'summary')"),
    },
    (args, extra) => handleFetchMetrics(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_metric_alert',
    metricTools.set_metric_alert.description,
    {
      name: name.describe('Alert name'),
      specification: name.describe('Alert specification'),
    },
    (args, extra) => handleSetMetricAlert(ctx, callerIdOf(extra), args)
  );

  server.tool('list_metric_alerts', metricTools.list_metric_alerts.description, (extra) =>
    handleListMetricAlerts(ctx, callerIdOf(extra))
  );

  server.tool(
    'remove_metric_alert',
    metricTools.remove_metric_alert.description,
    { name: name.describe('Alert name') },
    (args, extra) => handleRemoveMetricAlert(ctx, callerIdOf(extra), args)
  );

  // --- Security ---

  server.tool('get_security', securityTools.get_security.description, (extra) =>
    handleGetSecurity(ctx, callerIdOf(extra))
  );

  server.tool('get_system_authentication', securityTools.get_system_authentication.description, (extra) =>
    handleGetSystemAuthentication(ctx, callerIdOf(extra))
  );

  const roles = z.array(z.string()).describe('Role names; an empty list removes every role');

  server.tool(
    'set_roles_for_anonymous_sessions',
    securityTools.set_roles_for_anonymous_sessions.description,
    { roles },
    (args, extra) => handleSetRolesForAnonymousSessions(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_roles_for_named_sessions',
    securityTools.set_roles_for_named_sessions.description,
    { roles },
    (args, extra) => handleSetRolesForNamedSessions(ctx, callerIdOf(extra), args)
  );

  const roleName = name.describe('Role name');
  const path = z.string().describe('Topic path');
  const principalName = name.describe('Principal name');

  server.tool(
    'set_role_global_permissions',
    securityTools.set_role_global_permissions.description,
    { roleName, permissions: z.array(z.enum(GLOBAL_PERMISSIONS)).describe('Global permissions; empty removes all') },
    (args, extra) => handleSetRoleGlobalPermissions(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_role_default_path_permissions',
    securityTools.set_role_default_path_permissions.description,
    { roleName, permissions: z.array(z.enum(PATH_PERMISSIONS)).describe('Path permissions; empty removes all') },
    (args, extra) => handleSetRoleDefaultPathPermissions(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_role_path_permissions',
    securityTools.set_role_path_permissions.description,
    { roleName, path, permissions: z.array(z.enum(PATH_PERMISSIONS)).describe('Path permissions; empty denies all') },
    (args, extra) => handleSetRolePathPermissions(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'remove_role_path_permissions',
    securityTools.remove_role_path_permissions.description,
    { roleName, path },
    (args, extra) => handleRemoveRolePathPermissions(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_role_includes',
    securityTools.set_role_includes.description,
    { roleName, includedRoles: z.array(z.string()).describe('Roles to include; empty removes all') },
    (args, extra) => handleSetRoleIncludes(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'lock_role_to_principal',
    securityTools.lock_role_to_principal.description,
    { roleName, principalName },
    (args, extra) => handleLockRoleToPrincipal(ctx, callerIdOf(extra), args)
  );

  server.tool('isolate_path', securityTools.isolate_path.description, { path }, (args, extra) =>
    handleIsolatePath(ctx, callerIdOf(extra), args)
  );

  server.tool('deisolate_path', securityTools.deisolate_path.description, { path }, (args, extra) =>
    handleDeisolatePath(ctx, callerIdOf(extra), args)
  );

  const password = z.string().min(1).describe('Password');

  server.tool(
    'add_principal',
    securityTools.add_principal.description,
    {
      principalName,
      password,
      roles: z.array(z.string()).optional().describe('Roles assigned to the principal'),
      lockingPrincipal: z.string().optional().describe('Principal that alone may change this one'),
    },
    (args, extra) => handleAddPrincipal(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'assign_principal_roles',
    securityTools.assign_principal_roles.description,
    { principalName, roles: z.array(z.string()).describe('Roles replacing the current ones') },
    (args, extra) => handleAssignPrincipalRoles(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_principal_password',
    securityTools.set_principal_password.description,
    { principalName, password },
    (args, extra) => handleSetPrincipalPassword(ctx, callerIdOf(extra), args)
  );

  server.tool('remove_principal', securityTools.remove_principal.description, { principalName }, (args, extra) =>
    handleRemovePrincipal(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'set_anonymous_connection_policy',
    securityTools.set_anonymous_connection_policy.description,
    {
      action: z.enum(ANONYMOUS_CONNECTION_ACTIONS).describe('allow, deny or abstain'),
      roles: z.array(z.string()).optional().describe("Roles for anonymous sessions, required for 'allow'"),
    },
    (args, extra) => handleSetAnonymousConnectionPolicy(ctx, callerIdOf(extra), args)
  );

  const propertyName = name.describe('Session property name');

  server.tool(
    'trust_client_proposed_property',
    securityTools.trust_client_proposed_property.description,
    { propertyName, allowedValues: z.array(z.string()).min(1).max(20).describe('Values clients may propose') },
    (args, extra) => handleTrustClientProposedProperty(ctx, callerIdOf(extra), args)
  );

  server.tool(
    'ignore_client_proposed_property',
    securityTools.ignore_client_proposed_property.description,
    { propertyName },
    (args, extra) => handleIgnoreClientProposedProperty(ctx, callerIdOf(extra), args)
  );

  // --- Guides ---

  server.tool(
    'get_context',
    contextTools.get_context.description,
    { type: z.string().optional().describe("Guide name, e.g. 'introduction', 'topics' or 'security'") },
    (args) => handleGetContext(guides, args)
  );
}
