import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolArgumentError } from '../errors.js';
import type {
  MetricCollectionInfo,
  MetricsQuery,
  SessionMetricCollectorInfo,
  TopicMetricCollectorInfo,
} from '../types.js';
import { jsonResult, toolError, toolOperation, ToolResponse, trimmed, withSession, type ToolContext } from '../utils.js';

export const METRICS_FILTER_TYPES = ['names', 'regex'] as const;
export const METRICS_FORMATS = ['summary', 'detailed'] as const;

export const metricTools = {
  create_session_metric_collector: {
    description:
      'Creates a session metric collector, or replaces one with the same name. Needs CONTROL_SERVER permission. ' +
      "Consult the 'metrics' context before creating collectors and the 'sessions' context for session filters.",
  },
  create_topic_metric_collector: {
    description:
      'Creates a topic metric collector, or replaces one with the same name. Needs CONTROL_SERVER permission. ' +
      "Consult the 'metrics' context before creating collectors and the 'topic_selectors' context for selectors.",
  },
  fetch_metrics: {
    description:
      'Fetches metrics from the server, optionally from one server and filtered by metric name or regular expression. ' +
      "Needs VIEW_SERVER permission. See the 'metrics' context.",
  },
  set_metric_alert: {
    description:
      'Creates or replaces a metric alert written in the metric alert DSL. Needs CONTROL_SERVER permission. ' +
      "Use fetch_metrics to see which metrics exist and the 'metrics' context for the DSL.",
  },
  list_metric_alerts: {
    description: "Lists the metric alerts configured on the server. Needs VIEW_SERVER permission. See the 'metrics' context.",
  },
  remove_metric_alert: {
    description: 'Removes a named metric alert. Removing an alert that does not exist succeeds. Needs CONTROL_SERVER permission.',
  },
  list_session_metric_collectors: {
    description: "Lists the session metric collectors configured on the server. See the 'metrics' context.",
  },
  list_topic_metric_collectors: {
    description: "Lists the topic metric collectors configured on the server. See the 'metrics' context.",
  },
  remove_session_metric_collector: {
    description: 'Removes a named session metric collector.',
  },
  remove_topic_metric_collector: {
    description: 'Removes a named topic metric collector.',
  },
};

export async function handleListSessionMetricCollectors(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_session_metric_collectors', async (session) => {
    const collectors = await session.metricsApi().listSessionCollectors();
    return jsonResult({ count: collectors.length, collectors });
  });
}

export async function handleListTopicMetricCollectors(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_topic_metric_collectors', async (session) => {
    const collectors = await session.metricsApi().listTopicCollectors();
    return jsonResult({ count: collectors.length, collectors });
  });
}

export async function handleRemoveSessionMetricCollector(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('remove_session_metric_collector', name), async (session) => {
    await session.metricsApi().removeSessionCollector(name);
    return jsonResult({ name, removed: true });
  });
}

export async function handleRemoveTopicMetricCollector(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('remove_topic_metric_collector', name), async (session) => {
    await session.metricsApi().removeTopicCollector(name);
    return jsonResult({ name, removed: true });
  });
}

export interface CreateSessionMetricCollectorArgs {
  name: string;
  sessionFilter: string;
  /** Comma-separated session property names. */
  groupByProperties?: string;
  exportToPrometheus?: boolean;
  maximumGroups?: number;
  removeMetricsWithNoMatches?: boolean;
}

function maximumGroupsText(maximumGroups: number): string {
  return maximumGroups > 0 ? String(maximumGroups) : 'unlimited';
}

export function splitPropertyNames(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export async function handleCreateSessionMetricCollector(
  ctx: ToolContext,
  callerId: string,
  args: CreateSessionMetricCollectorArgs
): Promise<CallToolResult> {
  const collector: SessionMetricCollectorInfo = {
    name: args.name.trim(),
    sessionFilter: args.sessionFilter.trim(),
    exportToPrometheus: args.exportToPrometheus === true,
    maximumGroups: args.maximumGroups ?? 0,
    groupByProperties: splitPropertyNames(args.groupByProperties),
    removeMetricsWithNoMatches: args.removeMetricsWithNoMatches === true,
  };

  return withSession(ctx, callerId, toolOperation('create_session_metric_collector', collector.name), async (session) => {
    await session.metricsApi().putSessionCollector(collector);
    ctx.logger.info('session_metric_collector_created', { name: collector.name });

    const response = new ToolResponse()
      .addLine('Successfully created session metric collector:')
      .addLine(`  Name: ${collector.name}`)
      .addLine(`  Session Filter: ${collector.sessionFilter}`)
      .addLine(`  Exports to Prometheus: ${collector.exportToPrometheus}`)
      .addLine(`  Maximum Groups: ${maximumGroupsText(collector.maximumGroups)}`)
      .addLine(`  Removes Metrics with No Matches: ${collector.removeMetricsWithNoMatches}`);
    if (collector.groupByProperties.length > 0) {
      response.addLine(`  Group By Properties: ${collector.groupByProperties.join(', ')}`);
    }
    return response.addLine('The collector is now active and collecting metrics for matching sessions.').toResult();
  });
}

export interface CreateTopicMetricCollectorArgs {
  name: string;
  topicSelector: string;
  exportToPrometheus?: boolean;
  maximumGroups?: number;
  groupByTopicType?: boolean;
  groupByTopicView?: boolean;
  groupByPathPrefixParts?: number;
}

export async function handleCreateTopicMetricCollector(
  ctx: ToolContext,
  callerId: string,
  args: CreateTopicMetricCollectorArgs
): Promise<CallToolResult> {
  const collector: TopicMetricCollectorInfo = {
    name: args.name.trim(),
    topicSelector: args.topicSelector.trim(),
    exportToPrometheus: args.exportToPrometheus === true,
    maximumGroups: args.maximumGroups ?? 0,
    groupByTopicType: args.groupByTopicType === true,
    groupByTopicView: args.groupByTopicView === true,
    groupByPathPrefixParts: args.groupByPathPrefixParts ?? 0,
  };

  return withSession(ctx, callerId, toolOperation('create_topic_metric_collector', collector.name), async (session) => {
    await session.metricsApi().putTopicCollector(collector);
    ctx.logger.info('topic_metric_collector_created', { name: collector.name });

    const response = new ToolResponse()
      .addLine('Successfully created topic metric collector:')
      .addLine(`  Name: ${collector.name}`)
      .addLine(`  Topic Selector: ${collector.topicSelector}`)
      .addLine(`  Exports to Prometheus: ${collector.exportToPrometheus}`)
      .addLine(`  Maximum Groups: ${maximumGroupsText(collector.maximumGroups)}`)
      .addLine(`  Groups by Topic Type: ${collector.groupByTopicType}`)
      .addLine(`  Groups by Topic View: ${collector.groupByTopicView}`);
    if (collector.groupByPathPrefixParts > 0) {
      response.addLine(`  Groups by Path Prefix Parts: ${collector.groupByPathPrefixParts}`);
    }
    return response.addLine('The collector is now active and collecting metrics for matching topics.').toResult();
  });
}

export interface FetchMetricsArgs {
  server?: string;
  filter?: string;
  filterType?: (typeof METRICS_FILTER_TYPES)[number];
  format?: (typeof METRICS_FORMATS)[number];
}

export function metricsQuery(args: FetchMetricsArgs): MetricsQuery {
  const query: MetricsQuery = {};
  const server = trimmed(args.server);
  if (server !== undefined) query.server = server.toLowerCase() === 'current' ? 'current' : server;

  const filter = trimmed(args.filter);
  if (filter === undefined) return query;
  if (args.filterType === 'regex') {
    try {
      query.filter = { kind: 'regex', pattern: new RegExp(filter) };
    } catch (error) {
      throw new ToolArgumentError(`Invalid regex pattern: ${error instanceof Error ? error.message : String(error)}`);
    }
  } else {
    query.filter = { kind: 'names', names: [...new Set(splitPropertyNames(filter))] };
  }
  return query;
}

function collectionSummary(collection: MetricCollectionInfo) {
  return { name: collection.name, type: collection.type, unit: collection.unit, sampleCount: collection.samples.length };
}

export async function handleFetchMetrics(
  ctx: ToolContext,
  callerId: string,
  args: FetchMetricsArgs
): Promise<CallToolResult> {
  const format = args.format ?? 'summary';
  let query: MetricsQuery;
  try {
    query = metricsQuery(args);
  } catch (error) {
    if (error instanceof ToolArgumentError) return toolError(`Invalid arguments: ${error.message}`);
    throw error;
  }

  return withSession(ctx, callerId, 'fetch_metrics', async (session) => {
    const metrics = await session.metricsApi().fetch(query);

    let totalCollections = 0;
    let totalSamples = 0;
    const servers: Record<string, unknown> = {};
    for (const [server, collections] of metrics) {
      totalCollections += collections.length;
      totalSamples += collections.reduce((sum, collection) => sum + collection.samples.length, 0);
      servers[server] =
        format === 'detailed'
          ? {
              collectionCount: collections.length,
              collections: collections.map((collection) => ({
                ...collectionSummary(collection),
                samples: collection.samples,
              })),
            }
          : { collectionCount: collections.length, summary: collections.map(collectionSummary) };
    }

    ctx.logger.debug('metrics_fetched', { serverCount: metrics.size, totalCollections });
    return jsonResult({ serverCount: metrics.size, format, servers, totalCollections, totalSamples });
  });
}

export async function handleSetMetricAlert(
  ctx: ToolContext,
  callerId: string,
  args: { name: string; specification: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  const specification = args.specification.trim();
  return withSession(ctx, callerId, toolOperation('set_metric_alert', name), async (session) => {
    await session.metricsApi().setAlert(name, specification);
    ctx.logger.info('metric_alert_set', { name });
    return new ToolResponse()
      .addLine('Successfully set metric alert:')
      .addLine(`  Name: ${name}`)
      .addLine(`  Specification: ${specification}`)
      .addLine()
      .addLine('The alert is now active and will trigger when conditions are met.')
      .toResult();
  });
}

export async function handleListMetricAlerts(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_metric_alerts', async (session) => {
    const alerts = await session.metricsApi().listAlerts();
    if (alerts.length === 0) return jsonResult({ count: 0, message: 'No metric alerts configured' });
    return jsonResult({ count: alerts.length, alerts });
  });
}

export async function handleRemoveMetricAlert(
  ctx: ToolContext,
  callerId: string,
  args: { name: string }
): Promise<CallToolResult> {
  const name = args.name.trim();
  return withSession(ctx, callerId, toolOperation('remove_metric_alert', name), async (session) => {
    await session.metricsApi().removeAlert(name);
    return new ToolResponse()
      .addLine(`Successfully removed metric alert: ${name}`)
      .addLine()
      .addLine('The alert has been removed and will no longer trigger.')
      .toResult();
  });
}
