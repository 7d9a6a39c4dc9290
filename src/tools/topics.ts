import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ToolArgumentError } from '../errors.js';
import type {
  FetchedTopic,
  RangeAnchor,
  RangeQueryOutcome,
  RangeQueryRequest,
  RangeSpan,
  SessionProperties,
  TimeSeriesValueType,
  TopicTypeName,
} from '../types.js';
import { jsonResult, toolError, toolOperation, ToolResponse, trimmed, withSession, type ToolContext } from '../utils.js';

export const TOPIC_TYPES = ['STRING', 'JSON', 'BINARY', 'DOUBLE', 'INT64', 'TIME_SERIES'] as const;
export const UPDATABLE_TOPIC_TYPES = ['STRING', 'JSON', 'DOUBLE', 'INT64'] as const;
export const TIME_SERIES_EVENT_TYPES = ['string', 'json', 'binary', 'double', 'int64'] as const;
export const RANGE_QUERY_VALUE_TYPES = ['STRING', 'INT64', 'DOUBLE', 'JSON', 'BINARY'] as const;

export const DEFAULT_SELECTOR = '?.*//';
export const DEFAULT_NUMBER_WITH_VALUES = 100;
export const DEFAULT_NUMBER_WITHOUT_VALUES = 5000;
export const VALUE_TRUNCATE_LENGTH = 1000;
export const DEFAULT_MAX_RESULTS = 100;
export const EVENT_VALUE_TRUNCATE_LENGTH = 200;

export const topicTools = {
  add_topic: {
    description:
      'Creates a new topic on the connected Diffusion server with the specified path, type, properties, and optional initial value. ' +
      'Needs MODIFY_TOPIC permission for the topic path. ' +
      "See the 'topics' context for general information about topics and the 'topics_advanced' context for " +
      'details of the properties that can be supplied.',
  },
  remove_topics: {
    description:
      'Removes all topics matching a topic selector. Needs MODIFY_TOPIC permission for the topics. ' +
      "See the 'topic_selectors' context for the selector syntax. Returns the number of topics removed.",
  },
  update_topic: {
    description:
      'Sets the value of an existing STRING, JSON, DOUBLE or INT64 topic. Needs UPDATE_TOPIC permission for the topic path.',
  },
  fetch_topics: {
    description:
      'Lists the topics matching a topic selector, optionally with their values. ' +
      "Use 'after' with the last path returned to page through large topic trees.",
  },
  fetch_topic: {
    description: 'Fetches a single topic and its current value. Values are returned for JSON topics.',
  },
  time_series_value_range_query: {
    description:
      'Queries a time series topic for a range of values (the merged view with the latest edits). ' +
      'The range starts at fromSequence, fromTimestamp or the last fromLast events (default: the start of the series) ' +
      'and ends at toSequence, toTimestamp or after next events (default: the end). ' +
      "Needs READ_TOPIC permission, and QUERY_OBSOLETE_TIME_SERIES_EVENTS to see edited events. See the 'topics_advanced' context.",
  },
};

export interface AddTopicArgs {
  topicPath: string;
  type?: (typeof TOPIC_TYPES)[number];
  initialValue?: string;
  compression?: string;
  conflation?: string;
  dontRetainValue?: boolean;
  owner?: string;
  persistent?: boolean;
  priority?: string;
  publishValuesOnly?: boolean;
  removal?: string;
  tidyOnUnsubscribe?: boolean;
  timeSeriesEventValueType?: (typeof TIME_SERIES_EVENT_TYPES)[number];
  timeSeriesRetainedRange?: string;
  timeSeriesSubscriptionRange?: string;
  validateValues?: boolean;
}

const PERIOD_UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Rewrite every relative `time after <n><unit>` clause of a removal policy
 * into the absolute `time after <epoch millis>` form the server accepts.
 * Other clauses and absolute times are left as written.
 */
export function parseRemovalPolicy(removal: string, now: number = Date.now()): string {
  return removal.replace(/\btime\s+after\s+(\d+)\s*([smhd])\b/gi, (_match, amount: string, unit: string) => {
    const count = Number(amount);
    if (count <= 0) {
      throw new ToolArgumentError(`Invalid period: ${count}. Period must be positive`);
    }
    const unitMs = PERIOD_UNIT_MS[unit.toLowerCase()] ?? PERIOD_UNIT_MS.s;
    return `time after ${now + count * unitMs}`;
  });
}

/**
 * Topic specification properties for the supplied arguments. Only values
 * that differ from the server defaults are included.
 */
export function topicProperties(type: TopicTypeName, args: AddTopicArgs, now: number = Date.now()): SessionProperties {
  const properties: SessionProperties = {};
  const put = (key: string, value: string | undefined) => {
    if (value !== undefined) properties[key] = value;
  };

  put('COMPRESSION', trimmed(args.compression));
  put('CONFLATION', trimmed(args.conflation));
  if (args.dontRetainValue === true) put('DONT_RETAIN_VALUE', 'true');
  put('OWNER', trimmed(args.owner));
  if (args.persistent === false) put('PERSISTENT', 'false');
  put('PRIORITY', trimmed(args.priority));
  if (args.publishValuesOnly === true) put('PUBLISH_VALUES_ONLY', 'true');
  const removal = trimmed(args.removal);
  if (removal !== undefined) put('REMOVAL', parseRemovalPolicy(removal, now));
  if (args.tidyOnUnsubscribe === true) put('TIDY_ON_UNSUBSCRIBE', 'true');
  if (args.validateValues === true) put('VALIDATE_VALUES', 'true');

  if (type === 'TIME_SERIES') {
    const eventType = trimmed(args.timeSeriesEventValueType);
    if (eventType === undefined) {
      throw new ToolArgumentError('Event value type must be specified for a time series topic');
    }
    put('TIME_SERIES_EVENT_VALUE_TYPE', eventType);
    put('TIME_SERIES_RETAINED_RANGE', trimmed(args.timeSeriesRetainedRange));
    put('TIME_SERIES_SUBSCRIPTION_RANGE', trimmed(args.timeSeriesSubscriptionRange));
  }

  return properties;
}

/**
 * Check that a string value can be written to a topic of the given type.
 */
export function validateTopicValue(type: TopicTypeName, value: string): void {
  switch (type) {
    case 'STRING':
      return;
    case 'JSON':
      try {
        JSON.parse(value);
      } catch {
        throw new ToolArgumentError(`Value is not valid JSON: ${value}`);
      }
      return;
    case 'DOUBLE':
      if (value.trim() === '' || !Number.isFinite(Number(value))) {
        throw new ToolArgumentError(`Value is not a valid double: ${value}`);
      }
      return;
    case 'INT64':
      if (!/^-?\d+$/.test(value.trim())) {
        throw new ToolArgumentError(`Value is not a valid int64: ${value}`);
      }
      return;
    default:
      throw new ToolArgumentError(`Values cannot be set for ${type} topics by this tool`);
  }
}

export async function handleAddTopic(ctx: ToolContext, callerId: string, args: AddTopicArgs): Promise<CallToolResult> {
  const topicPath = args.topicPath.trim();
  const type: TopicTypeName = args.type ?? 'JSON';
  const operation = toolOperation('add_topic', topicPath);

  let properties: SessionProperties;
  try {
    properties = topicProperties(type, args);
    if (args.initialValue !== undefined) validateTopicValue(type, args.initialValue);
  } catch (error) {
    if (error instanceof ToolArgumentError) return toolError(`Invalid specification : ${error.message}`);
    throw error;
  }

  ctx.logger.info('add_topic_started', { topicPath, type });

  return withSession(ctx, callerId, operation, async (session) => {
    const outcome = await session.topicsApi().add(topicPath, type, properties, args.initialValue);
    ctx.logger.info('add_topic_completed', { topicPath, added: outcome.added });
    return jsonResult({
      path: topicPath,
      type,
      created: outcome.added,
      ...(Object.keys(properties).length > 0 ? { properties } : {}),
      ...(args.initialValue !== undefined ? { initialValue: args.initialValue } : {}),
    });
  });
}

export async function handleRemoveTopics(
  ctx: ToolContext,
  callerId: string,
  args: { topicSelector: string }
): Promise<CallToolResult> {
  const topicSelector = args.topicSelector.trim();
  return withSession(ctx, callerId, toolOperation('remove_topics', topicSelector), async (session) => {
    const removedCount = await session.topicsApi().remove(topicSelector);
    ctx.logger.info('remove_topics_completed', { topicSelector, removedCount });
    return jsonResult({ topicSelector, removedCount });
  });
}

export async function handleUpdateTopic(
  ctx: ToolContext,
  callerId: string,
  args: { topicPath: string; type?: (typeof UPDATABLE_TOPIC_TYPES)[number]; value: string }
): Promise<CallToolResult> {
  const topicPath = args.topicPath.trim();
  const type: TopicTypeName = args.type ?? 'JSON';
  try {
    validateTopicValue(type, args.value);
  } catch (error) {
    if (error instanceof ToolArgumentError) return toolError(`Invalid value : ${error.message}`);
    throw error;
  }

  return withSession(ctx, callerId, toolOperation('update_topic', topicPath), async (session) => {
    await session.topicsApi().set(topicPath, type, args.value);
    return jsonResult({ path: topicPath, type, updated: true });
  });
}

function formatValue(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  if (text === undefined) return 'undefined';
  return text.length > VALUE_TRUNCATE_LENGTH ? `${text.slice(0, VALUE_TRUNCATE_LENGTH)}... (truncated)` : text;
}

function describeTopic(response: ToolResponse, index: number, topic: FetchedTopic, withValues: boolean): void {
  response.addLine(`${index}. ${topic.path} (${topic.type})`);
  if (withValues && topic.value !== undefined) {
    response.addLine(`   Value: ${formatValue(topic.value)}`);
  }
}

export async function handleFetchTopics(
  ctx: ToolContext,
  callerId: string,
  args: { topicSelector?: string; number?: number; values?: boolean; after?: string }
): Promise<CallToolResult> {
  const topicSelector = trimmed(args.topicSelector) ?? DEFAULT_SELECTOR;
  const withValues = args.values === true;
  const limit = args.number ?? (withValues ? DEFAULT_NUMBER_WITH_VALUES : DEFAULT_NUMBER_WITHOUT_VALUES);
  const after = trimmed(args.after);

  return withSession(ctx, callerId, toolOperation('fetch_topics', topicSelector), async (session) => {
    const outcome = await session.topicsApi().fetch(topicSelector, {
      limit,
      withValues,
      ...(after !== undefined ? { after } : {}),
    });

    const response = new ToolResponse()
      .addLine(`=== Topics matching ${topicSelector} ===`)
      .addLine(`Total: ${outcome.topics.length}${outcome.hasMore ? ' (more available)' : ''}`)
      .addLine();

    if (outcome.topics.length === 0) {
      response.addLine('No topics found.');
    }
    outcome.topics.forEach((topic, i) => describeTopic(response, i + 1, topic, withValues));

    const last = outcome.topics[outcome.topics.length - 1];
    if (outcome.hasMore && last) {
      response.addLine().addLine(`More topics are available. Fetch again with after='${last.path}'.`);
    }
    return response.toResult();
  });
}

export async function handleFetchTopic(
  ctx: ToolContext,
  callerId: string,
  args: { topicPath: string }
): Promise<CallToolResult> {
  const topicPath = args.topicPath.trim();
  // A path selector matches exactly the one topic.
  const selector = `>${topicPath}`;

  return withSession(ctx, callerId, toolOperation('fetch_topic', topicPath), async (session) => {
    const outcome = await session.topicsApi().fetch(selector, { limit: 1, withValues: true });
    const topic = outcome.topics[0];
    if (!topic) {
      return toolError(`Topic not found or not a JSON topic: ${topicPath}`);
    }
    return jsonResult({
      path: topic.path,
      type: topic.type,
      ...(topic.value !== undefined ? { value: topic.value } : {}),
    });
  });
}

export interface RangeQueryArgs {
  topicPath: string;
  eventValueType: TimeSeriesValueType;
  fromSequence?: number;
  fromTimestamp?: string;
  fromLast?: number;
  toSequence?: number;
  toTimestamp?: string;
  next?: number;
  maxResults?: number;
}

function parseTimestamp(name: string, value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ToolArgumentError(`${name} is not an ISO-8601 timestamp: ${value}`);
  }
  return date;
}

/**
 * The query range from the arguments. The first anchor given of fromSequence,
 * fromTimestamp and fromLast wins, likewise toSequence, toTimestamp and next
 * for the span.
 */
export function rangeQueryRequest(args: RangeQueryArgs): RangeQueryRequest {
  let anchor: RangeAnchor = { kind: 'start' };
  if (args.fromSequence !== undefined) anchor = { kind: 'sequence', sequence: args.fromSequence };
  else if (args.fromTimestamp !== undefined) anchor = { kind: 'timestamp', timestamp: parseTimestamp('fromTimestamp', args.fromTimestamp) };
  else if (args.fromLast !== undefined) anchor = { kind: 'last', count: args.fromLast };

  let span: RangeSpan | undefined;
  if (args.toSequence !== undefined) span = { kind: 'sequence', sequence: args.toSequence };
  else if (args.toTimestamp !== undefined) span = { kind: 'timestamp', timestamp: parseTimestamp('toTimestamp', args.toTimestamp) };
  else if (args.next !== undefined) span = { kind: 'next', count: args.next };

  return {
    valueType: args.eventValueType,
    anchor,
    ...(span ? { span } : {}),
    limit: args.maxResults ?? DEFAULT_MAX_RESULTS,
  };
}

function formatRangeQuery(topicPath: string, valueType: TimeSeriesValueType, outcome: RangeQueryOutcome): ToolResponse {
  const response = new ToolResponse()
    .addLine('=== Time Series Query Results ===')
    .addLine(`Topic: ${topicPath}`)
    .addLine(`Event Value Type: ${valueType}`)
    .addLine(`Selected Events: ${outcome.selectedCount}`)
    .addLine(`Complete: ${outcome.isComplete ? 'Yes' : 'No'}`)
    .addLine();

  if (outcome.events.length === 0) {
    return response.addLine('No events found in the specified range.');
  }

  response.addLine('Events').addLine();
  for (const event of outcome.events) {
    response
      .addLine(`Sequence: ${event.sequence}`)
      .addLine(`  Timestamp: ${new Date(event.timestamp).toISOString()} (${event.timestamp})`)
      .addLine(`  Author: ${event.author}`);
    if (event.originalSequence !== null) {
      response.addLine(`  [Edited - Original Sequence: ${event.originalSequence}]`);
    }
    const value = event.value ?? '<null>';
    response.addLine(
      value.length > EVENT_VALUE_TRUNCATE_LENGTH
        ? `  Value: ${value.slice(0, EVENT_VALUE_TRUNCATE_LENGTH)}... (${value.length} chars)`
        : `  Value: ${value}`
    );
    response.addLine();
  }

  if (!outcome.isComplete) {
    response
      .addLine(`... and ${outcome.selectedCount - outcome.events.length} more events not shown.`)
      .addLine('Increase maxResults parameter to see more.');
  }
  return response;
}

export async function handleTimeSeriesValueRangeQuery(
  ctx: ToolContext,
  callerId: string,
  args: RangeQueryArgs
): Promise<CallToolResult> {
  const topicPath = args.topicPath.trim();

  let request: RangeQueryRequest;
  try {
    request = rangeQueryRequest(args);
  } catch (error) {
    if (error instanceof ToolArgumentError) return toolError(`Invalid query parameters: ${error.message}`);
    throw error;
  }

  ctx.logger.info('time_series_query_started', { topicPath, eventValueType: request.valueType });

  return withSession(ctx, callerId, toolOperation('time_series_value_range_query', topicPath), async (session) => {
    const outcome = await session.timeSeriesApi().rangeQuery(topicPath, request);
    ctx.logger.info('time_series_query_completed', { topicPath, selectedCount: outcome.selectedCount });
    return formatRangeQuery(topicPath, request.valueType, outcome).toResult();
  });
}
