import { setTimeout as sleep } from 'timers/promises';
import diffusion from 'diffusion';
import type {
  BranchMappingTable,
  ConnectionOption,
  Event as TimeSeriesEvent,
  MetricSampleCollection,
  PrimaryInitiator,
  RangeQuery,
  RemoteServer,
  SecondaryAcceptor,
  SecondaryBuilder,
  SecurityScriptBuilder,
  Session,
  SessionEvent,
  SystemAuthenticationScriptBuilder,
  TopicType,
  TopicView,
} from 'diffusion';
import { ToolArgumentError } from '../errors.js';
import type { StructuredLogger } from '../logger.js';
import { createNullLogger } from '../logger.js';
import type {
  AuthenticationChange,
  BranchMappingTableInfo,
  ClientsApi,
  ConnectionOptionName,
  ConnectRequest,
  DiffusionSession,
  FetchOptions,
  FetchOutcome,
  MetricCollectionInfo,
  MetricsApi,
  RangeQueryRequest,
  RemoteServerDefinition,
  RemoteServerInfo,
  RemoteServersApi,
  SecondaryServerOptions,
  SecurityApi,
  SecurityChange,
  SessionFactory,
  SessionProperties,
  SessionState,
  SessionTreesApi,
  TimeSeriesApi,
  TimeSeriesEventInfo,
  TimeSeriesValueType,
  TopicsApi,
  TopicTypeName,
  TopicViewInfo,
  TopicViewsApi,
} from '../types.js';

/** How long `listSessions` waits for further session events before answering. */
export const SESSION_EVENTS_QUIET_MS = 100;

export interface ConnectionOptions {
  host: string;
  port: number;
  secure: boolean;
  path?: string;
  principal: string;
  credentials: string;
  properties?: SessionProperties;
}

const SCHEMES: Record<string, { secure: boolean; port: number }> = {
  'ws:': { secure: false, port: 80 },
  'http:': { secure: false, port: 80 },
  'wss:': { secure: true, port: 443 },
  'https:': { secure: true, port: 443 },
};

/**
 * Turn a server URL such as `wss://example.com:8443/diffusion` into client
 * connection options.
 */
export function connectionOptions(request: Pick<ConnectRequest, 'url' | 'principal' | 'password' | 'properties'>): ConnectionOptions {
  let url: URL;
  try {
    url = new URL(request.url);
  } catch {
    throw new ToolArgumentError(`Invalid URL: ${request.url}`);
  }
  const scheme = SCHEMES[url.protocol];
  if (!scheme) {
    throw new ToolArgumentError(`Unsupported URL scheme ${url.protocol} (use ws, wss, http or https)`);
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : scheme.port,
    secure: scheme.secure,
    ...(url.pathname && url.pathname !== '/' ? { path: url.pathname } : {}),
    principal: request.principal,
    credentials: request.password,
    ...(request.properties ? { properties: request.properties } : {}),
  };
}

function topicTypeName(type: TopicType): TopicTypeName {
  const { TopicType: types } = diffusion.topics;
  if (type === types.STRING) return 'STRING';
  if (type === types.JSON) return 'JSON';
  if (type === types.BINARY) return 'BINARY';
  if (type === types.DOUBLE) return 'DOUBLE';
  if (type === types.INT64) return 'INT64';
  if (type === types.TIME_SERIES) return 'TIME_SERIES';
  return 'UNKNOWN';
}

function topicTypeFor(name: TopicTypeName): TopicType {
  const { TopicType: types } = diffusion.topics;
  switch (name) {
    case 'STRING':
      return types.STRING;
    case 'BINARY':
      return types.BINARY;
    case 'DOUBLE':
      return types.DOUBLE;
    case 'INT64':
      return types.INT64;
    case 'TIME_SERIES':
      return types.TIME_SERIES;
    case 'JSON':
      return types.JSON;
    default:
      throw new ToolArgumentError(`Unsupported topic type: ${name}`);
  }
}

/** Sets and Maps in server configuration objects become arrays and objects. */
export function toPlain(value: unknown): unknown {
  if (value instanceof Set) return [...value].map(toPlain);
  if (value instanceof Map) {
    return Object.fromEntries([...value.entries()].map(([key, entry]) => [String(key), toPlain(entry)]));
  }
  if (Array.isArray(value)) return value.map(toPlain);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toPlain(entry)]));
  }
  return value;
}

function viewInfo(view: TopicView): TopicViewInfo {
  return { name: view.name, specification: view.specification, roles: [...view.roles] };
}

function tableInfo(table: BranchMappingTable): BranchMappingTableInfo {
  return {
    sessionTreeBranch: table.getSessionTreeBranch(),
    mappings: table
      .getBranchMappings()
      .map((mapping) => ({ sessionFilter: mapping.sessionFilter, topicTreeBranch: mapping.topicTreeBranch })),
  };
}

function collectionInfo(collection: MetricSampleCollection): MetricCollectionInfo {
  return {
    name: collection.name,
    type: diffusion.MetricType[collection.type] ?? String(collection.type),
    unit: collection.unit,
    samples: collection.samples.map((sample) => {
      const labels: Record<string, string> = {};
      sample.labelNames.forEach((label, i) => {
        const value = sample.labelValues[i];
        if (value !== undefined) labels[label] = value;
      });
      return {
        name: sample.name,
        value: sample.value,
        ...(sample.timestamp !== undefined ? { timestamp: sample.timestamp.toNumber() } : {}),
        labels,
      };
    }),
  };
}

function connectionOptionNames(options: RemoteServer['connectionOptions'] | undefined): Record<string, string> {
  const named: Record<string, string> = {};
  if (!options) return named;
  for (const [key, value] of Object.entries(options)) {
    named[diffusion.ConnectionOption[Number(key)] ?? key] = String(value);
  }
  return named;
}

function isPrimaryInitiator(server: RemoteServer): server is PrimaryInitiator {
  return server.type === diffusion.RemoteServerType.PRIMARY_INITIATOR;
}

function isSecondaryAcceptor(server: RemoteServer): server is SecondaryAcceptor {
  return server.type === diffusion.RemoteServerType.SECONDARY_ACCEPTOR;
}

function remoteServerInfo(server: RemoteServer): RemoteServerInfo {
  const info: RemoteServerInfo = {
    name: server.name,
    type: diffusion.RemoteServerType[server.type] ?? String(server.type),
  };
  if (isPrimaryInitiator(server)) {
    info.urls = [...server.urls];
    if (server.connector) info.connector = server.connector;
    info.retryDelay = server.getRetryDelay();
    return info;
  }
  if (isSecondaryAcceptor(server)) info.primaryHostName = server.primaryHostName;
  else info.url = server.url;
  if (server.principal) info.principal = server.principal;
  if (server.missingTopicNotificationFilter) info.missingTopicNotificationFilter = server.missingTopicNotificationFilter;
  const options = connectionOptionNames(server.connectionOptions);
  if (Object.keys(options).length > 0) info.connectionOptions = options;
  return info;
}

function connectionOptionFor(name: ConnectionOptionName): ConnectionOption {
  const { ConnectionOption: option } = diffusion;
  switch (name) {
    case 'CONNECTION_TIMEOUT':
      return option.CONNECTION_TIMEOUT;
    case 'INPUT_BUFFER_SIZE':
      return option.INPUT_BUFFER_SIZE;
    case 'MAXIMUM_QUEUE_SIZE':
      return option.MAXIMUM_QUEUE_SIZE;
    case 'OUTPUT_BUFFER_SIZE':
      return option.OUTPUT_BUFFER_SIZE;
    case 'RECONNECTION_TIMEOUT':
      return option.RECONNECTION_TIMEOUT;
    case 'RECOVERY_BUFFER_SIZE':
      return option.RECOVERY_BUFFER_SIZE;
    case 'RETRY_DELAY':
      return option.RETRY_DELAY;
    case 'WRITE_TIMEOUT':
      return option.WRITE_TIMEOUT;
  }
}

function applySecondaryOptions<B extends SecondaryBuilder<B>>(builder: B, options: SecondaryServerOptions): B {
  let result = builder;
  if (options.principal !== undefined) result = result.principal(options.principal);
  if (options.password !== undefined) result = result.credentials(options.password);
  for (const [name, value] of Object.entries(options.connectionOptions)) {
    if (value !== undefined && isConnectionOptionName(name)) {
      result = result.connectionOption(connectionOptionFor(name), value);
    }
  }
  if (options.missingTopicNotificationFilter !== undefined) {
    result = result.missingTopicNotificationFilter(options.missingTopicNotificationFilter);
  }
  return result;
}

const CONNECTION_OPTION_NAMES: readonly string[] = [
  'CONNECTION_TIMEOUT',
  'INPUT_BUFFER_SIZE',
  'MAXIMUM_QUEUE_SIZE',
  'OUTPUT_BUFFER_SIZE',
  'RECONNECTION_TIMEOUT',
  'RECOVERY_BUFFER_SIZE',
  'RETRY_DELAY',
  'WRITE_TIMEOUT',
];

function isConnectionOptionName(name: string): name is ConnectionOptionName {
  return CONNECTION_OPTION_NAMES.includes(name);
}

function remoteServerDefinition(definition: RemoteServerDefinition) {
  const { RemoteServerType: types } = diffusion;
  switch (definition.type) {
    case 'PRIMARY_INITIATOR':
      return diffusion
        .newRemoteServerBuilder(types.PRIMARY_INITIATOR)
        .retryDelay(definition.retryDelay)
        .build(definition.name, definition.urls, definition.connector);
    case 'SECONDARY_INITIATOR':
      return applySecondaryOptions(diffusion.newRemoteServerBuilder(types.SECONDARY_INITIATOR), definition).build(
        definition.name,
        definition.url
      );
    case 'SECONDARY_ACCEPTOR':
      return applySecondaryOptions(diffusion.newRemoteServerBuilder(types.SECONDARY_ACCEPTOR), definition).build(
        definition.name,
        definition.primaryHostName
      );
  }
}

function securityScript(builder: SecurityScriptBuilder, change: SecurityChange): string {
  switch (change.kind) {
    case 'rolesForAnonymousSessions':
      return builder.setRolesForAnonymousSessions(change.roles).build();
    case 'rolesForNamedSessions':
      return builder.setRolesForNamedSessions(change.roles).build();
    case 'globalPermissions':
      return builder.setGlobalPermissions(change.role, change.permissions).build();
    case 'defaultPathPermissions':
      return builder.setDefaultPathPermissions(change.role, change.permissions).build();
    case 'pathPermissions':
      return builder.setPathPermissions(change.role, change.path, change.permissions).build();
    case 'removePathPermissions':
      return builder.removePathPermissions(change.role, change.path).build();
    case 'roleIncludes':
      return builder.setRoleIncludes(change.role, change.includedRoles).build();
    case 'lockRole':
      return builder.setRoleLockedByPrincipal(change.role, change.principal).build();
    case 'isolatePath':
      return builder.isolatePath(change.path).build();
    case 'deisolatePath':
      return builder.deisolatePath(change.path).build();
  }
}

function authenticationScript(builder: SystemAuthenticationScriptBuilder, change: AuthenticationChange): string {
  switch (change.kind) {
    case 'addPrincipal':
      return builder.addPrincipal(change.principal, change.password, change.roles, change.lockingPrincipal).build();
    case 'assignRoles':
      return builder.assignRoles(change.principal, change.roles).build();
    case 'setPassword':
      return builder.setPassword(change.principal, change.password).build();
    case 'removePrincipal':
      return builder.removePrincipal(change.principal).build();
    case 'anonymousConnections':
      if (change.action === 'allow') return builder.allowAnonymousConnections(change.roles).build();
      if (change.action === 'deny') return builder.denyAnonymousConnections().build();
      return builder.abstainAnonymousConnections().build();
    case 'trustProposedProperty':
      return builder.trustClientProposedPropertyIn(change.property, change.allowedValues).build();
    case 'ignoreProposedProperty':
      return builder.ignoreClientProposedProperty(change.property).build();
  }
}

function timeSeriesDataType(type: TimeSeriesValueType) {
  const { datatypes } = diffusion;
  switch (type) {
    case 'STRING':
      return datatypes.string();
    case 'INT64':
      return datatypes.int64();
    case 'DOUBLE':
      return datatypes.double();
    case 'JSON':
      return datatypes.json();
    case 'BINARY':
      return datatypes.binary();
  }
}

function eventValueText(type: TimeSeriesValueType, event: TimeSeriesEvent<unknown>): string | null {
  const value: unknown = event.value;
  if (value === null || value === undefined) return null;
  if (type === 'JSON' && typeof value === 'object' && 'get' in value && typeof value.get === 'function') {
    return JSON.stringify(toPlain(value.get()));
  }
  if (type === 'BINARY' && typeof value === 'object' && 'asBuffer' in value && typeof value.asBuffer === 'function') {
    const bytes: unknown = value.asBuffer();
    if (bytes instanceof Uint8Array) return Buffer.from(bytes).toString('base64');
  }
  return String(value);
}

function applyRange(query: RangeQuery, request: RangeQueryRequest): RangeQuery {
  let result = query;
  switch (request.anchor.kind) {
    case 'sequence':
      result = result.from(request.anchor.sequence);
      break;
    case 'timestamp':
      result = result.from(request.anchor.timestamp);
      break;
    case 'last':
      result = result.fromLast(request.anchor.count);
      break;
    case 'start':
      result = result.fromStart();
      break;
  }
  if (request.span?.kind === 'sequence') result = result.to(request.span.sequence);
  else if (request.span?.kind === 'timestamp') result = result.to(request.span.timestamp);
  else if (request.span?.kind === 'next') result = result.next(request.span.count);
  return result.limit(request.limit);
}

class DiffusionClientSession implements DiffusionSession {
  readonly sessionId: string;
  private state: SessionState = 'connected';

  constructor(
    private readonly session: Session,
    request: ConnectRequest
  ) {
    this.sessionId = session.sessionId.toString();

    const transition = (next: SessionState) => {
      const previous = this.state;
      if (previous === next) return;
      this.state = next;
      request.listener.onStateChange(this, previous, next);
    };
    session.on('disconnect', () => transition('recovering'));
    session.on('reconnect', () => transition('connected'));
    session.on('close', () => transition('closed'));
    session.on('error', (error: unknown) => request.errorHandler.onError(this, error));
  }

  getState(): SessionState {
    return this.session.isClosed() ? 'closed' : this.state;
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  topicsApi(): TopicsApi {
    const session = this.session;
    return {
      async add(path, type, properties, initialValue) {
        const specification = new diffusion.topics.TopicSpecification(topicTypeFor(type), properties);
        if (initialValue === undefined) {
          const result = await session.topics.add(path, specification);
          return { added: result.added };
        }
        const typed = typedValue(type, initialValue);
        const result = await session.topicUpdate.set(path, typed.dataType, typed.value, { specification });
        return { added: result === diffusion.TopicCreationResult.CREATED };
      },
      async remove(selector) {
        const result = await session.topics.remove(selector);
        return result.removedCount;
      },
      async set(path, type, value) {
        const typed = typedValue(type, value);
        await session.topicUpdate.set(path, typed.dataType, typed.value);
      },
      async fetch(selector, options: FetchOptions): Promise<FetchOutcome> {
        let request = session.fetchRequest().first(options.limit);
        if (options.after !== undefined) request = request.after(options.after);

        if (options.withValues) {
          // Values are requested as JSON, which limits the selection to JSON topics.
          const result = await request.withValues(diffusion.datatypes.json()).fetch(selector);
          return {
            topics: result.results().map((topic) => ({
              path: topic.path(),
              type: topicTypeName(topic.type()),
              value: toPlain(topic.value().get()),
            })),
            hasMore: result.hasMore(),
          };
        }

        const result = await request.fetch(selector);
        return {
          topics: result.results().map((topic) => ({ path: topic.path(), type: topicTypeName(topic.type()) })),
          hasMore: result.hasMore(),
        };
      },
    };
  }

  topicViewsApi(): TopicViewsApi {
    const session = this.session;
    return {
      async create(name, specification) {
        return viewInfo(await session.topicViews.createTopicView(name, specification));
      },
      async get(name) {
        const view = await session.topicViews.getTopicView(name);
        return view ? viewInfo(view) : null;
      },
      async list() {
        const views = await session.topicViews.listTopicViews();
        return views.map(viewInfo);
      },
      async remove(name) {
        await session.topicViews.removeTopicView(name);
      },
    };
  }

  metricsApi(): MetricsApi {
    const session = this.session;
    return {
      async putSessionCollector(collector) {
        let builder = diffusion
          .newSessionMetricCollectorBuilder()
          .exportToPrometheus(collector.exportToPrometheus)
          .removeMetricsWithNoMatches(collector.removeMetricsWithNoMatches);
        if (collector.maximumGroups > 0) builder = builder.maximumGroups(collector.maximumGroups);
        if (collector.groupByProperties.length > 0) builder = builder.groupByProperties(collector.groupByProperties);
        await session.metrics.putSessionMetricCollector(builder.create(collector.name, collector.sessionFilter));
      },
      async putTopicCollector(collector) {
        let builder = diffusion
          .newTopicMetricCollectorBuilder()
          .exportToPrometheus(collector.exportToPrometheus)
          .groupByTopicType(collector.groupByTopicType)
          .groupByTopicView(collector.groupByTopicView);
        if (collector.maximumGroups > 0) builder = builder.maximumGroups(collector.maximumGroups);
        if (collector.groupByPathPrefixParts > 0) builder = builder.groupByPathPrefixParts(collector.groupByPathPrefixParts);
        await session.metrics.putTopicMetricCollector(builder.create(collector.name, collector.topicSelector));
      },
      async listSessionCollectors() {
        const { collectors } = await session.metrics.listSessionMetricCollectors();
        return collectors.map((collector) => ({
          name: collector.name,
          sessionFilter: collector.sessionFilter,
          exportToPrometheus: collector.exportToPrometheus,
          maximumGroups: collector.maximumGroups,
          groupByProperties: [...collector.groupByProperties],
          removeMetricsWithNoMatches: collector.removeMetricsWithNoMatches,
        }));
      },
      async listTopicCollectors() {
        const { collectors } = await session.metrics.listTopicMetricCollectors();
        return collectors.map((collector) => ({
          name: collector.name,
          topicSelector: collector.topicSelector,
          exportToPrometheus: collector.exportToPrometheus,
          maximumGroups: collector.maximumGroups,
          groupByTopicType: collector.groupByTopicType,
          groupByTopicView: collector.groupByTopicView,
          groupByPathPrefixParts: collector.groupByPathPrefixParts,
        }));
      },
      async removeSessionCollector(name) {
        await session.metrics.removeSessionMetricCollector(name);
      },
      async removeTopicCollector(name) {
        await session.metrics.removeTopicMetricCollector(name);
      },
      async fetch(query) {
        let request = session.metrics.metricsRequest();
        if (query.server === 'current') request = request.currentServer();
        else if (query.server !== undefined) request = request.server(query.server);
        if (query.filter?.kind === 'names') request = request.filter(query.filter.names);
        else if (query.filter?.kind === 'regex') request = request.filter(query.filter.pattern);

        const result = await request.fetch();
        const servers = new Map<string, MetricCollectionInfo[]>();
        for (const server of result.getServerNames()) {
          servers.set(server, result.getMetrics(server).map(collectionInfo));
        }
        return servers;
      },
      async setAlert(name, specification) {
        await session.metrics.setMetricAlert(name, specification);
      },
      async listAlerts() {
        const alerts = await session.metrics.listMetricAlerts();
        return alerts.map((alert) => ({ name: alert.name, specification: alert.specification, principal: alert.principal }));
      },
      async removeAlert(name) {
        await session.metrics.removeMetricAlert(name);
      },
    };
  }

  remoteServersApi(): RemoteServersApi {
    const session = this.session;
    return {
      async create(definition) {
        return remoteServerInfo(await session.remoteServers.createRemoteServer(remoteServerDefinition(definition)));
      },
      async list() {
        const servers = await session.remoteServers.listRemoteServers();
        return servers.map(remoteServerInfo);
      },
      async check(name) {
        const result = await session.remoteServers.checkRemoteServer(name);
        return {
          connectionState: diffusion.ConnectionState[result.connectionState] ?? String(result.connectionState),
          failureMessage: result.failureMessage ? result.failureMessage : null,
        };
      },
      async remove(name) {
        await session.remoteServers.removeRemoteServer(name);
      },
    };
  }

  securityApi(): SecurityApi {
    const session = this.session;
    return {
      async getSecurityConfiguration() {
        return toPlain(await session.security.getSecurityConfiguration());
      },
      async getSystemAuthenticationConfiguration() {
        return toPlain(await session.security.getSystemAuthenticationConfiguration());
      },
      async updateSecurity(change) {
        await session.security.updateSecurityStore(securityScript(session.security.securityScriptBuilder(), change));
      },
      async updateAuthentication(change) {
        await session.security.updateAuthenticationStore(
          authenticationScript(session.security.authenticationScriptBuilder(), change)
        );
      },
    };
  }

  clientsApi(): ClientsApi {
    const session = this.session;
    return {
      async getSessionProperties(sessionId) {
        const properties = await session.clients.getSessionProperties(sessionId, ['*F', '*U']);
        return Object.fromEntries(Object.entries(properties).map(([key, value]) => [key, String(value)]));
      },
      async listSessions(filter) {
        // There is no one-shot session query here: open sessions are announced
        // to a new listener, so gather them until the stream goes quiet.
        const ids = new Set<string>();
        const progress: { lastEvent: number; failure: Error | null } = { lastEvent: Date.now(), failure: null };
        const closed = diffusion.clients.SessionState.CLOSED;
        const stream = {
          onSessionEvent(event: SessionEvent) {
            progress.lastEvent = Date.now();
            const id = event.sessionId.toString();
            if (event.state === closed) ids.delete(id);
            else ids.add(id);
          },
          onClose() {
            progress.lastEvent = 0;
          },
          onError(reason: unknown) {
            progress.failure = new Error(`Session event stream failed: ${String(reason)}`);
          },
        };

        let parameters = diffusion.newSessionEventParametersBuilder();
        if (filter !== undefined) parameters = parameters.filter(filter);
        const registration = await session.clients.addSessionEventListener(stream, parameters.build());
        try {
          for (;;) {
            const idle = Date.now() - progress.lastEvent;
            if (progress.failure !== null || idle >= SESSION_EVENTS_QUIET_MS) break;
            await sleep(SESSION_EVENTS_QUIET_MS - idle);
          }
        } finally {
          await registration.close();
        }
        if (progress.failure !== null) throw progress.failure;
        return [...ids].sort();
      },
    };
  }

  timeSeriesApi(): TimeSeriesApi {
    const session = this.session;
    return {
      async rangeQuery(path, request) {
        const query = applyRange(session.timeseries.rangeQuery().forValues().as(timeSeriesDataType(request.valueType)), request);
        const result = await query.selectFrom(path);
        return {
          selectedCount: result.selectedCount,
          isComplete: result.isComplete,
          events: result.events.map(
            (event): TimeSeriesEventInfo => ({
              sequence: event.sequence,
              timestamp: event.timestamp,
              author: event.author,
              originalSequence: event.isEditEvent ? event.originalEvent.sequence : null,
              value: eventValueText(request.valueType, event),
            })
          ),
        };
      },
    };
  }

  sessionTreesApi(): SessionTreesApi {
    const session = this.session;
    return {
      async putTable(table) {
        let builder = diffusion.newBranchMappingTableBuilder();
        for (const mapping of table.mappings) {
          builder = builder.addBranchMapping(mapping.sessionFilter, mapping.topicTreeBranch);
        }
        await session.sessionTrees.putBranchMappingTable(builder.create(table.sessionTreeBranch));
      },
      async getTable(sessionTreeBranch) {
        return tableInfo(await session.sessionTrees.getBranchMappingTable(sessionTreeBranch));
      },
      async listBranches() {
        return [...(await session.sessionTrees.getSessionTreeBranchesWithMappings())];
      },
    };
  }
}

function typedValue(type: TopicTypeName, value: string) {
  const { datatypes } = diffusion;
  switch (type) {
    case 'STRING':
      return { dataType: datatypes.string(), value };
    case 'JSON':
      return { dataType: datatypes.json(), value: datatypes.json().fromJsonString(value) };
    case 'DOUBLE':
      return { dataType: datatypes.double(), value: Number(value) };
    case 'INT64':
      return { dataType: datatypes.int64(), value: value.trim() };
    default:
      throw new ToolArgumentError(`Values cannot be set for ${type} topics by this tool`);
  }
}

/**
 * Opens sessions with the `diffusion` client library.
 */
export class DiffusionSessionFactory implements SessionFactory {
  constructor(private readonly logger: StructuredLogger = createNullLogger()) {}

  async open(request: ConnectRequest): Promise<DiffusionSession> {
    const options = connectionOptions(request);
    this.logger.debug('diffusion_connect', {
      host: options.host,
      port: options.port,
      secure: options.secure,
      path: options.path,
    });
    const session = await diffusion.connect(options);
    return new DiffusionClientSession(session, request);
  }
}
