export type SessionState = 'connected' | 'recovering' | 'closed';

export type TopicTypeName = 'STRING' | 'JSON' | 'BINARY' | 'DOUBLE' | 'INT64' | 'TIME_SERIES' | 'UNKNOWN';

export type SessionProperties = Record<string, string>;

export interface TopicAddOutcome {
  added: boolean;
}

export interface FetchedTopic {
  path: string;
  type: TopicTypeName;
  value?: unknown;
}

export interface FetchOutcome {
  topics: FetchedTopic[];
  hasMore: boolean;
}

export interface FetchOptions {
  limit: number;
  withValues: boolean;
  /** Only topics whose path sorts after this one. */
  after?: string;
}

export interface TopicsApi {
  /** Create a topic, setting its first value when one is supplied. */
  add(path: string, type: TopicTypeName, properties: SessionProperties, initialValue?: string): Promise<TopicAddOutcome>;
  remove(selector: string): Promise<number>;
  set(path: string, type: TopicTypeName, value: string): Promise<void>;
  fetch(selector: string, options: FetchOptions): Promise<FetchOutcome>;
}

export interface TopicViewInfo {
  name: string;
  specification: string;
  roles: string[];
}

export type TimeSeriesValueType = 'STRING' | 'INT64' | 'DOUBLE' | 'JSON' | 'BINARY';

/** Where a range query starts. */
export type RangeAnchor =
  | { kind: 'sequence'; sequence: number }
  | { kind: 'timestamp'; timestamp: Date }
  | { kind: 'last'; count: number }
  | { kind: 'start' };

/** Where a range query ends; absent means the end of the series. */
export type RangeSpan =
  | { kind: 'sequence'; sequence: number }
  | { kind: 'timestamp'; timestamp: Date }
  | { kind: 'next'; count: number };

export interface RangeQueryRequest {
  valueType: TimeSeriesValueType;
  anchor: RangeAnchor;
  span?: RangeSpan;
  limit: number;
}

export interface TimeSeriesEventInfo {
  sequence: number;
  timestamp: number;
  author: string;
  /** Sequence of the event this one edits, or null for an original event. */
  originalSequence: number | null;
  /** The value rendered as text, JSON values as JSON. */
  value: string | null;
}

export interface RangeQueryOutcome {
  selectedCount: number;
  isComplete: boolean;
  events: TimeSeriesEventInfo[];
}

export interface TimeSeriesApi {
  rangeQuery(path: string, query: RangeQueryRequest): Promise<RangeQueryOutcome>;
}

export interface TopicViewsApi {
  create(name: string, specification: string): Promise<TopicViewInfo>;
  get(name: string): Promise<TopicViewInfo | null>;
  list(): Promise<TopicViewInfo[]>;
  remove(name: string): Promise<void>;
}

export interface MetricCollectorOptions {
  exportToPrometheus: boolean;
  /** Zero means unlimited. */
  maximumGroups: number;
}

export interface SessionMetricCollectorInfo extends MetricCollectorOptions {
  name: string;
  sessionFilter: string;
  groupByProperties: string[];
  removeMetricsWithNoMatches: boolean;
}

export interface TopicMetricCollectorInfo extends MetricCollectorOptions {
  name: string;
  topicSelector: string;
  groupByTopicType: boolean;
  groupByTopicView: boolean;
  /** Zero means no grouping by path prefix. */
  groupByPathPrefixParts: number;
}

export interface MetricsQuery {
  /** A server name, `current` for the connected server, absent for all. */
  server?: string;
  filter?: { kind: 'names'; names: string[] } | { kind: 'regex'; pattern: RegExp };
}

export interface MetricSampleInfo {
  name: string;
  value: number;
  timestamp?: number;
  labels: Record<string, string>;
}

export interface MetricCollectionInfo {
  name: string;
  type: string;
  unit: string;
  samples: MetricSampleInfo[];
}

export interface MetricAlertInfo {
  name: string;
  specification: string;
  principal: string;
}

export interface MetricsApi {
  putSessionCollector(collector: SessionMetricCollectorInfo): Promise<void>;
  putTopicCollector(collector: TopicMetricCollectorInfo): Promise<void>;
  listSessionCollectors(): Promise<SessionMetricCollectorInfo[]>;
  listTopicCollectors(): Promise<TopicMetricCollectorInfo[]>;
  removeSessionCollector(name: string): Promise<void>;
  removeTopicCollector(name: string): Promise<void>;
  /** Metric collections keyed by server name. */
  fetch(query: MetricsQuery): Promise<Map<string, MetricCollectionInfo[]>>;
  setAlert(name: string, specification: string): Promise<void>;
  listAlerts(): Promise<MetricAlertInfo[]>;
  removeAlert(name: string): Promise<void>;
}

export type RemoteServerTypeName = 'SECONDARY_INITIATOR' | 'PRIMARY_INITIATOR' | 'SECONDARY_ACCEPTOR';

export type ConnectionOptionName =
  | 'CONNECTION_TIMEOUT'
  | 'INPUT_BUFFER_SIZE'
  | 'MAXIMUM_QUEUE_SIZE'
  | 'OUTPUT_BUFFER_SIZE'
  | 'RECONNECTION_TIMEOUT'
  | 'RECOVERY_BUFFER_SIZE'
  | 'RETRY_DELAY'
  | 'WRITE_TIMEOUT';

export type RemoteServerDefinition =
  | { type: 'PRIMARY_INITIATOR'; name: string; urls: string[]; connector: string; retryDelay: number }
  | ({ type: 'SECONDARY_INITIATOR'; name: string; url: string } & SecondaryServerOptions)
  | ({ type: 'SECONDARY_ACCEPTOR'; name: string; primaryHostName: string } & SecondaryServerOptions);

export interface SecondaryServerOptions {
  principal?: string;
  password?: string;
  connectionOptions: Partial<Record<ConnectionOptionName, string>>;
  missingTopicNotificationFilter?: string;
}

export interface RemoteServerInfo {
  name: string;
  type: string;
  url?: string;
  urls?: string[];
  connector?: string;
  retryDelay?: number;
  primaryHostName?: string;
  principal?: string;
  connectionOptions?: Record<string, string>;
  missingTopicNotificationFilter?: string;
}

export interface RemoteServerCheck {
  connectionState: string;
  failureMessage: string | null;
}

export interface RemoteServersApi {
  create(definition: RemoteServerDefinition): Promise<RemoteServerInfo>;
  list(): Promise<RemoteServerInfo[]>;
  check(name: string): Promise<RemoteServerCheck>;
  remove(name: string): Promise<void>;
}

/** One change to the security store. */
export type SecurityChange =
  | { kind: 'rolesForAnonymousSessions'; roles: string[] }
  | { kind: 'rolesForNamedSessions'; roles: string[] }
  | { kind: 'globalPermissions'; role: string; permissions: string[] }
  | { kind: 'defaultPathPermissions'; role: string; permissions: string[] }
  | { kind: 'pathPermissions'; role: string; path: string; permissions: string[] }
  | { kind: 'removePathPermissions'; role: string; path: string }
  | { kind: 'roleIncludes'; role: string; includedRoles: string[] }
  | { kind: 'lockRole'; role: string; principal: string }
  | { kind: 'isolatePath'; path: string }
  | { kind: 'deisolatePath'; path: string };

/** One change to the system authentication store. */
export type AuthenticationChange =
  | { kind: 'addPrincipal'; principal: string; password: string; roles: string[]; lockingPrincipal?: string }
  | { kind: 'assignRoles'; principal: string; roles: string[] }
  | { kind: 'setPassword'; principal: string; password: string }
  | { kind: 'removePrincipal'; principal: string }
  | { kind: 'anonymousConnections'; action: 'allow'; roles: string[] }
  | { kind: 'anonymousConnections'; action: 'deny' | 'abstain' }
  | { kind: 'trustProposedProperty'; property: string; allowedValues: string[] }
  | { kind: 'ignoreProposedProperty'; property: string };

export interface SecurityApi {
  getSecurityConfiguration(): Promise<unknown>;
  getSystemAuthenticationConfiguration(): Promise<unknown>;
  updateSecurity(change: SecurityChange): Promise<void>;
  updateAuthentication(change: AuthenticationChange): Promise<void>;
}

export interface ClientsApi {
  getSessionProperties(sessionId: string): Promise<SessionProperties>;
  /** Ids of the open sessions, optionally only those matching a session filter. */
  listSessions(filter?: string): Promise<string[]>;
}

export interface BranchMapping {
  sessionFilter: string;
  topicTreeBranch: string;
}

export interface BranchMappingTableInfo {
  sessionTreeBranch: string;
  mappings: BranchMapping[];
}

export interface SessionTreesApi {
  /** Replaces the table for the branch; an empty list of mappings removes it. */
  putTable(table: BranchMappingTableInfo): Promise<void>;
  getTable(sessionTreeBranch: string): Promise<BranchMappingTableInfo>;
  listBranches(): Promise<string[]>;
}

/**
 * An open connection to a Diffusion server.
 *
 * Each capability accessor returns one slice of the backing-server API; tool
 * adapters make exactly one call through one of them.
 */
export interface DiffusionSession {
  readonly sessionId: string;
  getState(): SessionState;
  close(): Promise<void>;
  topicsApi(): TopicsApi;
  topicViewsApi(): TopicViewsApi;
  metricsApi(): MetricsApi;
  remoteServersApi(): RemoteServersApi;
  securityApi(): SecurityApi;
  clientsApi(): ClientsApi;
  timeSeriesApi(): TimeSeriesApi;
  sessionTreesApi(): SessionTreesApi;
}

export interface SessionListener {
  onStateChange(session: DiffusionSession, oldState: SessionState, newState: SessionState): void;
}

export interface SessionErrorHandler {
  onError(session: DiffusionSession, error: unknown): void;
}

export interface ConnectRequest {
  principal: string;
  password: string;
  url: string;
  /** Present only when the caller supplied at least one property. */
  properties?: SessionProperties;
  listener: SessionListener;
  errorHandler: SessionErrorHandler;
}

export interface SessionFactory {
  open(request: ConnectRequest): Promise<DiffusionSession>;
}
