import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  handleCheckRemoteServer,
  handleCreateRemoteServer,
  handleCreateTopicView,
  handleGetTopicView,
  handleListRemoteServers,
  handleListTopicViews,
  handleRemoveRemoteServer,
  handleRemoveTopicView,
  remoteServerDefinition,
} from '../src/tools/views.js';
import { connectFake, createToolHarness, textOf, type FakeSession, type ToolHarness } from './fakes.js';

let harness: ToolHarness;
let session: FakeSession;

beforeEach(async () => {
  harness = createToolHarness();
  session = await connectFake(harness);
});
afterEach(async () => {
  await harness.sessions.shutdown();
});

describe('topic view tools', () => {
  it('create_topic_view returns the stored view with sorted roles', async () => {
    session.topicViews.create.mockResolvedValueOnce({
      name: 'by-region',
      specification: 'map ?sensors// to regions/<path(1)>',
      roles: ['OPERATOR', 'ADMINISTRATOR'],
    });

    const result = await handleCreateTopicView(harness.ctx, 'caller-1', {
      name: ' by-region ',
      specification: ' map ?sensors// to regions/<path(1)> ',
    });

    expect(session.topicViews.create).toHaveBeenCalledWith('by-region', 'map ?sensors// to regions/<path(1)>');
    expect(JSON.parse(textOf(result))).toEqual({
      created: true,
      view: {
        name: 'by-region',
        specification: 'map ?sensors// to regions/<path(1)>',
        roles: ['ADMINISTRATOR', 'OPERATOR'],
      },
    });
  });

  it('list_topic_views counts the views', async () => {
    session.topicViews.list.mockResolvedValueOnce([
      { name: 'v1', specification: 'map >a to b', roles: [] },
      { name: 'v2', specification: 'map >c to d', roles: ['CLIENT'] },
    ]);

    const result = await handleListTopicViews(harness.ctx, 'caller-1');

    expect(JSON.parse(textOf(result))).toEqual({
      count: 2,
      views: [
        { name: 'v1', specification: 'map >a to b', roles: [] },
        { name: 'v2', specification: 'map >c to d', roles: ['CLIENT'] },
      ],
    });
  });

  it('remove_topic_view names the removed view', async () => {
    const result = await handleRemoveTopicView(harness.ctx, 'caller-1', { name: 'v1' });

    expect(session.topicViews.remove).toHaveBeenCalledWith('v1');
    expect(JSON.parse(textOf(result))).toEqual({ name: 'v1', removed: true });
  });

  it('maps an invalid specification to an error result', async () => {
    session.topicViews.create.mockRejectedValueOnce(new Error('Invalid topic view specification'));

    const result = await handleCreateTopicView(harness.ctx, 'caller-1', { name: 'v1', specification: 'nonsense' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Error create_topic_view : v1: Invalid topic view specification');
  });
});

describe('remote server tools', () => {
  it('list_remote_servers prints each server and its type', async () => {
    session.remoteServers.list.mockResolvedValueOnce([
      { name: 'edge-1', type: 'SECONDARY_INITIATOR' },
      { name: 'primary', type: 'PRIMARY_INITIATOR' },
    ]);

    const result = await handleListRemoteServers(harness.ctx, 'caller-1');

    expect(textOf(result)).toBe(
      '=== Remote Servers ===\n' +
        'Total: 2\n' +
        '\n' +
        '1. edge-1\n' +
        '   Type: SECONDARY_INITIATOR\n' +
        '2. primary\n' +
        '   Type: PRIMARY_INITIATOR\n'
    );
  });

  it('list_remote_servers says when there are none', async () => {
    const result = await handleListRemoteServers(harness.ctx, 'caller-1');

    expect(textOf(result)).toBe('=== Remote Servers ===\nTotal: 0\n\nNo remote servers configured.\n');
  });

  it('check_remote_server describes a healthy connection', async () => {
    const result = await handleCheckRemoteServer(harness.ctx, 'caller-1', { name: 'primary' });

    expect(session.remoteServers.check).toHaveBeenCalledWith('primary');
    expect(textOf(result)).toBe(
      '=== Remote Server Status ===\n' +
        'Name: primary\n' +
        'Connection State: CONNECTED\n' +
        '\n' +
        'The remote server is successfully connected and operational.\n'
    );
  });

  it('check_remote_server includes the failure reason', async () => {
    session.remoteServers.check.mockResolvedValueOnce({ connectionState: 'FAILED', failureMessage: 'Connection refused' });

    const result = await handleCheckRemoteServer(harness.ctx, 'caller-1', { name: 'edge-1' });

    expect(textOf(result)).toBe(
      '=== Remote Server Status ===\n' +
        'Name: edge-1\n' +
        'Connection State: FAILED\n' +
        '\n' +
        'The connection has failed.\n' +
        '\n' +
        'Failure reason:\n' +
        '  Connection refused\n'
    );
  });

  it('remove_remote_server names the removed server', async () => {
    const result = await handleRemoveRemoteServer(harness.ctx, 'caller-1', { name: ' edge-1 ' });

    expect(session.remoteServers.remove).toHaveBeenCalledWith('edge-1');
    expect(JSON.parse(textOf(result))).toEqual({ name: 'edge-1', removed: true });
  });
});

describe('get_topic_view', () => {
  it('returns a view by name', async () => {
    session.topicViews.get.mockResolvedValueOnce({
      name: 'by-region',
      specification: 'map ?sensors// to views/<path(1)>',
      roles: ['OPERATOR', 'ADMIN'],
    });

    const result = await handleGetTopicView(harness.ctx, 'caller-1', { name: ' by-region ' });

    expect(session.topicViews.get).toHaveBeenCalledWith('by-region');
    expect(JSON.parse(textOf(result))).toEqual({
      name: 'by-region',
      specification: 'map ?sensors// to views/<path(1)>',
      roles: ['ADMIN', 'OPERATOR'],
      exists: true,
    });
  });

  it('reports a missing view', async () => {
    const result = await handleGetTopicView(harness.ctx, 'caller-1', { name: 'nothing' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe("Topic view 'nothing' not found");
  });
});

describe('remoteServerDefinition', () => {
  it('builds a secondary initiator with its options', () => {
    expect(
      remoteServerDefinition({
        type: 'SECONDARY_INITIATOR',
        name: ' edge ',
        url: 'ws://primary:8080',
        principal: ' control ',
        password: 'test-secret',
        connectionOptions: { RECONNECTION_TIMEOUT: '60000' },
      })
    ).toEqual({
      type: 'SECONDARY_INITIATOR',
      name: 'edge',
      url: 'ws://primary:8080',
      principal: 'control',
      password: 'test-secret',
      connectionOptions: { RECONNECTION_TIMEOUT: '60000' },
    });
  });

  it('builds a primary initiator with the default retry delay', () => {
    expect(
      remoteServerDefinition({ type: 'PRIMARY_INITIATOR', name: 'hub', urls: ['ws://a:8080', ' ', 'ws://b:8080'], connector: 'c1' })
    ).toEqual({ type: 'PRIMARY_INITIATOR', name: 'hub', urls: ['ws://a:8080', 'ws://b:8080'], connector: 'c1', retryDelay: 1000 });
  });

  it('checks the arguments each type needs', () => {
    expect(() => remoteServerDefinition({ type: 'SECONDARY_INITIATOR', name: 'edge' })).toThrow(
      'URL is required for SECONDARY_INITIATOR'
    );
    expect(() => remoteServerDefinition({ type: 'PRIMARY_INITIATOR', name: 'hub', urls: [] })).toThrow(
      'URLs list is required for PRIMARY_INITIATOR'
    );
    expect(() => remoteServerDefinition({ type: 'PRIMARY_INITIATOR', name: 'hub', urls: ['ws://a:8080'] })).toThrow(
      'Connector is required for PRIMARY_INITIATOR'
    );
    expect(() => remoteServerDefinition({ type: 'SECONDARY_ACCEPTOR', name: 'edge' })).toThrow(
      'primaryHostName is required for SECONDARY_ACCEPTOR'
    );
  });
});

describe('create_remote_server', () => {
  it('reports a created secondary acceptor', async () => {
    session.remoteServers.create.mockResolvedValueOnce({
      name: 'edge',
      type: 'SECONDARY_ACCEPTOR',
      primaryHostName: 'primary.local',
      principal: '',
      missingTopicNotificationFilter: '?sensors//',
      connectionOptions: { WRITE_TIMEOUT: '5000' },
    });

    const result = await handleCreateRemoteServer(harness.ctx, 'caller-1', {
      type: 'SECONDARY_ACCEPTOR',
      name: 'edge',
      primaryHostName: 'primary.local',
    });

    expect(session.remoteServers.create).toHaveBeenCalledWith({
      type: 'SECONDARY_ACCEPTOR',
      name: 'edge',
      primaryHostName: 'primary.local',
      connectionOptions: {},
    });
    expect(textOf(result)).toBe(
      [
        '=== Remote Server Created ===',
        'Name: edge',
        'Type: SECONDARY_ACCEPTOR',
        '',
        'Primary Host Name: primary.local',
        'Principal: <anonymous>',
        'Missing Topic Notification Filter: ?sensors//',
        'Connection Options:',
        '  WRITE_TIMEOUT: 5000',
        '',
        'Remote server has been successfully created and is now available.',
        '',
      ].join('\n')
    );
  });

  it('reports a created primary initiator', async () => {
    session.remoteServers.create.mockResolvedValueOnce({
      name: 'hub',
      type: 'PRIMARY_INITIATOR',
      urls: ['ws://a:8080', 'ws://b:8080'],
      connector: 'c1',
      retryDelay: 2000,
    });

    const result = await handleCreateRemoteServer(harness.ctx, 'caller-1', {
      type: 'PRIMARY_INITIATOR',
      name: 'hub',
      urls: ['ws://a:8080', 'ws://b:8080'],
      connector: 'c1',
      retryDelay: 2000,
    });

    expect(textOf(result)).toBe(
      [
        '=== Remote Server Created ===',
        'Name: hub',
        'Type: PRIMARY_INITIATOR',
        '',
        'URLs: ws://a:8080, ws://b:8080',
        'Connector: c1',
        'Retry Delay: 2000 ms',
        '',
        'Remote server has been successfully created and is now available.',
        '',
      ].join('\n')
    );
  });

  it('rejects missing arguments before calling the server', async () => {
    const result = await handleCreateRemoteServer(harness.ctx, 'caller-1', { type: 'SECONDARY_INITIATOR', name: 'edge' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe('Invalid parameters: URL is required for SECONDARY_INITIATOR');
    expect(session.remoteServers.create).not.toHaveBeenCalled();
  });
});
