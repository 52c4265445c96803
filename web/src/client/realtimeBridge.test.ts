import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ResponseCache } from '../cache/ResponseCache';
import { createServiceHarness, makeToken } from '../test/harness';
import type { ConnectionChangeEvent, EntityEvent } from './EventBus';
import { parseRealtimeMessage, RealtimeBridge, reconnectDelay, type RealtimeConnector, type RealtimeHandlers } from './RealtimeBridge';

interface FakeSocket {
  url: string;
  handlers: RealtimeHandlers;
  closed: boolean;
}

function createFakeConnector() {
  const sockets: FakeSocket[] = [];
  const connector: RealtimeConnector = (url, handlers) => {
    const socket: FakeSocket = { url, handlers, closed: false };
    sockets.push(socket);
    return {
      close: () => {
        socket.closed = true;
      },
    };
  };
  return { connector, sockets };
}

function setup() {
  const harness = createServiceHarness();
  const { connector, sockets } = createFakeConnector();
  const bridge = new RealtimeBridge({
    url: 'wss://push.test/ws',
    invalidation: harness.invalidation,
    events: harness.events,
    tokens: harness.tokens,
    connector,
  });
  return { ...harness, bridge, sockets };
}

function lastSocket(sockets: FakeSocket[]): FakeSocket {
  const socket = sockets[sockets.length - 1];
  if (!socket) throw new Error('no socket opened');
  return socket;
}

describe('parseRealtimeMessage', () => {
  it('should split the entity and action', () => {
    expect(parseRealtimeMessage('{"type":"feedback:updated","id":7,"data":{"id":"7"}}')).toEqual({
      entity: 'feedback',
      action: 'updated',
      id: '7',
      data: { id: '7' },
    });
  });

  it('should reject unknown actions and malformed payloads', () => {
    expect(parseRealtimeMessage('{"type":"feedback:archived"}')).toBeNull();
    expect(parseRealtimeMessage('{"type":"created"}')).toBeNull();
    expect(parseRealtimeMessage('[1,2]')).toBeNull();
    expect(parseRealtimeMessage('not json')).toBeNull();
  });
});

describe('reconnectDelay', () => {
  it('should double from one second up to the cap', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map((attempt) => reconnectDelay(attempt))).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000, 30000,
    ]);
  });
});

describe('RealtimeBridge', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should pass the bearer token in the channel URL', () => {
    const { bridge, sockets, tokens } = setup();
    const token = makeToken(Math.floor(Date.now() / 1000) + 3600);
    tokens.setToken(token);

    bridge.start();

    expect(sockets.map((socket) => socket.url)).toEqual([`wss://push.test/ws?token=${encodeURIComponent(token)}`]);
  });

  it('should invalidate before republishing a change', () => {
    const { bridge, sockets, cache, events } = setup();
    cache.set(ResponseCache.generateCacheKey('/api/v1/feedback', { page: 1 }), { items: [] });
    cache.set(ResponseCache.generateCacheKey('/api/v1/feedback/f1'), { id: 'f1' });
    cache.set(ResponseCache.generateCacheKey('/api/v1/members/m1'), { id: 'm1' });
    const seen: Array<{ event: EntityEvent; keys: string[] }> = [];
    events.subscribe('updated', (event) => seen.push({ event, keys: cache.keys() }));

    bridge.start();
    lastSocket(sockets).handlers.onOpen();
    lastSocket(sockets).handlers.onMessage(JSON.stringify({ type: 'feedback:updated', id: 'f1', data: { id: 'f1' } }));

    expect(seen).toEqual([
      {
        event: { entity: 'feedback', action: 'updated', id: 'f1', data: { id: 'f1' } },
        keys: ['/api/v1/members/m1?'],
      },
    ]);
  });

  it('should log and skip malformed messages', () => {
    const { bridge, sockets, events } = setup();
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const handler = vi.fn();
    events.subscribe('created', handler);

    bridge.start();
    lastSocket(sockets).handlers.onMessage('not json');

    expect(handler).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[RealtimeBridge] Ignoring malformed message', 'not json');
    warn.mockRestore();
  });

  it('should reconnect with growing delays', () => {
    const { bridge, sockets } = setup();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    bridge.start();
    lastSocket(sockets).handlers.onClose();
    vi.advanceTimersByTime(999);
    expect(sockets).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(2);

    lastSocket(sockets).handlers.onClose();
    vi.advanceTimersByTime(1999);
    expect(sockets).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(sockets).toHaveLength(3);
    vi.restoreAllMocks();
  });

  it('should invalidate every root after reconnecting and publish the connection state', () => {
    const { bridge, sockets, cache, events } = setup();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const states: ConnectionChangeEvent[] = [];
    events.subscribe('connection-change', (event) => states.push(event));

    bridge.start();
    lastSocket(sockets).handlers.onOpen();
    cache.set(ResponseCache.generateCacheKey('/api/v1/feedback', { page: 1 }), { items: [] });
    cache.set(ResponseCache.generateCacheKey('/api/v1/members/m1'), { id: 'm1' });
    lastSocket(sockets).handlers.onClose();
    vi.advanceTimersByTime(1000);
    lastSocket(sockets).handlers.onOpen();

    expect(cache.keys()).toEqual([]);
    expect(states.map((state) => state.connected)).toEqual([true, false, true]);
    expect(bridge.isConnected()).toBe(true);
    vi.restoreAllMocks();
  });

  it('should close the socket and stop reconnecting when stopped', () => {
    const { bridge, sockets } = setup();

    bridge.start();
    lastSocket(sockets).handlers.onOpen();
    bridge.stop();
    lastSocket(sockets).handlers.onClose();
    vi.advanceTimersByTime(60_000);

    expect(sockets).toHaveLength(1);
    expect(sockets[0].closed).toBe(true);
    expect(bridge.isConnected()).toBe(false);
  });

  it('should ignore a late close from a socket stopped before a restart', () => {
    const { bridge, sockets } = setup();

    bridge.start();
    const stale = lastSocket(sockets);
    stale.handlers.onOpen();
    bridge.stop();
    bridge.start();
    lastSocket(sockets).handlers.onOpen();
    stale.handlers.onClose();
    vi.advanceTimersByTime(60_000);

    expect(sockets).toHaveLength(2);
    expect(bridge.isConnected()).toBe(true);
  });
});
