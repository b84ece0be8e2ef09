import { describe, it, expect } from 'vitest';
import { GenericFeedAdapter } from '../adapter/generic-adapter';
import { TopicValidationError } from '../errors';

describe('GenericFeedAdapter', () => {
  const adapter = new GenericFeedAdapter({ url: 'wss://feed.test/ws/' });

  it('maps topics to wire names and keys', () => {
    expect(adapter.resolveTopic({ kind: 'trade', symbol: 'BTCUSDT' })).toEqual({
      key: 'trade:btcusdt',
      channel: 'btcusdt@trade',
      wire: 'btcusdt@trade',
    });
    expect(adapter.resolveTopic({ kind: 'kline', symbol: 'ETHUSDT', params: { interval: '1m' } })).toEqual({
      key: 'kline:ethusdt?interval=1m',
      channel: 'ethusdt@kline_1m',
      wire: 'ethusdt@kline_1m',
    });
    expect(adapter.resolveTopic({ kind: 'wallet' }).key).toBe('wallet');
  });

  it('rejects an invalid topic shape', () => {
    expect(() => adapter.resolveTopic({ kind: '' })).toThrow(TopicValidationError);
  });

  it('builds control frames', () => {
    expect(adapter.buildControlFrame('subscribe', ['btcusdt@trade'], 3)).toBe(
      '{"op":"subscribe","args":["btcusdt@trade"],"id":3}'
    );
  });

  it('embeds a url-placed credential in the path', () => {
    const session = new GenericFeedAdapter({ url: 'wss://feed.test/ws/', session: 'url' });
    expect(session.buildConnectUrl({ value: 'abc', issuedAt: 0, expiresAt: 1 })).toBe('wss://feed.test/ws/abc');
    expect(adapter.buildConnectUrl()).toBe('wss://feed.test/ws/');
  });

  it('classifies frames by shape', () => {
    expect(adapter.classifyFrame({ stream: 'btcusdt@trade', data: { p: '1' } })).toEqual({
      kind: 'data',
      channel: 'btcusdt@trade',
      update: 'event',
      payload: { p: '1' },
      levels: undefined,
    });
    expect(adapter.classifyFrame({ id: 4, success: false, message: 'bad topic' })).toEqual({
      kind: 'ack',
      requestId: 4,
      success: false,
      message: 'bad topic',
    });
    expect(adapter.classifyFrame({ op: 'auth', success: true })).toEqual({
      kind: 'auth',
      success: true,
      message: undefined,
    });
    expect(adapter.classifyFrame({ op: 'pong' })).toEqual({ kind: 'pong' });
    expect(adapter.classifyFrame({ op: 'ping' })).toEqual({ kind: 'ping', reply: '{"op":"pong"}' });
    expect(adapter.classifyFrame({ hello: 'world' }).kind).toBe('ignore');
  });

  it('builds auth frames only when configured', () => {
    const authed = new GenericFeedAdapter({
      url: 'wss://feed.test/ws',
      authArgs: (now, credential) => [credential?.value ?? '', now],
    });
    expect(adapter.buildAuthFrame(5)).toBeNull();
    expect(authed.buildAuthFrame(5, { value: 'token', issuedAt: 0, expiresAt: 1 })).toBe(
      '{"op":"auth","args":["token",5]}'
    );
  });
});
