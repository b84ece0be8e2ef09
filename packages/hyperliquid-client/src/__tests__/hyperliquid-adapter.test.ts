import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FeedMessage } from '@streamgate/schemas';
import { ProtocolError, StreamConnectionManager, TopicValidationError } from '@streamgate/stream-core';
import { FakeTransport, type Responder } from '@streamgate/stream-core/testing';
import { createSilentLogger } from '@streamgate/utils';
import { HyperliquidFeedAdapter, subscriptionKey } from '../stream/hyperliquid-adapter';

describe('HyperliquidFeedAdapter', () => {
  const adapter = new HyperliquidFeedAdapter();

  describe('topics', () => {
    it('maps coin feeds', () => {
      expect(adapter.resolveTopic({ kind: 'l2Book', symbol: 'BTC' })).toEqual({
        key: 'l2book:btc',
        channel: 'l2Book',
        wire: '{"type":"l2Book","coin":"BTC"}',
        sharedChannel: true,
      });
      expect(adapter.resolveTopic({ kind: 'candle', symbol: 'ETH', params: { interval: '1m' } })).toEqual({
        key: 'candle:eth?interval=1m',
        channel: 'candle',
        wire: '{"type":"candle","coin":"ETH","interval":"1m"}',
        sharedChannel: true,
      });
      expect(adapter.resolveTopic({ kind: 'allMids' }).key).toBe('allmids');
    });

    it('maps user feeds with a lower-cased address', () => {
      expect(adapter.resolveTopic({ kind: 'userFills', params: { user: '0xABC' } })).toEqual({
        key: 'userfills?user=0xabc',
        channel: 'userFills',
        wire: '{"type":"userFills","user":"0xabc"}',
        sharedChannel: true,
      });
      expect(adapter.resolveTopic({ kind: 'userEvents', params: { user: '0xabc' } })).toMatchObject({
        key: 'userevents?user=0xabc',
        channel: 'user',
      });
    });

    it('rejects incomplete or unknown subscriptions', () => {
      expect(() => adapter.resolveTopic({ kind: 'candle', symbol: 'ETH' })).toThrow('candle needs interval');
      expect(() => adapter.resolveTopic({ kind: 'l2Book' })).toThrow('l2Book needs a coin');
      expect(() => adapter.resolveTopic({ kind: 'allMids', symbol: 'BTC' })).toThrow('allMids takes no coin');
      expect(() => adapter.resolveTopic({ kind: 'userFills' })).toThrow('userFills needs a user address');
      expect(() => adapter.resolveTopic({ kind: 'l2Book', symbol: 'BTC', params: { depth: '5' } })).toThrow(
        'unexpected params depth'
      );
      expect(() => adapter.resolveTopic({ kind: 'funding', symbol: 'BTC' })).toThrow(TopicValidationError);
    });

    it('derives the same key from an echoed subscription', () => {
      expect(subscriptionKey({ type: 'l2Book', coin: 'BTC', nSigFigs: null, mantissa: null })).toBe('l2book:btc');
      expect(subscriptionKey({ type: 'candle', coin: 'ETH', interval: '1m' })).toBe('candle:eth?interval=1m');
    });
  });

  describe('outbound frames', () => {
    it('sends one subscription per request', () => {
      expect(adapter.buildControlFrame('subscribe', ['{"type":"l2Book","coin":"BTC"}'], 1)).toBe(
        '{"method":"subscribe","subscription":{"type":"l2Book","coin":"BTC"}}'
      );
      expect(() => adapter.buildControlFrame('subscribe', ['{"type":"allMids"}', '{"type":"bbo"}'], 2)).toThrow(
        ProtocolError
      );
      expect(adapter.maxTopicsPerFrame).toBe(1);
    });

    it('pings at the application level', () => {
      expect(adapter.buildPingFrame()).toBe('{"method":"ping"}');
      expect(adapter.buildConnectUrl()).toBe('wss://api.hyperliquid.xyz/ws');
      expect(new HyperliquidFeedAdapter({ testnet: true }).buildConnectUrl()).toBe('wss://api.hyperliquid-testnet.xyz/ws');
    });
  });

  describe('inbound frames', () => {
    const classify = (raw: string) => adapter.classifyFrame(adapter.decode(raw));

    it('ignores the greeting and answers pongs', () => {
      expect(classify('Websocket connection established.')).toEqual({ kind: 'ignore', reason: 'server notice' });
      expect(classify('{"channel":"pong"}')).toEqual({ kind: 'pong' });
    });

    it('turns subscription responses into acks', () => {
      const response = {
        channel: 'subscriptionResponse',
        data: { method: 'subscribe', subscription: { type: 'l2Book', coin: 'BTC', nSigFigs: null, mantissa: null } },
      };
      expect(adapter.classifyFrame(response)).toEqual({
        kind: 'ack',
        op: 'subscribe',
        topicKeys: ['l2book:btc'],
        success: true,
      });
    });

    it('routes data by the fields it carries', () => {
      const book = { coin: 'BTC', time: 1, levels: [[{ px: '100', sz: '1', n: 1 }], []] };
      expect(adapter.classifyFrame({ channel: 'l2Book', data: book })).toEqual({
        kind: 'data',
        channel: 'l2Book',
        topicKey: 'l2book:btc',
        update: 'snapshot',
        payload: book,
      });
      expect(adapter.classifyFrame({ channel: 'trades', data: [{ coin: 'ETH', px: '1' }] })).toMatchObject({
        topicKey: 'trades:eth',
        update: 'event',
      });
      expect(adapter.classifyFrame({ channel: 'candle', data: { s: 'ETH', i: '1m', o: '1' } })).toMatchObject({
        topicKey: 'candle:eth?interval=1m',
      });
      expect(
        adapter.classifyFrame({ channel: 'userFills', data: { user: '0xABC', isSnapshot: true, fills: [] } })
      ).toMatchObject({ topicKey: 'userfills?user=0xabc' });
      expect(adapter.classifyFrame({ channel: 'activeSpotAssetCtx', data: { coin: 'PURR/USDC' } })).toMatchObject({
        channel: 'activeAssetCtx',
        topicKey: 'activeassetctx:purr/usdc',
      });
    });

    it('routes feeds without scoping fields by channel', () => {
      expect(adapter.classifyFrame({ channel: 'user', data: { fills: [] } })).toEqual({
        kind: 'data',
        channel: 'user',
        topicKey: undefined,
        update: 'event',
        payload: { fills: [] },
      });
    });

    it('reports a rejected subscription embedded in an error', () => {
      const message = 'Invalid subscription {"type":"candle","coin":"XYZ","interval":"1m"}';
      expect(adapter.classifyFrame({ channel: 'error', data: message })).toEqual({
        kind: 'ack',
        op: 'subscribe',
        topicKeys: ['candle:xyz?interval=1m'],
        success: false,
        message,
      });
      expect(adapter.classifyFrame({ channel: 'error', data: 'Already subscribed' })).toEqual({
        kind: 'ignore',
        reason: 'venue error: Already subscribed',
      });
      expect(adapter.classifyFrame({ channel: 'mystery', data: {} })).toEqual({
        kind: 'ignore',
        reason: "unknown channel 'mystery'",
      });
    });
  });

  describe('with the connection manager', () => {
    const managers: StreamConnectionManager[] = [];

    afterEach(async () => {
      await Promise.all(managers.splice(0).map((m) => m.disconnect()));
    });

    const hyperliquidServer: Responder = (frame, connection) => {
      const request: unknown = JSON.parse(frame);
      if (typeof request === 'object' && request !== null && 'subscription' in request && 'method' in request) {
        connection.push({
          channel: 'subscriptionResponse',
          data: { method: request.method, subscription: request.subscription },
        });
      }
    };

    it('subscribes, skips a duplicate request and delivers book snapshots', async () => {
      const transport = new FakeTransport();
      transport.responder = hyperliquidServer;
      const manager = new StreamConnectionManager({
        adapter: new HyperliquidFeedAdapter(),
        transport,
        logger: createSilentLogger(),
        config: { replayPacingMs: 0, heartbeat: { intervalMs: 60_000 } },
      });
      managers.push(manager);
      await manager.connect();
      transport.current.push('Websocket connection established.');

      const received: FeedMessage[] = [];
      const handler = (message: FeedMessage) => {
        received.push(message);
      };
      await manager.subscribe({ kind: 'l2Book', symbol: 'BTC' }, handler);
      await manager.subscribe({ kind: 'l2Book', symbol: 'BTC' }, handler);

      transport.current.push({ channel: 'l2Book', data: { coin: 'BTC', time: 2, levels: [[], []] } });

      await vi.waitFor(() => expect(received).toHaveLength(1));
      expect(transport.current.sent).toEqual(['{"method":"subscribe","subscription":{"type":"l2Book","coin":"BTC"}}']);
      expect(received[0]).toMatchObject({
        topicKey: 'l2book:btc',
        type: 'snapshot',
        data: { coin: 'BTC', time: 2, levels: [[], []] },
      });
    });

    it('takes one address per feed whose frames carry no user', async () => {
      const transport = new FakeTransport();
      transport.responder = hyperliquidServer;
      const manager = new StreamConnectionManager({
        adapter: new HyperliquidFeedAdapter(),
        transport,
        logger: createSilentLogger(),
        config: { replayPacingMs: 0, heartbeat: { intervalMs: 60_000 } },
      });
      managers.push(manager);
      await manager.connect();

      await manager.subscribe({ kind: 'userEvents', params: { user: '0xabc' } }, () => undefined);
      await expect(
        manager.subscribe({ kind: 'userEvents', params: { user: '0xdef' } }, () => undefined)
      ).rejects.toBeInstanceOf(TopicValidationError);
      await manager.subscribe({ kind: 'userFills', params: { user: '0xabc' } }, () => undefined);
      await manager.subscribe({ kind: 'userFills', params: { user: '0xdef' } }, () => undefined);

      expect(manager.getSubscriptions()).toEqual([
        'userevents?user=0xabc',
        'userfills?user=0xabc',
        'userfills?user=0xdef',
      ]);
      expect(transport.current.sent).toHaveLength(3);
    });
  });
});
