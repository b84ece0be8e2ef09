import { describe, it, expect } from 'vitest';
import type { Topic } from '@streamgate/schemas';
import { TopicValidationError } from '../errors';
import { SubscriptionRegistry } from '../subscription/subscription-registry';
import { topicKey } from '../subscription/topic-key';

const noop = () => undefined;

function entry(topic: Topic) {
  const key = topicKey(topic);
  return { key, topic, channel: key, wire: key, handler: noop };
}

describe('topicKey()', () => {
  it('case-folds kind and symbol', () => {
    expect(topicKey({ kind: 'Trade', symbol: 'BTCUSDT' })).toBe('trade:btcusdt');
    expect(topicKey({ kind: 'trade', symbol: 'btcusdt' })).toBe('trade:btcusdt');
  });

  it('orders params by name', () => {
    const a = topicKey({ kind: 'candle', symbol: 'BTC', params: { interval: '1m', depth: '5' } });
    const b = topicKey({ kind: 'candle', symbol: 'btc', params: { depth: '5', interval: '1m' } });
    expect(a).toBe('candle:btc?depth=5&interval=1m');
    expect(b).toBe(a);
  });

  it('maps account-wide topics to a fixed key', () => {
    expect(topicKey({ kind: 'wallet' })).toBe('wallet');
    expect(topicKey({ kind: 'userEvents', params: { user: '0xabc' } })).toBe('userevents?user=0xabc');
  });

  it('keeps symbols apart from params and param names apart from each other', () => {
    const keys = [
      topicKey({ kind: 'x', symbol: 'BTC' }),
      topicKey({ kind: 'x', params: { p: 'btc' } }),
      topicKey({ kind: 'x', params: { q: 'btc' } }),
      topicKey({ kind: 'x', params: { p: 'btc', q: '' } }),
      topicKey({ kind: 'x', params: { p: '', q: 'btc' } }),
      topicKey({ kind: 'x', symbol: 'a', params: { b: 'c' } }),
      topicKey({ kind: 'x', symbol: 'a?b=c' }),
    ];
    expect(new Set(keys).size).toBe(keys.length);
    expect(keys[6]).toBe('x:a%3Fb%3Dc');
  });
});

describe('SubscriptionRegistry', () => {
  it('overwrites the handler on re-subscribe', () => {
    const registry = new SubscriptionRegistry();
    const first = () => undefined;
    const second = () => undefined;

    expect(registry.upsert({ ...entry({ kind: 'trade', symbol: 'BTC' }), handler: first })).toBe(true);
    expect(registry.upsert({ ...entry({ kind: 'trade', symbol: 'btc' }), handler: second })).toBe(false);

    expect(registry.size).toBe(1);
    expect(registry.get('trade:btc')?.handler).toBe(second);
  });

  it('treats removal of an absent key as a no-op', () => {
    const registry = new SubscriptionRegistry();
    expect(registry.remove('trade:btc')).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('matches the set implied by applying operations in order', () => {
    const symbols = ['BTC', 'ETH', 'SOL', 'DOGE'];
    // Deterministic pseudo-random sequence
    let seed = 7;
    const next = () => {
      seed = (seed * 48271) % 2147483647;
      return seed;
    };

    const registry = new SubscriptionRegistry();
    const expected = new Set<string>();

    for (let i = 0; i < 200; i++) {
      const symbol = symbols[next() % symbols.length] ?? 'BTC';
      const topic: Topic = { kind: 'trade', symbol: next() % 2 === 0 ? symbol : symbol.toLowerCase() };
      const key = topicKey(topic);
      if (next() % 3 === 0) {
        registry.remove(key);
        expected.delete(key);
      } else {
        registry.upsert(entry(topic));
        expected.add(key);
      }
      expect(registry.list().map((e) => e.key)).toEqual([...expected].sort());
    }
  });

  it('lists in key order', () => {
    const registry = new SubscriptionRegistry();
    for (const symbol of ['e', 'c', 'a', 'd', 'b']) {
      registry.upsert(entry({ kind: 'trade', symbol }));
    }

    expect(registry.list().map((e) => e.key)).toEqual([
      'trade:a',
      'trade:b',
      'trade:c',
      'trade:d',
      'trade:e',
    ]);
  });

  it('tracks the active flag', () => {
    const registry = new SubscriptionRegistry();
    registry.upsert(entry({ kind: 'trade', symbol: 'btc' }));
    registry.upsert(entry({ kind: 'trade', symbol: 'eth' }));

    expect(registry.get('trade:btc')?.active).toBe(false);
    registry.markActive(['trade:btc', 'trade:eth']);
    expect(registry.get('trade:btc')?.active).toBe(true);

    registry.markAllInactive();
    expect(registry.list().every((e) => !e.active)).toBe(true);
  });

  it('finds entries by channel', () => {
    const registry = new SubscriptionRegistry();
    registry.upsert({ ...entry({ kind: 'trade', symbol: 'btc' }), channel: 'btcusdt@trade' });

    expect(registry.findByChannel('btcusdt@trade')?.key).toBe('trade:btc');
    expect(registry.findByChannel('ethusdt@trade')).toBeUndefined();
  });

  it('refuses a second key on a channel that belongs to one topic', () => {
    const registry = new SubscriptionRegistry();
    registry.upsert({ ...entry({ kind: 'trade', symbol: 'btc' }), channel: 'btcusdt@trade' });

    expect(() =>
      registry.upsert({ ...entry({ kind: 'publicTrade', symbol: 'btc' }), channel: 'btcusdt@trade' })
    ).toThrow(new TopicValidationError("Topic publictrade:btc uses channel 'btcusdt@trade' already taken by trade:btc"));
    expect(registry.list().map((e) => e.key)).toEqual(['trade:btc']);
  });

  it('lets keyed topics share a channel', () => {
    const registry = new SubscriptionRegistry();
    registry.upsert({ ...entry({ kind: 'l2Book', symbol: 'btc' }), channel: 'l2Book', sharedChannel: true });
    registry.upsert({ ...entry({ kind: 'l2Book', symbol: 'eth' }), channel: 'l2Book', sharedChannel: true });

    expect(registry.size).toBe(2);
  });
});
