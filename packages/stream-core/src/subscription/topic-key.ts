import type { Topic } from '@streamgate/schemas';

/** Characters that delimit key parts */
const RESERVED = /[%:?&=]/g;

function escapePart(value: string): string {
  return value.replace(RESERVED, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Canonical local key for a topic.
 *
 * `kind[:symbol][?name=value&...]` with kind and symbol lower-cased and
 * params ordered by name: `kline:btcusdt?interval=1m`, `wallet`,
 * `userfills?user=0xabc`. Delimiters inside a part are percent-escaped so
 * distinct topics never share a key.
 */
export function topicKey(topic: Topic): string {
  let key = escapePart(topic.kind.toLowerCase());
  if (topic.symbol !== undefined) {
    key += `:${escapePart(topic.symbol.toLowerCase())}`;
  }
  const params = topic.params ?? {};
  const names = Object.keys(params).sort();
  if (names.length > 0) {
    key += `?${names.map((name) => `${escapePart(name)}=${escapePart(params[name] ?? '')}`).join('&')}`;
  }
  return key;
}
