import { parseTopicSpec, type Topic } from '@streamgate/schemas';
import { toErrorMessage } from '@streamgate/stream-core';

/**
 * Parse a comma-separated list of topic specs
 *
 * `trade:BTCUSDT, kline:ETHUSDT:interval=1m` -> two topics. Blank entries
 * are skipped; any malformed entry fails the whole list.
 */
export function parseTopicList(list: string): Topic[] {
  const topics: Topic[] = [];
  const problems: string[] = [];

  for (const spec of list.split(',').map((part) => part.trim())) {
    if (spec.length === 0) continue;
    try {
      topics.push(parseTopicSpec(spec));
    } catch (error) {
      problems.push(`'${spec}': ${toErrorMessage(error)}`);
    }
  }

  if (problems.length > 0) {
    throw new Error(`Invalid topic specs: ${problems.join('; ')}`);
  }
  return topics;
}
