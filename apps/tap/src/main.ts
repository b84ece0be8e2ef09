// dotenv must load before validateEnv reads process.env
import 'dotenv/config';

import type { FeedMessage } from '@streamgate/schemas';
import { StreamConnectionManager, toErrorMessage } from '@streamgate/stream-core';
import { createLogger, validateEnv } from '@streamgate/utils';
import { createFeed, createManagerConfig } from './feed-factory';
import { parseTopicList } from './topics';

const logger = createLogger('tap');

/**
 * Stream tap
 *
 * Connects to the venue named by STREAM_VENUE, subscribes to STREAM_TOPICS
 * and logs every delivered message until SIGINT/SIGTERM.
 */
async function start() {
  logger.info('Starting stream tap...');

  const config = validateEnv();
  const topics = parseTopicList(config.STREAM_TOPICS);
  if (topics.length === 0) {
    logger.warn('STREAM_TOPICS is empty; connecting without subscriptions');
  }

  const { adapter, credentials } = createFeed(config, logger);
  const manager = new StreamConnectionManager({
    adapter,
    credentials,
    config: createManagerConfig(config),
    logger: logger.child({ venue: adapter.venue }),
  });

  let shuttingDown = false;

  manager.on('connected', () => logger.info({ venue: adapter.venue }, 'Feed connected'));
  manager.on('disconnected', (reason) => logger.warn({ reason }, 'Feed disconnected'));
  manager.on('reconnecting', (attempt, delay) => logger.info({ attempt, delay }, 'Reconnecting'));
  manager.on('credentialRotated', () => logger.info('Session credential rotated'));
  manager.on('error', (error) => logger.error({ err: error.message, name: error.name }, 'Feed error'));
  manager.on('state', (next) => {
    if (next === 'stopped' && !shuttingDown) {
      logger.fatal('Feed stopped permanently');
      process.exit(1);
    }
  });

  const handler = (message: FeedMessage) => {
    logger.info({ topicKey: message.topicKey, channel: message.channel, type: message.type }, 'Feed message');
    logger.debug({ topicKey: message.topicKey, data: message.data }, 'Feed payload');
  };

  for (const topic of topics) {
    const result = await manager.subscribe(topic, handler);
    logger.info({ topicKey: result.topicKey, status: result.status }, 'Topic registered');
  }
  if (topics.length === 0) {
    try {
      await manager.connect();
    } catch (error) {
      logger.warn({ err: toErrorMessage(error) }, 'Initial connect failed, retrying in the background');
    }
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down stream tap...');

    await manager.disconnect();

    const stats = manager.getDispatchStats();
    logger.info({ ...stats }, 'Stream tap shut down');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: toErrorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

start().catch((error: unknown) => {
  logger.fatal({ err: toErrorMessage(error) }, 'Fatal error during stream tap startup');
  process.exit(1);
});
