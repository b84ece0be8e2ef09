import type { FeedHandler, Topic } from '@streamgate/schemas';
import { TopicValidationError } from '../errors';

/**
 * One desired subscription
 */
export interface SubscriptionEntry {
  /** Normalized local key (unique) */
  key: string;
  topic: Topic;
  /** Venue-side channel that data frames are routed by */
  channel: string;
  /** Token placed in control frames */
  wire: string;
  /** Frames on the channel carry the key; other topics may use the channel too */
  sharedChannel?: boolean;
  handler: FeedHandler;
  /** Acknowledged (or sent, for venues without acks) on the current connection */
  active: boolean;
}

/**
 * Desired subscription set
 *
 * Survives reconnects; it is the source of truth for replay. Only the
 * connection manager mutates it, so no locking is needed.
 */
export class SubscriptionRegistry {
  private readonly entries = new Map<string, SubscriptionEntry>();

  /**
   * Insert or replace the entry for `entry.key`. Returns true when the key was new.
   *
   * Throws TopicValidationError when another key already owns the channel,
   * since frames on it could only reach one of them.
   */
  upsert(entry: Omit<SubscriptionEntry, 'active'>): boolean {
    for (const other of this.entries.values()) {
      if (other.key !== entry.key && other.channel === entry.channel && !(other.sharedChannel && entry.sharedChannel)) {
        throw new TopicValidationError(`Topic ${entry.key} uses channel '${entry.channel}' already taken by ${other.key}`);
      }
    }
    const isNew = !this.entries.has(entry.key);
    this.entries.set(entry.key, { ...entry, active: false });
    return isNew;
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  get(key: string): SubscriptionEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Entry whose venue channel matches, or undefined
   */
  findByChannel(channel: string): SubscriptionEntry | undefined {
    for (const entry of this.entries.values()) {
      if (entry.channel === channel) return entry;
    }
    return undefined;
  }

  markActive(keys: readonly string[], active = true): void {
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (entry) entry.active = active;
    }
  }

  markAllInactive(): void {
    for (const entry of this.entries.values()) {
      entry.active = false;
    }
  }

  /**
   * All entries ordered by key
   */
  list(): SubscriptionEntry[] {
    return [...this.entries.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  get size(): number {
    return this.entries.size;
  }
}
