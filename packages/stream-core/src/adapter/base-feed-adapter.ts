import { TopicSchema, type ControlOp, type Topic } from '@streamgate/schemas';
import type { SessionCredential } from '../credentials/session-credential';
import { TopicValidationError } from '../errors';
import { mergeDelta } from '../snapshot/snapshot-store';
import type {
  ClassifiedFrame,
  DataFrame,
  FeedAdapter,
  ResolvedTopic,
  SessionPlacement,
} from './feed-adapter';

/**
 * Abstract base class for venue adapters
 *
 * Provides the parts every venue shares:
 * - JSON decoding
 * - topic shape validation before venue-specific mapping
 * - field-by-field delta merging driven by the frame's level fields
 *
 * Concrete adapters implement the wire format.
 */
export abstract class BaseFeedAdapter implements FeedAdapter {
  abstract readonly venue: string;
  abstract readonly controlRateLimit: number;
  abstract readonly maxTopicsPerFrame: number;
  abstract readonly supportsControlFrames: boolean;
  abstract readonly session: SessionPlacement;

  resolveTopic(topic: Topic): ResolvedTopic {
    const parsed = TopicSchema.safeParse(topic);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'topic'}: ${issue.message}`);
      throw new TopicValidationError(`Invalid topic: ${detail.join('; ')}`);
    }
    return this.mapTopic(parsed.data);
  }

  /** Venue mapping for an already shape-checked topic */
  protected abstract mapTopic(topic: Topic): ResolvedTopic;

  abstract buildConnectUrl(credential?: SessionCredential): string;

  buildAuthFrame(_now: number, _credential?: SessionCredential): string | null {
    return null;
  }

  abstract buildControlFrame(op: ControlOp, wires: string[], id: number): string;

  buildPingFrame(): string | null {
    return null;
  }

  decode(raw: string): unknown {
    return JSON.parse(raw);
  }

  abstract classifyFrame(decoded: unknown): ClassifiedFrame;

  applyDelta(current: unknown, delta: unknown, frame: DataFrame): unknown {
    return mergeDelta(current, delta, frame.levels);
  }

  protected invalid(topic: Topic, reason: string): TopicValidationError {
    return new TopicValidationError(`${this.venue}: unsupported topic ${JSON.stringify(topic)}: ${reason}`);
  }
}
