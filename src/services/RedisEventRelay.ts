import { DispatchEvent, DispatchEventKind, DispatchObserver } from './DispatchEventBus';
import { Logger, logger as defaultLogger } from '../utils/logger';

/**
 * The slice of a Redis client the relay needs.
 */
export interface EventPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export const DEFAULT_EVENTS_CHANNEL = 'dispatch:events';

/**
 * Forwards every dispatch event to a Redis pub/sub channel as JSON.
 *
 * Publishing is fire-and-forget from the emitter's point of view: the
 * returned promise is tracked here and a failed publish is only logged.
 */
export class RedisEventRelay implements DispatchObserver {
  private readonly pending = new Set<Promise<void>>();
  private published = 0;
  private failed = 0;

  constructor(
    private readonly publisher: EventPublisher,
    private readonly channel: string = DEFAULT_EVENTS_CHANNEL,
    private readonly log: Logger = defaultLogger
  ) {}

  onEvent(_kind: DispatchEventKind, _message: string, event: DispatchEvent): void {
    const task = this.publisher
      .publish(this.channel, JSON.stringify(event))
      .then(
        () => {
          this.published++;
        },
        (error: unknown) => {
          this.failed++;
          this.log.error('Failed to relay dispatch event', error, {
            eventId: event.id,
            kind: event.kind,
            channel: this.channel
          });
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** Resolves once every publish started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get stats(): { published: number; failed: number; pending: number } {
    return { published: this.published, failed: this.failed, pending: this.pending.size };
  }
}
