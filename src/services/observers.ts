import { DispatchEvent, DispatchEventKind, DispatchObserver } from './DispatchEventBus';
import { Logger, logger as defaultLogger } from '../utils/logger';

export type NotificationAudience = 'rider' | 'driver';

/**
 * Writes events addressed to one rider or driver to the log.
 * Stands in for push or SMS delivery, which lives outside this service.
 */
export class NotificationLogObserver implements DispatchObserver {
  constructor(
    private readonly audience: NotificationAudience,
    private readonly userId: string,
    private readonly log: Logger = defaultLogger
  ) {}

  onEvent(kind: DispatchEventKind, message: string, event: DispatchEvent): void {
    const addressee = this.audience === 'rider' ? event.riderId : event.driverId;
    if (addressee !== this.userId) return;

    this.log.info(`[${this.audience.toUpperCase()} NOTIFICATION - ${this.userId}] ${kind}: ${message}`, {
      eventId: event.id,
      rideId: event.rideId
    });
  }
}

/**
 * Keeps the most recent events in memory, oldest first.
 */
export class RecentEventsObserver implements DispatchObserver {
  private readonly buffer: DispatchEvent[] = [];

  constructor(private readonly capacity: number = 200) {}

  onEvent(_kind: DispatchEventKind, _message: string, event: DispatchEvent): void {
    this.buffer.push(event);
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
  }

  /** Latest `limit` events, oldest first. */
  recent(limit: number = this.capacity): DispatchEvent[] {
    if (limit <= 0) return [];
    return this.buffer.slice(-limit);
  }

  get size(): number {
    return this.buffer.length;
  }
}
