import { v4 as uuidv4 } from 'uuid';
import { Logger, logger as defaultLogger } from '../utils/logger';

export enum DispatchEventKind {
  USER_REGISTERED = 'UserRegistered',
  RIDE_REQUESTED = 'RideRequested',
  DRIVER_ASSIGNED = 'DriverAssigned',
  DRIVER_REJECTED = 'DriverRejected',
  NO_DRIVER_ASSIGNED = 'NoDriverAssigned',
  NO_DRIVER_AVAILABLE = 'NoDriverAvailable',
  RIDE_STATUS_UPDATE = 'RideStatusUpdate',
  PAYMENT_COMPLETED = 'PaymentCompleted'
}

export interface DispatchEvent {
  id: string;
  kind: DispatchEventKind;
  message: string;
  rideId?: string;
  riderId?: string;
  driverId?: string;
  timestamp: string;
}

export interface DispatchObserver {
  onEvent(kind: DispatchEventKind, message: string, event: DispatchEvent): void;
}

export interface EmitContext {
  rideId?: string;
  riderId?: string;
  driverId?: string;
}

/**
 * In-process pub/sub for dispatch events.
 *
 * Observers run synchronously, in subscription order. One that throws is
 * logged and skipped; the rest still receive the event and the emitter
 * carries on.
 */
export class DispatchEventBus {
  private readonly observers: DispatchObserver[] = [];

  constructor(
    private readonly log: Logger = defaultLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Returns an unsubscribe function. */
  subscribe(observer: DispatchObserver): () => void {
    if (!this.observers.includes(observer)) {
      this.observers.push(observer);
    }
    return () => this.unsubscribe(observer);
  }

  unsubscribe(observer: DispatchObserver): boolean {
    const idx = this.observers.indexOf(observer);
    if (idx === -1) return false;
    this.observers.splice(idx, 1);
    return true;
  }

  emit(kind: DispatchEventKind, message: string, context: EmitContext = {}): DispatchEvent {
    const event: DispatchEvent = {
      id: uuidv4(),
      kind,
      message,
      ...context,
      timestamp: this.now().toISOString()
    };

    // snapshot so an observer unsubscribing mid-delivery does not skip a neighbour
    for (const observer of [...this.observers]) {
      try {
        observer.onEvent(kind, message, event);
      } catch (error) {
        this.log.warn('Dispatch observer failed', {
          kind,
          eventId: event.id,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return event;
  }

  get observerCount(): number {
    return this.observers.length;
  }
}
