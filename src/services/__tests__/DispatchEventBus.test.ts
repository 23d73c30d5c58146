import { DispatchEvent, DispatchEventBus, DispatchEventKind, DispatchObserver } from '../DispatchEventBus';
import { Logger } from '../../utils/logger';

describe('DispatchEventBus', () => {
  const fixedNow = new Date('2026-02-01T10:00:00.000Z');
  let log: Logger;
  let bus: DispatchEventBus;

  const recorder = (): DispatchObserver & { received: DispatchEvent[] } => {
    const received: DispatchEvent[] = [];
    return {
      received,
      onEvent: (_kind, _message, event) => {
        received.push(event);
      }
    };
  };

  beforeEach(() => {
    log = new Logger('error');
    bus = new DispatchEventBus(log, () => fixedNow);
  });

  it('should deliver events with kind, message, context and timestamp', () => {
    const observer = recorder();
    bus.subscribe(observer);

    const event = bus.emit(DispatchEventKind.RIDE_REQUESTED, 'Ride RIDE_1 requested', {
      rideId: 'RIDE_1',
      riderId: 'R1'
    });

    expect(observer.received).toEqual([event]);
    expect(event.kind).toBe('RideRequested');
    expect(event.message).toBe('Ride RIDE_1 requested');
    expect(event.rideId).toBe('RIDE_1');
    expect(event.riderId).toBe('R1');
    expect(event.driverId).toBeUndefined();
    expect(event.timestamp).toBe('2026-02-01T10:00:00.000Z');
    expect(event.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should deliver in subscription order and ignore duplicate subscriptions', () => {
    const order: string[] = [];
    const first: DispatchObserver = { onEvent: () => order.push('first') };
    const second: DispatchObserver = { onEvent: () => order.push('second') };

    bus.subscribe(first);
    bus.subscribe(second);
    bus.subscribe(first);
    bus.emit(DispatchEventKind.PAYMENT_COMPLETED, 'paid');

    expect(order).toEqual(['first', 'second']);
    expect(bus.observerCount).toBe(2);
  });

  it('should stop delivering after unsubscribe', () => {
    const observer = recorder();
    const unsubscribe = bus.subscribe(observer);

    unsubscribe();
    bus.emit(DispatchEventKind.PAYMENT_COMPLETED, 'paid');

    expect(observer.received).toHaveLength(0);
    expect(bus.unsubscribe(observer)).toBe(false);
  });

  it('should keep delivering when an observer throws', () => {
    const warn = jest.spyOn(log, 'warn');
    const failing: DispatchObserver = {
      onEvent: () => {
        throw new Error('listener down');
      }
    };
    const observer = recorder();

    bus.subscribe(failing);
    bus.subscribe(observer);
    const event = bus.emit(DispatchEventKind.DRIVER_ASSIGNED, 'assigned');

    expect(observer.received).toEqual([event]);
    expect(warn).toHaveBeenCalledWith('Dispatch observer failed', {
      kind: DispatchEventKind.DRIVER_ASSIGNED,
      eventId: event.id,
      error: 'listener down'
    });
  });

  it('should not skip a neighbour when an observer unsubscribes during delivery', () => {
    const observer = recorder();
    const selfRemoving: DispatchObserver = {
      onEvent: () => {
        bus.unsubscribe(selfRemoving);
      }
    };

    bus.subscribe(selfRemoving);
    bus.subscribe(observer);
    bus.emit(DispatchEventKind.RIDE_STATUS_UPDATE, 'Ride has started');

    expect(observer.received).toHaveLength(1);
    expect(bus.observerCount).toBe(1);
  });
});
