import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus, EventType } from '../src/infra/eventBus.js';

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers events to specific listeners', () => {
    const received: Array<{ event: EventType; data: unknown }> = [];
    bus.on('vote.cast', (event, data) => {
      received.push({ event, data });
    });

    bus.emit('vote.cast', { account: 'alice' });
    bus.emit('revenue.notified', { amount: '10' });

    expect(received).toEqual([{ event: 'vote.cast', data: { account: 'alice' } }]);
  });

  it('delivers all events to wildcard listeners', () => {
    const received: EventType[] = [];
    bus.on('*', (event) => {
      received.push(event);
    });

    bus.emit('strategy.added', {});
    bus.emit('revenue.notified', {});
    bus.emit('auction.purchased', {});

    expect(received).toEqual(['strategy.added', 'revenue.notified', 'auction.purchased']);
  });

  it('unsubscribes correctly', () => {
    const received: unknown[] = [];
    const unsub = bus.on('strategy.distributed', (_e, data) => {
      received.push(data);
    });
    const unsubAll = bus.on('*', (_e, data) => {
      received.push(data);
    });

    bus.emit('strategy.distributed', 'first');
    unsub();
    unsubAll();
    bus.emit('strategy.distributed', 'second');

    expect(received).toEqual(['first', 'first']);
  });

  it('clear() removes all listeners', () => {
    const received: unknown[] = [];
    bus.on('vote.reset', (_e, data) => received.push(data));
    bus.on('*', (_e, data) => received.push(data));

    bus.clear();
    bus.emit('vote.reset', 'test');

    expect(received).toHaveLength(0);
  });

  it('counts listener errors without affecting other listeners', () => {
    const received: unknown[] = [];

    bus.on('vote.cast', () => {
      throw new Error('boom');
    });
    bus.on('vote.cast', (_e, data) => {
      received.push(data);
    });

    bus.emit('vote.cast', 'value');

    expect(received).toEqual(['value']);
    expect(bus.failures).toBe(1);
  });
});
