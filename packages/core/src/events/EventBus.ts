import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type {
  DiskStatsErrorEvent,
  DiskStatsMalformedEvent,
  DiskStatsRefreshEvent,
  EventBusMessage,
} from '@diskpulse/shared';

type EventMap = {
  'diskstats:refresh': DiskStatsRefreshEvent;
  'diskstats:malformed': DiskStatsMalformedEvent;
  'diskstats:error': DiskStatsErrorEvent;
  'system:shutdown': undefined;
};

export type EventName = keyof EventMap;

const ANY_EVENT = '*';

/**
 * Typed in-process events. Every event is also delivered to `onAny` subscribers wrapped in
 * an {@link EventBusMessage} stamped with this bus's source name.
 */
export class EventBus {
  private emitter: EventEmitter;
  private source: string;

  constructor(source: string = 'diskpulse') {
    this.source = source;
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    if (this.emitter.listenerCount(ANY_EVENT) === 0) return;

    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: this.source,
      timestamp: new Date(),
      data,
    };
    this.emitter.emit(ANY_EVENT, message);
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on(ANY_EVENT, handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off(ANY_EVENT, handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}

let defaultEventBus: EventBus | null = null;

export function getEventBus(): EventBus {
  if (!defaultEventBus) {
    defaultEventBus = new EventBus();
  }
  return defaultEventBus;
}
