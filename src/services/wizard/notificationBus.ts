import type { WizardEvents } from '../../domain/contracts';
import { type Logger, silentLogger } from '../logging/logger';

export interface BusEvent<E, K extends keyof E = keyof E> {
  topic: K;
  payload: E[K];
}

export type Unsubscribe = () => void;

interface Subscription<T> {
  seq: number;
  listener: (value: T) => void;
}

/**
 * Synchronous publish/subscribe. Listeners run in subscription order, topic
 * subscribers and catch-all subscribers interleaved by when they subscribed.
 * A throwing listener is logged and does not stop delivery to the rest.
 */
export class NotificationBus<E extends object = WizardEvents> {
  private seq = 0;
  private readonly topics: { [K in keyof E]?: Array<Subscription<E[K]>> } = {};
  private catchAll: Array<Subscription<BusEvent<E>>> = [];
  private batchDepth = 0;
  private flushing = false;
  private held: Array<() => void> = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  subscribe<K extends keyof E>(topic: K, listener: (payload: E[K]) => void): Unsubscribe {
    const subscription: Subscription<E[K]> = { seq: this.seq++, listener };
    const existing = this.topics[topic] ?? [];
    this.topics[topic] = [...existing, subscription];

    return () => {
      const current = this.topics[topic] ?? [];
      this.topics[topic] = current.filter((entry) => entry !== subscription);
    };
  }

  subscribeAll(listener: (event: BusEvent<E>) => void): Unsubscribe {
    const subscription: Subscription<BusEvent<E>> = { seq: this.seq++, listener };
    this.catchAll = [...this.catchAll, subscription];

    return () => {
      this.catchAll = this.catchAll.filter((entry) => entry !== subscription);
    };
  }

  /**
   * Holds every event published inside `fn` and delivers them, in order, once
   * the outermost batch returns. Listeners never observe a half-applied update.
   * Events that listeners publish while held events are being delivered queue
   * behind them.
   */
  batch<T>(fn: () => T): T {
    this.batchDepth += 1;
    try {
      return fn();
    } finally {
      this.batchDepth -= 1;
      if (this.batchDepth === 0) {
        this.flush();
      }
    }
  }

  publish<K extends keyof E>(topic: K, payload: E[K]): void {
    if (this.batchDepth > 0 || this.flushing) {
      this.held.push(() => this.deliverAll(topic, payload));
      return;
    }
    this.deliverAll(topic, payload);
  }

  private flush(): void {
    if (this.flushing) {
      return;
    }
    this.flushing = true;
    try {
      let deliver = this.held.shift();
      while (deliver) {
        deliver();
        deliver = this.held.shift();
      }
    } finally {
      this.flushing = false;
    }
  }

  private deliverAll<K extends keyof E>(topic: K, payload: E[K]): void {
    const direct = this.topics[topic] ?? [];
    const event: BusEvent<E> = { topic, payload };
    const wildcard = this.catchAll;

    let i = 0;
    let j = 0;
    while (i < direct.length || j < wildcard.length) {
      const takeDirect = j >= wildcard.length || (i < direct.length && direct[i].seq < wildcard[j].seq);
      if (takeDirect) {
        this.deliver(topic, () => direct[i].listener(payload));
        i += 1;
      } else {
        this.deliver(topic, () => wildcard[j].listener(event));
        j += 1;
      }
    }
  }

  listenerCount(topic?: keyof E): number {
    if (topic === undefined) {
      return this.catchAll.length;
    }
    return (this.topics[topic]?.length ?? 0) + this.catchAll.length;
  }

  private deliver(topic: keyof E, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error(`Listener for "${String(topic)}" threw`, error);
    }
  }
}
