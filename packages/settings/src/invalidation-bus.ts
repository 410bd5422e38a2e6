export const SETTINGS_INVALIDATION_CHANNEL = "docrelay-settings-invalidate";

export type InvalidationHandler = (message: string) => void;

/** Fans settings invalidations out to every process that shares the settings table. */
export interface InvalidationBus {
  publish(message: string): Promise<void>;
  /** Resolves once subscribed; the returned function unsubscribes. */
  subscribe(handler: InvalidationHandler): Promise<() => Promise<void>>;
}

/** The commands the bus needs from an ioredis connection. */
export interface RedisPublisher {
  publish(channel: string, message: string): Promise<number>;
}

/** A connection in subscriber mode; it can run no other commands. */
export interface RedisSubscriber {
  subscribe(channel: string): Promise<unknown>;
  unsubscribe(channel: string): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
  off(event: "message", listener: (channel: string, message: string) => void): unknown;
}

export interface RedisInvalidationBusOptions {
  publisher: RedisPublisher;
  subscriber: RedisSubscriber;
  channel?: string;
}

export class RedisInvalidationBus implements InvalidationBus {
  private readonly publisher: RedisPublisher;
  private readonly subscriber: RedisSubscriber;
  private readonly channel: string;

  constructor(options: RedisInvalidationBusOptions) {
    this.publisher = options.publisher;
    this.subscriber = options.subscriber;
    this.channel = options.channel ?? SETTINGS_INVALIDATION_CHANNEL;
  }

  async publish(message: string): Promise<void> {
    await this.publisher.publish(this.channel, message);
  }

  async subscribe(handler: InvalidationHandler): Promise<() => Promise<void>> {
    const listener = (channel: string, message: string) => {
      if (channel === this.channel) {
        handler(message);
      }
    };
    this.subscriber.on("message", listener);
    await this.subscriber.subscribe(this.channel);
    return async () => {
      this.subscriber.off("message", listener);
      await this.subscriber.unsubscribe(this.channel);
    };
  }
}

/** In-process bus for tests and single-process deployments. */
export class MemoryInvalidationBus implements InvalidationBus {
  private readonly handlers = new Set<InvalidationHandler>();

  async publish(message: string): Promise<void> {
    for (const handler of this.handlers) {
      handler(message);
    }
  }

  async subscribe(handler: InvalidationHandler): Promise<() => Promise<void>> {
    this.handlers.add(handler);
    return async () => {
      this.handlers.delete(handler);
    };
  }
}
