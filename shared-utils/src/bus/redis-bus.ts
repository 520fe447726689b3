import Redis from "ioredis";
import { ConsoleLogger, Logger } from "../logger";
import {
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventType,
} from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Messages arrive from other processes, so the envelope is checked before
 * any handler sees it
 */
export function isBusEvent(value: unknown): value is BusEvent {
  if (!isRecord(value) || !isRecord(value.data)) return false;
  const { data } = value;
  return (
    value.type === "listing_event" &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string" &&
    typeof data.eventType === "string" &&
    typeof data.listingId === "string" &&
    typeof data.timestamp === "string"
  );
}

/**
 * Redis bus implementation using plain pub/sub, with separate connections
 * for publishing and subscribing
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private handlers = new Map<EventType, EventHandler[]>();
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    const retryAttempts = config.retryAttempts ?? 3;
    this.logger = logger ?? new ConsoleLogger(config.serviceName);

    this.subscriber = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      retryStrategy: (times) =>
        times > retryAttempts ? null : (config.retryDelayMs ?? 1000) * times,
      lazyConnect: true,
    });

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.subscriber.on("error", (error) => {
      this.logger.error("Redis subscriber error:", error);
    });
    this.publisher.on("error", (error) => {
      this.logger.error("Redis publisher error:", error);
    });
    this.subscriber.on("message", (channel: string, message: string) => {
      void this.dispatch(channel, message);
    });
  }

  async subscribe(topic: EventType, handler: EventHandler): Promise<void> {
    const handlers = this.handlers.get(topic);
    if (handlers) {
      handlers.push(handler);
      return;
    }

    this.handlers.set(topic, [handler]);
    await this.subscriber.subscribe(topic);
    this.logger.info(`Subscribed to topic: ${topic}`);
  }

  async publish(event: BusEvent): Promise<void> {
    await this.publisher.publish(event.type, JSON.stringify(event));
    this.logger.debug(`Published ${event.data.eventType} for ${event.data.listingId}`);
  }

  /**
   * Hand a raw pub/sub message to the topic's handlers. Messages that are
   * not JSON or not a listing event envelope are logged and dropped.
   */
  async dispatch(channel: string, message: string): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(message);
    } catch (error) {
      this.logger.warn(`Dropping malformed message on ${channel}:`, error);
      return;
    }

    if (!isBusEvent(parsed)) {
      this.logger.warn(`Dropping unrecognised message on ${channel}`);
      return;
    }

    const event = parsed;
    const handlers = this.handlers.get(event.type) ?? [];

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Handler error for ${channel} (${event.id}):`, error);
        }
      })
    );
  }

  async close(): Promise<void> {
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.logger.info("Redis bus connections closed");
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
