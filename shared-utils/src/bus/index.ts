export type {
  BaseEvent,
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventType,
  ListingEventMessage,
} from "./types";

export { createMemoryBus, MemoryBus } from "./memory-bus";
export { createRedisBus, isBusEvent, RedisBus } from "./redis-bus";

import { Logger } from "../logger";
import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusConfig, BusPort } from "./types";

export interface BusFactoryConfig extends Partial<BusConfig> {
  type: "redis" | "memory";
  serviceName: string;
  redisUrl?: string;
  logger?: Logger;
}

/**
 * Factory function to create the appropriate bus based on configuration
 */
export function createBus(config: BusFactoryConfig): BusPort {
  switch (config.type) {
    case "redis":
      if (!config.redisUrl) {
        throw new Error("Redis URL is required for Redis bus");
      }
      return createRedisBus(
        {
          redisUrl: config.redisUrl,
          serviceName: config.serviceName,
          retryAttempts: config.retryAttempts,
          retryDelayMs: config.retryDelayMs,
        },
        config.logger
      );

    case "memory":
      return createMemoryBus(config.serviceName, config.logger);

    default:
      throw new Error(`Unknown bus type: ${String(config.type)}`);
  }
}
