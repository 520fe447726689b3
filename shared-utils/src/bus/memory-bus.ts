import { ConsoleLogger, Logger } from "../logger";
import { BusEvent, BusPort, EventHandler, EventType } from "./types";

/**
 * In-memory bus implementation for testing and development
 *
 * Handlers run in-process and are awaited before publish resolves, so a
 * test can assert on side effects right after publishing.
 */
export class MemoryBus implements BusPort {
  private handlers = new Map<EventType, EventHandler[]>();
  private publishedEvents: BusEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
  }

  async subscribe(topic: EventType, handler: EventHandler): Promise<void> {
    const handlers = this.handlers.get(topic);
    if (handlers) {
      handlers.push(handler);
      return;
    }

    this.handlers.set(topic, [handler]);
    this.logger.debug(`Subscribed to topic: ${topic}`);
  }

  async publish(event: BusEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);

    this.publishedEvents.push(event);

    const handlers = this.handlers.get(event.type) ?? [];

    const promises = handlers.map(async (handler) => {
      try {
        await handler(event);
      } catch (error) {
        // One failing subscriber must not starve the others
        this.logger.error(
          `Handler error for ${event.type} (${event.id}):`,
          error
        );
      }
    });

    await Promise.all(promises);
  }

  async close(): Promise<void> {
    this.logger.debug("Closing memory bus (clearing handlers)");
    this.handlers.clear();
    this.publishedEvents = [];
  }

  /**
   * Get all published events (useful for testing)
   */
  getPublishedEvents(): BusEvent[] {
    return [...this.publishedEvents];
  }

  /**
   * Clear published events history
   */
  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      subscribedTopics: Array.from(this.handlers.keys()),
      handlerCount: Array.from(this.handlers.values()).reduce(
        (sum, handlers) => sum + handlers.length,
        0
      ),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(serviceName?: string, logger?: Logger): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
