/**
 * Event types carried on the shared bus
 */
export type EventType = "listing_event";

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

/**
 * A listing timeline event (price drop, auction change) fanned out to
 * downstream consumers after it has been committed
 */
export interface ListingEventMessage extends BaseEvent {
  type: "listing_event";
  data: {
    eventType: string;
    listingId: string;
    timestamp: string;
    metadata: unknown;
  };
}

export type BusEvent = ListingEventMessage;

/**
 * Event handler function type
 */
export type EventHandler = (event: BusEvent) => Promise<void>;

/**
 * Standard bus port interface
 */
export interface BusPort {
  /**
   * Subscribe to events of a specific type
   */
  subscribe(topic: EventType, handler: EventHandler): Promise<void>;

  /**
   * Publish an event to a topic
   */
  publish(event: BusEvent): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
  retryDelayMs?: number;
}
