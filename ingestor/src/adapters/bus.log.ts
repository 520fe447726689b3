import { Logger } from "@listingtrail/shared-utils";
import { ListingEvent } from "../core/events";
import { EventPublisherPort } from "../core/ports";

/**
 * Simple logging publisher for development
 * Logs events instead of publishing to an actual message bus
 */
export class LogPublisher implements EventPublisherPort {
  constructor(private logger: Logger) {}

  async publish(event: ListingEvent): Promise<void> {
    this.logger.info(`Publishing ${event.eventType} for ${event.listingId}:`, {
      timestamp: event.timestamp,
      metadata: event.metadata,
    });
  }
}
