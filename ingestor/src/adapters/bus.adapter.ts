import { BusPort, ListingEventMessage } from "@listingtrail/shared-utils";
import { ListingEvent } from "../core/events";
import { EventPublisherPort } from "../core/ports";

export const EVENT_MESSAGE_VERSION = "1.0.0";

export function toBusMessage(event: ListingEvent): ListingEventMessage {
  return {
    type: "listing_event",
    id: event.listingId,
    timestamp: event.timestamp,
    version: EVENT_MESSAGE_VERSION,
    data: {
      eventType: event.eventType,
      listingId: event.listingId,
      timestamp: event.timestamp,
      metadata: event.metadata,
    },
  };
}

/**
 * Adapter that bridges the shared bus interface with the ingestor's
 * event publisher port
 */
export class BusPublisher implements EventPublisherPort {
  constructor(private sharedBus: BusPort) {}

  async publish(event: ListingEvent): Promise<void> {
    return this.sharedBus.publish(toBusMessage(event));
  }

  async close(): Promise<void> {
    if (this.sharedBus.close) {
      return this.sharedBus.close();
    }
  }
}
