import { Listing } from "./dto";
import { EventType, ListingEvent } from "./events";

/**
 * Everything one ingestion writes. Adapters must apply it all or nothing.
 */
export interface CommitUnit {
  listing: Listing;
  /** Version the listing had when loaded; 0 for a new listing */
  expectedVersion: number;
  events: ListingEvent[];
  fingerprint: string;
}

// Persistence for listings, their event timeline and fingerprints
export interface ListingStorePort {
  getListing(listingId: string): Promise<Listing | null>;
  getLastFingerprint(listingId: string): Promise<string | null>;
  queryEvents(
    listingId: string,
    eventType?: EventType,
    limit?: number
  ): Promise<ListingEvent[]>;
  /**
   * Save the listing, append its events and record the fingerprint as one
   * atomic unit. Throws ConflictError when the stored version is not
   * `expectedVersion`.
   */
  commit(unit: CommitUnit): Promise<void>;
}

// Fan-out of committed events to downstream consumers
export interface EventPublisherPort {
  publish(event: ListingEvent): Promise<void>;
}

export interface SourceItem {
  sourceId: string;
  payload: unknown;
  origin?: string; // e.g. the file the payload came from
}

// Already-fetched scraper output
export interface SourcePort {
  readBatch(): Promise<SourceItem[]>;
}
