import { Listing } from "../core/dto";
import { ConflictError } from "../core/errors";
import { EventType, ListingEvent } from "../core/events";
import { CommitUnit, ListingStorePort } from "../core/ports";
import { EventTimeline } from "../core/timeline";

export class MemoryListingStore implements ListingStorePort {
  private listings = new Map<string, Listing>();
  private fingerprints = new Map<string, string>();
  private timeline = new EventTimeline();

  async getListing(listingId: string): Promise<Listing | null> {
    const listing = this.listings.get(listingId);
    // callers mutate what they load; keep the stored copy private
    return listing ? structuredClone(listing) : null;
  }

  async getLastFingerprint(listingId: string): Promise<string | null> {
    return this.fingerprints.get(listingId) ?? null;
  }

  async queryEvents(
    listingId: string,
    eventType?: EventType,
    limit?: number
  ): Promise<ListingEvent[]> {
    return this.timeline.query(listingId, eventType, limit);
  }

  async commit(unit: CommitUnit): Promise<void> {
    const { listing, expectedVersion, events, fingerprint } = unit;
    const storedVersion = this.listings.get(listing.listingId)?.version ?? 0;

    if (storedVersion !== expectedVersion) {
      throw new ConflictError(
        listing.listingId,
        `Listing ${listing.listingId} is at version ${storedVersion}, expected ${expectedVersion}`
      );
    }

    // nothing below can throw, so the unit lands whole
    this.listings.set(listing.listingId, structuredClone(listing));
    this.fingerprints.set(listing.listingId, fingerprint);
    for (const event of events) {
      this.timeline.add(event);
    }
  }

  // Helper methods for testing and debugging
  getAllListings(): Listing[] {
    return Array.from(this.listings.values()).map((listing) =>
      structuredClone(listing)
    );
  }

  getTimeline(): EventTimeline {
    return this.timeline;
  }

  clear(): void {
    this.listings.clear();
    this.fingerprints.clear();
    this.timeline = new EventTimeline();
  }

  size(): number {
    return this.listings.size;
  }
}
