import { ISO } from "./dto";
import { EventType, ListingEvent, ListingEventInput } from "./events";
import { compareIso } from "./utils";

/**
 * Append-only log of listing events, indexed by listing.
 *
 * Every read reflects all completed `add` calls. Results are ordered by
 * timestamp, most recent first; events sharing a timestamp come out most
 * recently added first.
 */
export class EventTimeline {
  private events: ListingEvent[] = [];
  private byListing = new Map<string, ListingEvent[]>();

  constructor(private clock: () => ISO = () => new Date().toISOString()) {}

  add(input: ListingEventInput): ListingEvent {
    const event: ListingEvent = {
      ...input,
      timestamp: input.timestamp ?? this.clock(),
    };
    Object.freeze(event.metadata);
    Object.freeze(event);

    insertDescending(this.events, event);

    const forListing = this.byListing.get(event.listingId);
    if (forListing) {
      insertDescending(forListing, event);
    } else {
      this.byListing.set(event.listingId, [event]);
    }

    return event;
  }

  query(listingId: string, eventType?: EventType, limit?: number): ListingEvent[] {
    return select(this.byListing.get(listingId) ?? [], eventType, limit);
  }

  latest(listingId: string, eventType?: EventType): ListingEvent | null {
    return this.query(listingId, eventType, 1)[0] ?? null;
  }

  has(listingId: string, eventType: EventType): boolean {
    return this.latest(listingId, eventType) !== null;
  }

  count(listingId?: string, eventType?: EventType): number {
    const pool =
      listingId === undefined
        ? this.events
        : this.byListing.get(listingId) ?? [];
    return select(pool, eventType).length;
  }

  /**
   * Events across all listings
   */
  all(eventType?: EventType, limit?: number): ListingEvent[] {
    return select(this.events, eventType, limit);
  }

  get size(): number {
    return this.events.length;
  }

  listingIds(): string[] {
    return Array.from(this.byListing.keys());
  }
}

function insertDescending(list: ListingEvent[], event: ListingEvent): void {
  const index = list.findIndex(
    (existing) => compareIso(existing.timestamp, event.timestamp) <= 0
  );
  if (index === -1) {
    list.push(event);
  } else {
    list.splice(index, 0, event);
  }
}

function select(
  list: ListingEvent[],
  eventType?: EventType,
  limit?: number
): ListingEvent[] {
  const filtered =
    eventType === undefined
      ? [...list]
      : list.filter((event) => event.eventType === eventType);
  return limit === undefined ? filtered : filtered.slice(0, Math.max(0, limit));
}
