import {
  Address,
  AuctionHistoryEntry,
  AuctionObservation,
  CanonicalSnapshot,
  ISO,
  Listing,
  ListingStatus,
  Money,
  PriceHistoryEntry,
  PropertyType,
} from "./dto";
import { ListingEvent, ListingEventOf } from "./events";
import { computePriceDrop, formatMoney } from "./money";
import { EventTimeline } from "./timeline";
import { compareIso, laterOf, sameInstant } from "./utils";

/**
 * Start an aggregate for a listing seen for the first time. State, prices
 * and histories start empty; the first snapshot is applied on top.
 */
export function createListing(snapshot: CanonicalSnapshot, observedAt: ISO): Listing {
  return {
    listingId: snapshot.listingId,
    address: { ...snapshot.address },
    suburb: snapshot.address.suburb,
    propertyType: snapshot.propertyType,
    bedrooms: null,
    bathrooms: null,
    landSize: null,
    buildingSize: null,
    propertyLink: null,
    description: null,
    status: "UNKNOWN",
    currentPrice: null,
    previousPrice: null,
    auctionDatetime: null,
    priceHistory: [],
    auctionHistory: [],
    createdAt: observedAt,
    updatedAt: observedAt,
    source: snapshot.sourceId,
    version: 0,
  };
}

/**
 * Copy descriptive fields from the snapshot, last write wins. The address
 * is replaced as a whole.
 */
export function applyDescriptive(listing: Listing, snapshot: CanonicalSnapshot): void {
  listing.address = {
    ...snapshot.address,
    location: snapshot.address.location ? { ...snapshot.address.location } : null,
  };
  listing.suburb = snapshot.address.suburb;
  listing.propertyType = snapshot.propertyType;
  listing.bedrooms = snapshot.bedrooms;
  listing.bathrooms = snapshot.bathrooms;
  listing.landSize = snapshot.landSize;
  listing.buildingSize = snapshot.buildingSize;
  listing.propertyLink = snapshot.propertyLink;
  listing.description = snapshot.description;
}

function lastOf<T>(entries: T[]): T | undefined {
  return entries[entries.length - 1];
}

/**
 * Record a newly observed price.
 *
 * No-op for an absent price, an unchanged price, or an observation older
 * than the latest price entry. Emits PRICE_DROPPED when the price falls
 * below the one it replaces.
 */
export function applyPrice(
  listing: Listing,
  newPrice: Money | null,
  observedAt: ISO,
  timeline?: EventTimeline,
  source?: string
): ListingEventOf<"PRICE_DROPPED"> | null {
  if (newPrice === null || newPrice === listing.currentPrice) return null;

  const last = lastOf(listing.priceHistory);
  if (last && compareIso(observedAt, last.timestamp) < 0) return null;

  const oldPrice = listing.currentPrice;
  // computed before mutating so a failure leaves the listing untouched
  const drop =
    oldPrice !== null && newPrice < oldPrice
      ? computePriceDrop(oldPrice, newPrice)
      : null;

  listing.priceHistory.push({
    price: newPrice,
    timestamp: observedAt,
    source: source ?? null,
  });
  listing.previousPrice = oldPrice;
  listing.currentPrice = newPrice;
  listing.updatedAt = laterOf(listing.updatedAt, observedAt);

  if (oldPrice === null || drop === null) return null;

  const event: ListingEventOf<"PRICE_DROPPED"> = {
    eventType: "PRICE_DROPPED",
    listingId: listing.listingId,
    timestamp: observedAt,
    metadata: {
      oldPrice: formatMoney(oldPrice),
      newPrice: formatMoney(newPrice),
      dropAmount: formatMoney(drop.dropAmount),
      dropPercent: drop.dropPercent,
    },
  };
  timeline?.add(event);
  return event;
}

/**
 * Record a newly observed auction / sale state.
 *
 * No-op when neither status nor auction datetime changed, or when the
 * observation is older than the latest auction entry. At most one event is
 * emitted; cancellation beats voiding beats rescheduling.
 */
export function applyAuction(
  listing: Listing,
  observation: AuctionObservation,
  observedAt: ISO,
  timeline?: EventTimeline
): ListingEvent | null {
  const { status, auctionDatetime, notes } = observation;

  if (
    status === listing.status &&
    sameInstant(auctionDatetime, listing.auctionDatetime)
  ) {
    return null;
  }

  const last = lastOf(listing.auctionHistory);
  if (last && compareIso(observedAt, last.timestamp) < 0) return null;

  const previousStatus = listing.status;
  const previousDatetime = listing.auctionDatetime;

  listing.auctionHistory.push({
    auctionDatetime,
    status,
    notes,
    timestamp: observedAt,
  });
  listing.status = status;
  listing.auctionDatetime = auctionDatetime;
  listing.updatedAt = laterOf(listing.updatedAt, observedAt);

  const event = selectAuctionEvent(
    listing.listingId,
    previousStatus,
    previousDatetime,
    observation,
    observedAt
  );
  if (event) timeline?.add(event);
  return event;
}

function selectAuctionEvent(
  listingId: string,
  previousStatus: ListingStatus,
  previousDatetime: ISO | null,
  { status, auctionDatetime, notes }: AuctionObservation,
  observedAt: ISO
): ListingEvent | null {
  const ended = {
    previousStatus,
    auctionDatetime: auctionDatetime ?? previousDatetime,
    notes,
  };

  if (status === "CANCELLED" && previousStatus !== "CANCELLED") {
    return {
      eventType: "AUCTION_CANCELLED",
      listingId,
      timestamp: observedAt,
      metadata: ended,
    };
  }

  if (status === "VOIDED" && previousStatus !== "VOIDED") {
    return {
      eventType: "AUCTION_VOIDED",
      listingId,
      timestamp: observedAt,
      metadata: ended,
    };
  }

  if (
    status === "SCHEDULED" &&
    previousDatetime !== null &&
    auctionDatetime !== null &&
    !sameInstant(previousDatetime, auctionDatetime)
  ) {
    return {
      eventType: "AUCTION_RESCHEDULED",
      listingId,
      timestamp: observedAt,
      metadata: {
        oldAuctionDatetime: previousDatetime,
        newAuctionDatetime: auctionDatetime,
        notes,
      },
    };
  }

  // other transitions (e.g. SCHEDULED -> SOLD) are recorded without an event
  return null;
}

/** Price history, most recent first. */
export function priceHistoryDesc(listing: Listing): PriceHistoryEntry[] {
  return [...listing.priceHistory].reverse();
}

/** Auction history, most recent first. */
export function auctionHistoryDesc(listing: Listing): AuctionHistoryEntry[] {
  return [...listing.auctionHistory].reverse();
}

export interface ListingView {
  listingId: string;
  address: Address;
  suburb: string;
  propertyType: PropertyType;
  bedrooms: number | null;
  bathrooms: number | null;
  landSize: number | null;
  buildingSize: number | null;
  propertyLink: string | null;
  description: string | null;
  status: ListingStatus;
  currentPrice: string | null;
  previousPrice: string | null;
  auctionDatetime: ISO | null;
  priceHistory: { price: string; timestamp: ISO; source: string | null }[];
  auctionHistory: AuctionHistoryEntry[];
  createdAt: ISO;
  updatedAt: ISO;
  source: string | null;
}

/**
 * Read model for consumers: histories newest first, money as decimal strings
 */
export function toListingView(listing: Listing): ListingView {
  return {
    listingId: listing.listingId,
    address: listing.address,
    suburb: listing.suburb,
    propertyType: listing.propertyType,
    bedrooms: listing.bedrooms,
    bathrooms: listing.bathrooms,
    landSize: listing.landSize,
    buildingSize: listing.buildingSize,
    propertyLink: listing.propertyLink,
    description: listing.description,
    status: listing.status,
    currentPrice:
      listing.currentPrice === null ? null : formatMoney(listing.currentPrice),
    previousPrice:
      listing.previousPrice === null ? null : formatMoney(listing.previousPrice),
    auctionDatetime: listing.auctionDatetime,
    priceHistory: priceHistoryDesc(listing).map((entry) => ({
      price: formatMoney(entry.price),
      timestamp: entry.timestamp,
      source: entry.source,
    })),
    auctionHistory: auctionHistoryDesc(listing),
    createdAt: listing.createdAt,
    updatedAt: listing.updatedAt,
    source: listing.source,
  };
}
