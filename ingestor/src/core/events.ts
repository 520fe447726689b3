import { z } from "zod";
import { ISO, LISTING_STATUSES, ListingStatus } from "./dto";

export const EVENT_TYPES = [
  "AUCTION_CANCELLED",
  "AUCTION_RESCHEDULED",
  "AUCTION_VOIDED",
  "PRICE_DROPPED",
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export interface PriceDroppedMetadata {
  oldPrice: string;
  newPrice: string;
  dropAmount: string;
  dropPercent: number;
}

/** Shared by AUCTION_CANCELLED and AUCTION_VOIDED */
export interface AuctionEndedMetadata {
  previousStatus: ListingStatus;
  auctionDatetime: ISO | null;
  notes: string | null;
}

export interface AuctionRescheduledMetadata {
  oldAuctionDatetime: ISO;
  newAuctionDatetime: ISO;
  notes: string | null;
}

export interface EventMetadataMap {
  AUCTION_CANCELLED: AuctionEndedMetadata;
  AUCTION_RESCHEDULED: AuctionRescheduledMetadata;
  AUCTION_VOIDED: AuctionEndedMetadata;
  PRICE_DROPPED: PriceDroppedMetadata;
}

/**
 * An immutable fact derived from a listing transition. The metadata shape
 * is determined by `eventType`.
 */
export type ListingEvent = {
  [K in EventType]: {
    eventType: K;
    listingId: string;
    timestamp: ISO;
    metadata: EventMetadataMap[K];
  };
}[EventType];

export type ListingEventOf<K extends EventType> = Extract<
  ListingEvent,
  { eventType: K }
>;

type Unstamped<E> = E extends ListingEvent
  ? Omit<E, "timestamp"> & { timestamp?: ISO }
  : never;

/** An event before the timeline has stamped it. */
export type ListingEventInput = Unstamped<ListingEvent>;

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

const auctionEndedSchema = z.object({
  previousStatus: z.enum(LISTING_STATUSES),
  auctionDatetime: z.string().nullable(),
  notes: z.string().nullable(),
});

const listingEventSchema = z.discriminatedUnion("eventType", [
  z.object({
    eventType: z.literal("PRICE_DROPPED"),
    listingId: z.string(),
    timestamp: z.string(),
    metadata: z.object({
      oldPrice: z.string(),
      newPrice: z.string(),
      dropAmount: z.string(),
      dropPercent: z.number(),
    }),
  }),
  z.object({
    eventType: z.literal("AUCTION_CANCELLED"),
    listingId: z.string(),
    timestamp: z.string(),
    metadata: auctionEndedSchema,
  }),
  z.object({
    eventType: z.literal("AUCTION_VOIDED"),
    listingId: z.string(),
    timestamp: z.string(),
    metadata: auctionEndedSchema,
  }),
  z.object({
    eventType: z.literal("AUCTION_RESCHEDULED"),
    listingId: z.string(),
    timestamp: z.string(),
    metadata: z.object({
      oldAuctionDatetime: z.string(),
      newAuctionDatetime: z.string(),
      notes: z.string().nullable(),
    }),
  }),
]);

/**
 * Validate an event read back from storage or the wire.
 * Throws a ZodError when the metadata does not match its event type.
 */
export function parseListingEvent(value: unknown): ListingEvent {
  return listingEventSchema.parse(value);
}
