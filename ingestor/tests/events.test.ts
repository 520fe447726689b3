import { describe, expect, it } from "vitest";
import { isEventType, parseListingEvent } from "../src/core/events";

describe("events", () => {
  it("should recognise event types", () => {
    expect(isEventType("PRICE_DROPPED")).toBe(true);
    expect(isEventType("AUCTION_VOIDED")).toBe(true);
    expect(isEventType("PRICE_RAISED")).toBe(false);
  });

  it("should parse a stored event", () => {
    const raw = {
      eventType: "AUCTION_CANCELLED",
      listingId: "realestate:1",
      timestamp: "2024-12-10T09:00:00.000Z",
      metadata: {
        previousStatus: "SCHEDULED",
        auctionDatetime: "2024-12-20T10:00:00.000Z",
        notes: null,
      },
    };

    expect(parseListingEvent(raw)).toEqual(raw);
  });

  it("should reject metadata that does not match the event type", () => {
    expect(() =>
      parseListingEvent({
        eventType: "PRICE_DROPPED",
        listingId: "realestate:1",
        timestamp: "2024-12-10T09:00:00.000Z",
        metadata: {
          previousStatus: "SCHEDULED",
          auctionDatetime: null,
          notes: null,
        },
      })
    ).toThrow();
  });

  it("should reject unknown event types", () => {
    expect(() =>
      parseListingEvent({
        eventType: "PRICE_RAISED",
        listingId: "realestate:1",
        timestamp: "2024-12-10T09:00:00.000Z",
        metadata: {},
      })
    ).toThrow();
  });
});
