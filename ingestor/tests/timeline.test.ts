import { describe, expect, it } from "vitest";
import { ListingEventInput } from "../src/core/events";
import { EventTimeline } from "../src/core/timeline";

function priceDrop(listingId: string, timestamp?: string): ListingEventInput {
  return {
    eventType: "PRICE_DROPPED",
    listingId,
    timestamp,
    metadata: {
      oldPrice: "800000",
      newPrice: "750000",
      dropAmount: "50000",
      dropPercent: 6.25,
    },
  };
}

function cancelled(listingId: string, timestamp?: string): ListingEventInput {
  return {
    eventType: "AUCTION_CANCELLED",
    listingId,
    timestamp,
    metadata: { previousStatus: "SCHEDULED", auctionDatetime: null, notes: null },
  };
}

describe("EventTimeline", () => {
  it("should stamp events without a timestamp from its clock", () => {
    const timeline = new EventTimeline(() => "2024-12-05T00:00:00.000Z");

    const event = timeline.add(priceDrop("a:1"));

    expect(event.timestamp).toBe("2024-12-05T00:00:00.000Z");
  });

  it("should return events most recent first regardless of insertion order", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-02T00:00:00.000Z"));
    timeline.add(cancelled("a:1", "2024-12-03T00:00:00.000Z"));
    timeline.add(priceDrop("a:1", "2024-12-01T00:00:00.000Z"));

    expect(timeline.query("a:1").map((event) => event.timestamp)).toEqual([
      "2024-12-03T00:00:00.000Z",
      "2024-12-02T00:00:00.000Z",
      "2024-12-01T00:00:00.000Z",
    ]);
  });

  it("should put the most recently added first on equal timestamps", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-02T00:00:00.000Z"));
    timeline.add(cancelled("a:1", "2024-12-02T00:00:00.000Z"));

    expect(timeline.query("a:1").map((event) => event.eventType)).toEqual([
      "AUCTION_CANCELLED",
      "PRICE_DROPPED",
    ]);
  });

  it("should compare timestamps as instants", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-02T08:00:00+11:00"));
    timeline.add(cancelled("a:1", "2024-12-01T22:00:00.000Z"));

    // 08:00+11:00 is 21:00Z the day before, so the cancellation is newer
    expect(timeline.latest("a:1")?.eventType).toBe("AUCTION_CANCELLED");
  });

  it("should filter by type and honour the limit", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-01T00:00:00.000Z"));
    timeline.add(priceDrop("a:1", "2024-12-02T00:00:00.000Z"));
    timeline.add(cancelled("a:1", "2024-12-03T00:00:00.000Z"));
    timeline.add(priceDrop("b:2", "2024-12-04T00:00:00.000Z"));

    const drops = timeline.query("a:1", "PRICE_DROPPED");
    expect(drops.map((event) => event.timestamp)).toEqual([
      "2024-12-02T00:00:00.000Z",
      "2024-12-01T00:00:00.000Z",
    ]);
    expect(timeline.query("a:1", undefined, 1)).toHaveLength(1);
    expect(timeline.query("a:1", undefined, 0)).toEqual([]);
    expect(timeline.query("c:3")).toEqual([]);
  });

  it("should answer latest, has and count", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-01T00:00:00.000Z"));
    timeline.add(cancelled("a:1", "2024-12-03T00:00:00.000Z"));
    timeline.add(priceDrop("b:2", "2024-12-02T00:00:00.000Z"));

    expect(timeline.latest("a:1", "PRICE_DROPPED")?.timestamp).toBe(
      "2024-12-01T00:00:00.000Z"
    );
    expect(timeline.latest("a:1", "AUCTION_VOIDED")).toBeNull();
    expect(timeline.has("a:1", "AUCTION_CANCELLED")).toBe(true);
    expect(timeline.has("b:2", "AUCTION_CANCELLED")).toBe(false);
    expect(timeline.count()).toBe(3);
    expect(timeline.count("a:1")).toBe(2);
    expect(timeline.count(undefined, "PRICE_DROPPED")).toBe(2);
    expect(timeline.size).toBe(3);
    expect(timeline.listingIds()).toEqual(["a:1", "b:2"]);
  });

  it("should freeze stored events", () => {
    const timeline = new EventTimeline();
    const event = timeline.add(priceDrop("a:1", "2024-12-01T00:00:00.000Z"));

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.metadata)).toBe(true);
  });

  it("should not let callers reorder the stored log", () => {
    const timeline = new EventTimeline();
    timeline.add(priceDrop("a:1", "2024-12-01T00:00:00.000Z"));
    timeline.add(priceDrop("a:1", "2024-12-02T00:00:00.000Z"));

    timeline.query("a:1").reverse();

    expect(timeline.latest("a:1")?.timestamp).toBe("2024-12-02T00:00:00.000Z");
  });
});
