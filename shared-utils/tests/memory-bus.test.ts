import { beforeEach, describe, expect, it } from "vitest";
import { createBus, MemoryBus } from "../src/bus";
import type { BusEvent } from "../src/bus";
import { silentLogger } from "../src/logger";

function listingEvent(listingId: string): BusEvent {
  return {
    type: "listing_event",
    id: listingId,
    timestamp: "2024-12-01T09:00:00.000Z",
    version: "1.0.0",
    data: {
      eventType: "PRICE_DROPPED",
      listingId,
      timestamp: "2024-12-01T09:00:00.000Z",
      metadata: { oldPrice: "800000", newPrice: "750000" },
    },
  };
}

describe("MemoryBus", () => {
  let bus: MemoryBus;

  beforeEach(() => {
    bus = new MemoryBus("test-bus", silentLogger);
  });

  it("should deliver published events to every subscriber", async () => {
    const first: string[] = [];
    const second: string[] = [];

    await bus.subscribe("listing_event", async (event) => {
      first.push(event.data.listingId);
    });
    await bus.subscribe("listing_event", async (event) => {
      second.push(event.data.listingId);
    });

    await bus.publish(listingEvent("realestate:1"));

    expect(first).toEqual(["realestate:1"]);
    expect(second).toEqual(["realestate:1"]);
    expect(bus.getStatus()).toEqual({
      subscribedTopics: ["listing_event"],
      handlerCount: 2,
      publishedEventCount: 1,
    });
  });

  it("should keep delivering when one handler throws", async () => {
    const received: string[] = [];

    await bus.subscribe("listing_event", async () => {
      throw new Error("handler failed");
    });
    await bus.subscribe("listing_event", async (event) => {
      received.push(event.id);
    });

    await expect(bus.publish(listingEvent("domain:7"))).resolves.toBeUndefined();
    expect(received).toEqual(["domain:7"]);
  });

  it("should record history until cleared or closed", async () => {
    await bus.publish(listingEvent("a:1"));
    await bus.publish(listingEvent("a:2"));

    expect(bus.getPublishedEvents().map((event) => event.id)).toEqual([
      "a:1",
      "a:2",
    ]);

    bus.clearHistory();
    expect(bus.getPublishedEvents()).toEqual([]);

    await bus.subscribe("listing_event", async () => undefined);
    await bus.close();
    expect(bus.getStatus().handlerCount).toBe(0);
  });
});

describe("createBus", () => {
  it("should create a memory bus", () => {
    const bus = createBus({ type: "memory", serviceName: "test", logger: silentLogger });
    expect(bus).toBeInstanceOf(MemoryBus);
  });

  it("should require a URL for the redis bus", () => {
    expect(() => createBus({ type: "redis", serviceName: "test" })).toThrow(
      "Redis URL is required for Redis bus"
    );
  });
});
