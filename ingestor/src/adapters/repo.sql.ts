import { DatabaseError } from "pg";
import { z } from "zod";
import {
  AuctionHistoryEntry,
  LISTING_STATUSES,
  Listing,
  PROPERTY_TYPES,
  PriceHistoryEntry,
} from "../core/dto";
import { ConflictError } from "../core/errors";
import { EventType, ListingEvent, parseListingEvent } from "../core/events";
import { CommitUnit, ListingStorePort } from "../core/ports";

// serialization failure, deadlock, unique violation
const CONFLICT_CODES = new Set(["40001", "40P01", "23505"]);

const timestamp = z
  .union([z.date(), z.string()])
  .transform((value) => new Date(value).toISOString());

// BIGINT columns come back as strings
const bigint = z.union([z.string(), z.number()]).transform(Number);

const addressSchema = z.object({
  suburb: z.string(),
  state: z.string(),
  postcode: z.string(),
  fullAddress: z.string().nullable(),
  shortAddress: z.string().nullable(),
  streetNumber: z.string().nullable(),
  streetName: z.string().nullable(),
  unitNumber: z.string().nullable(),
  location: z.object({ lat: z.number(), lng: z.number() }).nullable(),
});

const listingRowSchema = z.object({
  listing_id: z.string(),
  address: addressSchema,
  suburb: z.string(),
  property_type: z.enum(PROPERTY_TYPES),
  bedrooms: z.number().nullable(),
  bathrooms: z.number().nullable(),
  land_size: z.number().nullable(),
  building_size: z.number().nullable(),
  property_link: z.string().nullable(),
  description: z.string().nullable(),
  status: z.enum(LISTING_STATUSES),
  current_price: bigint.nullable(),
  previous_price: bigint.nullable(),
  auction_datetime: timestamp.nullable(),
  created_at: timestamp,
  updated_at: timestamp,
  source: z.string().nullable(),
  version: z.number(),
});

const priceRowSchema = z.object({
  price: bigint,
  observed_at: timestamp,
  source: z.string().nullable(),
});

const auctionRowSchema = z.object({
  auction_datetime: timestamp.nullable(),
  status: z.enum(LISTING_STATUSES),
  notes: z.string().nullable(),
  observed_at: timestamp,
});

const versionRowSchema = z.object({ version: z.number() });

const fingerprintRowSchema = z.object({ fingerprint: z.string() });

const eventRowSchema = z.object({
  listing_id: z.string(),
  event_type: z.string(),
  occurred_at: timestamp,
  metadata: z.unknown(),
});

/**
 * The slice of a pg Pool / PoolClient the store uses. Rows are parsed
 * with zod, so they are left unknown here.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

/**
 * PostgreSQL listing store. Listings, both histories, the event timeline
 * and fingerprints live in one database so a commit is one transaction.
 * Schema: sql/init.sql
 */
export class SqlListingStore implements ListingStorePort {
  constructor(private pool: SqlPool) {}

  async getListing(listingId: string): Promise<Listing | null> {
    const client = await this.pool.connect();
    try {
      return await this.loadListing(client, listingId);
    } finally {
      client.release();
    }
  }

  async getLastFingerprint(listingId: string): Promise<string | null> {
    const result = await this.pool.query(
      `SELECT fingerprint FROM listing_fingerprints WHERE listing_id = $1`,
      [listingId]
    );
    if (result.rows.length === 0) return null;
    return fingerprintRowSchema.parse(result.rows[0]).fingerprint;
  }

  async queryEvents(
    listingId: string,
    eventType?: EventType,
    limit?: number
  ): Promise<ListingEvent[]> {
    const result = await this.pool.query(
      `
        SELECT listing_id, event_type, occurred_at, metadata
        FROM listing_events
        WHERE listing_id = $1
          AND ($2::text IS NULL OR event_type = $2)
        ORDER BY occurred_at DESC, id DESC
        LIMIT $3
      `,
      [listingId, eventType ?? null, limit ?? null]
    );

    return result.rows.map((raw) => {
      const row = eventRowSchema.parse(raw);
      return parseListingEvent({
        eventType: row.event_type,
        listingId: row.listing_id,
        timestamp: row.occurred_at,
        metadata: row.metadata,
      });
    });
  }

  async commit(unit: CommitUnit): Promise<void> {
    const { listing, expectedVersion, events, fingerprint } = unit;
    const client = await this.pool.connect();
    let broken: Error | undefined;

    try {
      await client.query("BEGIN");
      await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [
        listing.listingId,
      ]);

      const current = await client.query(
        `SELECT version FROM listings WHERE listing_id = $1 FOR UPDATE`,
        [listing.listingId]
      );
      const storedVersion =
        current.rows.length === 0 ? 0 : versionRowSchema.parse(current.rows[0]).version;
      if (storedVersion !== expectedVersion) {
        throw new ConflictError(
          listing.listingId,
          `Listing ${listing.listingId} is at version ${storedVersion}, expected ${expectedVersion}`
        );
      }

      await this.upsertListing(client, listing);
      await this.appendHistories(client, listing);

      for (const event of events) {
        await client.query(
          `
            INSERT INTO listing_events (listing_id, event_type, occurred_at, metadata)
            VALUES ($1, $2, $3, $4)
          `,
          [
            event.listingId,
            event.eventType,
            event.timestamp,
            JSON.stringify(event.metadata),
          ]
        );
      }

      await client.query(
        `
          INSERT INTO listing_fingerprints (listing_id, fingerprint)
          VALUES ($1, $2)
          ON CONFLICT (listing_id) DO UPDATE SET fingerprint = EXCLUDED.fingerprint
        `,
        [listing.listingId, fingerprint]
      );

      await client.query("COMMIT");
    } catch (error) {
      broken = await this.rollback(client);
      if (
        error instanceof DatabaseError &&
        error.code !== undefined &&
        CONFLICT_CODES.has(error.code)
      ) {
        throw new ConflictError(listing.listingId, error.message, { cause: error });
      }
      throw error;
    } finally {
      // a connection that could not roll back is discarded, not pooled
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async rollback(client: SqlClient): Promise<Error | undefined> {
    try {
      await client.query("ROLLBACK");
      return undefined;
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  }

  private async loadListing(
    client: SqlClient,
    listingId: string
  ): Promise<Listing | null> {
    const result = await client.query(
      `
        SELECT listing_id, address, suburb, property_type, bedrooms, bathrooms,
               land_size, building_size, property_link, description, status,
               current_price, previous_price, auction_datetime, created_at,
               updated_at, source, version
        FROM listings
        WHERE listing_id = $1
      `,
      [listingId]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = listingRowSchema.parse(result.rows[0]);

    const prices = await client.query(
      `SELECT price, observed_at, source FROM listing_price_history
       WHERE listing_id = $1 ORDER BY seq`,
      [listingId]
    );
    const auctions = await client.query(
      `SELECT auction_datetime, status, notes, observed_at FROM listing_auction_history
       WHERE listing_id = $1 ORDER BY seq`,
      [listingId]
    );

    const priceHistory: PriceHistoryEntry[] = prices.rows.map((raw) => {
      const entry = priceRowSchema.parse(raw);
      return {
        price: entry.price,
        timestamp: entry.observed_at,
        source: entry.source,
      };
    });

    const auctionHistory: AuctionHistoryEntry[] = auctions.rows.map((raw) => {
      const entry = auctionRowSchema.parse(raw);
      return {
        auctionDatetime: entry.auction_datetime,
        status: entry.status,
        notes: entry.notes,
        timestamp: entry.observed_at,
      };
    });

    return {
      listingId: row.listing_id,
      address: row.address,
      suburb: row.suburb,
      propertyType: row.property_type,
      bedrooms: row.bedrooms,
      bathrooms: row.bathrooms,
      landSize: row.land_size,
      buildingSize: row.building_size,
      propertyLink: row.property_link,
      description: row.description,
      status: row.status,
      currentPrice: row.current_price,
      previousPrice: row.previous_price,
      auctionDatetime: row.auction_datetime,
      priceHistory,
      auctionHistory,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      source: row.source,
      version: row.version,
    };
  }

  private async upsertListing(client: SqlClient, listing: Listing): Promise<void> {
    await client.query(
      `
        INSERT INTO listings (
          listing_id, address, suburb, property_type, bedrooms, bathrooms,
          land_size, building_size, property_link, description, status,
          current_price, previous_price, auction_datetime, created_at,
          updated_at, source, version
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
        ON CONFLICT (listing_id) DO UPDATE SET
          address = EXCLUDED.address,
          suburb = EXCLUDED.suburb,
          property_type = EXCLUDED.property_type,
          bedrooms = EXCLUDED.bedrooms,
          bathrooms = EXCLUDED.bathrooms,
          land_size = EXCLUDED.land_size,
          building_size = EXCLUDED.building_size,
          property_link = EXCLUDED.property_link,
          description = EXCLUDED.description,
          status = EXCLUDED.status,
          current_price = EXCLUDED.current_price,
          previous_price = EXCLUDED.previous_price,
          auction_datetime = EXCLUDED.auction_datetime,
          updated_at = EXCLUDED.updated_at,
          source = EXCLUDED.source,
          version = EXCLUDED.version
      `,
      [
        listing.listingId,
        JSON.stringify(listing.address),
        listing.suburb,
        listing.propertyType,
        listing.bedrooms,
        listing.bathrooms,
        listing.landSize,
        listing.buildingSize,
        listing.propertyLink,
        listing.description,
        listing.status,
        listing.currentPrice,
        listing.previousPrice,
        listing.auctionDatetime,
        listing.createdAt,
        listing.updatedAt,
        listing.source,
        listing.version,
      ]
    );
  }

  /**
   * Histories are append only: entries already stored keep their seq and
   * are skipped, only the new tail is written.
   */
  private async appendHistories(client: SqlClient, listing: Listing): Promise<void> {
    for (const [seq, entry] of listing.priceHistory.entries()) {
      await client.query(
        `
          INSERT INTO listing_price_history (listing_id, seq, price, observed_at, source)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT (listing_id, seq) DO NOTHING
        `,
        [listing.listingId, seq, entry.price, entry.timestamp, entry.source]
      );
    }

    for (const [seq, entry] of listing.auctionHistory.entries()) {
      await client.query(
        `
          INSERT INTO listing_auction_history (listing_id, seq, auction_datetime, status, notes, observed_at)
          VALUES ($1, $2, $3, $4, $5, $6)
          ON CONFLICT (listing_id, seq) DO NOTHING
        `,
        [
          listing.listingId,
          seq,
          entry.auctionDatetime,
          entry.status,
          entry.notes,
          entry.timestamp,
        ]
      );
    }
  }
}
