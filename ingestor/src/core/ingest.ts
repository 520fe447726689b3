import { KeyedMutex, Logger, LockTimeoutError } from "@listingtrail/shared-utils";
import { CanonicalSnapshot, ISO } from "./dto";
import {
  ConflictError,
  IngestError,
  InvalidStateError,
  NormalizationError,
} from "./errors";
import { ListingEvent } from "./events";
import { fingerprintSnapshot } from "./fingerprint";
import {
  applyAuction,
  applyDescriptive,
  applyPrice,
  createListing,
} from "./listing";
import { createDefaultRegistry, NormalizerRegistry } from "./normalize";
import {
  EventPublisherPort,
  ListingStorePort,
  SourceItem,
} from "./ports";
import { EventTimeline } from "./timeline";
import { laterOf, sleep } from "./utils";

export type IngestResult =
  | {
      status: "created" | "updated";
      listingId: string;
      events: ListingEvent[];
    }
  | { status: "unchanged"; listingId: string; events: [] }
  | { status: "rejected"; sourceId: string; error: NormalizationError }
  | {
      status: "failed";
      listingId: string;
      // InvalidStateError or ConflictError; a bare IngestError wraps an
      // unexpected failure inside a batch
      error: IngestError;
    };

export interface BatchSummary {
  processed: number;
  created: number;
  updated: number;
  unchanged: number;
  rejected: number;
  failed: number;
  events: number;
  durationMs: number;
}

export interface BatchResult {
  results: IngestResult[];
  summary: BatchSummary;
}

export interface PipelineDependencies {
  store: ListingStorePort;
  publisher: EventPublisherPort;
  logger: Logger;
  normalizers?: NormalizerRegistry;
  locks?: KeyedMutex;
  clock?: () => ISO;
}

export interface PipelineOptions {
  maxConflictRetries: number;
  retryDelayMs: number;
  lockTimeoutMs?: number;
}

const defaultOptions: PipelineOptions = {
  maxConflictRetries: 3,
  retryDelayMs: 50,
};

/**
 * A snapshot carrying neither a status nor an auction date says nothing
 * about the auction and must not reset what is known.
 */
function hasAuctionInformation(snapshot: CanonicalSnapshot): boolean {
  return (
    snapshot.auction.status !== "UNKNOWN" ||
    snapshot.auction.auctionDatetime !== null
  );
}

/**
 * Normalize -> load -> fingerprint guard -> apply -> commit -> publish,
 * one writer per listing at a time.
 */
export class IngestionPipeline {
  private store: ListingStorePort;
  private publisher: EventPublisherPort;
  private logger: Logger;
  private normalizers: NormalizerRegistry;
  private locks: KeyedMutex;
  private clock: () => ISO;
  private options: PipelineOptions;

  constructor(deps: PipelineDependencies, options: Partial<PipelineOptions> = {}) {
    this.store = deps.store;
    this.publisher = deps.publisher;
    this.logger = deps.logger;
    this.normalizers = deps.normalizers ?? createDefaultRegistry();
    this.locks = deps.locks ?? new KeyedMutex();
    this.clock = deps.clock ?? (() => new Date().toISOString());
    this.options = { ...defaultOptions, ...options };
  }

  async ingest(sourceId: string, raw: unknown): Promise<IngestResult> {
    let snapshot: CanonicalSnapshot;
    try {
      snapshot = this.normalizers.normalize(sourceId, raw);
    } catch (error) {
      if (error instanceof NormalizationError) {
        return this.reject(error);
      }
      throw error;
    }

    return this.ingestSnapshot(snapshot);
  }

  /**
   * Apply an already-normalized snapshot. Conflicts are retried from a
   * fresh load with the lock re-acquired.
   */
  async ingestSnapshot(
    snapshot: CanonicalSnapshot,
    observedAt: ISO = snapshot.observedAt ?? this.clock()
  ): Promise<IngestResult> {
    const { listingId } = snapshot;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.locks.runExclusive(
          listingId,
          () => this.applySnapshot(snapshot, observedAt),
          this.options.lockTimeoutMs
        );
      } catch (error) {
        const failure = this.classify(error, listingId);
        if (!failure) throw error;

        if (
          failure instanceof ConflictError &&
          attempt <= this.options.maxConflictRetries
        ) {
          this.logger.warn(
            `Conflict on ${listingId} (attempt ${attempt}/${this.options.maxConflictRetries}), retrying`
          );
          await sleep(this.options.retryDelayMs * attempt);
          continue;
        }

        this.logger.error(`Ingestion failed for ${listingId}: ${failure.message}`);
        return { status: "failed", listingId, error: failure };
      }
    }
  }

  /**
   * Ingest a scraper run. Different listings proceed concurrently;
   * snapshots of the same listing are applied in observation order.
   */
  async ingestBatch(items: SourceItem[]): Promise<BatchResult> {
    const startTime = Date.now();
    const results: IngestResult[] = new Array(items.length);
    const groups = new Map<
      string,
      { index: number; snapshot: CanonicalSnapshot; observedAt: ISO }[]
    >();

    items.forEach((item, index) => {
      try {
        const snapshot = this.normalizers.normalize(item.sourceId, item.payload);
        const entry = {
          index,
          snapshot,
          observedAt: snapshot.observedAt ?? this.clock(),
        };
        const group = groups.get(snapshot.listingId);
        if (group) {
          group.push(entry);
        } else {
          groups.set(snapshot.listingId, [entry]);
        }
      } catch (error) {
        if (!(error instanceof NormalizationError)) throw error;
        results[index] = this.reject(error, item.origin);
      }
    });

    await Promise.all(
      Array.from(groups.values()).map(async (group) => {
        // stable sort keeps arrival order for equal observation times
        group.sort(
          (a, b) => Date.parse(a.observedAt) - Date.parse(b.observedAt)
        );
        for (const entry of group) {
          results[entry.index] = await this.ingestSnapshot(
            entry.snapshot,
            entry.observedAt
          ).catch((error: unknown) =>
            this.unexpected(entry.snapshot.listingId, error)
          );
        }
      })
    );

    return { results, summary: summarize(results, Date.now() - startTime) };
  }

  private async applySnapshot(
    snapshot: CanonicalSnapshot,
    observedAt: ISO
  ): Promise<IngestResult> {
    const { listingId } = snapshot;
    const fingerprint = fingerprintSnapshot(snapshot);

    const existing = await this.storage(listingId, "load", () =>
      this.store.getListing(listingId)
    );
    const lastFingerprint = existing
      ? await this.storage(listingId, "load fingerprint", () =>
          this.store.getLastFingerprint(listingId)
        )
      : null;
    if (existing && lastFingerprint === fingerprint) {
      this.logger.debug(`No changes for listing ${listingId}`);
      return { status: "unchanged", listingId, events: [] };
    }

    const listing = existing ?? createListing(snapshot, observedAt);
    const expectedVersion = existing?.version ?? 0;
    const staged = new EventTimeline(() => observedAt);

    applyDescriptive(listing, snapshot);
    applyPrice(listing, snapshot.price, observedAt, staged, snapshot.sourceId);
    if (hasAuctionInformation(snapshot)) {
      applyAuction(listing, snapshot.auction, observedAt, staged);
    }

    // moves forward on every accepted change, out-of-order snapshots included
    listing.updatedAt = laterOf(
      laterOf(listing.updatedAt, observedAt),
      this.clock()
    );
    listing.source = snapshot.sourceId;
    listing.version = expectedVersion + 1;

    // oldest first: the order they were derived in
    const events = staged.all().reverse();

    await this.storage(listingId, "commit", () =>
      this.store.commit({ listing, expectedVersion, events, fingerprint })
    );

    const status = existing ? "updated" : "created";
    this.logger.info(
      `Listing ${listingId} ${status} (v${listing.version}, ${events.length} event(s))`
    );

    await this.publishAll(events);
    return { status, listingId, events };
  }

  /**
   * Run a store call, reporting any failure that is not already an
   * ingestion error as a ConflictError so it takes the retry path
   */
  private async storage<T>(
    listingId: string,
    operation: string,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof IngestError) throw error;
      throw new ConflictError(
        listingId,
        `Store failed to ${operation} listing ${listingId}: ${messageOf(error)}`,
        { cause: error }
      );
    }
  }

  private unexpected(listingId: string, error: unknown): IngestResult {
    this.logger.error(`Unexpected failure ingesting ${listingId}:`, error);
    return {
      status: "failed",
      listingId,
      error: new IngestError(
        `Unexpected failure ingesting ${listingId}: ${messageOf(error)}`,
        { cause: error }
      ),
    };
  }

  private async publishAll(events: ListingEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.publisher.publish(event);
      } catch (error) {
        // already committed; consumers can catch up from the stored timeline
        this.logger.error(
          `Failed to publish ${event.eventType} for ${event.listingId}:`,
          error
        );
      }
    }
  }

  private reject(error: NormalizationError, origin?: string): IngestResult {
    this.logger.warn(
      `Rejected ${error.sourceId} snapshot${origin ? ` from ${origin}` : ""}: ${error.message}`
    );
    return { status: "rejected", sourceId: error.sourceId, error };
  }

  private classify(
    error: unknown,
    listingId: string
  ): InvalidStateError | ConflictError | null {
    if (error instanceof ConflictError || error instanceof InvalidStateError) {
      return error;
    }
    if (error instanceof LockTimeoutError) {
      return new ConflictError(listingId, error.message);
    }
    return null;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function summarize(results: IngestResult[], durationMs: number): BatchSummary {
  const summary: BatchSummary = {
    processed: results.length,
    created: 0,
    updated: 0,
    unchanged: 0,
    rejected: 0,
    failed: 0,
    events: 0,
    durationMs,
  };

  for (const result of results) {
    summary[result.status]++;
    if (result.status === "created" || result.status === "updated") {
      summary.events += result.events.length;
    }
  }

  return summary;
}
