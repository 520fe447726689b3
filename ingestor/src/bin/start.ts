#!/usr/bin/env node

import { Pool } from "pg";
import { createBus, createLogger, KeyedMutex } from "@listingtrail/shared-utils";
import { BusPublisher } from "../adapters/bus.adapter";
import { LogPublisher } from "../adapters/bus.log";
import { MemoryListingStore } from "../adapters/repo.memory";
import { SqlListingStore } from "../adapters/repo.sql";
import { FileSource } from "../adapters/source.file";
import { busCfg, cfg, dbCfg, redisCfg, validateConfig } from "../config/env";
import { IngestionPipeline } from "../core/ingest";
import { formatDuration, sleep } from "../core/utils";

import type { EventPublisherPort, ListingStorePort } from "../core/ports";

const logger = createLogger("ingestor", cfg.logLevel);

function createStore(): ListingStorePort {
  switch (cfg.store) {
    case "SQL":
      return new SqlListingStore(
        new Pool({
          host: dbCfg.host,
          port: dbCfg.port,
          user: dbCfg.user,
          password: dbCfg.password,
          database: dbCfg.name,
        })
      );

    default:
      return new MemoryListingStore();
  }
}

function createPublisher(): EventPublisherPort {
  switch (busCfg.adapter) {
    case "REDIS":
      return new BusPublisher(
        createBus({
          type: "redis",
          serviceName: "ingestor",
          redisUrl: redisCfg.url,
          logger: logger.child("bus"),
        })
      );

    case "MEMORY":
      return new BusPublisher(
        createBus({ type: "memory", serviceName: "ingestor", logger: logger.child("bus") })
      );

    case "LOG":
    default:
      return new LogPublisher(logger.child("events"));
  }
}

async function release(resource: object): Promise<void> {
  if ("close" in resource && typeof resource.close === "function") {
    await resource.close();
  }
}

async function main() {
  logger.info(
    `Starting in ${cfg.mode} mode with ${cfg.store} store and ${busCfg.adapter} bus`
  );

  try {
    validateConfig();

    const source = new FileSource(cfg.inputDir, cfg.sources, logger.child("source"));
    const store = createStore();
    const publisher = createPublisher();
    const pipeline = new IngestionPipeline(
      {
        store,
        publisher,
        logger: logger.child("pipeline"),
        locks: new KeyedMutex(),
      },
      {
        maxConflictRetries: cfg.maxConflictRetries,
        retryDelayMs: cfg.conflictRetryDelayMs,
        lockTimeoutMs: cfg.lockTimeoutMs,
      }
    );

    logger.info("Adapters initialized successfully");

    // Handle graceful shutdown
    let running = true;
    const shutdown = () => {
      logger.info("Received shutdown signal, stopping...");
      running = false;
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    let consecutiveErrors = 0;
    const maxErrors = cfg.maxRetries;

    while (running) {
      try {
        logger.info(`Reading snapshots from ${cfg.inputDir}`);

        const items = await source.readBatch();
        const { summary } = await pipeline.ingestBatch(items);

        logger.info("Batch completed:", {
          ...summary,
          duration: formatDuration(summary.durationMs),
        });

        consecutiveErrors = 0;

        if (!cfg.watch) break;

        if (running) {
          logger.info(`Waiting ${cfg.pollIntervalMs}ms until next batch...`);
          await sleep(cfg.pollIntervalMs);
        }
      } catch (error) {
        consecutiveErrors++;
        logger.error(`Batch failed (${consecutiveErrors}/${maxErrors}):`, error);

        if (!cfg.watch || consecutiveErrors >= maxErrors) {
          logger.error("Giving up after failed batch");
          process.exitCode = 1;
          break;
        }

        // Exponential backoff on errors
        const backoffTime = cfg.backoffMs * Math.pow(2, consecutiveErrors - 1);
        logger.info(`Backing off for ${backoffTime}ms before retry...`);
        await sleep(backoffTime);
      }
    }

    await release(store);
    await release(publisher);
    logger.info("Shutdown complete");
  } catch (error) {
    logger.error("Fatal error during startup:", error);
    process.exit(1);
  }
}

// Run if this file is executed directly
if (require.main === module) {
  main().catch((error) => {
    logger.error("Unhandled error:", error);
    process.exit(1);
  });
}
