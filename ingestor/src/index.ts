export * from "./core/dto";
export * from "./core/errors";
export * from "./core/events";
export * from "./core/fingerprint";
export * from "./core/ingest";
export * from "./core/listing";
export * from "./core/money";
export * from "./core/normalize";
export * from "./core/ports";
export * from "./core/timeline";

export { BusPublisher, toBusMessage } from "./adapters/bus.adapter";
export { LogPublisher } from "./adapters/bus.log";
export { MemoryListingStore } from "./adapters/repo.memory";
export { SqlListingStore } from "./adapters/repo.sql";
export { FileSource } from "./adapters/source.file";
