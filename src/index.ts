// Programmatic API entry point
export { loadConfig, ConfigError, type Config, type CheckpointPolicy, type LogLevel } from "./config/index.js";
export { CatalogClient, type CatalogApi } from "./services/catalog/client.js";
export { latestModificationTime, hasChangedSince } from "./services/library/changes.js";
export { findIgnoredDirectories, walkLibrary, libraryRelativePath } from "./services/library/scanner.js";
export {
	createMetadataExtractor,
	extractMetadata,
	type MetadataExtractor,
	type TagReader,
	type TrackMetadata,
	type TrackRecord,
} from "./services/metadata/index.js";
export { BatchAccumulator } from "./services/sync/batcher.js";
export { ConsoleLogger, type Logger } from "./services/sync/logger.js";
export { ScanScheduler, type Schedule } from "./services/sync/scheduler.js";
export { ScanStateStore } from "./services/sync/state.js";
export { LibrarySync, type FullSyncOptions, type ScanResult, type ScanStatus } from "./services/sync/sync.js";
