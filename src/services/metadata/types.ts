import type { Result } from "../../utils/index.js";

/**
 * Fields the catalog server understands. Absent fields are omitted, never null.
 */
export interface TrackMetadata {
	length?: number; // whole seconds
	artist?: string;
	title?: string;
	album?: string;
	genre?: string;
	year?: string;
	tags?: string;
}

export interface TrackRecord {
	file_path: string;
	metadata: TrackMetadata;
}

export type ExtractFailure = "unreadable";

export type ExtractResult = Result<TrackMetadata, ExtractFailure>;

/**
 * Turns a file path into a flat metadata mapping. `{}` means the file has
 * nothing worth sending.
 */
export type MetadataExtractor = (filePath: string) => Promise<ExtractResult>;

export const LASTFM_TAGS_LABEL = "LastFM tags";

/**
 * A native tag as reported by the container parser
 */
export interface NativeTag {
	id: string;
	value: unknown;
}

/**
 * One way of turning a parsed file's raw tags into `TrackMetadata`.
 * Which reader applies depends on the tag containers detected in the file.
 */
export interface TagReader {
	readonly name: string;
	supports(tagTypes: readonly string[]): boolean;
	read(source: TagSource): Promise<TrackMetadata>;
}

export interface TagSource {
	filePath: string;
	common: CommonTags;
	native: Record<string, NativeTag[]>;
}

export interface CommonTags {
	artist?: string;
	title?: string;
	album?: string;
	genre?: string[];
	date?: string;
	year?: number;
}

export function isEmptyMetadata(metadata: TrackMetadata): boolean {
	return Object.keys(metadata).length === 0;
}

const TEXT_FIELDS = ["artist", "title", "album", "genre", "year", "tags"] as const;

/**
 * Drop undefined, blank and non-finite fields.
 */
export function compactMetadata(metadata: TrackMetadata): TrackMetadata {
	const result: TrackMetadata = {};
	if (metadata.length !== undefined && Number.isFinite(metadata.length)) {
		result.length = metadata.length;
	}
	for (const field of TEXT_FIELDS) {
		const value = metadata[field]?.trim();
		if (value) {
			result[field] = value;
		}
	}
	return result;
}
