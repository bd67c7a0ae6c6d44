import { parseFile } from "music-metadata";
import { errorMessage, fail, ok } from "../../utils/index.js";
import { commonTagReader } from "./common.js";
import { id3TagReader } from "./id3.js";
import { compactMetadata, type MetadataExtractor, type TagReader, type TrackMetadata } from "./types.js";

export const DEFAULT_TAG_READERS: readonly TagReader[] = [id3TagReader, commonTagReader];

/**
 * Build an extractor that detects the container with music-metadata and
 * hands the raw tags to the first reader that supports them.
 */
export function createMetadataExtractor(readers: readonly TagReader[] = DEFAULT_TAG_READERS): MetadataExtractor {
	return async (filePath) => {
		let audio: Awaited<ReturnType<typeof parseFile>>;
		try {
			audio = await parseFile(filePath);
		} catch (error) {
			return fail("unreadable", errorMessage(error));
		}

		const tagTypes: readonly string[] = audio.format.tagTypes ?? [];
		const reader = readers.find((candidate) => candidate.supports(tagTypes));
		const tags: TrackMetadata = reader
			? await reader.read({ filePath, common: audio.common, native: audio.native })
			: {};

		const duration = audio.format.duration;
		return ok(
			compactMetadata({
				length: duration !== undefined ? Math.trunc(duration) : undefined,
				...tags,
			})
		);
	};
}

export const extractMetadata: MetadataExtractor = createMetadataExtractor();

export { id3TagReader, metadataFromId3, joinFrameValues, stripLastFmPrefix } from "./id3.js";
export { commonTagReader, metadataFromCommon, lastFmTagsFromComments } from "./common.js";
export * from "./types.js";
