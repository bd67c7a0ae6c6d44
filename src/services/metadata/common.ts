import type { CommonTags, NativeTag, TagReader, TrackMetadata } from "./types.js";

const LASTFM_MARKER = "LastFM tags:";
const COMMENT_IDS = new Set(["comment", "description", "©cmt", "comm"]);

function commentText(value: unknown): string | undefined {
	if (typeof value === "string") return value;
	if (typeof value === "object" && value !== null && "text" in value && typeof value.text === "string") {
		return value.text;
	}
	return undefined;
}

/**
 * Text after "LastFM tags:" in the first comment that carries it
 */
export function lastFmTagsFromComments(native: Record<string, NativeTag[]>): string | undefined {
	for (const tags of Object.values(native)) {
		for (const tag of tags) {
			if (!COMMENT_IDS.has(tag.id.toLowerCase())) continue;
			const text = commentText(tag.value);
			if (text?.includes(LASTFM_MARKER)) {
				return text.split(LASTFM_MARKER)[1].trim();
			}
		}
	}
	return undefined;
}

export function metadataFromCommon(common: CommonTags, native: Record<string, NativeTag[]> = {}): TrackMetadata {
	return {
		artist: common.artist,
		title: common.title,
		album: common.album,
		genre: common.genre?.[0],
		year: common.date ?? (common.year !== undefined ? String(common.year) : undefined),
		tags: lastFmTagsFromComments(native),
	};
}

/**
 * Vorbis comments, MP4 atoms, APE and everything else music-metadata maps onto
 * its common tag set.
 */
export const commonTagReader: TagReader = {
	name: "common",

	supports(tagTypes) {
		return tagTypes.length > 0;
	},

	async read(source) {
		return metadataFromCommon(source.common, source.native);
	},
};
