import NodeID3 from "node-id3";
import { metadataFromCommon } from "./common.js";
import { LASTFM_TAGS_LABEL, type NativeTag, type TagReader, type TagSource, type TrackMetadata } from "./types.js";

/**
 * The ID3 frames we map. `NodeID3.Tags` satisfies this shape.
 */
export interface Id3Frames {
	artist?: string;
	title?: string;
	album?: string;
	genre?: string;
	year?: string;
	recordingTime?: string;
	comment?: { shortText?: string; text?: string };
}

/**
 * ID3v2.4 stores multiple values of one text frame separated by NUL.
 */
export function joinFrameValues(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const parts = value
		.split("\u0000")
		.map((part) => part.trim())
		.filter((part) => part.length > 0);
	return parts.length > 0 ? parts.join(" & ") : undefined;
}

export function stripLastFmPrefix(text: string): string {
	return text.replace(/^\s*LastFM tags:/i, "").trim();
}

function commentFrame(value: unknown): { descriptor?: string; text?: string } | null {
	if (typeof value !== "object" || value === null) return null;
	const descriptor = "descriptor" in value && typeof value.descriptor === "string" ? value.descriptor : undefined;
	const text = "text" in value && typeof value.text === "string" ? value.text : undefined;
	return { descriptor, text };
}

/**
 * Find the "LastFM tags" comment. node-id3 only exposes the first comment
 * frame, so the remaining COMM frames come from the container parser.
 */
function lastFmTags(frames: Id3Frames, native: NativeTag[]): string | undefined {
	if (frames.comment?.shortText === LASTFM_TAGS_LABEL && frames.comment.text) {
		return stripLastFmPrefix(frames.comment.text);
	}

	for (const tag of native) {
		if (tag.id !== "COMM") continue;
		const comment = commentFrame(tag.value);
		if (comment?.descriptor === LASTFM_TAGS_LABEL && comment.text) {
			return stripLastFmPrefix(comment.text);
		}
	}
	return undefined;
}

export function metadataFromId3(frames: Id3Frames, native: NativeTag[] = []): TrackMetadata {
	return {
		artist: joinFrameValues(frames.artist),
		title: joinFrameValues(frames.title),
		album: joinFrameValues(frames.album),
		genre: joinFrameValues(frames.genre),
		year: joinFrameValues(frames.recordingTime ?? frames.year),
		tags: lastFmTags(frames, native),
	};
}

function nativeId3Tags(native: Record<string, NativeTag[]>): NativeTag[] {
	return Object.entries(native)
		.filter(([tagType]) => tagType.startsWith("ID3v2"))
		.flatMap(([, tags]) => tags);
}

export const id3TagReader: TagReader = {
	name: "id3",

	supports(tagTypes) {
		return tagTypes.some((tagType) => tagType.startsWith("ID3v2"));
	},

	async read(source: TagSource) {
		let frames: Id3Frames;
		try {
			frames = NodeID3.read(source.filePath);
		} catch {
			// node-id3 rejects some frames music-metadata accepts
			return metadataFromCommon(source.common, source.native);
		}
		return metadataFromId3(frames, nativeId3Tags(source.native));
	},
};
