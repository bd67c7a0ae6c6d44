import got, { type Response } from "got";
import { z } from "zod";
import { catalogBaseUrl, type Config } from "../../config/index.js";
import { errorMessage, fail, ok, type Result } from "../../utils/index.js";
import type { TrackRecord } from "../metadata/types.js";
import type { Logger } from "../sync/logger.js";

export const HEALTHY_STATUS = "Server is running";

export type DispatchFailure = "network" | "http" | "invalid-response";
export type HealthFailure = DispatchFailure;

const healthSchema = z.object({ status: z.string() });
const batchReplySchema = z.object({ message: z.string() });

/**
 * What the sync engine needs from the catalog server.
 */
export interface CatalogApi {
	checkHealth(): Promise<Result<true, HealthFailure>>;
	sendTrack(track: TrackRecord): Promise<Result<true, DispatchFailure>>;
	sendBatch(tracks: TrackRecord[]): Promise<Result<string, DispatchFailure>>;
}

export interface CatalogClientOptions {
	baseUrl: string;
	oneTrackEndpoint: string;
	manyTracksEndpoint: string;
	healthTimeoutMs?: number;
	logger: Logger;
}

function parseJson(body: string): unknown {
	try {
		return JSON.parse(body);
	} catch {
		return undefined;
	}
}

export class CatalogClient implements CatalogApi {
	private readonly options: CatalogClientOptions;
	private readonly logger: Logger;

	constructor(options: CatalogClientOptions) {
		this.options = options;
		this.logger = options.logger;
	}

	static fromConfig(config: Config, logger: Logger): CatalogClient {
		return new CatalogClient({
			baseUrl: catalogBaseUrl(config),
			oneTrackEndpoint: config.catalog.oneTrackEndpoint,
			manyTracksEndpoint: config.catalog.manyTracksEndpoint,
			healthTimeoutMs: config.catalog.healthTimeoutMs,
			logger,
		});
	}

	url(endpoint: string): string {
		return this.options.baseUrl + endpoint;
	}

	/**
	 * GET /health/ with a short timeout. Healthy means HTTP 200 and
	 * `{"status": "Server is running"}`.
	 */
	async checkHealth(): Promise<Result<true, HealthFailure>> {
		const url = this.url("/health/");
		let response: Response<string>;
		try {
			response = await got.get(url, {
				timeout: { request: this.options.healthTimeoutMs ?? 5000 },
				retry: { limit: 0 },
				throwHttpErrors: false,
			});
		} catch (e) {
			const detail = errorMessage(e);
			this.logger.error(`Server health check failed: ${detail}`);
			return fail("network", detail);
		}

		if (response.statusCode !== 200) {
			this.logger.error(`Server health check failed with status code: ${response.statusCode}`);
			return fail("http", `status ${response.statusCode}`);
		}

		const health = healthSchema.safeParse(parseJson(response.body));
		if (!health.success || health.data.status !== HEALTHY_STATUS) {
			this.logger.error("Invalid server health response");
			return fail("invalid-response", response.body.slice(0, 200));
		}
		return ok(true);
	}

	async sendTrack(track: TrackRecord): Promise<Result<true, DispatchFailure>> {
		const url = this.url(this.options.oneTrackEndpoint);
		this.logger.debug(`Sending metadata for ${track.file_path} to ${url}`);

		const response = await this.post(url, track);
		if (!response.ok) {
			this.logger.error(`Error sending metadata for ${track.file_path}: ${response.detail}`);
			return response;
		}
		if (response.value.statusCode !== 200) {
			this.logger.error(`Failed to send metadata for ${track.file_path}: ${response.value.statusCode}`);
			return fail("http", `status ${response.value.statusCode}`);
		}

		this.logger.debug(`Successfully processed: ${track.file_path}`);
		return ok(true);
	}

	/**
	 * POST a batch. Delivered means HTTP 200 with a JSON `message`; anything
	 * else is logged and returned as a failure, never thrown.
	 */
	async sendBatch(tracks: TrackRecord[]): Promise<Result<string, DispatchFailure>> {
		const url = this.url(this.options.manyTracksEndpoint);
		this.logger.info(`Sending batch of ${tracks.length} tracks to server`);

		const response = await this.post(url, tracks);
		if (!response.ok) {
			this.logger.error(`Error sending tracks batch to server: ${response.detail}`);
			return response;
		}
		if (response.value.statusCode !== 200) {
			this.logger.error(`Failed to send tracks batch: ${response.value.statusCode}`);
			return fail("http", `status ${response.value.statusCode}`);
		}

		const reply = batchReplySchema.safeParse(parseJson(response.value.body));
		if (!reply.success) {
			this.logger.error("Invalid response to tracks batch: no message in reply");
			return fail("invalid-response", response.value.body.slice(0, 200));
		}
		this.logger.info(reply.data.message);
		return ok(reply.data.message);
	}

	private async post(url: string, json: unknown): Promise<Result<Response<string>, "network">> {
		try {
			const response = await got.post(url, {
				json,
				retry: { limit: 0 },
				throwHttpErrors: false,
			});
			return ok(response);
		} catch (e) {
			return fail("network", errorMessage(e));
		}
	}
}
