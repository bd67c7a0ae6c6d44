import { describe, test, expect, beforeAll, afterAll, beforeEach } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { CatalogClient, HEALTHY_STATUS } from "./client.js";
import type { TrackRecord } from "../metadata/types.js";
import { RecordingLogger } from "../../test/recording-logger.js";

interface Reply {
	code: number;
	body: unknown;
	delayMs?: number;
}

function portOf(instance: FastifyInstance): number {
	const address = instance.server.address();
	if (address === null || typeof address === "string") {
		throw new Error("server is not listening on a TCP port");
	}
	return address.port;
}

describe("Catalog Client", () => {
	let server: FastifyInstance;
	let baseUrl: string;
	let logger: RecordingLogger;
	let healthReply: Reply;
	let batchReply: Reply;
	let received: { batches: unknown[]; tracks: unknown[] };

	beforeAll(async () => {
		server = Fastify();
		server.get("/health/", async (_request, reply) => {
			if (healthReply.delayMs) {
				await new Promise((resolve) => setTimeout(resolve, healthReply.delayMs));
			}
			return reply.code(healthReply.code).send(healthReply.body);
		});
		server.post("/add_tracks/", async (request, reply) => {
			received.batches.push(request.body);
			return reply.code(batchReply.code).send(batchReply.body);
		});
		server.post("/add_track/", async (request) => {
			received.tracks.push(request.body);
			return { message: "ok" };
		});
		await server.listen({ port: 0, host: "127.0.0.1" });
		baseUrl = `http://127.0.0.1:${portOf(server)}`;
	});

	afterAll(async () => {
		await server.close();
	});

	beforeEach(() => {
		logger = new RecordingLogger();
		healthReply = { code: 200, body: { status: HEALTHY_STATUS } };
		batchReply = { code: 200, body: { message: "Added 2 tracks" } };
		received = { batches: [], tracks: [] };
	});

	function client(overrides: Partial<{ baseUrl: string; healthTimeoutMs: number }> = {}): CatalogClient {
		return new CatalogClient({
			baseUrl: overrides.baseUrl ?? baseUrl,
			oneTrackEndpoint: "/add_track/",
			manyTracksEndpoint: "/add_tracks/",
			healthTimeoutMs: overrides.healthTimeoutMs ?? 5000,
			logger,
		});
	}

	const tracks: TrackRecord[] = [
		{ file_path: "a.mp3", metadata: { title: "A", length: 180 } },
		{ file_path: "Artist/b.flac", metadata: { artist: "B" } },
	];

	test("checkHealth succeeds on 200 with the running status", async () => {
		expect(await client().checkHealth()).toEqual({ ok: true, value: true });
		expect(logger.messages("error")).toEqual([]);
	});

	test("checkHealth fails on 503", async () => {
		healthReply = { code: 503, body: { status: "down" } };

		const result = await client().checkHealth();

		expect(result).toEqual({ ok: false, kind: "http", detail: "status 503" });
		expect(logger.messages("error")).toEqual(["Server health check failed with status code: 503"]);
	});

	test("checkHealth fails on an unexpected body", async () => {
		healthReply = { code: 200, body: { status: "Maintenance" } };

		const result = await client().checkHealth();

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.kind).toBe("invalid-response");
		expect(logger.messages("error")).toEqual(["Invalid server health response"]);
	});

	test("checkHealth gives up after the timeout", async () => {
		healthReply = { code: 200, body: { status: HEALTHY_STATUS }, delayMs: 1000 };

		const result = await client({ healthTimeoutMs: 100 }).checkHealth();

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.kind).toBe("network");
	});

	test("checkHealth reports an unreachable server as a network failure", async () => {
		const closed = Fastify();
		await closed.listen({ port: 0, host: "127.0.0.1" });
		const port = portOf(closed);
		await closed.close();

		const result = await client({ baseUrl: `http://127.0.0.1:${port}` }).checkHealth();

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.kind).toBe("network");
		expect(logger.messages("error")[0]).toMatch(/^Server health check failed: /);
	});

	test("sendBatch posts the records as a JSON array and returns the server message", async () => {
		const result = await client().sendBatch(tracks);

		expect(result).toEqual({ ok: true, value: "Added 2 tracks" });
		expect(received.batches).toEqual([tracks]);
		expect(logger.messages("info")).toEqual(["Sending batch of 2 tracks to server", "Added 2 tracks"]);
	});

	test("sendBatch returns a failure on non-200 instead of throwing", async () => {
		batchReply = { code: 500, body: { error: "boom" } };

		const result = await client().sendBatch(tracks);

		expect(result).toEqual({ ok: false, kind: "http", detail: "status 500" });
		expect(logger.messages("error")).toEqual(["Failed to send tracks batch: 500"]);
	});

	test("sendBatch does not count a 200 without a JSON message as delivered", async () => {
		batchReply = { code: 200, body: "<html>proxy</html>" };

		const result = await client().sendBatch(tracks);

		expect(result).toEqual({ ok: false, kind: "invalid-response", detail: "<html>proxy</html>" });
		expect(logger.messages("error")).toEqual(["Invalid response to tracks batch: no message in reply"]);
		expect(logger.messages("info")).toEqual(["Sending batch of 2 tracks to server"]);
	});

	test("sendTrack posts a single record to the one-track endpoint", async () => {
		const result = await client().sendTrack(tracks[0]);

		expect(result).toEqual({ ok: true, value: true });
		expect(received.tracks).toEqual([tracks[0]]);
		expect(received.batches).toEqual([]);
	});

	test("url joins the base and the endpoint", () => {
		expect(client({ baseUrl: "http://localhost:5005" }).url("/add_tracks/")).toBe(
			"http://localhost:5005/add_tracks/"
		);
	});
});
