// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import { afterEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../src/logger.js";
import { vncAuthResponse } from "../../src/vnc/des.js";
import { RfbError } from "../../src/vnc/errors.js";
import { RfbClient, type RfbClientOptions } from "../../src/vnc/rfb-client.js";
import type { ConnectionStatus, DecodedRectangle } from "../../src/vnc/types.js";
import {
	FakeTransport,
	concat,
	rawUpdateBytes,
	serverInitBytes,
	toBytes,
} from "../helpers/fake-transport.js";

function u32(value: number): number[] {
	return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

const PIXELS = Uint8Array.from({ length: 4 * 2 * 4 }, (_, i) => i);

/** Everything a 3.8 server without authentication sends up to and including one update */
const SESSION = concat(
	"RFB 003.008\n",
	[1, 1],
	u32(0),
	serverInitBytes(4, 2, "desk"),
	rawUpdateBytes(0, 0, 4, 2, PIXELS),
);

function createClient(options: RfbClientOptions = {}) {
	const transport = new FakeTransport();
	const client = new RfbClient("ws://vnc.test/websockify", { transport, logger: silentLogger, ...options });
	const rectangles: DecodedRectangle[] = [];
	const statuses: ConnectionStatus[] = [];
	client.on("rectangle", (rect) => rectangles.push(rect));
	client.on("status", (status) => statuses.push(status));
	return { client, transport, rectangles, statuses };
}

const sent = (messages: readonly Uint8Array[]): number[][] => messages.map((m) => Array.from(m));

afterEach(() => {
	vi.useRealTimers();
});

describe("RfbClient", () => {
	it("should complete the handshake and stream updates", async () => {
		const { client, transport, rectangles } = createClient();
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);

		const serverInit = await connecting;
		expect(serverInit.width).toBe(4);
		expect(serverInit.height).toBe(2);
		expect(serverInit.name).toBe("desk");
		expect(client.state.phase).toBe("streaming");

		expect(sent(transport.last.sent)).toEqual([
			Array.from(toBytes("RFB 003.008\n")),
			[1],
			[1],
			[2, 0, 0, 1, 0, 0, 0, 0],
			[3, 0, 0, 0, 0, 0, 0, 4, 0, 2],
			// follow-up request after the first update is incremental
			[3, 1, 0, 0, 0, 0, 0, 4, 0, 2],
		]);

		expect(rectangles).toHaveLength(1);
		expect(rectangles[0].pixels[0]).toBe(0);
		expect(rectangles[0].pixels[3]).toBe(255);
		expect(rectangles[0].pixels[4]).toBe(4);
		client.disconnect();
	});

	it("should give the same result when bytes arrive one at a time", () => {
		const whole = createClient();
		void whole.client.connect().catch(() => {});
		whole.transport.last.open();
		whole.transport.last.deliver(SESSION);

		const split = createClient();
		void split.client.connect().catch(() => {});
		split.transport.last.open();
		split.transport.last.trickle(SESSION);

		expect(split.client.state).toEqual(whole.client.state);
		expect(sent(split.transport.last.sent)).toEqual(sent(whole.transport.last.sent));
		expect(split.rectangles).toEqual(whole.rectangles);

		whole.client.disconnect();
		split.client.disconnect();
	});

	it("should give the same result for every two-way split of the session", () => {
		const whole = createClient();
		void whole.client.connect().catch(() => {});
		whole.transport.last.open();
		whole.transport.last.deliver(SESSION);

		for (let split = 1; split < SESSION.length; split++) {
			const parts = createClient();
			void parts.client.connect().catch(() => {});
			parts.transport.last.open();
			parts.transport.last.deliver(SESSION.subarray(0, split));
			parts.transport.last.deliver(SESSION.subarray(split));

			expect(parts.client.state, `split at ${split}`).toEqual(whole.client.state);
			expect(sent(parts.transport.last.sent), `split at ${split}`).toEqual(sent(whole.transport.last.sent));
			expect(parts.rectangles, `split at ${split}`).toEqual(whole.rectangles);
			parts.client.disconnect();
		}
		whole.client.disconnect();
	});

	it("should account for every received byte", () => {
		const { client, transport } = createClient();
		void client.connect().catch(() => {});
		transport.last.open();
		// The session plus the first 5 bytes of another update
		transport.last.deliver(concat(SESSION, rawUpdateBytes(0, 0, 1, 1, new Uint8Array(4)).subarray(0, 5)));

		expect(client.bytesReceived).toBe(SESSION.length + 5);
		expect(client.bufferedBytes).toBe(5);
		expect(client.bytesConsumed).toBe(SESSION.length);
		expect(client.bytesConsumed).toBe(client.bytesReceived - client.bufferedBytes);
		client.disconnect();
	});

	it("should report the connection status as it progresses", async () => {
		const { client, transport, statuses } = createClient();
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);
		await connecting;

		expect(statuses[0]).toEqual({ phase: "disconnected", message: "Connecting to VNC server..." });
		expect(statuses[1]).toEqual({ phase: "version-pending", message: "Connected. Initializing VNC..." });
		expect(statuses.at(-1)).toEqual({ phase: "streaming", message: "Connected (4x2)" });

		client.disconnect();
		expect(statuses.at(-1)).toEqual({ phase: "closed", message: "Disconnected" });
	});

	it("should fail on a malformed version without consuming it", async () => {
		const { client, transport } = createClient({ reconnectDelay: 5000 });
		const stale = vi.fn();
		client.on("stale", stale);
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver("NOPE");

		await expect(connecting).rejects.toMatchObject({ code: "protocol-malformed" });
		expect(client.state.phase).toBe("failed");
		expect(client.bytesConsumed).toBe(0);
		expect(transport.last.closed).toBe(true);
		expect(stale).toHaveBeenCalledTimes(1);
		// Protocol errors are not retried
		expect(client.reconnecting).toBe(false);
	});

	it("should stay failed when a handshake reply cannot be sent", async () => {
		const { client, transport } = createClient();
		const phases: string[] = [];
		client.on("state", (state) => phases.push(state.phase));
		const connecting = client.connect();
		transport.last.open();
		transport.last.closed = true;
		transport.last.deliver("RFB 003.008\n");

		await expect(connecting).rejects.toMatchObject({
			code: "transport-failure",
			message: "WebSocket not connected",
		});
		expect(phases).toEqual(["disconnected", "version-pending", "failed"]);
		expect(client.state).toEqual({
			phase: "failed",
			reason: { code: "transport-failure", message: "WebSocket not connected" },
		});
		expect(() => client.sendKeyEvent(0x61, true)).toThrow(RfbError);
	});

	it("should fail the session when the challenge responder throws", async () => {
		const { client, transport } = createClient({
			password: "test-secret",
			responder: () => {
				throw new Error("cipher unavailable");
			},
		});
		const connecting = client.connect();
		transport.last.open();

		expect(() =>
			transport.last.deliver(concat("RFB 003.008\n", [1, 2], new Uint8Array(16))),
		).not.toThrow();
		await expect(connecting).rejects.toMatchObject({
			code: "authentication-rejected",
			message: "cipher unavailable",
		});
		expect(client.state.phase).toBe("failed");
		expect(client.bufferedBytes).toBe(0);
		expect(transport.last.closed).toBe(true);
	});

	it("should authenticate with the DES response", async () => {
		const { client, transport } = createClient({ password: "test-secret" });
		const challenge = Uint8Array.from({ length: 16 }, (_, i) => i * 3);
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(concat("RFB 003.008\n", [1, 2], challenge, u32(0), serverInitBytes(4, 2)));

		await connecting;
		expect(sent(transport.last.sent).slice(1, 4)).toEqual([
			[2],
			Array.from(vncAuthResponse(challenge, "test-secret")),
			[1],
		]);
		client.disconnect();
	});

	it("should not reconnect after the password is rejected", async () => {
		const { client, transport, statuses } = createClient({ password: "test-secret", reconnectDelay: 5000 });
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(concat("RFB 003.008\n", [1, 2], new Uint8Array(16), u32(1), u32(5), "nope!"));

		await expect(connecting).rejects.toMatchObject({
			code: "authentication-rejected",
			message: "Authentication failed: nope!",
		});
		expect(statuses.at(-1)).toEqual({ phase: "failed", message: "Authentication failed: nope!" });
		expect(client.reconnecting).toBe(false);
		expect(transport.connections).toHaveLength(1);
	});

	it("should reconnect after the transport drops", async () => {
		vi.useFakeTimers();
		const { client, transport, statuses } = createClient({ reconnectDelay: 5000 });
		const stale = vi.fn();
		client.on("stale", stale);
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);
		await connecting;

		transport.last.drop("code 1006");
		expect(client.state).toEqual({
			phase: "failed",
			reason: { code: "transport-failure", message: "Connection closed (code 1006)" },
		});
		expect(stale).toHaveBeenCalledTimes(1);
		expect(statuses.at(-1)?.message).toBe("Reconnecting in 5s...");
		expect(client.reconnecting).toBe(true);

		vi.advanceTimersByTime(4999);
		expect(transport.connections).toHaveLength(1);
		vi.advanceTimersByTime(1);
		expect(transport.connections).toHaveLength(2);
		expect(client.state.phase).toBe("disconnected");
		expect(client.bufferedBytes).toBe(0);

		// The new connection starts from scratch
		transport.last.open();
		transport.last.trickle(SESSION);
		expect(client.state.phase).toBe("streaming");
		client.disconnect();
	});

	it("should ignore events from a connection it has dropped", () => {
		const { client, transport } = createClient();
		void client.connect().catch(() => {});
		const first = transport.last;
		first.open();
		client.disconnect();

		const received = client.bytesReceived;
		first.deliver("RFB 003.008\n");
		first.drop();
		expect(client.bytesReceived).toBe(received);
		expect(client.state.phase).toBe("closed");
	});

	it("should cancel a pending reconnect on disconnect", () => {
		vi.useFakeTimers();
		const { client, transport } = createClient({ reconnectDelay: 1000 });
		void client.connect().catch(() => {});
		transport.last.drop();
		expect(client.reconnecting).toBe(true);

		client.disconnect();
		vi.advanceTimersByTime(5000);
		expect(transport.connections).toHaveLength(1);
		expect(client.state.phase).toBe("closed");
	});

	it("should time out when the handshake stalls", async () => {
		vi.useFakeTimers();
		const { client, transport } = createClient({ connectTimeout: 1000 });
		const connecting = expect(client.connect()).rejects.toMatchObject({
			code: "timeout",
			message: "Connection timeout after 1000ms",
		});
		transport.last.open();
		await vi.advanceTimersByTimeAsync(1000);
		await connecting;
		expect(client.state.phase).toBe("failed");
		expect(transport.last.closed).toBe(true);
	});

	it("should capture a full frame on request", async () => {
		const { client, transport } = createClient();
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);
		await connecting;

		const capturing = client.capture();
		expect(sent(transport.last.sent).at(-1)).toEqual([3, 0, 0, 0, 0, 0, 0, 4, 0, 2]);
		transport.last.deliver(rawUpdateBytes(0, 0, 4, 2, new Uint8Array(32).fill(200)));

		const frame = await capturing;
		expect(frame.width).toBe(4);
		expect(frame.height).toBe(2);
		expect(Array.from(frame.pixels.subarray(0, 4))).toEqual([200, 200, 200, 255]);
		client.disconnect();
	});

	it("should emit bell and ignore cut text", async () => {
		const { client, transport } = createClient();
		const bell = vi.fn();
		client.on("bell", bell);
		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);
		await connecting;

		transport.last.deliver(concat([2], [3, 0, 0, 0], u32(3), "abc"));
		expect(bell).toHaveBeenCalledTimes(1);
		expect(client.state.phase).toBe("streaming");
		expect(client.bufferedBytes).toBe(0);
		client.disconnect();
	});

	it("should send input only while streaming", async () => {
		const { client, transport } = createClient();
		expect(() => client.sendKeyEvent(0x61, true)).toThrow(RfbError);

		const connecting = client.connect();
		transport.last.open();
		transport.last.deliver(SESSION);
		await connecting;

		client.sendPointerEvent(3, 1, 1);
		client.sendKeyEvent(0x61, true);
		expect(sent(transport.last.sent).slice(-2)).toEqual([
			[5, 1, 0, 3, 0, 1],
			[4, 1, 0, 0, 0, 0, 0, 0x61],
		]);
		expect(() => client.sendPointerEvent(4, 0, 0)).toThrow(RangeError);
		client.disconnect();
	});
});
