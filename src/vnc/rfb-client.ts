// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * RFB (VNC) connection controller.
 *
 * Owns the transport, the receive buffer and the connection state. Each
 * incoming chunk is appended to the buffer and then framed, negotiated and
 * answered synchronously until the framer needs more data. Decoded
 * rectangles are published as events.
 */

import { EventEmitter } from "node:events";
import { type Logger, createLogger } from "../logger.js";
import { decodeRectangle } from "./encodings.js";
import { RfbError, failure } from "./errors.js";
import { FramebufferImage } from "./framebuffer.js";
import { tryParse } from "./framer.js";
import { type NegotiationOptions, negotiate } from "./handshake.js";
import {
	encodeFramebufferUpdateRequest,
	encodeKeyEvent,
	encodePointerEvent,
} from "./messages.js";
import { ReceiveBuffer } from "./receive-buffer.js";
import { type Transport, type TransportConnection, WebSocketTransport } from "./transport.js";
import type {
	ConnectionState,
	ConnectionStatus,
	DecodedRectangle,
	FailureReason,
	Framebuffer,
	ProtocolEffect,
	ServerInit,
} from "./types.js";

const DEFAULT_CONNECT_TIMEOUT = 10_000;
const DEFAULT_READ_TIMEOUT = 15_000;

export interface RfbClientOptions extends NegotiationOptions {
	/** Ask for incremental updates after the first full one (default: true) */
	readonly incremental?: boolean;
	/** Time allowed to reach `streaming`, in ms */
	readonly connectTimeout?: number;
	/** Time allowed for a requested update to arrive, in ms */
	readonly readTimeout?: number;
	/** Delay before reconnecting after a transport failure; null or 0 disables it */
	readonly reconnectDelay?: number | null;
	readonly transport?: Transport;
	readonly logger?: Logger;
}

export type RfbClientEvents = {
	status: [status: ConnectionStatus];
	state: [state: ConnectionState];
	rectangle: [rect: DecodedRectangle];
	update: [rects: readonly DecodedRectangle[]];
	stale: [];
	bell: [];
};

/** Status line for a connection state, in the wording a viewer shows */
export function describeState(state: ConnectionState): string {
	switch (state.phase) {
		case "disconnected":
			return "Connecting to VNC server...";
		case "version-pending":
			return "Connected. Initializing VNC...";
		case "security-pending":
			return `Negotiating security (RFB ${state.version})...`;
		case "authenticating":
			return "Authenticating...";
		case "awaiting-server-init":
			return "Waiting for server init...";
		case "streaming":
			return `Connected (${state.serverInit.width}x${state.serverInit.height})`;
		case "closed":
			return "Disconnected";
		case "failed":
			if (state.reason.code === "authentication-rejected") return state.reason.message;
			return `Connection failed: ${state.reason.message}`;
	}
}

function isActive(state: ConnectionState): boolean {
	return state.phase !== "disconnected" && state.phase !== "closed" && state.phase !== "failed";
}

export class RfbClient extends EventEmitter<RfbClientEvents> {
	readonly url: string;
	private readonly options: RfbClientOptions;
	private readonly transport: Transport;
	private readonly logger: Logger;

	private currentState: ConnectionState = { phase: "disconnected" };
	private connection: TransportConnection | null = null;
	private buffer = new ReceiveBuffer();
	/** Bumped on every open and teardown so late transport events are ignored */
	private attempt = 0;
	private reconnectTimer: NodeJS.Timeout | null = null;
	private received = 0;
	private consumedBytes = 0;

	constructor(url: string, options: RfbClientOptions = {}) {
		super();
		this.url = url;
		this.options = options;
		this.transport = options.transport ?? new WebSocketTransport();
		this.logger = options.logger ?? createLogger("rfb");
	}

	get state(): ConnectionState {
		return this.currentState;
	}

	/** ServerInit of the current session, once streaming */
	get serverInit(): ServerInit | null {
		return this.currentState.phase === "streaming" ? this.currentState.serverInit : null;
	}

	/** Bytes delivered by the transport since this client was created */
	get bytesReceived(): number {
		return this.received;
	}

	/** Bytes framed into complete messages */
	get bytesConsumed(): number {
		return this.consumedBytes;
	}

	/** Bytes waiting in the receive buffer for the rest of their message */
	get bufferedBytes(): number {
		return this.buffer.length;
	}

	/** True while a reconnect is scheduled */
	get reconnecting(): boolean {
		return this.reconnectTimer !== null;
	}

	/** Connect to the VNC server and complete the RFB handshake. */
	async connect(): Promise<ServerInit> {
		const current = this.currentState;
		if (current.phase === "streaming") return current.serverInit;

		const waiting = this.waitForStreaming(this.options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT);
		if (!isActive(current)) {
			this.cancelReconnect();
			this.open();
		}
		return await waiting;
	}

	/** Request a full update and return the whole screen once it has arrived. */
	async capture(): Promise<Framebuffer> {
		const serverInit = this.requireStreaming();
		const image = new FramebufferImage(serverInit.width, serverInit.height);
		const next = this.nextUpdate();
		this.requestUpdate(false);
		for (const rect of await next) {
			image.apply(rect);
		}
		return image.snapshot();
	}

	/**
	 * Resolve with the rectangles of the next framebuffer update. Rejects if
	 * the connection ends or nothing arrives within `timeout` ms.
	 */
	nextUpdate(timeout = this.options.readTimeout ?? DEFAULT_READ_TIMEOUT): Promise<readonly DecodedRectangle[]> {
		return new Promise((resolve, reject) => {
			const cleanup = (): void => {
				clearTimeout(timer);
				this.off("update", onUpdate);
				this.off("state", onState);
			};
			const onUpdate = (rects: readonly DecodedRectangle[]): void => {
				cleanup();
				resolve(rects);
			};
			const onState = (state: ConnectionState): void => {
				if (state.phase === "failed") {
					cleanup();
					reject(RfbError.from(state.reason));
				} else if (state.phase === "closed") {
					cleanup();
					reject(new RfbError("transport-failure", "Connection closed"));
				}
			};
			const timer = setTimeout(() => {
				cleanup();
				reject(new RfbError("timeout", `Read timeout waiting for framebuffer update after ${timeout}ms`));
			}, timeout);

			this.on("update", onUpdate);
			this.on("state", onState);
		});
	}

	/** Ask the server for a framebuffer update of the whole screen. */
	requestUpdate(incremental = true): void {
		const serverInit = this.requireStreaming();
		this.send(encodeFramebufferUpdateRequest(incremental, 0, 0, serverInit.width, serverInit.height));
	}

	sendPointerEvent(x: number, y: number, buttonMask: number): void {
		const serverInit = this.requireStreaming();
		if (x < 0 || y < 0 || x >= serverInit.width || y >= serverInit.height) {
			throw new RangeError(
				`Pointer position (${x}, ${y}) outside framebuffer ${serverInit.width}x${serverInit.height}`,
			);
		}
		this.send(encodePointerEvent(x, y, buttonMask));
	}

	sendKeyEvent(keysym: number, down: boolean): void {
		this.requireStreaming();
		this.send(encodeKeyEvent(keysym, down));
	}

	/** Close the connection for good. Cancels any pending reconnect. */
	disconnect(): void {
		this.cancelReconnect();
		if (this.currentState.phase === "closed") return;
		this.teardown();
		this.setState({ phase: "closed" });
		this.logger.info(`Disconnected from ${this.url}`);
	}

	// --- Connection lifecycle ---

	private open(): void {
		const attempt = ++this.attempt;
		const isCurrent = (): boolean => attempt === this.attempt;
		this.buffer = new ReceiveBuffer();
		this.setState({ phase: "disconnected" });
		this.logger.info(`Connecting to ${this.url}`);

		try {
			this.connection = this.transport.open(this.url, {
				onOpen: () => {
					if (!isCurrent()) return;
					this.setState({ phase: "version-pending" });
				},
				onData: (bytes) => {
					if (!isCurrent()) return;
					this.receive(bytes);
				},
				onClose: (reason) => {
					if (!isCurrent()) return;
					this.transportFailed(`Connection closed (${reason})`);
				},
				onError: (error) => {
					if (!isCurrent()) return;
					this.transportFailed(error.message);
				},
			});
		} catch (error) {
			this.transportFailed(error instanceof Error ? error.message : String(error));
		}
	}

	private waitForStreaming(timeout: number): Promise<ServerInit> {
		return new Promise((resolve, reject) => {
			const cleanup = (): void => {
				clearTimeout(timer);
				this.off("state", onState);
			};
			const onState = (state: ConnectionState): void => {
				if (state.phase === "streaming") {
					cleanup();
					resolve(state.serverInit);
				} else if (state.phase === "failed") {
					cleanup();
					reject(RfbError.from(state.reason));
				} else if (state.phase === "closed") {
					cleanup();
					reject(new RfbError("transport-failure", "Connection closed"));
				}
			};
			const timer = setTimeout(() => {
				cleanup();
				this.fail(failure("timeout", `Connection timeout after ${timeout}ms`));
				reject(new RfbError("timeout", `Connection timeout after ${timeout}ms`));
			}, timeout);

			this.on("state", onState);
		});
	}

	private receive(bytes: Uint8Array): void {
		this.received += bytes.length;
		this.buffer.append(bytes);

		try {
			this.pump();
		} catch (error) {
			if (error instanceof RfbError) {
				this.fail(error.toReason());
				return;
			}
			// A throwing responder or listener ends the session
			const state = this.currentState;
			const message = error instanceof Error ? error.message : String(error);
			if (!isActive(state)) {
				this.logger.error(`Error after the session ended: ${message}`);
				return;
			}
			const code = state.phase === "authenticating" ? "authentication-rejected" : "protocol-malformed";
			this.fail(failure(code, message));
		}
	}

	/** Frame and handle every complete message in the buffer. */
	private pump(): void {
		while (isActive(this.currentState)) {
			const state = this.currentState;
			const outcome = tryParse(this.buffer.view(), state);
			if (outcome.kind === "need-more-data") return;
			if (outcome.kind === "malformed") {
				this.fail(outcome.reason);
				return;
			}

			const transition = negotiate(state, outcome.effect, this.options);
			this.buffer.consume(outcome.bytes);
			this.consumedBytes += outcome.bytes;

			if (transition.state.phase === "failed") {
				this.fail(transition.state.reason);
				return;
			}

			for (const message of transition.outgoing) {
				this.send(message);
			}
			// A failed send has already moved the session to failed
			if (this.currentState !== state) return;
			if (transition.state !== state) {
				this.setState(transition.state);
			}

			const next = this.currentState;
			if (transition.update && next.phase === "streaming") {
				this.publishUpdate(transition.update.map((rect) => decodeRectangle(rect, next.pixelFormat)));
			} else {
				this.noteEffect(outcome.effect);
			}
		}
	}

	private publishUpdate(rects: readonly DecodedRectangle[]): void {
		for (const rect of rects) {
			this.emit("rectangle", rect);
		}
		this.emit("update", rects);

		// Keep the stream going; a listener may have closed the connection
		const state = this.currentState;
		if (state.phase === "streaming") {
			const { width, height } = state.serverInit;
			this.send(encodeFramebufferUpdateRequest(this.options.incremental ?? true, 0, 0, width, height));
		}
	}

	private noteEffect(effect: ProtocolEffect): void {
		switch (effect.type) {
			case "bell":
				this.emit("bell");
				break;
			case "server-cut-text":
				this.logger.debug(`Ignoring server cut text (${effect.text.length} chars)`);
				break;
			case "colour-map-entries":
				this.logger.debug(`Ignoring ${effect.count} colour map entries from ${effect.firstColour}`);
				break;
			case "server-init":
				this.logger.info(
					`Server "${effect.serverInit.name}" ${effect.serverInit.width}x${effect.serverInit.height}`,
				);
				break;
			default:
				break;
		}
	}

	private send(bytes: Uint8Array): void {
		const connection = this.connection;
		if (!connection) return;
		try {
			connection.send(bytes);
		} catch (error) {
			this.transportFailed(error instanceof Error ? error.message : String(error));
		}
	}

	private transportFailed(message: string): void {
		if (!isActive(this.currentState) && this.currentState.phase !== "disconnected") return;
		this.fail(failure("transport-failure", message));
	}

	private fail(reason: FailureReason): void {
		this.teardown();
		this.logger.error(`${reason.code}: ${reason.message}`);
		this.setState({ phase: "failed", reason });

		// Only a lost transport is worth retrying; protocol and auth failures would recur
		if (reason.code === "transport-failure") {
			this.scheduleReconnect();
		}
	}

	/** Drop the transport and any buffered bytes. Nothing more is sent. */
	private teardown(): void {
		this.attempt++;
		const connection = this.connection;
		this.connection = null;
		this.buffer.clear();
		connection?.close();
		this.emit("stale");
	}

	private scheduleReconnect(): void {
		const delay = this.options.reconnectDelay;
		if (!delay || delay <= 0 || this.reconnectTimer) return;

		this.emitStatus(`Reconnecting in ${Math.round(delay / 1000)}s...`);
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.open();
		}, delay);
	}

	private cancelReconnect(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}

	private requireStreaming(): ServerInit {
		const state = this.currentState;
		if (state.phase !== "streaming") {
			throw new RfbError("protocol-malformed", `Not connected (state: ${state.phase})`);
		}
		return state.serverInit;
	}

	private setState(state: ConnectionState): void {
		this.currentState = state;
		this.emit("state", state);
		this.emitStatus(describeState(state));
	}

	private emitStatus(message: string): void {
		this.emit("status", { phase: this.currentState.phase, message });
	}
}
