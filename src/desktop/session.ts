/**
 * A remote desktop reached over VNC: keeps an RGBA copy of the screen up to
 * date from the update stream and forwards pointer and keyboard input.
 */

import { setTimeout as delay } from "node:timers/promises";
import { type Logger, createLogger } from "../logger.js";
import { RfbError } from "../vnc/errors.js";
import { FramebufferImage } from "../vnc/framebuffer.js";
import { keysymForChar, parseKeyCombo } from "../vnc/keyboard.js";
import { RfbClient, type RfbClientOptions } from "../vnc/rfb-client.js";
import { scaleFramebuffer } from "../vnc/scale.js";
import { framebufferToPng } from "../vnc/png.js";
import type { ConnectionStatus } from "../vnc/types.js";
import {
	BUTTON_MASK,
	type Desktop,
	type DesktopStatus,
	MouseButton,
	type Screenshot,
	type ScreenshotOptions,
} from "./types.js";

const DEFAULT_TAP_DELAY = 50;

export interface VncDesktopOptions extends RfbClientOptions {
	/** Time a button is held during a click, in ms */
	readonly tapDelay?: number;
	/** Pause between typed characters, in ms (default: none) */
	readonly keyDelay?: number;
}

export class VncDesktop implements Desktop {
	readonly client: RfbClient;
	private readonly logger: Logger;
	private readonly tapDelay: number;
	private readonly keyDelay: number;
	private image: FramebufferImage | null = null;
	private lastStatus: ConnectionStatus = { phase: "disconnected", message: "Not connected" };

	constructor(url: string, options: VncDesktopOptions = {}) {
		this.logger = options.logger ?? createLogger("desktop");
		this.client = new RfbClient(url, options);
		this.tapDelay = options.tapDelay ?? DEFAULT_TAP_DELAY;
		this.keyDelay = options.keyDelay ?? 0;

		this.client.on("state", (state) => {
			if (state.phase !== "streaming") return;
			const { width, height } = state.serverInit;
			// A reconnect may come back with a different screen size
			if (!this.image || this.image.width !== width || this.image.height !== height) {
				this.image = new FramebufferImage(width, height);
			}
		});
		this.client.on("rectangle", (rect) => this.image?.apply(rect));
		this.client.on("stale", () => this.image?.markStale());
		this.client.on("status", (status) => {
			this.lastStatus = status;
			this.logger.debug(status.message);
		});
	}

	async start(): Promise<void> {
		try {
			await this.client.connect();
		} catch (error) {
			// A lost transport is retried in the background
			if (error instanceof RfbError && error.code === "transport-failure" && this.client.reconnecting) {
				this.logger.warn(`${error.message}; will keep retrying`);
				return;
			}
			throw error;
		}
	}

	stop(): void {
		this.client.disconnect();
	}

	status(): DesktopStatus {
		const serverInit = this.client.serverInit;
		return {
			phase: this.client.state.phase,
			message: this.lastStatus.message,
			server: serverInit
				? { width: serverInit.width, height: serverInit.height, name: serverInit.name }
				: undefined,
			stale: this.image?.stale ?? true,
			bytesReceived: this.client.bytesReceived,
		};
	}

	async screenshot(options: ScreenshotOptions = {}): Promise<Screenshot> {
		const image = this.image;
		if (!image?.hasContent) {
			throw new Error(`No framebuffer received yet (${this.lastStatus.message})`);
		}
		const frame = scaleFramebuffer(image.snapshot(), options);
		return {
			png: framebufferToPng(frame),
			width: frame.width,
			height: frame.height,
			stale: image.stale,
		};
	}

	pointer(x: number, y: number, buttonMask: number): void {
		this.client.sendPointerEvent(x, y, buttonMask);
	}

	async click(x: number, y: number, button: MouseButton = MouseButton.Left): Promise<void> {
		this.client.sendPointerEvent(x, y, BUTTON_MASK[button]);
		await delay(this.tapDelay);
		this.client.sendPointerEvent(x, y, 0);
	}

	async key(combo: string): Promise<void> {
		const keysyms = parseKeyCombo(combo);
		for (const keysym of keysyms) {
			this.client.sendKeyEvent(keysym, true);
		}
		for (const keysym of [...keysyms].reverse()) {
			this.client.sendKeyEvent(keysym, false);
		}
	}

	async typeText(text: string): Promise<void> {
		// Resolve everything first so a bad character types nothing
		const keysyms = Array.from(text, keysymForChar);
		for (const keysym of keysyms) {
			this.client.sendKeyEvent(keysym, true);
			this.client.sendKeyEvent(keysym, false);
			if (this.keyDelay > 0) await delay(this.keyDelay);
		}
	}
}
