// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Desktop interface — what the MCP tools drive. A VNC session implements it;
 * tests swap in a fake.
 */

import type { ConnectionPhase, ServerInit } from "../vnc/types.js";

export const MouseButton = {
	Left: "left",
	Middle: "middle",
	Right: "right",
} as const;
export type MouseButton = (typeof MouseButton)[keyof typeof MouseButton];

/** RFB pointer button-mask bit for each button */
export const BUTTON_MASK: Readonly<Record<MouseButton, number>> = {
	left: 1,
	middle: 2,
	right: 4,
};

export interface DesktopStatus {
	/** Connection phase of the underlying session */
	readonly phase: ConnectionPhase;
	/** Latest status line, e.g. "Connected (1024x768)" */
	readonly message: string;
	/** Remote desktop size and name once streaming */
	readonly server?: Pick<ServerInit, "width" | "height" | "name">;
	/** True when the image no longer reflects the remote screen */
	readonly stale: boolean;
	readonly bytesReceived: number;
}

export interface ScreenshotOptions {
	/** Integer upscale factor (default: 1) */
	readonly scale?: number;
	/** Brightness multiplier (default: 1) */
	readonly brightness?: number;
}

export interface Screenshot {
	/** PNG image data */
	readonly png: Buffer;
	readonly width: number;
	readonly height: number;
	readonly stale: boolean;
}

export interface Desktop {
	/** Start connecting; resolves once the first connection attempt settles. */
	start(): Promise<void>;

	/** Disconnect for good. */
	stop(): void;

	status(): DesktopStatus;

	/** PNG of the current framebuffer image. Throws before the first update. */
	screenshot(options?: ScreenshotOptions): Promise<Screenshot>;

	/** Send a raw pointer event with the given button mask. */
	pointer(x: number, y: number, buttonMask: number): void;

	/** Press and release a mouse button at a position. */
	click(x: number, y: number, button?: MouseButton): Promise<void>;

	/** Press and release a key or combination such as "Ctrl+Alt+Delete". */
	key(combo: string): Promise<void>;

	/** Type text one character at a time. */
	typeText(text: string): Promise<void>;
}
