/**
 * Client-side copy of the remote framebuffer, kept in RGBA.
 */

import type { DecodedRectangle, Framebuffer } from "./types.js";

export class FramebufferImage {
	readonly width: number;
	readonly height: number;
	private readonly pixels: Uint8Array;
	private isStale = true;
	private updated = false;

	constructor(width: number, height: number) {
		if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
			throw new RangeError(`Invalid framebuffer size ${width}x${height}`);
		}
		this.width = width;
		this.height = height;
		this.pixels = new Uint8Array(width * height * 4);
	}

	/** True until the first rectangle arrives, and again after the connection drops */
	get stale(): boolean {
		return this.isStale;
	}

	/** Whether any rectangle has been applied since construction */
	get hasContent(): boolean {
		return this.updated;
	}

	/**
	 * Copy one decoded rectangle into the image. Parts outside the image are
	 * dropped.
	 */
	apply(rect: DecodedRectangle): void {
		const x0 = Math.max(rect.x, 0);
		const y0 = Math.max(rect.y, 0);
		const x1 = Math.min(rect.x + rect.width, this.width);
		const y1 = Math.min(rect.y + rect.height, this.height);

		if (x1 > x0) {
			const rowBytes = (x1 - x0) * 4;
			for (let y = y0; y < y1; y++) {
				const src = ((y - rect.y) * rect.width + (x0 - rect.x)) * 4;
				const dst = (y * this.width + x0) * 4;
				this.pixels.set(rect.pixels.subarray(src, src + rowBytes), dst);
			}
		}

		this.updated = true;
		this.isStale = false;
	}

	markStale(): void {
		this.isStale = true;
	}

	/** A copy of the current pixels */
	snapshot(): Framebuffer {
		return { width: this.width, height: this.height, pixels: this.pixels.slice() };
	}
}
