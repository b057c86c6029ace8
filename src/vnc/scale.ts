/**
 * Screenshot post-processing: nearest-neighbour upscale and brightness boost.
 * Small or dark consoles become easier to read for a vision model.
 */

import type { Framebuffer } from "./types.js";

export interface ScaleOptions {
	/** Integer upscale factor (default: 1) */
	readonly scale?: number;
	/** Brightness multiplier (default: 1) */
	readonly brightness?: number;
}

export function scaleFramebuffer(fb: Framebuffer, options: ScaleOptions = {}): Framebuffer {
	const scale = options.scale ?? 1;
	const brightness = options.brightness ?? 1;
	if (!Number.isInteger(scale) || scale < 1) {
		throw new RangeError(`Scale must be a positive integer, got ${scale}`);
	}
	if (!(brightness > 0)) {
		throw new RangeError(`Brightness must be positive, got ${brightness}`);
	}
	if (scale === 1 && brightness === 1) return fb;

	const width = fb.width * scale;
	const height = fb.height * scale;
	const pixels = new Uint8Array(width * height * 4);

	for (let y = 0; y < fb.height; y++) {
		for (let x = 0; x < fb.width; x++) {
			const si = (y * fb.width + x) * 4;
			const r = Math.min(Math.round(fb.pixels[si] * brightness), 255);
			const g = Math.min(Math.round(fb.pixels[si + 1] * brightness), 255);
			const b = Math.min(Math.round(fb.pixels[si + 2] * brightness), 255);

			for (let dy = 0; dy < scale; dy++) {
				for (let dx = 0; dx < scale; dx++) {
					const di = ((y * scale + dy) * width + (x * scale + dx)) * 4;
					pixels[di] = r;
					pixels[di + 1] = g;
					pixels[di + 2] = b;
					pixels[di + 3] = 255;
				}
			}
		}
	}

	return { width, height, pixels };
}
