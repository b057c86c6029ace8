import { PNG } from "pngjs";
import type { Framebuffer } from "./types.js";

/** Encode an RGBA framebuffer as PNG. */
export function framebufferToPng(fb: Framebuffer): Buffer {
	if (fb.pixels.length !== fb.width * fb.height * 4) {
		throw new RangeError(
			`Expected ${fb.width * fb.height * 4} RGBA bytes for ${fb.width}x${fb.height}, got ${fb.pixels.length}`,
		);
	}
	const png = new PNG({ width: fb.width, height: fb.height });
	png.data = Buffer.from(fb.pixels);
	return PNG.sync.write(png);
}
