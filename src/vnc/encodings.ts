/**
 * RFB framebuffer encoding decoders.
 */

import { RfbError } from "./errors.js";
import { bytesPerPixel, readPixelValue } from "./pixel-format.js";
import { type DecodedRectangle, EncodingType, type FbRectangle, type PixelFormat } from "./types.js";

/**
 * Decode a Raw-encoded rectangle into RGBA pixel data.
 * Raw encoding sends uncompressed pixel data in the session pixel format.
 */
export function decodeRaw(rect: FbRectangle, format: PixelFormat): Uint8Array {
	const pixelCount = rect.width * rect.height;
	const size = bytesPerPixel(format);
	if (rect.data.length < pixelCount * size) {
		throw new RfbError(
			"protocol-malformed",
			`Raw rectangle needs ${pixelCount * size} bytes, got ${rect.data.length}`,
		);
	}

	const { redMax, greenMax, blueMax, redShift, greenShift, blueShift } = format;
	const rgba = new Uint8Array(pixelCount * 4);

	for (let i = 0; i < pixelCount; i++) {
		const pixel = readPixelValue(rect.data, i * size, size, format.bigEndian);
		const dstOffset = i * 4;

		// Uint8Array assignment truncates, so these are floor(component * 255 / max)
		rgba[dstOffset] = redMax && (((pixel >>> redShift) & redMax) * 255) / redMax;
		rgba[dstOffset + 1] = greenMax && (((pixel >>> greenShift) & greenMax) * 255) / greenMax;
		rgba[dstOffset + 2] = blueMax && (((pixel >>> blueShift) & blueMax) * 255) / blueMax;
		rgba[dstOffset + 3] = 255; // alpha
	}

	return rgba;
}

/** Decode one rectangle of a FramebufferUpdate. Only Raw is supported. */
export function decodeRectangle(rect: FbRectangle, format: PixelFormat): DecodedRectangle {
	if (rect.encoding !== EncodingType.Raw) {
		throw new RfbError("unsupported-encoding", `Unsupported encoding: ${rect.encoding}`);
	}
	return {
		x: rect.x,
		y: rect.y,
		width: rect.width,
		height: rect.height,
		pixels: decodeRaw(rect, format),
	};
}
