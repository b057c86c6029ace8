/**
 * Pixel format codec: server pixel samples to RGBA and back, plus the
 * 16-byte PIXEL_FORMAT block shared by ServerInit and SetPixelFormat.
 */

import { RfbError } from "./errors.js";
import type { PixelFormat } from "./types.js";

export type Rgba = readonly [r: number, g: number, b: number, a: number];

/** Size of the PIXEL_FORMAT block on the wire */
export const PIXEL_FORMAT_LENGTH = 16;

/** Bytes per pixel for a format; only 8, 16 and 32 bits per pixel are supported. */
export function bytesPerPixel(format: PixelFormat): 1 | 2 | 4 {
	switch (format.bitsPerPixel) {
		case 8:
			return 1;
		case 16:
			return 2;
		case 32:
			return 4;
		default:
			throw new RfbError(
				"unsupported-pixel-format",
				`Unsupported bits per pixel: ${format.bitsPerPixel}`,
			);
	}
}

/** Whether pixels in this format can be converted to RGBA without a colour map. */
export function isDecodable(format: PixelFormat): boolean {
	return (
		format.trueColor &&
		(format.bitsPerPixel === 8 || format.bitsPerPixel === 16 || format.bitsPerPixel === 32)
	);
}

export function samePixelFormat(a: PixelFormat, b: PixelFormat): boolean {
	return (
		a.bitsPerPixel === b.bitsPerPixel &&
		a.depth === b.depth &&
		a.bigEndian === b.bigEndian &&
		a.trueColor === b.trueColor &&
		a.redMax === b.redMax &&
		a.greenMax === b.greenMax &&
		a.blueMax === b.blueMax &&
		a.redShift === b.redShift &&
		a.greenShift === b.greenShift &&
		a.blueShift === b.blueShift
	);
}

/** Read one pixel sample as an unsigned integer. */
export function readPixelValue(
	data: Uint8Array,
	offset: number,
	size: 1 | 2 | 4,
	bigEndian: boolean,
): number {
	if (size === 4) {
		const value = bigEndian
			? (data[offset] << 24) | (data[offset + 1] << 16) | (data[offset + 2] << 8) | data[offset + 3]
			: data[offset] |
				(data[offset + 1] << 8) |
				(data[offset + 2] << 16) |
				(data[offset + 3] << 24);
		return value >>> 0;
	}
	if (size === 2) {
		return bigEndian
			? (data[offset] << 8) | data[offset + 1]
			: data[offset] | (data[offset + 1] << 8);
	}
	return data[offset];
}

function scaleComponent(value: number, shift: number, max: number): number {
	if (max === 0) return 0;
	const component = (value >>> shift) & max;
	return Math.floor((component * 255) / max);
}

/**
 * Decode one pixel sample into RGBA. Alpha is always opaque: RFB carries no
 * alpha channel.
 */
export function decodePixel(raw: Uint8Array, format: PixelFormat, offset = 0): Rgba {
	const size = bytesPerPixel(format);
	if (offset + size > raw.length) {
		throw new RangeError(`Pixel sample needs ${size} bytes at offset ${offset}`);
	}
	const value = readPixelValue(raw, offset, size, format.bigEndian);
	return [
		scaleComponent(value, format.redShift, format.redMax),
		scaleComponent(value, format.greenShift, format.greenMax),
		scaleComponent(value, format.blueShift, format.blueMax),
		255,
	];
}

/** Encode an RGB(A) colour as a pixel sample in `format`. Alpha is dropped. */
export function encodePixel(rgba: Rgba, format: PixelFormat): Uint8Array {
	const size = bytesPerPixel(format);
	const [r, g, b] = rgba;
	const value =
		((Math.round((r * format.redMax) / 255) << format.redShift) |
			(Math.round((g * format.greenMax) / 255) << format.greenShift) |
			(Math.round((b * format.blueMax) / 255) << format.blueShift)) >>>
		0;

	const out = new Uint8Array(size);
	for (let i = 0; i < size; i++) {
		const shift = format.bigEndian ? (size - 1 - i) * 8 : i * 8;
		out[i] = (value >>> shift) & 0xff;
	}
	return out;
}

/** Parse a PIXEL_FORMAT block. The caller guarantees 16 bytes are present. */
export function readPixelFormat(bytes: Uint8Array, offset = 0): PixelFormat {
	const view = new DataView(bytes.buffer, bytes.byteOffset + offset, PIXEL_FORMAT_LENGTH);
	return {
		bitsPerPixel: view.getUint8(0),
		depth: view.getUint8(1),
		bigEndian: view.getUint8(2) !== 0,
		trueColor: view.getUint8(3) !== 0,
		redMax: view.getUint16(4),
		greenMax: view.getUint16(6),
		blueMax: view.getUint16(8),
		redShift: view.getUint8(10),
		greenShift: view.getUint8(11),
		blueShift: view.getUint8(12),
		// bytes 13-15: padding
	};
}

/** Write a PIXEL_FORMAT block into `bytes` at `offset`. */
export function writePixelFormat(format: PixelFormat, bytes: Uint8Array, offset = 0): void {
	const view = new DataView(bytes.buffer, bytes.byteOffset + offset, PIXEL_FORMAT_LENGTH);
	view.setUint8(0, format.bitsPerPixel);
	view.setUint8(1, format.depth);
	view.setUint8(2, format.bigEndian ? 1 : 0);
	view.setUint8(3, format.trueColor ? 1 : 0);
	view.setUint16(4, format.redMax);
	view.setUint16(6, format.greenMax);
	view.setUint16(8, format.blueMax);
	view.setUint8(10, format.redShift);
	view.setUint8(11, format.greenShift);
	view.setUint8(12, format.blueShift);
}
