/**
 * Client-to-server message serialization. Every message is built in full
 * before it is handed to the transport.
 */

import { PIXEL_FORMAT_LENGTH, writePixelFormat } from "./pixel-format.js";
import { ClientMessageType, type PixelFormat, type RfbVersion } from "./types.js";

function assertUint(name: string, value: number, bits: 8 | 16 | 32): void {
	const max = 2 ** bits - 1;
	if (!Number.isInteger(value) || value < 0 || value > max) {
		throw new RangeError(`${name} must be an integer in 0..${max}, got ${value}`);
	}
}

/** "RFB 003.008\n" and friends — always 12 bytes. */
export function encodeProtocolVersion(version: RfbVersion): Uint8Array {
	const [major, minor] = version.split(".");
	const text = `RFB ${major.padStart(3, "0")}.${minor.padStart(3, "0")}\n`;
	return new TextEncoder().encode(text);
}

export function encodeSecuritySelection(securityType: number): Uint8Array {
	assertUint("securityType", securityType, 8);
	return new Uint8Array([securityType]);
}

export function encodeClientInit(shared: boolean): Uint8Array {
	return new Uint8Array([shared ? 1 : 0]);
}

export function encodeSetPixelFormat(pf: PixelFormat): Uint8Array {
	const buf = new Uint8Array(4 + PIXEL_FORMAT_LENGTH);
	buf[0] = ClientMessageType.SetPixelFormat;
	// bytes 1-3: padding
	writePixelFormat(pf, buf, 4);
	return buf;
}

export function encodeSetEncodings(encodings: readonly number[]): Uint8Array {
	assertUint("encoding count", encodings.length, 16);
	const buf = new Uint8Array(4 + encodings.length * 4);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.SetEncodings;
	// byte 1: padding
	view.setUint16(2, encodings.length);
	for (let i = 0; i < encodings.length; i++) {
		view.setInt32(4 + i * 4, encodings[i]);
	}
	return buf;
}

export function encodeFramebufferUpdateRequest(
	incremental: boolean,
	x: number,
	y: number,
	width: number,
	height: number,
): Uint8Array {
	assertUint("x", x, 16);
	assertUint("y", y, 16);
	assertUint("width", width, 16);
	assertUint("height", height, 16);

	const buf = new Uint8Array(10);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.FramebufferUpdateRequest;
	buf[1] = incremental ? 1 : 0;
	view.setUint16(2, x);
	view.setUint16(4, y);
	view.setUint16(6, width);
	view.setUint16(8, height);
	return buf;
}

/** Button mask bits: 1 = left, 2 = middle, 4 = right, 8/16 = wheel up/down. */
export function encodePointerEvent(x: number, y: number, buttonMask: number): Uint8Array {
	assertUint("x", x, 16);
	assertUint("y", y, 16);
	assertUint("buttonMask", buttonMask, 8);

	const buf = new Uint8Array(6);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.PointerEvent;
	buf[1] = buttonMask;
	view.setUint16(2, x);
	view.setUint16(4, y);
	return buf;
}

export function encodeKeyEvent(keysym: number, down: boolean): Uint8Array {
	assertUint("keysym", keysym, 32);

	const buf = new Uint8Array(8);
	const view = new DataView(buf.buffer);

	buf[0] = ClientMessageType.KeyEvent;
	buf[1] = down ? 1 : 0;
	// bytes 2-3: padding
	view.setUint32(4, keysym);
	return buf;
}
