/**
 * Message framer: decides whether the buffered bytes hold one complete server
 * message for the current connection state, and parses it if so.
 *
 * RFB has no self-delimiting envelope before streaming begins, so the shape
 * of the next message is chosen by the state. The full length of a message is
 * always known before `consumed` is reported; anything short of it is
 * `need-more-data`. The buffer is never modified here.
 */

import { failure } from "./errors.js";
import { PIXEL_FORMAT_LENGTH, bytesPerPixel, isDecodable, readPixelFormat } from "./pixel-format.js";
import {
	type ConnectionState,
	EncodingType,
	type FbRectangle,
	type ParseOutcome,
	type PixelFormat,
	type ProtocolEffect,
	type RfbVersion,
	type ServerInit,
	ServerMessageType,
} from "./types.js";

const VERSION_LENGTH = 12;
const VERSION_PREFIX = "RFB ";
const VERSION_PATTERN = /^RFB (\d{3})\.(\d{3})\n$/;

/** width(2) + height(2) + pixel-format(16) + name-length(4) */
const SERVER_INIT_HEADER_LENGTH = 4 + PIXEL_FORMAT_LENGTH + 4;
/** x(2) + y(2) + width(2) + height(2) + encoding(4) */
const RECT_HEADER_LENGTH = 12;
const CHALLENGE_LENGTH = 16;

const NEED_MORE_DATA: ParseOutcome = { kind: "need-more-data" };

function consumed(bytes: number, effect: ProtocolEffect): ParseOutcome {
	return { kind: "consumed", bytes, effect };
}

function malformed(message: string): ParseOutcome {
	return { kind: "malformed", reason: failure("protocol-malformed", message) };
}

function viewOf(buffer: Uint8Array): DataView {
	return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

const textDecoder = new TextDecoder();
const latin1Decoder = new TextDecoder("latin1");

/**
 * Try to frame one server message from the front of `buffer`.
 */
export function tryParse(buffer: Uint8Array, state: ConnectionState): ParseOutcome {
	switch (state.phase) {
		case "version-pending":
			return parseProtocolVersion(buffer);
		case "security-pending":
			return parseSecurityTypes(buffer, state.version);
		case "authenticating":
			return state.awaiting === "challenge"
				? parseChallenge(buffer)
				: parseSecurityResult(buffer, state.version);
		case "awaiting-server-init":
			return state.securityResultPending
				? parseSecurityResult(buffer, state.version)
				: parseServerInit(buffer);
		case "streaming":
			return parseServerMessage(buffer, state.serverInit, state.pixelFormat);
		case "disconnected":
		case "closed":
		case "failed":
			return malformed(`Unexpected data in state ${state.phase}`);
	}
}

function parseProtocolVersion(buffer: Uint8Array): ParseOutcome {
	// Reject a wrong prefix as soon as it is visible
	const prefixLength = Math.min(buffer.length, VERSION_PREFIX.length);
	for (let i = 0; i < prefixLength; i++) {
		if (buffer[i] !== VERSION_PREFIX.charCodeAt(i)) {
			const seen = latin1Decoder.decode(buffer.subarray(0, VERSION_LENGTH));
			return malformed(`Invalid RFB version string: ${JSON.stringify(seen)}`);
		}
	}
	if (buffer.length < VERSION_LENGTH) return NEED_MORE_DATA;

	const versionStr = latin1Decoder.decode(buffer.subarray(0, VERSION_LENGTH));
	const match = versionStr.match(VERSION_PATTERN);
	if (!match) {
		return malformed(`Invalid RFB version string: ${JSON.stringify(versionStr)}`);
	}

	return consumed(VERSION_LENGTH, {
		type: "server-version",
		major: Number.parseInt(match[1], 10),
		minor: Number.parseInt(match[2], 10),
	});
}

/** A u32 length followed by that many bytes of text, starting at `offset`. */
function readReason(
	buffer: Uint8Array,
	offset: number,
): { readonly end: number; readonly reason: string } | null {
	if (buffer.length < offset + 4) return null;
	const length = viewOf(buffer).getUint32(offset);
	const end = offset + 4 + length;
	if (buffer.length < end) return null;
	return { end, reason: textDecoder.decode(buffer.subarray(offset + 4, end)) };
}

function parseSecurityTypes(buffer: Uint8Array, version: RfbVersion): ParseOutcome {
	if (version === "3.3") {
		// The server decides: a single u32 security type
		if (buffer.length < 4) return NEED_MORE_DATA;
		const securityType = viewOf(buffer).getUint32(0);
		if (securityType === 0) {
			const refusal = readReason(buffer, 4);
			if (!refusal) return NEED_MORE_DATA;
			return consumed(refusal.end, { type: "security-refused", reason: refusal.reason });
		}
		return consumed(4, { type: "security-types", types: [securityType] });
	}

	if (buffer.length < 1) return NEED_MORE_DATA;
	const count = buffer[0];
	if (count === 0) {
		const refusal = readReason(buffer, 1);
		if (!refusal) return NEED_MORE_DATA;
		return consumed(refusal.end, { type: "security-refused", reason: refusal.reason });
	}
	if (buffer.length < 1 + count) return NEED_MORE_DATA;
	return consumed(1 + count, {
		type: "security-types",
		types: Array.from(buffer.subarray(1, 1 + count)),
	});
}

function parseChallenge(buffer: Uint8Array): ParseOutcome {
	if (buffer.length < CHALLENGE_LENGTH) return NEED_MORE_DATA;
	return consumed(CHALLENGE_LENGTH, {
		type: "vnc-auth-challenge",
		challenge: buffer.slice(0, CHALLENGE_LENGTH),
	});
}

function parseSecurityResult(buffer: Uint8Array, version: RfbVersion): ParseOutcome {
	if (buffer.length < 4) return NEED_MORE_DATA;
	const result = viewOf(buffer).getUint32(0);
	if (result === 0) {
		return consumed(4, { type: "security-result", ok: true });
	}
	// Only 3.8 follows a failed result with a reason string
	if (version !== "3.8") {
		return consumed(4, { type: "security-result", ok: false });
	}
	const failed = readReason(buffer, 4);
	if (!failed) return NEED_MORE_DATA;
	return consumed(failed.end, { type: "security-result", ok: false, reason: failed.reason });
}

function parseServerInit(buffer: Uint8Array): ParseOutcome {
	if (buffer.length < SERVER_INIT_HEADER_LENGTH) return NEED_MORE_DATA;

	const view = viewOf(buffer);
	// The name length is read once, and the whole message must be present
	// before anything is consumed.
	const nameLength = view.getUint32(20);
	const total = SERVER_INIT_HEADER_LENGTH + nameLength;
	if (buffer.length < total) return NEED_MORE_DATA;

	const width = view.getUint16(0);
	const height = view.getUint16(2);
	if (width === 0 || height === 0) {
		return malformed(`Invalid framebuffer size ${width}x${height}`);
	}

	const serverInit: ServerInit = {
		width,
		height,
		pixelFormat: readPixelFormat(buffer, 4),
		name: textDecoder.decode(buffer.subarray(SERVER_INIT_HEADER_LENGTH, total)),
	};
	return consumed(total, { type: "server-init", serverInit });
}

function parseServerMessage(
	buffer: Uint8Array,
	serverInit: ServerInit,
	pixelFormat: PixelFormat,
): ParseOutcome {
	if (buffer.length < 1) return NEED_MORE_DATA;

	const msgType = buffer[0];
	switch (msgType) {
		case ServerMessageType.FramebufferUpdate:
			return parseFramebufferUpdate(buffer, serverInit, pixelFormat);

		case ServerMessageType.SetColourMapEntries: {
			// padding(1) + firstColour(2) + numColours(2), then r(2) + g(2) + b(2) per colour
			if (buffer.length < 6) return NEED_MORE_DATA;
			const view = viewOf(buffer);
			const firstColour = view.getUint16(2);
			const count = view.getUint16(4);
			const total = 6 + count * 6;
			if (buffer.length < total) return NEED_MORE_DATA;
			return consumed(total, { type: "colour-map-entries", firstColour, count });
		}

		case ServerMessageType.Bell:
			return consumed(1, { type: "bell" });

		case ServerMessageType.ServerCutText: {
			// padding(3) + length(4)
			if (buffer.length < 8) return NEED_MORE_DATA;
			const length = viewOf(buffer).getUint32(4);
			const total = 8 + length;
			if (buffer.length < total) return NEED_MORE_DATA;
			return consumed(total, {
				type: "server-cut-text",
				text: latin1Decoder.decode(buffer.subarray(8, total)),
			});
		}

		default:
			return malformed(`Unexpected server message type: ${msgType}`);
	}
}

function parseFramebufferUpdate(
	buffer: Uint8Array,
	serverInit: ServerInit,
	pixelFormat: PixelFormat,
): ParseOutcome {
	// type(1) + padding(1) + numRects(2)
	if (buffer.length < 4) return NEED_MORE_DATA;

	if (!isDecodable(pixelFormat)) {
		return {
			kind: "malformed",
			reason: failure(
				"unsupported-pixel-format",
				`Cannot decode ${pixelFormat.bitsPerPixel} bpp ${pixelFormat.trueColor ? "true colour" : "colour-mapped"} pixels`,
			),
		};
	}

	const view = viewOf(buffer);
	const numRects = view.getUint16(2);
	const pixelSize = bytesPerPixel(pixelFormat);
	const headers: Array<Omit<FbRectangle, "data"> & { readonly dataStart: number }> = [];
	let pos = 4;

	for (let i = 0; i < numRects; i++) {
		if (buffer.length < pos + RECT_HEADER_LENGTH) return NEED_MORE_DATA;

		const x = view.getUint16(pos);
		const y = view.getUint16(pos + 2);
		const width = view.getUint16(pos + 4);
		const height = view.getUint16(pos + 6);
		const encoding = view.getInt32(pos + 8);

		// The length of any other encoding depends on the encoding itself, so
		// there is no way to skip it safely.
		if (encoding !== EncodingType.Raw) {
			return {
				kind: "malformed",
				reason: failure("unsupported-encoding", `Unsupported encoding: ${encoding}`),
			};
		}
		if (x + width > serverInit.width || y + height > serverInit.height) {
			return malformed(
				`Rectangle ${width}x${height}+${x}+${y} exceeds framebuffer ${serverInit.width}x${serverInit.height}`,
			);
		}

		const dataStart = pos + RECT_HEADER_LENGTH;
		const dataEnd = dataStart + width * height * pixelSize;
		if (buffer.length < dataEnd) return NEED_MORE_DATA;

		headers.push({ x, y, width, height, encoding, dataStart });
		pos = dataEnd;
	}

	// Copy pixel data only once the whole message is known to be present
	const rectangles: FbRectangle[] = headers.map(({ dataStart, ...rect }) => ({
		...rect,
		data: buffer.slice(dataStart, dataStart + rect.width * rect.height * pixelSize),
	}));
	return consumed(pos, { type: "framebuffer-update", rectangles });
}
