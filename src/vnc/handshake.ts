/**
 * Handshake negotiator: turns the effect of each framed server message into
 * the next connection state plus the messages the client must send in reply.
 * Pure — the connection controller does the sending.
 */

import { vncAuthResponse } from "./des.js";
import { failure } from "./errors.js";
import {
	encodeClientInit,
	encodeFramebufferUpdateRequest,
	encodeProtocolVersion,
	encodeSecuritySelection,
	encodeSetEncodings,
	encodeSetPixelFormat,
} from "./messages.js";
import { isDecodable, samePixelFormat } from "./pixel-format.js";
import {
	type ChallengeResponder,
	type ConnectionState,
	EncodingType,
	type FailureReason,
	type FbRectangle,
	PIXEL_FORMAT_RGBA,
	type PixelFormat,
	type ProtocolEffect,
	type RfbVersion,
	SecurityType,
	type ServerInit,
} from "./types.js";

export interface NegotiationOptions {
	/** VNC password; required only when the server insists on VNC authentication */
	readonly password?: string;
	/** Computes the VNC auth response; defaults to DES as VNC servers expect */
	readonly responder?: ChallengeResponder;
	/** ClientInit shared flag (default: true — leave other viewers connected) */
	readonly shared?: boolean;
	/**
	 * Pixel format to ask the server for. When omitted the server's own format
	 * is used, unless it can't be decoded, in which case 32-bit RGBA is requested.
	 */
	readonly pixelFormat?: PixelFormat;
}

export interface Transition {
	readonly state: ConnectionState;
	/** Messages to send, in order */
	readonly outgoing: readonly Uint8Array[];
	/** Set when a complete framebuffer update was received */
	readonly update?: readonly FbRectangle[];
}

/** Choose the highest version both sides speak. Returns null for pre-3.x servers. */
export function selectVersion(major: number, minor: number): RfbVersion | null {
	if (major > 3) return "3.8";
	if (major < 3) return null;
	if (minor >= 8) return "3.8";
	if (minor === 7) return "3.7";
	return "3.3";
}

/** The session pixel format: requested explicitly, the server's own, or RGBA as a fallback. */
export function selectPixelFormat(serverInit: ServerInit, requested?: PixelFormat): PixelFormat {
	if (requested) return requested;
	return isDecodable(serverInit.pixelFormat) ? serverInit.pixelFormat : PIXEL_FORMAT_RGBA;
}

function fail(reason: FailureReason): Transition {
	return { state: { phase: "failed", reason }, outgoing: [] };
}

function unexpected(state: ConnectionState, effect: ProtocolEffect): Transition {
	return fail(failure("protocol-malformed", `Unexpected ${effect.type} in state ${state.phase}`));
}

/**
 * Advance the connection by one server message.
 */
export function negotiate(
	state: ConnectionState,
	effect: ProtocolEffect,
	options: NegotiationOptions = {},
): Transition {
	switch (state.phase) {
		case "version-pending": {
			if (effect.type !== "server-version") return unexpected(state, effect);
			const version = selectVersion(effect.major, effect.minor);
			if (!version) {
				return fail(
					failure(
						"protocol-malformed",
						`Unsupported RFB version ${effect.major}.${effect.minor}`,
					),
				);
			}
			return {
				state: { phase: "security-pending", version },
				outgoing: [encodeProtocolVersion(version)],
			};
		}

		case "security-pending": {
			if (effect.type === "security-refused") {
				return fail(failure("server-refused", `Server refused connection: ${effect.reason}`));
			}
			if (effect.type !== "security-types") return unexpected(state, effect);
			return selectSecurity(state.version, effect.types, options);
		}

		case "authenticating": {
			if (state.awaiting === "challenge") {
				if (effect.type !== "vnc-auth-challenge") return unexpected(state, effect);
				const responder = options.responder ?? vncAuthResponse;
				const response = responder(effect.challenge, options.password ?? "");
				if (response.length !== 16) {
					return fail(
						failure(
							"authentication-rejected",
							`VNC auth response must be 16 bytes, got ${response.length}`,
						),
					);
				}
				return {
					state: { ...state, awaiting: "result" },
					outgoing: [response],
				};
			}
			if (effect.type !== "security-result") return unexpected(state, effect);
			return securityResult(state.version, effect.ok, effect.reason, options);
		}

		case "awaiting-server-init": {
			if (state.securityResultPending) {
				if (effect.type !== "security-result") return unexpected(state, effect);
				return securityResult(state.version, effect.ok, effect.reason, options);
			}
			if (effect.type !== "server-init") return unexpected(state, effect);
			return startStreaming(state.version, effect.serverInit, options);
		}

		case "streaming":
			switch (effect.type) {
				case "framebuffer-update":
					return { state, outgoing: [], update: effect.rectangles };
				case "colour-map-entries":
				case "bell":
				case "server-cut-text":
					return { state, outgoing: [] };
				default:
					return unexpected(state, effect);
			}

		case "disconnected":
		case "closed":
		case "failed":
			return unexpected(state, effect);
	}
}

function selectSecurity(
	version: RfbVersion,
	types: readonly number[],
	options: NegotiationOptions,
): Transition {
	// 3.3 servers pick the type themselves; later versions let the client choose
	const select = (type: number): Uint8Array[] =>
		version === "3.3" ? [] : [encodeSecuritySelection(type)];

	// Prefer None auth, fall back to VncAuth
	if (types.includes(SecurityType.None)) {
		if (version === "3.8") {
			return {
				state: { phase: "awaiting-server-init", version, securityResultPending: true },
				outgoing: select(SecurityType.None),
			};
		}
		return {
			state: { phase: "awaiting-server-init", version, securityResultPending: false },
			outgoing: [...select(SecurityType.None), encodeClientInit(options.shared ?? true)],
		};
	}

	if (types.includes(SecurityType.VncAuth)) {
		if (options.password === undefined) {
			return fail(
				failure(
					"authentication-rejected",
					"Server requires VNC authentication but no password provided",
				),
			);
		}
		return {
			state: {
				phase: "authenticating",
				version,
				securityType: SecurityType.VncAuth,
				awaiting: "challenge",
			},
			outgoing: select(SecurityType.VncAuth),
		};
	}

	return fail(
		failure("unsupported-security", `No supported security types: ${types.join(", ")}`),
	);
}

function securityResult(
	version: RfbVersion,
	ok: boolean,
	reason: string | undefined,
	options: NegotiationOptions,
): Transition {
	if (!ok) {
		return fail(
			failure(
				"authentication-rejected",
				reason ? `Authentication failed: ${reason}` : "Authentication failed",
			),
		);
	}
	// The server waits for ClientInit before it sends ServerInit
	return {
		state: { phase: "awaiting-server-init", version, securityResultPending: false },
		outgoing: [encodeClientInit(options.shared ?? true)],
	};
}

function startStreaming(
	version: RfbVersion,
	serverInit: ServerInit,
	options: NegotiationOptions,
): Transition {
	const pixelFormat = selectPixelFormat(serverInit, options.pixelFormat);
	if (!isDecodable(pixelFormat)) {
		return fail(
			failure(
				"unsupported-pixel-format",
				`Cannot decode ${pixelFormat.bitsPerPixel} bpp ${pixelFormat.trueColor ? "true-colour" : "colour-mapped"} pixels`,
			),
		);
	}
	const outgoing: Uint8Array[] = [];

	if (!samePixelFormat(pixelFormat, serverInit.pixelFormat)) {
		outgoing.push(encodeSetPixelFormat(pixelFormat));
	}
	outgoing.push(encodeSetEncodings([EncodingType.Raw]));
	outgoing.push(encodeFramebufferUpdateRequest(false, 0, 0, serverInit.width, serverInit.height));

	return {
		state: { phase: "streaming", version, serverInit, pixelFormat },
		outgoing,
	};
}
