/**
 * RFB (Remote Framebuffer) protocol types.
 * Based on RFC 6143 — The Remote Framebuffer Protocol.
 */

/** Supported RFB protocol versions */
export type RfbVersion = "3.3" | "3.7" | "3.8";

/** RFB security types */
export const SecurityType = {
	Invalid: 0,
	None: 1,
	VncAuth: 2,
} as const;
export type SecurityType = (typeof SecurityType)[keyof typeof SecurityType];

/** RFB encoding types */
export const EncodingType = {
	Raw: 0,
} as const;
export type EncodingType = (typeof EncodingType)[keyof typeof EncodingType];

/** Server-to-client message types */
export const ServerMessageType = {
	FramebufferUpdate: 0,
	SetColourMapEntries: 1,
	Bell: 2,
	ServerCutText: 3,
} as const;
export type ServerMessageType = (typeof ServerMessageType)[keyof typeof ServerMessageType];

/** Client-to-server message types */
export const ClientMessageType = {
	SetPixelFormat: 0,
	SetEncodings: 2,
	FramebufferUpdateRequest: 3,
	KeyEvent: 4,
	PointerEvent: 5,
} as const;
export type ClientMessageType = (typeof ClientMessageType)[keyof typeof ClientMessageType];

/** Pixel format description */
export interface PixelFormat {
	readonly bitsPerPixel: number; // 8, 16, or 32
	readonly depth: number;
	readonly bigEndian: boolean;
	readonly trueColor: boolean;
	readonly redMax: number;
	readonly greenMax: number;
	readonly blueMax: number;
	readonly redShift: number;
	readonly greenShift: number;
	readonly blueShift: number;
}

/** Server initialization message data */
export interface ServerInit {
	readonly width: number;
	readonly height: number;
	/** The server's native pixel format, before any SetPixelFormat */
	readonly pixelFormat: PixelFormat;
	readonly name: string;
}

/** A rectangle within a framebuffer update, still in the session pixel format */
export interface FbRectangle {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;
	readonly encoding: number;
	readonly data: Uint8Array;
}

/** A rectangle converted to RGBA (4 bytes per pixel, row-major) */
export interface DecodedRectangle {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;
	readonly pixels: Uint8Array;
}

/** Raw framebuffer data */
export interface Framebuffer {
	readonly width: number;
	readonly height: number;
	readonly pixels: Uint8Array; // RGBA pixel data
}

/** Default RGBA pixel format we request when the server's own format can't be decoded */
export const PIXEL_FORMAT_RGBA: PixelFormat = {
	bitsPerPixel: 32,
	depth: 24,
	bigEndian: false,
	trueColor: true,
	redMax: 255,
	greenMax: 255,
	blueMax: 255,
	redShift: 0,
	greenShift: 8,
	blueShift: 16,
};

export type FailureCode =
	| "transport-failure"
	| "protocol-malformed"
	| "authentication-rejected"
	| "unsupported-encoding"
	| "unsupported-security"
	| "unsupported-pixel-format"
	| "server-refused"
	| "timeout";

export interface FailureReason {
	readonly code: FailureCode;
	readonly message: string;
}

/**
 * Connection phases. Each variant carries only what is known in that phase;
 * `closed` and `failed` are terminal.
 */
export type ConnectionState =
	| { readonly phase: "disconnected" }
	| { readonly phase: "version-pending" }
	| { readonly phase: "security-pending"; readonly version: RfbVersion }
	| {
			readonly phase: "authenticating";
			readonly version: RfbVersion;
			readonly securityType: SecurityType;
			readonly awaiting: "challenge" | "result";
	  }
	| {
			readonly phase: "awaiting-server-init";
			readonly version: RfbVersion;
			/** RFB 3.8 sends a SecurityResult even when no authentication took place */
			readonly securityResultPending: boolean;
	  }
	| {
			readonly phase: "streaming";
			readonly version: RfbVersion;
			readonly serverInit: ServerInit;
			/** Format of every pixel the server sends for the rest of the session */
			readonly pixelFormat: PixelFormat;
	  }
	| { readonly phase: "closed" }
	| { readonly phase: "failed"; readonly reason: FailureReason };

export type ConnectionPhase = ConnectionState["phase"];

/** What a complete server message means, as reported by the framer */
export type ProtocolEffect =
	| { readonly type: "server-version"; readonly major: number; readonly minor: number }
	| { readonly type: "security-types"; readonly types: readonly number[] }
	| { readonly type: "security-refused"; readonly reason: string }
	| { readonly type: "vnc-auth-challenge"; readonly challenge: Uint8Array }
	| { readonly type: "security-result"; readonly ok: boolean; readonly reason?: string }
	| { readonly type: "server-init"; readonly serverInit: ServerInit }
	| { readonly type: "framebuffer-update"; readonly rectangles: readonly FbRectangle[] }
	| { readonly type: "colour-map-entries"; readonly firstColour: number; readonly count: number }
	| { readonly type: "bell" }
	| { readonly type: "server-cut-text"; readonly text: string };

export type ParseOutcome =
	| { readonly kind: "need-more-data" }
	| { readonly kind: "consumed"; readonly bytes: number; readonly effect: ProtocolEffect }
	| { readonly kind: "malformed"; readonly reason: FailureReason };

/** Human-facing connection status, as shown by a viewer's status bar */
export interface ConnectionStatus {
	readonly phase: ConnectionPhase;
	readonly message: string;
}

/** Produces the 16-byte VNC authentication response for a server challenge */
export type ChallengeResponder = (challenge: Uint8Array, password: string) => Uint8Array;
