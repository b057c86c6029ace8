export { vncAuthResponse } from "./des.js";
export { decodeRaw, decodeRectangle } from "./encodings.js";
export { RfbError } from "./errors.js";
export { FramebufferImage } from "./framebuffer.js";
export { tryParse } from "./framer.js";
export { type NegotiationOptions, type Transition, negotiate, selectVersion } from "./handshake.js";
export { keysymForChar, parseKeyCombo, resolveKey } from "./keyboard.js";
export * from "./messages.js";
export { decodePixel, encodePixel } from "./pixel-format.js";
export { framebufferToPng } from "./png.js";
export { ReceiveBuffer } from "./receive-buffer.js";
export { RfbClient, type RfbClientEvents, type RfbClientOptions, describeState } from "./rfb-client.js";
export { type ScaleOptions, scaleFramebuffer } from "./scale.js";
export { type Transport, type TransportConnection, type TransportHandlers, WebSocketTransport } from "./transport.js";
export * from "./types.js";
