/**
 * Duplex byte transport used by the RFB client. The default implementation
 * talks to a websockify-style bridge over WebSocket.
 */

import WebSocket from "ws";

export interface TransportHandlers {
	onOpen(): void;
	onData(bytes: Uint8Array): void;
	onClose(reason: string): void;
	onError(error: Error): void;
}

export interface TransportConnection {
	send(bytes: Uint8Array): void;
	close(): void;
}

export interface Transport {
	open(url: string, handlers: TransportHandlers): TransportConnection;
}

function toBytes(data: WebSocket.RawData): Uint8Array {
	if (Array.isArray(data)) {
		return new Uint8Array(Buffer.concat(data));
	}
	if (data instanceof ArrayBuffer) {
		return new Uint8Array(data);
	}
	return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

/** WebSocket transport speaking the `binary` subprotocol, as websockify expects. */
export class WebSocketTransport implements Transport {
	open(url: string, handlers: TransportHandlers): TransportConnection {
		const ws = new WebSocket(url, ["binary"]);
		ws.binaryType = "nodebuffer";

		ws.on("open", () => handlers.onOpen());
		ws.on("message", (data) => handlers.onData(toBytes(data)));
		ws.on("error", (error) => handlers.onError(error));
		ws.on("close", (code, reason) => {
			const text = reason.toString();
			handlers.onClose(text ? `${code} ${text}` : `code ${code}`);
		});

		return {
			send(bytes: Uint8Array): void {
				if (ws.readyState !== WebSocket.OPEN) {
					throw new Error("WebSocket not connected");
				}
				ws.send(bytes);
			},
			close(): void {
				if (ws.readyState === WebSocket.CONNECTING) {
					ws.terminate();
				} else {
					ws.close(1000, "User closed");
				}
			},
		};
	}
}
