/**
 * Live probe — connects to a real VNC server, logs the handshake and saves one frame.
 * Run: npm run build && node dist/scripts/probe-vnc.js [output.png]
 */

import { writeFileSync } from "node:fs";
import { loadConfig } from "../src/config.js";
import { createLogger, setLogLevel } from "../src/logger.js";
import { RfbClient } from "../src/vnc/rfb-client.js";
import { framebufferToPng } from "../src/vnc/png.js";

const config = loadConfig();
setLogLevel("debug");
const output = process.argv[2] ?? "probe.png";

const client = new RfbClient(config.url, {
	password: config.password,
	shared: config.shared,
	connectTimeout: config.connectTimeout,
	readTimeout: config.readTimeout,
	reconnectDelay: null,
	logger: createLogger("probe"),
});

client.on("status", (status) => console.log(`[${status.phase}] ${status.message}`));
client.on("bell", () => console.log("Bell"));

try {
	const serverInit = await client.connect();
	console.log(`\n=== ServerInit ===`);
	console.log(`Name: ${JSON.stringify(serverInit.name)}`);
	console.log(`Size: ${serverInit.width}x${serverInit.height}`);
	console.log(`Pixel format: ${JSON.stringify(serverInit.pixelFormat)}`);

	const framebuffer = await client.capture();
	writeFileSync(output, framebufferToPng(framebuffer));
	console.log(`\nSaved ${framebuffer.width}x${framebuffer.height} frame to ${output}`);
	console.log(`Received ${client.bytesReceived} bytes, consumed ${client.bytesConsumed}`);
} catch (err) {
	console.error("Probe failed:", err instanceof Error ? err.message : err);
	process.exitCode = 1;
} finally {
	client.disconnect();
}
