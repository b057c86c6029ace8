#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Entry point — connects to the VNC server and serves MCP over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { VncDesktop } from "./desktop/session.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";

const log = createLogger("rfb-viewer");

async function main(): Promise<void> {
	const config = loadConfig();
	setLogLevel(config.logLevel);

	const desktop = new VncDesktop(config.url, {
		password: config.password,
		shared: config.shared,
		incremental: config.incremental,
		reconnectDelay: config.reconnectDelay,
		connectTimeout: config.connectTimeout,
		readTimeout: config.readTimeout,
	});

	const mcpServer = createMcpServer(desktop);
	await mcpServer.connect(new StdioServerTransport());
	log.info(`MCP server running on stdio, viewing ${config.url}`);

	const shutdown = (): void => {
		desktop.stop();
		mcpServer
			.close()
			.catch((err: unknown) => log.error(`Error while closing: ${String(err)}`))
			.finally(() => process.exit(0));
	};
	process.on("SIGINT", shutdown);
	process.on("SIGTERM", shutdown);

	// The tools stay available while the desktop connects; connection_status reports failures
	desktop.start().catch((err: unknown) => {
		log.error(`Could not connect to ${config.url}: ${err instanceof Error ? err.message : String(err)}`);
	});
}

main().catch((err) => {
	console.error("Fatal:", err);
	process.exit(1);
});
