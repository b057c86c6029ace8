// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * MCP server setup with tool definitions.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import { type Desktop, MouseButton } from "../desktop/types.js";

function text(value: string) {
	return { content: [{ type: "text" as const, text: value }] };
}

export function createMcpServer(desktop: Desktop): McpServer {
	const server = new McpServer({
		name: "rfb-viewer",
		version: "0.1.0",
	});

	server.tool(
		"connection_status",
		"Report the VNC connection state, the remote screen size and whether the last image is stale",
		{},
		async () => text(JSON.stringify(desktop.status(), null, 2)),
	);

	server.tool(
		"get_screenshot",
		"Capture the current VNC screen as a PNG image. Use scale and brightness to make small or dark consoles easier to read.",
		{
			scale: z
				.number()
				.int()
				.min(1)
				.max(4)
				.optional()
				.default(1)
				.describe("Integer upscale factor"),
			brightness: z
				.number()
				.min(1)
				.max(5)
				.optional()
				.default(1)
				.describe("Brightness multiplier"),
		},
		async ({ scale, brightness }) => {
			const shot = await desktop.screenshot({ scale, brightness });
			const content = [
				{
					type: "image" as const,
					data: shot.png.toString("base64"),
					mimeType: "image/png",
				},
			];
			if (shot.stale) {
				return {
					content: [...content, { type: "text" as const, text: "Connection lost: image may be out of date" }],
				};
			}
			return { content };
		},
	);

	server.tool(
		"pointer_event",
		"Move the pointer to (x, y) with the given button mask (bit 0 left, bit 1 middle, bit 2 right)",
		{
			x: z.number().int().min(0).describe("X coordinate in framebuffer pixels"),
			y: z.number().int().min(0).describe("Y coordinate in framebuffer pixels"),
			buttonMask: z.number().int().min(0).max(255).optional().default(0),
		},
		async ({ x, y, buttonMask }) => {
			desktop.pointer(x, y, buttonMask);
			return text(`Pointer at (${x}, ${y}) mask ${buttonMask}`);
		},
	);

	server.tool(
		"click",
		"Click a mouse button at (x, y)",
		{
			x: z.number().int().min(0).describe("X coordinate in framebuffer pixels"),
			y: z.number().int().min(0).describe("Y coordinate in framebuffer pixels"),
			button: z
				.enum([MouseButton.Left, MouseButton.Middle, MouseButton.Right])
				.optional()
				.default(MouseButton.Left),
		},
		async ({ x, y, button }) => {
			await desktop.click(x, y, button);
			return text(`Clicked ${button} at (${x}, ${y})`);
		},
	);

	server.tool(
		"press_key",
		"Press and release a key or key combination, e.g. 'Enter', 'F2' or 'Ctrl+Alt+Delete'",
		{
			key: z.string().min(1).describe("Key name, character or '+'-separated combination"),
		},
		async ({ key }) => {
			await desktop.key(key);
			return text(`Pressed ${key}`);
		},
	);

	server.tool(
		"type_text",
		"Type text on the remote desktop, one key press per character",
		{
			text: z.string().min(1).describe("Text to type; newlines press Enter"),
		},
		async (args) => {
			await desktop.typeText(args.text);
			return text(`Typed ${[...args.text].length} characters`);
		},
	);

	return server;
}
