import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type {
	Desktop,
	DesktopStatus,
	MouseButton,
	Screenshot,
	ScreenshotOptions,
} from "../../src/desktop/types.js";
import { createMcpServer } from "../../src/mcp/server.js";

/** Test PNG: 1x1 red pixel */
const TEST_PNG = Buffer.from(
	"iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8/5+hHgAHggJ/PchI7wAAAABJRU5ErkJggg==",
	"base64",
);

class MockDesktop implements Desktop {
	readonly calls: string[] = [];
	screenshotOptions: ScreenshotOptions | null = null;
	screenshotError: Error | null = null;
	stale = false;

	async start(): Promise<void> {}

	stop(): void {}

	status(): DesktopStatus {
		return {
			phase: "streaming",
			message: "Connected (1x1)",
			server: { width: 1, height: 1, name: "mock" },
			stale: this.stale,
			bytesReceived: 42,
		};
	}

	async screenshot(options: ScreenshotOptions = {}): Promise<Screenshot> {
		if (this.screenshotError) {
			throw this.screenshotError;
		}
		this.screenshotOptions = options;
		return { png: TEST_PNG, width: 1, height: 1, stale: this.stale };
	}

	pointer(x: number, y: number, buttonMask: number): void {
		this.calls.push(`pointer ${x} ${y} ${buttonMask}`);
	}

	async click(x: number, y: number, button?: MouseButton): Promise<void> {
		this.calls.push(`click ${x} ${y} ${button}`);
	}

	async key(combo: string): Promise<void> {
		this.calls.push(`key ${combo}`);
	}

	async typeText(text: string): Promise<void> {
		this.calls.push(`type ${text}`);
	}
}

type TextContent = Array<{ type: string; text?: string }>;

describe("MCP Server", () => {
	let client: Client;
	let desktop: MockDesktop;

	beforeAll(async () => {
		desktop = new MockDesktop();
		const mcpServer = createMcpServer(desktop);
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

		await mcpServer.connect(serverTransport);
		client = new Client({ name: "test-client", version: "1.0.0" });
		await client.connect(clientTransport);
	});

	afterAll(async () => {
		await client.close();
	});

	it("should list available tools", async () => {
		const result = await client.listTools();
		const toolNames = result.tools.map((t) => t.name).sort();

		expect(toolNames).toEqual([
			"click",
			"connection_status",
			"get_screenshot",
			"pointer_event",
			"press_key",
			"type_text",
		]);
	});

	it("should report the connection status as JSON", async () => {
		const result = await client.callTool({ name: "connection_status", arguments: {} });
		const content = result.content as TextContent;

		expect(content).toHaveLength(1);
		expect(JSON.parse(content[0].text ?? "")).toEqual({
			phase: "streaming",
			message: "Connected (1x1)",
			server: { width: 1, height: 1, name: "mock" },
			stale: false,
			bytesReceived: 42,
		});
	});

	it("should call get_screenshot and return image content", async () => {
		const result = await client.callTool({ name: "get_screenshot", arguments: {} });
		const content = result.content as Array<{
			type: string;
			data?: string;
			mimeType?: string;
		}>;

		expect(content).toHaveLength(1);
		expect(content[0].type).toBe("image");
		expect(content[0].mimeType).toBe("image/png");
		const decoded = Buffer.from(content[0].data ?? "", "base64");
		expect(decoded[0]).toBe(0x89); // PNG magic
		expect(desktop.screenshotOptions).toEqual({ scale: 1, brightness: 1 });
	});

	it("should pass scale and brightness through", async () => {
		await client.callTool({ name: "get_screenshot", arguments: { scale: 3, brightness: 2 } });
		expect(desktop.screenshotOptions).toEqual({ scale: 3, brightness: 2 });
	});

	it("should flag a stale screenshot", async () => {
		desktop.stale = true;
		try {
			const result = await client.callTool({ name: "get_screenshot", arguments: {} });
			const content = result.content as TextContent;

			expect(content).toHaveLength(2);
			expect(content[1]).toEqual({ type: "text", text: "Connection lost: image may be out of date" });
		} finally {
			desktop.stale = false;
		}
	});

	it("should forward input tools to the desktop", async () => {
		desktop.calls.length = 0;
		const pointer = await client.callTool({ name: "pointer_event", arguments: { x: 10, y: 20, buttonMask: 1 } });
		const click = await client.callTool({ name: "click", arguments: { x: 3, y: 4 } });
		const key = await client.callTool({ name: "press_key", arguments: { key: "Ctrl+Alt+Delete" } });
		const typed = await client.callTool({ name: "type_text", arguments: { text: "héllo" } });

		expect(desktop.calls).toEqual([
			"pointer 10 20 1",
			"click 3 4 left",
			"key Ctrl+Alt+Delete",
			"type héllo",
		]);
		expect((pointer.content as TextContent)[0].text).toBe("Pointer at (10, 20) mask 1");
		expect((click.content as TextContent)[0].text).toBe("Clicked left at (3, 4)");
		expect((key.content as TextContent)[0].text).toBe("Pressed Ctrl+Alt+Delete");
		expect((typed.content as TextContent)[0].text).toBe("Typed 5 characters");
	});

	it("should propagate desktop errors as isError response", async () => {
		desktop.screenshotError = new Error("No framebuffer received yet (Connecting to VNC server...)");
		try {
			const result = await client.callTool({ name: "get_screenshot", arguments: {} });

			// MCP SDK wraps tool errors as isError=true with text content
			expect(result.isError).toBe(true);
			const content = result.content as TextContent;
			expect(content[0].type).toBe("text");
			expect(content[0].text).toContain("No framebuffer received yet");
		} finally {
			desktop.screenshotError = null;
		}
	});
});
