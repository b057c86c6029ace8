/**
 * Service configuration from environment variables.
 */

import { z } from "zod/v4";
import type { LogLevel } from "./logger.js";

const booleanFlag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.transform((value) => value === "true" || value === "1" || value === "yes");

const milliseconds = z.coerce.number().int().min(0);

const ConfigSchema = z.object({
	VNC_URL: z
		.string()
		.regex(/^wss?:\/\/\S+$/, "Expected a ws:// or wss:// URL")
		.default("ws://127.0.0.1:6080/websockify"),
	VNC_PASSWORD: z.string().optional(),
	VNC_SHARED: booleanFlag.default(true),
	VNC_INCREMENTAL: booleanFlag.default(true),
	VNC_RECONNECT_DELAY_MS: milliseconds.default(5000),
	VNC_CONNECT_TIMEOUT_MS: milliseconds.min(1).default(10_000),
	VNC_READ_TIMEOUT_MS: milliseconds.min(1).default(15_000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export interface Config {
	readonly url: string;
	readonly password?: string;
	readonly shared: boolean;
	readonly incremental: boolean;
	/** 0 disables reconnecting */
	readonly reconnectDelay: number;
	readonly connectTimeout: number;
	readonly readTimeout: number;
	readonly logLevel: LogLevel;
}

/** Parse and validate configuration. Throws with a readable list of problems. */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	// Empty variables count as unset
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
	);
	const result = ConfigSchema.safeParse(present);
	if (!result.success) {
		throw new Error(`Invalid configuration:\n${z.prettifyError(result.error)}`);
	}

	const parsed = result.data;
	return {
		url: parsed.VNC_URL,
		password: parsed.VNC_PASSWORD,
		shared: parsed.VNC_SHARED,
		incremental: parsed.VNC_INCREMENTAL,
		reconnectDelay: parsed.VNC_RECONNECT_DELAY_MS,
		connectTimeout: parsed.VNC_CONNECT_TIMEOUT_MS,
		readTimeout: parsed.VNC_READ_TIMEOUT_MS,
		logLevel: parsed.LOG_LEVEL,
	};
}
