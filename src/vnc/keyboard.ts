/**
 * Key names and characters to X11 keysyms, as KeyEvent expects them.
 */

import { readFileSync } from "node:fs";

const NAMED_KEYSYMS: Readonly<Record<string, number>> = JSON.parse(
	readFileSync(new URL("./keysyms.json", import.meta.url), "utf8"),
);

const XK_RETURN = 0xff0d;
const XK_TAB = 0xff09;
/** Unicode characters outside Latin-1 map to 0x01000000 + code point */
const UNICODE_KEYSYM_OFFSET = 0x01000000;

/** Keysym for one typed character. */
export function keysymForChar(char: string): number {
	const codePoint = char.codePointAt(0);
	if (codePoint === undefined || String.fromCodePoint(codePoint) !== char) {
		throw new Error(`Expected a single character, got ${JSON.stringify(char)}`);
	}
	if (char === "\n" || char === "\r") return XK_RETURN;
	if (char === "\t") return XK_TAB;
	if ((codePoint >= 0x20 && codePoint <= 0x7e) || (codePoint >= 0xa0 && codePoint <= 0xff)) {
		return codePoint;
	}
	if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) {
		throw new Error(`No keysym for control character U+${codePoint.toString(16).padStart(4, "0")}`);
	}
	return UNICODE_KEYSYM_OFFSET + codePoint;
}

/** Keysym for a key name ("Enter", "F5", "ctrl") or a single character. */
export function resolveKey(key: string): number {
	const named = NAMED_KEYSYMS[key.toLowerCase()];
	if (named !== undefined) return named;
	if ([...key].length === 1) return keysymForChar(key);
	throw new Error(`Unknown key: ${key}`);
}

/**
 * Keysyms of a combination like "Ctrl+Alt+Delete", modifiers first. The
 * keys are pressed in this order and released in reverse.
 */
export function parseKeyCombo(input: string): number[] {
	if (input === "+") return [resolveKey("+")];

	const parts = input.split("+").map((part) => part.trim());
	// "Ctrl++" means Ctrl and the plus key
	if (input.endsWith("++")) {
		parts.splice(-2, 2, "+");
	}
	if (parts.some((part) => part.length === 0)) {
		throw new Error(`Invalid key combination: ${JSON.stringify(input)}`);
	}
	return parts.map(resolveKey);
}
