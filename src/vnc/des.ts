/**
 * DES-ECB for VNC authentication.
 *
 * OpenSSL 3 no longer ships single DES in its default provider, so the
 * cipher is implemented here (the classic d3des formulation: combined
 * S-box/P-permutation tables and a pre-cooked key schedule).
 */

import { readFileSync } from "node:fs";

interface DesTables {
	readonly pc1: readonly number[];
	readonly pc2: readonly number[];
	readonly totrot: readonly number[];
	readonly sp: readonly (readonly number[])[];
}

const TABLES: DesTables = JSON.parse(
	readFileSync(new URL("./des-tables.json", import.meta.url), "utf8"),
);

const [SP1, SP2, SP3, SP4, SP5, SP6, SP7, SP8] = TABLES.sp.map((table) => Uint32Array.from(table));

/** DES block cipher, encryption direction only. */
export class DesCipher {
	private readonly keys: Uint32Array;

	constructor(key: Uint8Array) {
		if (key.length !== 8) {
			throw new RangeError(`DES key must be 8 bytes, got ${key.length}`);
		}
		this.keys = cookKeys(expandKey(key));
	}

	/** Encrypt one 8-byte block from `input` into `output`. */
	encrypt(input: Uint8Array, output: Uint8Array): void {
		let left = readUint32(input, 0);
		let right = readUint32(input, 4);
		let work: number;

		// Initial permutation
		work = ((left >>> 4) ^ right) & 0x0f0f0f0f;
		right ^= work;
		left ^= work << 4;
		work = ((left >>> 16) ^ right) & 0x0000ffff;
		right ^= work;
		left ^= work << 16;
		work = ((right >>> 2) ^ left) & 0x33333333;
		left ^= work;
		right ^= work << 2;
		work = ((right >>> 8) ^ left) & 0x00ff00ff;
		left ^= work;
		right ^= work << 8;
		right = (right << 1) | (right >>> 31);
		work = (left ^ right) & 0xaaaaaaaa;
		left ^= work;
		right ^= work;
		left = (left << 1) | (left >>> 31);

		const keys = this.keys;
		for (let k = 0; k < 32; k += 4) {
			left ^= feistel(right, keys[k], keys[k + 1]);
			right ^= feistel(left, keys[k + 2], keys[k + 3]);
		}

		// Final permutation
		right = (right << 31) | (right >>> 1);
		work = (left ^ right) & 0xaaaaaaaa;
		left ^= work;
		right ^= work;
		left = (left << 31) | (left >>> 1);
		work = ((left >>> 8) ^ right) & 0x00ff00ff;
		right ^= work;
		left ^= work << 8;
		work = ((left >>> 2) ^ right) & 0x33333333;
		right ^= work;
		left ^= work << 2;
		work = ((right >>> 16) ^ left) & 0x0000ffff;
		left ^= work;
		right ^= work << 16;
		work = ((right >>> 4) ^ left) & 0x0f0f0f0f;
		left ^= work;
		right ^= work << 4;

		writeUint32(output, 0, right);
		writeUint32(output, 4, left);
	}
}

function feistel(half: number, k1: number, k2: number): number {
	let work = ((half << 28) | (half >>> 4)) ^ k1;
	let f =
		SP7[work & 0x3f] |
		SP5[(work >>> 8) & 0x3f] |
		SP3[(work >>> 16) & 0x3f] |
		SP1[(work >>> 24) & 0x3f];
	work = half ^ k2;
	f |=
		SP8[work & 0x3f] |
		SP6[(work >>> 8) & 0x3f] |
		SP4[(work >>> 16) & 0x3f] |
		SP2[(work >>> 24) & 0x3f];
	return f;
}

/** PC-1, the 16 rotations and PC-2: two 24-bit halves per round. */
function expandKey(key: Uint8Array): Uint32Array {
	const { pc1, pc2, totrot } = TABLES;
	const pc1m = new Uint8Array(56);
	const pcr = new Uint8Array(56);
	const kn = new Uint32Array(32);

	for (let j = 0; j < 56; j++) {
		const bit = pc1[j];
		pc1m[j] = key[bit >>> 3] & (0x80 >>> (bit & 7)) ? 1 : 0;
	}

	for (let i = 0; i < 16; i++) {
		for (let j = 0; j < 28; j++) {
			const l = j + totrot[i];
			pcr[j] = l < 28 ? pc1m[l] : pc1m[l - 28];
		}
		for (let j = 28; j < 56; j++) {
			const l = j + totrot[i];
			pcr[j] = l < 56 ? pc1m[l] : pc1m[l - 28];
		}
		for (let j = 0; j < 24; j++) {
			if (pcr[pc2[j]]) kn[i * 2] |= 1 << (23 - j);
			if (pcr[pc2[j + 24]]) kn[i * 2 + 1] |= 1 << (23 - j);
		}
	}
	return kn;
}

/** Regroup each round key into the 6-bit chunks the SP tables are indexed by. */
function cookKeys(kn: Uint32Array): Uint32Array {
	const cooked = new Uint32Array(32);
	for (let i = 0; i < 16; i++) {
		const raw0 = kn[i * 2];
		const raw1 = kn[i * 2 + 1];
		cooked[i * 2] =
			((raw0 & 0x00fc0000) << 6) |
			((raw0 & 0x00000fc0) << 10) |
			((raw1 & 0x00fc0000) >>> 10) |
			((raw1 & 0x00000fc0) >>> 6);
		cooked[i * 2 + 1] =
			((raw0 & 0x0003f000) << 12) |
			((raw0 & 0x0000003f) << 16) |
			((raw1 & 0x0003f000) >>> 4) |
			(raw1 & 0x0000003f);
	}
	return cooked;
}

function readUint32(bytes: Uint8Array, offset: number): number {
	return (
		((bytes[offset] << 24) | (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3]) >>>
		0
	);
}

function writeUint32(bytes: Uint8Array, offset: number, value: number): void {
	bytes[offset] = (value >>> 24) & 0xff;
	bytes[offset + 1] = (value >>> 16) & 0xff;
	bytes[offset + 2] = (value >>> 8) & 0xff;
	bytes[offset + 3] = value & 0xff;
}

function reverseBits(input: number): number {
	let b = input;
	let result = 0;
	for (let i = 0; i < 8; i++) {
		result = (result << 1) | (b & 1);
		b >>= 1;
	}
	return result;
}

/**
 * VNC authentication response: the password (first 8 bytes, zero padded,
 * each byte bit-reversed) is the DES key for both 8-byte halves of the
 * 16-byte challenge.
 */
export function vncAuthResponse(challenge: Uint8Array, password: string): Uint8Array {
	if (challenge.length !== 16) {
		throw new RangeError(`VNC challenge must be 16 bytes, got ${challenge.length}`);
	}

	const passwordBytes = new TextEncoder().encode(password);
	const key = new Uint8Array(8);
	for (let i = 0; i < 8 && i < passwordBytes.length; i++) {
		key[i] = reverseBits(passwordBytes[i]);
	}

	const des = new DesCipher(key);
	const response = new Uint8Array(16);
	des.encrypt(challenge.subarray(0, 8), response.subarray(0, 8));
	des.encrypt(challenge.subarray(8, 16), response.subarray(8, 16));
	return response;
}
