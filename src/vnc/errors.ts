import type { FailureCode, FailureReason } from "./types.js";

/** Error raised for RFB session failures; `code` mirrors the failed state's reason. */
export class RfbError extends Error {
	readonly code: FailureCode;

	constructor(code: FailureCode, message: string) {
		super(message);
		this.name = "RfbError";
		this.code = code;
	}

	static from(reason: FailureReason): RfbError {
		return new RfbError(reason.code, reason.message);
	}

	toReason(): FailureReason {
		return { code: this.code, message: this.message };
	}
}

export function failure(code: FailureCode, message: string): FailureReason {
	return { code, message };
}
