export class AuthorizationError extends Error {
	readonly principal: number | undefined;
	readonly action: string;

	constructor(action: string, principal?: number) {
		super(`principal ${principal ?? "unknown"} is not allowed to ${action}`);
		this.name = "AuthorizationError";
		this.action = action;
		this.principal = principal;
	}
}

export class ConfigurationError extends Error {
	readonly key: string;

	constructor(key: string, message: string) {
		super(`${key}: ${message}`);
		this.name = "ConfigurationError";
		this.key = key;
	}
}

export type ExternalCallKind =
	| "timeout"
	| "rate_limit"
	| "authentication"
	| "quota"
	| "unknown";

export class ExternalCallFailure extends Error {
	readonly kind: ExternalCallKind;
	readonly service: string;

	constructor(
		service: string,
		kind: ExternalCallKind,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ExternalCallFailure";
		this.service = service;
		this.kind = kind;
	}
}

export function formatError(error: unknown) {
	if (typeof error === "string") return error;
	if (error instanceof Error) return `${error.name}: ${error.message}`;
	if (error && typeof error === "object" && "message" in error) {
		return String(error.message);
	}
	return String(error);
}
