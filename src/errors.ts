// ---------------------------------------------------------------------------
// Error taxonomy
// render     — bad config / template input, raised before any resource exists
// provider   — the cloud API (via the Pulumi engine) rejected the run
// connection — SSH to the control node failed (timeout, auth)
// command    — a remote command exited non-zero
// state      — the trigger ledger could not be read or written
// ---------------------------------------------------------------------------
export type ErrorKind = "render" | "provider" | "connection" | "command" | "state";

export class WebfleetError extends Error {
	readonly kind: ErrorKind;

	constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.kind = kind;
	}
}

export class ConfigError extends WebfleetError {
	constructor(message: string) {
		super("render", message);
	}
}

export class CidrError extends WebfleetError {
	constructor(message: string) {
		super("render", message);
	}
}

export class StaleInventoryError extends WebfleetError {
	constructor(message: string) {
		super("render", message);
	}
}

export class ProviderError extends WebfleetError {
	constructor(message: string, cause?: unknown) {
		super("provider", message, { cause });
	}
}

export class ConnectionError extends WebfleetError {
	readonly host: string;

	constructor(host: string, detail: string) {
		super("connection", `cannot reach ${host}: ${detail}`);
		this.host = host;
	}
}

export class RemoteCommandError extends WebfleetError {
	readonly step: string;
	readonly exitCode: number;
	readonly stderr: string;

	constructor(step: string, exitCode: number, stderr: string) {
		const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
		super("command", `step "${step}" exited with status ${exitCode}${detail}`);
		this.step = step;
		this.exitCode = exitCode;
		this.stderr = stderr;
	}
}

export class LedgerError extends WebfleetError {
	constructor(message: string, cause?: unknown) {
		super("state", message, { cause });
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
