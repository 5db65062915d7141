import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { LedgerError, describeError } from "./errors";

/**
 * Last-applied address fingerprint per environment (Pulumi stack name).
 * The orchestrator consults it before opening any remote session.
 */
export interface TriggerLedger {
	get(environment: string): Promise<string | undefined>;
	record(environment: string, fingerprint: string): Promise<void>;
	forget(environment: string): Promise<void>;
}

export class MemoryTriggerLedger implements TriggerLedger {
	private readonly entries = new Map<string, string>();

	constructor(initial: Record<string, string> = {}) {
		for (const [env, fingerprint] of Object.entries(initial)) {
			this.entries.set(env, fingerprint);
		}
	}

	async get(environment: string): Promise<string | undefined> {
		return this.entries.get(environment);
	}

	async record(environment: string, fingerprint: string): Promise<void> {
		this.entries.set(environment, fingerprint);
	}

	async forget(environment: string): Promise<void> {
		this.entries.delete(environment);
	}
}

export const DEFAULT_LEDGER_PATH = ".webfleet/triggers.json";

type LedgerFile = Record<string, string>;

function isLedgerFile(value: unknown): value is LedgerFile {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((v) => typeof v === "string")
	);
}

/** JSON map `{ [environment]: fingerprint }` on local disk. */
export class FileTriggerLedger implements TriggerLedger {
	constructor(private readonly filePath: string = DEFAULT_LEDGER_PATH) {}

	private async load(): Promise<LedgerFile> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf-8");
		} catch (err) {
			if (err instanceof Error && "code" in err && err.code === "ENOENT") {
				return {};
			}
			throw new LedgerError(`cannot read ${this.filePath}: ${describeError(err)}`, err);
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			throw new LedgerError(`${this.filePath} is not valid JSON`, err);
		}
		if (!isLedgerFile(parsed)) {
			throw new LedgerError(`${this.filePath} must map environment names to fingerprints`);
		}
		return parsed;
	}

	private async save(entries: LedgerFile): Promise<void> {
		await mkdir(path.dirname(this.filePath), { recursive: true });
		await writeFile(this.filePath, JSON.stringify(entries, null, 2) + "\n", "utf-8");
	}

	async get(environment: string): Promise<string | undefined> {
		const entries = await this.load();
		return Object.hasOwn(entries, environment) ? entries[environment] : undefined;
	}

	async record(environment: string, fingerprint: string): Promise<void> {
		const entries = await this.load();
		await this.save({ ...entries, [environment]: fingerprint });
	}

	async forget(environment: string): Promise<void> {
		const entries = await this.load();
		if (!Object.hasOwn(entries, environment)) return;
		const { [environment]: _removed, ...rest } = entries;
		await this.save(rest);
	}
}
