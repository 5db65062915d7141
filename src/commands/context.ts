import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../errors";
import { readInventoryFile } from "../inventory";
import { DEFAULT_LEDGER_PATH, FileTriggerLedger, type TriggerLedger } from "../ledger";
import { type Logger, consoleLogger } from "../logger";
import { type SessionFactory, openSshSession } from "../orchestration/session";
import { type FleetStack, LocalFleetStack } from "../stack";

export type CommandOptions = {
	stack: string;
	cwd: string;
	privateKey?: string;
};

/** Everything a command touches outside the process, so tests can fake it. */
export interface CommandContext {
	stack: FleetStack;
	ledger: TriggerLedger;
	connect: SessionFactory;
	logger: Logger;
	/** Resolved path of the SSH private key; required by `apply` only. */
	privateKeyPath?: string;
	readPrivateKey(path: string): Promise<string>;
	readInventory(path: string): Promise<string>;
}

export function resolvePrivateKeyPath(options: CommandOptions): string | undefined {
	const keyPath = options.privateKey ?? process.env.WEBFLEET_PRIVATE_KEY;
	return keyPath ? path.resolve(options.cwd, keyPath) : undefined;
}

export function requirePrivateKeyPath(context: CommandContext): string {
	if (!context.privateKeyPath) {
		throw new ConfigError("no SSH private key: pass --private-key or set WEBFLEET_PRIVATE_KEY");
	}
	return context.privateKeyPath;
}

export async function createCommandContext(options: CommandOptions): Promise<CommandContext> {
	const cwd = path.resolve(options.cwd);
	return {
		stack: await LocalFleetStack.select(options.stack, cwd),
		ledger: new FileTriggerLedger(path.join(cwd, DEFAULT_LEDGER_PATH)),
		connect: openSshSession,
		logger: consoleLogger,
		privateKeyPath: resolvePrivateKeyPath({ ...options, cwd }),
		readPrivateKey: (keyPath) => readFile(keyPath, "utf-8"),
		readInventory: (inventoryPath) => readInventoryFile(path.resolve(cwd, inventoryPath)),
	};
}
