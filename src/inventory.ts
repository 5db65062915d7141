import { readFile } from "node:fs/promises";
import { StaleInventoryError } from "./errors";

// Flat host list: one managed-node address per line, no trailing newline.
export function renderInventory(addresses: readonly string[]): string {
	return addresses.join("\n");
}

export function parseInventory(text: string): string[] {
	return text
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

export function assertInventoryCurrent(text: string, addresses: readonly string[]): void {
	const listed = parseInventory(text);
	const current =
		listed.length === addresses.length && listed.every((host, i) => host === addresses[i]);
	if (!current) {
		throw new StaleInventoryError(
			`inventory lists [${listed.join(", ")}] but the managed nodes are [${addresses.join(", ")}]`,
		);
	}
}

export async function readInventoryFile(path: string): Promise<string> {
	try {
		return await readFile(path, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			throw new StaleInventoryError(`inventory file ${path} has not been written yet`);
		}
		throw err;
	}
}
