import { createHash } from "node:crypto";
import { renderInventory } from "./inventory";

/**
 * Trigger value for the orchestration step. Order-sensitive: the same hosts
 * in a different order produce a different inventory, so they re-run too.
 */
export function fingerprintAddresses(addresses: readonly string[]): string {
	return createHash("sha256").update(renderInventory(addresses)).digest("hex");
}
