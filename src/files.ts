import * as path from "node:path";
import * as pulumi from "@pulumi/pulumi";
import * as command from "@pulumi/command";
import { shellQuote } from "./shell";

// ---------------------------------------------------------------------------
// Write the rendered inventory to a fixed local path. Re-runs whenever the
// content changes; the CLI refuses to orchestrate against a stale copy.
// ---------------------------------------------------------------------------
export function writeInventoryFile(
	inventoryPath: string,
	inventory: pulumi.Input<string>,
): command.local.Command {
	const dir = shellQuote(path.dirname(inventoryPath));
	const file = shellQuote(inventoryPath);
	return new command.local.Command("write-inventory", {
		create: `mkdir -p ${dir} && cat > ${file}`,
		delete: `rm -f ${file}`,
		stdin: inventory,
		triggers: [inventory],
	});
}
