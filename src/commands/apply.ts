import { assertInventoryCurrent } from "../inventory";
import { type OrchestrationReport, Orchestrator } from "../orchestration/orchestrator";
import {
	type CommandContext,
	type CommandOptions,
	createCommandContext,
	requirePrivateKeyPath,
} from "./context";

export async function runApply(context: CommandContext): Promise<OrchestrationReport> {
	const { stack, logger } = context;
	// Checked before `up` so a missing key never leaves half a run behind.
	const privateKeyPath = requirePrivateKeyPath(context);

	logger.info(`Updating stack ${stack.name}...`);
	const fleet = await stack.up((out) => logger.detail(out));
	logger.success(
		`Control node ${fleet.controlNodePublicIp}, managed nodes ${fleet.managedNodePublicIps.join(", ")}`,
	);

	const inventory = await context.readInventory(fleet.inventoryPath);
	assertInventoryCurrent(inventory, fleet.managedNodePublicIps);

	const orchestrator = new Orchestrator({
		ledger: context.ledger,
		connect: context.connect,
		logger,
	});
	const report = await orchestrator.run({
		environment: stack.name,
		target: {
			host: fleet.controlNodePublicIp,
			user: fleet.sshUser,
			privateKeyPath,
			connectTimeoutSeconds: fleet.connectTimeoutSeconds,
		},
		addresses: fleet.managedNodePublicIps,
		files: {
			inventory,
			privateKey: await context.readPrivateKey(privateKeyPath),
		},
		workDir: fleet.remoteWorkDir,
	});

	if (report.state === "failed" && report.error) {
		throw report.error;
	}
	if (report.state === "done") {
		logger.success(`Web servers configured: ${fleet.managedNodePublicIps.map((ip) => `http://${ip}`).join(" ")}`);
	}
	return report;
}

export async function apply(options: CommandOptions): Promise<void> {
	await runApply(await createCommandContext(options));
}
