import { Orchestrator } from "../orchestration/orchestrator";
import { type CommandContext, type CommandOptions, createCommandContext } from "./context";

export interface PlanResult {
	changes: Record<string, number>;
	/** Undefined when the stack has never been applied. */
	orchestrationCurrent?: boolean;
}

export async function runPlan(context: CommandContext): Promise<PlanResult> {
	const { stack, ledger, logger } = context;
	logger.info(`Previewing stack ${stack.name}...`);
	const { changes } = await stack.preview((out) => logger.detail(out));

	const summary = Object.entries(changes)
		.map(([op, count]) => `${op}: ${count}`)
		.join(", ");
	logger.info(`Resource changes: ${summary || "none"}`);

	const deployed = await stack.outputs();
	if (!deployed) {
		logger.info("Orchestration: will run after the first apply");
		return { changes };
	}
	const orchestrator = new Orchestrator({ ledger, connect: context.connect, logger });
	const orchestrationCurrent = await orchestrator.isCurrent(stack.name, deployed.managedNodePublicIps);
	logger.info(
		orchestrationCurrent
			? "Orchestration: up to date for the deployed managed nodes"
			: "Orchestration: will re-run against all managed nodes",
	);
	return { changes, orchestrationCurrent };
}

export async function plan(options: CommandOptions): Promise<void> {
	await runPlan(await createCommandContext(options));
}
