import { type CommandContext, type CommandOptions, createCommandContext } from "./context";

export async function runDestroy(context: CommandContext): Promise<void> {
	const { stack, ledger, logger } = context;
	logger.info(`Destroying stack ${stack.name}...`);
	await stack.destroy((out) => logger.detail(out));
	// Replacement nodes after a fresh apply must be configured from scratch.
	await ledger.forget(stack.name);
	logger.success(`Stack ${stack.name} destroyed`);
}

export async function destroy(options: CommandOptions): Promise<void> {
	await runDestroy(await createCommandContext(options));
}
