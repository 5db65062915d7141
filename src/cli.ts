#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { apply } from "./commands/apply";
import type { CommandOptions } from "./commands/context";
import { destroy } from "./commands/destroy";
import { plan } from "./commands/plan";
import { WebfleetError, describeError } from "./errors";

const program = new Command();

program
	.name("webfleet")
	.description("Provision the web server fleet and configure it from the Ansible control node")
	.version("0.1.0")
	.option("-s, --stack <name>", "Pulumi stack (environment) name", "dev")
	.option("-C, --cwd <dir>", "Directory holding Pulumi.yaml", process.cwd())
	.option("-k, --private-key <path>", "SSH private key for the control and managed nodes");

function action(run: (options: CommandOptions) => Promise<void>) {
	return async () => {
		try {
			await run(program.opts<CommandOptions>());
		} catch (err) {
			const kind = err instanceof WebfleetError ? `${err.kind} error: ` : "";
			console.error(chalk.red(`${kind}${describeError(err)}`));
			process.exitCode = 1;
		}
	};
}

program
	.command("plan")
	.description("Preview infrastructure changes and whether configuration would re-run")
	.action(action(plan));

program
	.command("apply")
	.description("Create or update the infrastructure, then configure the managed nodes")
	.action(action(apply));

program
	.command("destroy")
	.description("Tear down every resource of the stack")
	.action(action(destroy));

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(chalk.red(describeError(err)));
	process.exitCode = 1;
});
