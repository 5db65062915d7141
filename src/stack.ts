import { LocalWorkspace, type OutputMap, type Stack } from "@pulumi/pulumi/automation";
import { ProviderError, describeError } from "./errors";

/** What the CLI needs from a deployed stack. */
export interface FleetOutputs {
	controlNodePublicIp: string;
	managedNodePublicIps: string[];
	inventoryPath: string;
	sshUser: string;
	remoteWorkDir: string;
	connectTimeoutSeconds: number;
}

export interface PreviewSummary {
	changes: Record<string, number>;
}

export interface FleetStack {
	readonly name: string;
	preview(onOutput: (out: string) => void): Promise<PreviewSummary>;
	up(onOutput: (out: string) => void): Promise<FleetOutputs>;
	destroy(onOutput: (out: string) => void): Promise<void>;
	/** Outputs of the last successful update, or undefined before the first. */
	outputs(): Promise<FleetOutputs | undefined>;
}

function stringOutput(outputs: OutputMap, key: string): string {
	const value = outputs[key]?.value;
	if (typeof value !== "string" || value === "") {
		throw new ProviderError(`stack output "${key}" is missing or not a string`);
	}
	return value;
}

export function readFleetOutputs(outputs: OutputMap): FleetOutputs {
	const ips = outputs["managedNodePublicIps"]?.value;
	if (!Array.isArray(ips) || !ips.every((ip): ip is string => typeof ip === "string" && ip !== "")) {
		throw new ProviderError(`stack output "managedNodePublicIps" must be a list of addresses`);
	}
	const timeout = outputs["connectTimeoutSeconds"]?.value;
	if (typeof timeout !== "number") {
		throw new ProviderError(`stack output "connectTimeoutSeconds" is missing or not a number`);
	}
	return {
		controlNodePublicIp: stringOutput(outputs, "controlNodePublicIp"),
		managedNodePublicIps: ips,
		inventoryPath: stringOutput(outputs, "inventoryPath"),
		sshUser: stringOutput(outputs, "sshUser"),
		remoteWorkDir: stringOutput(outputs, "remoteWorkDir"),
		connectTimeoutSeconds: timeout,
	};
}

async function engine<T>(action: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (err) {
		throw new ProviderError(`pulumi ${action} failed: ${describeError(err)}`, err);
	}
}

/** Automation API stack over the Pulumi project in `workDir`. */
export class LocalFleetStack implements FleetStack {
	private constructor(private readonly stack: Stack) {}

	static async select(stackName: string, workDir: string): Promise<LocalFleetStack> {
		const stack = await engine("stack select", () =>
			LocalWorkspace.createOrSelectStack({ stackName, workDir }),
		);
		return new LocalFleetStack(stack);
	}

	get name(): string {
		return this.stack.name;
	}

	async preview(onOutput: (out: string) => void): Promise<PreviewSummary> {
		const result = await engine("preview", () => this.stack.preview({ onOutput }));
		const changes: Record<string, number> = {};
		for (const [op, count] of Object.entries(result.changeSummary)) {
			if (typeof count === "number") changes[op] = count;
		}
		return { changes };
	}

	async up(onOutput: (out: string) => void): Promise<FleetOutputs> {
		const result = await engine("up", () => this.stack.up({ onOutput }));
		return readFleetOutputs(result.outputs);
	}

	async destroy(onOutput: (out: string) => void): Promise<void> {
		await engine("destroy", () => this.stack.destroy({ onOutput }));
	}

	async outputs(): Promise<FleetOutputs | undefined> {
		const outputs = await engine("stack output", () => this.stack.outputs());
		if (Object.keys(outputs).length === 0) return undefined;
		return readFleetOutputs(outputs);
	}
}
