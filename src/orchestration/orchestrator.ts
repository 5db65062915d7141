import { setTimeout as delay } from "node:timers/promises";
import { ConnectionError, RemoteCommandError, WebfleetError, describeError } from "../errors";
import { fingerprintAddresses } from "../fingerprint";
import type { TriggerLedger } from "../ledger";
import { type Logger, silentLogger } from "../logger";
import type { CommandResult, RemoteSession, SessionFactory, SshTarget } from "./session";
import { shellQuote } from "../shell";
import { type OrchestrationStep, type StagedFiles, planOrchestration } from "./steps";

export type OrchestrationState =
	| "pending"
	| "connecting"
	| "staging"
	| "configuring"
	| "executing"
	| "done"
	| "failed"
	| "skipped";

export interface OrchestrationRequest {
	/** Ledger key, normally the stack name. */
	environment: string;
	target: SshTarget;
	/** Managed-node addresses, in inventory order. */
	addresses: string[];
	files: StagedFiles;
	workDir: string;
}

export interface OrchestrationReport {
	state: "done" | "failed" | "skipped";
	fingerprint: string;
	transitions: OrchestrationState[];
	/** Remote commands issued, connection check excluded. */
	commandsRun: number;
	completedSteps: string[];
	failedStep?: string;
	error?: Error;
}

export interface OrchestratorOptions {
	ledger: TriggerLedger;
	connect: SessionFactory;
	logger?: Logger;
	/** Connection attempts before giving up. Default 18. */
	connectAttempts?: number;
	/** Pause between connection attempts. Default 10s. */
	retryDelayMs?: number;
}

const DEFAULT_CONNECT_ATTEMPTS = 18;
const DEFAULT_RETRY_DELAY_MS = 10_000;

/**
 * Stages the inventory and playbooks on the control node and runs them,
 * once per distinct managed-node address set.
 *
 *   pending → connecting → staging → configuring → executing → done
 *                 └──────────┴───────────┴─────────────┴──→ failed
 *
 * An unchanged fingerprint ends in `skipped` without touching the network.
 * The fingerprint is recorded only after `done`, so a failed run repeats
 * the whole sequence next time.
 */
export class Orchestrator {
	private readonly ledger: TriggerLedger;
	private readonly connect: SessionFactory;
	private readonly logger: Logger;
	private readonly connectAttempts: number;
	private readonly retryDelayMs: number;

	constructor(options: OrchestratorOptions) {
		this.ledger = options.ledger;
		this.connect = options.connect;
		this.logger = options.logger ?? silentLogger;
		this.connectAttempts = Math.max(1, options.connectAttempts ?? DEFAULT_CONNECT_ATTEMPTS);
		this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
	}

	async isCurrent(environment: string, addresses: readonly string[]): Promise<boolean> {
		const last = await this.ledger.get(environment);
		return last === fingerprintAddresses(addresses);
	}

	async run(request: OrchestrationRequest): Promise<OrchestrationReport> {
		const fingerprint = fingerprintAddresses(request.addresses);
		const report: OrchestrationReport = {
			state: "skipped",
			fingerprint,
			transitions: ["pending"],
			commandsRun: 0,
			completedSteps: [],
		};
		const enter = (state: OrchestrationState) => {
			report.transitions.push(state);
			this.logger.info(`[${request.environment}] ${state}`);
		};

		if ((await this.ledger.get(request.environment)) === fingerprint) {
			enter("skipped");
			this.logger.success(`[${request.environment}] managed nodes unchanged, nothing to configure`);
			return report;
		}

		enter("connecting");
		let session: RemoteSession;
		try {
			session = await this.connectWithRetry(request.target);
		} catch (err) {
			return this.fail(report, "connect", err, enter);
		}

		try {
			const steps = planOrchestration(request.files, {
				workDir: request.workDir,
				remoteUser: request.target.user,
			});
			for (const step of steps) {
				if (report.transitions[report.transitions.length - 1] !== step.phase) {
					enter(step.phase);
				}
				const outcome = await this.runStep(session, step, report);
				if (outcome !== undefined) {
					if (!step.continueOnFailure) {
						return this.fail(report, step.name, outcome, enter);
					}
					this.logger.warn(`  ${step.name} failed, continuing: ${describeError(outcome)}`);
				}
			}
		} finally {
			await session.close();
		}

		await this.ledger.record(request.environment, fingerprint);
		enter("done");
		report.state = "done";
		return report;
	}

	// A fresh instance refuses SSH until sshd is up; only ConnectionError is retried.
	private async connectWithRetry(target: SshTarget): Promise<RemoteSession> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await this.connect(target);
			} catch (err) {
				if (!(err instanceof ConnectionError) || attempt >= this.connectAttempts) {
					throw err;
				}
				this.logger.warn(
					`  ${target.host} not reachable yet (attempt ${attempt}/${this.connectAttempts}): ${err.message}`,
				);
				await delay(this.retryDelayMs);
			}
		}
	}

	/** Resolves to the failure, or undefined when the step succeeded. */
	private async runStep(
		session: RemoteSession,
		step: OrchestrationStep,
		report: OrchestrationReport,
	): Promise<Error | undefined> {
		this.logger.info(`  ${step.name}`);
		const commands: Array<[string, string | undefined]> = [];
		if (step.kind === "exec") {
			commands.push([step.command, undefined]);
		} else if (step.mode) {
			// A new file is created private; chmod covers one left by an earlier run.
			const remotePath = shellQuote(step.remotePath);
			commands.push([`umask 077 && cat > ${remotePath}`, step.content]);
			commands.push([`chmod ${step.mode} ${remotePath}`, undefined]);
		} else {
			commands.push([`cat > ${shellQuote(step.remotePath)}`, step.content]);
		}

		for (const [command, stdin] of commands) {
			let result: CommandResult;
			try {
				report.commandsRun++;
				result = await session.exec(command, stdin);
			} catch (err) {
				return err instanceof Error ? err : new Error(String(err));
			}
			if (result.stdout) this.logger.detail(result.stdout);
			if (result.code !== 0) {
				return new RemoteCommandError(step.name, result.code, result.stderr);
			}
		}
		report.completedSteps.push(step.name);
		return undefined;
	}

	private fail(
		report: OrchestrationReport,
		step: string,
		err: unknown,
		enter: (state: OrchestrationState) => void,
	): OrchestrationReport {
		enter("failed");
		report.state = "failed";
		report.failedStep = step;
		report.error = err instanceof Error ? err : new Error(String(err));
		const kind = err instanceof WebfleetError ? ` (${err.kind})` : "";
		this.logger.error(`[${step}] failed${kind}: ${describeError(err)}`);
		return report;
	}
}
