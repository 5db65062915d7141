import { ConnectionError, RemoteCommandError } from "../src/errors";
import { fingerprintAddresses } from "../src/fingerprint";
import { MemoryTriggerLedger } from "../src/ledger";
import { type OrchestrationRequest, Orchestrator } from "../src/orchestration/orchestrator";
import type { CommandResult, RemoteSession, SshTarget } from "../src/orchestration/session";
import { planOrchestration } from "../src/orchestration/steps";

interface Issued {
	command: string;
	stdin?: string;
}

/** In-process control node: records commands, fails those matching a rule. */
class FakeSession implements RemoteSession {
	readonly issued: Issued[] = [];
	closed = false;

	constructor(private readonly failWhen: (command: string) => CommandResult | undefined = () => undefined) {}

	async exec(command: string, stdin?: string): Promise<CommandResult> {
		this.issued.push({ command, stdin });
		return this.failWhen(command) ?? { code: 0, stdout: "", stderr: "" };
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

const target: SshTarget = {
	host: "198.51.100.10",
	user: "ec2-user",
	privateKeyPath: "/keys/test-key.pem",
	connectTimeoutSeconds: 10,
};

function request(addresses: string[]): OrchestrationRequest {
	return {
		environment: "dev",
		target,
		addresses,
		files: { inventory: addresses.join("\n"), privateKey: "test-private-key" },
		workDir: "/home/ec2-user/ansible",
	};
}

const stepCount = planOrchestration(
	{ inventory: "", privateKey: "" },
	{ workDir: "/w", remoteUser: "ec2-user" },
).length;
// Every step is one command, plus the chmod after the private key upload.
const FULL_RUN_COMMANDS = stepCount + 1;

function setup(failWhen?: (command: string) => CommandResult | undefined) {
	const ledger = new MemoryTriggerLedger();
	const sessions: FakeSession[] = [];
	const orchestrator = new Orchestrator({
		ledger,
		connect: async () => {
			const session = new FakeSession(failWhen);
			sessions.push(session);
			return session;
		},
		retryDelayMs: 0,
	});
	const issued = () => sessions.flatMap((s) => s.issued.map((i) => i.command));
	return { ledger, sessions, orchestrator, issued };
}

describe("Orchestrator", () => {
	test("a first run walks every state and records the fingerprint", async () => {
		const { ledger, sessions, orchestrator } = setup();
		const report = await orchestrator.run(request(["A", "B", "C"]));

		expect(report.state).toBe("done");
		expect(report.transitions).toEqual([
			"pending",
			"connecting",
			"staging",
			"configuring",
			"executing",
			"done",
		]);
		expect(report.commandsRun).toBe(FULL_RUN_COMMANDS);
		expect(await ledger.get("dev")).toBe(fingerprintAddresses(["A", "B", "C"]));
		expect(sessions[0].closed).toBe(true);
	});

	test("commands run in order, playbooks last", async () => {
		const { orchestrator, issued } = setup();
		await orchestrator.run(request(["A", "B", "C"]));

		expect(issued()).toEqual([
			"cloud-init status --wait",
			"mkdir '/home/ec2-user/ansible'",
			"cat > '/home/ec2-user/ansible/inventory'",
			"umask 077 && cat > '/home/ec2-user/ansible/managed_node_key'",
			"chmod 600 '/home/ec2-user/ansible/managed_node_key'",
			"cat > '/home/ec2-user/ansible/add_to_ssh_known_hosts.yml'",
			"cat > '/home/ec2-user/ansible/install_httpd.yml'",
			"cat > '/home/ec2-user/ansible/ansible.cfg'",
			"cd '/home/ec2-user/ansible' && ansible-playbook add_to_ssh_known_hosts.yml",
			"cd '/home/ec2-user/ansible' && ansible all -m ping",
			"cd '/home/ec2-user/ansible' && ansible-playbook install_httpd.yml",
		]);
	});

	test("the inventory is uploaded verbatim", async () => {
		const { orchestrator, sessions } = setup();
		await orchestrator.run(request(["A", "B", "C"]));

		const upload = sessions[0].issued.find((i) => i.command.endsWith("/inventory'"));
		expect(upload?.stdin).toBe("A\nB\nC");
	});

	test("an unchanged address set issues zero remote commands", async () => {
		const { orchestrator, sessions, issued } = setup();
		await orchestrator.run(request(["A", "B", "C"]));
		const before = issued().length;

		const report = await orchestrator.run(request(["A", "B", "C"]));

		expect(report.state).toBe("skipped");
		expect(report.transitions).toEqual(["pending", "skipped"]);
		expect(report.commandsRun).toBe(0);
		expect(sessions).toHaveLength(1);
		expect(issued()).toHaveLength(before);
	});

	test("a replaced node re-runs the full sequence against every node", async () => {
		const { orchestrator, sessions, ledger } = setup();
		await orchestrator.run(request(["A", "B", "C"]));

		const report = await orchestrator.run(request(["A", "B", "D"]));

		expect(report.state).toBe("done");
		expect(report.commandsRun).toBe(FULL_RUN_COMMANDS);
		expect(sessions).toHaveLength(2);
		const inventory = sessions[1].issued.find((i) => i.command.endsWith("/inventory'"));
		expect(inventory?.stdin).toBe("A\nB\nD");
		expect(await ledger.get("dev")).toBe(fingerprintAddresses(["A", "B", "D"]));
	});

	test("environments are tracked separately", async () => {
		const { orchestrator } = setup();
		await orchestrator.run(request(["A"]));
		const report = await orchestrator.run({ ...request(["A"]), environment: "prod" });
		expect(report.state).toBe("done");
	});

	test("an existing work directory does not stop the run", async () => {
		const { orchestrator } = setup((command) =>
			command.startsWith("mkdir")
				? { code: 1, stdout: "", stderr: "mkdir: cannot create directory: File exists" }
				: undefined,
		);
		const report = await orchestrator.run(request(["A"]));
		expect(report.state).toBe("done");
		expect(report.completedSteps).not.toContain("create-workdir");
		expect(report.completedSteps).toContain("install-web-server");
	});

	test("an unreachable host in the ping check is advisory", async () => {
		const { orchestrator } = setup((command) =>
			command.endsWith("-m ping") ? { code: 4, stdout: "", stderr: "UNREACHABLE" } : undefined,
		);
		const report = await orchestrator.run(request(["A"]));
		expect(report.state).toBe("done");
	});

	test("a failed host-key registration prevents the install", async () => {
		const { orchestrator, ledger, issued, sessions } = setup((command) =>
			command.endsWith("add_to_ssh_known_hosts.yml") && command.includes("ansible-playbook")
				? { code: 2, stdout: "", stderr: "ssh-keyscan failed" }
				: undefined,
		);
		const report = await orchestrator.run(request(["A", "B", "C"]));

		expect(report.state).toBe("failed");
		expect(report.failedStep).toBe("register-host-keys");
		expect(report.transitions[report.transitions.length - 1]).toBe("failed");
		expect(report.error).toBeInstanceOf(RemoteCommandError);
		expect(report.error?.message).toBe('step "register-host-keys" exited with status 2: ssh-keyscan failed');
		expect(issued().some((c) => c.includes("install_httpd.yml") && c.includes("ansible-playbook"))).toBe(false);
		expect(issued().some((c) => c.includes("-m ping"))).toBe(false);
		expect(await ledger.get("dev")).toBeUndefined();
		expect(sessions[0].closed).toBe(true);
	});

	test("a failed run repeats the whole sequence next time", async () => {
		let failing = true;
		const { orchestrator, sessions } = setup((command) =>
			failing && command.startsWith("cat >") ? { code: 1, stdout: "", stderr: "disk full" } : undefined,
		);
		const first = await orchestrator.run(request(["A"]));
		expect(first.state).toBe("failed");
		expect(first.transitions).toEqual(["pending", "connecting", "staging", "failed"]);

		failing = false;
		const second = await orchestrator.run(request(["A"]));
		expect(second.state).toBe("done");
		expect(sessions[1].issued).toHaveLength(FULL_RUN_COMMANDS);
	});

	test("a connection failure fails before any command", async () => {
		const ledger = new MemoryTriggerLedger();
		let attempts = 0;
		const orchestrator = new Orchestrator({
			ledger,
			connect: async (t) => {
				attempts++;
				throw new ConnectionError(t.host, "Connection timed out");
			},
			connectAttempts: 3,
			retryDelayMs: 0,
		});
		const report = await orchestrator.run(request(["A"]));

		expect(attempts).toBe(3);
		expect(report.state).toBe("failed");
		expect(report.failedStep).toBe("connect");
		expect(report.transitions).toEqual(["pending", "connecting", "failed"]);
		expect(report.commandsRun).toBe(0);
		expect(report.error?.message).toBe("cannot reach 198.51.100.10: Connection timed out");
	});

	test("a control node that refuses SSH at first is retried until it answers", async () => {
		const ledger = new MemoryTriggerLedger();
		const session = new FakeSession();
		let attempts = 0;
		const orchestrator = new Orchestrator({
			ledger,
			connect: async (t) => {
				attempts++;
				if (attempts <= 2) {
					throw new ConnectionError(t.host, "Connection refused");
				}
				return session;
			},
			retryDelayMs: 0,
		});
		const report = await orchestrator.run(request(["A"]));

		expect(attempts).toBe(3);
		expect(report.state).toBe("done");
		expect(report.transitions).toEqual(["pending", "connecting", "staging", "configuring", "executing", "done"]);
		expect(session.issued[0].command).toBe("cloud-init status --wait");
	});

	test("errors other than a refused connection are not retried", async () => {
		let attempts = 0;
		const orchestrator = new Orchestrator({
			ledger: new MemoryTriggerLedger(),
			connect: async () => {
				attempts++;
				throw new Error("key file missing");
			},
			retryDelayMs: 0,
		});
		const report = await orchestrator.run(request(["A"]));

		expect(attempts).toBe(1);
		expect(report.failedStep).toBe("connect");
		expect(report.error?.message).toBe("key file missing");
	});

	test("a failed first boot stops staging", async () => {
		const { orchestrator, issued } = setup((command) =>
			command === "cloud-init status --wait" ? { code: 1, stdout: "status: error", stderr: "" } : undefined,
		);
		const report = await orchestrator.run(request(["A"]));

		expect(report.state).toBe("failed");
		expect(report.failedStep).toBe("wait-for-bootstrap");
		expect(issued()).toEqual(["cloud-init status --wait"]);
	});

	test("isCurrent compares against the recorded fingerprint", async () => {
		const { orchestrator } = setup();
		expect(await orchestrator.isCurrent("dev", ["A"])).toBe(false);
		await orchestrator.run(request(["A"]));
		expect(await orchestrator.isCurrent("dev", ["A"])).toBe(true);
		expect(await orchestrator.isCurrent("dev", ["B"])).toBe(false);
	});
});
