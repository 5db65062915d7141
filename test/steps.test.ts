import { renderFirstBootScript } from "../src/bootstrap";
import { sshArgs } from "../src/orchestration/session";
import { planOrchestration } from "../src/orchestration/steps";
import { shellQuote } from "../src/shell";

describe("planOrchestration", () => {
	const steps = planOrchestration(
		{ inventory: "A\nB", privateKey: "test-private-key" },
		{ workDir: "/home/ec2-user/ansible", remoteUser: "ec2-user" },
	);

	test("phases run staging, configuring, executing", () => {
		expect(steps.map((s) => `${s.phase}:${s.name}`)).toEqual([
			"staging:wait-for-bootstrap",
			"staging:create-workdir",
			"staging:upload-inventory",
			"staging:upload-private-key",
			"staging:upload-known-hosts-playbook",
			"staging:upload-install-playbook",
			"configuring:disable-host-key-checking",
			"executing:register-host-keys",
			"executing:check-reachability",
			"executing:install-web-server",
		]);
	});

	test("only directory creation and the ping check tolerate failure", () => {
		expect(steps.filter((s) => s.continueOnFailure).map((s) => s.name)).toEqual([
			"create-workdir",
			"check-reachability",
		]);
	});

	test("staging starts by waiting for first boot to finish", () => {
		expect(steps[0]).toMatchObject({ kind: "exec", command: "cloud-init status --wait", continueOnFailure: false });
	});

	test("the private key is staged owner-readable only", () => {
		const key = steps.find((s) => s.name === "upload-private-key");
		expect(key).toMatchObject({
			kind: "upload",
			remotePath: "/home/ec2-user/ansible/managed_node_key",
			content: "test-private-key",
			mode: "600",
		});
	});

	test("ansible.cfg points at the staged key", () => {
		const cfg = steps.find((s) => s.name === "disable-host-key-checking");
		expect(cfg?.kind === "upload" && cfg.content).toContain(
			"private_key_file = /home/ec2-user/ansible/managed_node_key",
		);
	});
});

describe("shellQuote", () => {
	test("wraps in single quotes and escapes embedded ones", () => {
		expect(shellQuote("/srv/it's here")).toBe(`'/srv/it'\\''s here'`);
	});
});

describe("sshArgs", () => {
	test("uses the key, a connect timeout and the fixed user", () => {
		expect(
			sshArgs({ host: "198.51.100.10", user: "ec2-user", privateKeyPath: "/keys/k.pem", connectTimeoutSeconds: 15 }),
		).toEqual([
			"-i",
			"/keys/k.pem",
			"-o",
			"BatchMode=yes",
			"-o",
			"ConnectTimeout=15",
			"-o",
			"StrictHostKeyChecking=accept-new",
			"ec2-user@198.51.100.10",
		]);
	});
});

describe("renderFirstBootScript", () => {
	test("installs ansible-core on first boot", () => {
		expect(renderFirstBootScript()).toBe(
			"#!/bin/bash\nset -euxo pipefail\ndnf -y update\ndnf -y install ansible-core\n",
		);
	});
});
