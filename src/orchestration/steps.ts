import * as path from "node:path";
import {
	ANSIBLE_CONFIG_FILE,
	INSTALL_PLAYBOOK,
	INVENTORY_FILE,
	KNOWN_HOSTS_PLAYBOOK,
	PRIVATE_KEY_FILE,
	renderAnsibleConfig,
	renderInstallPlaybook,
	renderKnownHostsPlaybook,
} from "../playbooks";
import { shellQuote } from "../shell";

export type Phase = "staging" | "configuring" | "executing";

export interface ExecStep {
	kind: "exec";
	name: string;
	phase: Phase;
	command: string;
	/** A failure is logged and the sequence carries on. */
	continueOnFailure: boolean;
}

export interface UploadStep {
	kind: "upload";
	name: string;
	phase: Phase;
	remotePath: string;
	content: string;
	/** Octal mode applied after writing, e.g. "600". */
	mode?: string;
	continueOnFailure: boolean;
}

export type OrchestrationStep = ExecStep | UploadStep;

export interface StagedFiles {
	inventory: string;
	privateKey: string;
}

export interface PlanOptions {
	workDir: string;
	remoteUser: string;
}

export function planOrchestration(files: StagedFiles, options: PlanOptions): OrchestrationStep[] {
	const dir = options.workDir;
	const inDir = (file: string) => path.posix.join(dir, file);
	const upload = (
		name: string,
		phase: Phase,
		file: string,
		content: string,
		mode?: string,
	): UploadStep => ({
		kind: "upload",
		name,
		phase,
		remotePath: inDir(file),
		content,
		mode,
		continueOnFailure: false,
	});
	const run = (name: string, command: string, continueOnFailure = false): ExecStep => ({
		kind: "exec",
		name,
		phase: "executing",
		command: `cd ${shellQuote(dir)} && ${command}`,
		continueOnFailure,
	});

	return [
		// The control node installs Ansible on first boot; wait for that to finish.
		{
			kind: "exec",
			name: "wait-for-bootstrap",
			phase: "staging",
			command: "cloud-init status --wait",
			continueOnFailure: false,
		},
		// Plain mkdir fails when the directory survives from an earlier run.
		{
			kind: "exec",
			name: "create-workdir",
			phase: "staging",
			command: `mkdir ${shellQuote(dir)}`,
			continueOnFailure: true,
		},
		upload("upload-inventory", "staging", INVENTORY_FILE, files.inventory),
		upload("upload-private-key", "staging", PRIVATE_KEY_FILE, files.privateKey, "600"),
		upload("upload-known-hosts-playbook", "staging", KNOWN_HOSTS_PLAYBOOK, renderKnownHostsPlaybook()),
		upload("upload-install-playbook", "staging", INSTALL_PLAYBOOK, renderInstallPlaybook()),
		upload(
			"disable-host-key-checking",
			"configuring",
			ANSIBLE_CONFIG_FILE,
			renderAnsibleConfig(inDir(PRIVATE_KEY_FILE), options.remoteUser),
		),
		run("register-host-keys", `ansible-playbook ${KNOWN_HOSTS_PLAYBOOK}`),
		// Advisory only: an unreachable host fails the install playbook anyway.
		run("check-reachability", "ansible all -m ping", true),
		run("install-web-server", `ansible-playbook ${INSTALL_PLAYBOOK}`),
	];
}
