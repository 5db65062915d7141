/**
 * First-boot user data for the control node.
 *
 * Runs once under cloud-init. It is not retried, and a failure here only
 * shows up later as the control node missing `ansible-playbook`.
 */

export const CONTROL_NODE_PACKAGES = ["ansible-core"];

export function renderFirstBootScript(packages: string[] = CONTROL_NODE_PACKAGES): string {
	return [
		"#!/bin/bash",
		"set -euxo pipefail",
		"dnf -y update",
		`dnf -y install ${packages.join(" ")}`,
		"",
	].join("\n");
}
