import { stringify } from "yaml";
import { statusPageScript } from "./status-page";

// ---------------------------------------------------------------------------
// Ansible documents staged on the control node. Managed hosts are the
// inventory's implicit `all` group.
// ---------------------------------------------------------------------------

export const KNOWN_HOSTS_PLAYBOOK = "add_to_ssh_known_hosts.yml";
export const INSTALL_PLAYBOOK = "install_httpd.yml";
export const INVENTORY_FILE = "inventory";
export const ANSIBLE_CONFIG_FILE = "ansible.cfg";
export const PRIVATE_KEY_FILE = "managed_node_key";

export function renderKnownHostsPlaybook(): string {
	return stringify([
		{
			name: "Gather facts from managed hosts",
			hosts: "all",
			vars: {
				ansible_host_key_checking: false,
				ansible_ssh_extra_args: "-o UserKnownHostsFile=/dev/null",
			},
			tasks: [
				{
					name: "Get network info",
					"ansible.builtin.setup": { gather_subset: "network" },
				},
			],
		},
		{
			name: "Add public keys to known_hosts file",
			hosts: "localhost",
			connection: "local",
			vars: {
				ssh_known_hosts_file: "{{ lookup('env', 'HOME') + '/.ssh/known_hosts' }}",
				ssh_known_hosts: "{{ groups['all'] }}",
			},
			tasks: [
				{
					name: "Add to known_hosts",
					"ansible.builtin.known_hosts": {
						path: "{{ ssh_known_hosts_file }}",
						name: "{{ item }}",
						key: "{{ lookup('pipe', 'ssh-keyscan ' + item) }}",
						state: "present",
					},
					loop: "{{ ssh_known_hosts }}",
					become: false,
				},
			],
		},
	]);
}

export function renderInstallPlaybook(): string {
	return stringify([
		{
			name: "Install httpd",
			hosts: "all",
			become: true,
			tasks: [
				{
					name: "Install httpd package",
					"ansible.builtin.package": { name: "httpd", state: "present" },
					notify: "start httpd service",
				},
				{
					name: "Write status page",
					"ansible.builtin.shell": statusPageScript(),
					args: { executable: "/bin/bash" },
				},
			],
			handlers: [
				{
					name: "start httpd service",
					"ansible.builtin.service": { name: "httpd", state: "started", enabled: true },
				},
			],
		},
	]);
}

export function renderAnsibleConfig(privateKeyFile: string, remoteUser: string): string {
	return [
		"[defaults]",
		`inventory = ${INVENTORY_FILE}`,
		"host_key_checking = False",
		`remote_user = ${remoteUser}`,
		`private_key_file = ${privateKeyFile}`,
		"",
	].join("\n");
}
