import * as pulumi from "@pulumi/pulumi";
import { parseCidr, partitionCidr } from "./cidr";
import { ConfigError } from "./errors";
import type { IngressPort } from "./security";

export interface FleetConfig {
	projectName: string;
	vpcCidr: string;
	availabilityZones: string[];
	publicSubnetCount: number;
	privateSubnetCount: number;
	subnetNewBits: number;
	instanceType: string;
	/** Name of the EC2 key pair installed on every instance. */
	keyName: string;
	amiNamePattern: string;
	amiOwners: string[];
	managedNodeCount: number;
	sshUser: string;
	connectTimeoutSeconds: number;
	controlNodeIngress: IngressPort[];
	managedNodeIngress: IngressPort[];
	/** Local path the rendered inventory is written to. */
	inventoryPath: string;
	/** Directory on the control node the playbooks are staged in. */
	remoteWorkDir: string;
}

export const defaultIngress = {
	controlNode: [{ description: "SSH", port: 22 }],
	managedNode: [
		{ description: "SSH", port: 22 },
		{ description: "HTTP", port: 80 },
	],
} satisfies Record<string, IngressPort[]>;

// ---------------------------------------------------------------------------
// Config (namespace = Pulumi project name)
// ---------------------------------------------------------------------------
export function loadConfig(config: pulumi.Config = new pulumi.Config()): FleetConfig {
	const sshUser = config.get("sshUser") || "ec2-user";
	const fleet: FleetConfig = {
		projectName: config.get("projectName") || "webfleet",
		vpcCidr: config.get("vpcCidr") || "10.0.0.0/16",
		availabilityZones: config.getObject<string[]>("availabilityZones") || [
			"us-east-1a",
			"us-east-1b",
		],
		publicSubnetCount: config.getNumber("publicSubnetCount") ?? 2,
		privateSubnetCount: config.getNumber("privateSubnetCount") ?? 2,
		subnetNewBits: config.getNumber("subnetNewBits") ?? 8,
		instanceType: config.get("instanceType") || "t3.micro",
		keyName: config.require("keyName"),
		amiNamePattern: config.get("amiNamePattern") || "al2023-ami-2023.*-x86_64",
		amiOwners: config.getObject<string[]>("amiOwners") || ["amazon"],
		managedNodeCount: config.getNumber("managedNodeCount") ?? 3,
		sshUser,
		connectTimeoutSeconds: config.getNumber("connectTimeoutSeconds") ?? 10,
		controlNodeIngress:
			config.getObject<IngressPort[]>("controlNodeIngress") || defaultIngress.controlNode,
		managedNodeIngress:
			config.getObject<IngressPort[]>("managedNodeIngress") || defaultIngress.managedNode,
		inventoryPath: config.get("inventoryPath") || ".webfleet/inventory",
		remoteWorkDir: config.get("remoteWorkDir") || `/home/${sshUser}/ansible`,
	};
	validateConfig(fleet);
	return fleet;
}

function requirePositiveInteger(name: string, value: number, min = 1): void {
	if (!Number.isInteger(value) || value < min) {
		throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
	}
}

function validatePorts(name: string, ports: IngressPort[]): void {
	for (const rule of ports) {
		if (typeof rule.description !== "string" || !rule.description) {
			throw new ConfigError(`${name}: every rule needs a description`);
		}
		if (!Number.isInteger(rule.port) || rule.port < 1 || rule.port > 65535) {
			throw new ConfigError(`${name}: port ${rule.port} is out of range`);
		}
	}
}

export function validateConfig(fleet: FleetConfig): void {
	requirePositiveInteger("managedNodeCount", fleet.managedNodeCount);
	requirePositiveInteger("publicSubnetCount", fleet.publicSubnetCount);
	requirePositiveInteger("privateSubnetCount", fleet.privateSubnetCount, 0);
	requirePositiveInteger("connectTimeoutSeconds", fleet.connectTimeoutSeconds);
	if (fleet.availabilityZones.length === 0) {
		throw new ConfigError("availabilityZones must list at least one zone");
	}
	if (!fleet.remoteWorkDir.startsWith("/")) {
		throw new ConfigError(`remoteWorkDir must be absolute, got "${fleet.remoteWorkDir}"`);
	}
	validatePorts("controlNodeIngress", fleet.controlNodeIngress);
	validatePorts("managedNodeIngress", fleet.managedNodeIngress);

	// Surfaces CidrError for a layout that does not fit the VPC range.
	partitionCidr(
		parseCidr(fleet.vpcCidr),
		fleet.subnetNewBits,
		fleet.publicSubnetCount + fleet.privateSubnetCount,
	);
}
