import * as pulumi from "@pulumi/pulumi";
import { renderFirstBootScript } from "./src/bootstrap";
import { createInstances, lookupAmi } from "./src/compute";
import { loadConfig } from "./src/config";
import { writeInventoryFile } from "./src/files";
import { fingerprintAddresses } from "./src/fingerprint";
import { renderInventory } from "./src/inventory";
import { createNetwork } from "./src/network";
import { createSecurityGroup } from "./src/security";

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
const config = loadConfig();
const tags = { Project: config.projectName, ManagedBy: "pulumi" };

// ---------------------------------------------------------------------------
// Network → security groups
// ---------------------------------------------------------------------------
const network = createNetwork(config, tags);

const controlSg = createSecurityGroup(`${config.projectName}-control-sg`, {
	vpcId: network.vpc.id,
	description: "Ansible control node",
	ports: config.controlNodeIngress,
	tags,
});

const managedSg = createSecurityGroup(`${config.projectName}-managed-sg`, {
	vpcId: network.vpc.id,
	description: "Ansible managed web servers",
	ports: config.managedNodeIngress,
	tags,
});

// ---------------------------------------------------------------------------
// Compute — one control node (bootstrapped with Ansible), N web servers
// ---------------------------------------------------------------------------
const ami = lookupAmi(config.amiNamePattern, config.amiOwners);
const publicSubnetIds = network.publicSubnets.map((subnet) => subnet.id);

const [controlNode] = createInstances("ansible-control", {
	count: 1,
	ami: ami.id,
	instanceType: config.instanceType,
	keyName: config.keyName,
	subnetIds: publicSubnetIds,
	securityGroupIds: [controlSg.id],
	userData: renderFirstBootScript(),
	tags,
});

const managedNodes = createInstances("web", {
	count: config.managedNodeCount,
	ami: ami.id,
	instanceType: config.instanceType,
	keyName: config.keyName,
	subnetIds: publicSubnetIds,
	securityGroupIds: [managedSg.id],
	tags,
});

// ---------------------------------------------------------------------------
// Inventory (consumed by `webfleet apply`, which runs the playbooks)
// ---------------------------------------------------------------------------
const managedIps = pulumi.all(managedNodes.map((node) => node.publicIp));
const inventory = managedIps.apply(renderInventory);
writeInventoryFile(config.inventoryPath, inventory);

// ---------------------------------------------------------------------------
// Stack Outputs
// ---------------------------------------------------------------------------
export const vpcId = network.vpc.id;
export const publicSubnetIdList = publicSubnetIds;
export const privateSubnetIdList = network.privateSubnets.map((subnet) => subnet.id);
export const controlSecurityGroupId = controlSg.id;
export const managedSecurityGroupId = managedSg.id;
export const amiId = ami.id;
export const amiName = ami.name;
export const controlNodeId = controlNode.id;
export const controlNodePublicIp = controlNode.publicIp;
export const managedNodeIds = managedNodes.map((node) => node.id);
export const managedNodePublicIps = managedIps;
export const inventoryFingerprint = managedIps.apply(fingerprintAddresses);
export const inventoryPath = config.inventoryPath;
export const sshUser = config.sshUser;
export const remoteWorkDir = config.remoteWorkDir;
export const connectTimeoutSeconds = config.connectTimeoutSeconds;
