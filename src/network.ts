import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";
import { formatCidr, parseCidr, partitionCidr } from "./cidr";
import type { FleetConfig } from "./config";

export interface SubnetPlan {
	cidrBlock: string;
	availabilityZone: string;
	public: boolean;
}

export interface Network {
	vpc: aws.ec2.Vpc;
	publicSubnets: aws.ec2.Subnet[];
	privateSubnets: aws.ec2.Subnet[];
}

type SubnetLayout = Pick<
	FleetConfig,
	"vpcCidr" | "subnetNewBits" | "publicSubnetCount" | "privateSubnetCount" | "availabilityZones"
>;

/**
 * Public subnets take the first indices of the partition, private the rest.
 * Zones are assigned round-robin within each group.
 */
export function planSubnets(layout: SubnetLayout): SubnetPlan[] {
	const blocks = partitionCidr(
		parseCidr(layout.vpcCidr),
		layout.subnetNewBits,
		layout.publicSubnetCount + layout.privateSubnetCount,
	);
	const zones = layout.availabilityZones;
	return blocks.map((block, i) => {
		const isPublic = i < layout.publicSubnetCount;
		const position = isPublic ? i : i - layout.publicSubnetCount;
		return {
			cidrBlock: formatCidr(block),
			availabilityZone: zones[position % zones.length],
			public: isPublic,
		};
	});
}

export function createNetwork(config: FleetConfig, tags: Record<string, string>): Network {
	const prefix = config.projectName;

	// ---------------------------------------------------------------------------
	// VPC + internet gateway + public route table
	// ---------------------------------------------------------------------------
	const vpc = new aws.ec2.Vpc("vpc", {
		cidrBlock: config.vpcCidr,
		enableDnsSupport: true,
		enableDnsHostnames: true,
		tags: { ...tags, Name: `${prefix}-vpc` },
	});

	const igw = new aws.ec2.InternetGateway("igw", {
		vpcId: vpc.id,
		tags: { ...tags, Name: `${prefix}-igw` },
	});

	const publicRouteTable = new aws.ec2.RouteTable("public-rt", {
		vpcId: vpc.id,
		routes: [{ cidrBlock: "0.0.0.0/0", gatewayId: igw.id }],
		tags: { ...tags, Name: `${prefix}-public-rt` },
	});

	// ---------------------------------------------------------------------------
	// Subnets
	// ---------------------------------------------------------------------------
	const publicSubnets: aws.ec2.Subnet[] = [];
	const privateSubnets: aws.ec2.Subnet[] = [];

	for (const plan of planSubnets(config)) {
		const group = plan.public ? publicSubnets : privateSubnets;
		const kind = plan.public ? "public" : "private";
		const name = `${kind}-subnet-${group.length + 1}`;
		const subnet = new aws.ec2.Subnet(name, {
			vpcId: vpc.id,
			cidrBlock: plan.cidrBlock,
			availabilityZone: plan.availabilityZone,
			mapPublicIpOnLaunch: plan.public,
			tags: { ...tags, Name: `${prefix}-${name}` },
		});
		if (plan.public) {
			new aws.ec2.RouteTableAssociation(`${name}-rt-assoc`, {
				subnetId: subnet.id,
				routeTableId: publicRouteTable.id,
			});
		}
		group.push(subnet);
	}

	pulumi.log.info(
		`network ${config.vpcCidr}: ${publicSubnets.length} public, ${privateSubnets.length} private subnets`,
	);

	return { vpc, publicSubnets, privateSubnets };
}
