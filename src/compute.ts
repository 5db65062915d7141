import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";

// ---------------------------------------------------------------------------
// AMI lookup — newest image whose name matches the pattern at apply time.
// A later `up` may pick a newer image unless the pattern pins a release.
// ---------------------------------------------------------------------------
export function lookupAmi(namePattern: string, owners: string[]) {
	return aws.ec2.getAmiOutput({
		mostRecent: true,
		owners,
		filters: [
			{ name: "name", values: [namePattern] },
			{ name: "architecture", values: ["x86_64"] },
			{ name: "virtualization-type", values: ["hvm"] },
		],
	});
}

export interface InstanceGroupArgs {
	count: number;
	ami: pulumi.Input<string>;
	instanceType: string;
	keyName: string;
	/** Instances are spread round-robin across these subnets. */
	subnetIds: pulumi.Input<string>[];
	securityGroupIds: pulumi.Input<string>[];
	userData?: string;
	tags: Record<string, string>;
}

/** Creates `name-1` … `name-N`. */
export function createInstances(name: string, args: InstanceGroupArgs): aws.ec2.Instance[] {
	if (args.subnetIds.length === 0) {
		throw new Error(`instance group ${name} has no subnets to launch into`);
	}
	return Array.from({ length: args.count }, (_, i) => {
		const instanceName = `${name}-${i + 1}`;
		return new aws.ec2.Instance(instanceName, {
			ami: args.ami,
			instanceType: args.instanceType,
			keyName: args.keyName,
			subnetId: args.subnetIds[i % args.subnetIds.length],
			vpcSecurityGroupIds: args.securityGroupIds,
			associatePublicIpAddress: true,
			userData: args.userData,
			tags: { ...args.tags, Name: instanceName },
			metadataOptions: {
				httpTokens: "required", // IMDSv2 only
				httpEndpoint: "enabled",
			},
		});
	});
}
