import * as pulumi from "@pulumi/pulumi";
import * as aws from "@pulumi/aws";

export interface IngressPort {
	description: string;
	port: number;
}

const ANYWHERE = ["0.0.0.0/0"];

// One TCP rule per (description, port), open to any source.
export function ingressRules(ports: IngressPort[]): aws.types.input.ec2.SecurityGroupIngress[] {
	return ports.map(({ description, port }) => ({
		description,
		protocol: "tcp",
		fromPort: port,
		toPort: port,
		cidrBlocks: ANYWHERE,
	}));
}

export function egressRules(): aws.types.input.ec2.SecurityGroupEgress[] {
	return [
		{
			description: "All outbound",
			protocol: "-1",
			fromPort: 0,
			toPort: 0,
			cidrBlocks: ANYWHERE,
		},
	];
}

export interface SecurityGroupArgs {
	vpcId: pulumi.Input<string>;
	description: string;
	ports: IngressPort[];
	tags: Record<string, string>;
}

export function createSecurityGroup(name: string, args: SecurityGroupArgs): aws.ec2.SecurityGroup {
	return new aws.ec2.SecurityGroup(name, {
		name,
		vpcId: args.vpcId,
		description: args.description,
		ingress: ingressRules(args.ports),
		egress: egressRules(),
		tags: { ...args.tags, Name: name },
	});
}
