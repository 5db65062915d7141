/**
 * Status page served by every managed node.
 *
 * The page is produced on the node itself by the install playbook: the
 * script reads each field from the node's own instance metadata service,
 * so no node can end up showing another node's values. The same template
 * renders a page directly from known metadata.
 */

export interface InstanceMetadata {
	instanceId: string;
	availabilityZone: string;
	publicHostname: string;
	publicIpv4: string;
	privateHostname: string;
	privateIpv4: string;
}

export interface MetadataField {
	key: keyof InstanceMetadata;
	label: string;
	/** Path under http://169.254.169.254/latest/meta-data/ */
	path: string;
}

export const METADATA_FIELDS: readonly MetadataField[] = [
	{ key: "instanceId", label: "Instance ID", path: "instance-id" },
	{ key: "availabilityZone", label: "Availability Zone", path: "placement/availability-zone" },
	{ key: "publicHostname", label: "Public Hostname", path: "public-hostname" },
	{ key: "publicIpv4", label: "Public IPv4", path: "public-ipv4" },
	{ key: "privateHostname", label: "Private Hostname", path: "local-hostname" },
	{ key: "privateIpv4", label: "Private IPv4", path: "local-ipv4" },
];

export const STATUS_PAGE_PATH = "/var/www/html/index.html";

const IMDS = "http://169.254.169.254/latest";

function pageLines(value: (field: MetadataField) => string): string[] {
	return [
		`<font face="Verdana" size="5">`,
		`<center><h1>EC2 Apache Webserver configured with Ansible!</h1></center>`,
		`<center> <b>EC2 Instance Metadata</b> </center>`,
		...METADATA_FIELDS.map(
			(field) => `<center> <b>${field.label}:</b> ${value(field)} </center>`,
		),
		`</font>`,
	];
}

const HTML_ENTITIES: ReadonlyArray<[string, string]> = [
	["&", "&amp;"],
	["<", "&lt;"],
	[">", "&gt;"],
	['"', "&quot;"],
];

function escapeHtml(text: string): string {
	return HTML_ENTITIES.reduce((out, [char, entity]) => out.split(char).join(entity), text);
}

// Same substitutions as escapeHtml, in order, for the remote shell.
const ESCAPE_HTML_FUNCTION = `escape_html() { printf '%s' "$1" | sed ${HTML_ENTITIES.map(
	([char, entity]) => `-e 's/${char}/\\${entity}/g'`,
).join(" ")}; }`;

export function renderStatusPage(metadata: InstanceMetadata): string {
	return pageLines((field) => escapeHtml(metadata[field.key])).join("\n") + "\n";
}

/**
 * Shell script run on each managed node: fetch an IMDSv2 token, read and
 * HTML-escape every field, then overwrite the landing page. Values are
 * substituted by the remote shell, never by the control node.
 */
export function statusPageScript(): string {
	const fetches = METADATA_FIELDS.map(
		(field) =>
			`${field.key}=$(escape_html "$(curl -sf "${IMDS}/meta-data/${field.path}" -H "X-aws-ec2-metadata-token: $TOKEN" || echo unavailable)")`,
	);
	// Heredoc is unquoted so the shell expands ${field}; the page has no other `$`.
	const page = pageLines((field) => `\${${field.key}}`);
	return [
		"set -euo pipefail",
		ESCAPE_HTML_FUNCTION,
		`TOKEN=$(curl -sf -X PUT "${IMDS}/api/token" -H "X-aws-ec2-metadata-token-ttl-seconds: 3600")`,
		...fetches,
		`cat > ${STATUS_PAGE_PATH} <<PAGE`,
		...page,
		"PAGE",
		"",
	].join("\n");
}
