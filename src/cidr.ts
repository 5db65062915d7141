import { CidrError } from "./errors";

export interface CidrBlock {
	/** Network address as an unsigned 32-bit integer. */
	network: number;
	prefix: number;
}

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

function maskOf(prefix: number): number {
	return prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0;
}

function sizeOf(prefix: number): number {
	return 2 ** (32 - prefix);
}

export function parseCidr(text: string): CidrBlock {
	const match = CIDR_PATTERN.exec(text.trim());
	if (!match) {
		throw new CidrError(`invalid CIDR block "${text}"`);
	}
	const octets = match.slice(1, 5).map(Number);
	const prefix = Number(match[5]);
	if (octets.some((o) => o > 255)) {
		throw new CidrError(`invalid IPv4 address in "${text}"`);
	}
	if (prefix > 32) {
		throw new CidrError(`prefix length out of range in "${text}"`);
	}
	const address =
		((octets[0] << 24) | (octets[1] << 16) | (octets[2] << 8) | octets[3]) >>> 0;
	if ((address & maskOf(prefix)) >>> 0 !== address) {
		throw new CidrError(`"${text}" has host bits set`);
	}
	return { network: address, prefix };
}

export function formatCidr(block: CidrBlock): string {
	const n = block.network;
	const octets = [n >>> 24, (n >>> 16) & 255, (n >>> 8) & 255, n & 255];
	return `${octets.join(".")}/${block.prefix}`;
}

/**
 * The `index`-th sub-range of `parent` whose prefix is `newBits` longer.
 * Index 0 starts at the parent network address.
 */
export function subnetCidr(parent: CidrBlock, newBits: number, index: number): CidrBlock {
	const prefix = parent.prefix + newBits;
	if (!Number.isInteger(newBits) || newBits < 1 || prefix > 32) {
		throw new CidrError(
			`cannot extend /${parent.prefix} by ${newBits} bits`,
		);
	}
	if (!Number.isInteger(index) || index < 0 || index >= 2 ** newBits) {
		throw new CidrError(
			`subnet index ${index} does not fit in ${formatCidr(parent)} with ${newBits} new bits`,
		);
	}
	return { network: (parent.network + index * sizeOf(prefix)) >>> 0, prefix };
}

/** `count` consecutive, equally sized subnets starting at index 0. */
export function partitionCidr(parent: CidrBlock, newBits: number, count: number): CidrBlock[] {
	if (!Number.isInteger(count) || count < 0) {
		throw new CidrError(`invalid subnet count ${count}`);
	}
	if (parent.prefix + newBits <= 32 && count > 2 ** newBits) {
		throw new CidrError(
			`${formatCidr(parent)} holds at most ${2 ** newBits} subnets of /${parent.prefix + newBits}, ${count} requested`,
		);
	}
	return Array.from({ length: count }, (_, i) => subnetCidr(parent, newBits, i));
}

function lastAddress(block: CidrBlock): number {
	return block.network + sizeOf(block.prefix) - 1;
}

export function cidrContains(outer: CidrBlock, inner: CidrBlock): boolean {
	return (
		inner.prefix >= outer.prefix &&
		inner.network >= outer.network &&
		lastAddress(inner) <= lastAddress(outer)
	);
}

export function cidrOverlaps(a: CidrBlock, b: CidrBlock): boolean {
	return a.network <= lastAddress(b) && b.network <= lastAddress(a);
}
