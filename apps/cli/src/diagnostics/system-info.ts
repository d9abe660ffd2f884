import * as fs from "node:fs";
import * as os from "node:os";

export interface NetworkInterfaceInfo {
	name: string;
	address: string;
	netmask: string;
}

/**
 * Context for troubleshooting a run. Never an input to the ramp itself.
 */
export interface SystemInfo {
	os: string;
	hostname: string;
	cpus: number;
	loadAverage: number[];
	memoryUsagePercent: number;
	/** External IPv4 interfaces */
	interfaces: NetworkInterfaceInfo[];
}

/**
 * Interface totals, summed over every interface except loopback.
 */
export interface NetworkCounters {
	bytesReceived: number;
	packetsReceived: number;
	receiveErrors: number;
	bytesSent: number;
	packetsSent: number;
	sendErrors: number;
}

const NET_DEV_PATH = "/proc/net/dev";

export function getSystemInfo(): SystemInfo {
	const totalMem = os.totalmem();
	const interfaces: NetworkInterfaceInfo[] = [];
	for (const [name, addresses] of Object.entries(os.networkInterfaces())) {
		for (const address of addresses ?? []) {
			if (address.family === "IPv4" && !address.internal) {
				interfaces.push({ name, address: address.address, netmask: address.netmask });
			}
		}
	}

	return {
		os: `${os.type()} ${os.release()}`,
		hostname: os.hostname(),
		cpus: os.cpus().length,
		loadAverage: os.loadavg(),
		memoryUsagePercent: totalMem > 0 ? ((totalMem - os.freemem()) / totalMem) * 100 : 0,
		interfaces,
	};
}

/**
 * Parse the contents of /proc/net/dev.
 */
export function parseNetDev(content: string): NetworkCounters {
	const totals: NetworkCounters = { bytesReceived: 0, packetsReceived: 0, receiveErrors: 0, bytesSent: 0, packetsSent: 0, sendErrors: 0 };

	for (const line of content.split("\n")) {
		const separator = line.indexOf(":");
		if (separator < 0) continue;

		const name = line.slice(0, separator).trim();
		if (name === "lo" || name.includes("|")) continue;

		// Receive: bytes packets errs drop fifo frame compressed multicast; transmit: bytes packets errs ...
		const fields = line
			.slice(separator + 1)
			.trim()
			.split(/\s+/)
			.map(Number);
		if (fields.length < 11 || fields.some(Number.isNaN)) continue;

		totals.bytesReceived += fields[0] ?? 0;
		totals.packetsReceived += fields[1] ?? 0;
		totals.receiveErrors += fields[2] ?? 0;
		totals.bytesSent += fields[8] ?? 0;
		totals.packetsSent += fields[9] ?? 0;
		totals.sendErrors += fields[10] ?? 0;
	}

	return totals;
}

/**
 * Current network counters, or null where the platform does not expose them.
 */
export function readNetworkCounters(file = NET_DEV_PATH): NetworkCounters | null {
	if (!fs.existsSync(file)) return null;
	return parseNetDev(fs.readFileSync(file, "utf-8"));
}

export function diffCounters(before: NetworkCounters, after: NetworkCounters): NetworkCounters {
	return {
		bytesReceived: after.bytesReceived - before.bytesReceived,
		packetsReceived: after.packetsReceived - before.packetsReceived,
		receiveErrors: after.receiveErrors - before.receiveErrors,
		bytesSent: after.bytesSent - before.bytesSent,
		packetsSent: after.packetsSent - before.packetsSent,
		sendErrors: after.sendErrors - before.sendErrors,
	};
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`;
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
	if (bytes < 1024 * 1024 * 1024) return `${(bytes / 1024 / 1024).toFixed(1)} MB`;
	return `${(bytes / 1024 / 1024 / 1024).toFixed(1)} GB`;
}
