#!/usr/bin/env tsx
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, EchoServer, ProgressionController } from "@socket-ramp/core";
import chalk from "chalk";
import { Command } from "commander";
import dotenv from "dotenv";
import { loadSettings, type RunCliOptions } from "../config/load-config.js";
import { getSystemInfo } from "../diagnostics/system-info.js";
import { formatFinalResults, formatRunHeader, formatSystemInfo, printLines } from "../output/formatter.js";
import { attachConsoleReporter } from "../output/reporter.js";
import { buildReport, writeReport } from "../output/writer.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.join(__dirname, "../../.env") });

interface ServeCliOptions {
	host: string;
	port: string;
	maxConnections?: string;
	cert?: string;
	key?: string;
}

function fail(message: string): never {
	console.error(chalk.red(`[socket-ramp] ${message}`));
	process.exit(1);
}

const program = new Command();

program.name("socket-ramp").description("Find how many concurrent WebSocket connections a network path holds").version("0.1.0");

// ============================================================================
// RUN COMMAND
// ============================================================================

program
	.command("run")
	.description("Ramp up batches of connections until the success rate drops below the threshold")
	.option("--config <path>", "Path to a JSON config file")
	.option("--host <host>", "Target host")
	.option("--port <port>", "Target port")
	.option("--protocol <protocol>", "ws or wss")
	.option("--path <path>", "Request path on the target")
	.option("--start <count>", "Connections in the first batch")
	.option("--max <count>", "Largest batch to try")
	.option("--increment <count>", "Connections added per batch")
	.option("--duration <seconds>", "Seconds each batch is held")
	.option("--delay <seconds>", "Seconds between launching connections (0 for no pacing)")
	.option("--threshold <percent>", "Minimum success rate of a stable batch")
	.option("--cumulative", "Keep connections of earlier batches open")
	.option("--verbose", "Print every connection event")
	.option("--insecure", "Skip TLS certificate verification")
	.option("--system-info", "Print a system snapshot before the run")
	.option("--network-stats", "Print network counters per batch")
	.option("--output <path>", "Path to write JSON results")
	.action(async (cli: RunCliOptions) => {
		let settings: ReturnType<typeof loadSettings>;
		try {
			settings = loadSettings(cli);
		} catch (error) {
			if (error instanceof ConfigError) fail(`Invalid configuration: ${error.message}`);
			throw error;
		}

		for (const warning of settings.warnings) {
			console.log(chalk.yellow(`[socket-ramp] ${warning}`));
		}
		if (settings.configPath) {
			console.log(chalk.dim(`[socket-ramp] Using config ${settings.configPath}`));
		}

		const { run: config, display } = settings;
		printLines(formatRunHeader(config));
		if (cli.output) {
			console.log(`  Output:      ${chalk.dim(cli.output)}`);
		}
		console.log("");

		const system = display.showSystemInfo ? getSystemInfo() : undefined;
		if (system) {
			printLines(formatSystemInfo(system));
			console.log("");
		}

		const controller = new ProgressionController(config);
		const detach = attachConsoleReporter(controller, {
			verbose: config.verbose,
			stabilityThreshold: config.stabilityThreshold,
			showNetworkStats: display.showNetworkStats,
		});

		let interrupts = 0;
		process.on("SIGINT", () => {
			interrupts++;
			if (interrupts > 1) {
				console.log(chalk.red("\n[socket-ramp] Interrupted again, exiting"));
				process.exit(130);
			}
			console.log(chalk.yellow("\n[socket-ramp] Interrupted, finishing the current batch..."));
			controller.requestStop();
		});

		const report = await controller.run();
		detach();

		console.log("");
		printLines(formatFinalResults(report));

		if (cli.output) {
			console.log("");
			writeReport(cli.output, buildReport(report, config, { system }));
		}

		console.log("");
		console.log(chalk.green("✓ Done"));
		process.exit(0);
	});

// ============================================================================
// SERVE COMMAND
// ============================================================================

program
	.command("serve")
	.description("Start a local WebSocket echo server to ramp against")
	.option("--host <host>", "Interface to bind", "0.0.0.0")
	.option("--port <port>", "Port to listen on", "7070")
	.option("--max-connections <count>", "Refuse connections beyond this many open ones")
	.option("--cert <path>", "TLS certificate (serves wss, needs --key)")
	.option("--key <path>", "TLS private key (serves wss, needs --cert)")
	.action(async (cli: ServeCliOptions) => {
		const port = Number.parseInt(cli.port, 10);
		if (!Number.isInteger(port) || port < 0 || port > 65535) fail(`--port must be a port number, got "${cli.port}"`);

		let maxConnections: number | undefined;
		if (cli.maxConnections !== undefined) {
			maxConnections = Number.parseInt(cli.maxConnections, 10);
			if (!Number.isInteger(maxConnections) || maxConnections < 1) {
				fail(`--max-connections must be a positive integer, got "${cli.maxConnections}"`);
			}
		}

		if ((cli.cert === undefined) !== (cli.key === undefined)) fail("--cert and --key must be given together");
		const tls = cli.cert !== undefined && cli.key !== undefined ? { cert: fs.readFileSync(cli.cert), key: fs.readFileSync(cli.key) } : undefined;

		const server = await EchoServer.start({ host: cli.host, port, maxConnections, tls });
		console.log(chalk.green(`[socket-ramp] Echo server listening on ${server.url}`));
		if (maxConnections !== undefined) {
			console.log(chalk.dim(`[socket-ramp] Refusing connections beyond ${maxConnections}`));
		}

		server.on("connection", ({ active, remoteAddress }) => {
			console.log(chalk.cyan(`[socket-ramp] + ${remoteAddress ?? "unknown"} (${active} open)`));
		});
		server.on("disconnection", ({ active }) => {
			console.log(chalk.gray(`[socket-ramp] - connection closed (${active} open)`));
		});
		server.on("rejected", ({ active }) => {
			console.log(chalk.red(`[socket-ramp] ✗ refused a connection at capacity (${active} open)`));
		});

		process.on("SIGINT", () => {
			console.log(chalk.yellow("\n[socket-ramp] Shutting down..."));
			server.close().then(
				() => process.exit(0),
				(error: unknown) => fail(`Error while closing: ${error instanceof Error ? error.message : String(error)}`),
			);
		});
	});

await program.parseAsync();
