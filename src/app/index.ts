#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
	CaptureRegistry,
	ConnectionManager,
	EventBridge,
	NotificationRouter,
	ObsDialer,
	RemoteCommands,
	STATE_KEYS,
	connectCaptureStore,
	describeError,
	formatAddress,
	loadAgentConfig,
	logger,
	type AgentConfig,
	type CaptureStore,
} from '../core/index.js';
import { McpNotificationSink, createMcpServer } from './mcp/server.js';
import { connectWithRetry } from './startup.js';
import { VERSION } from './version.js';

interface CliOptions {
	host?: string;
	port?: number;
	password?: string;
	db?: string;
	storage?: 'sqlite' | 'in-memory';
	maxHistory?: number;
	autoReconnect: boolean;
	waitForObs?: boolean;
	logFile?: string;
}

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Expected a positive integer.');
	}
	return parsed;
}

const program = new Command();

program
	.name('scenewatch')
	.description(
		'Keeps an OBS WebSocket connection alive, turns scene changes into MCP resource notifications\n' +
			'and captures periodic screenshots of registered sources.\n\n' +
			'Speaks MCP over stdio; logs go to stderr or to --log-file.'
	)
	.version(VERSION, '-v, --version', 'output the current version')
	.option('--host <host>', 'OBS WebSocket host (env OBS_HOST, default localhost)')
	.option('--port <port>', 'OBS WebSocket port (env OBS_PORT, default 4455)', parsePositiveInt)
	.option('--password <password>', 'OBS WebSocket password (env OBS_PASSWORD)')
	.option('--db <path>', 'SQLite database file or directory (env SCENEWATCH_DB)')
	.addOption(
		new Option('--storage <type>', 'Capture storage backend (env SCENEWATCH_STORAGE_TYPE)').choices([
			'sqlite',
			'in-memory',
		])
	)
	.option('--max-history <count>', 'Screenshots kept per capture target', parsePositiveInt)
	.option('--no-auto-reconnect', 'Do not reconnect after the OBS connection drops')
	.option('--wait-for-obs', 'Keep running and connect in the background if OBS is not up at startup')
	.option('--log-file <path>', 'Write logs to a file instead of stderr')
	.action(async () => {
		await run(program.opts<CliOptions>());
	});

async function run(opts: CliOptions): Promise<void> {
	let config: AgentConfig;
	try {
		config = loadAgentConfig({
			host: opts.host,
			port: opts.port,
			password: opts.password,
			db: opts.db,
			storage: opts.storage,
			maxHistory: opts.maxHistory,
			// commander defaults --no-* flags to true; only an explicit opt-out overrides the environment
			autoReconnect: opts.autoReconnect ? undefined : false,
			waitForObs: opts.waitForObs,
			logFile: opts.logFile,
		});
	} catch (error) {
		process.stderr.write(`[SCENEWATCH] ERROR: Invalid configuration: ${describeError(error)}\n`);
		process.exit(1);
	}

	if (config.logFile) {
		logger.redirectToFile(config.logFile);
	}

	logger.displayBox(
		`scenewatch ${VERSION}`,
		[
			`OBS:       ${formatAddress(config.connection)}`,
			`Storage:   ${config.storage.type === 'sqlite' ? config.storage.path : 'in-memory'}`,
			`History:   ${config.retention.maxHistoryPerTarget} screenshots per target`,
			`Reconnect: ${config.autoReconnect ? 'on' : 'off'}`,
		].join('\n'),
		'cyan'
	);

	let store: CaptureStore;
	try {
		store = await connectCaptureStore(config.storage);
	} catch (error) {
		logger.error(`Failed to open capture storage: ${describeError(error)}`);
		process.exit(1);
	}

	const connection = new ConnectionManager({
		dialer: new ObsDialer(),
		config: config.connection,
		autoReconnect: config.autoReconnect,
		healthCheckIntervalMs: config.healthCheckIntervalMs,
		maxConsecutiveFailures: config.maxConsecutiveFailures,
	});
	const commands = new RemoteCommands(connection);
	const registry = new CaptureRegistry({
		store,
		provider: commands,
		maxHistoryPerTarget: config.retention.maxHistoryPerTarget,
		sweepIntervalMs: config.retention.sweepIntervalMs,
	});

	const subscriptions = new Set<string>();
	const server = createMcpServer({ connection, commands, store, registry, version: VERSION, subscriptions });

	const bridge = new EventBridge();
	bridge.setObserver(new NotificationRouter(new McpNotificationSink(server, subscriptions)));
	bridge.attachTo(connection);

	connection.onSessionOpened(() => {
		store.setState(STATE_KEYS.LAST_SUCCESSFUL_CONNECTION, new Date().toISOString()).catch(error => {
			logger.warn('Could not record successful connection', { error: describeError(error) });
		});
	});

	let shuttingDown = false;
	const shutdown = async (exitCode: number): Promise<never> => {
		if (!shuttingDown) {
			shuttingDown = true;
			logger.info('Shutting down...', undefined, 'yellow');
			const steps: Array<[string, () => Promise<void>]> = [
				['capture registry', () => registry.stop()],
				['OBS connection', () => connection.close()],
				['capture storage', () => store.disconnect()],
				['MCP server', () => server.close()],
			];
			for (const [name, step] of steps) {
				try {
					await step();
				} catch (error) {
					logger.warn(`Failed to stop ${name}`, { error: describeError(error) });
				}
			}
		}
		process.exit(exitCode);
	};

	const onSignal = (signal: NodeJS.Signals) => {
		logger.info(`Received ${signal}`);
		void shutdown(0);
	};
	process.on('SIGINT', onSignal);
	process.on('SIGTERM', onSignal);

	await server.connect(new StdioServerTransport());
	logger.info('MCP server listening on stdio', undefined, 'green');

	try {
		await connectWithRetry(connection, {
			maxAttempts: config.startup.maxAttempts,
			delayMs: config.startup.delayMs,
		});
	} catch (error) {
		if (!config.startup.waitForObs) {
			logger.error(`Could not connect to OBS: ${describeError(error)}`);
			await shutdown(1);
		}
		logger.warn('OBS is not reachable yet, retrying in the background', {
			error: describeError(error),
		});
		connection.setAutoReconnect(true);
		connection.startSupervision();
	}

	try {
		await registry.start();
	} catch (error) {
		logger.error(`Failed to start capture registry: ${describeError(error)}`);
		await shutdown(1);
	}
}

program.parseAsync(process.argv).catch(error => {
	logger.error(`Fatal error: ${describeError(error)}`);
	process.exit(1);
});
