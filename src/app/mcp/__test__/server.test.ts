import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import {
	CallToolResultSchema,
	ResourceListChangedNotificationSchema,
	ResourceUpdatedNotificationSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
	CaptureRegistry,
	ConnectionManager,
	InMemoryCaptureStore,
	RemoteCommands,
	createLogger,
} from '../../../core/index.js';
import { FakeDialer, TEST_CONFIG } from '../../../core/remote/__test__/fakes.js';
import { McpNotificationSink, createMcpServer } from '../server.js';

const logger = createLogger({ silent: true });

function textOf(result: unknown): string {
	const [first] = CallToolResultSchema.parse(result).content;
	if (first?.type !== 'text') {
		throw new Error('expected text content');
	}
	return first.text;
}

function isErrorResult(result: unknown): boolean {
	return CallToolResultSchema.parse(result).isError === true;
}

describe('MCP server', () => {
	let dialer: FakeDialer;
	let connection: ConnectionManager;
	let store: InMemoryCaptureStore;
	let registry: CaptureRegistry;
	let subscriptions: Set<string>;
	let server: Server;
	let client: Client;

	const callTool = async (name: string, args: Record<string, unknown> = {}) =>
		client.callTool({ name, arguments: args });

	const callJson = async (name: string, args: Record<string, unknown> = {}): Promise<unknown> =>
		JSON.parse(textOf(await callTool(name, args)));

	beforeEach(async () => {
		dialer = new FakeDialer();
		connection = new ConnectionManager({ dialer, config: TEST_CONFIG, logger });
		const commands = new RemoteCommands(connection);
		store = new InMemoryCaptureStore();
		await store.connect();
		registry = new CaptureRegistry({ store, provider: commands, logger });
		subscriptions = new Set<string>();
		server = createMcpServer({ connection, commands, store, registry, version: '0.0.0-test', subscriptions, logger });

		await connection.connect();
		await registry.start();

		client = new Client({ name: 'test-client', version: '1.0.0' });
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
		await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await client.close();
		await registry.stop();
		await connection.close();
		await store.disconnect();
	});

	it('should list the capture tools', async () => {
		const { tools } = await client.listTools();

		expect(tools.map(tool => tool.name)).toEqual([
			'get_connection_status',
			'list_capture_targets',
			'create_capture_target',
			'update_capture_target',
			'remove_capture_target',
		]);
	});

	it('should report the connection status', async () => {
		expect(await callJson('get_connection_status')).toMatchObject({
			connected: true,
			autoReconnect: true,
			address: 'ws://localhost:4455',
			version: { obsVersion: '30.0.0', obsWebSocketVersion: '5.3.0' },
		});

		await connection.disconnect();

		expect(await callJson('get_connection_status')).toMatchObject({
			connected: false,
			autoReconnect: false,
		});
	});

	it('should create a target and start capturing it', async () => {
		const created = await callJson('create_capture_target', { name: 'cam', sourceName: 'Webcam' });

		expect(created).toMatchObject({ id: 1, name: 'cam', sourceName: 'Webcam', cadenceMs: 5000, enabled: true });
		expect(registry.hasWorker(1)).toBe(true);
		expect(await callJson('list_capture_targets')).toMatchObject([{ id: 1, name: 'cam', running: true }]);

		await vi.waitFor(async () => {
			expect(await store.countArtifacts(1)).toBe(1);
		});
		const { contents } = await client.readResource({ uri: 'obs://screenshot/cam' });
		expect(contents).toEqual([{ uri: 'obs://screenshot/cam', mimeType: 'image/png', blob: 'aGVsbG8=' }]);
	});

	it('should reject invalid arguments as a tool error', async () => {
		const result = await callTool('create_capture_target', { name: 'cam' });

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toMatchObject({ name: 'ValidationError', message: 'Invalid tool arguments' });
		expect(await store.listTargets()).toEqual([]);
	});

	it('should report duplicate names with the storage error code', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });
		const result = await callTool('create_capture_target', { name: 'cam', sourceName: 'Other' });

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toMatchObject({ code: 'STORAGE_CONFLICT' });
		expect(registry.workerCount()).toBe(1);
	});

	it('should update a target and restart its worker', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });

		const updated = await callJson('update_capture_target', { name: 'cam', cadenceMs: 2000 });

		expect(updated).toMatchObject({ id: 1, cadenceMs: 2000 });
		expect(registry.listWorkers()).toMatchObject([{ targetId: 1, cadenceMs: 2000 }]);

		await callTool('update_capture_target', { name: 'cam', enabled: false });
		expect(registry.hasWorker(1)).toBe(false);
	});

	it('should change the cadence without an extra capture', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });
		await vi.waitFor(async () => {
			expect(await store.countArtifacts(1)).toBe(1);
		});

		expect(await callJson('update_capture_target', { name: 'cam', cadenceMs: 60000 })).toMatchObject({
			cadenceMs: 60000,
		});
		await new Promise(resolve => setTimeout(resolve, 50));

		expect(registry.listWorkers()).toMatchObject([{ targetId: 1, cadenceMs: 60000 }]);
		expect(dialer.lastSession?.calls.filter(call => call.startsWith('takeScreenshot'))).toHaveLength(1);
		expect(await store.countArtifacts(1)).toBe(1);
	});

	it('should store a cadence change for a disabled target', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam', enabled: false });

		expect(await callJson('update_capture_target', { name: 'cam', cadenceMs: 2000 })).toMatchObject({
			cadenceMs: 2000,
			enabled: false,
		});
		expect(registry.hasWorker(1)).toBe(false);
	});

	it('should leave the stored target unchanged when the registry is stopped', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });
		await registry.stop();

		const result = await callTool('update_capture_target', { name: 'cam', cadenceMs: 2000 });

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toMatchObject({
			code: 'REGISTRY_STATE',
			message: 'Capture registry is not running',
		});
		expect(await store.getTarget(1)).toMatchObject({ cadenceMs: 5000 });
	});

	it('should restore the stored target when the worker cannot be replaced', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });
		vi.spyOn(registry, 'updateTarget').mockRejectedValueOnce(new Error('worker refused'));

		const result = await callTool('update_capture_target', { name: 'cam', sourceName: 'Screen' });

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toEqual({ message: 'worker refused' });
		expect(await store.getTarget(1)).toMatchObject({ sourceName: 'Webcam', cadenceMs: 5000 });
	});

	it('should fail to update an unknown target', async () => {
		const result = await callTool('update_capture_target', { name: 'nope', cadenceMs: 2000 });

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toEqual({ message: 'Capture target not found: nope' });
	});

	it('should remove a target with its worker', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });

		expect(await callJson('remove_capture_target', { name: 'cam' })).toEqual({ name: 'cam', removed: true });
		expect(registry.hasWorker(1)).toBe(false);
		expect(await store.getTarget(1)).toBeUndefined();
	});

	it('should answer unknown tools with an error result', async () => {
		const result = await callTool('launch_rocket');

		expect(isErrorResult(result)).toBe(true);
		expect(JSON.parse(textOf(result))).toEqual({ message: 'Unknown tool: launch_rocket' });
	});

	it('should list scenes and screenshots as resources', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam', imageFormat: 'jpg' });

		const { resources } = await client.listResources();

		expect(resources.map(resource => [resource.uri, resource.mimeType])).toEqual([
			['obs://scene/Main', 'application/json'],
			['obs://scene/BRB', 'application/json'],
			['obs://screenshot/cam', 'image/jpeg'],
		]);
	});

	it('should only list screenshots while disconnected', async () => {
		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });
		await connection.disconnect();

		const { resources } = await client.listResources();

		expect(resources.map(resource => resource.uri)).toEqual(['obs://screenshot/cam']);
	});

	it('should read a scene resource', async () => {
		const { contents } = await client.readResource({ uri: 'obs://scene/BRB' });

		expect(contents).toEqual([
			{
				uri: 'obs://scene/BRB',
				mimeType: 'application/json',
				text: JSON.stringify({ name: 'BRB', index: 1, current: false }),
			},
		]);
	});

	it('should reject unknown resources', async () => {
		await expect(client.readResource({ uri: 'obs://mixer/Mic' })).rejects.toThrow(
			'Unknown resource: obs://mixer/Mic'
		);
		await expect(client.readResource({ uri: 'obs://screenshot/none' })).rejects.toThrow(
			'Unknown resource: obs://screenshot/none'
		);
	});

	it('should notify clients when the resource list changes', async () => {
		const listChanged = vi.fn();
		client.setNotificationHandler(ResourceListChangedNotificationSchema, async () => {
			listChanged();
		});

		await callTool('create_capture_target', { name: 'cam', sourceName: 'Webcam' });

		await vi.waitFor(() => {
			expect(listChanged).toHaveBeenCalledTimes(1);
		});
	});

	it('should only forward updates for subscribed resources', async () => {
		const updated: string[] = [];
		client.setNotificationHandler(ResourceUpdatedNotificationSchema, async notification => {
			updated.push(notification.params.uri);
		});
		const sink = new McpNotificationSink(server, subscriptions);

		await client.subscribeResource({ uri: 'obs://scene/Main' });
		expect(subscriptions.has('obs://scene/Main')).toBe(true);

		await sink.notifyUpdated('obs://scene/BRB');
		await sink.notifyUpdated('obs://scene/Main');
		await vi.waitFor(() => {
			expect(updated).toEqual(['obs://scene/Main']);
		});

		await client.unsubscribeResource({ uri: 'obs://scene/Main' });
		expect(subscriptions.size).toBe(0);
	});
});
