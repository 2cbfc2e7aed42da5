/**
 * MCP server - exposes scenes and captured screenshots as resources, and
 * capture target management as tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
	CallToolRequestSchema,
	ListResourcesRequestSchema,
	ListToolsRequestSchema,
	ReadResourceRequestSchema,
	SubscribeRequestSchema,
	UnsubscribeRequestSchema,
	type CallToolResult,
	type ReadResourceResult,
	type Resource,
	type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
	IMAGE_FORMATS,
	RegistryStateError,
	ScenewatchError,
	TargetNotFoundError,
	describeError,
	logger as rootLogger,
	mimeTypeFor,
	resourceUri,
	type CaptureRegistry,
	type CaptureStore,
	type CaptureTarget,
	type CaptureTargetUpdate,
	type ConnectionManager,
	type Logger,
	type NotificationSink,
	type RemoteCommands,
} from '../../core/index.js';

export interface McpServerDeps {
	connection: ConnectionManager;
	commands: RemoteCommands;
	store: CaptureStore;
	registry: CaptureRegistry;
	version: string;
	/** URIs clients subscribed to; shared with McpNotificationSink */
	subscriptions?: Set<string>;
	logger?: Logger;
}

const RESOURCE_URI_PATTERN = /^obs:\/\/(scene|screenshot)\/(.+)$/;

const targetName = z.string().min(1);
const cadenceMs = z.number().int().positive();
const imageFormat = z.enum(IMAGE_FORMATS);
const dimension = z.number().int().nonnegative();
const quality = z.number().int().min(0).max(100);

const CreateTargetArgs = z.object({
	name: targetName,
	sourceName: z.string().min(1),
	cadenceMs: cadenceMs.optional(),
	imageFormat: imageFormat.optional(),
	imageWidth: dimension.optional(),
	imageHeight: dimension.optional(),
	quality: quality.optional(),
	enabled: z.boolean().optional(),
});

const UpdateTargetArgs = z.object({
	name: targetName,
	sourceName: z.string().min(1).optional(),
	cadenceMs: cadenceMs.optional(),
	imageFormat: imageFormat.optional(),
	imageWidth: dimension.optional(),
	imageHeight: dimension.optional(),
	quality: quality.optional(),
	enabled: z.boolean().optional(),
});

const RemoveTargetArgs = z.object({ name: targetName });

const targetProperties = {
	name: { type: 'string', description: 'Unique name of the capture target' },
	sourceName: { type: 'string', description: 'OBS scene or source to capture' },
	cadenceMs: { type: 'number', description: 'Milliseconds between captures' },
	imageFormat: { type: 'string', enum: [...IMAGE_FORMATS] },
	imageWidth: { type: 'number', description: '0 keeps the source width' },
	imageHeight: { type: 'number', description: '0 keeps the source height' },
	quality: { type: 'number', description: 'Compression quality, 0-100' },
	enabled: { type: 'boolean' },
};

const TOOLS: Tool[] = [
	{
		name: 'get_connection_status',
		description: 'Report whether the agent is connected to OBS, and the OBS version when it is',
		inputSchema: { type: 'object', properties: {} },
	},
	{
		name: 'list_capture_targets',
		description: 'List registered periodic capture targets and whether each one has a running worker',
		inputSchema: { type: 'object', properties: {} },
	},
	{
		name: 'create_capture_target',
		description: 'Register a source for periodic screenshots and start capturing it',
		inputSchema: { type: 'object', properties: targetProperties, required: ['name', 'sourceName'] },
	},
	{
		name: 'update_capture_target',
		description:
			'Change the settings of a capture target. A cadence-only change keeps the running worker; other changes restart it',
		inputSchema: { type: 'object', properties: targetProperties, required: ['name'] },
	},
	{
		name: 'remove_capture_target',
		description: 'Stop capturing a target and delete it together with its screenshots',
		inputSchema: { type: 'object', properties: { name: targetProperties.name }, required: ['name'] },
	},
];

/**
 * Build the MCP server. The caller connects it to a transport.
 */
export function createMcpServer(deps: McpServerDeps): Server {
	const { connection, commands, store, registry } = deps;
	const subscriptions = deps.subscriptions ?? new Set<string>();
	const logger = deps.logger ?? rootLogger.createChild({ component: 'mcp' });

	const server = new Server(
		{ name: 'scenewatch', version: deps.version },
		{
			capabilities: {
				resources: { subscribe: true, listChanged: true },
				tools: {},
			},
		}
	);

	const announceListChanged = async (): Promise<void> => {
		try {
			await server.sendResourceListChanged();
		} catch (error) {
			logger.debug('Resource list change not delivered', { error: describeError(error) });
		}
	};

	const requireTarget = async (name: string): Promise<CaptureTarget> => {
		const target = await store.getTargetByName(name);
		if (!target) {
			throw new Error(`Capture target not found: ${name}`);
		}
		return target;
	};

	// A cadence-only change keeps the running worker and its schedule
	const applyUpdate = async (target: CaptureTarget, update: CaptureTargetUpdate): Promise<void> => {
		if (!isCadenceOnly(update)) {
			await registry.updateTarget(target);
			return;
		}
		try {
			await registry.updateCadence(target.id, target.cadenceMs);
		} catch (error) {
			if (!(error instanceof TargetNotFoundError)) {
				throw error;
			}
			await registry.updateTarget(target);
		}
	};

	const runTool = async (name: string, args: Record<string, unknown>): Promise<unknown> => {
		switch (name) {
			case 'get_connection_status':
				return {
					...(await connection.getStatus()),
					health: connection.getHealthMetrics(),
				};

			case 'list_capture_targets': {
				const targets = await store.listTargets();
				return targets.map(target => ({ ...target, running: registry.hasWorker(target.id) }));
			}

			case 'create_capture_target': {
				const input = CreateTargetArgs.parse(args);
				const target = await store.createTarget(input);
				try {
					await registry.addTarget(target);
				} catch (error) {
					await store.deleteTarget(target.id);
					throw error;
				}
				await announceListChanged();
				return target;
			}

			case 'update_capture_target': {
				const { name: existingName, ...update } = UpdateTargetArgs.parse(args);
				const existing = await requireTarget(existingName);
				if (!registry.isRunning()) {
					throw new RegistryStateError('Capture registry is not running');
				}
				const target = await store.updateTarget(existing.id, update);
				if (!target) {
					throw new TargetNotFoundError(existing.id);
				}
				try {
					await applyUpdate(target, update);
				} catch (error) {
					await store.updateTarget(existing.id, settingsOf(existing));
					throw error;
				}
				return target;
			}

			case 'remove_capture_target': {
				const { name: existingName } = RemoveTargetArgs.parse(args);
				const target = await requireTarget(existingName);
				await registry.removeTarget(target.id);
				const removed = await store.deleteTarget(target.id);
				await announceListChanged();
				return { name: target.name, removed };
			}

			default:
				throw new Error(`Unknown tool: ${name}`);
		}
	};

	server.setRequestHandler(ListToolsRequestSchema, async () => {
		return { tools: TOOLS };
	});

	server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
		const { name, arguments: args = {} } = request.params;
		logger.info(`Tool called: ${name}`, { toolName: name });

		try {
			const result = await runTool(name, args);
			return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
		} catch (error) {
			logger.warn(`Tool '${name}' failed`, { error: describeError(error) });
			return {
				content: [{ type: 'text', text: JSON.stringify(errorPayload(error), null, 2) }],
				isError: true,
			};
		}
	});

	server.setRequestHandler(ListResourcesRequestSchema, async () => {
		const resources: Resource[] = [];

		if (commands.isConnected()) {
			try {
				const { scenes } = await commands.listScenes();
				for (const scene of scenes) {
					resources.push({
						uri: resourceUri('scene', scene.name),
						name: scene.name,
						description: `OBS scene "${scene.name}"`,
						mimeType: 'application/json',
					});
				}
			} catch (error) {
				logger.warn('Could not list OBS scenes', { error: describeError(error) });
			}
		}

		for (const target of await store.listTargets()) {
			resources.push({
				uri: resourceUri('screenshot', target.name),
				name: `${target.name} screenshot`,
				description: `Latest screenshot of "${target.sourceName}"`,
				mimeType: mimeTypeFor(target.imageFormat),
			});
		}

		return { resources };
	});

	server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => {
		const { uri } = request.params;
		const match = RESOURCE_URI_PATTERN.exec(uri);
		if (!match) {
			throw new Error(`Unknown resource: ${uri}`);
		}
		const [, kind, name] = match;

		if (kind === 'scene') {
			const list = await commands.listScenes();
			const scene = list.scenes.find(candidate => candidate.name === name);
			if (!scene) {
				throw new Error(`Unknown resource: ${uri}`);
			}
			return {
				contents: [
					{
						uri,
						mimeType: 'application/json',
						text: JSON.stringify({
							name: scene.name,
							index: scene.index,
							current: list.currentProgramSceneName === scene.name,
						}),
					},
				],
			};
		}

		const target = await store.getTargetByName(name);
		if (!target) {
			throw new Error(`Unknown resource: ${uri}`);
		}
		const artifact = await store.getLatestArtifact(target.id);
		if (!artifact) {
			throw new Error(`No screenshot captured yet for ${target.name}`);
		}
		return {
			contents: [{ uri, mimeType: artifact.mimeType, blob: artifact.imageData }],
		};
	});

	server.setRequestHandler(SubscribeRequestSchema, async request => {
		subscriptions.add(request.params.uri);
		logger.debug('Resource subscribed', { uri: request.params.uri });
		return {};
	});

	server.setRequestHandler(UnsubscribeRequestSchema, async request => {
		subscriptions.delete(request.params.uri);
		logger.debug('Resource unsubscribed', { uri: request.params.uri });
		return {};
	});

	return server;
}

/**
 * Forwards routed notifications to connected MCP clients. Update
 * notifications only go out for subscribed URIs when a subscription set is given.
 */
export class McpNotificationSink implements NotificationSink {
	constructor(
		private readonly server: Server,
		private readonly subscriptions?: ReadonlySet<string>
	) {}

	async notifyListChanged(): Promise<void> {
		await this.server.sendResourceListChanged();
	}

	async notifyUpdated(uri: string): Promise<void> {
		if (this.subscriptions && !this.subscriptions.has(uri)) {
			return;
		}
		await this.server.sendResourceUpdated({ uri });
	}
}

function isCadenceOnly(update: CaptureTargetUpdate): boolean {
	return (
		update.cadenceMs !== undefined &&
		Object.entries(update).every(([key, value]) => key === 'cadenceMs' || value === undefined)
	);
}

function settingsOf(target: CaptureTarget): CaptureTargetUpdate {
	return {
		sourceName: target.sourceName,
		cadenceMs: target.cadenceMs,
		imageFormat: target.imageFormat,
		imageWidth: target.imageWidth,
		imageHeight: target.imageHeight,
		quality: target.quality,
		enabled: target.enabled,
	};
}

function errorPayload(error: unknown): Record<string, unknown> {
	if (error instanceof ScenewatchError) {
		return error.toJSON();
	}
	if (error instanceof z.ZodError) {
		return { name: 'ValidationError', message: 'Invalid tool arguments', issues: error.issues };
	}
	return { message: describeError(error) };
}
