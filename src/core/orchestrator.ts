/**
 * Orchestrator
 *
 * Context object owning one registry, matcher, controller, reaper, telemetry
 * sink and event bus. Every caller-facing operation goes through it; several
 * orchestrators can live in one process without sharing state.
 */

import { getEnv } from './env.js';
import type { Env } from './env.js';
import { logger } from './logger/index.js';
import { LifecycleEventBus } from './events/index.js';
import { SyncFailedError, UnknownProfileError, UnknownServerError } from './errors/index.js';
import { CapabilityRegistry, GatewayDiscovery } from './registry/index.js';
import type {
	DescriptorSource,
	GatewayCatalog,
	RegistrySource,
	ReloadOptions,
	ServerDescriptor,
} from './registry/index.js';
import { Matcher, EmbeddingScorer } from './matcher/index.js';
import type { MatchResult, SemanticScorer } from './matcher/index.js';
import { createEmbedderFromEnv } from './embedding/index.js';
import type { Embedder } from './embedding/index.js';
import { TelemetrySink, FileTelemetryStore } from './telemetry/index.js';
import type { TelemetryStats } from './telemetry/index.js';
import { ProfileCatalog } from './profiles/index.js';
import type { ServerProfile } from './profiles/index.js';
import { DockerGatewayBoundary, IdleReaper, LifecycleController } from './lifecycle/index.js';
import type {
	ActivateOptions,
	ActivationRecord,
	ActivationReport,
	DeactivateOptions,
	DeactivationReport,
	IdleReaperOptions,
	ProcessControlBoundary,
	ReapReport,
	StatusReport,
	SweepOptions,
	SyncReport,
	UsageEntry,
} from './lifecycle/index.js';

const LOG_PREFIX = '[Orchestrator]';

export const DEFAULT_TOP_K = 5;

export interface OrchestratorDeps {
	registry: CapabilityRegistry;
	boundary: ProcessControlBoundary;
	events?: LifecycleEventBus;
	telemetry?: TelemetrySink;
	profiles?: ProfileCatalog;
	scorer?: SemanticScorer | null;
	/** Disconnected on shutdown */
	embedder?: Embedder | null;
	minSimilarity?: number;
	reaper?: Omit<IdleReaperOptions, 'events' | 'clock'>;
	boundaryTimeoutMs?: number;
	clock?: () => number;
}

export interface CreateOrchestratorOptions {
	env?: Env;
	/** Descriptor/profile file; defaults to TOOLSWITCH_CONFIG */
	configPath?: string;
	boundary?: ProcessControlBoundary;
	/** Catalog read by gateway discovery; defaults to the docker gateway */
	catalog?: GatewayCatalog;
	/** `null` disables semantic matching regardless of the environment */
	embedder?: Embedder | null;
}

export interface SuggestOptions {
	topK?: number;
	minConfidence?: number;
}

export interface CatalogEntry {
	id: string;
	purpose: string;
	category: string;
	coveredTechnologies: string[];
	toolCount: number;
	active: boolean;
}

export interface ServerInfo {
	descriptor: ServerDescriptor;
	active: boolean;
	activation?: ActivationRecord;
}

export interface UsageStats {
	servers: UsageEntry[];
	telemetry: TelemetryStats;
	idleTimeoutMs: number;
	idleCandidates: string[];
}

export interface ReloadReport {
	version: number;
	serverCount: number;
	source: RegistrySource;
	/** Servers added by gateway discovery */
	discovered: number;
}

export interface ProfileActivationReport extends ActivationReport {
	profile: string;
}

export interface ActivateForTaskOptions {
	useProfiles?: boolean;
	autoResolveDeps?: boolean;
	minConfidence?: number;
	topK?: number;
}

export type TaskActivationResult =
	| { matched: false; suggestedProfile?: string }
	| { matched: true; via: 'profile'; profile: string; report: ActivationReport }
	| {
			matched: true;
			via: 'suggestion';
			suggestions: MatchResult[];
			report: ActivationReport;
			/** A matching profile that needs explicit activation */
			suggestedProfile?: string;
	  };

export class Orchestrator {
	readonly registry: CapabilityRegistry;
	readonly events: LifecycleEventBus;
	readonly telemetry: TelemetrySink;
	readonly controller: LifecycleController;
	readonly reaper: IdleReaper;
	private readonly matcher: Matcher;
	private profiles: ProfileCatalog;
	private readonly embedder: Embedder | null;
	private readonly clock: () => number;

	constructor(deps: OrchestratorDeps) {
		this.clock = deps.clock ?? Date.now;
		this.registry = deps.registry;
		this.events = deps.events ?? new LifecycleEventBus();
		this.telemetry = deps.telemetry ?? new TelemetrySink({ clock: this.clock });
		this.profiles = deps.profiles ?? ProfileCatalog.defaults();
		this.embedder = deps.embedder ?? null;
		this.matcher = new Matcher(this.registry, {
			scorer: deps.scorer,
			minSimilarity: deps.minSimilarity,
		});
		this.controller = new LifecycleController(this.registry, deps.boundary, {
			telemetry: this.telemetry,
			events: this.events,
			clock: this.clock,
			boundaryTimeoutMs: deps.boundaryTimeoutMs,
		});
		this.reaper = new IdleReaper(this.controller, {
			...deps.reaper,
			events: this.events,
			clock: this.clock,
		});
	}

	/**
	 * Build an orchestrator from the environment and the optional config file.
	 */
	static async create(options: CreateOrchestratorOptions = {}): Promise<Orchestrator> {
		const env = options.env ?? getEnv();
		const configPath = options.configPath ?? env.TOOLSWITCH_CONFIG;
		const events = new LifecycleEventBus();
		const gateway = new DockerGatewayBoundary({ command: env.TOOLSWITCH_GATEWAY_COMMAND });
		const discovery = env.TOOLSWITCH_DISCOVERY
			? new GatewayDiscovery(options.catalog ?? gateway, {
					ttlMs: env.TOOLSWITCH_DISCOVERY_TTL_MS,
				})
			: undefined;

		const [registry, profiles] = await Promise.all([
			CapabilityRegistry.load(configPath, { events, discovery }),
			ProfileCatalog.load(configPath),
		]);

		const embedder = options.embedder !== undefined ? options.embedder : createEmbedderFromEnv(env);
		const telemetry = new TelemetrySink({
			store: env.TOOLSWITCH_TELEMETRY_FILE
				? new FileTelemetryStore(env.TOOLSWITCH_TELEMETRY_FILE)
				: undefined,
		});

		return new Orchestrator({
			registry,
			boundary: options.boundary ?? gateway,
			events,
			telemetry,
			profiles,
			embedder,
			scorer: embedder ? new EmbeddingScorer(embedder) : null,
			boundaryTimeoutMs: env.TOOLSWITCH_BOUNDARY_TIMEOUT_MS,
			reaper: {
				intervalMs: env.TOOLSWITCH_REAPER_INTERVAL_MS,
				idleTimeoutMs: env.TOOLSWITCH_IDLE_TIMEOUT_MS,
			},
		});
	}

	// ===== Lifecycle =====

	/**
	 * Adopt servers the gateway already has enabled, before serving. A gateway
	 * that cannot be read is logged and leaves the ledger empty.
	 */
	async reconcile(): Promise<SyncReport | undefined> {
		try {
			return await this.controller.sync();
		} catch (error) {
			if (!(error instanceof SyncFailedError)) {
				throw error;
			}
			logger.warn(`${LOG_PREFIX} Startup reconciliation skipped: ${error.message}`);
			return undefined;
		}
	}

	start(): void {
		this.reaper.start();
		logger.info(
			`${LOG_PREFIX} Ready with ${this.registry.snapshot().servers.size} servers` +
				(this.matcher.semanticEnabled ? ' (semantic matching enabled)' : '')
		);
	}

	/**
	 * Stop the reaper (waiting for a running sweep) and flush telemetry.
	 * Active servers are left enabled in the gateway.
	 */
	async shutdown(): Promise<void> {
		await this.reaper.stop();
		await this.telemetry.flush();
		await this.embedder?.disconnect();
		logger.info(`${LOG_PREFIX} Shut down`);
	}

	// ===== Discovery =====

	suggest(taskText: string, options: SuggestOptions = {}): Promise<MatchResult[]> {
		return this.matcher.match(taskText, options.topK ?? DEFAULT_TOP_K, {
			minConfidence: options.minConfidence,
		});
	}

	catalog(category?: string): CatalogEntry[] {
		return this.registry.list(category).map(descriptor => ({
			id: descriptor.id,
			purpose: descriptor.purpose,
			category: descriptor.category,
			coveredTechnologies: [...descriptor.coveredTechnologies],
			toolCount: descriptor.toolCount,
			active: this.controller.isActive(descriptor.id),
		}));
	}

	/**
	 * @throws UnknownServerError when the id is not in the registry
	 */
	serverInfo(id: string): ServerInfo {
		const descriptor = this.registry.get(id);
		if (!descriptor) {
			throw new UnknownServerError(id);
		}
		const activation = this.controller.record(id);
		return { descriptor, active: activation !== undefined, ...(activation ? { activation } : {}) };
	}

	/**
	 * Re-read descriptors, and profiles, from `source` or else the source
	 * loaded last. Profiles given directly are kept when there is no source.
	 */
	async reloadCapabilities(
		source?: DescriptorSource,
		options: ReloadOptions = {}
	): Promise<ReloadReport> {
		const snapshot = await this.registry.reload(source, options);
		const effective = this.registry.descriptorSource;
		if (effective !== undefined) {
			this.profiles = await ProfileCatalog.load(effective);
		}
		return {
			version: snapshot.version,
			serverCount: snapshot.servers.size,
			source: snapshot.source,
			discovered: snapshot.discovered,
		};
	}

	// ===== Activation =====

	activate(ids: string[], options: ActivateOptions = {}): Promise<ActivationReport> {
		return this.controller.activate(ids, options);
	}

	deactivate(ids?: string[], options: DeactivateOptions = {}): Promise<DeactivationReport> {
		return this.controller.deactivate(ids, options);
	}

	recordUse(id: string, toolName?: string): boolean {
		return this.controller.recordUse(id, toolName);
	}

	sync(): Promise<SyncReport> {
		return this.controller.sync();
	}

	status(): StatusReport {
		return this.controller.status();
	}

	usageStats(): UsageStats {
		return {
			servers: this.controller.usage(),
			telemetry: this.telemetry.stats(),
			idleTimeoutMs: this.reaper.idleTimeout,
			idleCandidates: this.controller.idleCandidates(this.reaper.idleTimeout),
		};
	}

	reclaimIdle(options: SweepOptions = {}): Promise<ReapReport> {
		return this.reaper.sweep(options);
	}

	// ===== Profiles =====

	listProfiles(): ServerProfile[] {
		return this.profiles.list();
	}

	/**
	 * @throws UnknownProfileError listing the available profile names
	 */
	async activateProfile(name: string): Promise<ProfileActivationReport> {
		const profile = this.profiles.get(name);
		if (!profile) {
			throw new UnknownProfileError(name, this.profiles.names());
		}
		const report = await this.controller.activate([...profile.servers], {
			reason: `profile: ${name}`,
			autoResolveDeps: true,
		});
		return { ...report, profile: name };
	}

	/**
	 * Activate whatever a task needs: a matching auto-activating profile, or
	 * else the matcher's suggestions.
	 */
	async activateForTask(
		taskText: string,
		options: ActivateForTaskOptions = {}
	): Promise<TaskActivationResult> {
		const useProfiles = options.useProfiles ?? true;
		const autoResolveDeps = options.autoResolveDeps ?? true;

		const profile = useProfiles ? this.profiles.findForTask(taskText) : undefined;
		if (profile?.autoActivate) {
			const report = await this.activateProfile(profile.name);
			return { matched: true, via: 'profile', profile: profile.name, report };
		}
		const suggestedProfile = profile?.name;

		const suggestions = await this.suggest(taskText, {
			topK: options.topK,
			minConfidence: options.minConfidence,
		});
		if (suggestions.length === 0) {
			return suggestedProfile ? { matched: false, suggestedProfile } : { matched: false };
		}

		const report = await this.controller.activate(
			suggestions.map(suggestion => suggestion.id),
			{ reason: `task: ${taskText}`, autoResolveDeps }
		);
		return {
			matched: true,
			via: 'suggestion',
			suggestions,
			report,
			...(suggestedProfile ? { suggestedProfile } : {}),
		};
	}
}
