export { LifecycleController } from './controller.js';
export type {
	LifecycleControllerOptions,
	ActivateOptions,
	DeactivateOptions,
	ActivationReport,
	DeactivationReport,
	StatusReport,
	UsageEntry,
	SyncReport,
	ServerTools,
} from './controller.js';
export { ActivationLedger } from './ledger.js';
export type { ActivationRecord, ActivationOrigin, NewActivation } from './ledger.js';
export { IdleReaper } from './idle-reaper.js';
export type { IdleReaperOptions, SweepOptions, ReapReport, ReapableController } from './idle-reaper.js';
export { BoundaryTimeoutError, withTimeout } from './boundary.js';
export type { ProcessControlBoundary, BoundaryResult, ToolInfo } from './boundary.js';
export {
	DockerGatewayBoundary,
	spawnCommand,
	parseServerList,
	parseToolList,
	parseInspection,
} from './docker-boundary.js';
export type {
	DockerGatewayBoundaryOptions,
	CommandRunner,
	CommandResult,
	RunOptions,
} from './docker-boundary.js';
export { InFlightOperations } from './in-flight.js';
export type { ActivateOutcome, DeactivateOutcome, InFlightOperation } from './in-flight.js';
export {
	TOKENS_PER_TOOL,
	DEFAULT_BOUNDARY_TIMEOUT_MS,
	DEFAULT_IDLE_TIMEOUT_MS,
	DEFAULT_REAPER_INTERVAL_MS,
	estimateTokens,
} from './constants.js';
