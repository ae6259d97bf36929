export {
	OrchestratorError,
	UnknownServerError,
	ActivationFailedError,
	DeactivationFailedError,
	ConfigError,
	SyncFailedError,
	UnknownProfileError,
	isOrchestratorError,
	describeError,
} from './orchestrator-errors.js';
export type { OrchestratorErrorCode, ServerFailure } from './orchestrator-errors.js';
