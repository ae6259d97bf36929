export { TelemetrySink } from './telemetry-sink.js';
export type { TelemetrySinkOptions } from './telemetry-sink.js';
export { FileTelemetryStore } from './persistence.js';
export type {
	TelemetryEvent,
	TelemetryInput,
	TelemetryAction,
	TelemetryStats,
	TelemetryStore,
} from './types.js';
