/**
 * Telemetry persistence
 *
 * Appends telemetry events to a JSON Lines file.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { TelemetryEvent, TelemetryStore } from './types.js';

export class FileTelemetryStore implements TelemetryStore {
	private directoryReady?: Promise<void>;

	constructor(private readonly filePath: string) {}

	async append(event: TelemetryEvent): Promise<void> {
		await this.ensureDirectory();
		await fs.appendFile(this.filePath, JSON.stringify(event) + '\n', 'utf-8');
	}

	private ensureDirectory(): Promise<void> {
		if (!this.directoryReady) {
			this.directoryReady = fs
				.mkdir(path.dirname(this.filePath), { recursive: true })
				.then(() => undefined);
			// Retry on the next append if creating the directory failed
			this.directoryReady.catch(() => {
				this.directoryReady = undefined;
			});
		}
		return this.directoryReady;
	}
}
