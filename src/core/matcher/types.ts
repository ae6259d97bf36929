import type { RegistrySnapshot } from '../registry/index.js';

export type MatchSource = 'keyword' | 'semantic' | 'dependency';

export interface MatchResult {
	id: string;
	/** Confidence in [0, 1] */
	confidence: number;
	reason: string;
	source: MatchSource;
	/** Set on dependency results: the primary match that pulled this server in */
	dependencyOf?: string;
}

export interface MatchOptions {
	/** Primary matches below this confidence are dropped before dependency expansion */
	minConfidence?: number;
}

/**
 * Optional semantic scoring strategy. Returns a similarity in [0, 1] for every
 * server it could score; servers missing from the map are treated as unscored.
 */
export interface SemanticScorer {
	readonly name: string;
	score(taskText: string, snapshot: RegistrySnapshot): Promise<Map<string, number>>;
}
