/**
 * Matcher
 *
 * Ranks registry servers for a free-text task. Keyword scoring always runs;
 * an optional semantic scorer supplies the primary score when configured.
 * Matching never mutates the registry or the activation ledger.
 */

import { logger } from '../logger/index.js';
import { compareIds } from '../registry/index.js';
import type { CapabilityRegistry, RegistrySnapshot } from '../registry/index.js';
import { describeKeywordMatch, scoreKeywords } from './keyword.js';
import type { MatchOptions, MatchResult, SemanticScorer } from './types.js';

const LOG_PREFIX = '[Matcher]';

export const DEPENDENCY_CONFIDENCE = 0.9;
export const DEFAULT_MIN_SIMILARITY = 0.3;

export interface MatcherOptions {
	scorer?: SemanticScorer | null;
	/** Minimum semantic similarity for a semantic candidate */
	minSimilarity?: number;
}

export function compareMatches(a: MatchResult, b: MatchResult): number {
	return b.confidence - a.confidence || compareIds(a.id, b.id);
}

export class Matcher {
	private readonly scorer: SemanticScorer | null;
	private readonly minSimilarity: number;

	constructor(
		private readonly registry: CapabilityRegistry,
		options: MatcherOptions = {}
	) {
		this.scorer = options.scorer ?? null;
		this.minSimilarity = options.minSimilarity ?? DEFAULT_MIN_SIMILARITY;
	}

	get semanticEnabled(): boolean {
		return this.scorer !== null;
	}

	/**
	 * Return at most `topK` results, ordered by confidence then id. Each admitted
	 * primary match brings its declared dependencies along, and a primary is
	 * only admitted when it and those dependencies fit.
	 */
	async match(taskText: string, topK: number, options: MatchOptions = {}): Promise<MatchResult[]> {
		if (taskText.trim() === '' || topK <= 0) {
			return [];
		}

		// One snapshot per query; a concurrent reload does not affect this call
		const snapshot = this.registry.snapshot();
		const minConfidence = options.minConfidence ?? 0;

		const primaries = (await this.score(taskText, snapshot))
			.filter(result => result.confidence >= minConfidence)
			.sort(compareMatches);

		return this.expand(primaries, snapshot, topK);
	}

	private async score(taskText: string, snapshot: RegistrySnapshot): Promise<MatchResult[]> {
		const keyword = new Map<string, MatchResult>();
		for (const descriptor of snapshot.servers.values()) {
			const match = scoreKeywords(taskText, descriptor);
			if (match.score > 0) {
				keyword.set(descriptor.id, {
					id: descriptor.id,
					confidence: match.score,
					reason: describeKeywordMatch(match),
					source: 'keyword',
				});
			}
		}

		const semantic = await this.semanticScores(taskText, snapshot);
		if (!semantic) {
			return [...keyword.values()];
		}

		const fused = new Map<string, MatchResult>();
		for (const [id, similarity] of semantic) {
			if (similarity >= this.minSimilarity && snapshot.servers.has(id)) {
				fused.set(id, {
					id,
					confidence: similarity,
					reason: `semantic similarity ${similarity.toFixed(2)}`,
					source: 'semantic',
				});
			}
		}
		for (const [id, result] of keyword) {
			if (!fused.has(id)) {
				fused.set(id, result);
			}
		}
		return [...fused.values()];
	}

	private async semanticScores(
		taskText: string,
		snapshot: RegistrySnapshot
	): Promise<Map<string, number> | null> {
		if (!this.scorer) {
			return null;
		}
		try {
			return await this.scorer.score(taskText, snapshot);
		} catch (error) {
			logger.warn(`${LOG_PREFIX} Semantic scoring failed, using keyword matching only`, {
				scorer: this.scorer.name,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
	}

	private expand(primaries: MatchResult[], snapshot: RegistrySnapshot, topK: number): MatchResult[] {
		const results: MatchResult[] = [];
		const included = new Set<string>();

		for (const primary of primaries) {
			if (results.length >= topK) {
				break;
			}
			if (included.has(primary.id)) {
				continue;
			}

			const dependencies = [
				...new Set(snapshot.servers.get(primary.id)?.relatedServers ?? []),
			].filter(id => id !== primary.id && snapshot.servers.has(id) && !included.has(id));

			if (results.length + 1 + dependencies.length > topK) {
				logger.debug(
					`${LOG_PREFIX} Skipping ${primary.id}: it and its ${dependencies.length} dependencies do not fit in ${topK}`
				);
				continue;
			}

			results.push(primary);
			included.add(primary.id);
			for (const id of dependencies) {
				results.push({
					id,
					confidence: DEPENDENCY_CONFIDENCE,
					reason: `dependency of ${primary.id}`,
					source: 'dependency',
					dependencyOf: primary.id,
				});
				included.add(id);
			}
		}

		return results.sort(compareMatches);
	}
}
