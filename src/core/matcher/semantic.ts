/**
 * Embedding-backed semantic scorer.
 *
 * Descriptor vectors are built lazily on the first query against a registry
 * snapshot version and reused until the registry is reloaded. Concurrent
 * queries share one indexing run.
 */

import { logger } from '../logger/index.js';
import type { Embedder } from '../embedding/index.js';
import type { RegistrySnapshot, ServerDescriptor } from '../registry/index.js';
import type { SemanticScorer } from './types.js';

const LOG_PREFIX = '[Matcher:Semantic]';

interface DescriptorIndex {
	version: number;
	vectors: Promise<Map<string, number[]>>;
}

export function descriptorText(descriptor: ServerDescriptor): string {
	return [descriptor.purpose, ...descriptor.coveredTechnologies].join(' ').trim();
}

/**
 * Cosine similarity clamped to [0, 1]. Mismatched or zero vectors score 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length === 0 || a.length !== b.length) {
		return 0;
	}
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) {
		return 0;
	}
	const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
	return Math.min(1, Math.max(0, similarity));
}

export class EmbeddingScorer implements SemanticScorer {
	readonly name = 'embedding';
	private index?: DescriptorIndex;

	constructor(private readonly embedder: Embedder) {}

	async score(taskText: string, snapshot: RegistrySnapshot): Promise<Map<string, number>> {
		const [vectors, taskVector] = await Promise.all([
			this.vectorsFor(snapshot),
			this.embedder.embed(taskText),
		]);

		const scores = new Map<string, number>();
		for (const [id, vector] of vectors) {
			scores.set(id, cosineSimilarity(taskVector, vector));
		}
		return scores;
	}

	private vectorsFor(snapshot: RegistrySnapshot): Promise<Map<string, number[]>> {
		if (this.index && this.index.version === snapshot.version) {
			return this.index.vectors;
		}

		const index: DescriptorIndex = {
			version: snapshot.version,
			vectors: this.buildIndex(snapshot),
		};
		this.index = index;

		// A failed run must not stay cached
		index.vectors.catch(() => {
			if (this.index === index) {
				this.index = undefined;
			}
		});
		return index.vectors;
	}

	private async buildIndex(snapshot: RegistrySnapshot): Promise<Map<string, number[]>> {
		const descriptors = [...snapshot.servers.values()];
		const vectors = new Map<string, number[]>();
		if (descriptors.length === 0) {
			return vectors;
		}

		logger.debug(`${LOG_PREFIX} Indexing ${descriptors.length} descriptors (v${snapshot.version})`);
		const embeddings = await this.embedder.embedBatch(descriptors.map(descriptorText));
		descriptors.forEach((descriptor, position) => {
			const vector = embeddings[position];
			if (vector) {
				vectors.set(descriptor.id, vector);
			}
		});
		return vectors;
	}
}
