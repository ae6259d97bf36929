import { describe, it, expect, vi } from 'vitest';
import { EmbeddingScorer, cosineSimilarity, descriptorText } from '../semantic.js';
import { CapabilityRegistry, buildDescriptor, descriptorEntrySchema } from '../../registry/index.js';
import type { Embedder } from '../../embedding/index.js';

vi.mock('../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		silly: vi.fn(),
	},
}));

// Texts mentioning redis point along x, everything else along y
const vectorFor = (text: string): number[] => (text.includes('redis') ? [1, 0] : [0, 1]);

const createEmbedder = () => {
	const embedder = {
		embed: vi.fn(async (text: string) => vectorFor(text)),
		embedBatch: vi.fn(async (texts: string[]) => texts.map(vectorFor)),
		getDimension: () => 2,
		disconnect: vi.fn(async () => undefined),
	} satisfies Embedder;
	return embedder;
};

const servers = {
	servers: {
		redis: { purpose: 'Key-value store', coveredTechnologies: ['redis'] },
		docs: { purpose: 'Documentation lookup', coveredTechnologies: ['documentation'] },
	},
};

const createRegistry = () =>
	CapabilityRegistry.fromDescriptors([
		buildDescriptor('redis', descriptorEntrySchema.parse(servers.servers.redis)),
		buildDescriptor('docs', descriptorEntrySchema.parse(servers.servers.docs)),
	]);

describe('cosineSimilarity', () => {
	it('should be 1 for parallel vectors', () => {
		expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
	});

	it('should be 0 for orthogonal vectors', () => {
		expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
	});

	it('should clamp negative similarity to 0', () => {
		expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
	});

	it('should be 0 for mismatched or zero vectors', () => {
		expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
		expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
		expect(cosineSimilarity([], [])).toBe(0);
	});
});

describe('descriptorText', () => {
	it('should join purpose and technologies', () => {
		const registry = createRegistry();
		const redis = registry.get('redis');
		expect(redis && descriptorText(redis)).toBe('Key-value store redis');
	});
});

describe('EmbeddingScorer', () => {
	it('should score every descriptor against the task', async () => {
		const embedder = createEmbedder();
		const registry = createRegistry();
		const scorer = new EmbeddingScorer(embedder);

		const scores = await scorer.score('use redis', registry.snapshot());

		expect(scores).toEqual(
			new Map([
				['redis', 1],
				['docs', 0],
			])
		);
	});

	it('should index descriptors once per snapshot version', async () => {
		const embedder = createEmbedder();
		const registry = createRegistry();
		const scorer = new EmbeddingScorer(embedder);

		await scorer.score('first', registry.snapshot());
		await scorer.score('second', registry.snapshot());
		expect(embedder.embedBatch).toHaveBeenCalledTimes(1);

		await registry.reload(servers);
		await scorer.score('third', registry.snapshot());
		expect(embedder.embedBatch).toHaveBeenCalledTimes(2);
	});

	it('should share one indexing run between concurrent queries', async () => {
		const embedder = createEmbedder();
		const registry = createRegistry();
		const scorer = new EmbeddingScorer(embedder);

		await Promise.all([
			scorer.score('a', registry.snapshot()),
			scorer.score('b', registry.snapshot()),
			scorer.score('c', registry.snapshot()),
		]);

		expect(embedder.embedBatch).toHaveBeenCalledTimes(1);
		expect(embedder.embed).toHaveBeenCalledTimes(3);
	});

	it('should retry indexing after a failed run', async () => {
		const embedder = createEmbedder();
		embedder.embedBatch.mockRejectedValueOnce(new Error('rate limited'));
		const registry = createRegistry();
		const scorer = new EmbeddingScorer(embedder);

		await expect(scorer.score('redis', registry.snapshot())).rejects.toThrow('rate limited');
		await expect(scorer.score('redis', registry.snapshot())).resolves.toEqual(
			new Map([
				['redis', 1],
				['docs', 0],
			])
		);
		expect(embedder.embedBatch).toHaveBeenCalledTimes(2);
	});
});
