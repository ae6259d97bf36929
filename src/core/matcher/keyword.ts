import type { ServerDescriptor } from '../registry/index.js';

export const TAG_WEIGHT = 0.5;
export const PURPOSE_WEIGHT = 0.3;
const MIN_PURPOSE_WORD_LENGTH = 3;

export interface KeywordScore {
	score: number;
	matchedTags: string[];
	purposeWords: string[];
}

export function tokenize(text: string): string[] {
	return text
		.toLowerCase()
		.replace(/[^\p{L}\p{N}\s]/gu, ' ')
		.split(/\s+/)
		.filter(word => word.length > 0);
}

/**
 * Score a descriptor against a task: +0.5 per covered technology found as a
 * substring of the task, +0.3 when any purpose word of three or more letters
 * appears in the task text. Clamped to 1.
 */
export function scoreKeywords(taskText: string, descriptor: ServerDescriptor): KeywordScore {
	const lowered = taskText.toLowerCase();

	const matchedTags = descriptor.coveredTechnologies.filter(tag => {
		const needle = tag.toLowerCase();
		return needle.length > 0 && lowered.includes(needle);
	});

	const purposeWords = [
		...new Set(
			tokenize(descriptor.purpose).filter(
				word => word.length >= MIN_PURPOSE_WORD_LENGTH && lowered.includes(word)
			)
		),
	];

	const raw = matchedTags.length * TAG_WEIGHT + (purposeWords.length > 0 ? PURPOSE_WEIGHT : 0);
	return { score: Math.min(1, raw), matchedTags, purposeWords };
}

export function describeKeywordMatch(match: KeywordScore): string {
	const parts: string[] = [];
	if (match.matchedTags.length > 0) {
		parts.push(`technologies: ${match.matchedTags.join(', ')}`);
	}
	if (match.purposeWords.length > 0) {
		parts.push(`purpose mentions: ${match.purposeWords.join(', ')}`);
	}
	return `keyword match (${parts.join('; ')})`;
}
