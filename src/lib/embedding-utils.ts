/**
 * Embedding Utilities
 *
 * Vector arithmetic shared by the embedding pipeline, the search service and
 * the local vector index.
 */

import type { TermBucketVector } from '../models/index-entry.js';

function assertSameLength(a: ArrayLike<number>, b: ArrayLike<number>): void {
	if (a.length !== b.length) {
		throw new Error(
			`Vectors must have the same dimensions (got ${a.length} and ${b.length})`
		);
	}
}

/**
 * Dot product of two dense vectors
 *
 * @throws Error if vectors have different dimensions
 */
export function dotProduct(a: readonly number[], b: readonly number[]): number {
	assertSameLength(a, b);

	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		sum += (a[i] ?? 0) * (b[i] ?? 0);
	}
	return sum;
}

/**
 * Compute cosine similarity between two vectors
 *
 * Range: [-1, 1], higher is more similar. Zero vectors score 0.
 *
 * @throws Error if vectors have different dimensions
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	assertSameLength(a, b);

	let dot = 0;
	let magnitudeA = 0;
	let magnitudeB = 0;

	for (let i = 0; i < a.length; i++) {
		const aVal = a[i] ?? 0;
		const bVal = b[i] ?? 0;
		dot += aVal * bVal;
		magnitudeA += aVal * aVal;
		magnitudeB += bVal * bVal;
	}

	const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

	// Handle zero vectors (avoid division by zero)
	if (magnitude === 0) {
		return 0;
	}

	return dot / magnitude;
}

/**
 * Squared Euclidean distance, lower is more similar
 */
export function squaredL2Distance(a: readonly number[], b: readonly number[]): number {
	assertSameLength(a, b);

	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		sum += diff * diff;
	}
	return sum;
}

/**
 * Dot product of two sparse vectors over the same bucket space
 */
export function sparseDotProduct(a: TermBucketVector, b: TermBucketVector): number {
	const weights = new Map<number, number>();
	a.dimensions.forEach((dimension, i) => {
		weights.set(dimension, (weights.get(dimension) ?? 0) + (a.values[i] ?? 0));
	});

	let sum = 0;
	b.dimensions.forEach((dimension, i) => {
		const weight = weights.get(dimension);
		if (weight !== undefined) {
			sum += weight * (b.values[i] ?? 0);
		}
	});
	return sum;
}

/**
 * Whether every component is a finite number
 */
export function isFiniteVector(vector: readonly number[]): boolean {
	return vector.every((value) => Number.isFinite(value));
}

/**
 * Normalize a vector to unit length (L2 normalization)
 *
 * Zero vectors are returned unchanged.
 */
export function normalizeVector(vector: readonly number[]): number[] {
	let magnitude = 0;
	for (let i = 0; i < vector.length; i++) {
		const val = vector[i] ?? 0;
		magnitude += val * val;
	}

	magnitude = Math.sqrt(magnitude);

	if (magnitude === 0) {
		return [...vector];
	}

	return vector.map((v) => v / magnitude);
}

/**
 * Embedding APIs reject empty content; blank text becomes a single space
 */
export function asNonEmptyText(text: string): string {
	const trimmed = text.trim();
	return trimmed ? trimmed : ' ';
}
