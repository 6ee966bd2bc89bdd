/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { InvariantViolationError } from './errors.js';
import { createHunks, type Hunk } from './hunk_builder.js';
import { optimize } from './hunk_optimizer.js';
import { SearchVectors } from './middle_snake.js';
import { computeLcs } from './recursive_lcs.js';
import { SequenceBuffer, sameValue, type EqualityComparer } from './sequence_buffer.js';

/**
 * Configuration options for a comparison.
 */
export interface DiffOptions<T> {
	/** If true, ambiguous hunk boundaries are shifted to their latest equivalent position. */
	optimize?: boolean;
	/** Element equality. Defaults to SameValue (`Object.is`). */
	equals?: EqualityComparer<T>;
	/** Enables verbose logging of every bisection. */
	debug?: boolean;
}

/**
 * The two flagged sides of a finished comparison.
 */
export interface ComparedSequences<T> {
	dataA: SequenceBuffer<T>;
	dataB: SequenceBuffer<T>;
}

/** Sequence input; `null` and `undefined` stand for an empty sequence. */
export type SequenceInput<T> = readonly T[] | null | undefined;

/**
 * Myers O(ND) difference engine producing edit hunks.
 *
 * Works on two sequences of opaque elements that only need an equality test,
 * typically per-line hash codes or characters. The comparison flags, per
 * side, every element outside a longest common subsequence; the flags are
 * then scanned into {@link Hunk}s.
 *
 * ### Pipeline
 *
 * - **Linear-space Myers**: the ranges are bisected at their shortest middle
 * snake until one side of a range is empty. Common prefixes and suffixes of
 * every range are stripped first.
 * - **Shared search vectors**: one pair of frontier vectors per comparison,
 * reused by every bisection.
 * - **Hunk scan**: a single forward pass over both flag arrays.
 * - **Optimizer** (opt-in): slides ambiguous boundaries to a canonical spot.
 *
 * Every call owns its buffers and vectors, so one instance can serve any
 * number of comparisons.
 *
 * @example
 * ```typescript
 * const differ = new MyersHunkDiff();
 * const hunks = differ.diff([1, 2, 3, 4, 5], [1, 2, 9, 4, 5]);
 * // [{ startA: 2, startB: 2, deletedA: 1, insertedB: 1 }]
 *
 * const chars = differ.diffCharacters('kitten', 'sitting', { optimize: true });
 * ```
 */
export class MyersHunkDiff {
	public static readonly defaultOptions: Required<Omit<DiffOptions<unknown>, 'equals'>> = {
		optimize: false,
		debug: false,
	};

	/**
	 * Computes the hunks turning `sequenceA` into `sequenceB`.
	 *
	 * @returns The hunks in ascending order; empty when the sequences are equal.
	 * @throws InvariantViolationError if the engine detects an internal inconsistency.
	 */
	public diff<T>(sequenceA: SequenceInput<T>, sequenceB: SequenceInput<T>, options?: DiffOptions<T>): Hunk[] {
		return Array.from(this.hunks(sequenceA, sequenceB, options));
	}

	/**
	 * Lazy form of {@link diff}. The comparison runs when iteration starts;
	 * hunks are then produced one at a time, so a caller may stop early.
	 */
	public *hunks<T>(sequenceA: SequenceInput<T>, sequenceB: SequenceInput<T>, options?: DiffOptions<T>): Generator<Hunk, void, undefined> {
		const { dataA, dataB } = this.compare(sequenceA, sequenceB, options);
		yield* createHunks(dataA, dataB);
	}

	/**
	 * Character-level diff. Each UTF-16 code unit is one element, so hunk
	 * positions are string offsets.
	 */
	public diffCharacters(
		left: string | null | undefined,
		right: string | null | undefined,
		options?: DiffOptions<string>
	): Hunk[] {
		return this.diff((left ?? '').split(''), (right ?? '').split(''), options);
	}

	/**
	 * Runs the comparison and returns both sides with their modified flags set.
	 */
	public compare<T>(sequenceA: SequenceInput<T>, sequenceB: SequenceInput<T>, options?: DiffOptions<T>): ComparedSequences<T> {
		const config = { ...MyersHunkDiff.defaultOptions, ...options };
		const equals: EqualityComparer<T> = options?.equals ?? sameValue;
		const debug = config.debug;

		const dataA = new SequenceBuffer<T>(sequenceA ?? []);
		const dataB = new SequenceBuffer<T>(sequenceB ?? []);

		if (debug) {
			console.group(`[MyersHunkDiff] compare |A|=${dataA.length}, |B|=${dataB.length}`);
		}

		const vectors = new SearchVectors(dataA.length, dataB.length);
		computeLcs(dataA, 0, dataA.length, dataB, 0, dataB.length, vectors, equals, debug);

		const commonA = dataA.countUnmodified();
		const commonB = dataB.countUnmodified();
		if (commonA !== commonB) {
			if (debug) console.groupEnd();
			throw new InvariantViolationError(
				`Common subsequence lengths disagree: ${commonA} unmodified in A, ${commonB} in B.`
			);
		}

		if (config.optimize) {
			optimize(dataA, equals);
			optimize(dataB, equals);
		}

		if (debug) {
			console.log(`[MyersHunkDiff] common=${commonA}, deleted=${dataA.length - commonA}, inserted=${dataB.length - commonB}`);
			console.groupEnd();
		}

		return { dataA, dataB };
	}
}

const defaultEngine = new MyersHunkDiff();

/**
 * Computes the hunks turning `sequenceA` into `sequenceB` with a shared engine.
 */
export function diff<T>(sequenceA: SequenceInput<T>, sequenceB: SequenceInput<T>, options?: DiffOptions<T>): Hunk[] {
	return defaultEngine.diff(sequenceA, sequenceB, options);
}

/**
 * Character-level {@link diff}; `null` and `undefined` count as empty strings.
 */
export function diffCharacters(
	left: string | null | undefined,
	right: string | null | undefined,
	options?: DiffOptions<string>
): Hunk[] {
	return defaultEngine.diffCharacters(left, right, options);
}
