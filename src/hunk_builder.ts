/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { SequenceBuffer } from './sequence_buffer.js';

/**
 * A single edit region.
 *
 * At `startA`, `deletedA` elements of A are absent from B; at `startB`,
 * `insertedB` elements of B are absent from A. `deletedA === 0` is a pure
 * insertion, `insertedB === 0` a pure deletion, both non-zero a replacement.
 * @example { startA: 2, startB: 2, deletedA: 1, insertedB: 1 }
 */
export interface Hunk {
	readonly startA: number;
	readonly startB: number;
	readonly deletedA: number;
	readonly insertedB: number;
}

/** Stands for "no difference" where a single value is needed. */
export const EMPTY_HUNK: Hunk = Object.freeze({ startA: -1, startB: -1, deletedA: 0, insertedB: 0 });

export function createHunk(startA: number, startB: number, deletedA: number, insertedB: number): Hunk {
	return Object.freeze({ startA, startB, deletedA, insertedB });
}

export function isEmptyHunk(hunk: Hunk): boolean {
	return hunk.startA === -1 && hunk.startB === -1 && hunk.deletedA === 0 && hunk.insertedB === 0;
}

/**
 * Returns the first hunk of `hunks`, or {@link EMPTY_HUNK} when there is none.
 * Only the first element of a lazy sequence is pulled.
 */
export function firstHunkOrEmpty(hunks: Iterable<Hunk>): Hunk {
	for (const hunk of hunks) {
		return hunk;
	}
	return EMPTY_HUNK;
}

/**
 * Scans the modified flags of both buffers and yields the edit hunks in
 * ascending order.
 *
 * The two cursors move independently: a pair of unmodified elements is a
 * common element, anything else opens a hunk that runs over the modified
 * elements of A and of B (or the rest of one side once the other is used up).
 */
export function* createHunks<T>(dataA: SequenceBuffer<T>, dataB: SequenceBuffer<T>): Generator<Hunk, void, undefined> {
	const lengthA = dataA.length;
	const lengthB = dataB.length;
	let lineA = 0;
	let lineB = 0;

	while (lineA < lengthA || lineB < lengthB) {
		if (lineA < lengthA && !dataA.isModified(lineA) && lineB < lengthB && !dataB.isModified(lineB)) {
			// equal elements
			lineA++;
			lineB++;
			continue;
		}

		const startA = lineA;
		const startB = lineB;

		while (lineA < lengthA && (lineB >= lengthB || dataA.isModified(lineA))) {
			lineA++;
		}
		while (lineB < lengthB && (lineA >= lengthA || dataB.isModified(lineB))) {
			lineB++;
		}

		if (startA < lineA || startB < lineB) {
			yield createHunk(startA, startB, lineA - startA, lineB - startB);
		}
	}
}
