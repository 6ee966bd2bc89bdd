/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Hunk } from './hunk_builder.js';

/**
 * Enumerates the types of operations in an edit script.
 */
export enum DiffOperation {
	/** Represents an element present in both sequences. */
	EQUAL,
	/** Represents an element that was added (present only in B). */
	ADD,
	/** Represents an element that was removed (present only in A). */
	REMOVE,
}

/**
 * A single entry of an edit script: the operation and the element it applies to.
 * @example [DiffOperation.EQUAL, 'some line']
 */
export type DiffResult<T> = [DiffOperation, T];

/**
 * Expands a hunk list into a per-element edit script.
 *
 * The elements between hunks become EQUAL entries; inside a hunk the REMOVE
 * entries come before the ADD entries.
 *
 * @param hunks - Hunks computed for exactly these two sequences, in ascending order.
 * @throws RangeError if the hunks do not line up with the sequences.
 */
export function toEditScript<T>(
	sequenceA: readonly T[],
	sequenceB: readonly T[],
	hunks: Iterable<Hunk>
): DiffResult<T>[] {
	const result: DiffResult<T>[] = [];
	let posA = 0;
	let posB = 0;

	const pushEqual = (untilA: number, untilB: number): void => {
		if (untilA - posA !== untilB - posB || untilA < posA) {
			throw new RangeError(
				`[MyersHunkDiff] Hunks do not line up: common run A[${posA}, ${untilA}) vs B[${posB}, ${untilB}).`
			);
		}
		while (posA < untilA) {
			result.push([DiffOperation.EQUAL, sequenceA[posA]]);
			posA++;
			posB++;
		}
	};

	for (const hunk of hunks) {
		pushEqual(hunk.startA, hunk.startB);

		const endA = hunk.startA + hunk.deletedA;
		const endB = hunk.startB + hunk.insertedB;
		if (endA > sequenceA.length || endB > sequenceB.length) {
			throw new RangeError(
				`[MyersHunkDiff] Hunk A[${hunk.startA}, ${endA}) B[${hunk.startB}, ${endB}) runs past the end of its sequence.`
			);
		}

		for (; posA < endA; posA++) {
			result.push([DiffOperation.REMOVE, sequenceA[posA]]);
		}
		for (; posB < endB; posB++) {
			result.push([DiffOperation.ADD, sequenceB[posB]]);
		}
	}

	pushEqual(sequenceA.length, sequenceB.length);
	return result;
}
