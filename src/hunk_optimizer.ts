/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { createHunks, type Hunk } from './hunk_builder.js';
import { SequenceBuffer, sameValue, type EqualityComparer } from './sequence_buffer.js';

/**
 * Slides every modified run of `buffer` as far towards the end as equal
 * elements allow.
 *
 * A run `[start, end)` can move one step when `data[start]` equals
 * `data[end]`: the element leaving the run and the element joining it are
 * interchangeable, so the flags describe an equally short edit. One left to
 * right pass; a run that slides into the next one continues as a single run.
 */
export function optimize<T>(buffer: SequenceBuffer<T>, equals: EqualityComparer<T> = sameValue): void {
	const { data, length } = buffer;
	let startPos = 0;

	while (startPos < length) {
		while (startPos < length && !buffer.isModified(startPos)) {
			startPos++;
		}
		let endPos = startPos;
		while (endPos < length && buffer.isModified(endPos)) {
			endPos++;
		}

		if (endPos < length && equals(data[startPos], data[endPos])) {
			buffer.setModified(startPos, false);
			buffer.setModified(endPos, true);
		} else {
			startPos = endPos;
		}
	}
}

/**
 * Canonicalizes the boundaries of an existing hunk list.
 *
 * @param hunks - Hunks previously computed for `sequenceA` and `sequenceB`.
 * @returns The hunks after {@link optimize} has run on both sides.
 */
export function optimizeHunks<T>(
	sequenceA: readonly T[],
	sequenceB: readonly T[],
	hunks: Iterable<Hunk>,
	equals: EqualityComparer<T> = sameValue
): Hunk[] {
	const dataA = new SequenceBuffer(sequenceA);
	const dataB = new SequenceBuffer(sequenceB);

	for (const hunk of hunks) {
		dataA.markModified(hunk.startA, hunk.startA + hunk.deletedA);
		dataB.markModified(hunk.startB, hunk.startB + hunk.insertedB);
	}

	optimize(dataA, equals);
	optimize(dataB, equals);

	return Array.from(createHunks(dataA, dataB));
}
