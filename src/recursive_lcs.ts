/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { findMiddleSnake, type SearchVectors } from './middle_snake.js';
import type { EqualityComparer, SequenceBuffer } from './sequence_buffer.js';

/**
 * A pair of sub-ranges still waiting to be compared.
 * @internal
 */
interface PendingRange {
	lowerA: number;
	upperA: number;
	lowerB: number;
	upperB: number;
}

/**
 * Divide-and-conquer longest common subsequence.
 *
 * Flags every element of `A[lowerA, upperA)` and `B[lowerB, upperB)` that is
 * not on an optimal common subsequence. Each range is first trimmed of its
 * common prefix and suffix; a range left empty on one side is a pure
 * insertion or deletion, anything else is bisected at its middle snake.
 *
 * The bisection runs on an explicit stack rather than the call stack, and
 * the left half of every split is processed before the right half.
 */
export function computeLcs<T>(
	dataA: SequenceBuffer<T>, lowerA: number, upperA: number,
	dataB: SequenceBuffer<T>, lowerB: number, upperB: number,
	vectors: SearchVectors,
	equals: EqualityComparer<T>,
	debug: boolean = false
): void {
	const a = dataA.data;
	const b = dataB.data;
	const pending: PendingRange[] = [{ lowerA, upperA, lowerB, upperB }];

	let range: PendingRange | undefined;
	while ((range = pending.pop()) !== undefined) {
		let { lowerA: la, upperA: ua, lowerB: lb, upperB: ub } = range;

		// Common prefix
		while (la < ua && lb < ub && equals(a[la], b[lb])) {
			la++;
			lb++;
		}

		// Common suffix
		while (la < ua && lb < ub && equals(a[ua - 1], b[ub - 1])) {
			ua--;
			ub--;
		}

		if (la === ua) {
			dataB.markModified(lb, ub); // inserted
		} else if (lb === ub) {
			dataA.markModified(la, ua); // deleted
		} else {
			const snake = findMiddleSnake(dataA, la, ua, dataB, lb, ub, vectors, equals, debug);

			if (debug) {
				console.log(`[computeLcs] split A[${la}, ${ua}) B[${lb}, ${ub}) at (${snake.x}, ${snake.y}), d=${snake.editDistance}`);
			}

			pending.push({ lowerA: snake.x, upperA: ua, lowerB: snake.y, upperB: ub });
			pending.push({ lowerA: la, upperA: snake.x, lowerB: lb, upperB: snake.y });
		}
	}
}
