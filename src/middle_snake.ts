/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { InvariantViolationError } from './errors.js';
import type { EqualityComparer, SequenceBuffer } from './sequence_buffer.js';

/**
 * Result of the middle snake search.
 * @internal
 */
export interface MiddleSnake {
	/** X coordinate (position in A) of a point on a shortest edit path. */
	x: number;
	/** Y coordinate (position in B) of the same point. */
	y: number;
	/** Length of the shortest edit script between the two searched ranges. */
	editDistance: number;
}

/**
 * Frontier vectors for the forward (`down`) and backward (`up`) searches.
 *
 * Allocated once per comparison, sized for the full sequences, and shared by
 * every bisection of that comparison. Diagonals may be negative; they are
 * mapped onto the arrays through {@link diagonalOffset} and
 * {@link diagonalIndex}.
 * @internal
 */
export class SearchVectors {
	public readonly max: number;
	public readonly down: Int32Array;
	public readonly up: Int32Array;

	constructor(lengthA: number, lengthB: number) {
		this.max = lengthA + lengthB + 1;
		this.down = new Int32Array(2 * this.max + 2);
		this.up = new Int32Array(2 * this.max + 2);
	}

	public get size(): number {
		return this.down.length;
	}
}

/**
 * Offset that maps the start diagonal of a search onto slot `max`.
 */
export function diagonalOffset(max: number, startK: number): number {
	return max - startK;
}

/**
 * Maps diagonal `k` to its slot in a search vector of `size` entries.
 * @throws InvariantViolationError if the slot falls outside the vector.
 */
export function diagonalIndex(offset: number, k: number, size: number): number {
	const index = offset + k;
	if (index < 0 || index >= size) {
		throw new InvariantViolationError(`Diagonal ${k} maps to slot ${index}, outside a search vector of size ${size}.`);
	}
	return index;
}

function validateRange(name: string, lower: number, upper: number, length: number): void {
	if (lower < 0 || upper > length || lower >= upper) {
		throw new InvariantViolationError(`Middle snake needs a non-empty range inside ${name}, got [${lower}, ${upper}) of ${length}.`);
	}
}

/**
 * Finds the shortest middle snake of `A[lowerA, upperA)` and `B[lowerB, upperB)`.
 *
 * Runs the forward search from the top-left corner and the backward search
 * from the bottom-right corner one edit distance `d` at a time. When `delta`
 * (the difference of the range lengths) is odd, the forward pass can be the
 * first to reach the backward frontier; when it is even, the backward pass is.
 * The first overlap yields a point on a shortest path.
 *
 * @param vectors - Shared scratch vectors; their contents on entry do not matter.
 * @returns The bisection point and the edit distance of the two ranges.
 * @throws InvariantViolationError on an empty or out-of-bounds range, or when no overlap is found.
 */
export function findMiddleSnake<T>(
	dataA: SequenceBuffer<T>, lowerA: number, upperA: number,
	dataB: SequenceBuffer<T>, lowerB: number, upperB: number,
	vectors: SearchVectors,
	equals: EqualityComparer<T>,
	debug: boolean = false
): MiddleSnake {
	validateRange('A', lowerA, upperA, dataA.length);
	validateRange('B', lowerB, upperB, dataB.length);

	const a = dataA.data;
	const b = dataB.data;
	const { down, up, max, size } = vectors;

	// k-line where the forward search starts
	const downK = lowerA - lowerB;
	// k-line where the backward search starts
	const upK = upperA - upperB;

	const delta = (upperA - lowerA) - (upperB - lowerB);
	const oddDelta = (delta & 1) !== 0;

	const downOffset = diagonalOffset(max, downK);
	const upOffset = diagonalOffset(max, upK);

	const maxD = Math.floor((upperA - lowerA + upperB - lowerB) / 2) + 1;

	if (debug) {
		console.log(`[findMiddleSnake] A[${lowerA}, ${upperA}) B[${lowerB}, ${upperB}) delta=${delta}, maxD=${maxD}`);
	}

	down[diagonalIndex(downOffset, downK + 1, size)] = lowerA;
	up[diagonalIndex(upOffset, upK - 1, size)] = upperA;

	for (let d = 0; d <= maxD; d++) {

		// Forward pass
		for (let k = downK - d; k <= downK + d; k += 2) {
			let x: number;
			if (k === downK - d) {
				x = down[diagonalIndex(downOffset, k + 1, size)]; // down
			} else {
				x = down[diagonalIndex(downOffset, k - 1, size)] + 1; // right
				if (k < downK + d) {
					const below = down[diagonalIndex(downOffset, k + 1, size)];
					if (below >= x) x = below; // down
				}
			}
			let y = x - k;

			while (x < upperA && y < upperB && equals(a[x], b[y])) {
				x++;
				y++;
			}
			down[diagonalIndex(downOffset, k, size)] = x;

			if (oddDelta && upK - d < k && k < upK + d) {
				if (up[diagonalIndex(upOffset, k, size)] <= x) {
					if (debug) {
						console.log(`[findMiddleSnake] forward overlap at d=${d}, k=${k}: (${x}, ${x - k})`);
					}
					return { x, y: x - k, editDistance: 2 * d - 1 };
				}
			}
		}

		// Backward pass
		for (let k = upK - d; k <= upK + d; k += 2) {
			let x: number;
			if (k === upK + d) {
				x = up[diagonalIndex(upOffset, k - 1, size)]; // up
			} else {
				x = up[diagonalIndex(upOffset, k + 1, size)] - 1; // left
				if (k > upK - d) {
					const above = up[diagonalIndex(upOffset, k - 1, size)];
					if (above < x) x = above; // up
				}
			}
			let y = x - k;

			while (x > lowerA && y > lowerB && equals(a[x - 1], b[y - 1])) {
				x--;
				y--;
			}
			up[diagonalIndex(upOffset, k, size)] = x;

			if (!oddDelta && downK - d <= k && k <= downK + d) {
				const forwardX = down[diagonalIndex(downOffset, k, size)];
				if (x <= forwardX) {
					if (debug) {
						console.log(`[findMiddleSnake] backward overlap at d=${d}, k=${k}: (${forwardX}, ${forwardX - k})`);
					}
					return { x: forwardX, y: forwardX - k, editDistance: 2 * d };
				}
			}
		}
	}

	throw new InvariantViolationError(
		`No middle snake found within ${maxD} rounds for A[${lowerA}, ${upperA}) B[${lowerB}, ${upperB}).`
	);
}
