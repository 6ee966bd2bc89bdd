/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Equality test between two sequence elements.
 * The engine never orders or hashes elements, so this is all it needs.
 */
export type EqualityComparer<T> = (left: T, right: T) => boolean;

/** SameValue equality: like `===`, but `NaN` equals itself. */
export const sameValue: EqualityComparer<unknown> = Object.is;

/**
 * One side of a comparison: the read-only elements plus a flag per element
 * marking it as not part of the common subsequence (deleted from A or
 * inserted into B).
 *
 * The flag array carries two sentinel slots past the end.
 */
export class SequenceBuffer<T> {
	public readonly length: number;
	public readonly modified: Uint8Array;

	constructor(public readonly data: readonly T[]) {
		this.length = data.length;
		this.modified = new Uint8Array(this.length + 2);
	}

	public isModified(index: number): boolean {
		return this.modified[index] === 1;
	}

	public setModified(index: number, flag: boolean): void {
		this.modified[index] = flag ? 1 : 0;
	}

	/**
	 * Flags every position in `[start, end)`.
	 */
	public markModified(start: number, end: number): void {
		if (start < end) {
			this.modified.fill(1, start, end);
		}
	}

	public countUnmodified(): number {
		let count = 0;
		for (let i = 0; i < this.length; i++) {
			if (this.modified[i] === 0) count++;
		}
		return count;
	}
}
