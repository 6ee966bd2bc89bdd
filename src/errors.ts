/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Raised when the diff engine reaches a state its index arithmetic rules out,
 * e.g. a middle snake search that exhausts its rounds without an overlap.
 * Signals a bug in the engine, never a property of the input.
 */
export class InvariantViolationError extends Error {
	constructor(message: string) {
		super(`[MyersHunkDiff] ${message}`);
		this.name = 'InvariantViolationError';
	}
}
