// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Aleks Fishan
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Core Engine and Types
export {
	MyersHunkDiff,
	diff,
	diffCharacters,
	type ComparedSequences,
	type DiffOptions,
	type SequenceInput
} from './myers_hunk_diff.js';
export {
	EMPTY_HUNK,
	createHunk,
	createHunks,
	firstHunkOrEmpty,
	isEmptyHunk,
	type Hunk
} from './hunk_builder.js';
export { InvariantViolationError } from './errors.js';

// Building Blocks
export { SequenceBuffer, sameValue, type EqualityComparer } from './sequence_buffer.js';
export {
	SearchVectors,
	diagonalIndex,
	diagonalOffset,
	findMiddleSnake,
	type MiddleSnake
} from './middle_snake.js';
export { computeLcs } from './recursive_lcs.js';

// Post-processing
export { optimize, optimizeHunks } from './hunk_optimizer.js';
export { DiffOperation, toEditScript, type DiffResult } from './edit_script.js';
