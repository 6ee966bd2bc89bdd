// test/edit_script.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import { DiffOperation, createHunk, diff, toEditScript, type DiffResult } from '../src/index.js';

suite('toEditScript', () => {

    test('should expand a replacement between common elements', () => {
        const script = toEditScript([1, 2, 3, 4, 5], [1, 2, 9, 4, 5], [createHunk(2, 2, 1, 1)]);
        const expected: DiffResult<number>[] = [
            [DiffOperation.EQUAL, 1],
            [DiffOperation.EQUAL, 2],
            [DiffOperation.REMOVE, 3],
            [DiffOperation.ADD, 9],
            [DiffOperation.EQUAL, 4],
            [DiffOperation.EQUAL, 5]
        ];
        assert.deepStrictEqual(script, expected);
    });

    test('should list the removals of a hunk before its additions', () => {
        const script = toEditScript(['a', 'b'], ['x', 'y', 'z'], diff(['a', 'b'], ['x', 'y', 'z']));
        assert.deepStrictEqual(script, [
            [DiffOperation.REMOVE, 'a'],
            [DiffOperation.REMOVE, 'b'],
            [DiffOperation.ADD, 'x'],
            [DiffOperation.ADD, 'y'],
            [DiffOperation.ADD, 'z']
        ]);
    });

    test('should mark everything equal without hunks', () => {
        assert.deepStrictEqual(toEditScript(['a', 'b'], ['a', 'b'], []), [
            [DiffOperation.EQUAL, 'a'],
            [DiffOperation.EQUAL, 'b']
        ]);
    });

    test('should return an empty script for two empty sequences', () => {
        assert.deepStrictEqual(toEditScript([], [], []), []);
    });

    test('should reject hunks whose common runs do not line up', () => {
        assert.throws(() => toEditScript([1, 2], [1, 2], [createHunk(1, 0, 0, 0)]), RangeError);
        assert.throws(() => toEditScript([1, 2, 3], [1, 2], []), /Hunks do not line up/);
    });

    test('should reject hunks that run past the end of a sequence', () => {
        assert.throws(() => toEditScript([1, 2], [], [createHunk(0, 0, 3, 0)]), /runs past the end/);
    });

    test('should reject hunks out of order', () => {
        const hunks = [createHunk(2, 2, 1, 0), createHunk(0, 0, 1, 0)];
        assert.throws(() => toEditScript([1, 2, 3], [1, 2], hunks), RangeError);
    });
});
