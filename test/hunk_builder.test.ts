// test/hunk_builder.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    EMPTY_HUNK,
    SequenceBuffer,
    createHunk,
    createHunks,
    firstHunkOrEmpty,
    isEmptyHunk
} from '../src/index.js';

// =============== HELPER FUNCTIONS ===============

const bufferWithFlags = (flags: number[]): SequenceBuffer<number> => {
    const buffer = new SequenceBuffer(flags.map((_, i) => i));
    flags.forEach((flag, i) => buffer.setModified(i, flag === 1));
    return buffer;
};

suite('createHunks', () => {

    test('should yield nothing when no element is flagged', () => {
        const hunks = Array.from(createHunks(bufferWithFlags([0, 0, 0]), bufferWithFlags([0, 0, 0])));
        assert.deepStrictEqual(hunks, []);
    });

    test('should yield nothing for two empty buffers', () => {
        assert.deepStrictEqual(Array.from(createHunks(bufferWithFlags([]), bufferWithFlags([]))), []);
    });

    test('should emit an insertion and a deletion separated by a common element', () => {
        const hunks = Array.from(createHunks(bufferWithFlags([0, 1, 1, 0]), bufferWithFlags([1, 0, 0])));
        assert.deepStrictEqual(hunks, [
            { startA: 0, startB: 0, deletedA: 0, insertedB: 1 },
            { startA: 1, startB: 2, deletedA: 2, insertedB: 0 }
        ]);
    });

    test('should merge adjacent deletions and insertions into one replacement', () => {
        const hunks = Array.from(createHunks(bufferWithFlags([0, 1, 1, 0]), bufferWithFlags([0, 1, 0])));
        assert.deepStrictEqual(hunks, [{ startA: 1, startB: 1, deletedA: 2, insertedB: 1 }]);
    });

    test('should run to the end of B once A is used up', () => {
        const hunks = Array.from(createHunks(bufferWithFlags([]), bufferWithFlags([1, 1, 1])));
        assert.deepStrictEqual(hunks, [{ startA: 0, startB: 0, deletedA: 0, insertedB: 3 }]);
    });

    test('should run to the end of A once B is used up', () => {
        const hunks = Array.from(createHunks(bufferWithFlags([0, 1, 1]), bufferWithFlags([0])));
        assert.deepStrictEqual(hunks, [{ startA: 1, startB: 1, deletedA: 2, insertedB: 0 }]);
    });

    test('should produce hunks on demand', () => {
        const iterator = createHunks(bufferWithFlags([1, 0, 1]), bufferWithFlags([0]));
        const first = iterator.next();
        assert.deepStrictEqual(first, { value: { startA: 0, startB: 0, deletedA: 1, insertedB: 0 }, done: false });
        const second = iterator.next();
        assert.deepStrictEqual(second, { value: { startA: 2, startB: 1, deletedA: 1, insertedB: 0 }, done: false });
        assert.strictEqual(iterator.next().done, true);
    });

    test('should freeze every hunk', () => {
        const [hunk] = Array.from(createHunks(bufferWithFlags([1]), bufferWithFlags([])));
        assert.ok(Object.isFrozen(hunk));
    });
});

suite('Empty hunk sentinel', () => {

    test('should describe no difference', () => {
        assert.deepStrictEqual(EMPTY_HUNK, { startA: -1, startB: -1, deletedA: 0, insertedB: 0 });
        assert.strictEqual(isEmptyHunk(EMPTY_HUNK), true);
        assert.strictEqual(isEmptyHunk(createHunk(0, 0, 0, 1)), false);
    });

    test('should stand in for an empty hunk list', () => {
        assert.strictEqual(firstHunkOrEmpty([]), EMPTY_HUNK);
        const hunk = createHunk(3, 4, 1, 0);
        assert.strictEqual(firstHunkOrEmpty([hunk, createHunk(9, 9, 1, 1)]), hunk);
    });

    test('should pull only the first hunk of a lazy sequence', () => {
        let pulled = 0;
        function* counting() {
            pulled++;
            yield createHunk(0, 0, 1, 0);
            pulled++;
            yield createHunk(5, 4, 1, 0);
        }
        assert.deepStrictEqual(firstHunkOrEmpty(counting()), { startA: 0, startB: 0, deletedA: 1, insertedB: 0 });
        assert.strictEqual(pulled, 1);
    });
});
