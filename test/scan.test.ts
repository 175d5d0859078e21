// test/scan.test.ts
import { suite, test } from 'mocha';
import * as assert from 'assert';
import {
    MarkArray,
    RollingHash,
    buildHashIndex,
    createMatch,
    extendMatch,
    forEachUnmarkedWindow,
    scanPatterns,
    type Match
} from '../src/index.js';

// =============== HELPER FUNCTIONS ===============

const bytes = (s: string): Uint8Array => new TextEncoder().encode(s);

const hashOf = (s: string): number => new RollingHash(bytes(s), 0, s.length).getHash();

const allStarts = (index: Map<number, number[]>): number[] =>
    [...index.values()].flat().sort((a, b) => a - b);

// =============== TESTS FOR forEachUnmarkedWindow ===============

suite('Direct Test: forEachUnmarkedWindow', () => {

    test('should visit every window of an unmarked sequence', () => {
        const starts: number[] = [];
        const stopped = forEachUnmarkedWindow(bytes('abcde'), new MarkArray(5), 2, (start) => { starts.push(start); });
        assert.deepStrictEqual(starts, [0, 1, 2, 3]);
        assert.strictEqual(stopped, false);
    });

    test('should never visit a window containing a marked position', () => {
        const marks = new MarkArray(10);
        marks.markRange(3, 1);
        marks.markRange(5, 1);
        const starts: number[] = [];
        forEachUnmarkedWindow(bytes('abcdefghij'), marks, 2, (start) => { starts.push(start); });
        assert.deepStrictEqual(starts, [0, 1, 6, 7, 8]);
    });

    test('should stop when the visitor returns true', () => {
        const starts: number[] = [];
        const stopped = forEachUnmarkedWindow(bytes('abcdef'), new MarkArray(6), 3, (start) => {
            starts.push(start);
            return start === 1;
        });
        assert.deepStrictEqual(starts, [0, 1]);
        assert.strictEqual(stopped, true);
    });

    test('should pass the checksum of each window', () => {
        const hashes: number[] = [];
        forEachUnmarkedWindow(bytes('xabcx'), new MarkArray(5), 3, (_start, hash) => { hashes.push(hash); });
        assert.deepStrictEqual(hashes, [hashOf('xab'), hashOf('abc'), hashOf('bcx')]);
    });
});

// =============== TESTS FOR buildHashIndex ===============

suite('Direct Test: buildHashIndex', () => {

    test('should bucket equal windows together in offset order', () => {
        const index = buildHashIndex(3, bytes('abcabc'), new MarkArray(6));
        assert.deepStrictEqual(index.get(hashOf('abc')), [0, 3]);
        assert.deepStrictEqual(allStarts(index), [0, 1, 2, 3]);
    });

    test('should keep colliding windows in one bucket', () => {
        // "bca" and "cab" have the same checksum
        assert.strictEqual(hashOf('bca'), hashOf('cab'));
        const index = buildHashIndex(3, bytes('abcabc'), new MarkArray(6));
        assert.deepStrictEqual(index.get(hashOf('bca')), [1, 2]);
    });

    test('should skip windows over marked text', () => {
        const marks = new MarkArray(8);
        marks.markRange(3, 1);
        const index = buildHashIndex(2, bytes('abcdefgh'), marks);
        assert.deepStrictEqual(allStarts(index), [0, 1, 4, 5, 6]);
    });

    test('should be empty when the text is shorter than the search length', () => {
        assert.strictEqual(buildHashIndex(4, bytes('abc'), new MarkArray(3)).size, 0);
    });
});

// =============== TESTS FOR extendMatch ===============

suite('Direct Test: extendMatch', () => {

    const pattern = bytes('lowerlow');
    const text = bytes('yellow lowlow');

    test('should extend up to the first mismatch', () => {
        assert.strictEqual(extendMatch(pattern, 0, new MarkArray(8), text, 3, new MarkArray(13)), 3);
        assert.strictEqual(extendMatch(pattern, 0, new MarkArray(8), text, 7, new MarkArray(13)), 3);
    });

    test('should stop at the end of either sequence', () => {
        assert.strictEqual(extendMatch(pattern, 5, new MarkArray(8), text, 7, new MarkArray(13)), 3);
        assert.strictEqual(extendMatch(bytes('lowlowx'), 0, new MarkArray(7), text, 10, new MarkArray(13)), 3);
    });

    test('should stop at a marked position on either side', () => {
        const textMarks = new MarkArray(13);
        textMarks.markRange(4, 1);
        assert.strictEqual(extendMatch(pattern, 0, new MarkArray(8), text, 3, textMarks), 1);

        const patternMarks = new MarkArray(8);
        patternMarks.markRange(2, 1);
        assert.strictEqual(extendMatch(pattern, 0, patternMarks, text, 3, new MarkArray(13)), 2);
    });

    test('should return 0 when the first tokens differ', () => {
        assert.strictEqual(extendMatch(pattern, 1, new MarkArray(8), text, 3, new MarkArray(13)), 0);
    });
});

// =============== TESTS FOR scanPatterns ===============

suite('Direct Test: scanPatterns', () => {

    test('should record every verified candidate in discovery order', () => {
        const pattern = bytes('lowerlow');
        const text = bytes('yellow lowlow');
        const candidates: Match[] = [];
        const result = scanPatterns(3, pattern, text, new MarkArray(8), new MarkArray(13), candidates);

        assert.deepStrictEqual(result, { kind: 'complete', maxMatch: 3 });
        assert.deepStrictEqual(candidates, [
            createMatch(0, 3, 3),
            createMatch(0, 7, 3),
            createMatch(0, 10, 3),
            createMatch(5, 3, 3),
            createMatch(5, 7, 3),
            createMatch(5, 10, 3)
        ]);
    });

    test('should record extended lengths and report the longest', () => {
        const candidates: Match[] = [];
        const result = scanPatterns(3, bytes('abcdef'), bytes('abcdef'), new MarkArray(6), new MarkArray(6), candidates);

        assert.deepStrictEqual(result, { kind: 'complete', maxMatch: 6 });
        assert.deepStrictEqual(candidates, [
            createMatch(0, 0, 6),
            createMatch(1, 1, 5),
            createMatch(2, 2, 4),
            createMatch(3, 3, 3)
        ]);
    });

    test('should abandon the pass on a match longer than twice the search length', () => {
        const candidates: Match[] = [];
        const result = scanPatterns(3, bytes('abcdefghij'), bytes('xxabcdefghij'), new MarkArray(10), new MarkArray(12), candidates);

        assert.deepStrictEqual(result, { kind: 'rescan', length: 10 });
        assert.deepStrictEqual(candidates, []);
    });

    test('should accept a match of exactly twice the search length', () => {
        const candidates: Match[] = [];
        const result = scanPatterns(3, bytes('abcdef'), bytes('zabcdef'), new MarkArray(6), new MarkArray(7), candidates);

        assert.deepStrictEqual(result, { kind: 'complete', maxMatch: 6 });
        assert.deepStrictEqual(candidates[0], createMatch(0, 1, 6));
    });

    test('should clear stale candidates and report 0 when nothing matches', () => {
        const candidates: Match[] = [createMatch(0, 0, 9)];
        const result = scanPatterns(2, bytes('abab'), bytes('cdcd'), new MarkArray(4), new MarkArray(4), candidates);

        assert.deepStrictEqual(result, { kind: 'complete', maxMatch: 0 });
        assert.deepStrictEqual(candidates, []);
    });

    test('should ignore marked regions of both sequences', () => {
        const patternMarks = new MarkArray(8);
        patternMarks.markRange(0, 3);
        const textMarks = new MarkArray(13);
        textMarks.markRange(3, 3);
        const candidates: Match[] = [];
        const result = scanPatterns(3, bytes('lowerlow'), bytes('yellow lowlow'), patternMarks, textMarks, candidates);

        assert.deepStrictEqual(result, { kind: 'complete', maxMatch: 3 });
        assert.deepStrictEqual(candidates, [createMatch(5, 7, 3), createMatch(5, 10, 3)]);
    });
});
