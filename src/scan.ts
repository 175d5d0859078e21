/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { type Match, createMatch } from './match.js';
import type { MarkArray } from './mark_array.js';
import { RollingHash } from './rolling_hash.js';
import type { TokenArray } from './tokens.js';

/**
 * Maps a window checksum to the start offsets of the text windows producing it,
 * in increasing offset order.
 */
export type HashIndex = Map<number, number[]>;

/**
 * Outcome of one scan pass.
 * - `complete`: every pattern window was probed; `maxMatch` is the longest
 *   candidate recorded (0 when none).
 * - `rescan`: a common substring longer than twice the search length was
 *   found; the pass was abandoned and must be repeated at `length`.
 */
export type ScanResult =
	| { kind: 'complete'; maxMatch: number }
	| { kind: 'rescan'; length: number };

/**
 * Visits every window of width `searchLength` that lies entirely on unmarked
 * positions, left to right, with its rolling checksum.
 *
 * @param tokens - The sequence to walk.
 * @param marks - The marks of that sequence.
 * @param searchLength - The window width.
 * @param visit - Called with the window start and checksum. Returning `true` stops the walk.
 * @returns `true` if the walk was stopped by `visit`.
 */
export function forEachUnmarkedWindow(
	tokens: TokenArray,
	marks: MarkArray,
	searchLength: number,
	visit: (start: number, hash: number) => boolean | void
): boolean {
	const len = tokens.length;
	let i = 0;

	while (i + searchLength <= len) {
		// Jump past the last mark of the window, if any
		const blocked = marks.lastMarkedIn(i, i + searchLength);
		if (blocked !== -1) {
			i = blocked + 1;
			continue;
		}

		// tokens[i, i + searchLength) is unmarked: roll through the run
		const hash = new RollingHash(tokens, i, searchLength);
		for (;;) {
			if (visit(i, hash.getHash()) === true) return true;
			i++;
			if (i + searchLength > len) break;
			if (marks.isMarked(i + searchLength - 1)) {
				i += searchLength;
				break;
			}
			hash.slide(tokens[i - 1], tokens[i + searchLength - 1]);
		}
	}
	return false;
}

/**
 * Builds the checksum index of all unmarked text windows of width `searchLength`.
 *
 * @param searchLength - The window width.
 * @param text - The text tokens.
 * @param textMarks - The marks of the text.
 */
export function buildHashIndex(searchLength: number, text: TokenArray, textMarks: MarkArray): HashIndex {
	const index: HashIndex = new Map();
	forEachUnmarkedWindow(text, textMarks, searchLength, (start, hash) => {
		const bucket = index.get(hash);
		if (bucket) {
			bucket.push(start);
		} else {
			index.set(hash, [start]);
		}
	});
	return index;
}

/**
 * Length of the common run starting at `pattern[patternIndex]` / `text[textIndex]`,
 * stopping at the first mismatch, marked position or sequence end.
 */
export function extendMatch(
	pattern: TokenArray, patternIndex: number, patternMarks: MarkArray,
	text: TokenArray, textIndex: number, textMarks: MarkArray
): number {
	let k = 0;
	while (
		textIndex + k < text.length &&
		patternIndex + k < pattern.length &&
		text[textIndex + k] === pattern[patternIndex + k] &&
		!textMarks.isMarked(textIndex + k) &&
		!patternMarks.isMarked(patternIndex + k)
	) {
		k++;
	}
	return k;
}

/**
 * One scan pass: indexes the text, probes it with every unmarked pattern window
 * and records each verified common substring of at least `searchLength` tokens.
 *
 * @param searchLength - The current search length.
 * @param pattern - The pattern tokens.
 * @param text - The text tokens.
 * @param patternMarks - The marks of the pattern.
 * @param textMarks - The marks of the text.
 * @param candidates - Cleared, then filled with this pass's candidates.
 * @param debug - A flag to enable verbose logging.
 */
export function scanPatterns(
	searchLength: number,
	pattern: TokenArray,
	text: TokenArray,
	patternMarks: MarkArray,
	textMarks: MarkArray,
	candidates: Match[],
	debug: boolean = false
): ScanResult {
	const index = buildHashIndex(searchLength, text, textMarks);
	if (debug) console.log(`[scanPatterns] s=${searchLength}: indexed ${index.size} distinct text checksums.`);

	candidates.length = 0;
	let maxMatch = 0;
	let rescanLength = 0;

	forEachUnmarkedWindow(pattern, patternMarks, searchLength, (patternIndex, hash) => {
		const textStarts = index.get(hash);
		if (!textStarts) return false;

		for (const textIndex of textStarts) {
			const k = extendMatch(pattern, patternIndex, patternMarks, text, textIndex, textMarks);

			if (k > 2 * searchLength) {
				rescanLength = k;
				return true;
			}
			if (k >= searchLength) {
				candidates.push(createMatch(patternIndex, textIndex, k));
				if (k > maxMatch) maxMatch = k;
			}
		}
		return false;
	});

	if (rescanLength > 0) {
		candidates.length = 0;
		if (debug) console.log(`[scanPatterns] s=${searchLength}: found a ${rescanLength}-token match, abandoning pass.`);
		return { kind: 'rescan', length: rescanLength };
	}

	if (debug) console.log(`[scanPatterns] s=${searchLength}: ${candidates.length} candidates, longest ${maxMatch}.`);
	return { kind: 'complete', maxMatch };
}
