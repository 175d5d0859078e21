/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Match } from './match.js';
import { MarkArray } from './mark_array.js';
import { scanPatterns } from './scan.js';
import { markStrings } from './tiling.js';
import { type TokenArray, type TokenInput, prepareSequences } from './tokens.js';

/**
 * Configuration options for a tiling run.
 */
export interface TilingOptions {
	/** The search length of the first scan pass. */
	initialSearchLength?: number;
	/** The shortest tile that may be reported. Must not exceed `initialSearchLength`. */
	minimumMatchLength?: number;
}

/**
 * Rejects option values the threshold loop cannot work with.
 * @throws {RangeError} On a non-positive or non-integer length, or a minimum above the initial search length.
 */
function validateOptions(config: Required<TilingOptions>): void {
	const { initialSearchLength, minimumMatchLength } = config;
	if (!Number.isInteger(initialSearchLength) || initialSearchLength <= 0) {
		throw new RangeError(`[GreedyStringTiling] initialSearchLength must be a positive integer, got ${initialSearchLength}.`);
	}
	if (!Number.isInteger(minimumMatchLength) || minimumMatchLength <= 0) {
		throw new RangeError(`[GreedyStringTiling] minimumMatchLength must be a positive integer, got ${minimumMatchLength}.`);
	}
	if (minimumMatchLength > initialSearchLength) {
		throw new RangeError(`[GreedyStringTiling] minimumMatchLength (${minimumMatchLength}) must not exceed initialSearchLength (${initialSearchLength}).`);
	}
}

/**
 * Runs RKR-GST over two prepared token arrays.
 *
 * The search length starts at `initialSearchLength`. A scan that meets a match
 * longer than twice the search length restarts at that length; otherwise its
 * candidates are tiled and the search length halves, bottoming out at
 * `minimumMatchLength`, after which the run stops.
 *
 * @param pattern - The pattern tokens.
 * @param text - The text tokens.
 * @param config - The resolved options.
 * @param debug - A flag to enable verbose logging.
 * @returns The tiles in the order they were accepted.
 * @throws {RangeError} If the options are invalid.
 */
export function tileTokens(
	pattern: TokenArray,
	text: TokenArray,
	config: Required<TilingOptions>,
	debug: boolean = false
): Match[] {
	validateOptions(config);
	const { minimumMatchLength } = config;

	const patternMarks = new MarkArray(pattern.length);
	const textMarks = new MarkArray(text.length);
	const candidates: Match[] = [];
	const result: Match[] = [];

	if (debug) {
		console.group(`[tile] START pattern=${pattern.length} text=${text.length}`);
		console.log(`Options:`, config);
	}

	let s = config.initialSearchLength;
	for (;;) {
		const scan = scanPatterns(s, pattern, text, patternMarks, textMarks, candidates, debug);
		if (scan.kind === 'rescan') {
			s = scan.length;
			continue;
		}

		markStrings(candidates, patternMarks, textMarks, result, debug);

		if (s > 2 * minimumMatchLength) {
			s = Math.floor(s / 2);
		} else if (s > minimumMatchLength) {
			s = minimumMatchLength;
		} else {
			break;
		}
	}

	if (debug) {
		console.log(`[tile] FINISH: ${result.length} tiles, pattern ${patternMarks.marked}/${pattern.length} and text ${textMarks.marked}/${text.length} tokens tiled.`);
		console.groupEnd();
	}

	return result;
}

/**
 * Computes the greedy string tiling of `pattern` against `text`.
 *
 * @param pattern - The pattern: a string (tiled over UTF-8 bytes), string tokens or integer tokens.
 * @param text - The text, in the same kind of input as the pattern.
 * @param initialSearchLength - The search length of the first pass.
 * @param minimumMatchLength - The shortest tile reported.
 * @returns The tiles in the order they were accepted.
 * @example
 * rkrGst('lower', 'yellow', 3, 2); // [{ patternIndex: 0, textIndex: 3, length: 3 }]
 */
export function rkrGst(
	pattern: TokenInput,
	text: TokenInput,
	initialSearchLength: number,
	minimumMatchLength: number
): Match[] {
	return new GreedyStringTiling().tile(pattern, text, false, { initialSearchLength, minimumMatchLength });
}

/**
 * Running Karp-Rabin Greedy-String-Tiling engine.
 *
 * Finds the maximal common substrings of two sequences and assigns them as
 * non-overlapping tiles, longest first. Typical uses are plagiarism and
 * clone detection over token streams.
 *
 * ### Key Features & Techniques
 *
 * - **Rolling checksum index**: each pass buckets the unmarked text windows by
 * an Adler-32 style checksum and probes them with the pattern's windows.
 * - **Verified extension**: every checksum hit is compared token by token and
 * extended forward until a mismatch or an already tiled position.
 * - **Greedy tiling**: candidates are accepted longest first and only when
 * they do not overlap an existing tile.
 * - **Adaptive search length**: unusually long matches restart the pass at a
 * larger length; otherwise the length halves down to the minimum.
 *
 * @example
 * ```typescript
 * const gst = new GreedyStringTiling();
 * const tiles = gst.tile(oldTokens, newTokens, false, { minimumMatchLength: 5 });
 * ```
 */
export class GreedyStringTiling {
	public static readonly defaultOptions: Required<TilingOptions> = {
		initialSearchLength: 20,
		minimumMatchLength: 8,
	};

	/**
	 * Tiles `pattern` against `text`.
	 *
	 * @param pattern - The pattern input.
	 * @param text - The text input.
	 * @param debug - Enables verbose logging.
	 * @param options - Overrides for `GreedyStringTiling.defaultOptions`.
	 * @returns The tiles in the order they were accepted.
	 * @throws {RangeError} If the options are invalid.
	 * @throws {TypeError} If an input is not a token sequence.
	 */
	public tile(
		pattern: TokenInput,
		text: TokenInput,
		debug: boolean = false,
		options?: TilingOptions
	): Match[] {
		const config: Required<TilingOptions> = {
			...GreedyStringTiling.defaultOptions,
			...options,
		};
		validateOptions(config);

		const { patternTokens, textTokens } = prepareSequences(pattern, text, debug);
		return tileTokens(patternTokens, textTokens, config, debug);
	}
}
