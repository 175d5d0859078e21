/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * A single tile: a common substring of `length` tokens starting at
 * `patternIndex` in the pattern and at `textIndex` in the text.
 * @example { patternIndex: 0, textIndex: 3, length: 3 }
 */
export interface Match {
	/** The starting position in the pattern. */
	readonly patternIndex: number;
	/** The starting position in the text. */
	readonly textIndex: number;
	/** The number of tokens covered on both sides. */
	readonly length: number;
}

/**
 * Creates a frozen Match value.
 */
export function createMatch(patternIndex: number, textIndex: number, length: number): Match {
	return Object.freeze({ patternIndex, textIndex, length });
}

/**
 * Orders matches by (patternIndex, textIndex, length).
 */
export function compareMatches(a: Match, b: Match): number {
	return (a.patternIndex - b.patternIndex)
		|| (a.textIndex - b.textIndex)
		|| (a.length - b.length);
}

/**
 * Orders matches by (textIndex, patternIndex, length).
 */
export function compareMatchesByText(a: Match, b: Match): number {
	return (a.textIndex - b.textIndex)
		|| (a.patternIndex - b.patternIndex)
		|| (a.length - b.length);
}
