/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { type Match, compareMatches, compareMatchesByText } from './match.js';
import { MarkArray } from './mark_array.js';
import type { TokenArray } from './tokens.js';

const formatMatch = (m: Match): string =>
	`{patternIndex: ${m.patternIndex}, textIndex: ${m.textIndex}, length: ${m.length}}`;

/**
 * Checks a tiling result against the guarantees of RKR-GST and throws on the
 * first violation:
 * - every tile lies inside both sequences and is at least `minimumMatchLength` long;
 * - the pattern slice of a tile equals its text slice;
 * - no two tiles overlap in the pattern, nor in the text;
 * - no tile can grow by one position at either end into positions that no
 *   tile covers while the tokens there still agree.
 *
 * @param pattern - The pattern tokens the tiles were computed on.
 * @param text - The text tokens the tiles were computed on.
 * @param matches - The tiles to check.
 * @param minimumMatchLength - The minimum tile length of the run.
 * @throws {Error} Describing the first violated property.
 */
export function verifyTiling(
	pattern: TokenArray,
	text: TokenArray,
	matches: readonly Match[],
	minimumMatchLength: number
): void {
	const patternCover = new MarkArray(pattern.length);
	const textCover = new MarkArray(text.length);

	for (const m of matches) {
		if (
			!Number.isInteger(m.patternIndex) || !Number.isInteger(m.textIndex) || !Number.isInteger(m.length) ||
			m.patternIndex < 0 || m.textIndex < 0 ||
			m.patternIndex + m.length > pattern.length || m.textIndex + m.length > text.length
		) {
			throw new Error(`Verification failed: tile ${formatMatch(m)} is out of bounds.`);
		}
		if (m.length < minimumMatchLength) {
			throw new Error(`Verification failed: tile ${formatMatch(m)} is shorter than ${minimumMatchLength}.`);
		}
		for (let k = 0; k < m.length; k++) {
			if (pattern[m.patternIndex + k] !== text[m.textIndex + k]) {
				throw new Error(`Verification failed: tile ${formatMatch(m)} differs at offset ${k}.`);
			}
		}
		patternCover.markRange(m.patternIndex, m.length);
		textCover.markRange(m.textIndex, m.length);
	}

	const byPattern = [...matches].sort(compareMatches);
	for (let i = 1; i < byPattern.length; i++) {
		const prev = byPattern[i - 1];
		if (prev.patternIndex + prev.length > byPattern[i].patternIndex) {
			throw new Error(`Verification failed: tiles ${formatMatch(prev)} and ${formatMatch(byPattern[i])} overlap in the pattern.`);
		}
	}

	const byText = [...matches].sort(compareMatchesByText);
	for (let i = 1; i < byText.length; i++) {
		const prev = byText[i - 1];
		if (prev.textIndex + prev.length > byText[i].textIndex) {
			throw new Error(`Verification failed: tiles ${formatMatch(prev)} and ${formatMatch(byText[i])} overlap in the text.`);
		}
	}

	const canGrowAt = (p: number, t: number): boolean =>
		p >= 0 && t >= 0 && p < pattern.length && t < text.length &&
		!patternCover.isMarked(p) && !textCover.isMarked(t) &&
		pattern[p] === text[t];

	for (const m of matches) {
		if (canGrowAt(m.patternIndex - 1, m.textIndex - 1)) {
			throw new Error(`Verification failed: tile ${formatMatch(m)} can be extended backwards.`);
		}
		if (canGrowAt(m.patternIndex + m.length, m.textIndex + m.length)) {
			throw new Error(`Verification failed: tile ${formatMatch(m)} can be extended forwards.`);
		}
	}
}
