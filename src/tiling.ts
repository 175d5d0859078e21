/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { Match } from './match.js';
import type { MarkArray } from './mark_array.js';

/**
 * Greedily turns the candidates of one scan pass into tiles, longest first.
 * A candidate is accepted only if its whole span is unmarked in both
 * sequences; accepted spans are then marked. Candidates of equal length keep
 * the order in which the scan found them.
 *
 * @param candidates - The candidates of the last scan. Emptied on return.
 * @param patternMarks - The marks of the pattern.
 * @param textMarks - The marks of the text.
 * @param result - Accepted tiles are appended here.
 * @param debug - A flag to enable verbose logging.
 * @returns The number of tiles accepted.
 */
export function markStrings(
	candidates: Match[],
	patternMarks: MarkArray,
	textMarks: MarkArray,
	result: Match[],
	debug: boolean = false
): number {
	// Array.prototype.sort is stable
	candidates.sort((a, b) => b.length - a.length);

	let accepted = 0;
	for (const match of candidates) {
		if (
			!patternMarks.isRangeUnmarked(match.patternIndex, match.length) ||
			!textMarks.isRangeUnmarked(match.textIndex, match.length)
		) {
			continue;
		}

		result.push(match);
		patternMarks.markRange(match.patternIndex, match.length);
		textMarks.markRange(match.textIndex, match.length);
		accepted++;

		if (debug) console.log(`  -> TILE: pattern=${match.patternIndex}, text=${match.textIndex}, len=${match.length}`);
	}

	if (debug) console.log(`[markStrings] Accepted ${accepted} of ${candidates.length} candidates.`);
	candidates.length = 0;
	return accepted;
}
