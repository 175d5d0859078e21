// src/index.ts
// version: 1.0.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Core Engine and Types
export {
	GreedyStringTiling,
	rkrGst,
	tileTokens,
	type TilingOptions
} from './greedy_string_tiling.js';
export {
	type Match,
	createMatch,
	compareMatches,
	compareMatchesByText
} from './match.js';

// Toolbox
export { MarkArray } from './mark_array.js';
export { RollingHash } from './rolling_hash.js';
export {
	buildHashIndex,
	extendMatch,
	forEachUnmarkedWindow,
	scanPatterns,
	type HashIndex,
	type ScanResult
} from './scan.js';
export { markStrings } from './tiling.js';

// Input preparation and checks
export {
	internTokens,
	prepareSequences,
	type PreparedSequences,
	type TokenArray,
	type TokenInput
} from './tokens.js';
export { verifyTiling } from './verify.js';
