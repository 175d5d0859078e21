/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * An integer token sequence the tiling engine works on directly.
 * Plain arrays must contain non-negative integers.
 */
export type TokenArray = Uint8Array | Uint16Array | Uint32Array | readonly number[];

/**
 * Anything the public entry points accept as a pattern or text:
 * - a string, tiled over its UTF-8 bytes;
 * - an array of string tokens, interned to integer IDs;
 * - a ready-made TokenArray.
 */
export type TokenInput = string | readonly string[] | TokenArray;

/**
 * Result of preparing a pattern/text pair for tiling.
 */
export interface PreparedSequences {
	patternTokens: TokenArray;
	textTokens: TokenArray;
	/** Maps interned IDs back to their string tokens. Empty unless string arrays were interned. */
	idToToken: string[];
}

const encoder = new TextEncoder();

function isStringTokens(input: readonly string[] | TokenArray): input is readonly string[] {
	return Array.isArray(input) && input.length > 0 && typeof input[0] === 'string';
}

function isTypedTokens(input: readonly string[] | TokenArray): input is Uint8Array | Uint16Array | Uint32Array {
	return input instanceof Uint8Array || input instanceof Uint16Array || input instanceof Uint32Array;
}

/**
 * Validates a numeric token sequence. Unsigned typed arrays need no check;
 * anything else is copied into a plain array of checked integers.
 */
function toTokenArray(input: readonly string[] | TokenArray, role: string): TokenArray {
	if (isTypedTokens(input)) return input;
	const items: unknown = input;
	if (!Array.isArray(items) && !ArrayBuffer.isView(items)) {
		throw new TypeError(`[GreedyStringTiling] The ${role} must be a string, an array of string tokens or an array of integer tokens.`);
	}
	const source: ArrayLike<unknown> = input;
	const tokens: number[] = new Array<number>(source.length);
	for (let i = 0; i < source.length; i++) {
		const token = source[i];
		if (typeof token !== 'number' || !Number.isInteger(token) || token < 0) {
			throw new TypeError(`[GreedyStringTiling] The ${role} token at index ${i} is not a non-negative integer: ${String(token)}.`);
		}
		tokens[i] = token;
	}
	return tokens;
}

/**
 * Converts string tokens of both sequences into integer IDs from one shared table.
 *
 * @param patternTokens - The pattern as string tokens.
 * @param textTokens - The text as string tokens.
 * @param debug - A flag to enable verbose logging.
 */
export function internTokens(
	patternTokens: readonly string[],
	textTokens: readonly string[],
	debug: boolean = false
): PreparedSequences {
	const tokenMap = new Map<string, number>();
	const idToToken: string[] = [];

	const intern = (tokens: readonly string[], role: string): Uint32Array => {
		const ids = new Uint32Array(tokens.length);
		for (let i = 0; i < tokens.length; i++) {
			const token: unknown = tokens[i];
			if (typeof token !== 'string') {
				throw new TypeError(`[GreedyStringTiling] The ${role} token at index ${i} is not a string.`);
			}
			let id = tokenMap.get(token);
			if (id === undefined) {
				id = idToToken.length;
				tokenMap.set(token, id);
				idToToken.push(token);
			}
			ids[i] = id;
		}
		return ids;
	};

	const pattern = intern(patternTokens, 'pattern');
	const text = intern(textTokens, 'text');

	if (debug) {
		console.log(`[internTokens] Interned ${pattern.length + text.length} tokens into ${idToToken.length} unique IDs.`);
	}
	return { patternTokens: pattern, textTokens: text, idToToken };
}

/**
 * Turns a pattern/text pair into integer token arrays the engine can tile.
 *
 * @param pattern - The pattern input.
 * @param text - The text input.
 * @param debug - A flag to enable verbose logging.
 * @throws {TypeError} If an input is not a token sequence, or string tokens are mixed with numeric ones.
 */
export function prepareSequences(pattern: TokenInput, text: TokenInput, debug: boolean = false): PreparedSequences {
	if (typeof pattern === 'string' && typeof text === 'string') {
		return { patternTokens: encoder.encode(pattern), textTokens: encoder.encode(text), idToToken: [] };
	}

	const patternSeq = typeof pattern === 'string' ? encoder.encode(pattern) : pattern;
	const textSeq = typeof text === 'string' ? encoder.encode(text) : text;

	const patternIsStrings = isStringTokens(patternSeq);
	const textIsStrings = isStringTokens(textSeq);

	if (patternIsStrings || textIsStrings) {
		const patternOk = isStringTokens(patternSeq) || patternSeq.length === 0;
		const textOk = isStringTokens(textSeq) || textSeq.length === 0;
		if (!patternOk || !textOk) {
			throw new TypeError('[GreedyStringTiling] String tokens cannot be tiled against numeric tokens or bytes.');
		}
		return internTokens(
			isStringTokens(patternSeq) ? patternSeq : [],
			isStringTokens(textSeq) ? textSeq : [],
			debug
		);
	}

	return {
		patternTokens: toTokenArray(patternSeq, 'pattern'),
		textTokens: toTokenArray(textSeq, 'text'),
		idToToken: []
	};
}
