/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { TokenArray } from './tokens.js';

/**
 * Adler-32 style rolling checksum over a fixed-width window of tokens.
 * Used to bucket windows of the text and probe them with windows of the
 * pattern; equal windows always share a checksum, the reverse is not true.
 *
 * Token values are reduced modulo 65521, so for byte input the value of
 * `getHash()` equals the Adler-32 checksum of the window.
 * @internal
 */
export class RollingHash {
	private static readonly MOD = 65521; // Largest prime below 2^16
	private a = 1;
	private b = 0;
	private readonly length: number;

	/**
	 * Creates an instance of RollingHash over `tokens[start, start + length)`.
	 * @param tokens - The token sequence to hash.
	 * @param start - The first position of the initial window.
	 * @param length - The width of the window.
	 */
	constructor(tokens: TokenArray, start: number, length: number) {
		this.length = length;
		this._calculateInitialHash(tokens, start);
	}

	/**
	 * Gets the checksum of the current window.
	 */
	public getHash(): number {
		return this.b * 65536 + this.a;
	}

	/**
	 * Slides the window one position to the right.
	 * @param oldToken - The token leaving the window.
	 * @param newToken - The token entering the window.
	 */
	public slide(oldToken: number, newToken: number): void {
		const MOD = RollingHash.MOD;
		const leaving = oldToken % MOD;
		const entering = newToken % MOD;

		// Remove the old token's contribution
		this.a = (this.a + MOD - leaving) % MOD;
		this.b = (this.b + 2 * MOD - 1 - (this.length * leaving) % MOD) % MOD;

		// Add the new token's contribution
		this.a = (this.a + entering) % MOD;
		this.b = (this.b + this.a) % MOD;
	}

	private _calculateInitialHash(tokens: TokenArray, start: number): void {
		const MOD = RollingHash.MOD;
		const end = start + this.length;
		for (let i = start; i < end; i++) {
			this.a = (this.a + tokens[i] % MOD) % MOD;
			this.b = (this.b + this.a) % MOD;
		}
	}
}
