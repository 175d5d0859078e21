/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Per-position "already tiled" flags for one sequence.
 * Marking is monotonic: there is no way to clear a position once set.
 */
export class MarkArray {
	private readonly marks: Uint8Array;
	private markedCount = 0;

	/**
	 * @param size - The length of the sequence the marks belong to.
	 */
	constructor(size: number) {
		this.marks = new Uint8Array(size);
	}

	public get length(): number {
		return this.marks.length;
	}

	/** Number of positions marked so far. */
	public get marked(): number {
		return this.markedCount;
	}

	public isMarked(index: number): boolean {
		return this.marks[index] === 1;
	}

	/**
	 * Returns the highest marked position in `[start, end)`, or -1 when the
	 * whole range is unmarked.
	 */
	public lastMarkedIn(start: number, end: number): number {
		for (let i = end - 1; i >= start; i--) {
			if (this.marks[i]) return i;
		}
		return -1;
	}

	/**
	 * Checks that every position of `[start, start + length)` is unmarked.
	 */
	public isRangeUnmarked(start: number, length: number): boolean {
		return this.lastMarkedIn(start, start + length) === -1;
	}

	/**
	 * Marks every position of `[start, start + length)`.
	 */
	public markRange(start: number, length: number): void {
		const end = start + length;
		for (let i = start; i < end; i++) {
			if (!this.marks[i]) {
				this.marks[i] = 1;
				this.markedCount++;
			}
		}
	}
}
