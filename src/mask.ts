/*
 * QR Code generator library (TypeScript)
 *
 * Copyright (c) Project Nayuki. (MIT License)
 * https://www.nayuki.io/page/qr-code-generator-library
 *
 * Permission is hereby granted, free of charge, to any person obtaining a copy of
 * this software and associated documentation files (the "Software"), to deal in
 * the Software without restriction, including without limitation the rights to
 * use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of
 * the Software, and to permit persons to whom the Software is furnished to do so,
 * subject to the following conditions:
 * - The above copyright notice and this permission notice shall be included in
 *   all copies or substantial portions of the Software.
 * - The Software is provided "as is", without warranty of any kind, express or
 *   implied, including but not limited to the warranties of merchantability,
 *   fitness for a particular purpose and noninfringement. In no event shall the
 *   authors or copyright holders be liable for any claim, damages or other
 *   liability, whether in an action of contract, tort or otherwise, arising from,
 *   out of or in connection with the Software or the use or other dealings in the
 *   Software.
 */

import { ErrorCodes, QrCodeError } from "./errors";

type int = number;

const floor = Math.floor;
const abs = Math.abs;

// A resolved module: 0 is light, 1 is dark.
export type ModuleValue = 0 | 1;

export type ModuleMatrix = ReadonlyArray<ReadonlyArray<ModuleValue>>;

export const MASK_COUNT: int = 8;

export function assertMask(mask: int): void {
  if (!Number.isInteger(mask) || mask < 0 || mask >= MASK_COUNT)
    throw new QrCodeError(
      ErrorCodes.INVALID_MASK,
      `Invalid mask pattern: ${mask}`,
      { mask }
    );
}

/*---- Mask patterns ----*/

// Returns true iff the given mask pattern inverts the data module at column x, row y.
export function applyMask(mask: int, x: int, y: int): boolean {
  switch (mask) {
    case 0:
      return (x + y) % 2 == 0;
    case 1:
      return y % 2 == 0;
    case 2:
      return x % 3 == 0;
    case 3:
      return (x + y) % 3 == 0;
    case 4:
      return (floor(y / 2) + floor(x / 3)) % 2 == 0;
    case 5:
      return ((x * y) % 2) + ((x * y) % 3) == 0;
    case 6:
      return (((x * y) % 2) + ((x * y) % 3)) % 2 == 0;
    case 7:
      return (((x + y) % 2) + ((x * y) % 3)) % 2 == 0;
    default:
      throw new QrCodeError(
        ErrorCodes.INVALID_MASK,
        `Invalid mask pattern: ${mask}`,
        { mask }
      );
  }
}

/*---- Penalty scoring ----*/

// For use in getPenaltyScore(), when evaluating which mask is best.
export const PENALTY_N1: int = 3;
export const PENALTY_N2: int = 3;
export const PENALTY_N3: int = 40;
export const PENALTY_N4: int = 10;

// 1:1:3:1:1 finder-like run with four light modules on one side.
const FINDER_LIKE_PATTERNS: ReadonlyArray<ReadonlyArray<ModuleValue>> = [
  [1, 0, 1, 1, 1, 0, 1, 0, 0, 0, 0],
  [0, 0, 0, 0, 1, 0, 1, 1, 1, 0, 1],
];

export interface PenaltyBreakdown {
  readonly adjacentRuns: int;
  readonly blocks: int;
  readonly finderLike: int;
  readonly balance: int;
  readonly total: int;
}

// Sums all four rules. Lower is better.
export function getPenaltyScore(modules: ModuleMatrix): int {
  return getPenaltyBreakdown(modules).total;
}

export function getPenaltyBreakdown(modules: ModuleMatrix): PenaltyBreakdown {
  const adjacentRuns: int = penaltyAdjacentRuns(modules);
  const blocks: int = penaltyBlocks(modules);
  const finderLike: int = penaltyFinderLike(modules);
  const balance: int = penaltyBalance(modules);
  return {
    adjacentRuns,
    blocks,
    finderLike,
    balance,
    total: adjacentRuns + blocks + finderLike + balance,
  };
}

// Rule 1: every maximal run of five or more same-coloured modules in a row or a column.
export function penaltyAdjacentRuns(modules: ModuleMatrix): int {
  const size: int = modules.length;
  const runPenalty = (run: int): int =>
    run >= 5 ? PENALTY_N1 + (run - 5) : 0;
  let result: int = 0;
  for (let i = 0; i < size; i++) {
    let rowRun: int = 0;
    let colRun: int = 0;
    for (let j = 0; j < size; j++) {
      if (j > 0 && modules[i][j] == modules[i][j - 1]) rowRun++;
      else {
        result += runPenalty(rowRun);
        rowRun = 1;
      }
      if (j > 0 && modules[j][i] == modules[j - 1][i]) colRun++;
      else {
        result += runPenalty(colRun);
        colRun = 1;
      }
    }
    result += runPenalty(rowRun) + runPenalty(colRun);
  }
  return result;
}

// Rule 2: every 2*2 block of one colour, overlapping blocks counted separately.
export function penaltyBlocks(modules: ModuleMatrix): int {
  const size: int = modules.length;
  let result: int = 0;
  for (let y = 0; y < size - 1; y++) {
    for (let x = 0; x < size - 1; x++) {
      const color: ModuleValue = modules[y][x];
      if (
        color == modules[y][x + 1] &&
        color == modules[y + 1][x] &&
        color == modules[y + 1][x + 1]
      )
        result += PENALTY_N2;
    }
  }
  return result;
}

// Rule 3: every occurrence of a finder-like pattern in a row or a column, overlaps allowed.
export function penaltyFinderLike(modules: ModuleMatrix): int {
  const size: int = modules.length;
  const width: int = FINDER_LIKE_PATTERNS[0].length;
  let result: int = 0;
  for (let i = 0; i < size; i++) {
    for (let start = 0; start + width <= size; start++) {
      for (const pattern of FINDER_LIKE_PATTERNS) {
        if (pattern.every((v, k) => modules[i][start + k] == v))
          result += PENALTY_N3;
        if (pattern.every((v, k) => modules[start + k][i] == v))
          result += PENALTY_N3;
      }
    }
  }
  return result;
}

// Rule 4: 10 points for every full 5% the dark proportion deviates from 50%.
export function penaltyBalance(modules: ModuleMatrix): int {
  let dark: int = 0;
  for (const row of modules)
    dark = row.reduce<int>((sum, color) => sum + color, dark);
  const total: int = modules.length * modules.length;
  // floor(|100 * dark / total - 50| / 5), kept in integers
  const k: int = floor(abs(dark * 100 - total * 50) / (total * 5));
  return k * PENALTY_N4;
}
