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
import versionTables from "./versionTables.json";

type int = number;

const floor = Math.floor;

/*---- Public helper enumerations ----*/

/*
 * The error correction level in a QR Code symbol. Immutable.
 */
export class Ecc {
  /*-- Constants --*/

  public static readonly LOW = new Ecc("L", 0, 1); // The QR Code can tolerate about  7% erroneous codewords
  public static readonly MEDIUM = new Ecc("M", 1, 0); // The QR Code can tolerate about 15% erroneous codewords
  public static readonly QUARTILE = new Ecc("Q", 2, 3); // The QR Code can tolerate about 25% erroneous codewords
  public static readonly HIGH = new Ecc("H", 3, 2); // The QR Code can tolerate about 30% erroneous codewords

  public static readonly ALL: ReadonlyArray<Ecc> = [
    Ecc.LOW,
    Ecc.MEDIUM,
    Ecc.QUARTILE,
    Ecc.HIGH,
  ];

  /*-- Constructor and fields --*/

  private constructor(
    public readonly letter: EccLetter,
    // Row index into the codeword tables, in the range 0 to 3.
    public readonly ordinal: int,
    // The 2-bit level code packed into the format information.
    public readonly formatBits: int
  ) {}

  public static fromLetter(letter: EccLetter): Ecc {
    switch (letter) {
      case "L":
        return Ecc.LOW;
      case "M":
        return Ecc.MEDIUM;
      case "Q":
        return Ecc.QUARTILE;
      case "H":
        return Ecc.HIGH;
    }
  }

  public toString(): string {
    return this.letter;
  }
}

export type EccLetter = "L" | "M" | "Q" | "H";

/*
 * Describes how a segment's data bits are interpreted. Immutable.
 * Only byte mode is ever produced by the encoder.
 */
export class Mode {
  public static readonly BYTE = new Mode("BYTE", 0x4, [8, 16, 16]);

  private constructor(
    public readonly name: string,
    // The mode indicator bits, which is a uint4 value (range 0 to 15).
    public readonly modeBits: int,
    // Number of character count bits for versions 1-9, 10-26 and 27-40.
    private readonly _numBitsCharCount: readonly [int, int, int]
  ) {}

  // Returns the bit width of the character count field for this mode at the given version.
  public numCharCountBits(version: int): int {
    return this._numBitsCharCount[floor((version + 7) / 17)];
  }
}

/*---- Version parameters ----*/

export const MIN_VERSION: int = 1;
export const MAX_VERSION: int = 40;

export interface VersionInfo {
  readonly version: int;
  readonly errorCorrectionLevel: Ecc;
  // Side length in modules, 21 to 177.
  readonly moduleCount: int;
  // All codewords (data and ECC) the symbol holds, remainder bits discarded.
  readonly totalCodewordCount: int;
  readonly alignPatternCount: int;
  readonly charCountBits: int;
  readonly eccPerBlock: int;
  readonly blockCount: int;
  readonly dataCodewordCount: int;
}

export function assertVersion(version: int): void {
  if (
    !Number.isInteger(version) ||
    version < MIN_VERSION ||
    version > MAX_VERSION
  )
    throw new QrCodeError(
      ErrorCodes.INVALID_INPUT,
      `Version must be between ${MIN_VERSION} and ${MAX_VERSION}`,
      { version }
    );
}

export function getVersionInfo(
  version: int,
  ecl: Ecc,
  mode: Mode = Mode.BYTE
): VersionInfo {
  assertVersion(version);
  const totalCodewordCount: int = floor(getNumRawDataModules(version) / 8);
  const eccPerBlock: int = ECC_CODEWORDS_PER_BLOCK[ecl.ordinal][version];
  const blockCount: int = NUM_ERROR_CORRECTION_BLOCKS[ecl.ordinal][version];
  const dataCodewordCount: int = totalCodewordCount - eccPerBlock * blockCount;
  if (dataCodewordCount < 0)
    throw new QrCodeError(
      ErrorCodes.INTERNAL_CONSISTENCY,
      "Negative data codeword count",
      { version, ecl: ecl.letter }
    );

  return Object.freeze({
    version,
    errorCorrectionLevel: ecl,
    moduleCount: 21 + (version - 1) * 4,
    totalCodewordCount,
    alignPatternCount:
      version == 1 ? 0 : version <= 6 ? 1 : floor(version / 7) + 2,
    charCountBits: mode.numCharCountBits(version),
    eccPerBlock,
    blockCount,
    dataCodewordCount,
  });
}

// Returns the number of data bits that can be stored in a QR Code of the given version number, after
// all function modules are excluded. This includes remainder bits, so it might not be a multiple of 8.
// The result is in the range [208, 29648].
export function getNumRawDataModules(version: int): int {
  assertVersion(version);
  let result: int = (16 * version + 128) * version + 64;
  if (version >= 2) {
    const numAlign: int = floor(version / 7) + 2;
    result -= (25 * numAlign - 10) * numAlign - 55;
    if (version >= 7) result -= 36;
  }
  return result;
}

// Returns the ascending centre coordinates of the alignment patterns for the given version,
// used on both axes. Centres that land on a finder pattern are skipped when drawing.
export function getAlignmentPatternPositions(version: int): Array<int> {
  assertVersion(version);
  if (version == 1) return [];
  const size: int = version * 4 + 17;
  const numAlign: int = floor(version / 7) + 2;
  const step: int =
    version == 32 ? 26 : Math.ceil((version * 4 + 4) / (numAlign * 2 - 2)) * 2;
  const result: Array<int> = [6];
  for (let pos = size - 7; result.length < numAlign; pos -= step)
    result.splice(1, 0, pos);
  return result;
}

/*---- Tables ----*/

// Indexed [ecl.ordinal][version]; index 0 of each row is padding set to an illegal value.
const ECC_CODEWORDS_PER_BLOCK: ReadonlyArray<ReadonlyArray<int>> =
  versionTables.eccCodewordsPerBlock;
const NUM_ERROR_CORRECTION_BLOCKS: ReadonlyArray<ReadonlyArray<int>> =
  versionTables.numErrorCorrectionBlocks;
