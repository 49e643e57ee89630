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

import { BitStream } from "./bitStream";
import { ErrorCodes, QrCodeError } from "./errors";
import { logger } from "./logger";
import {
  MASK_COUNT,
  applyMask,
  assertMask,
  getPenaltyScore,
  type ModuleMatrix,
  type ModuleValue,
} from "./mask";
import { ReedSolomonEncoder } from "./reedSolomon";
import {
  Ecc,
  Mode,
  getAlignmentPatternPositions,
  getVersionInfo,
  type VersionInfo,
} from "./versionInfo";

type bit = number;
type byte = number;
type int = number;

const abs = Math.abs;
const floor = Math.floor;

// A module that no drawing pass has reached yet is null.
export type Cell = ModuleValue | null;

/*---- QR Code symbol class ----*/

/*
 * A finished QR Code symbol: an immutable square grid of dark and light modules
 * together with the parameters it was encoded with.
 */
export class QrCode {
  // The width and height of this QR Code, measured in modules, between 21 and 177 (inclusive).
  public readonly size: int;

  public constructor(
    // The version number of this QR Code, which is between 1 and 40 (inclusive).
    public readonly version: int,

    public readonly errorCorrectionLevel: Ecc,

    // The mask pattern applied to the data modules, between 0 and 7 (inclusive).
    public readonly mask: int,

    // The modules of this QR Code (0 = light, 1 = dark), indexed [y][x].
    public readonly modules: ModuleMatrix,

    // Total penalty of the chosen mask, or null when the mask was pinned by the caller.
    public readonly penalty: int | null
  ) {
    this.size = modules.length;
  }

  // Returns true for a dark module. Out of bounds coordinates are light.
  public getModule(x: int, y: int): boolean {
    return (
      0 <= x && x < this.size && 0 <= y && y < this.size && this.modules[y][x] == 1
    );
  }
}

/*---- Symbol encoder ----*/

/*
 * Turns a byte payload into a QR Code of a fixed version and error correction level.
 *
 * Pipeline: data codewords (mode, length, payload, terminator, padding) are split
 * into blocks, each block gets its Reed-Solomon codewords, and the blocks are
 * interleaved into one bit stream. Each mask trial then draws a fresh grid:
 * function patterns, format and version information, and finally the stream bits
 * along the zigzag path, XORed with the mask. Without a pinned mask all eight
 * trials are scored and the lowest penalty wins, ties going to the lower index.
 */
export class QrCodeGenerator {
  public readonly versionInfo: VersionInfo;

  private readonly _encoder: ReedSolomonEncoder = new ReedSolomonEncoder();

  public constructor(
    version: int,
    errorCorrectionLevel: Ecc,
    // Pinned mask pattern, or null to choose one automatically.
    private readonly _mask: int | null = null
  ) {
    this.versionInfo = getVersionInfo(version, errorCorrectionLevel);
    if (
      _mask !== null &&
      (!Number.isInteger(_mask) || _mask < 0 || _mask >= MASK_COUNT)
    )
      throw new QrCodeError(
        ErrorCodes.INVALID_INPUT,
        "Mask pattern must be between 0 and 7",
        { mask: _mask }
      );
  }

  // Encodes the given bytes and returns the finished symbol.
  public render(data: Readonly<ArrayLike<byte>>, mode: Mode = Mode.BYTE): QrCode {
    const dataCodewords: Array<byte> = this.buildDataCodewords(data, mode);
    const finalBitStream: BitStream = this.interleaveBlocks(dataCodewords);
    const { version, errorCorrectionLevel } = this.versionInfo;

    if (this._mask !== null) {
      const modules = this.generateMatrix(finalBitStream.clone(), this._mask);
      return new QrCode(version, errorCorrectionLevel, this._mask, modules, null);
    }
    const best = this.findBestMask(finalBitStream);
    return new QrCode(
      version,
      errorCorrectionLevel,
      best.mask,
      best.modules,
      best.penalty
    );
  }

  /*-- Codewords --*/

  // Returns exactly dataCodewordCount bytes: mode indicator, character count,
  // payload, terminator, bit padding and alternating pad bytes.
  public buildDataCodewords(
    data: Readonly<ArrayLike<byte>>,
    mode: Mode = Mode.BYTE
  ): Array<byte> {
    const { version, dataCodewordCount } = this.versionInfo;
    const capacityBits: int = dataCodewordCount * 8;
    const charCountBits: int = mode.numCharCountBits(version);
    const requiredBits: int = 4 + charCountBits + data.length * 8;
    if (data.length >= 2 ** charCountBits || requiredBits > capacityBits)
      throw new QrCodeError(
        ErrorCodes.CAPACITY_EXCEEDED,
        `Data too long: ${requiredBits} bits needed, ${capacityBits} available`,
        { requiredBits, capacityBits, version, ecl: this.versionInfo.errorCorrectionLevel.letter }
      );

    const bb = new BitStream();
    bb.append(mode.modeBits, 4);
    bb.append(data.length, charCountBits);
    bb.appendBytes(data);

    // Add terminator and pad up to a byte if applicable
    if (bb.length <= capacityBits - 4) bb.append(0, 4);
    bb.append(0, (8 - (bb.length % 8)) % 8);

    // Pad with alternating bytes until data capacity is reached
    for (let padByte = 0xec; bb.length < capacityBits; padByte ^= 0xec ^ 0x11)
      bb.append(padByte, 8);

    return bb.toBytes();
  }

  // Splits the data codewords into blocks, appends Reed-Solomon codewords to each,
  // and interleaves the bytes of every block into a single bit stream.
  public interleaveBlocks(dataCodewords: Readonly<Array<byte>>): BitStream {
    const { eccPerBlock, blockCount, totalCodewordCount, dataCodewordCount } =
      this.versionInfo;
    if (dataCodewords.length != dataCodewordCount)
      throw new QrCodeError(
        ErrorCodes.INVALID_INPUT,
        `Expected ${dataCodewordCount} data codewords, got ${dataCodewords.length}`
      );

    const longBlockCount: int = totalCodewordCount % blockCount;
    const shortBlockCount: int = blockCount - longBlockCount;
    const shortBlockLen: int = floor(totalCodewordCount / blockCount);
    const shortBlockDataLen: int = shortBlockLen - eccPerBlock;
    const longBlockDataLen: int = shortBlockDataLen + 1;

    // Short blocks first, then long blocks
    const dataBlocks: Array<Array<byte>> = [];
    const eccBlocks: Array<Array<byte>> = [];
    for (let i = 0, k = 0; i < blockCount; i++) {
      const len: int = i < shortBlockCount ? shortBlockDataLen : longBlockDataLen;
      const block: Array<byte> = dataCodewords.slice(k, k + len);
      k += len;
      dataBlocks.push(block);
      eccBlocks.push(this._encoder.encode(block, eccPerBlock));
    }

    const result = new BitStream();
    for (let i = 0; i < longBlockDataLen; i++) {
      dataBlocks.forEach((block, j) => {
        // Short blocks have no byte at the last data index
        if (j >= shortBlockCount || i < shortBlockDataLen)
          result.append(block[i], 8);
      });
    }
    for (let i = 0; i < eccPerBlock; i++)
      for (const ecc of eccBlocks) result.append(ecc[i], 8);

    if (result.length != totalCodewordCount * 8)
      throw new QrCodeError(
        ErrorCodes.INTERNAL_CONSISTENCY,
        "Final bit stream length mismatch",
        { expected: totalCodewordCount * 8, actual: result.length }
      );
    return result;
  }

  /*-- Masking --*/

  // Runs all eight mask trials, each on its own grid and its own copy of the stream.
  public findBestMask(bitStream: BitStream): {
    mask: int;
    penalty: int;
    modules: ModuleMatrix;
  } {
    let best: { mask: int; penalty: int; modules: ModuleMatrix } | null = null;
    for (let mask = 0; mask < MASK_COUNT; mask++) {
      const modules = this.generateMatrix(bitStream.clone(), mask);
      const penalty: int = getPenaltyScore(modules);
      logger.debug({ mask, penalty }, "mask trial scored");
      if (best === null || penalty < best.penalty)
        best = { mask, penalty, modules };
    }
    if (best === null)
      throw new QrCodeError(ErrorCodes.INTERNAL_CONSISTENCY, "No mask trial ran");
    logger.debug(
      { mask: best.mask, penalty: best.penalty, version: this.versionInfo.version },
      "mask selected"
    );
    return best;
  }

  /*-- Drawing --*/

  // Draws one complete symbol with the given mask, consuming the given stream.
  public generateMatrix(bitStream: BitStream, mask: int): Array<Array<ModuleValue>> {
    assertMask(mask);
    const grid: Array<Array<Cell>> = this.drawFunctionPatterns(mask);
    this._drawData(grid, bitStream, mask);

    return grid.map((row, y) =>
      row.map((cell, x) => {
        if (cell === null)
          throw new QrCodeError(
            ErrorCodes.INTERNAL_CONSISTENCY,
            `Module (${x}, ${y}) left unset`
          );
        return cell;
      })
    );
  }

  // Returns a fresh grid holding every function module for the given mask:
  // finders, alignment and timing patterns, format and version information.
  // Data modules are left null.
  public drawFunctionPatterns(mask: int): Array<Array<Cell>> {
    assertMask(mask);
    const size: int = this.versionInfo.moduleCount;
    const grid: Array<Array<Cell>> = [];
    for (let y = 0; y < size; y++) grid.push(new Array<Cell>(size).fill(null));

    this._drawFixedPatterns(grid);
    this._drawFormatBits(grid, mask);
    if (this.versionInfo.version >= 7) this._drawVersion(grid);
    return grid;
  }

  private _drawFixedPatterns(grid: Array<Array<Cell>>): void {
    const size: int = grid.length;

    // Draw 3 finder patterns (all corners except bottom right), separators included
    this._drawFinderPattern(grid, 3, 3);
    this._drawFinderPattern(grid, size - 4, 3);
    this._drawFinderPattern(grid, 3, size - 4);

    // Draw alignment patterns; those overlapping a finder are skipped
    const alignPatPos: Array<int> = getAlignmentPatternPositions(
      this.versionInfo.version
    );
    for (const y of alignPatPos)
      for (const x of alignPatPos) this._drawAlignmentPattern(grid, x, y);

    // Draw horizontal and vertical timing patterns between the separators
    for (let i = 8; i < size - 8; i++) {
      const color: ModuleValue = i % 2 == 0 ? 1 : 0;
      grid[6][i] = color;
      grid[i][6] = color;
    }

    grid[size - 8][8] = 1; // Always dark
  }

  // Draws a 9*9 finder pattern including the border separator,
  // with the center module at (x, y). Modules can be out of bounds.
  private _drawFinderPattern(grid: Array<Array<Cell>>, x: int, y: int): void {
    const size: int = grid.length;
    for (let dy = -4; dy <= 4; dy++) {
      for (let dx = -4; dx <= 4; dx++) {
        const dist: int = Math.max(abs(dx), abs(dy)); // Chebyshev/infinity norm
        const xx: int = x + dx;
        const yy: int = y + dy;
        if (0 <= xx && xx < size && 0 <= yy && yy < size)
          grid[yy][xx] = dist != 2 && dist != 4 ? 1 : 0;
      }
    }
  }

  // Draws a 5*5 alignment pattern centred at (x, y), unless any module
  // of its footprint already holds a value.
  private _drawAlignmentPattern(grid: Array<Array<Cell>>, x: int, y: int): void {
    const size: int = grid.length;
    for (let dy = -2; dy <= 2; dy++) {
      for (let dx = -2; dx <= 2; dx++) {
        const xx: int = x + dx;
        const yy: int = y + dy;
        if (0 <= xx && xx < size && 0 <= yy && yy < size && grid[yy][xx] !== null)
          return;
      }
    }
    for (let dy = -2; dy <= 2; dy++) {
      for (let dx = -2; dx <= 2; dx++)
        grid[y + dy][x + dx] = Math.max(abs(dx), abs(dy)) != 1 ? 1 : 0;
    }
  }

  // Draws two copies of the format bits for the given mask.
  private _drawFormatBits(grid: Array<Array<Cell>>, mask: int): void {
    const size: int = grid.length;
    const bits: int = QrCodeGenerator.generateFormatBits(
      this.versionInfo.errorCorrectionLevel,
      mask
    );

    // First copy, around the top left finder
    for (let i = 0; i <= 5; i++) grid[i][8] = _getBit(bits, i);
    grid[7][8] = _getBit(bits, 6);
    grid[8][8] = _getBit(bits, 7);
    grid[8][7] = _getBit(bits, 8);
    for (let i = 9; i < 15; i++) grid[8][14 - i] = _getBit(bits, i);

    // Second copy, split between the top right and bottom left finders
    for (let i = 0; i < 8; i++) grid[8][size - 1 - i] = _getBit(bits, i);
    for (let i = 8; i < 15; i++) grid[size - 15 + i][8] = _getBit(bits, i);
  }

  // Draws two copies of the version bits, transposed from each other.
  private _drawVersion(grid: Array<Array<Cell>>): void {
    const size: int = grid.length;
    const bits: int = QrCodeGenerator.generateVersionInfoBits(
      this.versionInfo.version
    );
    for (let i = 0; i < 18; i++) {
      const color: ModuleValue = _getBit(bits, i);
      const a: int = size - 11 + (i % 3);
      const b: int = floor(i / 3);
      grid[b][a] = color;
      grid[a][b] = color;
    }
  }

  // Fills every unset module along the zigzag path with the next stream bit, masked.
  // Once the stream runs out the remainder bits are 0 before masking.
  private _drawData(
    grid: Array<Array<Cell>>,
    bitStream: BitStream,
    mask: int
  ): void {
    for (const [x, y] of zigzagPath(grid.length)) {
      if (grid[y][x] !== null) continue;
      let b: bit = bitStream.popBit() ?? 0;
      if (applyMask(mask, x, y)) b ^= 1;
      grid[y][x] = b == 0 ? 0 : 1;
    }
  }

  /*-- Format and version information --*/

  // Returns the 15 format bits: level code and mask, a 10-bit BCH remainder, XOR 0x5412.
  public static generateFormatBits(ecl: Ecc, mask: int): int {
    assertMask(mask);
    const formatInfo: int = (ecl.formatBits << 3) | mask; // uint2 level code, uint3 mask
    const generator: int = 0b10100110111;
    let data: int = formatInfo << 10;
    for (let i = 14; i >= 10; i--)
      if (((data >>> i) & 1) != 0) data ^= generator << (i - 10);
    return ((formatInfo << 10) | (data & 0x3ff)) ^ 0x5412;
  }

  // Returns the 18 version bits: the 6-bit version and its 12-bit BCH remainder.
  public static generateVersionInfoBits(version: int): int {
    const generator: int = 0b1111100100101;
    let data: int = version << 12;
    for (let i = 17; i >= 12; i--)
      if (((data >>> i) & 1) != 0) data ^= generator << (i - 12);
    return (version << 12) | data;
  }
}

// Returns the data placement order as [x, y] pairs: column pairs from right to left,
// alternately upward and downward, skipping the vertical timing column.
export function zigzagPath(size: int): Array<[int, int]> {
  const path: Array<[int, int]> = [];
  let upward = true;
  for (let right = size - 1; right >= 1; right -= 2) {
    if (right == 6) right = 5;
    for (let vert = 0; vert < size; vert++) {
      const y: int = upward ? size - 1 - vert : vert;
      path.push([right, y], [right - 1, y]);
    }
    upward = !upward;
  }
  return path;
}

// Returns the i'th bit of x as a module value.
function _getBit(x: int, i: int): ModuleValue {
  return ((x >>> i) & 1) != 0 ? 1 : 0;
}
