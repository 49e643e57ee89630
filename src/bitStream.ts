import { ErrorCodes, QrCodeError } from "./errors";

type bit = number;
type byte = number;
type int = number;

/*
 * An ordered sequence of bits backed by a growable byte array.
 * Bits are written at the end (most significant bit first within each byte)
 * and consumed from the front through an independent read cursor.
 */
export class BitStream {
  private _bytes: Array<byte> = [];
  private _bitLength: int = 0;
  private _readPosition: int = 0;

  // Appends the given number of low-order bits of the given value, MSB first.
  // Requires 0 <= value < 2^bitCount. A non-positive bitCount appends nothing.
  public append(value: int, bitCount: int): void {
    if (bitCount <= 0) return;
    if (
      !Number.isInteger(value) ||
      value < 0 ||
      bitCount > 31 ||
      value >>> bitCount != 0
    )
      throw new QrCodeError(
        ErrorCodes.INVALID_VALUE,
        `Value ${value} is too large for ${bitCount} bits`,
        { value, bitCount }
      );

    for (let i = bitCount - 1; i >= 0; i--) {
      const byteIndex: int = this._bitLength >>> 3;
      const bitIndex: int = this._bitLength & 7;
      if (bitIndex == 0) this._bytes[byteIndex] = 0; // Start a fresh byte
      if (((value >>> i) & 1) != 0)
        this._bytes[byteIndex] |= 1 << (7 - bitIndex);
      this._bitLength++;
    }
  }

  // Appends whole bytes. When the stream is byte-aligned the bytes are copied directly.
  public appendBytes(bytes: Readonly<ArrayLike<byte>>): void {
    if (this._bitLength % 8 != 0) {
      for (let i = 0; i < bytes.length; i++) this.append(bytes[i], 8);
      return;
    }
    for (let i = 0; i < bytes.length; i++) {
      const b: byte = bytes[i];
      if (!Number.isInteger(b) || b < 0 || b > 0xff)
        throw new QrCodeError(
          ErrorCodes.INVALID_VALUE,
          `Value ${b} is too large for 8 bits`,
          { value: b, bitCount: 8 }
        );
    }
    for (let i = 0; i < bytes.length; i++) this._bytes.push(bytes[i]);
    this._bitLength += bytes.length * 8;
  }

  // Consumes and returns the next unread bit, or null once the stream is exhausted.
  public popBit(): bit | null {
    if (this._readPosition >= this._bitLength) return null;
    const b: byte = this._bytes[this._readPosition >>> 3];
    const result: bit = (b >>> (7 - (this._readPosition & 7))) & 1;
    this._readPosition++;
    return result;
  }

  // Total number of bits written.
  public get length(): int {
    return this._bitLength;
  }

  // Number of bits not yet consumed by popBit().
  public get remaining(): int {
    return this._bitLength - this._readPosition;
  }

  public toBytes(): Array<byte> {
    if (this._bitLength % 8 != 0)
      throw new QrCodeError(
        ErrorCodes.MISALIGNED,
        "Bit length must be a multiple of 8 to convert to bytes",
        { bitLength: this._bitLength }
      );
    return this._bytes.slice();
  }

  public clear(): void {
    this._bytes = [];
    this._bitLength = 0;
    this._readPosition = 0;
  }

  // Returns an independent copy, read cursor included.
  public clone(): BitStream {
    const result = new BitStream();
    result._bytes = this._bytes.slice();
    result._bitLength = this._bitLength;
    result._readPosition = this._readPosition;
    return result;
  }
}
