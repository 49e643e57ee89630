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

import { GaloisField } from "./galoisField";
import { Polynomial } from "./polynomial";

type byte = number;
type int = number;

/*
 * Computes Reed-Solomon error correction codewords over GF(2^8/0x11D).
 * Generator polynomials are cached per degree, since a symbol uses the same
 * degree for every one of its blocks.
 */
export class ReedSolomonEncoder {
  private readonly _generators: Map<int, Polynomial> = new Map();

  public constructor(
    private readonly _field: GaloisField = new GaloisField()
  ) {}

  public get field(): GaloisField {
    return this._field;
  }

  // Returns the product (x - a^0) * (x - a^1) * ... * (x - a^{degree-1}), where a = 0x02
  // is a generator element of the field. Subtraction is addition here.
  public generatorPolynomial(degree: int): Polynomial {
    const cached = this._generators.get(degree);
    if (cached !== undefined) return cached;

    let result = new Polynomial(this._field, [1]);
    for (let i = 0; i < degree; i++)
      result = result.multiply(
        new Polynomial(this._field, [1, this._field.exp(i)])
      );
    this._generators.set(degree, result);
    return result;
  }

  // Returns exactly eccCount error correction codewords for the given message,
  // i.e. the remainder of message * x^eccCount divided by the generator.
  public encode(message: Readonly<Array<byte>>, eccCount: int): Array<byte> {
    if (eccCount <= 0) return [];

    const generator: Polynomial = this.generatorPolynomial(eccCount);
    const shifted: Polynomial = new Polynomial(
      this._field,
      message
    ).multiplyByMonomial(eccCount, 1);
    const [, remainder] = shifted.divide(generator);

    // The remainder can have a lower degree than eccCount - 1
    const coefficients: ReadonlyArray<int> = remainder.coefficients;
    const result: Array<byte> = new Array<byte>(
      eccCount - coefficients.length
    ).fill(0);
    for (const c of coefficients) result.push(c);
    return result;
  }
}
