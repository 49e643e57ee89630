import { expect, test } from "vitest";

import { Polynomial } from "./polynomial";
import { ReedSolomonEncoder } from "./reedSolomon";

const encoder = new ReedSolomonEncoder();

test("builds generator polynomials from consecutive powers of two", () => {
  expect(encoder.generatorPolynomial(1).coefficients).toEqual([1, 1]);
  expect(encoder.generatorPolynomial(2).coefficients).toEqual([1, 3, 2]);
  expect(encoder.generatorPolynomial(7).coefficients).toEqual([
    1, 127, 122, 154, 164, 11, 68, 117,
  ]);
  expect(encoder.generatorPolynomial(7)).toBe(encoder.generatorPolynomial(7));
});

test("computes the error correction codewords of a version 1-M block", () => {
  // "HELLO WORLD" in alphanumeric mode, padded to 16 data codewords
  const data = [32, 91, 11, 120, 209, 114, 220, 77, 67, 64, 236, 17, 236, 17, 236, 17];
  expect(encoder.encode(data, 10)).toEqual([
    196, 35, 39, 119, 235, 215, 231, 226, 93, 23,
  ]);
});

test("left-pads short remainders to the requested length", () => {
  expect(encoder.encode([1], 2)).toEqual([3, 2]);
  expect(encoder.encode([0, 0], 2)).toEqual([0, 0]);
  expect(encoder.encode([], 4)).toEqual([0, 0, 0, 0]);
});

test("returns nothing when no codewords are requested", () => {
  expect(encoder.encode([1, 2, 3], 0)).toEqual([]);
  expect(encoder.encode([1, 2, 3], -3)).toEqual([]);
});

test("message followed by its codewords is a multiple of the generator", () => {
  let seed = 7;
  const nextByte = () => {
    seed = (seed * 48271) % 2147483647;
    return seed % 256;
  };
  for (const eccCount of [7, 10, 13, 18, 22, 26, 30]) {
    for (let trial = 0; trial < 5; trial++) {
      const message: number[] = [];
      const length = 1 + (nextByte() % 40);
      for (let i = 0; i < length; i++) message.push(nextByte());

      const ecc = encoder.encode(message, eccCount);
      expect(ecc).toHaveLength(eccCount);

      const codeword = new Polynomial(encoder.field, message.concat(ecc));
      const [, remainder] = codeword.divide(
        encoder.generatorPolynomial(eccCount)
      );
      expect(remainder.isZero()).toBe(true);
    }
  }
});
