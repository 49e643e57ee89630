import { describe, expect, test } from "vitest";

import { ErrorCodes } from "./errors";
import { GaloisField } from "./galoisField";
import { Polynomial } from "./polynomial";

const field = new GaloisField();
const poly = (...coefficients: number[]) => new Polynomial(field, coefficients);

// Small deterministic generator so the property checks are repeatable
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return state;
  };
}

function isNormalized(p: Polynomial): boolean {
  return p.isZero() || p.coefficients[0] != 0;
}

describe("Polynomial", () => {
  test("strips leading zeros in the constructor", () => {
    expect(poly(0, 0, 3, 0).coefficients).toEqual([3, 0]);
    expect(poly(0, 0, 3, 0).degree).toBe(1);
    expect(poly().coefficients).toEqual([0]);
    expect(poly(0, 0).coefficients).toEqual([0]);
    expect(poly(0, 0).degree).toBe(0);
    expect(poly(0).isZero()).toBe(true);
    expect(poly(1).isZero()).toBe(false);
  });

  test("adds by aligning the low-degree ends", () => {
    expect(poly(1, 2, 3).addOrSubtract(poly(5, 6)).coefficients).toEqual([
      1, 7, 5,
    ]);
    expect(poly(5, 6).addOrSubtract(poly(1, 2, 3)).coefficients).toEqual([
      1, 7, 5,
    ]);
    expect(poly(1, 2, 3).addOrSubtract(poly(1, 0, 0)).coefficients).toEqual([
      2, 3,
    ]);
    expect(poly(1, 2).addOrSubtract(poly(1, 2)).coefficients).toEqual([0]);
  });

  test("adding zero returns the other operand", () => {
    const p = poly(4, 5);
    expect(poly(0).addOrSubtract(p)).toBe(p);
    expect(p.addOrSubtract(poly(0))).toBe(p);
  });

  test("multiplies by convolution", () => {
    expect(poly(1, 1).multiply(poly(1, 2)).coefficients).toEqual([1, 3, 2]);
    expect(poly(1, 3, 2).multiply(poly(1, 4)).coefficients).toEqual([
      1, 7, 14, 8,
    ]);
    expect(poly(1, 3, 2).multiply(poly(0)).coefficients).toEqual([0]);
  });

  test("multiplies by a monomial", () => {
    expect(poly(1, 3).multiplyByMonomial(2, 2).coefficients).toEqual([
      2, 6, 0, 0,
    ]);
    expect(poly(1, 3).multiplyByMonomial(0, 1).coefficients).toEqual([1, 3]);
    expect(poly(1, 3).multiplyByMonomial(3, 0).coefficients).toEqual([0]);
    expect(poly(0).multiplyByMonomial(3, 7).coefficients).toEqual([0]);
    expect(() => poly(1).multiplyByMonomial(-1, 1)).toThrow(
      "Degree must be non-negative"
    );
  });

  test("divides with quotient and remainder", () => {
    const [q1, r1] = poly(1, 3, 2).divide(poly(1, 1));
    expect(q1.coefficients).toEqual([1, 2]);
    expect(r1.coefficients).toEqual([0]);

    const [q2, r2] = poly(7, 0, 0, 5, 1).divide(poly(1, 3, 2));
    expect(q2.coefficients).toEqual([7, 9, 21]);
    expect(r2.coefficients).toEqual([40, 43]);

    const [q3, r3] = poly(5).divide(poly(1, 1));
    expect(q3.coefficients).toEqual([0]);
    expect(r3.coefficients).toEqual([5]);
  });

  test("refuses to divide by the zero polynomial", () => {
    let error: unknown = null;
    try {
      poly(1, 2).divide(poly(0, 0));
    } catch (e) {
      error = e;
    }
    expect(error).toMatchObject({
      code: ErrorCodes.POLYNOMIAL_DIVISION_BY_ZERO,
    });
  });

  test("results stay normalized and division reconstructs the dividend", () => {
    const next = lcg(42);
    const randomPoly = () => {
      const length = 1 + (next() % 8);
      const coefficients: number[] = [];
      // Leading zeros are likely on purpose
      for (let i = 0; i < length; i++)
        coefficients.push(next() % 3 == 0 ? 0 : next() % 256);
      return poly(...coefficients);
    };

    for (let i = 0; i < 200; i++) {
      const a = randomPoly();
      const b = randomPoly();
      const results = [
        a,
        a.addOrSubtract(b),
        a.multiply(b),
        a.multiplyByMonomial(next() % 4, next() % 256),
      ];
      for (const r of results) {
        expect(isNormalized(r)).toBe(true);
        expect(r.degree).toBe(r.coefficients.length - 1);
      }
      if (!b.isZero()) {
        const [quotient, remainder] = a.divide(b);
        expect(isNormalized(quotient)).toBe(true);
        expect(isNormalized(remainder)).toBe(true);
        expect(remainder.isZero() || remainder.degree < b.degree).toBe(true);
        expect(
          quotient.multiply(b).addOrSubtract(remainder).coefficients
        ).toEqual(a.coefficients);
      }
    }
  });
});
