import { ErrorCodes, QrCodeError } from "./errors";
import type { GaloisField } from "./galoisField";

type int = number;

/*
 * A polynomial over a Galois field. Coefficients are stored from the highest
 * power to the lowest, e.g. x^3 + 255x^2 + 8x + 93 is [1, 255, 8, 93].
 * The constructor strips leading zero coefficients, and the zero polynomial
 * is always [0]. Instances are immutable; every operation returns a new one.
 */
export class Polynomial {
  public readonly coefficients: ReadonlyArray<int>;
  public readonly degree: int;

  public constructor(
    private readonly _field: GaloisField,
    coefficients: ReadonlyArray<int>
  ) {
    let firstNonzero: int = 0;
    while (
      firstNonzero < coefficients.length &&
      coefficients[firstNonzero] == 0
    )
      firstNonzero++;
    this.coefficients =
      firstNonzero == coefficients.length
        ? [0]
        : coefficients.slice(firstNonzero);
    this.degree = this.coefficients.length - 1;
  }

  public isZero(): boolean {
    return this.coefficients.length == 1 && this.coefficients[0] == 0;
  }

  // The coefficient of the highest-degree term.
  public leadingCoefficient(): int {
    return this.coefficients[0];
  }

  // Addition and subtraction coincide in characteristic 2.
  public addOrSubtract(other: Polynomial): Polynomial {
    if (this.isZero()) return other;
    if (other.isZero()) return this;

    let small: ReadonlyArray<int> = this.coefficients;
    let large: ReadonlyArray<int> = other.coefficients;
    if (small.length > large.length) [small, large] = [large, small];

    const sum: Array<int> = large.slice();
    const offset: int = large.length - small.length;
    for (let i = 0; i < small.length; i++)
      sum[offset + i] = this._field.add(sum[offset + i], small[i]);
    return new Polynomial(this._field, sum);
  }

  public multiply(other: Polynomial): Polynomial {
    if (this.isZero() || other.isZero()) return this._zero();

    const a: ReadonlyArray<int> = this.coefficients;
    const b: ReadonlyArray<int> = other.coefficients;
    const product: Array<int> = new Array<int>(a.length + b.length - 1).fill(0);
    for (let i = 0; i < a.length; i++) {
      for (let j = 0; j < b.length; j++)
        product[i + j] = this._field.add(
          product[i + j],
          this._field.multiply(a[i], b[j])
        );
    }
    return new Polynomial(this._field, product);
  }

  // Multiplies every coefficient by the given field element and raises the degree by the given amount.
  public multiplyByMonomial(degree: int, coefficient: int): Polynomial {
    if (degree < 0)
      throw new QrCodeError(
        ErrorCodes.INVALID_INPUT,
        "Degree must be non-negative",
        { degree }
      );
    if (this.isZero() || coefficient == 0) return this._zero();

    const product: Array<int> = new Array<int>(
      this.coefficients.length + degree
    ).fill(0);
    this.coefficients.forEach(
      (c, i) => (product[i] = this._field.multiply(c, coefficient))
    );
    return new Polynomial(this._field, product);
  }

  // Long division. Returns [quotient, remainder].
  public divide(divisor: Polynomial): [Polynomial, Polynomial] {
    if (divisor.isZero())
      throw new QrCodeError(
        ErrorCodes.POLYNOMIAL_DIVISION_BY_ZERO,
        "Division by the zero polynomial"
      );

    let quotient: Polynomial = this._zero();
    let remainder: Polynomial = this;
    const divisorLead: int = divisor.leadingCoefficient();

    while (!remainder.isZero() && remainder.degree >= divisor.degree) {
      const degreeDiff: int = remainder.degree - divisor.degree;
      const scale: int = this._field.divide(
        remainder.leadingCoefficient(),
        divisorLead
      );
      const term: Polynomial = divisor.multiplyByMonomial(degreeDiff, scale);
      const monomial: Polynomial = new Polynomial(this._field, [
        scale,
        ...new Array<int>(degreeDiff).fill(0),
      ]);
      quotient = quotient.addOrSubtract(monomial);
      remainder = remainder.addOrSubtract(term);
    }
    return [quotient, remainder];
  }

  private _zero(): Polynomial {
    return new Polynomial(this._field, [0]);
  }
}
