import { ErrorCodes, QrCodeError } from "./errors";

type int = number;

/*
 * Arithmetic in the finite field GF(order), order being a power of two,
 * through exponent and logarithm tables. The tables hold order-1 entries and
 * are built by repeated multiplication by 2 reduced by the primitive polynomial.
 */
export class GaloisField {
  // x^8 + x^4 + x^3 + x^2 + 1, the field used by QR Codes.
  public static readonly QR_PRIMITIVE_POLYNOMIAL: int = 0b100011101;

  private readonly _expTable: Array<int> = [];
  private readonly _logTable: Array<int> = [];
  private readonly _mod: int;

  public constructor(
    public readonly order: int = 256,
    primitivePolynomial: int = GaloisField.QR_PRIMITIVE_POLYNOMIAL
  ) {
    this._mod = order - 1;
    for (let i = 0; i < order; i++) this._logTable.push(0);

    let x: int = 1;
    for (let i = 0; i < this._mod; i++) {
      this._expTable.push(x);
      this._logTable[x] = i;
      x *= 2;
      if (x > this._mod) x ^= primitivePolynomial;
    }
  }

  public add(a: int, b: int): int {
    return a ^ b;
  }

  public multiply(a: int, b: int): int {
    if (a == 0 || b == 0) return 0;
    return this.exp((this.log(a) + this.log(b)) % this._mod);
  }

  public divide(a: int, b: int): int {
    if (b == 0)
      throw new QrCodeError(ErrorCodes.DIVISION_BY_ZERO, "Division by zero", {
        dividend: a,
      });
    if (a == 0) return 0;
    return this.exp((this.log(a) - this.log(b) + this._mod) % this._mod);
  }

  public log(a: int): int {
    if (a == 0)
      throw new QrCodeError(ErrorCodes.UNDEFINED_LOG, "Log(0) is undefined");
    return this._logTable[a];
  }

  public exp(a: int): int {
    return this._expTable[a];
  }
}
