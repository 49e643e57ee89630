import { z } from "zod";

import { ErrorCodes, QrCodeError } from "./errors";
import { Ecc, MAX_VERSION, MIN_VERSION } from "./versionInfo";

type byte = number;
type int = number;

export const DEFAULT_TEXT = "https://github.com/agtkh/";

export type QueryParams = Readonly<Record<string, string | undefined>>;

export interface RenderOptions {
  // Edge length of the square image in pixels.
  readonly size: int;
  // Blank border in pixels on every side.
  readonly margin: int;
  readonly color: string;
  readonly background: string;
}

export interface RenderRequest extends RenderOptions {
  readonly data: Uint8Array;
  readonly version: int;
  readonly ecl: Ecc;
  // null selects the mask automatically
  readonly mask: int | null;
}

const integer = (min: int, max: int) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, "Expected an integer")
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

const colorSchema = z
  .string()
  .trim()
  .regex(/^#(?:[0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/, "Expected a hex color");

export const querySchema = z.object({
  size: integer(32, 4096).default("256"),
  margin: integer(0, 4096).default("20"),
  version: integer(MIN_VERSION, MAX_VERSION).default("7"),
  ecl: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(["L", "M", "Q", "H"]))
    .default("Q"),
  mask: z
    .union([z.literal("auto"), integer(0, 7)])
    .default("auto"),
  color: colorSchema.default("#000"),
  background: colorSchema.default("#fff"),
  base64: z.string().optional(),
  bytes: z.string().optional(),
  text: z.string().optional(),
});

export type ParsedQuery = z.infer<typeof querySchema>;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// Converts an HTTP-query-like record into a validated render request.
// The payload comes from base64, else bytes, else text, else the default text.
export function parseQuery(query: QueryParams): RenderRequest {
  const parsed = querySchema.safeParse(query);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new QrCodeError(
      ErrorCodes.INVALID_INPUT,
      `Invalid '${issue.path.join(".")}' parameter: ${issue.message}`,
      parsed.error.issues
    );
  }
  const params: ParsedQuery = parsed.data;

  return {
    data: parsePayload(params),
    version: params.version,
    ecl: Ecc.fromLetter(params.ecl),
    mask: params.mask == "auto" ? null : params.mask,
    size: params.size,
    margin: params.margin,
    color: params.color,
    background: params.background,
  };
}

export function parsePayload(
  params: Pick<ParsedQuery, "base64" | "bytes" | "text">
): Uint8Array {
  if (params.base64 !== undefined) {
    if (!BASE64_PATTERN.test(params.base64))
      throw new QrCodeError(
        ErrorCodes.INVALID_INPUT,
        "Invalid Base64 string provided in 'base64' parameter"
      );
    return new Uint8Array(Buffer.from(params.base64, "base64"));
  }
  if (params.bytes !== undefined) {
    const values: Array<byte> = params.bytes.split(",").map((s) => {
      const trimmed = s.trim();
      const value = Number(trimmed);
      if (!/^\d+$/.test(trimmed) || value > 255)
        throw new QrCodeError(
          ErrorCodes.INVALID_INPUT,
          "Byte value in 'bytes' parameter must be between 0 and 255",
          { value: s }
        );
      return value;
    });
    return Uint8Array.from(values);
  }
  return new Uint8Array(Buffer.from(params.text ?? DEFAULT_TEXT, "utf8"));
}

// Image size to use for an error image when the query itself may be invalid.
export function fallbackSize(query: QueryParams): int {
  const parsed = querySchema.shape.size.safeParse(query.size);
  return parsed.success ? parsed.data : 256;
}
