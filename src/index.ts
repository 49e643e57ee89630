import { ErrorCodes, QrCodeError, isQrCodeError } from "./errors";
import { logger } from "./logger";
import type { ModuleValue } from "./mask";
import {
  fallbackSize,
  parseQuery,
  type QueryParams,
  type RenderOptions,
} from "./options";
import { QrCode, QrCodeGenerator } from "./qrcodegen";
import { Ecc, type EccLetter } from "./versionInfo";

type byte = number;

function group<T>(arr: ReadonlyArray<T>) {
  const groups: T[][] = [];
  let last = arr[0];
  let group: T[] = [];
  for (let i = 0; i < arr.length; i++) {
    const current = arr[i];
    if (current === last) {
      group.push(current);
    } else {
      groups.push(group);
      group = [current];
      last = current;
    }
  }
  groups.push(group);
  return groups;
}

const DOT_SIZE = 2;
function buildPath(qr: QrCode) {
  const OFFSET = DOT_SIZE / 2;
  let path = "";
  for (let y = 0; y < qr.size; y++) {
    const line: ModuleValue[][] = group(qr.modules[y]);
    const len = line.length;

    for (let i = 0; i < len; i++) {
      const group = line[i];

      if (group[0] === 0 && i === 0) {
        // if the first element is light, then it's a gap and we can move directly to the next group
        path += `M${group.length * DOT_SIZE} ${y * DOT_SIZE + OFFSET}`;
        continue;
      } else if (group[0] === 1 && i === 0) {
        // Otherwise we have to move to the start of the line
        path += `M0 ${y * DOT_SIZE + OFFSET}`;
      }

      // if the last element is light, then it's a gap and we can move directly to the next line
      if (i === len - 1 && group[0] === 0) {
        break;
      }

      if (group[0] === 1) {
        path += `h${group.length * DOT_SIZE}`;
      } else {
        path += `m${group.length * DOT_SIZE} 0`;
      }
    }
  }
  return path;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  size: 256,
  margin: 20,
  color: "#000",
  background: "#fff",
};

// Draws the modules scaled into the square left after removing the margin.
export function renderSvg(
  qr: QrCode,
  opts: Partial<RenderOptions> = {}
): string {
  const size = opts.size ?? DEFAULT_RENDER_OPTIONS.size;
  const margin = opts.margin ?? DEFAULT_RENDER_OPTIONS.margin;
  const color = opts.color ?? DEFAULT_RENDER_OPTIONS.color;
  const background = opts.background ?? DEFAULT_RENDER_OPTIONS.background;
  const drawSize = size - 2 * margin;
  if (drawSize <= 0)
    throw new QrCodeError(ErrorCodes.INVALID_INPUT, "Margin is too large", {
      size,
      margin,
    });
  const scale = drawSize / (qr.size * DOT_SIZE);
  const path = buildPath(qr);
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${size} ${size}" width="${size}" height="${size}"><rect width="${size}" height="${size}" fill="${background}" /><path transform="translate(${margin} ${margin}) scale(${scale})" stroke="${color}" stroke-width="${DOT_SIZE}" d="${path}" /></svg>`;
}

/*---- Error image ----*/

const ERROR_COLOR = "#d32f2f";
const ERROR_PADDING = 20;
const ERROR_CHAR_WIDTH = 9;
const ERROR_FONT_SIZE = 15;
const ERROR_LINE_HEIGHT = ERROR_FONT_SIZE + 5;

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

// Breaks text into lines of at most `width` characters at spaces.
// Words longer than a line are cut.
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    let line = "";
    for (let word of paragraph.split(" ")) {
      while (word.length > width) {
        if (line !== "") {
          lines.push(line);
          line = "";
        }
        lines.push(word.slice(0, width));
        word = word.slice(width);
      }
      if (line === "") line = word;
      else if (line.length + 1 + word.length <= width) line += ` ${word}`;
      else {
        lines.push(line);
        line = word;
      }
    }
    lines.push(line);
  }
  return lines;
}

// A white image with the message centred in red, standing in for a QR Code that could not be made.
export function renderErrorSvg(
  message: string,
  width: number,
  height: number
): string {
  const charsPerLine = Math.max(
    1,
    Math.floor((width - 2 * ERROR_PADDING) / ERROR_CHAR_WIDTH)
  );
  const lines = wrapText(message, charsPerLine);
  let y = (height - lines.length * ERROR_LINE_HEIGHT) / 2;
  let text = "";
  for (const line of lines) {
    text += `<text x="${width / 2}" y="${y}" dominant-baseline="hanging" text-anchor="middle" font-family="monospace" font-size="${ERROR_FONT_SIZE}" fill="${ERROR_COLOR}">${escapeXml(line)}</text>`;
    y += ERROR_LINE_HEIGHT;
  }
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}"><rect width="${width}" height="${height}" fill="#fff" />${text}</svg>`;
}

/*---- Entry points ----*/

export interface MakeSvgOptions extends Partial<RenderOptions> {
  version?: number;
  ecl?: Ecc | EccLetter;
  // Pinned mask pattern; omitted or null selects one automatically
  mask?: number | null;
}

// Encodes text (as UTF-8) or raw bytes and renders the symbol. Throws a QrCodeError on failure.
export default function makeSvg(
  input: string | Readonly<ArrayLike<byte>>,
  opts: MakeSvgOptions = {}
): string {
  const { version = 7, ecl = Ecc.QUARTILE, mask = null, ...render } = opts;
  const data = typeof input === "string" ? Buffer.from(input, "utf8") : input;
  const level = typeof ecl === "string" ? Ecc.fromLetter(ecl) : ecl;
  const qr = new QrCodeGenerator(version, level, mask).render(data);
  return renderSvg(qr, render);
}

export type RenderResult =
  | { ok: true; svg: string; qr: QrCode }
  | { ok: false; svg: string; error: QrCodeError };

// Parses the query, encodes and renders. Any failure is logged and
// answered with an error image instead of a QR Code.
export function renderQuery(query: QueryParams): RenderResult {
  try {
    const request = parseQuery(query);
    const qr = new QrCodeGenerator(
      request.version,
      request.ecl,
      request.mask
    ).render(request.data);
    return { ok: true, svg: renderSvg(qr, request), qr };
  } catch (err) {
    logger.error({ err }, "QR code rendering failed");
    const error = isQrCodeError(err)
      ? err
      : new QrCodeError(
          ErrorCodes.INTERNAL_CONSISTENCY,
          err instanceof Error ? err.message : String(err),
          { cause: err }
        );
    const size = fallbackSize(query);
    return {
      ok: false,
      svg: renderErrorSvg(error.message, size, size),
      error,
    };
  }
}

export { BitStream } from "./bitStream";
export { ErrorCodes, QrCodeError, isQrCodeError } from "./errors";
export type { ErrorCode } from "./errors";
export { GaloisField } from "./galoisField";
export { applyMask, getPenaltyBreakdown, getPenaltyScore } from "./mask";
export type { ModuleMatrix, ModuleValue, PenaltyBreakdown } from "./mask";
export { DEFAULT_TEXT, parseQuery } from "./options";
export type { QueryParams, RenderOptions, RenderRequest } from "./options";
export { Polynomial } from "./polynomial";
export { QrCode, QrCodeGenerator, zigzagPath } from "./qrcodegen";
export { ReedSolomonEncoder } from "./reedSolomon";
export { Ecc, Mode, getVersionInfo } from "./versionInfo";
export type { EccLetter, VersionInfo } from "./versionInfo";
