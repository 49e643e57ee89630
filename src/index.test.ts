import jsQR from "jsqr";
import sharp from "sharp";
import { describe, expect, test } from "vitest";

import makeSvg, {
  ErrorCodes,
  QrCodeGenerator,
  renderErrorSvg,
  renderQuery,
  renderSvg,
  wrapText,
} from "./index";
import { Ecc, type EccLetter } from "./versionInfo";

async function scanCode(svg: string) {
  const { data, info } = await sharp(Buffer.from(svg))
    .flatten({
      background: { r: 255, g: 255, b: 255 },
    })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const code = jsQR(
    new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    info.width,
    info.height
  );

  return code?.data;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return null;
}

describe("makeSvg", () => {
  test("should make a scannable svg", async () => {
    const svg = makeSvg("hello world");
    expect(await scanCode(svg)).toBe("hello world");
  });

  test("should handle emojis", async () => {
    const svg = makeSvg("👋🌍", { size: 512, margin: 48 });
    expect(await scanCode(svg)).toBe("👋🌍");
  });

  test("should handle empty strings", async () => {
    const svg = makeSvg("", { size: 512, margin: 48 });
    expect(await scanCode(svg)).toBe("");
  });

  test("should accept raw bytes", async () => {
    const svg = makeSvg([0x68, 0x69], { size: 512, margin: 48 });
    expect(await scanCode(svg)).toBe("hi");
  });

  test.each<{ version: number; ecl: EccLetter }>([
    { version: 1, ecl: "M" },
    { version: 2, ecl: "M" },
    { version: 7, ecl: "Q" },
    { version: 10, ecl: "H" },
  ])("should scan at version $version-$ecl", async ({ version, ecl }) => {
    const text = `v${version}${ecl}`;
    const svg = makeSvg(text, { version, ecl, size: 512, margin: 48 });
    expect(await scanCode(svg)).toBe(text);
  });

  test("should scan with a pinned mask", async () => {
    const svg = makeSvg("pinned", { mask: 6, size: 512, margin: 48 });
    expect(await scanCode(svg)).toBe("pinned");
  });

  test("should report data that does not fit", () => {
    expect(
      captureError(() => makeSvg("fifteen bytes!!", { version: 1, ecl: "M" }))
    ).toMatchObject({ code: ErrorCodes.CAPACITY_EXCEEDED });
  });
});

describe("renderSvg", () => {
  const qr = new QrCodeGenerator(1, Ecc.MEDIUM).render([0x41]);

  test("draws rows as stroked runs scaled into the margin", () => {
    const svg = renderSvg(qr, { size: 104, margin: 10 });
    expect(
      svg.startsWith(
        '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 104 104" width="104" height="104">' +
          '<rect width="104" height="104" fill="#fff" />' +
          '<path transform="translate(10 10) scale(2)" stroke="#000" stroke-width="2" ' +
          'd="M0 1h14m2 0h2m4 0h2m4 0h14M0 3h2m10 0h2'
      )
    ).toBe(true);
    expect(svg.endsWith('" /></svg>')).toBe(true);
  });

  test("uses the given colours", () => {
    const svg = renderSvg(qr, { color: "#123456", background: "#abcdef" });
    expect(svg).toContain('<rect width="256" height="256" fill="#abcdef" />');
    expect(svg).toContain('stroke="#123456"');
  });

  test("rejects a margin that leaves no room", () => {
    expect(
      captureError(() => renderSvg(qr, { size: 64, margin: 32 }))
    ).toMatchObject({
      code: ErrorCodes.INVALID_INPUT,
      message: "Margin is too large",
    });
  });
});

describe("error image", () => {
  test("wrapText breaks at spaces and cuts long words", () => {
    expect(wrapText("the quick brown fox", 10)).toEqual([
      "the quick",
      "brown fox",
    ]);
    expect(wrapText("abcdefghijkl", 5)).toEqual(["abcde", "fghij", "kl"]);
    expect(wrapText("a\nb", 10)).toEqual(["a", "b"]);
  });

  test("renderErrorSvg centres escaped text", () => {
    expect(renderErrorSvg("Bad & <worse>", 200, 100)).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 200 100" width="200" height="100">' +
        '<rect width="200" height="100" fill="#fff" />' +
        '<text x="100" y="40" dominant-baseline="hanging" text-anchor="middle" ' +
        'font-family="monospace" font-size="15" fill="#d32f2f">Bad &amp; &lt;worse&gt;</text>' +
        "</svg>"
    );
  });
});

describe("renderQuery", () => {
  test("renders a QR code from query parameters", async () => {
    const result = renderQuery({ text: "query", size: "512", margin: "48" });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.qr.version).toBe(7);
    expect(result.qr.errorCorrectionLevel).toBe(Ecc.QUARTILE);
    expect(await scanCode(result.svg)).toBe("query");
  });

  test("answers a capacity failure with an error image", () => {
    const result = renderQuery({
      version: "1",
      ecl: "H",
      text: "more than nine bytes",
      size: "300",
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCodes.CAPACITY_EXCEEDED);
    expect(result.svg).toContain('viewBox="0 0 300 300"');
    expect(result.svg).toContain('fill="#d32f2f">Data too long:');
  });

  test("falls back to the default size when the size is invalid", () => {
    const result = renderQuery({ size: "huge" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe(ErrorCodes.INVALID_INPUT);
    expect(result.svg).toContain('viewBox="0 0 256 256"');
  });
});
