import { expect, test } from "vitest";

import { resolveLogLevel } from "./logger";

test("LOG_LEVEL takes precedence", () => {
  expect(resolveLogLevel({ LOG_LEVEL: "debug", NODE_ENV: "test" })).toBe(
    "debug"
  );
  expect(resolveLogLevel({ LOG_LEVEL: "WARN" })).toBe("warn");
});

test("falls back on the environment", () => {
  expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent");
  expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("info");
  expect(resolveLogLevel({ LOG_LEVEL: "" })).toBe("info");
});

test("rejects unknown levels", () => {
  expect(() => resolveLogLevel({ LOG_LEVEL: "loud" })).toThrow(
    "Invalid LOG_LEVEL: loud"
  );
});
