// src/config.test.ts
import { defaultLogLevel, resolveLogLevel } from "./config";

describe("config - log level", () => {
  test("defaults follow NODE_ENV", () => {
    expect(defaultLogLevel("test")).toBe("silent");
    expect(defaultLogLevel("production")).toBe("info");
    expect(defaultLogLevel("development")).toBe("debug");
  });

  test("keeps levels pino knows", () => {
    expect(resolveLogLevel("warn", "production")).toBe("warn");
    expect(resolveLogLevel("trace", "test")).toBe("trace");
    expect(resolveLogLevel("silent", "development")).toBe("silent");
  });

  test("falls back to the default for unknown or empty levels", () => {
    expect(resolveLogLevel("verbose", "production")).toBe("info");
    expect(resolveLogLevel("", "development")).toBe("debug");
    expect(resolveLogLevel(undefined, "test")).toBe("silent");
  });
});
