import { describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, loadConfig } from "../src/lib/config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      outDir: "outputs",
      downloadDir: "downloads",
      baseUrl: DEFAULT_BASE_URL,
      cookie: null,
      database: null,
      alert: null,
    });
  });

  it("enables history and alerts when configured", () => {
    const config = loadConfig({
      TURSO_DATABASE_URL: "file:runs.db",
      RESEND_API_KEY: "test-key",
      ALERT_EMAIL: "clerk@example.com",
      ECOURTS_COOKIE: "PHPSESSID=test-session",
    });
    expect(config.database).toEqual({ url: "file:runs.db", authToken: null });
    expect(config.alert).toEqual({
      apiKey: "test-key",
      to: "clerk@example.com",
      from: "Cause List Checker <alerts@example.com>",
    });
    expect(config.cookie).toBe("PHPSESSID=test-session");
  });

  it("needs both the API key and a recipient for alerts", () => {
    expect(loadConfig({ RESEND_API_KEY: "test-key" }).alert).toBeNull();
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ TURSO_DATABASE_URL: "  " }).database).toBeNull();
  });

  it("rejects a malformed base URL", () => {
    expect(() => loadConfig({ ECOURTS_BASE_URL: "not a url" })).toThrow(/ECOURTS_BASE_URL/);
  });
});
