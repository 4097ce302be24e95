import { describe, it, expect, vi, afterEach } from "vitest";

async function loadConfig() {
  vi.resetModules();
  const { config } = await import("../apps/operator/src/config");
  return config;
}

describe("config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads intervals and the port as integers", async () => {
    vi.stubEnv("CLOCK_POLL_INTERVAL_MS", "5000");
    vi.stubEnv("PORT", "9090");

    const config = await loadConfig();

    expect(config.clock.pollIntervalMs).toBe(5000);
    expect(config.server.port).toBe(9090);
  });

  it("falls back to defaults for empty values", async () => {
    vi.stubEnv("CLOCK_POLL_INTERVAL_MS", "");
    vi.stubEnv("PORT", "");

    const config = await loadConfig();

    expect(config.clock.pollIntervalMs).toBe(30_000);
    expect(config.server.port).toBe(8080);
  });

  it("rejects a poll interval that is not a number", async () => {
    vi.stubEnv("CLOCK_POLL_INTERVAL_MS", "fast");
    await expect(loadConfig()).rejects.toThrow('CLOCK_POLL_INTERVAL_MS must be a non-negative integer, got "fast"');
  });

  it("rejects a zero poll interval", async () => {
    vi.stubEnv("CLOCK_POLL_INTERVAL_MS", "0");
    await expect(loadConfig()).rejects.toThrow('CLOCK_POLL_INTERVAL_MS must be positive, got "0"');
  });

  it("rejects a port that is not a number", async () => {
    vi.stubEnv("PORT", "http");
    await expect(loadConfig()).rejects.toThrow('PORT must be a non-negative integer, got "http"');
  });

  it("rejects a port out of range", async () => {
    vi.stubEnv("PORT", "70000");
    await expect(loadConfig()).rejects.toThrow('PORT must be a TCP port, got "70000"');
  });
});
