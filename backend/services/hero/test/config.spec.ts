// backend/services/hero/test/config.spec.ts
import { describe, it, expect } from "vitest";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_DATASET_URL,
  loadHeroConfig,
} from "../src/config";

const minimal = {
  HERO_PORT: "4100",
  HERO_MONGO_URI: "mongodb://127.0.0.1:27017/heroes",
};

describe("loadHeroConfig", () => {
  it("fills defaults around the required vars", () => {
    expect(loadHeroConfig(minimal)).toEqual({
      env: "development",
      serviceName: "hero",
      port: 4100,
      mongoUri: "mongodb://127.0.0.1:27017/heroes",
      logLevel: "info",
      source: {
        token: "",
        apiBaseUrl: DEFAULT_API_BASE_URL,
        datasetUrl: DEFAULT_DATASET_URL,
        datasetPath: undefined,
        timeoutMs: 30_000,
      },
    });
  });

  it("returns a frozen value", () => {
    const cfg = loadHeroConfig(minimal);
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.source)).toBe(true);
  });

  it("reads the source settings and trims the token", () => {
    const cfg = loadHeroConfig({
      ...minimal,
      SUPERHERO_API_TOKEN: "  test-token ",
      SUPERHERO_API_BASE_URL: "http://127.0.0.1:9/api",
      HERO_DATASET_PATH: "/data/all.json",
      HERO_SOURCE_TIMEOUT_MS: "1500",
      LOG_LEVEL: "debug",
      HERO_SERVICE_NAME: "hero-test",
    });
    expect(cfg.source).toEqual({
      token: "test-token",
      apiBaseUrl: "http://127.0.0.1:9/api",
      datasetUrl: DEFAULT_DATASET_URL,
      datasetPath: "/data/all.json",
      timeoutMs: 1500,
    });
    expect(cfg.logLevel).toBe("debug");
    expect(cfg.serviceName).toBe("hero-test");
  });

  it("treats a blank token as no token", () => {
    expect(loadHeroConfig({ ...minimal, SUPERHERO_API_TOKEN: "   " }).source.token).toBe("");
  });

  it("fails fast on missing or invalid values", () => {
    expect(() => loadHeroConfig({ HERO_PORT: "4100" })).toThrow(
      "Missing required env var: HERO_MONGO_URI"
    );
    expect(() => loadHeroConfig({ ...minimal, HERO_PORT: "abc" })).toThrow(
      'Invalid number for env var HERO_PORT: "abc"'
    );
    expect(() => loadHeroConfig({ ...minimal, LOG_LEVEL: "loud" })).toThrow(
      'Invalid LOG_LEVEL: "loud"'
    );
    expect(() => loadHeroConfig({ ...minimal, HERO_SOURCE_TIMEOUT_MS: "0" })).toThrow(
      'Invalid number for env var HERO_SOURCE_TIMEOUT_MS: "0"'
    );
  });
});
