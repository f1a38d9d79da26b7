import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults", () => {
    const env = loadEnv({});

    expect(env).toEqual({
      CONFIG_DIR: "config",
      OUTPUT_DIR: "output",
      MONGO_URI: "mongodb://localhost:27017/scraper",
      LOG_LEVEL: "info"
    });
  });

  it.each([
    "mongodb://localhost:27017/scraper",
    "mongodb+srv://cluster.example.net/scraper"
  ])("accepts valid MONGO_URI: %s", (uri) => {
    expect(loadEnv({ MONGO_URI: uri }).MONGO_URI).toBe(uri);
  });

  it("rejects MONGO_URI values that are not URIs", () => {
    expect(() => loadEnv({ MONGO_URI: "localhost:27017" })).toThrow(
      "MONGO_URI must use mongodb or mongodb+srv scheme. Received: localhost:27017"
    );
    expect(() => loadEnv({ MONGO_URI: "not a uri" })).toThrow(
      "MONGO_URI must be a valid mongodb:// or mongodb+srv:// URI. Received: not a uri"
    );
  });

  it("rejects unsupported MONGO_URI schemes", () => {
    expect(() => loadEnv({ MONGO_URI: "postgres://localhost/db" })).toThrow(
      "MONGO_URI must use mongodb or mongodb+srv scheme. Received: postgres://localhost/db"
    );
  });

  it("normalizes LOG_LEVEL and rejects unknown levels", () => {
    expect(loadEnv({ LOG_LEVEL: " DEBUG " }).LOG_LEVEL).toBe("debug");
    expect(() => loadEnv({ LOG_LEVEL: "verbose" })).toThrow(
      "LOG_LEVEL must be one of debug, info, warn, error. Received: verbose"
    );
  });

  it("trims directory overrides and ignores blank ones", () => {
    const env = loadEnv({ CONFIG_DIR: " ./conf ", OUTPUT_DIR: "  " });
    expect(env.CONFIG_DIR).toBe("./conf");
    expect(env.OUTPUT_DIR).toBe("output");
  });
});
