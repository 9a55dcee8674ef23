import { describe, expect, it } from "vitest";
import { getBridgeConfig } from "./config.js";
import { DEFAULT_MAPPING_DIR } from "./mapping/store.js";

describe("getBridgeConfig", () => {
  it("falls back to defaults", () => {
    expect(getBridgeConfig({})).toEqual({
      host: "127.0.0.1",
      port: 8000,
      allowedOrigins: ["http://localhost:3000"],
      progId: "Inventor.Application",
      timeout: 30_000,
      mappingDir: DEFAULT_MAPPING_DIR,
    });
  });

  it("reads overrides", () => {
    const config = getBridgeConfig({
      HOST: "0.0.0.0",
      PORT: "9100",
      ALLOWED_ORIGINS: " http://localhost:5173 , https://dash.example.test ,",
      CAD_PROG_ID: "Inventor.Application.2025",
      BRIDGE_TIMEOUT: "5000",
      MAPPING_DIR: "/tmp/maps",
    });
    expect(config).toEqual({
      host: "0.0.0.0",
      port: 9100,
      allowedOrigins: ["http://localhost:5173", "https://dash.example.test"],
      progId: "Inventor.Application.2025",
      timeout: 5000,
      mappingDir: "/tmp/maps",
    });
  });

  it.each(["abc", "70000", "-1", "80.5"])("rejects PORT=%s", (port) => {
    expect(() => getBridgeConfig({ PORT: port })).toThrow(`Invalid PORT "${port}"`);
  });

  it.each(["-5", "1.5", "0", "soon"])("rejects BRIDGE_TIMEOUT=%s", (timeout) => {
    expect(() => getBridgeConfig({ BRIDGE_TIMEOUT: timeout })).toThrow(
      `Invalid BRIDGE_TIMEOUT "${timeout}"`,
    );
  });

  it("treats a blank BRIDGE_TIMEOUT as unset", () => {
    expect(getBridgeConfig({ BRIDGE_TIMEOUT: "  " }).timeout).toBe(30_000);
  });
});
