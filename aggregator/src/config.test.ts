import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { getAddress } from "ethers";
import { loadConfig } from "./config.js";

const KEY_1 = "0x" + "11".repeat(32);
const KEY_2 = "0x" + "22".repeat(32);
const VARS = [
  "INSTANCE_ADDRESS",
  "ORACLE_SIGNER_KEYS",
  "ATTESTATION_THRESHOLD",
  "SUBMIT_COOLDOWN_SECONDS",
  "REQUEST_COOLDOWN_SECONDS",
  "RELAY_MAX_RETRIES",
  "RELAY_BASE_DELAY_MS",
  "LOG_LEVEL",
];

describe("loadConfig", () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = Object.fromEntries(VARS.map((name) => [name, process.env[name]]));
    for (const name of VARS) delete process.env[name];
    process.env.INSTANCE_ADDRESS = "0x000000000000000000000000000000000000aaaa";
    process.env.ORACLE_SIGNER_KEYS = `${KEY_1}, ${KEY_2}`;
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved[name];
      if (value === undefined) delete process.env[name];
      else process.env[name] = value;
    }
  });

  it("applies defaults to optional settings", () => {
    expect(loadConfig()).toEqual({
      instanceAddress: getAddress("0x000000000000000000000000000000000000aaaa"),
      oracleSignerKeys: [KEY_1, KEY_2],
      attestationThreshold: 2,
      submitCooldownSeconds: 60,
      requestCooldownSeconds: 300,
      relayMaxRetries: 3,
      relayBaseDelayMs: 1000,
      logLevel: "info",
    });
  });

  it("reads overrides", () => {
    process.env.ATTESTATION_THRESHOLD = "1";
    process.env.SUBMIT_COOLDOWN_SECONDS = "0";
    process.env.REQUEST_COOLDOWN_SECONDS = "30";
    process.env.LOG_LEVEL = "debug";

    const config = loadConfig();

    expect(config.attestationThreshold).toBe(1);
    expect(config.submitCooldownSeconds).toBe(0);
    expect(config.requestCooldownSeconds).toBe(30);
    expect(config.logLevel).toBe("debug");
  });

  it("fails fast on a missing required variable", () => {
    delete process.env.INSTANCE_ADDRESS;
    expect(() => loadConfig()).toThrow("Missing required environment variable: INSTANCE_ADDRESS");
  });

  it("rejects a malformed instance address", () => {
    process.env.INSTANCE_ADDRESS = "0x1234";
    expect(() => loadConfig()).toThrow("INSTANCE_ADDRESS is not a valid address: 0x1234");
  });

  it("rejects malformed signer keys", () => {
    process.env.ORACLE_SIGNER_KEYS = "0x1234";
    expect(() => loadConfig()).toThrow(
      "ORACLE_SIGNER_KEYS must hold comma-separated 32-byte hex keys"
    );
  });

  it("rejects a threshold above the signer count", () => {
    process.env.ATTESTATION_THRESHOLD = "3";
    expect(() => loadConfig()).toThrow("ATTESTATION_THRESHOLD must be between 1 and 2, got 3");
  });

  it("rejects non-integer numbers", () => {
    process.env.SUBMIT_COOLDOWN_SECONDS = "1.5";
    expect(() => loadConfig()).toThrow(
      'Environment variable SUBMIT_COOLDOWN_SECONDS must be a non-negative integer, got "1.5"'
    );
  });
});
