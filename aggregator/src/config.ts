import "dotenv/config";
import { isAddress, isHexString, getAddress } from "ethers";
import type { AggregatorConfig } from "./types/config.js";

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Environment variable ${name} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export function loadConfig(): AggregatorConfig {
  const instanceAddress = requireEnv("INSTANCE_ADDRESS");
  if (!isAddress(instanceAddress)) {
    throw new Error(`INSTANCE_ADDRESS is not a valid address: ${instanceAddress}`);
  }

  const oracleSignerKeys = requireEnv("ORACLE_SIGNER_KEYS")
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
  for (const key of oracleSignerKeys) {
    if (!isHexString(key, 32)) {
      throw new Error("ORACLE_SIGNER_KEYS must hold comma-separated 32-byte hex keys");
    }
  }
  if (oracleSignerKeys.length === 0) {
    throw new Error("ORACLE_SIGNER_KEYS must name at least one key");
  }

  const attestationThreshold = intEnv("ATTESTATION_THRESHOLD", oracleSignerKeys.length);
  if (attestationThreshold < 1 || attestationThreshold > oracleSignerKeys.length) {
    throw new Error(
      `ATTESTATION_THRESHOLD must be between 1 and ${oracleSignerKeys.length}, got ${attestationThreshold}`
    );
  }

  return {
    instanceAddress: getAddress(instanceAddress),
    oracleSignerKeys,
    attestationThreshold,
    submitCooldownSeconds: intEnv("SUBMIT_COOLDOWN_SECONDS", 60),
    requestCooldownSeconds: intEnv("REQUEST_COOLDOWN_SECONDS", 300),
    relayMaxRetries: intEnv("RELAY_MAX_RETRIES", 3),
    relayBaseDelayMs: intEnv("RELAY_BASE_DELAY_MS", 1000),
    logLevel: process.env.LOG_LEVEL ?? "info",
  };
}
