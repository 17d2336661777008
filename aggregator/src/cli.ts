#!/usr/bin/env npx tsx
/**
 * Aggregator simulation CLI
 *
 * Runs one batch end to end against the simulated ciphertext capability and
 * the local oracle: submit readings, optionally close the batch, request the
 * average, deliver the oracle callback.
 *
 * Usage:
 *   npx tsx aggregator/src/cli.ts simulate 10 20 30
 *   npx tsx aggregator/src/cli.ts simulate 10 20 25 --close
 *   npx tsx aggregator/src/cli.ts simulate 10 20 30 --tamper
 */

import { Command } from "commander";
import { Wallet } from "ethers";
import { loadConfig } from "./config.js";
import { DataAggregator } from "./service.js";
import { SignerSetAttestationVerifier } from "./oracle/attestation.js";
import { LocalDecryptionOracle } from "./oracle/localOracle.js";
import {
  SimulatedCiphertextCapability,
  UnknownHandleError,
  type SimulatedHandle,
} from "./fhe/simulatedCapability.js";
import { createLogger } from "./utils/logger.js";

interface SimulateOptions {
  close?: boolean;
  tamper?: boolean;
}

function parseReading(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Reading must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw);
}

async function simulate(readings: string[], opts: SimulateOptions): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const signers = config.oracleSignerKeys.map((key) => new Wallet(key));
  const capability = new SimulatedCiphertextCapability();
  const oracle = new LocalDecryptionOracle<SimulatedHandle>({
    reveal: (handle) => capability.reveal(handle),
    signers,
    logger,
    maxRetries: config.relayMaxRetries,
    baseDelayMs: config.relayBaseDelayMs,
    shouldRetry: (err) => !(err instanceof UnknownHandleError),
  });

  // One throwaway identity plays owner, provider and requester.
  const operator = Wallet.createRandom().address;
  const aggregator = new DataAggregator<SimulatedHandle>({
    owner: operator,
    instanceAddress: config.instanceAddress,
    capability,
    oracle,
    attestations: new SignerSetAttestationVerifier({
      signers: signers.map((s) => s.address),
      threshold: config.attestationThreshold,
    }),
    logger,
    // Single operator submits back to back.
    submitCooldownSeconds: 0,
    requestCooldownSeconds: config.requestCooldownSeconds,
  });

  const batchId = aggregator.getCurrentBatchId();
  for (const raw of readings) {
    aggregator.submit(capability.encrypt(parseReading(raw)), operator);
  }

  if (opts.close) {
    aggregator.closeBatch(operator);
  }

  const requestId = aggregator.requestAggregateDecryption(batchId, operator);

  if (opts.tamper) {
    if (opts.close) {
      logger.warn("Batch is closed, --tamper has nothing to append to");
    } else {
      aggregator.submit(capability.encrypt(1n), operator);
    }
  }

  const outcome = await oracle.fulfill(requestId);
  if (outcome.status === "rejected") {
    logger.error({ requestId: requestId.toString(), code: outcome.code }, outcome.message);
    process.exitCode = 1;
    return;
  }

  const result = aggregator.getLatestResult(batchId);
  logger.info(
    {
      batchId,
      readings: readings.length,
      average: result?.average.toString(),
    },
    "Simulation finished"
  );
}

const program = new Command();

program
  .name("sealed-average")
  .description("Encrypted batch averages with oracle-verified decryption")
  .version("0.1.0");

program
  .command("simulate")
  .description("Submit readings to one batch and reveal their average")
  .argument("<values...>", "plaintext readings to encrypt and submit")
  .option("--close", "close the batch before requesting the average")
  .option("--tamper", "append one more reading between request and callback")
  .action(async (values: string[], opts: SimulateOptions) => {
    await simulate(values, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
