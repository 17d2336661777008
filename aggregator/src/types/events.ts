import type { Commitment, Fingerprint } from "./batch.js";

export type AggregatorEvent =
  | { type: "BatchOpened"; batchId: number }
  | { type: "BatchClosed"; batchId: number }
  | {
      type: "DataSubmitted";
      submitter: string;
      batchId: number;
      index: number;
      fingerprint: Fingerprint;
    }
  | {
      type: "DecryptionRequested";
      requestId: bigint;
      batchId: number;
      commitment: Commitment;
    }
  | {
      type: "DecryptionCompleted";
      requestId: bigint;
      batchId: number;
      average: bigint;
    };

export type AggregatorEventListener = (event: AggregatorEvent) => void;
