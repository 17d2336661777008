export interface AggregatorConfig {
  instanceAddress: string;
  oracleSignerKeys: string[];
  attestationThreshold: number;
  submitCooldownSeconds: number;
  requestCooldownSeconds: number;
  relayMaxRetries: number;
  relayBaseDelayMs: number;
  logLevel: string;
}
