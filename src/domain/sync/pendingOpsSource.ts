export interface PendingOpsSummary {
  notes: number;
  vaultItems: number;
  total: number;
}

export interface PendingOpsSource {
  getSummary(): Promise<PendingOpsSummary>;
  hasPending(): Promise<boolean>;
}
