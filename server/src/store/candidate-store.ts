/**
 * Store collaborator for candidate records. Implementations translate their
 * own failures into StoreError so callers can apply one retry policy.
 */

export interface CandidateRecord {
  id: number;
  rawText: string | null;
  readyAt: string | null;
  claimedAt: string | null;
  processedAt: string | null;
}

export interface ClaimableQuery {
  windowDays: number;
  limit: number;
  now: Date;
}

/** Column name → value. `null` writes SQL NULL. */
export type CandidateRow = Record<string, string | null>;

export interface CandidateStore {
  /**
   * Unclaimed, unprocessed records with text that became ready inside the
   * window, most recently ready first. Reads may be stale.
   */
  selectClaimable(query: ClaimableQuery): Promise<CandidateRecord[]>;
  getById(id: number): Promise<CandidateRecord | null>;
  /**
   * Sets `claimed_at` only while it is still unset. Resolves true when this
   * caller won the claim.
   */
  claim(id: number, claimedAt: Date): Promise<boolean>;
  exists(id: number): Promise<boolean>;
  update(id: number, row: CandidateRow): Promise<void>;
  insert(id: number, row: CandidateRow): Promise<void>;
  /** Cheap connectivity probe for readiness checks. */
  ping(): Promise<boolean>;
}
