/**
 * Player Statistics Types
 */

/**
 * A single table cell after parsing. Missing values are always `null`.
 */
export type Cell = string | number | null;

export type Row = Record<string, Cell>;

/**
 * In-memory table. `columns` is the schema and stays meaningful for
 * empty tables; every row carries a key for each listed column.
 */
export interface DataTable {
  columns: string[];
  rows: Row[];
}

export type StatCategory =
  | 'standard'
  | 'shooting'
  | 'passing'
  | 'possession'
  | 'defending';

/**
 * Multi-club handling for players who appear once per club in a season
 * - total: keep the aggregate "Total" row (or one deterministic row)
 * - club: drop aggregates and keep one row per club
 */
export type ClubMode = 'total' | 'club';

export type Role = 'GK' | 'DF' | 'MF' | 'FW';

/**
 * Outcome of a best-effort step. `value` is always usable: on `skipped`
 * and `failed` it is the untouched input.
 */
export type StepResult<T> =
  | { status: 'applied'; value: T; detail?: string }
  | { status: 'skipped'; value: T; reason: string }
  | { status: 'failed'; value: T; reason: string };

/**
 * Match tiers produced by the identity matcher
 */
export type MatchTier =
  | { kind: 'exact' }
  | { kind: 'fuzzy'; score: number }
  | { kind: 'unmatched'; bestScore: number | null }
  | { kind: 'unmatched_empty' }
  | { kind: 'ambiguous'; candidates: number };

export type MatchAuditStatus =
  | 'exact'
  | 'fuzzy_matched'
  | 'unmatched_low_score'
  | 'unmatched_empty'
  | 'ambiguous';

export interface ValuationRecord {
  playerId: string;
  name: string;
  nameNorm: string;
  dateOfBirth: string | null;
  marketValueEur: number | null;
  valueDate: string;
}

export interface IdentityMatch {
  sourceIndex: number;
  player: string;
  tier: MatchTier;
  confidence: number;
  target: ValuationRecord | null;
  bestCandidate: string | null;
  score: number | null;
}

export interface MatchAuditRow {
  player: string;
  status: MatchAuditStatus;
  best: string | null;
  score: number | null;
}

export interface ManualOverride {
  player: string;
  club: string;
  marketValueEur: number | null;
}
