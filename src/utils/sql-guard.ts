import { RejectedStatementError } from "./errors.js";

// Textual checks only. Keywords inside string literals or identifiers are
// rejected too, and mutating constructs wrapped in a SELECT get through.
const FORBIDDEN_KEYWORDS = ["INSERT", "UPDATE", "DELETE", "DROP", "CREATE", "ALTER", "TRUNCATE"] as const;

export const DEFAULT_ROW_CAP = 50;

export const ROW_CAP_NOTICE = `Note: Query result limited to ${DEFAULT_ROW_CAP} rows for performance. Use explicit LIMIT to change this.`;

export type GuardResult = { allowed: true } | { allowed: false; error: RejectedStatementError };

export function checkSelectOnly(sql: string): GuardResult {
  const upper = sql.trim().toUpperCase();

  if (!upper.startsWith("SELECT")) {
    return { allowed: false, error: new RejectedStatementError("Only SELECT statements are allowed") };
  }

  const keyword = FORBIDDEN_KEYWORDS.find((k) => upper.includes(k));
  if (keyword) {
    return { allowed: false, error: new RejectedStatementError(`${keyword} statements are not allowed`) };
  }

  return { allowed: true };
}

export interface RowCapResult {
  sql: string;
  capped: boolean;
}

/** Appends a LIMIT clause unless the text already mentions LIMIT or TOP anywhere. */
export function applyRowCap(sql: string, cap = DEFAULT_ROW_CAP): RowCapResult {
  const upper = sql.toUpperCase();
  if (upper.includes("LIMIT") || upper.includes("TOP")) {
    return { sql, capped: false };
  }
  return { sql: `${sql} LIMIT ${cap}`, capped: true };
}
