import type { AnalysisWarning, Severity } from "../../../shared/src/contracts";

const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

const SEVERITIES: Severity[] = ["low", "medium", "high", "critical"];

export type NormalizedSeverity = {
  severity: Severity;
  warning?: AnalysisWarning;
};

/**
 * Maps a raw scanner severity onto the closed severity set. Anything that is
 * not one of the four known values (after trimming and lower-casing) becomes
 * `low` and yields an `unrecognized_severity` warning.
 */
export function normalizeSeverity(raw: unknown, source: string): NormalizedSeverity {
  const normalized = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  const match = SEVERITIES.find((severity) => severity === normalized);
  if (match) {
    return { severity: match };
  }
  return {
    severity: "low",
    warning: {
      code: "unrecognized_severity",
      source,
      message: "Unrecognized severity treated as low",
      detail: raw === undefined ? "absent" : String(raw)
    }
  };
}

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK[severity];
}

export function isHighOrCritical(severity: Severity): boolean {
  return severity === "high" || severity === "critical";
}

/**
 * Hands out finding ids that are unique within one category. A taken id is
 * first qualified (`CVE-1@openssl`), then counted (`CVE-1@openssl#2`).
 */
export class IdAllocator {
  private readonly taken = new Set<string>();

  allocate(
    preferred: string,
    source: string,
    qualifier?: string
  ): { id: string; warning?: AnalysisWarning } {
    if (!this.taken.has(preferred)) {
      this.taken.add(preferred);
      return { id: preferred };
    }

    const base = qualifier ? `${preferred}@${qualifier}` : preferred;
    let candidate = base;
    let counter = 2;
    while (this.taken.has(candidate)) {
      candidate = `${base}#${counter}`;
      counter += 1;
    }
    this.taken.add(candidate);
    return {
      id: candidate,
      warning: {
        code: "duplicate_finding_id",
        source,
        message: `Duplicate finding id ${preferred} reassigned`,
        detail: candidate
      }
    };
  }
}

/**
 * Reads a scanner text field. Numbers are kept as their decimal form; blank
 * strings and any other type read as absent. The value is never trimmed.
 */
export function optionalText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value.trim().length > 0 ? value : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function textOrUnknown(value: unknown): string {
  return optionalText(value) ?? "unknown";
}

export function numberOrZero(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}
