import type {
  Finding,
  FindingsByCategory,
  RiskAssessment,
  RiskLevel,
  Severity
} from "../../../shared/src/contracts";
import { severityRank } from "./severity";

type WeightRule = {
  category: "vulnerability" | "compliance" | "misconfiguration";
  severity: Severity;
  points: number;
  factor: (finding: Finding) => string;
};

// Fixed weight table; reproduced as-is, not tuned.
export const RISK_WEIGHTS: WeightRule[] = [
  {
    category: "vulnerability",
    severity: "critical",
    points: 10,
    factor: (finding) => `Critical vulnerability: ${finding.id}`
  },
  {
    category: "vulnerability",
    severity: "high",
    points: 5,
    factor: (finding) => `High vulnerability: ${finding.id}`
  },
  {
    category: "compliance",
    severity: "critical",
    points: 8,
    factor: (finding) => `Critical compliance failure: ${finding.id}`
  },
  {
    category: "compliance",
    severity: "high",
    points: 4,
    factor: (finding) => `High compliance failure: ${finding.id}`
  },
  {
    category: "misconfiguration",
    severity: "high",
    points: 6,
    factor: (finding) =>
      `High misconfiguration: ${finding.category === "misconfiguration" ? finding.details.title : finding.id}`
  }
];

const SCORED_CATEGORIES = ["vulnerability", "compliance", "misconfiguration"] as const;

/**
 * Blast-radius labels added to every assessment. They are an assumption of
 * the model, not something observed in the sources.
 */
export const ASSUMED_COMPONENTS = [
  "kubernetes-cluster",
  "network-infrastructure",
  "container-runtime"
];

export function levelForScore(score: number): RiskLevel {
  if (score >= 20) {
    return "critical";
  }
  if (score >= 10) {
    return "high";
  }
  if (score >= 5) {
    return "medium";
  }
  return "low";
}

type Contribution = {
  categoryRank: number;
  severityRank: number;
  index: number;
  factor: string;
};

/**
 * Additive risk score. `factors` are ordered by category precedence, then by
 * severity (critical first), then by input order, so permuting the input
 * within a severity band is the only thing that can change their order.
 */
export function score(findings: FindingsByCategory, targetService: string): RiskAssessment {
  let total = 0;
  const contributions: Contribution[] = [];

  SCORED_CATEGORIES.forEach((category, categoryRank) => {
    const list: ReadonlyArray<Finding> = findings[category];
    list.forEach((finding, index) => {
      const rule = RISK_WEIGHTS.find(
        (entry) => entry.category === category && entry.severity === finding.severity
      );
      if (!rule) {
        return;
      }
      total += rule.points;
      contributions.push({
        categoryRank,
        severityRank: severityRank(finding.severity),
        index,
        factor: rule.factor(finding)
      });
    });
  });

  contributions.sort(
    (a, b) =>
      a.categoryRank - b.categoryRank || b.severityRank - a.severityRank || a.index - b.index
  );

  const affected = [targetService];
  for (const component of ASSUMED_COMPONENTS) {
    if (!affected.includes(component)) {
      affected.push(component);
    }
  }

  return {
    score: total,
    level: levelForScore(total),
    factors: contributions.map((entry) => entry.factor),
    affected_components: affected,
    assumed_components: [...ASSUMED_COMPONENTS]
  };
}
