import assert from "node:assert/strict";
import { test } from "node:test";
import {
  IdAllocator,
  normalizeSeverity,
  numberOrZero,
  optionalText,
  severityRank,
  textOrUnknown
} from "../src/analysis/severity";

test("severity is normalized case-insensitively", () => {
  assert.deepEqual(normalizeSeverity("CRITICAL", "a.json"), { severity: "critical" });
  assert.deepEqual(normalizeSeverity(" High ", "a.json"), { severity: "high" });
  assert.deepEqual(normalizeSeverity("medium", "a.json"), { severity: "medium" });
});

test("unrecognized severity defaults to low with a warning", () => {
  assert.deepEqual(normalizeSeverity("urgent", "security/sbom_report.json"), {
    severity: "low",
    warning: {
      code: "unrecognized_severity",
      source: "security/sbom_report.json",
      message: "Unrecognized severity treated as low",
      detail: "urgent"
    }
  });
  assert.equal(normalizeSeverity(undefined, "x").warning?.detail, "absent");
  assert.equal(normalizeSeverity(3, "x").warning?.detail, "3");
});

test("severity ranks are ordered", () => {
  assert.ok(severityRank("low") < severityRank("medium"));
  assert.ok(severityRank("medium") < severityRank("high"));
  assert.ok(severityRank("high") < severityRank("critical"));
});

test("id allocator qualifies then counts duplicates", () => {
  const ids = new IdAllocator();
  assert.deepEqual(ids.allocate("CVE-1", "s.json", "openssl"), { id: "CVE-1" });
  assert.equal(ids.allocate("CVE-1", "s.json", "openssl").id, "CVE-1@openssl");
  assert.equal(ids.allocate("CVE-1", "s.json", "openssl").id, "CVE-1@openssl#2");
  assert.equal(ids.allocate("CVE-1", "s.json").id, "CVE-1#2");
});

test("scanner text fields are read without rewriting them", () => {
  assert.equal(optionalText("  Set runAsNonRoot  "), "  Set runAsNonRoot  ");
  assert.equal(optionalText(512), "512");
  assert.equal(optionalText("   "), undefined);
  assert.equal(optionalText(null), undefined);
  assert.equal(textOrUnknown({ id: "x" }), "unknown");
  assert.equal(textOrUnknown(Number.NaN), "unknown");
});

test("cvss scores that are not numbers read as zero", () => {
  assert.equal(numberOrZero(7.5), 7.5);
  assert.equal(numberOrZero("7.5"), 0);
  assert.equal(numberOrZero(null), 0);
  assert.equal(numberOrZero(Number.POSITIVE_INFINITY), 0);
});
