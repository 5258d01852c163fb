import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type {
  ApplicationErrorFinding,
  ComplianceFinding,
  DependencyFinding,
  MisconfigurationFinding,
  Severity,
  VulnerabilityFinding
} from "../../shared/src/contracts";

export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `posture-rca-${label}-`));
}

export function writeSources(root: string, files: Record<string, string | object>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const body = typeof content === "string" ? content : JSON.stringify(content, null, 2);
    fs.writeFileSync(filePath, body, "utf8");
  }
}

/** A small but complete sources tree touching every extractor. */
export const SAMPLE_SOURCES: Record<string, string | object> = {
  "security/cis_benchmark_report.json": {
    report: {
      benchmark: "CIS Kubernetes Benchmark v1.8",
      failed_checks_details: [
        {
          id: "5.2.5",
          description: "Minimize the admission of containers with allowPrivilegeEscalation",
          severity: "high",
          remediation: "Set allowPrivilegeEscalation to false"
        },
        {
          id: "5.7.3",
          description: "Apply security context to pods",
          severity: "medium",
          remediation: "Add a securityContext"
        }
      ]
    }
  },
  "security/trivy_vulnerability_report.json": {
    report: {
      target: "registry.local/payment-service:1.4.2",
      findings: [
        {
          vulnerability_id: "CVE-2024-0001",
          package_name: "openssl",
          severity: "CRITICAL",
          cvss_score: 9.8,
          description: "Buffer overflow in TLS handshake"
        },
        {
          vulnerability_id: "CVE-2024-0002",
          package_name: "zlib",
          severity: "HIGH",
          cvss_score: 7.5,
          description: "Heap corruption in inflate"
        }
      ],
      misconfigurations: [
        {
          id: "KSV012",
          title: "Runs as root user",
          severity: "HIGH",
          message: "Container should set runAsNonRoot",
          resolution: "Set runAsNonRoot to true"
        }
      ]
    }
  },
  "security/sbom_report.json": {
    packages: [
      {
        SPDXID: "SPDXRef-openssl",
        name: "openssl",
        versionInfo: "3.0.2",
        licenseConcluded: "Apache-2.0"
      }
    ],
    vulnerabilities: [
      { name: "CVE-2024-0001", severity: "CRITICAL", affectedPackages: ["SPDXRef-openssl"] }
    ]
  },
  "policies/payment-service-ingress.yaml": "kind: NetworkPolicy\n# Allow ingress from any namespace\n",
  "policies/ledger.yaml": "kind: NetworkPolicy\n# allow specific-namespace\n",
  "logs/api-gateway.log": "POST /v1/payments 405 Method Not Allowed\n",
  "logs/kube-events.log": "pod/payment-service-7d9f CrashLoopBackOff\n"
};

export function vulnerability(id: string, pkg: string, severity: Severity): VulnerabilityFinding {
  return {
    category: "vulnerability",
    id,
    severity,
    description: `${id} in ${pkg}`,
    impact_note: "Container security vulnerability",
    source_artifact: "security/trivy_vulnerability_report.json",
    details: { package: pkg, cvss_score: 0 }
  };
}

export function compliance(id: string, severity: Severity, hint?: string): ComplianceFinding {
  return {
    category: "compliance",
    id,
    severity,
    description: `Check ${id}`,
    ...(hint ? { remediation_hint: hint } : {}),
    impact_note: "Kubernetes security compliance violation",
    source_artifact: "security/cis_benchmark_report.json"
  };
}

export function misconfiguration(
  id: string,
  title: string,
  kind: "container_misconfiguration" | "network_policy" = "container_misconfiguration",
  hint?: string
): MisconfigurationFinding {
  return {
    category: "misconfiguration",
    id,
    severity: "high",
    description: title,
    ...(hint ? { remediation_hint: hint } : {}),
    impact_note: "Container configuration weakens workload isolation",
    source_artifact: "security/trivy_vulnerability_report.json",
    details: { kind, title }
  };
}

export function dependency(pkg: string, vulnerabilityName: string): DependencyFinding {
  return {
    category: "dependency",
    id: `${pkg}@1.0.0:${vulnerabilityName}`,
    severity: "high",
    description: `${pkg} 1.0.0 is affected by ${vulnerabilityName}`,
    impact_note: "Vulnerable third-party component in the application build",
    source_artifact: "security/sbom_report.json",
    details: { package: pkg, version: "1.0.0", vulnerability: vulnerabilityName, license: "MIT" }
  };
}

export function applicationError(filename: string): ApplicationErrorFinding {
  return {
    category: "application_error",
    id: `CrashLoopBackOff:${filename}`,
    severity: "high",
    description: "Pod repeatedly crashing",
    impact_note: "Application stability issue",
    source_artifact: `logs/${filename}`,
    details: { kind: "pod_failure", marker: "CrashLoopBackOff" }
  };
}
