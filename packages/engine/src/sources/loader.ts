import fs from "fs";
import path from "path";
import type {
  AnalysisWarning,
  SourceKind,
  SourceStatus,
  SourceSummary
} from "../../../shared/src/contracts";
import type {
  LoadedArtifact,
  SourceDataset,
  StructuredArtifactMap,
  StructuredSourceKind,
  TextDocument
} from "../../../core/src/artifacts";
import { validateArtifactContent } from "../../../core/src/artifacts";
import { DEFAULT_LOAD_TIMEOUT_MS } from "../config";
import { MalformedArtifactError } from "../errors";
import { Logger } from "../logger";
import { withDeadline } from "../utils/time";

export const STRUCTURED_ARTIFACT_PATHS: Record<StructuredSourceKind, string> = {
  compliance_benchmark: "security/cis_benchmark_report.json",
  vulnerability_scan: "security/trivy_vulnerability_report.json",
  sbom: "security/sbom_report.json"
};

export const DOCUMENT_SOURCES: Record<"network_policies" | "logs", { dir: string; extensions: string[] }> = {
  network_policies: { dir: "policies", extensions: [".yaml", ".yml"] },
  logs: { dir: "logs", extensions: [".log"] }
};

export type SourceLoadOptions = {
  timeoutMs?: number;
  logger?: Logger;
};

export interface SourceLoadResult {
  dataset: SourceDataset;
  sources: Record<SourceKind, SourceSummary>;
  warnings: AnalysisWarning[];
}

type KindOutcome<T> = {
  items: T[];
  status: SourceStatus;
  warnings: AnalysisWarning[];
};

/**
 * Loads every known artifact type under `rootDir`.
 *
 * The five source kinds load concurrently and share nothing; the outcomes are
 * merged into a fixed, type-keyed structure so arrival order never leaks into
 * the dataset. Missing artifacts are not an error. Malformed or unreadable
 * artifacts are skipped with a warning.
 */
export async function loadSourceDataset(
  rootDir: string,
  options: SourceLoadOptions = {}
): Promise<SourceLoadResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
  const logger = (options.logger ?? new Logger("info")).child("sources");

  const [compliance, vulnerability, sbom, policies, logs] = await Promise.all([
    loadStructured(rootDir, "compliance_benchmark", timeoutMs, logger),
    loadStructured(rootDir, "vulnerability_scan", timeoutMs, logger),
    loadStructured(rootDir, "sbom", timeoutMs, logger),
    loadDocuments(rootDir, "network_policies", timeoutMs, logger),
    loadDocuments(rootDir, "logs", timeoutMs, logger)
  ]);

  const dataset: SourceDataset = {
    compliance_benchmark: compliance.items,
    vulnerability_scan: vulnerability.items,
    sbom: sbom.items,
    network_policies: policies.items,
    logs: logs.items
  };

  const sources: Record<SourceKind, SourceSummary> = {
    compliance_benchmark: summarize(compliance),
    vulnerability_scan: summarize(vulnerability),
    sbom: summarize(sbom),
    network_policies: summarize(policies),
    logs: summarize(logs)
  };

  const warnings = [
    ...compliance.warnings,
    ...vulnerability.warnings,
    ...sbom.warnings,
    ...policies.warnings,
    ...logs.warnings
  ];

  logger.debug("sources loaded", { rootDir, sources });
  return { dataset, sources, warnings };
}

export function emptyDataset(): SourceDataset {
  return {
    compliance_benchmark: [],
    vulnerability_scan: [],
    sbom: [],
    network_policies: [],
    logs: []
  };
}

async function loadStructured<K extends StructuredSourceKind>(
  rootDir: string,
  kind: K,
  timeoutMs: number,
  logger: Logger
): Promise<KindOutcome<LoadedArtifact<StructuredArtifactMap[K]>>> {
  const relativePath = STRUCTURED_ARTIFACT_PATHS[kind];
  const filePath = path.join(rootDir, relativePath);

  let raw: string;
  try {
    raw = await readBounded(filePath, timeoutMs);
  } catch (error) {
    if (isNotFound(error)) {
      logger.info("artifact not present", { kind, path: relativePath });
      return { items: [], status: "missing", warnings: [] };
    }
    const reason = describeError(error);
    logger.warn("artifact unreadable", { kind, path: relativePath, reason });
    return {
      items: [],
      status: "unreadable",
      warnings: [unreadableWarning(relativePath, reason)]
    };
  }

  try {
    const content = parseStructured(kind, relativePath, raw);
    return { items: [{ path: relativePath, content }], status: "loaded", warnings: [] };
  } catch (error) {
    if (!(error instanceof MalformedArtifactError)) {
      throw error;
    }
    logger.warn("artifact malformed, skipping", { kind, path: relativePath, reason: error.message });
    return {
      items: [],
      status: "malformed",
      warnings: [
        {
          code: "malformed_artifact",
          source: relativePath,
          message: `Skipped malformed ${kind} artifact`,
          detail: error.message
        }
      ]
    };
  }
}

export function parseStructured<K extends StructuredSourceKind>(
  kind: K,
  artifactPath: string,
  raw: string
): StructuredArtifactMap[K] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedArtifactError(artifactPath, `invalid JSON (${describeError(error)})`);
  }
  const validation = validateArtifactContent(kind, parsed);
  if (!validation.ok) {
    throw new MalformedArtifactError(artifactPath, validation.errors.join("; "));
  }
  return parsed as StructuredArtifactMap[K];
}

async function loadDocuments(
  rootDir: string,
  kind: "network_policies" | "logs",
  timeoutMs: number,
  logger: Logger
): Promise<KindOutcome<TextDocument>> {
  const { dir, extensions } = DOCUMENT_SOURCES[kind];
  const dirPath = path.join(rootDir, dir);

  let entries: fs.Dirent[];
  try {
    entries = await withDeadline(
      fs.promises.readdir(dirPath, { withFileTypes: true }),
      timeoutMs
    );
  } catch (error) {
    if (isNotFound(error)) {
      logger.info("document directory not present", { kind, dir });
      return { items: [], status: "missing", warnings: [] };
    }
    const reason = describeError(error);
    logger.warn("document directory unreadable", { kind, dir, reason });
    return { items: [], status: "unreadable", warnings: [unreadableWarning(dir, reason)] };
  }

  const names = entries
    .filter((entry) => entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();

  const reads = await Promise.all(
    names.map(async (name): Promise<{ document: TextDocument } | { name: string; reason: string }> => {
      try {
        const content = await readBounded(path.join(dirPath, name), timeoutMs);
        return { document: { filename: name, content } };
      } catch (error) {
        return { name, reason: describeError(error) };
      }
    })
  );

  const items: TextDocument[] = [];
  const warnings: AnalysisWarning[] = [];
  for (const read of reads) {
    if ("document" in read) {
      items.push(read.document);
    } else {
      logger.warn("document unreadable, skipping", { kind, file: read.name, reason: read.reason });
      warnings.push(unreadableWarning(`${dir}/${read.name}`, read.reason));
    }
  }

  if (items.length === 0 && names.length === 0) {
    logger.info("no documents found", { kind, dir });
    return { items, status: "missing", warnings };
  }
  return { items, status: items.length > 0 ? "loaded" : "unreadable", warnings };
}

async function readBounded(filePath: string, timeoutMs: number): Promise<string> {
  return fs.promises.readFile(filePath, {
    encoding: "utf8",
    signal: AbortSignal.timeout(timeoutMs)
  });
}

function summarize<T>(outcome: KindOutcome<T>): SourceSummary {
  return { status: outcome.status, documents: outcome.items.length };
}

function unreadableWarning(source: string, reason: string): AnalysisWarning {
  return {
    code: "unreadable_artifact",
    source,
    message: "Skipped unreadable artifact",
    detail: reason
  };
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
