import path from "path";
import type Database from "better-sqlite3";
import type {
  AnalysisGetResponse,
  AnalysisListRequest,
  AnalysisListResponse,
  AnalysisWarning,
  AnalyzeRequest,
  AnalyzeResponse,
  Finding
} from "../../shared/src/contracts";
import type { ExtractorContext, ExtractorLogEntry } from "../../core/src/extractors";
import { buildAnalysisResult, groupFindings } from "./analysis/aggregator";
import { correlate } from "./analysis/correlator";
import { plan } from "./analysis/planner";
import { score } from "./analysis/scorer";
import type { EngineConfig } from "./config";
import { ConfigError, NotFoundError, ValidationError } from "./errors";
import { createBuiltinRegistry } from "./extractors/builtin";
import type { ExtractorRegistry } from "./extractors/registry";
import { runExtractor } from "./extractors/runner";
import { Logger } from "./logger";
import { loadSourceDataset } from "./sources/loader";
import { openDatabase } from "./storage/db";
import { createRepos, type StorageRepos } from "./storage";

export type Clock = () => Date;

export interface EngineOptions {
  logger?: Logger;
  registry?: ExtractorRegistry;
  clock?: Clock;
}

export class Engine {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly registry: ExtractorRegistry;
  private readonly clock: Clock;
  private db?: Database.Database;
  private repos?: StorageRepos;

  constructor(config: EngineConfig, options?: EngineOptions) {
    this.config = config;
    this.logger = options?.logger ?? new Logger(config.logLevel ?? "info");
    this.registry = options?.registry ?? createBuiltinRegistry(this.logger);
    this.clock = options?.clock ?? (() => new Date());
  }

  async start(): Promise<void> {
    if (this.config.dbPath) {
      this.db = openDatabase(this.config.dbPath, this.logger);
      this.repos = createRepos(this.db);
    }
  }

  async stop(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = undefined;
      this.repos = undefined;
    }
  }

  /**
   * Runs the whole pipeline once: load, extract, correlate, score, plan,
   * aggregate. Missing or malformed sources become warnings on the result;
   * an invariant violation propagates.
   */
  async analyze(request: AnalyzeRequest = {}): Promise<AnalyzeResponse> {
    const targetService = request.target_service ?? this.config.targetService;
    if (!targetService.trim()) {
      throw new ValidationError("target_service must not be empty");
    }
    const sourcesDir = path.resolve(request.sources_dir ?? this.config.sourcesDir);
    const logger = this.logger.child("analysis");
    logger.info("analysis started", { targetService, sourcesDir });

    const loaded = await loadSourceDataset(sourcesDir, {
      timeoutMs: this.config.loadTimeoutMs,
      logger: this.logger
    });

    const ctx: ExtractorContext = {
      target_service: targetService,
      scope_policies_to_target: this.config.scopePoliciesToTarget ?? false
    };
    const findings: Finding[] = [];
    const warnings: AnalysisWarning[] = [...loaded.warnings];
    for (const manifest of this.registry.listExtractors()) {
      const extraction = runExtractor(this.registry, manifest.id, loaded.dataset, ctx);
      this.forwardLogs(manifest.id, extraction.logs);
      findings.push(...extraction.findings);
      warnings.push(...extraction.warnings);
    }

    const grouped = groupFindings(findings);
    const correlations = correlate(grouped);
    const riskAssessment = score(grouped, targetService);
    const remediationPlan = plan(grouped, correlations);

    const result = buildAnalysisResult({
      target_service: targetService,
      generated_at: this.clock().toISOString(),
      sources: loaded.sources,
      findings: grouped,
      correlations,
      risk_assessment: riskAssessment,
      remediation_plan: remediationPlan,
      warnings
    });

    logger.info("analysis complete", {
      targetService,
      findings: findings.length,
      correlations: correlations.length,
      score: riskAssessment.score,
      level: riskAssessment.level,
      warnings: warnings.length
    });

    if (!this.repos) {
      return { result };
    }
    const record = this.repos.analyses.save(result);
    logger.debug("analysis stored", { id: record.id });
    return { result, record };
  }

  async listAnalyses(request: AnalysisListRequest = {}): Promise<AnalysisListResponse> {
    const { repos } = this.ensureHistory();
    if (request.limit !== undefined && (!Number.isInteger(request.limit) || request.limit <= 0)) {
      throw new ValidationError("limit must be a positive integer");
    }
    return { analyses: repos.analyses.list(request) };
  }

  async getAnalysis(id: string): Promise<AnalysisGetResponse> {
    const { repos } = this.ensureHistory();
    const stored = repos.analyses.getById(id);
    if (!stored) {
      throw new NotFoundError(`Analysis not found: ${id}`);
    }
    return stored;
  }

  private forwardLogs(extractorId: string, logs: ExtractorLogEntry[]): void {
    const logger = this.logger.child("extractor");
    for (const entry of logs) {
      const meta = { extractor: extractorId, data: entry.data };
      switch (entry.level) {
        case "debug":
          logger.debug(entry.message, meta);
          break;
        case "info":
          logger.info(entry.message, meta);
          break;
        case "warn":
          logger.warn(entry.message, meta);
          break;
        case "error":
          logger.error(entry.message, meta);
          break;
      }
    }
  }

  private ensureHistory(): { repos: StorageRepos } {
    if (!this.repos) {
      throw new ConfigError("Run history is not enabled; set a database path and call start()");
    }
    return { repos: this.repos };
  }
}
