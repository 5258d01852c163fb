import type Database from "better-sqlite3";
import type {
  AnalysisRecord,
  AnalysisResult,
  RiskLevel
} from "../../../../shared/src/contracts";
import { countFindings } from "../../analysis/aggregator";
import { newId } from "../../utils/ids";
import { nowIso } from "../../utils/time";

type AnalysisRow = {
  id: string;
  target_service: string;
  generated_at: string;
  risk_score: number;
  risk_level: string;
  finding_count: number;
  warning_count: number;
  result_json: string;
  created_at: string;
};

const RISK_LEVELS: RiskLevel[] = ["low", "medium", "high", "critical"];

export class AnalysesRepo {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  save(result: AnalysisResult): AnalysisRecord {
    const record: AnalysisRecord = {
      id: newId(),
      target_service: result.target_service,
      generated_at: result.generated_at,
      risk_score: result.risk_assessment.score,
      risk_level: result.risk_assessment.level,
      finding_count: countFindings(result.findings),
      warning_count: result.warnings.length,
      created_at: nowIso()
    };
    this.db
      .prepare(
        `INSERT INTO analyses
        (id, target_service, generated_at, risk_score, risk_level, finding_count,
         warning_count, result_json, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        record.target_service,
        record.generated_at,
        record.risk_score,
        record.risk_level,
        record.finding_count,
        record.warning_count,
        JSON.stringify(result),
        record.created_at
      );
    return record;
  }

  list(options: { target_service?: string; limit?: number } = {}): AnalysisRecord[] {
    const limit = options.limit ?? 50;
    const rows = options.target_service
      ? (this.db
          .prepare(
            "SELECT * FROM analyses WHERE target_service = ? ORDER BY created_at DESC, rowid DESC LIMIT ?"
          )
          .all(options.target_service, limit) as AnalysisRow[])
      : (this.db
          .prepare("SELECT * FROM analyses ORDER BY created_at DESC, rowid DESC LIMIT ?")
          .all(limit) as AnalysisRow[]);
    return rows.map((row) => this.toRecord(row));
  }

  getById(id: string): { record: AnalysisRecord; result: AnalysisResult } | null {
    const row = this.db
      .prepare("SELECT * FROM analyses WHERE id = ?")
      .get(id) as AnalysisRow | undefined;
    if (!row) {
      return null;
    }
    return {
      record: this.toRecord(row),
      result: JSON.parse(row.result_json) as AnalysisResult
    };
  }

  private toRecord(row: AnalysisRow): AnalysisRecord {
    return {
      id: row.id,
      target_service: row.target_service,
      generated_at: row.generated_at,
      risk_score: row.risk_score,
      risk_level: RISK_LEVELS.find((level) => level === row.risk_level) ?? "low",
      finding_count: row.finding_count,
      warning_count: row.warning_count,
      created_at: row.created_at
    };
  }
}
