import fs from "fs";
import path from "path";
import type { AnalysisRecord, AnalysisResult } from "../../../shared/src/contracts";
import { countFindings } from "../analysis/aggregator";
import { loadConfigFromEnv, parseLogLevel, type LogLevel } from "../config";
import { Engine, type Clock } from "../engine";
import { EngineError, ValidationError } from "../errors";
import { Logger } from "../logger";
import {
  buildMarkdownReport,
  isReportFormat,
  renderHtmlReport,
  renderJsonReport,
  reportTitle,
  type ReportFormat
} from "../report";

export type AnalyzeArgs = {
  target?: string;
  sourcesDir?: string;
  format: ReportFormat;
  output?: string;
  dbPath?: string;
  logLevel?: LogLevel;
};

export type AnalyzeCommandOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  clock?: Clock;
  logger?: Logger;
};

export type AnalyzeCommandResult = {
  outputPath: string;
  result: AnalysisResult;
  record?: AnalysisRecord;
};

const VALUE_FLAGS = ["--target", "--sources", "--format", "--output", "--db", "--log-level"];

export function parseAnalyzeArgs(argv: string[]): AnalyzeArgs {
  const parsed: AnalyzeArgs = { format: "comprehensive" };
  for (let i = 0; i < argv.length; i += 1) {
    const flag = argv[i];
    if (!VALUE_FLAGS.includes(flag)) {
      throw new ValidationError(`Unknown option: ${flag}`);
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ValidationError(`Missing value for ${flag}`);
    }
    i += 1;
    if (flag === "--target") {
      parsed.target = value;
    } else if (flag === "--sources") {
      parsed.sourcesDir = value;
    } else if (flag === "--format") {
      if (!isReportFormat(value)) {
        throw new ValidationError(`Unknown report format: ${value}`);
      }
      parsed.format = value;
    } else if (flag === "--output") {
      parsed.output = value;
    } else if (flag === "--db") {
      parsed.dbPath = value;
    } else if (flag === "--log-level") {
      parsed.logLevel = parseLogLevel(value);
    }
  }
  return parsed;
}

export function defaultOutputName(target: string, format: ReportFormat, now: Date): string {
  const iso = now.toISOString();
  const stamp = `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
  return `rca_report_${target}_${format}_${stamp}.md`;
}

export async function runAnalyzeCommand(
  args: AnalyzeArgs,
  options: AnalyzeCommandOptions = {}
): Promise<AnalyzeCommandResult> {
  const cwd = options.cwd ?? process.cwd();
  const clock = options.clock ?? (() => new Date());
  const base = loadConfigFromEnv(options.env ?? process.env, cwd);
  const config = {
    ...base,
    targetService: args.target ?? base.targetService,
    sourcesDir: args.sourcesDir ? path.resolve(cwd, args.sourcesDir) : base.sourcesDir,
    dbPath: args.dbPath ? path.resolve(cwd, args.dbPath) : base.dbPath,
    logLevel: args.logLevel ?? base.logLevel
  };
  const logger = options.logger ?? new Logger(config.logLevel ?? "info");

  const engine = new Engine(config, { logger, clock });
  await engine.start();
  try {
    const { result, record } = await engine.analyze();
    const outputPath = path.resolve(
      cwd,
      args.output ?? defaultOutputName(result.target_service, args.format, clock())
    );
    const content = await renderForPath(outputPath, result, args.format);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, content, "utf8");
    return { outputPath, result, record };
  } finally {
    await engine.stop();
  }
}

async function renderForPath(
  outputPath: string,
  result: AnalysisResult,
  format: ReportFormat
): Promise<string> {
  const extension = path.extname(outputPath).toLowerCase();
  if (extension === ".json") {
    return renderJsonReport(result);
  }
  const markdown = buildMarkdownReport(result, { format });
  if (extension === ".html" || extension === ".htm") {
    return renderHtmlReport(markdown, { title: reportTitle(format, result.target_service) });
  }
  return markdown;
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  if (command === "--help" || command === "-h") {
    printUsage();
    return 0;
  }
  if (command !== "analyze") {
    printUsage();
    return 1;
  }

  try {
    const args = parseAnalyzeArgs(rest);
    const { outputPath, result } = await runAnalyzeCommand(args);
    console.log(`Report written to ${outputPath}`);
    console.log(`Findings: ${countFindings(result.findings)}`);
    console.log(`Risk level: ${result.risk_assessment.level.toUpperCase()} (score ${result.risk_assessment.score})`);
    if (result.warnings.length > 0) {
      console.log(`Warnings: ${result.warnings.length}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof EngineError) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error(error instanceof Error ? error.message : "Unknown error");
    }
    return 1;
  }
}

function printUsage(): void {
  console.log("Usage:");
  console.log("  posture-rca analyze [options]");
  console.log("Options:");
  console.log("  --target <service>    Target service (default: RCA_TARGET_SERVICE or payment-service)");
  console.log("  --sources <dir>       Directory holding security/, policies/ and logs/ (default: cwd)");
  console.log("  --format <format>     comprehensive | pci-dss | 3ds | sox (default: comprehensive)");
  console.log("  --output <file>       Report path; .json and .html switch the renderer");
  console.log("  --db <path>           Record the run in a SQLite history database");
  console.log("  --log-level <level>   debug | info | warn | error");
}

if (require.main === module) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
