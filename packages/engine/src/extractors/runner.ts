import type { SourceDataset } from "../../../core/src/artifacts";
import type { ExtractionResult, ExtractorContext } from "../../../core/src/extractors";
import { validateExtractionResult } from "../../../core/src/extractors";
import { ExtractorNotFoundError, InvariantViolationError } from "../errors";
import type { ExtractorRegistry } from "./registry";

export function runExtractor(
  registry: ExtractorRegistry,
  extractorId: string,
  dataset: SourceDataset,
  ctx: ExtractorContext
): ExtractionResult {
  const extractor = registry.getExtractor(extractorId);
  if (!extractor) {
    throw new ExtractorNotFoundError(extractorId);
  }

  const result = extractor.extract(dataset, ctx);
  const validation = validateExtractionResult(result, extractor.manifest);
  if (!validation.ok) {
    throw new InvariantViolationError(
      `Extractor ${extractorId} produced an invalid result: ${validation.errors.join("; ")}`
    );
  }
  return result;
}
