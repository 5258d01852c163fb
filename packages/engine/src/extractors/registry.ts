import type { ExtractorExecution, ExtractorManifest } from "../../../core/src/extractors";
import { validateManifest } from "../../../core/src/extractors";
import { ValidationError } from "../errors";
import { Logger } from "../logger";

export interface ExtractorDefinition {
  manifest: ExtractorManifest;
  extract: ExtractorExecution["extract"];
  /** Directory holding the extractor's sources and fixtures. */
  location: string;
}

export interface ExtractorRegistry {
  listExtractors(): ExtractorManifest[];
  getExtractor(id: string): ExtractorDefinition | undefined;
}

type RegistryOptions = {
  logger?: Logger;
};

/**
 * Fixed set of extractors, validated on construction. Extractors run in the
 * order they were registered.
 */
export class StaticExtractorRegistry implements ExtractorRegistry {
  private readonly extractors = new Map<string, ExtractorDefinition>();
  private readonly logger: Logger;

  constructor(definitions: ExtractorDefinition[], options: RegistryOptions = {}) {
    this.logger = (options.logger ?? new Logger("info")).child("registry");
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  listExtractors(): ExtractorManifest[] {
    return Array.from(this.extractors.values(), (entry) => entry.manifest);
  }

  getExtractor(id: string): ExtractorDefinition | undefined {
    return this.extractors.get(id);
  }

  private register(definition: ExtractorDefinition): void {
    const { manifest } = definition;
    const validation = validateManifest(manifest);
    if (!validation.ok) {
      throw new ValidationError(
        `Invalid extractor manifest ${manifest.id}: ${validation.errors.join("; ")}`
      );
    }
    if (this.extractors.has(manifest.id)) {
      throw new ValidationError(`Duplicate extractor id: ${manifest.id}`);
    }
    this.extractors.set(manifest.id, definition);
    this.logger.debug("extractor registered", { id: manifest.id, version: manifest.version });
  }
}
