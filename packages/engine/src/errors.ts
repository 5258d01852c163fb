export class EngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ValidationError extends EngineError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}

export class ExtractorNotFoundError extends EngineError {
  constructor(extractorId: string) {
    super("EXTRACTOR_NOT_FOUND", `Extractor not found: ${extractorId}`);
  }
}

/** A single artifact could not be parsed; the loader recovers from this. */
export class MalformedArtifactError extends EngineError {
  readonly artifact: string;

  constructor(artifact: string, reason: string) {
    super("MALFORMED_ARTIFACT", `${artifact}: ${reason}`);
    this.artifact = artifact;
  }
}

/** Raised for internal logic faults. Never caught inside the pipeline. */
export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
  }
}
