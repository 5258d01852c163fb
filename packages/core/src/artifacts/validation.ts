import Ajv from "ajv/dist/2020";
import type { ErrorObject, ValidateFunction } from "ajv";
import type { ArtifactSchemas, JSONSchema } from "./types";
import complianceBenchmarkSchema from "./schemas/compliance_benchmark.schema.json";
import vulnerabilityScanSchema from "./schemas/vulnerability_scan.schema.json";
import sbomSchema from "./schemas/sbom.schema.json";
import analysisResultSchema from "./schemas/analysis_result.schema.json";

const ajv = new Ajv({ allErrors: true, strict: true });

const schemas: ArtifactSchemas = {
  compliance_benchmark: complianceBenchmarkSchema,
  vulnerability_scan: vulnerabilityScanSchema,
  sbom: sbomSchema,
  "analysis_result.json": analysisResultSchema
};

const validators = new Map<string, ValidateFunction>();

export function getArtifactSchema(type: string): JSONSchema | undefined {
  return schemas[type];
}

export function validateArtifactContent(
  type: string,
  content: unknown
): { ok: boolean; errors: string[] } {
  const schema = getArtifactSchema(type);
  if (!schema) {
    return { ok: true, errors: [] };
  }
  let validator = validators.get(type);
  if (!validator) {
    validator = ajv.compile(schema);
    validators.set(type, validator);
  }
  const ok = validator(content);
  return { ok, errors: normalizeErrors(validator.errors) };
}

export function listArtifactSchemas(): ArtifactSchemas {
  return { ...schemas };
}

function normalizeErrors(errors?: ErrorObject[] | null): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((error) => `${error.instancePath} ${error.message}`.trim());
}
