import path from "path";
import { Logger } from "../../logger";
import type { ExtractorDefinition } from "../registry";
import { StaticExtractorRegistry } from "../registry";
import * as applicationError from "./findings.extract.application_error/extractor";
import { manifest as applicationErrorManifest } from "./findings.extract.application_error/manifest";
import * as compliance from "./findings.extract.compliance/extractor";
import { manifest as complianceManifest } from "./findings.extract.compliance/manifest";
import * as dependency from "./findings.extract.dependency/extractor";
import { manifest as dependencyManifest } from "./findings.extract.dependency/manifest";
import * as misconfiguration from "./findings.extract.misconfiguration/extractor";
import { manifest as misconfigurationManifest } from "./findings.extract.misconfiguration/manifest";
import * as vulnerability from "./findings.extract.vulnerability/extractor";
import { manifest as vulnerabilityManifest } from "./findings.extract.vulnerability/manifest";

function builtin(
  manifest: ExtractorDefinition["manifest"],
  extract: ExtractorDefinition["extract"]
): ExtractorDefinition {
  return { manifest, extract, location: path.join(__dirname, manifest.id) };
}

export function listBuiltinExtractors(): ExtractorDefinition[] {
  return [
    builtin(vulnerabilityManifest, vulnerability.extract),
    builtin(complianceManifest, compliance.extract),
    builtin(misconfigurationManifest, misconfiguration.extract),
    builtin(dependencyManifest, dependency.extract),
    builtin(applicationErrorManifest, applicationError.extract)
  ];
}

export function createBuiltinRegistry(logger?: Logger): StaticExtractorRegistry {
  return new StaticExtractorRegistry(listBuiltinExtractors(), { logger });
}
