import yaml from "js-yaml";
import type { DrawingDocument } from "../types/document.js";
import { DrawingDocumentSchema } from "../types/document.js";

/**
 * Parse a JSON or YAML string into a validated DrawingDocument.
 * Detects format automatically (tries JSON first, then YAML).
 * Throws a descriptive error if the input is invalid.
 */
export function parseDrawingDocument(input: string): DrawingDocument {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new Error(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = DrawingDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid drawing document:\n${issues}`);
  }

  return result.data;
}
