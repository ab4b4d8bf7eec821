import { readFileSync, writeFileSync } from "node:fs";
import { parseDrawingDocument } from "@polydraw/core";
import { parseBackend, renderDocument } from "../backends.js";

interface RenderOptions {
  output?: string;
  backend: string;
}

export function renderCommand(input: string, options: RenderOptions): void {
  try {
    const backend = parseBackend(options.backend);
    const content = readFileSync(input, "utf-8");
    const doc = parseDrawingDocument(content);
    const rendered = renderDocument(doc, backend);

    const outputPath =
      options.output ?? input.replace(/\.(ya?ml|json)$/i, "") + `.${rendered.extension}`;
    writeFileSync(outputPath, rendered.data);
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(
      `Error: ${err instanceof Error ? err.message : String(err)}`,
    );
    process.exit(1);
  }
}
