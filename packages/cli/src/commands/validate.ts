import { readFileSync } from "node:fs";
import { parseDrawingDocument, requiredCapabilities } from "@polydraw/core";
import { BACKEND_CAPABILITIES, BACKENDS } from "../backends.js";

export function validateCommand(input: string): void {
  try {
    const content = readFileSync(input, "utf-8");
    const doc = parseDrawingDocument(content);
    const used = [...requiredCapabilities(doc.drawing)];

    const supported = BACKENDS.filter((backend) =>
      used.every((cap) => BACKEND_CAPABILITIES[backend].includes(cap)),
    );

    console.log(`✓ ${doc.title ?? input} is a valid drawing document.`);
    console.log(`  Canvas: ${doc.canvas.width}×${doc.canvas.height}`);
    console.log(`  Capabilities: ${used.join(", ")}`);

    for (const backend of BACKENDS) {
      if (supported.includes(backend)) continue;
      const missing = used.filter((cap) => !BACKEND_CAPABILITIES[backend].includes(cap));
      console.warn(`  ⚠ ${backend} backend cannot render it (missing: ${missing.join(", ")})`);
    }

    if (supported.length === 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
