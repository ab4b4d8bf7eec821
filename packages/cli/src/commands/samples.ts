import { writeFileSync } from "node:fs";
import { parseBackend, renderSample, sampleNames } from "../backends.js";

interface SamplesOptions {
  output?: string;
  backend: string;
  list?: boolean;
}

export function samplesCommand(name: string | undefined, options: SamplesOptions): void {
  try {
    const backend = parseBackend(options.backend);

    if (options.list || !name) {
      console.log(`Samples for the ${backend} backend:`);
      for (const sample of sampleNames(backend)) {
        console.log(`  ${sample}`);
      }
      return;
    }

    const rendered = renderSample(name, backend);
    const outputPath = options.output ?? `${name}.${rendered.extension}`;
    writeFileSync(outputPath, rendered.data);
    console.log(`Rendered: ${outputPath}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
