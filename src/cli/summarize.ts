import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { DigestError } from "../pipeline/errors";
import { runSummary, type RunStyle } from "../pipeline/run";

const STYLES: readonly RunStyle[] = ["concise", "detailed", "chapter", "notes", "custom"];
const DEFAULT_STYLE: RunStyle = "concise";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true, describe: "YouTube URL or video ID" })
    .option("style", { choices: STYLES, default: DEFAULT_STYLE })
    .option("language", { type: "string", default: ENV.captionLanguage })
    .option("chapters", {
      choices: ["auto", "description", "model"] as const,
      default: "auto" as const,
      describe: "Where chapter boundaries come from (style=chapter)",
    })
    .option("preprocess", { type: "boolean", default: true, describe: "Strip filler words before prompting" })
    .option("format", { choices: ["txt", "md"] as const, default: "txt" as const })
    .option("out", { type: "string", describe: "Directory to write the export into" })
    .option("shape", { type: "string", describe: "Custom style: output format, e.g. Bullets" })
    .option("length", { type: "string", describe: "Custom style: Short | Medium | Long" })
    .option("focus", { type: "string", describe: "Custom style: what to emphasise" })
    .option("tone", { type: "string", describe: "Custom style: writing style" })
    .strict()
    .parse();

  const res = await runSummary(argv.video, {
    style: argv.style,
    language: argv.language,
    chapterSource: argv.chapters,
    preprocess: argv.preprocess,
    custom: { format: argv.shape, length: argv.length, focus: argv.focus, tone: argv.tone },
    export: argv.out ? { outDir: argv.out, format: argv.format } : undefined,
    logFile: true,
  });

  console.log(`# ${res.metadata.title}`);
  console.log(`Channel: ${res.metadata.channel} | Duration: ${res.metadata.duration} | Views: ${res.metadata.views}\n`);
  console.log(res.summary);
  if (res.exportPath) console.log("\nSaved:", res.exportPath);
}

main().catch((e) => {
  console.error(e instanceof DigestError ? e.toString() : e);
  process.exit(1);
});
