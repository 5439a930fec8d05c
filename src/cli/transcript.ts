import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { DigestError } from "../pipeline/errors";
import { runTranscript } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .option("language", { type: "string", default: ENV.captionLanguage })
    .option("timestamps", { type: "boolean", default: false, describe: "Prefix each line with [MM:SS]" })
    .option("preprocess", { type: "boolean", default: true })
    .option("out", { type: "string", describe: "Directory to write the transcript into" })
    .parse();

  const res = await runTranscript(argv.video, {
    language: argv.language,
    timestamps: argv.timestamps,
    preprocess: argv.preprocess,
    export: argv.out ? { outDir: argv.out, format: "txt" } : undefined,
  });
  console.log(res.text);
  if (res.exportPath) console.error("Saved:", res.exportPath);
}

main().catch((e) => {
  console.error(e instanceof DigestError ? e.toString() : e);
  process.exit(1);
});
