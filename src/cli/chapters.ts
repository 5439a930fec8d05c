import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { DigestError } from "../pipeline/errors";
import { runChapters } from "../pipeline/run";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("video", { type: "string", demandOption: true })
    .option("language", { type: "string", default: ENV.captionLanguage })
    .option("source", { choices: ["auto", "description", "model"] as const, default: "auto" as const })
    .parse();

  const res = await runChapters(argv.video, {
    language: argv.language,
    chapterSource: argv.source,
    logFile: true,
  });
  if (!res.plan) {
    console.error("No usable chapter boundaries for", res.videoId);
    process.exit(2);
  }
  const rows = res.plan.sections.map((s) => ({
    timestamp: s.chapter.timestamp,
    title: s.chapter.title,
    startSec: s.chapter.startSec,
    endSec: s.endSec ?? null,
    fragments: s.fragmentCount,
    chars: s.text.length,
  }));
  console.log(JSON.stringify({ videoId: res.videoId, origin: res.plan.origin, chapters: rows }, null, 2));
}

main().catch((e) => {
  console.error(e instanceof DigestError ? e.toString() : e);
  process.exit(1);
});
