import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { filterLogLines, type LogLevel } from '../pipeline/log';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const DEFAULT_LEVEL: LogLevel = 'debug';

function latestRunLog(videoId: string): string | undefined {
  const dir = path.resolve(ENV.artifactsRoot, videoId);
  if (!fs.existsSync(dir)) return undefined;
  const candidates = fs
    .readdirSync(dir)
    .filter((f) => /^run-\d+\.log$/.test(f))
    .sort()
    .reverse();
  return candidates.length ? path.join(dir, candidates[0]) : undefined;
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('video', { type: 'string', describe: 'Video ID whose latest run log to show' })
    .option('file', { type: 'string', describe: 'Explicit log file path' })
    .option('level', { choices: LEVELS, default: DEFAULT_LEVEL, describe: 'Min level filter' })
    .check((a) => Boolean(a.video || a.file) || 'Provide --video or --file')
    .parse();

  const file = argv.file ?? (argv.video ? latestRunLog(argv.video) : undefined);
  if (!file || !fs.existsSync(file)) {
    console.error('No run log found', file ?? `for video ${argv.video}`);
    process.exit(1);
  }
  const lines = fs.readFileSync(file, 'utf8').split(/\r?\n/);
  for (const line of filterLogLines(lines, argv.level)) {
    process.stdout.write(line + '\n');
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
