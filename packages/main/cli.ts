#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import log from 'electron-log/node';
import { ConfigOverrides, loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { cancelAll } from './active-processes.js';
import { createPipelineServices } from './services/index.js';
import {
  processDirectory,
  processSingleVideo,
} from './services/video-pipeline.js';

const USAGE = `Usage: trimscribe <file|dir> [options]

Options:
  --gap <seconds>          Minimum silence to remove (default 1.0)
  --workers <n>            Videos processed in parallel for a directory
  --language <code>        Transcription language (default zh)
  --initial-prompt <text>  Prompt passed to the transcription model
  --verbose                Debug logging
  -h, --help               Show this message`;

export interface CliArgs {
  input?: string;
  overrides: ConfigOverrides;
  verbose: boolean;
  help: boolean;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      gap: { type: 'string' },
      workers: { type: 'string' },
      language: { type: 'string' },
      'initial-prompt': { type: 'string' },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const overrides: ConfigOverrides = {};
  const gapThreshold = toNumber(values.gap);
  if (gapThreshold !== undefined) overrides.gapThreshold = gapThreshold;
  const videoWorkers = toNumber(values.workers);
  if (videoWorkers !== undefined) overrides.videoWorkers = videoWorkers;
  if (values.language !== undefined) overrides.language = values.language;
  if (values['initial-prompt'] !== undefined) {
    overrides.initialPrompt = values['initial-prompt'];
  }

  return {
    input: positionals[0],
    overrides,
    verbose: values.verbose === true,
    help: values.help === true,
  };
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 1;
  }
  if (args.help || !args.input) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  log.transports.console.level = args.verbose ? 'debug' : 'info';

  const input = path.resolve(args.input);
  const stat = fs.statSync(input, { throwIfNoEntry: false });
  if (!stat || (!stat.isFile() && !stat.isDirectory())) {
    log.error(`Error: Invalid input path: ${input}`);
    return 1;
  }

  const config = loadConfig(args.overrides);
  const services = createPipelineServices(config);
  await services.fileManager.ensureTempDir();

  const onSigint = () => {
    const n = cancelAll();
    log.warn(`[cli] Interrupted, cancelled ${n} running jobs`);
  };
  process.once('SIGINT', onSigint);

  try {
    if (stat.isFile()) {
      const result = await processSingleVideo(input, { config, services });
      return result.ok ? 0 : 1;
    }
    const summary = await processDirectory(input, { config, services });
    log.info(
      `[cli] ${summary.succeeded}/${summary.total} videos processed, ${summary.failed} failed`
    );
    for (const failed of summary.results.filter(r => !r.ok)) {
      log.error(`[cli] ${failed.videoPath}: ${failed.error ?? 'unknown error'}`);
    }
    return summary.failed > 0 ? 1 : 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      log.error(`[cli] ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
