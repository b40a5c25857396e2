#!/usr/bin/env node
import { parseArgs } from "util";
import { copyFile, mkdir } from "fs/promises";
import { randomUUID } from "crypto";
import { tmpdir } from "os";
import { basename, dirname, extname, join, resolve } from "path";
import { config } from "./infrastructure/config/app.config";
import { createConversionServices } from "./container";
import { ConversionJob, isTerminalState } from "./domain/entities/conversion-job";
import { SpeechVoices } from "./domain/enums/speech.voices";
import { errorMessage } from "./domain/errors/conversion.errors";
import { moveFile } from "./application/services/audio-assembler.service";

const POLL_INTERVAL_MS = 250;

const USAGE = `Usage:
  narrate convert <input.pdf|input.epub> [-o output.mp3] [-v voice] [--no-chunking]
  narrate voices`;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function convert(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      voice: { type: "string", short: "v" },
      "no-chunking": { type: "boolean", default: false },
    },
  });

  const input = positionals[0];
  if (!input) {
    console.error(USAGE);
    return 1;
  }
  const output = resolve(values.output ?? `${basename(input, extname(input))}.mp3`);

  const services = createConversionServices(config);
  if (!(await services.concatenator.isAvailable())) {
    console.error(`CRITICAL WARNING: ffmpeg ('${config.ffmpegPath}') was not found. Audio merging will fail.`);
  }

  // The job consumes its source file, so it works on a copy
  const workingCopy = join(tmpdir(), `${randomUUID()}${extname(input).toLowerCase()}`);
  await copyFile(input, workingCopy);

  let job: ConversionJob = services.submitConversionUseCase.execute({
    sourcePath: workingCopy,
    originalFilename: basename(input),
    voice: values.voice,
    chunkingEnabled: values["no-chunking"] ? false : undefined,
  });

  let lastMessage = "";
  while (true) {
    job = services.getConversionStatusUseCase.execute({ jobId: job.id });
    if (job.progress.message !== lastMessage) {
      lastMessage = job.progress.message;
      console.log(`STATUS: ${lastMessage}`);
    }
    if (isTerminalState(job.state)) break;
    await sleep(POLL_INTERVAL_MS);
  }
  await services.jobRunner.whenIdle();

  if (job.state === "complete" && job.resultPath) {
    await mkdir(dirname(output), { recursive: true });
    await moveFile(job.resultPath, output);
    console.log(`\nSuccess! Output saved to: ${output}`);
    return 0;
  }

  console.error(`\nError during conversion: ${job.errorDetail?.message ?? "Unknown error"}`);
  if (job.errorDetail?.retainedPath) {
    console.error(`Temporary files kept in: ${job.errorDetail.retainedPath}`);
  }
  return 1;
}

function listVoices(): number {
  for (const voice of SpeechVoices) {
    const marker = voice.id === config.synthesis.defaultVoice ? " (default)" : "";
    console.log(`${voice.id}\t${voice.name}${marker}`);
  }
  return 0;
}

async function main(): Promise<number> {
  const [command, ...rest] = process.argv.slice(2);
  switch (command) {
    case "convert":
      return convert(rest);
    case "voices":
      return listVoices();
    default:
      console.error(USAGE);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`\nError during conversion: ${errorMessage(error)}`);
    process.exit(1);
  });
