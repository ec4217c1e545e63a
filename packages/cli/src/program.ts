import { Command } from 'commander';
import { checkCommand, type CheckCommandOptions } from './commands/check.js';
import { decompressCommand, type DecompressCommandOptions } from './commands/decompress.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { EXIT_SETUP_ERROR, parseInteger, parseRatio, printError } from './commands/shared.js';

export interface ProgramOptions {
  env?: Record<string, string | undefined>;
  /** Receives the command's exit code. Defaults to setting `process.exitCode`. */
  onExit?: (code: number) => void;
}

function withModelOptions(command: Command): Command {
  return command
    .option('-m, --model <path>', 'Model file (plain or .gz)')
    .option('-r, --runtime <id>', 'Model runtime (ollama, mock)')
    .option('--ollama-url <url>', 'Ollama daemon URL')
    .option('-t, --timeout <ms>', 'Inference timeout per attempt', parseInteger)
    .option('--retries <n>', 'Inference attempts including the first', parseInteger)
    .option('--cache <file>', 'Persist verdicts to this JSON file')
    .option('--mock-response <text>', 'Answer returned by the mock runtime')
    .option('-v, --verbose', 'Log model, cache and retry activity');
}

export function createProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const onExit =
    options.onExit ??
    ((code: number) => {
      process.exitCode = code;
    });

  async function guarded(action: () => Promise<number>): Promise<void> {
    try {
      onExit(await action());
    } catch (err) {
      printError(err);
      onExit(EXIT_SETUP_ERROR);
    }
  }

  const program = new Command();

  program
    .name('sightcheck')
    .description('Visual assertions answered by a local vision-language model')
    .version('0.1.0');

  withModelOptions(
    program
      .command('run')
      .description('Run a suite file in Chromium and report every query')
      .argument('<suite>', 'Suite JSON file')
      .option('-o, --artifacts <dir>', 'Directory for screenshots and results.json')
      .option('--headed', 'Show the browser window')
  ).action(async (suite: string, opts: RunCommandOptions) => {
    await guarded(() => runCommand(suite, opts, env));
  });

  withModelOptions(
    program
      .command('check')
      .description('Ask one question about one image file')
      .argument('<image>', 'PNG or JPEG file')
      .argument('<prompt>', 'Question about the image')
      .option('-e, --expect <answer>', 'Expected answer: yes, no, or reference text')
      .option('--tolerance <ratio>', 'Similarity needed for a text answer (0-1)', parseRatio)
      .option('--json', 'Print the verdict as JSON')
  ).action(async (image: string, prompt: string, opts: CheckCommandOptions) => {
    await guarded(() => checkCommand(image, prompt, opts, env));
  });

  program
    .command('decompress')
    .description('Decompress a .gz model file next to itself')
    .argument('<file>', 'Model archive ending in .gz')
    .option('-f, --force', 'Decompress again even if the output is up to date', false)
    .option('-v, --verbose', 'Log progress')
    .action(async (file: string, opts: DecompressCommandOptions) => {
      await guarded(() => decompressCommand(file, opts));
    });

  return program;
}
