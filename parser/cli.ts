/**
 * Command-line front end: reads one markup file and writes the rendered text
 * to stdout. Exit codes follow sysexits: 2 for usage errors, 69 when the
 * input cannot be read.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { type ParagraphMode, renderMarkup } from './document.js';

export enum ExitCode {
  Success = 0,
  Usage = 2,
  Unavailable = 69,
}

export interface CliIo {
  readFile(path: string): Uint8Array;
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  file: string;
  paragraphMode: ParagraphMode;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class ReadFileError extends Error {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`unable to read file \`${path}\``, options);
    this.name = 'ReadFileError';
    this.path = path;
  }
}

const PROGRAM_NAME = 'ansimark';

export const usage =
  `Usage: ${PROGRAM_NAME} [options] <file>\n` +
  '\n' +
  'Arguments:\n' +
  '  <file>                  The file to render\n' +
  '\n' +
  'Options:\n' +
  '  --paragraphs=<mode>     blank-line (default) or single\n' +
  '  -h, --help              Print help\n' +
  '  -V, --version           Print version\n';

export const defaultIo: CliIo = {
  readFile: path => readFileSync(path),
  stdout: text => { process.stdout.write(text); },
  stderr: text => { process.stderr.write(text); },
};

/**
 * Returns the parsed options, or 'help' / 'version' for the informational flags.
 * Throws UsageError on anything it does not understand.
 */
export function parseArgs(argv: readonly string[]): CliOptions | 'help' | 'version' {
  let file: string | undefined;
  let paragraphMode: ParagraphMode = 'blank-line';
  let optionsEnded = false;

  for (const arg of argv) {
    if (!optionsEnded && arg.startsWith('-') && arg !== '-') {
      if (arg === '--') {
        optionsEnded = true;
      } else if (arg === '-h' || arg === '--help') {
        return 'help';
      } else if (arg === '-V' || arg === '--version') {
        return 'version';
      } else if (arg.startsWith('--paragraphs=')) {
        const mode = arg.slice('--paragraphs='.length);
        if (mode !== 'blank-line' && mode !== 'single')
          throw new UsageError(`invalid value '${mode}' for '--paragraphs'`);
        paragraphMode = mode;
      } else {
        throw new UsageError(`unexpected argument '${arg}' found`);
      }
      continue;
    }

    if (file !== undefined)
      throw new UsageError(`unexpected argument '${arg}' found`);
    file = arg;
  }

  if (file === undefined)
    throw new UsageError('the following required arguments were not provided: <file>');

  return { file, paragraphMode };
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Strict UTF-8 decoding: malformed bytes throw a TypeError instead of becoming U+FFFD. */
export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/** Read and decode the input; both failures surface as ReadFileError. */
export function readInput(path: string, io: CliIo): string {
  try {
    return decodeUtf8(io.readFile(path));
  } catch (error) {
    throw new ReadFileError(path, { cause: error });
  }
}

/** Locate the package manifest from either the source tree or the build output. */
export function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const manifest = join(dir, 'package.json');
    if (existsSync(manifest)) {
      const parsed: unknown = JSON.parse(readFileSync(manifest, 'utf8'));
      if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string')
        return parsed.version;
      return 'unknown';
    }
    const parent = dirname(dir);
    if (parent === dir) return 'unknown';
    dir = parent;
  }
}

export function runCli(argv: readonly string[], io: CliIo = defaultIo): ExitCode {
  let options: CliOptions;
  try {
    const parsed = parseArgs(argv);
    if (parsed === 'help') {
      io.stdout(usage);
      return ExitCode.Success;
    }
    if (parsed === 'version') {
      io.stdout(`${PROGRAM_NAME} ${readVersion()}\n`);
      return ExitCode.Success;
    }
    options = parsed;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`error: ${error.message}\n\n${usage}`);
      return ExitCode.Usage;
    }
    throw error;
  }

  let contents: string;
  try {
    contents = readInput(options.file, io);
  } catch (error) {
    if (error instanceof ReadFileError) {
      io.stderr(`${error.message}\n`);
      return ExitCode.Unavailable;
    }
    throw error;
  }

  io.stdout(renderMarkup(contents, { paragraphMode: options.paragraphMode }) + '\n');
  return ExitCode.Success;
}
