/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { VERSION, NAME } from '../version.js';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import { DestinationExistsError } from '../core/errors.js';
import { generateProject } from '../scaffold/generator.js';
import { validateProjectName } from '../scaffold/name-sanitizer.js';
import { formatReport } from './report.js';
import { promptLine } from './prompt.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  /** Reads one line from stdin; resolves to null on cancel or end of input */
  prompt: (question: string) => Promise<string | null>;
  isInteractive: boolean;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

interface CreateOptions {
  dir: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
  maxLength?: number;
}

export const processIO: CliIO = {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
  prompt: question => promptLine(question),
  isInteractive: Boolean(process.stdin.isTTY),
  cwd: process.cwd(),
  env: process.env,
};

const EXAMPLES = `
Examples:
  $ ${NAME} my-game
  $ ${NAME} "Space Shooter"        # creates ./space-shooter
  $ ${NAME} --dir ~/games arcade   # creates ~/games/arcade

The name is lowercased, whitespace and other symbols become hyphens.
`;

function parseLength(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

export function createCLI(io: CliIO, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(`${NAME} v${VERSION}`, '-v, --version', 'Print the generator version')
    .description('Generate a zero-dependency PWA game skeleton')
    .argument('[name]', 'Project name (prompted for when omitted)')
    .option('-d, --dir <directory>', 'Parent directory for the new project', '.')
    .option('--dry-run', 'Show what would be created without writing anything')
    .option('--json', 'Print the report as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--max-length <n>', 'Maximum project name length', parseLength)
    .addHelpText('after', EXAMPLES)
    .configureOutput({
      writeOut: text => io.out(text),
      writeErr: text => io.err(text),
    })
    .exitOverride()
    .action(async (name: string | undefined, options: CreateOptions) => {
      setExitCode(await create(name, options, io));
    });

  return program;
}

async function create(nameArg: string | undefined, options: CreateOptions, io: CliIO): Promise<number> {
  const parentDir = resolve(io.cwd, options.dir);
  const config = new ConfigManager({ workspaceDir: parentDir, env: io.env }).load({
    naming: { maxLength: options.maxLength },
  });
  const logger = createLogger(NAME, options.verbose ?? false, config.logging.level);
  setLogger(logger);

  let rawName = nameArg;
  if (rawName === undefined) {
    if (io.isInteractive) {
      io.out(`\n${NAME} v${VERSION}\n${'─'.repeat(50)}\n\n`);
    }
    while (rawName === undefined) {
      const answer = await io.prompt('Enter project name: ');
      if (answer === null) {
        io.out('\n👋 Cancelled\n');
        return 0;
      }
      // Piped input gets one line; a terminal user is asked again
      if (!io.isInteractive) {
        rawName = answer;
        break;
      }
      const check = validateProjectName(answer, config.naming);
      if (check.valid) {
        rawName = answer;
      } else {
        io.err(`❌ ${check.error.message}\n`);
      }
    }
  }

  const report = generateProject(rawName, {
    parentDir,
    dryRun: options.dryRun,
    maxLength: config.naming.maxLength,
    minLength: config.naming.minLength,
    logger,
  });

  if (options.json) {
    io.out(JSON.stringify(report, null, 2) + '\n');
  } else {
    io.out(formatReport(report, io.cwd).join('\n') + '\n');
  }

  return report.result && !report.result.success ? 1 : 0;
}

/**
 * Parse `argv` (node-style, including the executable and script) and run.
 * Resolves to the process exit code.
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
  let exitCode = 0;
  const cli = createCLI(io, code => {
    exitCode = code;
  });

  try {
    await cli.parseAsync(argv, { from: 'node' });
  } catch (error) {
    // --help and --version surface as CommanderErrors with exit code 0
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof Error) {
      io.err(`\n❌ ${error.message}\n`);
      if (error instanceof DestinationExistsError) {
        io.err('   Choose a different name or remove the existing folder.\n');
      }
      if (io.env.DEBUG) {
        io.err(`${error.stack ?? ''}\n`);
      }
      return 1;
    }
    throw error;
  }

  return exitCode;
}

export async function main(): Promise<void> {
  process.exit(await run(process.argv));
}
