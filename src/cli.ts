#!/usr/bin/env node
/**
 * cratedoc CLI
 * Runs the rustdoc command once and prints the result
 */

import { getConfig } from './config/index.js';
import { getLogger } from './logger/index.js';
import { createCommandContext } from './context.js';
import { RustdocCommand } from './commands/rustdoc-command.js';
import { placeholderLabel } from './commands/output.js';
import { ValidationError, toError } from './errors/index.js';

const USAGE = `Usage:
  cratedoc [--worktree <dir>] <crate>[::path...]
  cratedoc [--worktree <dir>] --index <crate>
  cratedoc [--worktree <dir>] complete <query>`;

interface CliArgs {
  worktree: string;
  rest: string[];
}

function parseCliArgs(argv: string[]): CliArgs {
  const rest: string[] = [];
  let worktree = process.cwd();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--worktree') {
      const dir = argv[i + 1];
      if (!dir) {
        throw new ValidationError('--worktree requires a directory');
      }
      worktree = dir;
      i++;
    } else if (arg !== undefined) {
      rest.push(arg);
    }
  }

  return { worktree, rest };
}

async function main(): Promise<void> {
  const { worktree, rest } = parseCliArgs(process.argv.slice(2));

  if (rest[0] === '--help' || rest[0] === '-h') {
    console.log(USAGE);
    return;
  }

  const config = getConfig();
  const logger = getLogger(config.logging);
  const context = createCommandContext(config, logger, [worktree]);
  const command = new RustdocCommand();

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  if (rest[0] === 'complete') {
    const completions = await command.completeArgument(rest.slice(1).join(' '), context, controller.signal);
    completions.forEach((completion) => console.log(completion));
    return;
  }

  const output = await command.run(rest.length > 0 ? rest.join(' ') : undefined, context, controller.signal);
  for (const section of output.sections) {
    console.error(placeholderLabel(section.placeholder));
  }
  process.stdout.write(output.text.endsWith('\n') ? output.text : `${output.text}\n`);
}

main().catch((error: unknown) => {
  console.error(`Error: ${toError(error).message}`);
  console.error(USAGE);
  process.exit(1);
});
