/**
 * The `rustdoc` command
 * Parsing and all I/O happen on the background executor; the result is
 * handed over once and wrapped into a CommandOutput on the foreground executor.
 */

import { toError } from '../errors/index.js';
import type { RustdocContext } from '../rustdoc/context.js';
import { displayItem } from '../rustdoc/item.js';
import { resolveDocs } from '../rustdoc/resolver.js';
import { locateWorkspaceRoot } from '../rustdoc/workspace.js';
import type { CommandOutput, LookupRequest, ParsedCommand, ResolutionResult } from '../types/docs.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import type { Executors } from './executor.js';
import { dispatchIndex } from './index-dispatcher.js';
import { buildOutput } from './output.js';
import { parseArgument } from './parser.js';

export interface CommandContext extends RustdocContext {
  /** Project directories; the first one anchors the Cargo workspace */
  worktrees: string[];
  executors: Executors;
}

export type CommandState = 'idle' | 'background-running' | 'succeeded' | 'failed' | 'finalized';

const VALID_TRANSITIONS: Record<CommandState, CommandState[]> = {
  idle: ['background-running', 'failed'],
  'background-running': ['succeeded', 'failed'],
  succeeded: ['finalized', 'failed'],
  failed: [],
  finalized: [],
};

/**
 * The one value that crosses from the background stage to the foreground stage
 */
type Handoff =
  | { kind: 'lookup'; request: LookupRequest; result: ResolutionResult }
  | { kind: 'index'; crateName: string; text: string };

/**
 * A single run of the command, from argument to output
 */
export class CommandInvocation {
  private current: CommandState = 'idle';
  private readonly history: CommandState[] = ['idle'];
  readonly output: Promise<CommandOutput>;

  constructor(
    argument: string | undefined,
    private readonly ctx: CommandContext,
    private readonly signal?: AbortSignal
  ) {
    this.output = this.execute(argument);
  }

  get state(): CommandState {
    return this.current;
  }

  getHistory(): CommandState[] {
    return [...this.history];
  }

  private transition(to: CommandState): void {
    if (!VALID_TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Invalid command state transition: ${this.current} -> ${to}`);
    }
    this.current = to;
    this.history.push(to);
  }

  private async execute(argument: string | undefined): Promise<CommandOutput> {
    let command: ParsedCommand;
    try {
      command = parseArgument(argument);
    } catch (error) {
      this.transition('failed');
      throw error;
    }

    this.transition('background-running');
    let handoff: Handoff;
    try {
      handoff = await this.ctx.executors.background.spawn(() => this.runBackground(command));
    } catch (error) {
      this.transition('failed');
      this.ctx.logger.debug('rustdoc command failed', { error: toError(error).message });
      throw error;
    }
    this.transition('succeeded');

    return this.ctx.executors.foreground.spawn(async () => {
      try {
        throwIfCancelled(this.signal, 'finalization');
      } catch (error) {
        this.transition('failed');
        throw error;
      }
      const output = assemble(handoff);
      this.transition('finalized');
      return output;
    });
  }

  private async runBackground(command: ParsedCommand): Promise<Handoff> {
    throwIfCancelled(this.signal, 'workspace lookup');
    const workspaceRoot = await locateWorkspaceRoot(this.ctx.fs, this.ctx.worktrees, this.ctx.docs.manifestFile);

    throwIfCancelled(this.signal, command.kind === 'index' ? 'indexing' : 'resolution');
    if (command.kind === 'index') {
      const text = await dispatchIndex(this.ctx, command.crateName, workspaceRoot);
      return { kind: 'index', crateName: command.crateName, text };
    }

    const result = await resolveDocs(this.ctx, command, workspaceRoot, this.signal);
    return { kind: 'lookup', request: command, result };
  }
}

function assemble(handoff: Handoff): CommandOutput {
  if (handoff.kind === 'index') {
    return buildOutput(handoff.text, {
      kind: 'rustdoc-index',
      source: 'local',
      crateName: handoff.crateName,
    });
  }

  const { request, result } = handoff;
  return buildOutput(result.text, {
    kind: 'rustdoc',
    source: result.source,
    crateName: request.crateName,
    ...(request.itemPath.length > 0 ? { modulePath: request.itemPath.join('::') } : {}),
  });
}

export class RustdocCommand {
  readonly name = 'rustdoc';
  readonly description = 'insert Rust docs';
  readonly menuText = 'Insert Rust Documentation';
  readonly requiresArgument = true;

  /**
   * Start an invocation; its `output` settles once the foreground stage is done
   */
  start(argument: string | undefined, ctx: CommandContext, signal?: AbortSignal): CommandInvocation {
    return new CommandInvocation(argument, ctx, signal);
  }

  run(argument: string | undefined, ctx: CommandContext, signal?: AbortSignal): Promise<CommandOutput> {
    return this.start(argument, ctx, signal).output;
  }

  /**
   * Argument completions from the store, formatted `crate::path::item`
   */
  completeArgument(query: string, ctx: CommandContext, signal?: AbortSignal): Promise<string[]> {
    return ctx.executors.background.spawn(async () => {
      const matches = await ctx.store.search(query);
      if (signal?.aborted) {
        return [];
      }
      return matches.map(([crateName, item]) => `${crateName}::${displayItem(item)}`);
    });
  }
}
