/**
 * Tools registry and handlers
 * Exposes the rustdoc command and its argument completion as MCP tools
 */

import type { CommandContext, RustdocCommand } from '../commands/rustdoc-command.js';
import { placeholderLabel } from '../commands/output.js';
import { toError } from '../errors/index.js';
import {
  RustdocArgsSchema,
  RustdocCompleteArgsSchema,
  ToolName,
  type ToolCallResponse,
  type ToolDescriptor,
} from '../types/tools.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

export interface ToolRuntime {
  command: RustdocCommand;
  context: CommandContext;
}

export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: ToolName.RUSTDOC,
      description:
        'Insert Rust documentation for a crate or item, e.g. "tokio::sync::Mutex". ' +
        'Tries the local store, then local `cargo doc` output, then docs.rs. ' +
        'Use "--index <crate>" to crawl local `cargo doc` output into the store.',
      inputSchema: {
        type: 'object',
        properties: {
          argument: {
            type: 'string',
            description: 'Item path (`crate::module::Item`) or `--index <crate>`',
          },
        },
      },
    },
    {
      name: ToolName.RUSTDOC_COMPLETE,
      description: 'Complete a partial item path against crates indexed in the store.',
      inputSchema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'Partial item path',
          },
        },
        required: ['query'],
      },
    },
  ];
}

function errorResponse(message: string, details?: Record<string, unknown>): ToolCallResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ error: message, ...details }, null, 2),
    }],
    isError: true,
  };
}

async function callRustdoc(runtime: ToolRuntime, args: unknown, signal?: AbortSignal): Promise<ToolCallResponse> {
  const validation = validateToolArgs(RustdocArgsSchema, args ?? {});
  if (!validation.success) {
    return errorResponse('Invalid tool arguments', { details: formatValidationErrors(validation.errors) });
  }

  try {
    const output = await runtime.command.run(validation.data.argument, runtime.context, signal);
    const [section] = output.sections;
    return {
      content: [{ type: 'text', text: output.text }],
      ...(section ? { _meta: { label: placeholderLabel(section.placeholder) } } : {}),
    };
  } catch (error) {
    return {
      content: [{ type: 'text', text: toError(error).message }],
      isError: true,
    };
  }
}

async function callRustdocComplete(
  runtime: ToolRuntime,
  args: unknown,
  signal?: AbortSignal
): Promise<ToolCallResponse> {
  const validation = validateToolArgs(RustdocCompleteArgsSchema, args ?? {});
  if (!validation.success) {
    return errorResponse('Invalid tool arguments', { details: formatValidationErrors(validation.errors) });
  }

  try {
    const completions = await runtime.command.completeArgument(validation.data.query, runtime.context, signal);
    return {
      content: [{ type: 'text', text: JSON.stringify(completions, null, 2) }],
    };
  } catch (error) {
    return errorResponse('Failed to complete argument', { message: toError(error).message });
  }
}

/**
 * Call a tool by name. `signal` cancels the command between its stages.
 */
export async function callTool(
  runtime: ToolRuntime,
  name: string,
  args: unknown,
  signal?: AbortSignal
): Promise<ToolCallResponse> {
  switch (name) {
    case ToolName.RUSTDOC:
      return callRustdoc(runtime, args, signal);

    case ToolName.RUSTDOC_COMPLETE:
      return callRustdocComplete(runtime, args, signal);

    default:
      return errorResponse(`Unknown tool: ${name}`, {
        availableTools: listAllTools().map(t => t.name),
      });
  }
}
