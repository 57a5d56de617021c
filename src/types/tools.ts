/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type ToolCallResponse = CallToolResult;

/**
 * rustdoc tool arguments: the free-form command argument
 */
export const RustdocArgsSchema = z.object({
  argument: z.string().optional(),
});

export type RustdocArgs = z.infer<typeof RustdocArgsSchema>;

export const RustdocCompleteArgsSchema = z.object({
  query: z.string(),
});

export type RustdocCompleteArgs = z.infer<typeof RustdocCompleteArgsSchema>;

export enum ToolName {
  RUSTDOC = 'rustdoc',
  RUSTDOC_COMPLETE = 'rustdoc_complete',
}
