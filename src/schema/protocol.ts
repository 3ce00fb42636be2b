import { z } from 'zod';

/**
 * Protocol revision sent in the initialize request
 */
export const PROTOCOL_VERSION = '2024-11-05';

/**
 * Plain text content part of a tool result
 */
export const TextContentSchema = z
  .object({
    type: z.literal('text'),
    text: z.string(),
  })
  .passthrough();

/**
 * Any content part. Non-text parts (images, embedded resources) are kept
 * as-is; only their `type` tag is checked.
 */
export const ContentBlockSchema = z.union([
  TextContentSchema,
  z.object({ type: z.string() }).passthrough(),
]);

/**
 * Result of tools/call. No defaults are filled in, so the parsed value
 * equals what the peer sent.
 */
export const CallToolResultSchema = z
  .object({
    content: z.array(ContentBlockSchema),
    isError: z.boolean().optional(),
    structuredContent: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Tool descriptor as advertised by tools/list
 */
export const ToolSchema = z
  .object({
    name: z.string().min(1, 'Tool name is required'),
    description: z.string().optional(),
    inputSchema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ListToolsResultSchema = z
  .object({
    tools: z.array(ToolSchema),
    nextCursor: z.string().optional(),
  })
  .passthrough();

export const ImplementationInfoSchema = z
  .object({
    name: z.string(),
    version: z.string().optional(),
  })
  .passthrough();

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.unknown()).default({}),
    serverInfo: ImplementationInfoSchema.optional(),
    instructions: z.string().optional(),
  })
  .passthrough();

export type TextContent = z.infer<typeof TextContentSchema>;
export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type CallToolResult = z.infer<typeof CallToolResultSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;
export type ImplementationInfo = z.infer<typeof ImplementationInfoSchema>;
export type InitializeResult = z.infer<typeof InitializeResultSchema>;

/**
 * Format zod issues as "path: message" pairs on one line
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
