/**
 * Inbound request parsing: bearer credential and chat-completion body.
 */

import { z } from 'zod';
import { MalformedRequestError, UnauthorizedError } from '../errors.js';

const BEARER_PREFIX = 'Bearer ';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'developer', 'function', 'tool']),
  content: z.string(),
  name: z.string().optional(),
  tool_call_id: z.string().optional(),
}).superRefine((message, ctx) => {
  if (message.role === 'function' && !message.name) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['name'], message: 'Function messages require a name' });
  }
  if (message.role === 'tool' && !message.tool_call_id) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tool_call_id'], message: 'Tool messages require a tool_call_id' });
  }
});

/** A callable function the model may choose to invoke */
export const FunctionDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: z.record(z.unknown()).optional(),
});

export const FunctionCallSchema = z.union([
  z.enum(['none', 'auto']),
  z.object({ name: z.string().min(1) }),
]);

export const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  n: z.number().int().positive().optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  user: z.string().optional(),
  functions: z.array(FunctionDefinitionSchema).optional(),
  function_call: FunctionCallSchema.optional(),
  stream: z.literal(false, {
    errorMap: () => ({ message: 'Streaming responses are not supported' }),
  }).optional(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/**
 * Extract the caller credential from an Authorization header.
 * @throws UnauthorizedError when the header is missing, not a Bearer token, or empty
 */
export function parseBearerToken(header: string | undefined): string {
  if (header === undefined || header === '') {
    throw new UnauthorizedError('Missing Authorization header.');
  }
  if (!header.startsWith(BEARER_PREFIX)) {
    throw new UnauthorizedError('Invalid Authorization header format. Expected: Bearer <token>.');
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  if (token === '') {
    throw new UnauthorizedError('Missing API key in Authorization header.');
  }
  return token;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a chat-completion body.
 * Accepts raw JSON text or an already-decoded value.
 * @throws MalformedRequestError when the body is missing, not JSON, or the wrong shape
 */
export function parseChatRequest(body: unknown): ChatRequest {
  if (body === undefined || body === null || body === '') {
    throw new MalformedRequestError('Missing JSON data in request.');
  }

  let decoded: unknown = body;
  if (typeof body === 'string') {
    try {
      decoded = JSON.parse(body);
    } catch {
      throw new MalformedRequestError('Missing JSON data in request.');
    }
  }

  const result = ChatRequestSchema.safeParse(decoded);
  if (!result.success) {
    throw new MalformedRequestError(`Invalid request: ${formatIssues(result.error)}`);
  }
  return result.data;
}
