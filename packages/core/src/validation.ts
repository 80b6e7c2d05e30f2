import { z } from 'zod';

import { type InferenceRequest } from './entities/inference';
import { ValidationError } from './errors';

export interface RequestLimits {
  /** Ceiling for `maxTokens`; the floor is always 1. */
  maxTokensCeiling: number;
}

const chatMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string()
});

function samplingParamsSchema(limits: RequestLimits) {
  return z.object({
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().min(1).max(limits.maxTokensCeiling),
    topP: z.number().gt(0).max(1).optional(),
    stop: z.array(z.string()).max(8).optional()
  });
}

const clientSchema = z.object({
  ip: z.string().optional(),
  userAgent: z.string().optional()
}).optional();

function inferenceRequestSchema(limits: RequestLimits) {
  const base = {
    params: samplingParamsSchema(limits),
    sessionId: z.string().trim().min(1).max(255).optional(),
    endpoint: z.string().optional(),
    client: clientSchema
  };

  return z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('chat'),
      messages: z.array(chatMessageSchema).min(1),
      ...base
    }),
    z.object({
      kind: z.literal('completion'),
      prompt: z.string().min(1),
      ...base
    })
  ]).superRefine((request, ctx) => {
    if (request.kind === 'chat' && request.messages[request.messages.length - 1]?.role !== 'user') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Last message must be from user',
        path: ['messages']
      });
    }
  });
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Checks an inference request against the sampling bounds.
 * Returns the parsed request or throws a `ValidationError` listing every issue.
 */
export function validateInferenceRequest(request: unknown, limits: RequestLimits): InferenceRequest {
  const parsed = inferenceRequestSchema(limits).safeParse(request);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}
