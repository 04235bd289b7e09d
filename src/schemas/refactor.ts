import { z } from 'zod';

const identifier = z.string()
  .transform((v) => v.trim())
  .refine((v) => v.length > 0, { message: 'Field cannot be empty or whitespace only' });

export const RefactorRequest = z.object({
  class_name: identifier,
  method_name: identifier,
});
export type RefactorRequestT = z.infer<typeof RefactorRequest>;

export const RefactorResponse = z.object({
  success: z.boolean(),
  class_name: z.string(),
  method_name: z.string(),
  result: z.record(z.unknown()).optional(),
  error: z.string().optional(),
  refinement: z.object({
    outcome: z.enum(['EXITED', 'CAPPED']),
    iterations: z.number().int(),
  }).optional(),
  duration_ms: z.number().optional(),
});
export type RefactorResponseT = z.infer<typeof RefactorResponse>;

export const HealthResponse = z.object({
  status: z.literal('healthy'),
  version: z.string(),
  app_name: z.string(),
  busy: z.boolean(),
});
export type HealthResponseT = z.infer<typeof HealthResponse>;

export type ErrorResponseT = {
  detail: string;
  status_code: number;
  errors?: unknown;
  message?: string;
};
