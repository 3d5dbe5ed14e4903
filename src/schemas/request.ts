import { z } from 'zod';

export const SystemMessageSchema = z.object({
  role: z.literal('system'),
  content: z.string(),
});

export const UserMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
});

export const AssistantMessageSchema = z.object({
  role: z.literal('assistant'),
  content: z.string(),
  status: z.enum(['complete', 'length', 'cancelled']).optional(),
});

export const MessageSchema = z.discriminatedUnion('role', [
  SystemMessageSchema,
  UserMessageSchema,
  AssistantMessageSchema,
]);

export const FunctionDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: z.record(z.unknown()).optional(),
});

export const ChatCompletionRequestSchema = z.object({
  messages: z.array(MessageSchema).min(1),
  functions: z.array(FunctionDescriptorSchema).optional(),
});

export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;

export const ChatCompletionResponseSchema = AssistantMessageSchema.extend({
  status: z.enum(['complete', 'length', 'cancelled']),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

export const ModelVersionParamsSchema = z.object({
  owner: z.string().min(1),
  name: z.string().min(1),
});

// Replicate wire payloads

export const CreatedPredictionSchema = z.object({
  id: z.string().min(1),
});

export const PredictionSchema = z.discriminatedUnion('status', [
  z.object({
    id: z.string().optional(),
    status: z.enum(['starting', 'processing']),
  }),
  z.object({
    id: z.string().optional(),
    status: z.literal('succeeded'),
    output: z.array(z.string()),
  }),
  z.object({
    id: z.string().optional(),
    status: z.literal('failed'),
    error: z.unknown().optional(),
  }),
  z.object({
    id: z.string().optional(),
    status: z.literal('canceled'),
  }),
]);

export type Prediction = z.infer<typeof PredictionSchema>;
export type PredictionStatus = Prediction['status'];
export type TerminalPrediction = Exclude<Prediction, { status: 'starting' | 'processing' }>;
export type SucceededPrediction = Extract<Prediction, { status: 'succeeded' }>;

export const ModelVersionListSchema = z.object({
  results: z.array(z.object({ id: z.string().min(1) })),
});
