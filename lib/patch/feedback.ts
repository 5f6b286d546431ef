import { z } from 'zod';
import { UnsupportedActionError, ValidationError, issuesFromZod } from '@/lib/errors';
import { BBoxSchema, JsonValueSchema, StyleValueSchema } from '@/lib/ir/schema';

export const FEEDBACK_ACTIONS = [
  'edit_text',
  'reposition',
  'style',
  'annotate',
  'hide',
  'show',
  'add_block',
  'remove_block'
] as const;

export type FeedbackAction = (typeof FEEDBACK_ACTIONS)[number];

const BlockTarget = {
  diagram_id: z.string().min(1),
  block_id: z.string().min(1)
};

const EmptyPayload = z.object({}).strict().default({});

export const FeedbackRequestSchema = z.discriminatedUnion('action', [
  z.object({ ...BlockTarget, action: z.literal('edit_text'), payload: z.object({ text: z.string() }).strict() }),
  z.object({
    ...BlockTarget,
    action: z.literal('reposition'),
    payload: z.object({ bbox: BBoxSchema.partial() }).strict()
  }),
  z.object({
    ...BlockTarget,
    action: z.literal('style'),
    payload: z.object({ style: z.record(StyleValueSchema) }).strict()
  }),
  z.object({
    ...BlockTarget,
    action: z.literal('annotate'),
    payload: z.object({ annotations: z.record(JsonValueSchema) }).strict()
  }),
  z.object({ ...BlockTarget, action: z.literal('hide'), payload: EmptyPayload }),
  z.object({ ...BlockTarget, action: z.literal('show'), payload: EmptyPayload }),
  z.object({
    diagram_id: z.string().min(1),
    block_id: z.string().min(1).optional(),
    action: z.literal('add_block'),
    payload: z
      .object({
        id: z.string().min(1).optional(),
        type: z.string().min(1).optional(),
        text: z.string().optional(),
        bbox: BBoxSchema.partial().optional(),
        style: z.record(StyleValueSchema).optional(),
        annotations: z.record(JsonValueSchema).optional(),
        zone: z.string().min(1).optional()
      })
      .strict()
      .default({})
  }),
  z.object({
    ...BlockTarget,
    action: z.literal('remove_block'),
    payload: z.object({ cascade: z.boolean().default(true) }).strict().default({})
  })
]);

export type FeedbackRequest = z.infer<typeof FeedbackRequestSchema>;

const Envelope = z.object({ action: z.string(), block_id: z.unknown().optional() }).passthrough();

function isAction(value: string): value is FeedbackAction {
  return FEEDBACK_ACTIONS.some((a) => a === value);
}

/**
 * Boundary check for a feedback request, in order: unknown verb, missing
 * `block_id`, then the verb's own payload shape.
 */
export function parseFeedback(input: unknown): FeedbackRequest {
  const envelope = Envelope.safeParse(input);
  if (!envelope.success) {
    throw new ValidationError('Feedback request must be an object with a string action', issuesFromZod(envelope.error));
  }
  const { action, block_id: blockId } = envelope.data;
  if (!isAction(action)) throw new UnsupportedActionError(action);
  if (action !== 'add_block' && (typeof blockId !== 'string' || blockId.trim() === '')) {
    throw new ValidationError(`block_id is required for '${action}'`, [{ path: 'block_id', message: 'Required' }]);
  }
  const parsed = FeedbackRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid '${action}' feedback`, issuesFromZod(parsed.error));
  }
  return parsed.data;
}
