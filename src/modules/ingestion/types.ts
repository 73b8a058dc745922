import { z } from 'zod';
import { ExpireInSchema } from '../secrets/types';

/**
 * Where the worker posts the link once the secret exists.
 */
export const ReplyTargetSchema = z.object({
    responseUrl: z.string().url(),
    channelId: z.string().optional(),
    teamId: z.string().optional(),
});

export type ReplyTarget = z.infer<typeof ReplyTargetSchema>;

/**
 * A creation request from an asynchronous producer, as it sits on the queue.
 * Lengths and the prompt/answer pairing are checked by the secret service.
 */
export const IngestionRequestSchema = z.object({
    text: z.string(),
    prompt: z.string().optional(),
    answer: z.string().optional(),
    expireIn: ExpireInSchema.optional(),
    /** Origin the producer was reached on, used to build an absolute link */
    baseUrl: z.string().url().optional(),
    replyTo: ReplyTargetSchema.optional(),
});

export type IngestionRequest = z.infer<typeof IngestionRequestSchema>;

/** Form fields a chat slash command posts */
export const SlashCommandSchema = z.object({
    text: z.string().trim().min(1, 'Secret text is required'),
    channel_id: z.string().optional(),
    team_id: z.string().optional(),
    response_url: z.string().url().optional(),
});
