import type { ReplyTarget } from './types';

/**
 * Posts the result of an asynchronous submission back to its producer:
 * the secret's link, or why no secret was created.
 */
export interface ReplyNotifier {
    notify(target: ReplyTarget, message: string): Promise<void>;
}

/**
 * Notifier for chat platforms that hand out a one-shot `response_url`
 * with each slash command. The message replaces the "working on it" reply.
 */
export function createResponseUrlNotifier(fetchImpl: typeof fetch = fetch): ReplyNotifier {
    return {
        async notify(target, message) {
            const res = await fetchImpl(target.responseUrl, {
                method: 'POST',
                headers: { 'content-type': 'application/json' },
                body: JSON.stringify({ replace_original: true, text: message }),
            });
            if (!res.ok) {
                throw new Error(`Reply to response_url failed with status ${res.status}`);
            }
        },
    };
}
