import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { tryParseJson } from '../utils/json.js';

const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

export interface SlackConfig {
    botToken: string;
    channelId: string;
    fetchFn?: typeof fetch;
}

const SlackResponseSchema = z.object({
    ok: z.boolean(),
    error: z.string().optional(),
}).passthrough();

/**
 * Fire-and-forget channel notifications. A failed post is logged and
 * reported as false; it never interrupts the run that sent it.
 */
export class SlackNotifier {
    private readonly fetchFn: typeof fetch;

    constructor(private readonly config: SlackConfig) {
        this.fetchFn = config.fetchFn ?? fetch;
    }

    async post(text: string): Promise<boolean> {
        try {
            const response = await this.fetchFn(SLACK_POST_MESSAGE_URL, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${this.config.botToken}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({ channel: this.config.channelId, text }),
            });
            const body = await response.text();
            const parsed = tryParseJson(body);
            const result = parsed.ok ? SlackResponseSchema.safeParse(parsed.value) : undefined;

            if (response.status !== 200 || !result?.success || !result.data.ok) {
                logger.warn(`Slack message not delivered: ${body.slice(0, 200)}`);
                return false;
            }
            return true;
        } catch (error) {
            logger.warn('Slack message not delivered', { error });
            return false;
        }
    }
}

/** Prefix a message with a user-group mention when one is configured. */
export function mentionGroup(groupId: string | undefined, message: string): string {
    return groupId ? `<!subteam^${groupId}> ${message}` : message;
}
