import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { tryParseJson } from '../utils/json.js';

/**
 * PostGrid print-mail client. One letter per call, no retries: a failed
 * letter is reported back and the caller routes the lead to Error.
 */

export interface LetterRecipient {
    firstName: string;
    lastName: string;
    addressLine1: string;
    addressLine2: string;
    city: string;
    provinceOrState: string;
    postalOrZip: string;
    countryCode: string;
}

export interface LetterRequest {
    to: LetterRecipient;
    template: string;
    description: string;
    mergeVariables: Record<string, string>;
}

export type LetterResult =
    | { success: true; letterId: string }
    | { success: false; status?: number; error: string };

export interface PostGridConfig {
    apiKey: string;
    baseUrl: string;
    /** Contact id of the return address */
    senderContactId: string;
    fetchFn?: typeof fetch;
}

const LetterCreatedSchema = z.object({ id: z.string() }).passthrough();

const VendorErrorSchema = z.object({
    error: z.object({
        message: z.string().optional(),
        type: z.string().optional(),
    }).passthrough(),
}).passthrough();

/** Pull a readable message out of an error response. */
export function readVendorError(status: number, text: string): string {
    const parsed = tryParseJson(text);
    if (!parsed.ok) {
        return text ? text.slice(0, 100) : `HTTP ${status}`;
    }
    const body = VendorErrorSchema.safeParse(parsed.value);
    if (!body.success) {
        return 'Unknown error';
    }
    return body.data.error.message ?? body.data.error.type ?? 'Unknown error';
}

/** Flatten a letter into the vendor's bracketed form fields. */
export function encodeLetter(letter: LetterRequest, senderContactId: string): URLSearchParams {
    const form = new URLSearchParams();

    for (const [key, value] of Object.entries(letter.to)) {
        form.append(`to[${key}]`, value);
    }

    form.append('from', senderContactId);
    form.append('template', letter.template);
    form.append('size', 'us_letter');
    form.append('addressPlacement', 'top_first_page');
    form.append('doubleSided', 'false');
    form.append('color', 'true');
    form.append('mailingClass', 'first_class');
    form.append('description', letter.description);

    for (const [key, value] of Object.entries(letter.mergeVariables)) {
        form.append(`mergeVariables[${key}]`, value);
    }
    return form;
}

export class PostGridClient {
    private readonly baseUrl: string;
    private readonly fetchFn: typeof fetch;

    constructor(private readonly config: PostGridConfig) {
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.fetchFn = config.fetchFn ?? fetch;
    }

    async createLetter(letter: LetterRequest): Promise<LetterResult> {
        let status: number;
        let text: string;
        try {
            const response = await this.fetchFn(`${this.baseUrl}/letters`, {
                method: 'POST',
                headers: {
                    'x-api-key': this.config.apiKey,
                    'Content-Type': 'application/x-www-form-urlencoded',
                },
                body: encodeLetter(letter, this.config.senderContactId).toString(),
            });
            status = response.status;
            text = await response.text();
        } catch (error) {
            logger.error('PostGrid request failed', { error });
            return { success: false, error: errorMessage(error) };
        }

        if (status >= 400) {
            return { success: false, status, error: readVendorError(status, text) };
        }

        const parsed = tryParseJson(text);
        if (parsed.ok) {
            const created = LetterCreatedSchema.safeParse(parsed.value);
            if (created.success) {
                return { success: true, letterId: created.data.id };
            }
        }
        return { success: true, letterId: text.trim() };
    }
}
