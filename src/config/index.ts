import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { tryParseJson } from '../utils/json.js';
import type { SearchQuery } from '../types/index.js';

/**
 * Every setting the scripts recognise, read once at process start and passed
 * down explicitly. Credentials are optional here; each workflow asks for the
 * ones it needs through requireSetting().
 */

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalEmail = z.preprocess(blankToUndefined, z.string().email().optional());

const ConfigSchema = z.object({
    close: z.object({
        apiKey: optionalText,
        secondaryApiKey: optionalText,
        baseUrl: z.string().url(),
    }),

    postgrid: z.object({
        apiKey: optionalText,
        baseUrl: z.string().url(),
        senderContactId: optionalText,
    }),

    slack: z.object({
        botToken: optionalText,
        channelId: optionalText,
        salesGroupId: optionalText,
    }),

    // Recipient of the find-owner list
    handoff: z.object({
        leadId: optionalText,
        contactId: optionalText,
        fallbackEmail: optionalEmail,
    }),

    sender: z.object({
        email: optionalEmail,
        name: optionalText,
    }),

    paths: z.object({
        registry: z.string().min(1),
        reps: z.string().min(1),
        queries: z.string().min(1),
    }),

    schedule: z.object({
        timezone: z.string().min(1),
        findOwner: z.string().min(1),
        missingLot: z.string().min(1),
    }),

    app: z.object({
        nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
        logLevel: z.enum(['debug', 'success', 'info', 'warn', 'error']).default('info'),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Load `.env` into process.env. Existing variables win. */
export function loadEnvFile(file?: string): void {
    dotenv.config(file ? { path: file } : undefined);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const raw = {
        close: {
            apiKey: env.CLOSE_API_KEY,
            secondaryApiKey: env.CLOSE_SECONDARY_API_KEY,
            baseUrl: env.CLOSE_BASE_URL || 'https://api.close.com/api/v1',
        },
        postgrid: {
            apiKey: env.POSTGRID_API_KEY,
            baseUrl: env.POSTGRID_BASE_URL || 'https://api.postgrid.com/print-mail/v1',
            senderContactId: env.POSTGRID_SENDER_CONTACT_ID,
        },
        slack: {
            botToken: env.SLACK_BOT_TOKEN,
            channelId: env.SLACK_CHANNEL_ID,
            salesGroupId: env.SLACK_SALES_GROUP_ID,
        },
        handoff: {
            leadId: env.HANDOFF_LEAD_ID,
            contactId: env.HANDOFF_CONTACT_ID,
            fallbackEmail: env.HANDOFF_FALLBACK_EMAIL,
        },
        sender: {
            email: env.SENDER_EMAIL,
            name: env.SENDER_NAME,
        },
        paths: {
            registry: env.REGISTRY_PATH || 'config/registry.json',
            reps: env.REPS_PATH || 'config/sales-reps.json',
            queries: env.QUERIES_DIR || 'queries',
        },
        schedule: {
            timezone: env.SCHEDULE_TIMEZONE || 'America/New_York',
            findOwner: env.FIND_OWNER_SCHEDULE || '0 9 * * 1-5',
            missingLot: env.MISSING_LOT_SCHEDULE || '30 6 * * *',
        },
        app: {
            nodeEnv: env.NODE_ENV || undefined,
            logLevel: env.LOG_LEVEL || undefined,
        },
    };

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return result.data;
}

/** Fail fast when a workflow needs a setting that is not configured. */
export function requireSetting(value: string | undefined, envName: string): string {
    if (!value) {
        throw new ConfigError(`${envName} is not set`);
    }
    return value;
}

/**
 * Read and validate a JSON file. Relative paths resolve against the working
 * directory. Any problem is a ConfigError.
 */
export function loadJsonFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
    const resolved = path.resolve(file);

    let text: string;
    try {
        text = readFileSync(resolved, 'utf8');
    } catch (error) {
        throw new ConfigError(`Could not read ${label} at ${resolved}: ${errorMessage(error)}`);
    }

    const parsed = tryParseJson(text);
    if (!parsed.ok) {
        throw new ConfigError(`${label} at ${resolved} is not valid JSON: ${parsed.error}`);
    }

    const result = schema.safeParse(parsed.value);
    if (!result.success) {
        throw new ConfigError(`${label} at ${resolved} is invalid: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    return result.data;
}

const SearchQuerySchema = z.record(z.unknown());

/** Load a saved search from the queries directory (or an explicit path ending in .json). */
export function loadQuery(config: Config, name: string): SearchQuery {
    const file = name.endsWith('.json') ? name : path.join(config.paths.queries, `${name}.json`);
    return loadJsonFile(file, SearchQuerySchema, `query "${name}"`);
}

export const SalesRepSchema = z.object({
    name: z.string().min(1),
    userId: z.string().min(1),
});
export type SalesRep = z.infer<typeof SalesRepSchema>;

export function loadSalesReps(config: Config): SalesRep[] {
    return loadJsonFile(config.paths.reps, z.array(SalesRepSchema).min(1), 'sales reps');
}
