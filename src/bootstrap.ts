import { loadConfig, loadEnvFile, requireSetting, type Config } from './config/index.js';
import { loadRegistry, type Registry } from './config/registry.js';
import { CloseClient } from './tools/close.js';
import { RequestExecutor } from './tools/executor.js';
import { PostGridClient } from './tools/postgrid.js';
import { SlackNotifier } from './tools/slack.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger, setLogLevel } from './utils/logger.js';
import { systemClock, type Clock } from './utils/retry.js';

/**
 * Shared start-up for every CLI: environment, configuration, registry and
 * the API clients built from them.
 */

export interface Runtime {
    config: Config;
    registry: Registry;
    clock: Clock;
}

export function bootstrap(clock: Clock = systemClock): Runtime {
    loadEnvFile();
    const config = loadConfig();
    setLogLevel(config.app.logLevel);
    const registry = loadRegistry(config);
    return { config, registry, clock };
}

export function createCloseClient(runtime: Runtime, account: 'primary' | 'secondary' = 'primary'): CloseClient {
    const { config, clock } = runtime;
    const apiKey = account === 'primary'
        ? requireSetting(config.close.apiKey, 'CLOSE_API_KEY')
        : requireSetting(config.close.secondaryApiKey, 'CLOSE_SECONDARY_API_KEY');

    const executor = new RequestExecutor({
        baseUrl: config.close.baseUrl,
        apiKey,
        label: account === 'primary' ? 'close' : 'close (secondary)',
        clock,
    });
    return new CloseClient(executor, { clock });
}

export function createPostGridClient(runtime: Runtime): PostGridClient {
    const { postgrid } = runtime.config;
    return new PostGridClient({
        apiKey: requireSetting(postgrid.apiKey, 'POSTGRID_API_KEY'),
        baseUrl: postgrid.baseUrl,
        senderContactId: requireSetting(postgrid.senderContactId, 'POSTGRID_SENDER_CONTACT_ID'),
    });
}

export function createSlackNotifier(runtime: Runtime): SlackNotifier {
    const { slack } = runtime.config;
    return new SlackNotifier({
        botToken: requireSetting(slack.botToken, 'SLACK_BOT_TOKEN'),
        channelId: requireSetting(slack.channelId, 'SLACK_CHANNEL_ID'),
    });
}

/**
 * Run a CLI entry point. Configuration problems and crashes outside
 * per-record processing set exit code 1.
 */
export function runCli(name: string, main: () => Promise<void>): void {
    main().catch((error: unknown) => {
        if (error instanceof ConfigError) {
            logger.error(`${name}: ${error.message}`);
        } else {
            logger.error(`${name} failed: ${errorMessage(error)}`, { error });
        }
        process.exitCode = 1;
    });
}
