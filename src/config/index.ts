/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const positiveIntSchema = z.coerce.number().int().positive();
const nonNegativeIntSchema = z.coerce.number().int().min(0);

// Configuration schema
const configSchema = z.object({
    // Credentials (resolved again by the CLI, flags take precedence)
    youtubeApiKey: z.string().nullable().default(null),
    githubToken: z.string().nullable().default(null),

    // Remote endpoints
    youtubeApiBase: urlSchema.default('https://www.googleapis.com/youtube/v3'),
    githubGraphqlUrl: urlSchema.default('https://api.github.com/graphql'),
    userAgent: z.string().min(1).default('feedback-harvester/0.1.0'),

    // Logging & Metrics
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    metricsFile: z.string().nullable().default(null),

    // Rate limit retry policy
    maxRetries: nonNegativeIntSchema.default(5),
    defaultRetryAfterSeconds: nonNegativeIntSchema.default(60),

    // Fetching
    concurrency: positiveIntSchema.default(8),
    requestTimeoutMs: positiveIntSchema.default(30000),
});

export type Config = z.infer<typeof configSchema>;

// Environment variable backing each config key, used in error messages
const ENV_VARS: Record<keyof Config, string> = {
    youtubeApiKey: 'YT_APIKEY',
    githubToken: 'GITHUB_TOKEN',
    youtubeApiBase: 'YOUTUBE_API_BASE',
    githubGraphqlUrl: 'GITHUB_GRAPHQL_URL',
    userAgent: 'HARVEST_USER_AGENT',
    logLevel: 'LOG_LEVEL',
    metricsFile: 'METRICS_FILE',
    maxRetries: 'HARVEST_MAX_RETRIES',
    defaultRetryAfterSeconds: 'HARVEST_DEFAULT_RETRY_AFTER_SECONDS',
    concurrency: 'HARVEST_CONCURRENCY',
    requestTimeoutMs: 'HARVEST_REQUEST_TIMEOUT_MS',
};

export class ConfigurationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n${issues.join('\n')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
    }
}

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        youtubeApiKey: env.YT_APIKEY || env.YOUTUBE_API_KEY || null,
        githubToken: env.GITHUB_TOKEN || null,

        youtubeApiBase: env.YOUTUBE_API_BASE || undefined,
        githubGraphqlUrl: env.GITHUB_GRAPHQL_URL || undefined,
        userAgent: env.HARVEST_USER_AGENT || undefined,

        logLevel: env.LOG_LEVEL || undefined,
        metricsFile: env.METRICS_FILE || null,

        maxRetries: env.HARVEST_MAX_RETRIES,
        defaultRetryAfterSeconds: env.HARVEST_DEFAULT_RETRY_AFTER_SECONDS,

        concurrency: env.HARVEST_CONCURRENCY,
        requestTimeoutMs: env.HARVEST_REQUEST_TIMEOUT_MS,
    };
}

function isConfigKey(key: PropertyKey | undefined): key is keyof Config {
    return typeof key === 'string' && key in ENV_VARS;
}

/**
 * Validate an environment snapshot
 * Throws ConfigurationError naming every offending variable
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const key = issue.path[0];
            const envVar = isConfigKey(key) ? ENV_VARS[key] : issue.path.join('.');
            return `  - ${envVar}: ${issue.message}`;
        });
        throw new ConfigurationError(issues);
    }

    return result.data;
}

/**
 * Load and validate configuration
 * Fails fast with clear error messages
 */
function loadConfig(): Config {
    try {
        return parseConfig(process.env);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }

        console.error('\n❌ Configuration Error\n');
        console.error('The following environment variables are missing or invalid:\n');
        console.error(error.issues.join('\n'));
        console.error('\nSee .env.example for available configuration.\n');

        process.exit(2);
    }
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        youtubeApiKey: cfg.youtubeApiKey ? '[CONFIGURED]' : null,
        githubToken: cfg.githubToken ? '[CONFIGURED]' : null,
        youtubeApiBase: cfg.youtubeApiBase,
        githubGraphqlUrl: cfg.githubGraphqlUrl,
        logLevel: cfg.logLevel,
        maxRetries: cfg.maxRetries,
        defaultRetryAfterSeconds: cfg.defaultRetryAfterSeconds,
        concurrency: cfg.concurrency,
        requestTimeoutMs: cfg.requestTimeoutMs,
        metricsFile: cfg.metricsFile,
    };
}

// Export singleton config
export const config = loadConfig();
