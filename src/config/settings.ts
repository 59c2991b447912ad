import { z } from 'zod';
import { LogLevel, parseLogLevel } from '../utils/logger.js';
import { DEFAULT_MODELS, MODEL_PROVIDERS, ModelProvider } from '../utils/languageModel.js';
import { LANGUAGES, Language } from '../types/story.js';

const csv = z
    .string()
    .default('')
    .transform(value => value.split(',').map(item => item.trim()).filter(Boolean));

const SettingsSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5001),
    MONGO_URI: z.string().min(1, 'MONGO_URI is not defined in environment variables'),
    JWT_SECRET: z.string().min(1, 'JWT_SECRET is not defined in environment variables'),
    PROVIDER: z.enum(MODEL_PROVIDERS).default('openai'),
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    // Defaults per provider when unset
    MODEL_NAME: z.string().min(1).optional(),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    MAX_TOKENS: z.coerce.number().int().positive().optional(),
    // Narrative generation is slow and non-interactive; five minutes per call
    LLM_TIMEOUT_SEC: z.coerce.number().positive().default(300),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    DEFAULT_LANGUAGE: z.enum(LANGUAGES).default('he'),
    ADMIN_PERSON_IDS: csv
});

export interface Settings {
    port: number;
    mongoUri: string;
    jwtSecret: string;
    provider: ModelProvider;
    // Key of the selected provider
    apiKey: string;
    modelName: string;
    temperature: number;
    maxTokens?: number;
    llmTimeoutSec: number;
    logLevel: LogLevel;
    defaultLanguage: Language;
    adminPersonIds: string[];
}

const API_KEY_VARIABLES: Record<ModelProvider, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
    openai: 'OPENAI_API_KEY',
    anthropic: 'ANTHROPIC_API_KEY'
};

// Blank variables in .env count as unset
const withoutBlanks = (env: Record<string, string | undefined>): Record<string, string> => {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value;
        }
    }
    return cleaned;
};

export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
    const parsed = SettingsSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const values = parsed.data;
    const keyVariable = API_KEY_VARIABLES[values.PROVIDER];
    const apiKey = values[keyVariable];
    if (!apiKey) {
        throw new Error(`Invalid configuration: ${keyVariable}: Required when PROVIDER is ${values.PROVIDER}`);
    }

    return {
        port: values.PORT,
        mongoUri: values.MONGO_URI,
        jwtSecret: values.JWT_SECRET,
        provider: values.PROVIDER,
        apiKey,
        modelName: values.MODEL_NAME ?? DEFAULT_MODELS[values.PROVIDER],
        temperature: values.TEMPERATURE,
        maxTokens: values.MAX_TOKENS,
        llmTimeoutSec: values.LLM_TIMEOUT_SEC,
        logLevel: parseLogLevel(values.LOG_LEVEL),
        defaultLanguage: values.DEFAULT_LANGUAGE,
        adminPersonIds: values.ADMIN_PERSON_IDS
    };
}
