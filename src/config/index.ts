import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { Settings } from '../types';

// Load environment variables
dotenv.config();

export const DEFAULT_API_URL = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_DATABASE_PATH = path.join('data', 'mail-composer.db');

// Shipped with the package, so it resolves the same from src/ and dist/
export const DEFAULT_PROMPT_PATH = path.join(__dirname, '..', '..', 'config', 'prompts', 'default.txt');

const TRUTHY = ['true', '1', 'yes', 'on'];

const text = () => z.string().optional().transform((value) => (value ?? '').trim());

const textOr = (fallback: string) =>
    z.string().optional().transform((value) => {
        const trimmed = (value ?? '').trim();
        return trimmed === '' ? fallback : trimmed;
    });

// Unparseable numbers come through as NaN so the validator can report them
const numberOr = (fallback: number) =>
    z.string().optional().transform((value) => {
        if (value === undefined || value.trim() === '') return fallback;
        return Number(value.trim());
    });

// Generation must keep working on a bad value, so these fall back to the default
const positiveIntOr = (fallback: number) =>
    numberOr(fallback).transform((value) => (Number.isInteger(value) && value > 0 ? value : fallback));

const flagOr = (fallback: boolean) =>
    z.string().optional().transform((value) => {
        if (value === undefined || value.trim() === '') return fallback;
        return TRUTHY.includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
    EMAIL_API_KEY: text(),
    EMAIL_API_URL: textOr(DEFAULT_API_URL),
    EMAIL_API_MODEL: text(),
    EMAIL_API_TIMEOUT: positiveIntOr(30),
    EMAIL_API_MAX_ATTEMPTS: positiveIntOr(3),
    EMAIL_API_RETRY_BASE_MS: positiveIntOr(1000),

    SMTP_HOST: text(),
    SMTP_PORT: numberOr(587),
    SMTP_USERNAME: text(),
    SMTP_PASSWORD: z.string().optional().transform((value) => value ?? ''),
    EMAIL_FROM: text(),
    SMTP_USE_TLS: flagOr(true),
    SMTP_USE_SSL: flagOr(false),
    SMTP_TIMEOUT: numberOr(30),

    DATABASE_PATH: textOr(DEFAULT_DATABASE_PATH),
});

/**
 * Build a frozen Settings snapshot from an environment map.
 * When both TLS and SSL are requested, TLS wins and the conflict is recorded.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid environment configuration: ${parsed.error.message}`);
    }
    const e = parsed.data;
    const encryptionConflict = e.SMTP_USE_TLS && e.SMTP_USE_SSL;

    return Object.freeze({
        api: Object.freeze({
            key: e.EMAIL_API_KEY,
            url: e.EMAIL_API_URL,
            model: e.EMAIL_API_MODEL || undefined,
            timeoutMs: e.EMAIL_API_TIMEOUT * 1000,
            maxAttempts: e.EMAIL_API_MAX_ATTEMPTS,
            retryBaseDelayMs: e.EMAIL_API_RETRY_BASE_MS,
        }),
        smtp: Object.freeze({
            host: e.SMTP_HOST,
            port: e.SMTP_PORT,
            username: e.SMTP_USERNAME,
            password: e.SMTP_PASSWORD,
            from: e.EMAIL_FROM,
            useTls: e.SMTP_USE_TLS,
            useSsl: e.SMTP_USE_SSL && !e.SMTP_USE_TLS,
            encryptionConflict,
            timeoutSeconds: e.SMTP_TIMEOUT,
        }),
        databasePath: e.DATABASE_PATH,
    });
}

let cachedSettings: Settings | null = null;

export function getSettings(): Settings {
    if (!cachedSettings) {
        cachedSettings = loadSettings();
    }
    return cachedSettings;
}

/**
 * Re-read the environment (and .env) and replace the cached snapshot.
 */
export function reloadSettings(env?: NodeJS.ProcessEnv): Settings {
    if (!env) {
        dotenv.config({ override: true });
    }
    cachedSettings = loadSettings(env ?? process.env);
    return cachedSettings;
}

export function loadPromptTemplate(promptPath?: string): string {
    const filePath = promptPath || DEFAULT_PROMPT_PATH;

    if (!fs.existsSync(filePath)) {
        throw new Error(`Prompt template not found: ${filePath}`);
    }

    return fs.readFileSync(filePath, 'utf-8');
}

export function getDatabasePath(settings: Settings = getSettings()): string {
    if (settings.databasePath === ':memory:') return settings.databasePath;

    const filePath = path.resolve(process.cwd(), settings.databasePath);
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
    return filePath;
}

export function getDataDir(): string {
    const dataDir = path.join(process.cwd(), 'data');
    if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
    }
    return dataDir;
}

export function maskApiKey(key: string): string {
    if (!key) return 'MISSING';
    return key.length <= 10 ? `${key.slice(0, 2)}...` : `${key.slice(0, 10)}...`;
}
