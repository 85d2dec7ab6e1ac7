import type OpenAI from 'openai';
import { GenerationRequest, ProviderKind } from '../types';
import { ResponseParseError } from './errors';

export const DEFAULT_TONE = 'professional';
export const DEFAULT_EMAIL_TYPE = 'general';
export const ANTHROPIC_VERSION = '2023-06-01';
const ANTHROPIC_DEFAULT_MAX_TOKENS = 1024;

export interface ProviderRequestContext {
    request: GenerationRequest;
    // Prompt after the template was applied; chat-style providers send this
    renderedPrompt: string;
    model?: string;
}

export interface ParsedContent {
    content: string;
    subject?: string;
}

export interface ProviderAdapter {
    kind: ProviderKind;
    buildHeaders(apiKey: string): Record<string, string>;
    buildRequest(context: ProviderRequestContext): unknown;
    parseResponse(body: unknown): ParsedContent;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
    return typeof value === 'string' && value.trim() !== '';
}

function requireObject(body: unknown, provider: ProviderKind): JsonObject {
    if (!isRecord(body)) {
        throw new ResponseParseError(`${provider} response is not a JSON object`);
    }
    return body;
}

/**
 * Split a leading "Subject: ..." line off generated text.
 * Markdown bold around the label is tolerated.
 */
export function splitSubjectLine(text: string): ParsedContent {
    const trimmed = text.trim();
    const lines = trimmed.split(/\r?\n/);
    const first = lines[0].replace(/\*\*/g, '').trim();
    const match = first.match(/^subject\s*:\s*(.+)$/i);
    if (!match) {
        return { content: trimmed };
    }

    const content = lines.slice(1).join('\n').trim();
    if (!content) {
        return { content: trimmed };
    }
    return { subject: match[1].trim(), content };
}

export function renderPrompt(template: string, request: GenerationRequest): string {
    const values: Record<string, string> = {
        tone: request.tone?.trim() || DEFAULT_TONE,
        emailType: request.emailType?.trim() || DEFAULT_EMAIL_TYPE,
        prompt: request.prompt.trim(),
    };

    return template.replace(/\{\{(tone|emailType|prompt)\}\}/g, (_placeholder, name: string) => values[name] ?? '').trim();
}

// ---------------------------------------------------------------------------
// OpenAI-style chat completions (OpenAI, OpenRouter, Mistral, Groq, ...)
// ---------------------------------------------------------------------------

function isChatCompletion(body: JsonObject): body is JsonObject & Pick<OpenAI.ChatCompletion, 'choices'> {
    return Array.isArray(body.choices);
}

const openaiAdapter: ProviderAdapter = {
    kind: 'openai',

    buildHeaders(apiKey) {
        return { Authorization: `Bearer ${apiKey}` };
    },

    buildRequest({ request, renderedPrompt, model }): OpenAI.ChatCompletionCreateParamsNonStreaming {
        const payload: OpenAI.ChatCompletionCreateParamsNonStreaming = {
            model: model || 'gpt-4o-mini',
            messages: [
                {
                    role: 'system',
                    content: 'You are an assistant that writes clear, well-structured emails.',
                },
                { role: 'user', content: renderedPrompt },
            ],
        };
        if (request.maxLength) {
            payload.max_tokens = request.maxLength;
        }
        return payload;
    },

    parseResponse(body) {
        const data = requireObject(body, 'openai');
        if (!isChatCompletion(data)) {
            throw new ResponseParseError('openai response has no "choices" array');
        }
        const content = data.choices[0]?.message?.content;
        if (!nonEmptyString(content)) {
            throw new ResponseParseError('openai response has no message content');
        }
        return splitSubjectLine(content);
    },
};

// ---------------------------------------------------------------------------
// Anthropic-style messages
// ---------------------------------------------------------------------------

const anthropicAdapter: ProviderAdapter = {
    kind: 'anthropic',

    buildHeaders(apiKey) {
        return { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION };
    },

    buildRequest({ request, renderedPrompt, model }) {
        return {
            model: model || 'claude-3-5-haiku-latest',
            max_tokens: request.maxLength || ANTHROPIC_DEFAULT_MAX_TOKENS,
            messages: [{ role: 'user', content: renderedPrompt }],
        };
    },

    parseResponse(body) {
        const data = requireObject(body, 'anthropic');
        if (!Array.isArray(data.content)) {
            throw new ResponseParseError('anthropic response has no "content" array');
        }
        const text = data.content
            .filter(isRecord)
            .filter((block) => block.type === 'text' && typeof block.text === 'string')
            .map((block) => String(block.text))
            .join('');
        if (!text.trim()) {
            throw new ResponseParseError('anthropic response has no text blocks');
        }
        return splitSubjectLine(text);
    },
};

// ---------------------------------------------------------------------------
// Google-style generateContent
// ---------------------------------------------------------------------------

const googleAdapter: ProviderAdapter = {
    kind: 'google',

    buildHeaders(apiKey) {
        return { 'x-goog-api-key': apiKey };
    },

    buildRequest({ request, renderedPrompt }) {
        const payload: JsonObject = {
            contents: [{ role: 'user', parts: [{ text: renderedPrompt }] }],
        };
        if (request.maxLength) {
            payload.generationConfig = { maxOutputTokens: request.maxLength };
        }
        return payload;
    },

    parseResponse(body) {
        const data = requireObject(body, 'google');
        const candidate = Array.isArray(data.candidates) ? data.candidates[0] : undefined;
        if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
            throw new ResponseParseError('google response has no candidates[0].content.parts');
        }
        const text = candidate.content.parts
            .filter(isRecord)
            .map((part) => (typeof part.text === 'string' ? part.text : ''))
            .join('');
        if (!text.trim()) {
            throw new ResponseParseError('google response has no text parts');
        }
        return splitSubjectLine(text);
    },
};

// ---------------------------------------------------------------------------
// Anything else: a plain JSON API
// ---------------------------------------------------------------------------

const customAdapter: ProviderAdapter = {
    kind: 'custom',

    buildHeaders(apiKey) {
        return { Authorization: `Bearer ${apiKey}` };
    },

    buildRequest({ request }) {
        return {
            prompt: request.prompt,
            tone: request.tone?.trim() || DEFAULT_TONE,
            email_type: request.emailType?.trim() || DEFAULT_EMAIL_TYPE,
            max_length: request.maxLength,
        };
    },

    parseResponse(body) {
        const data = requireObject(body, 'custom');
        const raw = nonEmptyString(data.content) ? data.content : data.text;
        if (!nonEmptyString(raw)) {
            throw new ResponseParseError('response has neither a "content" nor a "text" field');
        }
        if (nonEmptyString(data.subject)) {
            return { subject: data.subject.trim(), content: raw.trim() };
        }
        return splitSubjectLine(raw);
    },
};

export const PROVIDERS: Record<ProviderKind, ProviderAdapter> = {
    openai: openaiAdapter,
    anthropic: anthropicAdapter,
    google: googleAdapter,
    custom: customAdapter,
};

/**
 * Pick the provider family from the endpoint URL.
 * Returns null when the URL is not an absolute http(s) URL.
 */
export function detectProvider(apiUrl: string): ProviderKind | null {
    let url: URL;
    try {
        url = new URL(apiUrl);
    } catch {
        return null;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

    const host = url.hostname.toLowerCase();
    const pathname = url.pathname.replace(/\/+$/, '').toLowerCase();

    if (host === 'generativelanguage.googleapis.com' || pathname.includes(':generatecontent')) {
        return 'google';
    }
    if (host === 'anthropic.com' || host.endsWith('.anthropic.com') || pathname.endsWith('/messages')) {
        return 'anthropic';
    }
    if (host === 'api.openai.com' || pathname.endsWith('/chat/completions')) {
        return 'openai';
    }
    return 'custom';
}

export function defaultModelFor(kind: ProviderKind, apiUrl: string): string | undefined {
    if (kind === 'openai' && apiUrl.includes('openrouter.ai')) {
        return 'mistralai/mistral-7b-instruct';
    }
    return undefined;
}

export function getProviderAdapter(kind: ProviderKind): ProviderAdapter {
    return PROVIDERS[kind];
}
