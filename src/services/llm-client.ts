import { loadPromptTemplate } from '../config';
import { GenerationRequest, ProviderKind, Settings } from '../types';
import { FailureKind, GenerationFailedError, ProviderError, ResponseParseError, TransportError, classifyHttpStatus, errorMessage } from './errors';
import { FetchJsonTransport, JsonTransport } from './http-client';
import { logger } from './logger';
import { ParsedContent, ProviderAdapter, defaultModelFor, detectProvider, getProviderAdapter, renderPrompt } from './provider-adapter';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface LLMClientOptions {
    transport?: JsonTransport;
    sleep?: Sleep;
    promptTemplate?: string;
    promptPath?: string;
}

export interface Completion extends ParsedContent {
    provider: ProviderKind;
    attempts: number;
}

/**
 * Delay before retry number `attempt` (1-based): base, 2x base, 4x base, ...
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * 2 ** (attempt - 1);
}

function failureKind(error: unknown): FailureKind {
    if (error instanceof ProviderError) return error.kind;
    if (error instanceof TransportError) return 'transient';
    return 'permanent';
}

const MAX_LOGGED_BODY = 300;

// Used when the template file cannot be read
export const BUILTIN_PROMPT_TEMPLATE = [
    'Write a {{tone}} {{emailType}} email about: {{prompt}}',
    '',
    'Start your reply with a single line of the form "Subject: <subject line>", then a blank line, then the email body. ' +
        'Do not add any commentary before or after the email.',
].join('\n');

function readPromptTemplate(promptPath?: string): string {
    try {
        return loadPromptTemplate(promptPath);
    } catch (error) {
        logger.warn(`${errorMessage(error)}; using the built-in prompt template`);
        return BUILTIN_PROMPT_TEMPLATE;
    }
}

export class LLMClient {
    private transport: JsonTransport;
    private sleep: Sleep;
    private promptTemplate: string;

    constructor(
        private readonly settings: Settings,
        options: LLMClientOptions = {},
    ) {
        this.transport = options.transport || new FetchJsonTransport();
        this.sleep = options.sleep || defaultSleep;
        this.promptTemplate = options.promptTemplate ?? readPromptTemplate(options.promptPath);
    }

    /**
     * Call the configured provider, retrying transient failures with
     * exponential backoff. Throws GenerationFailedError when no content
     * could be obtained.
     */
    async complete(request: GenerationRequest): Promise<Completion> {
        const { key, url, timeoutMs, maxAttempts, retryBaseDelayMs } = this.settings.api;

        const provider = detectProvider(url);
        if (!provider) {
            throw new GenerationFailedError(`EMAIL_API_URL is not a valid http(s) URL: ${url}`, 0);
        }

        const adapter = getProviderAdapter(provider);
        const payload = adapter.buildRequest({
            request,
            renderedPrompt: renderPrompt(this.promptTemplate, request),
            model: this.settings.api.model ?? defaultModelFor(provider, url),
        });
        const headers = adapter.buildHeaders(key);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.info(`Calling ${provider} provider (attempt ${attempt}/${maxAttempts})`);
                const parsed = await this.attempt(adapter, url, payload, headers, timeoutMs);
                return { ...parsed, provider, attempts: attempt };
            } catch (error) {
                if (failureKind(error) === 'permanent') {
                    throw new GenerationFailedError(`Permanent provider failure: ${errorMessage(error)}`, attempt, {
                        cause: error,
                    });
                }
                if (attempt === maxAttempts) {
                    throw new GenerationFailedError(
                        `Provider still failing after ${maxAttempts} attempts: ${errorMessage(error)}`,
                        attempt,
                        { cause: error },
                    );
                }

                const delay = backoffDelay(retryBaseDelayMs, attempt);
                logger.warn(`Transient provider failure (${errorMessage(error)}); retrying in ${delay}ms`);
                await this.sleep(delay);
            }
        }

        // maxAttempts is always >= 1, so the loop returns or throws
        throw new GenerationFailedError('No attempts were made', 0);
    }

    private async attempt(
        adapter: ProviderAdapter,
        url: string,
        payload: unknown,
        headers: Record<string, string>,
        timeoutMs: number,
    ): Promise<ParsedContent> {
        const response = await this.transport.postJson(url, payload, headers, timeoutMs);
        logger.debug(`API response status: ${response.status}`);

        if (response.status < 200 || response.status >= 300) {
            const detail = response.rawText.slice(0, MAX_LOGGED_BODY);
            throw new ProviderError(`HTTP ${response.status}: ${detail}`, classifyHttpStatus(response.status), response.status);
        }
        if (response.body === undefined) {
            throw new ResponseParseError('Response body is not JSON', response.status);
        }

        return adapter.parseResponse(response.body);
    }
}
