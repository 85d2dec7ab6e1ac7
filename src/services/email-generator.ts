import { getSettings } from '../config';
import { GenerationRequest, GenerationResult, Settings } from '../types';
import { GenerationFailedError, errorMessage } from './errors';
import { LLMClient, LLMClientOptions } from './llm-client';
import { logger } from './logger';
import { DEFAULT_EMAIL_TYPE } from './provider-adapter';

const MAX_SUBJECT_LINE = 100;
const PROMPT_SUBJECT_WORDS = 7;
const PROMPT_SUBJECT_MAX = 50;
const SALUTATION = /^(dear|hi|hello|hey|greetings)\b/i;

/**
 * Subject label for an email type: "follow_up" -> "Follow up", general -> "Email".
 */
export function subjectFromEmailType(emailType?: string): string {
    const label = (emailType || '').replace(/[_-]+/g, ' ').trim();
    if (!label || label.toLowerCase() === DEFAULT_EMAIL_TYPE) return 'Email';
    return label.charAt(0).toUpperCase() + label.slice(1);
}

/**
 * Derive a subject from generated content, then from the prompt, then from the email type.
 */
export function deriveSubject(content: string, request: GenerationRequest): string {
    const firstLine = (content.trim().split(/\r?\n/)[0] || '').replace(/^[#*\s]+|[*\s]+$/g, '');
    if (firstLine && firstLine.length < MAX_SUBJECT_LINE && !SALUTATION.test(firstLine)) {
        return firstLine;
    }

    const words = request.prompt.trim().split(/\s+/).filter(Boolean).slice(0, PROMPT_SUBJECT_WORDS).join(' ');
    if (words) {
        return words.length > PROMPT_SUBJECT_MAX ? `${words.slice(0, PROMPT_SUBJECT_MAX - 3)}...` : words;
    }

    return subjectFromEmailType(request.emailType);
}

/**
 * Produces email content from a prompt. Never throws: when the API is not
 * configured or fails, the prompt itself comes back as fallback content.
 */
export class EmailGenerator {
    private llmClient: LLMClient | null;

    constructor(
        private readonly settings: Settings = getSettings(),
        options: LLMClientOptions = {},
    ) {
        this.llmClient = settings.api.key ? new LLMClient(settings, options) : null;
    }

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        if (!request.prompt || !request.prompt.trim()) {
            logger.warn('Empty prompt; skipping the generation API');
            return this.fallback(request, 0);
        }
        if (!this.llmClient) {
            logger.warn('EMAIL_API_KEY not configured, using the prompt as email content');
            return this.fallback(request, 0);
        }

        try {
            const completion = await this.llmClient.complete(request);
            logger.info(`Generated content via ${completion.provider} in ${completion.attempts} attempt(s)`);
            return {
                subject: completion.subject,
                content: completion.content,
                source: 'api',
                provider: completion.provider,
                attempts: completion.attempts,
            };
        } catch (error) {
            const attempts = error instanceof GenerationFailedError ? error.attempts : 0;
            logger.error(`Email generation failed, using the prompt as fallback: ${errorMessage(error)}`);
            return this.fallback(request, attempts);
        }
    }

    /**
     * Like generate, but the result always carries a subject.
     */
    async generateWithSubject(request: GenerationRequest): Promise<GenerationResult> {
        const result = await this.generate(request);

        if (result.source === 'fallback') {
            return { ...result, subject: subjectFromEmailType(request.emailType) };
        }

        const subject = result.subject || deriveSubject(result.content, request);
        logger.info(`Generated subject: ${subject}`);
        return { ...result, subject };
    }

    private fallback(request: GenerationRequest, attempts: number): GenerationResult {
        return {
            content: request.prompt,
            source: 'fallback',
            attempts,
        };
    }
}
