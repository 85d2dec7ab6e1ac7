import { maskApiKey } from '../config';
import { createDraft, getDraft, markDraftFailed, markDraftSent } from '../db/database';
import { ApiStatus, ComposeJob, ContentType, Draft, SendResult, Settings } from '../types';
import { validateApiSettings } from './config-validator';
import { EmailGenerator } from './email-generator';
import { EmailSender, toOutboundEmail } from './email-sender';
import { logger } from './logger';
import { DEFAULT_EMAIL_TYPE, DEFAULT_TONE, detectProvider } from './provider-adapter';

export interface SendDraftOptions {
    cc?: string[];
    bcc?: string[];
    replyTo?: string;
    contentType?: ContentType;
}

export type SendDraftOutcome =
    | { found: false; draftId: number }
    | { found: true; draft: Draft; result: SendResult };

const FALLBACK_SUBJECT_LENGTH = 50;

/**
 * Subject stored with the draft, or the first content line cut to 50 characters.
 */
export function subjectForDraft(draft: Pick<Draft, 'subject' | 'content'>): string {
    if (draft.subject) return draft.subject;
    const firstLine = draft.content.trim().split(/\r?\n/)[0] || '';
    return firstLine.slice(0, FALLBACK_SUBJECT_LENGTH).trim() || 'Email';
}

/**
 * Ties generation, storage and delivery together for the CLI.
 */
export class EmailService {
    constructor(
        private readonly settings: Settings,
        private readonly generator: EmailGenerator,
        private readonly sender: EmailSender,
    ) {}

    getApiStatus(): ApiStatus {
        const { key, url } = this.settings.api;
        return {
            configured: Boolean(key && url),
            provider: detectProvider(url),
            url,
            maskedKey: maskApiKey(key),
            validation: validateApiSettings(this.settings.api),
        };
    }

    /**
     * Generate subject and content for a job and store the result as a draft.
     */
    async composeDraft(job: ComposeJob): Promise<Draft> {
        const tone = job.tone?.trim() || DEFAULT_TONE;
        const emailType = job.emailType?.trim() || DEFAULT_EMAIL_TYPE;

        const result = await this.generator.generateWithSubject({
            prompt: job.prompt,
            tone,
            emailType,
            maxLength: job.maxLength,
        });

        const draft = createDraft({
            prompt: job.prompt,
            content: result.content,
            subject: result.subject,
            recipient: job.recipient,
            tone,
            emailType,
            source: result.source,
        });
        logger.info(`Stored draft #${draft.id} for ${draft.recipient} (${draft.source})`);
        return draft;
    }

    async sendDraft(id: number, options: SendDraftOptions = {}): Promise<SendDraftOutcome> {
        const draft = getDraft(id);
        if (!draft) {
            logger.warn(`Draft #${id} not found`);
            return { found: false, draftId: id };
        }

        const email = toOutboundEmail(
            { subject: subjectForDraft(draft), content: draft.content, source: draft.source, attempts: 0 },
            draft.recipient,
            options,
        );
        const result = await this.sender.send(email);

        if (result.success) {
            markDraftSent(id);
        } else {
            markDraftFailed(id, `[${result.errorKind}] ${result.error}`);
        }

        const updated = getDraft(id) ?? draft;
        return { found: true, draft: updated, result };
    }

    async composeAndSend(job: ComposeJob, options: SendDraftOptions = {}): Promise<{ draft: Draft; result: SendResult }> {
        const composed = await this.composeDraft(job);
        const outcome = await this.sendDraft(composed.id, options);
        if (!outcome.found) {
            throw new Error(`Draft #${composed.id} vanished before it could be sent`);
        }
        return { draft: outcome.draft, result: outcome.result };
    }
}
