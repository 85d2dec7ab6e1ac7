#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import * as path from 'path';
import { getSettings } from './config';
import { closeDatabase, deleteDraft, initDatabase, listDrafts, updateDraftContent } from './db/database';
import { validateSettings, validateSmtpSettings } from './services/config-validator';
import { parseComposeCsv } from './services/csv-parser';
import { EmailGenerator } from './services/email-generator';
import { EmailSender } from './services/email-sender';
import { EmailService, SendDraftOptions } from './services/email-service';
import { defaultSleep } from './services/llm-client';
import { logger } from './services/logger';
import { ReportGenerator } from './services/report-generator';
import { resolveEncryptionMode } from './services/smtp-connection';
import { ComposeJob, Draft, SendResult } from './types';

const program = new Command();

program
    .name('mail-composer')
    .description('Draft emails with a text-generation API and deliver them over SMTP')
    .version('1.0.0');

const LOG_DIR = path.join(process.cwd(), 'logs');

interface ComposeOptions {
    prompt: string;
    recipient: string;
    tone?: string;
    type?: string;
    maxLength?: number;
}

interface DeliveryOptions {
    cc: string[];
    bcc: string[];
    replyTo?: string;
    html?: boolean;
}

function collectAddresses(value: string, previous: string[]): string[] {
    return previous.concat(value.split(',').map((address) => address.trim()).filter(Boolean));
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function toJob(options: ComposeOptions): ComposeJob {
    return {
        recipient: options.recipient,
        prompt: options.prompt,
        tone: options.tone,
        emailType: options.type,
        maxLength: options.maxLength,
    };
}

function toSendOptions(options: DeliveryOptions): SendDraftOptions {
    return {
        cc: options.cc,
        bcc: options.bcc,
        replyTo: options.replyTo,
        contentType: options.html ? 'html' : 'plain',
    };
}

function createService(): EmailService {
    const settings = getSettings();
    return new EmailService(settings, new EmailGenerator(settings), new EmailSender(settings));
}

function logDraft(draft: Draft): void {
    logger.info(`--- Draft #${draft.id} (${draft.status}, ${draft.source}) ---`);
    logger.info(`To: ${draft.recipient}`);
    logger.info(`Subject: ${draft.subject ?? '(none)'}`);
    logger.info(`Body:\n${draft.content}`);
    logger.info('--- End Draft ---');
}

function reportSend(result: SendResult): void {
    if (result.success) {
        logger.info(`Sent (accepted: ${result.accepted.join(', ') || 'none'})`);
    } else {
        logger.error(`Send failed [${result.errorKind}]: ${result.error}`);
        process.exitCode = 1;
    }
}

/**
 * Run a command body with file logging and, when asked, the draft database.
 */
async function run(task: () => Promise<void> | void, options: { database?: boolean } = {}): Promise<void> {
    try {
        logger.init(LOG_DIR);
        if (options.database) {
            initDatabase();
        }
        await task();
    } catch (error) {
        logger.error('Fatal execution error:', error);
        process.exitCode = 1;
    } finally {
        closeDatabase();
        logger.close();
    }
}

program
    .command('status')
    .description('Show generation API and SMTP configuration status')
    .action(() =>
        run(() => {
            const settings = getSettings();
            const status = createService().getApiStatus();

            logger.info(`Email API: ${status.configured ? 'configured' : 'not configured'}`);
            logger.info(`  URL: ${status.url}`);
            logger.info(`  Provider: ${status.provider ?? 'unknown'}`);
            logger.info(`  Key: ${status.maskedKey}`);

            const smtp = validateSmtpSettings(settings.smtp);
            logger.info(`SMTP: ${smtp.valid ? 'configured' : 'not configured'}`);
            logger.info(`  Host: ${settings.smtp.host || '(unset)'}:${settings.smtp.port}`);
            logger.info(`  Encryption: ${resolveEncryptionMode(settings.smtp)}`);
            logger.info(`  Timeout: ${settings.smtp.timeoutSeconds}s`);
        }),
    );

program
    .command('validate')
    .description('Validate configuration without connecting anywhere')
    .action(() =>
        run(() => {
            const report = validateSettings(getSettings());
            for (const error of report.errors) logger.error(`✗ ${error}`);
            for (const warning of report.warnings) logger.warn(`! ${warning}`);

            if (report.valid) {
                logger.info(`Configuration is valid (${report.warnings.length} warning(s))`);
            } else {
                logger.error(`Configuration is invalid (${report.errors.length} error(s))`);
                process.exitCode = 1;
            }
        }),
    );

program
    .command('test-smtp')
    .description('Connect and authenticate to the SMTP server without sending')
    .action(() =>
        run(async () => {
            logger.info('Starting SMTP connection test...');
            const result = await new EmailSender(getSettings()).testConnection();
            if (!result.success) {
                process.exitCode = 1;
            }
            logger.info('SMTP test complete.');
        }),
    );

program
    .command('generate')
    .description('Generate an email and store it as a draft')
    .requiredOption('-p, --prompt <text>', 'What the email should say')
    .requiredOption('-r, --recipient <address>', 'Recipient address')
    .option('-t, --tone <tone>', 'Tone of the email', 'professional')
    .option('--type <type>', 'Email type hint, e.g. general or meeting', 'general')
    .option('--max-length <n>', 'Upper bound on generated tokens', parsePositiveInt)
    .action((options: ComposeOptions) =>
        run(
            async () => {
                const draft = await createService().composeDraft(toJob(options));
                logDraft(draft);
            },
            { database: true },
        ),
    );

program
    .command('send')
    .description('Send a stored draft')
    .argument('<draftId>', 'Draft id', parsePositiveInt)
    .option('--cc <addresses>', 'CC addresses (comma separated, repeatable)', collectAddresses, [])
    .option('--bcc <addresses>', 'BCC addresses (comma separated, repeatable)', collectAddresses, [])
    .option('--reply-to <address>', 'Reply-To address')
    .option('--html', 'Send as HTML with a plain-text alternative')
    .action((draftId: number, options: DeliveryOptions) =>
        run(
            async () => {
                const outcome = await createService().sendDraft(draftId, toSendOptions(options));
                if (!outcome.found) {
                    logger.error(`Draft #${draftId} not found`);
                    process.exitCode = 1;
                    return;
                }
                reportSend(outcome.result);
            },
            { database: true },
        ),
    );

program
    .command('compose')
    .description('Generate an email and send it right away')
    .requiredOption('-p, --prompt <text>', 'What the email should say')
    .requiredOption('-r, --recipient <address>', 'Recipient address')
    .option('-t, --tone <tone>', 'Tone of the email', 'professional')
    .option('--type <type>', 'Email type hint', 'general')
    .option('--max-length <n>', 'Upper bound on generated tokens', parsePositiveInt)
    .option('--cc <addresses>', 'CC addresses (comma separated, repeatable)', collectAddresses, [])
    .option('--bcc <addresses>', 'BCC addresses (comma separated, repeatable)', collectAddresses, [])
    .option('--reply-to <address>', 'Reply-To address')
    .option('--html', 'Send as HTML with a plain-text alternative')
    .option('--dry-run', 'Generate and store the draft without sending')
    .action((options: ComposeOptions & DeliveryOptions & { dryRun?: boolean }) =>
        run(
            async () => {
                const service = createService();
                if (options.dryRun) {
                    logDraft(await service.composeDraft(toJob(options)));
                    return;
                }
                const { draft, result } = await service.composeAndSend(toJob(options), toSendOptions(options));
                logDraft(draft);
                reportSend(result);
            },
            { database: true },
        ),
    );

program
    .command('batch')
    .description('Generate drafts for every row of a CSV (recipient,prompt[,tone][,type])')
    .requiredOption('-c, --csv <path>', 'Path to the CSV file')
    .option('--send', 'Send each draft after generating it')
    .option('--delay <ms>', 'Delay between emails in ms', parsePositiveInt, 2000)
    .action((options: { csv: string; send?: boolean; delay: number }) =>
        run(
            async () => {
                const jobs = parseComposeCsv(options.csv);
                logger.info(`Loaded ${jobs.length} jobs from CSV`);

                const service = createService();
                let failures = 0;

                for (let i = 0; i < jobs.length; i++) {
                    const job = jobs[i];
                    logger.info(`[${i + 1}/${jobs.length}] Processing ${job.recipient}`);

                    if (options.send) {
                        const { result } = await service.composeAndSend(job);
                        if (!result.success) failures++;
                    } else {
                        await service.composeDraft(job);
                    }

                    // Delay between emails (except for last one)
                    if (options.send && i < jobs.length - 1) {
                        logger.info(`Waiting ${options.delay}ms before next email...`);
                        await defaultSleep(options.delay);
                    }
                }

                logger.info(`Batch complete: ${jobs.length} processed, ${failures} failed to send`);
                if (failures > 0) process.exitCode = 1;
            },
            { database: true },
        ),
    );

program
    .command('drafts')
    .description('List stored drafts, newest first')
    .option('-l, --limit <n>', 'Number of drafts to show', parsePositiveInt, 20)
    .action((options: { limit: number }) =>
        run(
            () => {
                const drafts = listDrafts(options.limit);
                if (drafts.length === 0) {
                    logger.info('No drafts stored.');
                }
                for (const draft of drafts) {
                    logger.info(
                        `#${draft.id} [${draft.status}] ${draft.recipient} | ${draft.subject ?? '(no subject)'} | ${draft.createdAt.toISOString()}`,
                    );
                }
            },
            { database: true },
        ),
    );

program
    .command('edit')
    .description('Replace the content (and optionally the subject) of a draft')
    .argument('<draftId>', 'Draft id', parsePositiveInt)
    .requiredOption('--content <text>', 'New email body')
    .option('--subject <text>', 'New subject line')
    .action((draftId: number, options: { content: string; subject?: string }) =>
        run(
            () => {
                if (updateDraftContent(draftId, options.content, options.subject)) {
                    logger.info(`Draft #${draftId} updated`);
                } else {
                    logger.error(`Draft #${draftId} not found`);
                    process.exitCode = 1;
                }
            },
            { database: true },
        ),
    );

program
    .command('delete')
    .description('Delete a draft')
    .argument('<draftId>', 'Draft id', parsePositiveInt)
    .action((draftId: number) =>
        run(
            () => {
                if (deleteDraft(draftId)) {
                    logger.info(`Draft #${draftId} deleted`);
                } else {
                    logger.error(`Draft #${draftId} not found`);
                    process.exitCode = 1;
                }
            },
            { database: true },
        ),
    );

program
    .command('stats')
    .description('Display draft statistics')
    .option('--save', 'Save report to file')
    .action((options: { save?: boolean }) =>
        run(
            () => {
                const reportGenerator = new ReportGenerator();
                const report = reportGenerator.generateReport();
                reportGenerator.displayReport(report);

                if (options.save) {
                    logger.info(`Report saved to ${reportGenerator.saveReport(report)}`);
                }
            },
            { database: true },
        ),
    );

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error('Error:', error);
    process.exitCode = 1;
});
