import type * as nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import { getSettings } from '../config';
import { ConnectionTestResult, ContentType, GenerationResult, OutboundEmail, SendFailure, SendResult, Settings } from '../types';
import { validateSmtpSettings } from './config-validator';
import { subjectFromEmailType } from './email-generator';
import { logger } from './logger';
import { SmtpConnectionManager, TransportFactory, classifySmtpError, createSmtpTransport, remediationHint } from './smtp-connection';

export interface OutboundOptions {
    cc?: string[];
    bcc?: string[];
    replyTo?: string;
    contentType?: ContentType;
}

function cleanList(addresses: string[] | undefined): string[] {
    return (addresses || []).map((address) => address.trim()).filter(Boolean);
}

/**
 * Turn a generation result into a message. Subject and body are carried over
 * unchanged; html output wraps the text and keeps it as the plain alternative.
 */
export function toOutboundEmail(result: GenerationResult, to: string | string[], options: OutboundOptions = {}): OutboundEmail {
    const contentType = options.contentType || 'plain';
    const email: OutboundEmail = {
        to: cleanList(Array.isArray(to) ? to : [to]),
        subject: result.subject ?? subjectFromEmailType(),
        body: contentType === 'html' ? textToHtml(result.content) : result.content,
        contentType,
        cc: cleanList(options.cc),
        bcc: cleanList(options.bcc),
    };
    if (contentType === 'html') {
        email.textAlternative = result.content;
    }
    if (options.replyTo) {
        email.replyTo = options.replyTo.trim();
    }
    return email;
}

/**
 * Convert plain text to simple HTML
 */
export function textToHtml(text: string): string {
    const escaped = text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;');

    const htmlBody = escaped
        .split('\n\n')
        .map((para) => `<p>${para.replace(/\n/g, '<br>')}</p>`)
        .join('\n');

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px; }
    p { margin: 0 0 1em 0; }
  </style>
</head>
<body>
${htmlBody}
</body>
</html>`;
}

function checkMessage(email: OutboundEmail): string | null {
    const recipients = [...email.to, ...email.cc, ...email.bcc];
    if (recipients.length === 0) {
        return 'Message has no recipients';
    }
    const malformed = [...recipients, ...(email.replyTo ? [email.replyTo] : [])].filter((address) => !address.includes('@'));
    if (malformed.length > 0) {
        return `Malformed address(es): ${malformed.join(', ')}`;
    }
    if (!email.body) {
        return 'Message body is empty';
    }
    return null;
}

function addressList(list: Array<string | Mail.Address>): string[] {
    return list.map((entry) => (typeof entry === 'string' ? entry : entry.address));
}

export class EmailSender {
    private connections: SmtpConnectionManager;

    constructor(
        private readonly settings: Settings = getSettings(),
        createTransport: TransportFactory = createSmtpTransport,
    ) {
        this.connections = new SmtpConnectionManager(settings.smtp, createTransport);
    }

    /**
     * Send a message. Never throws; every failure comes back classified.
     */
    async send(email: OutboundEmail): Promise<SendResult> {
        const config = this.checkConfig();
        if (config) return config;

        const problem = checkMessage(email);
        if (problem) {
            logger.error(`✗ Not sending: ${problem}`);
            return { success: false, errorKind: 'invalid_message', error: problem };
        }

        const message = this.buildMessage(email);
        const recipients = [...email.to, ...email.cc].join(', ') || '(bcc only)';

        try {
            const info = await this.connections.withConnection((transport) => transport.sendMail(message));
            logger.info(`✓ Email sent to ${recipients} (message id ${info.messageId})`);
            return {
                success: true,
                messageId: info.messageId,
                accepted: addressList(info.accepted),
                rejected: addressList(info.rejected),
            };
        } catch (error) {
            const failure = classifySmtpError(error);
            const hint = remediationHint(failure.errorKind);
            logger.error(`✗ Failed to send to ${recipients} [${failure.errorKind}]: ${failure.error}${hint ? ` (${hint})` : ''}`);
            return failure;
        }
    }

    /**
     * Test SMTP connection: connect and authenticate, send nothing.
     */
    async testConnection(): Promise<ConnectionTestResult> {
        const config = this.checkConfig();
        if (config) return config;

        try {
            await this.connections.verify();
            logger.info(`✓ Connected to ${this.settings.smtp.host}:${this.settings.smtp.port} (${this.connections.encryption})`);
            return { success: true };
        } catch (error) {
            const failure = classifySmtpError(error);
            const hint = remediationHint(failure.errorKind);
            logger.error(`✗ SMTP connection test failed [${failure.errorKind}]: ${failure.error}${hint ? ` (${hint})` : ''}`);
            return failure;
        }
    }

    buildMessage(email: OutboundEmail): nodemailer.SendMailOptions {
        const message: nodemailer.SendMailOptions = {
            from: this.settings.smtp.from,
            subject: email.subject,
        };

        if (email.to.length > 0) message.to = email.to;
        if (email.cc.length > 0) message.cc = email.cc;
        // nodemailer keeps bcc in the envelope and never writes the header
        if (email.bcc.length > 0) message.bcc = email.bcc;
        if (email.replyTo) message.replyTo = email.replyTo;

        if (email.contentType === 'html') {
            message.html = email.body;
            if (email.textAlternative) {
                message.text = email.textAlternative;
            }
        } else {
            message.text = email.body;
        }

        return message;
    }

    private checkConfig(): SendFailure | null {
        const report = validateSmtpSettings(this.settings.smtp);
        if (report.valid) return null;

        const error = `Invalid SMTP configuration: ${report.errors.join('; ')}`;
        logger.error(error);
        return { success: false, errorKind: 'config', error };
    }
}
