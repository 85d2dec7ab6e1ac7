import * as nodemailer from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { EncryptionMode, SendErrorKind, SendFailure, SmtpSettings } from '../types';
import { errorMessage } from './errors';
import { logger } from './logger';

// Fields of nodemailer's SMTP send info that are read back
export interface SentMessage {
    messageId: string;
    accepted: Array<string | Mail.Address>;
    rejected: Array<string | Mail.Address>;
}

/**
 * The part of a nodemailer transporter this project uses.
 */
export interface MailTransport {
    verify(): Promise<boolean>;
    sendMail(mail: nodemailer.SendMailOptions): Promise<SentMessage>;
    close(): void;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

export const createSmtpTransport: TransportFactory = (options) => nodemailer.createTransport(options);

// TLS wins over SSL; loadSettings already clears useSsl when both are set
export function resolveEncryptionMode(smtp: Pick<SmtpSettings, 'useTls' | 'useSsl'>): EncryptionMode {
    if (smtp.useTls) return 'starttls';
    if (smtp.useSsl) return 'ssl';
    return 'none';
}

const AUTH_CODES = new Set(['EAUTH', 'ENOAUTH']);
const AUTH_RESPONSE_CODES = new Set([530, 534, 535]);
const CONNECTION_CODES = new Set([
    'ECONNECTION',
    'ETIMEDOUT',
    'ESOCKET',
    'EDNS',
    'ETLS',
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EHOSTUNREACH',
    'ENETUNREACH',
    'EAI_AGAIN',
    'EPIPE',
]);
const PROTOCOL_CODES = new Set(['EENVELOPE', 'EMESSAGE', 'EPROTOCOL']);

interface SmtpErrorFields {
    code?: string;
    responseCode?: number;
    response?: string;
}

function readSmtpErrorFields(error: unknown): SmtpErrorFields {
    const fields: SmtpErrorFields = {};
    if (typeof error !== 'object' || error === null) return fields;

    if ('code' in error && typeof error.code === 'string') fields.code = error.code;
    if ('responseCode' in error && typeof error.responseCode === 'number') fields.responseCode = error.responseCode;
    if ('response' in error && typeof error.response === 'string') fields.response = error.response;
    return fields;
}

/**
 * Map a nodemailer (or socket) error to a failure result. The server's
 * response text is kept in the message.
 */
export function classifySmtpError(error: unknown): SendFailure {
    const { code, responseCode, response } = readSmtpErrorFields(error);

    let errorKind: SendErrorKind;
    if ((code && AUTH_CODES.has(code)) || (responseCode !== undefined && AUTH_RESPONSE_CODES.has(responseCode))) {
        errorKind = 'auth';
    } else if (code && CONNECTION_CODES.has(code)) {
        errorKind = 'connection';
    } else if ((code && PROTOCOL_CODES.has(code)) || responseCode !== undefined) {
        errorKind = 'protocol';
    } else {
        errorKind = 'unknown';
    }

    const base = errorMessage(error);
    const failure: SendFailure = {
        success: false,
        errorKind,
        error: response && !base.includes(response) ? `${base}: ${response}` : base,
    };
    if (responseCode !== undefined) {
        failure.responseCode = responseCode;
    }
    return failure;
}

export function remediationHint(kind: SendErrorKind): string | undefined {
    switch (kind) {
        case 'auth':
            return 'check SMTP_USERNAME / SMTP_PASSWORD (Gmail and Outlook need an app password)';
        case 'connection':
            return 'check SMTP_HOST / SMTP_PORT, the encryption flags and any firewall in between';
        case 'config':
            return 'run the validate command for details';
        default:
            return undefined;
    }
}

/**
 * Opens one SMTP transport per unit of work and always closes it.
 */
export class SmtpConnectionManager {
    constructor(
        private readonly smtp: SmtpSettings,
        private readonly createTransport: TransportFactory = createSmtpTransport,
    ) {}

    get encryption(): EncryptionMode {
        return resolveEncryptionMode(this.smtp);
    }

    transportOptions(): SMTPTransport.Options {
        const encryption = this.encryption;
        const timeoutMs = this.smtp.timeoutSeconds * 1000;

        return {
            host: this.smtp.host,
            port: this.smtp.port,
            secure: encryption === 'ssl',
            requireTLS: encryption === 'starttls',
            ignoreTLS: encryption === 'none',
            auth: {
                user: this.smtp.username,
                pass: this.smtp.password,
            },
            connectionTimeout: timeoutMs,
            greetingTimeout: timeoutMs,
            socketTimeout: timeoutMs,
        };
    }

    /**
     * Run `work` against a freshly opened transport. The transport is closed
     * whether `work` resolves or throws.
     */
    async withConnection<T>(work: (transport: MailTransport) => Promise<T>): Promise<T> {
        const transport = this.createTransport(this.transportOptions());
        logger.debug(`Opened SMTP transport to ${this.smtp.host}:${this.smtp.port} (${this.encryption})`);

        try {
            return await work(transport);
        } finally {
            // A failing close must not replace the result of the work
            try {
                transport.close();
                logger.debug(`Closed SMTP transport to ${this.smtp.host}:${this.smtp.port}`);
            } catch (error) {
                logger.warn(`Closing SMTP transport to ${this.smtp.host}:${this.smtp.port} failed: ${errorMessage(error)}`);
            }
        }
    }

    /**
     * Connect and authenticate without sending anything.
     */
    async verify(): Promise<void> {
        await this.withConnection((transport) => transport.verify());
    }
}
