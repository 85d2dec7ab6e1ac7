import MailComposer from 'nodemailer/lib/mail-composer';
import { describe, it, expect } from 'vitest';
import { EmailSender, textToHtml, toOutboundEmail } from '../services/email-sender';
import { SmtpConnectionManager, classifySmtpError } from '../services/smtp-connection';
import { GenerationResult, OutboundEmail } from '../types';
import { fakeTransportFactory, makeSettings, smtpError } from './fakes';

function email(overrides: Partial<OutboundEmail> = {}): OutboundEmail {
    return {
        to: ['bob@example.com'],
        subject: 'Quarterly update',
        body: 'Numbers are up.',
        contentType: 'plain',
        cc: [],
        bcc: [],
        ...overrides,
    };
}

describe('EmailSender.send', () => {
    it('sends a plain-text message through a scoped connection', async () => {
        const { factory, transports, options } = fakeTransportFactory();
        const sender = new EmailSender(makeSettings(), factory);

        const result = await sender.send(
            email({ cc: ['carol@example.com'], bcc: ['dave@example.com'], replyTo: 'replies@example.com' }),
        );

        expect(result).toEqual({
            success: true,
            messageId: '<test-message@example.com>',
            accepted: ['bob@example.com', 'carol@example.com', 'dave@example.com'],
            rejected: [],
        });
        expect(transports).toHaveLength(1);
        expect(transports[0].closed).toBe(true);
        expect(transports[0].sent).toEqual([
            {
                from: 'sender@example.com',
                to: ['bob@example.com'],
                cc: ['carol@example.com'],
                bcc: ['dave@example.com'],
                replyTo: 'replies@example.com',
                subject: 'Quarterly update',
                text: 'Numbers are up.',
            },
        ]);
        expect(options[0]).toEqual({
            host: 'smtp.example.com',
            port: 587,
            secure: false,
            requireTLS: true,
            ignoreTLS: false,
            auth: { user: 'sender@example.com', pass: 'test-secret' },
            connectionTimeout: 30000,
            greetingTimeout: 30000,
            socketTimeout: 30000,
        });
    });

    it('sends html with a plain alternative only when one is supplied', async () => {
        const { factory, transports } = fakeTransportFactory();
        const sender = new EmailSender(makeSettings(), factory);

        await sender.send(email({ contentType: 'html', body: '<p>Hi</p>' }));
        await sender.send(email({ contentType: 'html', body: '<p>Hi</p>', textAlternative: 'Hi' }));

        expect(transports[0].sent[0]).toMatchObject({ html: '<p>Hi</p>' });
        expect(transports[0].sent[0].text).toBeUndefined();
        expect(transports[1].sent[0]).toMatchObject({ html: '<p>Hi</p>', text: 'Hi' });
    });

    it('reports bad credentials as an auth failure and still releases the connection', async () => {
        const { factory, transports } = fakeTransportFactory({
            sendError: smtpError('Invalid login: 535 5.7.8 Username and Password not accepted', {
                code: 'EAUTH',
                responseCode: 535,
                response: '535 5.7.8 Username and Password not accepted',
            }),
        });
        const sender = new EmailSender(makeSettings(), factory);

        const result = await sender.send(email());

        expect(result).toEqual({
            success: false,
            errorKind: 'auth',
            error: 'Invalid login: 535 5.7.8 Username and Password not accepted',
            responseCode: 535,
        });
        expect(transports[0].closed).toBe(true);
    });

    it('reports timeouts as connection failures', async () => {
        const { factory, transports } = fakeTransportFactory({
            sendError: smtpError('Connection timeout', { code: 'ETIMEDOUT' }),
        });

        const result = await new EmailSender(makeSettings(), factory).send(email());

        expect(result).toEqual({ success: false, errorKind: 'connection', error: 'Connection timeout' });
        expect(transports[0].closed).toBe(true);
    });

    it('keeps the server diagnostic for protocol failures', async () => {
        const { factory } = fakeTransportFactory({
            sendError: smtpError("Can't send mail - all recipients were rejected", {
                code: 'EENVELOPE',
                responseCode: 550,
                response: '550 5.1.1 User unknown',
            }),
        });

        const result = await new EmailSender(makeSettings(), factory).send(email());

        expect(result).toEqual({
            success: false,
            errorKind: 'protocol',
            error: "Can't send mail - all recipients were rejected: 550 5.1.1 User unknown",
            responseCode: 550,
        });
    });

    it('returns a config failure without opening a connection', async () => {
        const { factory, transports } = fakeTransportFactory();

        const result = await new EmailSender(makeSettings({ SMTP_HOST: '', SMTP_PORT: '0' }), factory).send(email());

        expect(result).toEqual({
            success: false,
            errorKind: 'config',
            error: 'Invalid SMTP configuration: SMTP host is required; SMTP port must be an integer between 1 and 65535',
        });
        expect(transports).toHaveLength(0);
    });

    it('rejects a message without recipients before connecting', async () => {
        const { factory, transports } = fakeTransportFactory();
        const sender = new EmailSender(makeSettings(), factory);

        expect(await sender.send(email({ to: [] }))).toEqual({
            success: false,
            errorKind: 'invalid_message',
            error: 'Message has no recipients',
        });
        expect(await sender.send(email({ to: ['bob.example.com'] }))).toEqual({
            success: false,
            errorKind: 'invalid_message',
            error: 'Malformed address(es): bob.example.com',
        });
        expect(transports).toHaveLength(0);
    });

    it('accepts a bcc-only message', async () => {
        const { factory, transports } = fakeTransportFactory();

        const result = await new EmailSender(makeSettings(), factory).send(email({ to: [], bcc: ['dave@example.com'] }));

        expect(result.success).toBe(true);
        expect(transports[0].sent[0].to).toBeUndefined();
        expect(transports[0].sent[0].bcc).toEqual(['dave@example.com']);
    });
});

describe('EmailSender.testConnection', () => {
    it('verifies and releases the connection', async () => {
        const { factory, transports } = fakeTransportFactory();

        const result = await new EmailSender(makeSettings(), factory).testConnection();

        expect(result).toEqual({ success: true });
        expect(transports[0].verifyCalls).toBe(1);
        expect(transports[0].sent).toHaveLength(0);
        expect(transports[0].closed).toBe(true);
    });

    it('classifies a failed login', async () => {
        const { factory, transports } = fakeTransportFactory({
            verifyError: smtpError('Invalid login: 535 Authentication failed', { code: 'EAUTH', responseCode: 535 }),
        });

        const result = await new EmailSender(makeSettings(), factory).testConnection();

        expect(result).toEqual({
            success: false,
            errorKind: 'auth',
            error: 'Invalid login: 535 Authentication failed',
            responseCode: 535,
        });
        expect(transports[0].closed).toBe(true);
    });
});

describe('SmtpConnectionManager', () => {
    it('wraps the socket in TLS from the start in SSL mode', () => {
        const settings = makeSettings({ SMTP_USE_TLS: 'false', SMTP_USE_SSL: 'true', SMTP_PORT: '465', SMTP_TIMEOUT: '10' });
        const manager = new SmtpConnectionManager(settings.smtp, fakeTransportFactory().factory);

        expect(manager.encryption).toBe('ssl');
        expect(manager.transportOptions()).toMatchObject({
            port: 465,
            secure: true,
            requireTLS: false,
            ignoreTLS: false,
            connectionTimeout: 10000,
            greetingTimeout: 10000,
            socketTimeout: 10000,
        });
    });

    it('skips STARTTLS when encryption is off', () => {
        const settings = makeSettings({ SMTP_USE_TLS: 'false', SMTP_USE_SSL: 'false' });
        const manager = new SmtpConnectionManager(settings.smtp, fakeTransportFactory().factory);

        expect(manager.encryption).toBe('none');
        expect(manager.transportOptions()).toMatchObject({ secure: false, requireTLS: false, ignoreTLS: true });
    });

    it('closes the transport when the work throws', async () => {
        const { factory, transports } = fakeTransportFactory();
        const manager = new SmtpConnectionManager(makeSettings().smtp, factory);

        await expect(
            manager.withConnection(async () => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');
        expect(transports[0].closed).toBe(true);
    });

    it('keeps the send result when closing the transport fails', async () => {
        const { factory, transports } = fakeTransportFactory({ closeError: new Error('socket already destroyed') });

        const result = await new EmailSender(makeSettings(), factory).send(email());

        expect(result).toEqual({
            success: true,
            messageId: '<test-message@example.com>',
            accepted: ['bob@example.com'],
            rejected: [],
        });
        expect(transports[0].closed).toBe(true);
    });

    it('keeps the work error when closing the transport fails', async () => {
        const { factory } = fakeTransportFactory({ closeError: new Error('socket already destroyed') });
        const manager = new SmtpConnectionManager(makeSettings().smtp, factory);

        await expect(
            manager.withConnection(async () => {
                throw new Error('boom');
            }),
        ).rejects.toThrow('boom');
    });
});

describe('classifySmtpError', () => {
    it('treats unrecognised errors as unknown', () => {
        expect(classifySmtpError(new Error('weird'))).toEqual({ success: false, errorKind: 'unknown', error: 'weird' });
        expect(classifySmtpError('plain string')).toEqual({ success: false, errorKind: 'unknown', error: 'plain string' });
    });

    it('treats refused connections as connection failures', () => {
        expect(classifySmtpError(smtpError('connect ECONNREFUSED 127.0.0.1:587', { code: 'ECONNECTION' })).errorKind).toBe(
            'connection',
        );
    });
});

describe('toOutboundEmail', () => {
    const generated: GenerationResult = {
        subject: 'Quarterly update',
        content: 'Numbers are up.\n\nMore next week.',
        source: 'api',
        provider: 'openai',
        attempts: 1,
    };

    it('carries subject and body through to the sent message unchanged', async () => {
        const { factory, transports } = fakeTransportFactory();
        const outbound = toOutboundEmail(generated, 'bob@example.com');

        expect(outbound).toEqual({
            to: ['bob@example.com'],
            subject: 'Quarterly update',
            body: 'Numbers are up.\n\nMore next week.',
            contentType: 'plain',
            cc: [],
            bcc: [],
        });

        await new EmailSender(makeSettings(), factory).send(outbound);
        expect(transports[0].sent[0].subject).toBe(generated.subject);
        expect(transports[0].sent[0].text).toBe(generated.content);
    });

    it('wraps content in html and keeps the text as alternative', () => {
        const outbound = toOutboundEmail(generated, ['bob@example.com'], { contentType: 'html', cc: [' carol@example.com '] });

        expect(outbound.body).toBe(textToHtml(generated.content));
        expect(outbound.body).toContain('<p>Numbers are up.</p>\n<p>More next week.</p>');
        expect(outbound.textAlternative).toBe(generated.content);
        expect(outbound.cc).toEqual(['carol@example.com']);
    });

    it('escapes markup in text converted to html', () => {
        expect(textToHtml('a < b & c')).toContain('<p>a &lt; b &amp; c</p>');
    });
});

describe('MIME output', () => {
    it('writes cc and reply-to headers and keeps bcc in the envelope only', async () => {
        const sender = new EmailSender(makeSettings(), fakeTransportFactory().factory);
        const message = sender.buildMessage(
            email({ cc: ['carol@example.com'], bcc: ['dave@example.com'], replyTo: 'replies@example.com' }),
        );

        const mime = new MailComposer(message).compile();
        const raw = await new Promise<string>((resolve, reject) => {
            mime.build((err, buf) => (err ? reject(err) : resolve(buf.toString('utf-8'))));
        });

        expect(raw).toMatch(/^Cc: carol@example\.com$/m);
        expect(raw).toMatch(/^Reply-To: replies@example\.com$/m);
        expect(raw).toMatch(/^Subject: Quarterly update$/m);
        expect(raw).toMatch(/^Content-Type: text\/plain/m);
        expect(raw).not.toMatch(/^Bcc:/im);
        expect(mime.getEnvelope().to).toEqual(['bob@example.com', 'carol@example.com', 'dave@example.com']);
    });
});
