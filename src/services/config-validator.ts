import { ApiSettings, Settings, SmtpSettings, ValidationReport } from '../types';
import { detectProvider } from './provider-adapter';

const STANDARD_PORTS = [25, 465, 587];
const SSL_PORT = 465;
const GMAIL_HOSTS = ['smtp.gmail.com', 'smtp.googlemail.com'];
// Google app passwords are 16 letters, often shown in groups of four
const APP_PASSWORD = /^[a-z]{16}$/i;

function report(errors: string[], warnings: string[]): ValidationReport {
    return { valid: errors.length === 0, errors, warnings };
}

/**
 * Check SMTP settings without touching the network.
 */
export function validateSmtpSettings(smtp: SmtpSettings): ValidationReport {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!smtp.host.trim()) errors.push('SMTP host is required');
    if (!Number.isInteger(smtp.port) || smtp.port < 1 || smtp.port > 65535) {
        errors.push('SMTP port must be an integer between 1 and 65535');
    } else if (!STANDARD_PORTS.includes(smtp.port)) {
        warnings.push(`SMTP port ${smtp.port} is not a standard submission port (25, 465 or 587)`);
    }
    if (!smtp.username.trim()) errors.push('SMTP username is required');
    if (!smtp.password) errors.push('SMTP password is required');
    if (!smtp.from.trim()) {
        errors.push('Email from address is required');
    } else if (!smtp.from.includes('@')) {
        errors.push('Email from address must contain "@"');
    }
    if (!Number.isFinite(smtp.timeoutSeconds) || smtp.timeoutSeconds <= 0) {
        errors.push('SMTP timeout must be a positive number of seconds');
    }

    if (smtp.encryptionConflict) {
        warnings.push('SMTP_USE_TLS and SMTP_USE_SSL are both enabled; using STARTTLS only');
    } else if (!smtp.useTls && !smtp.useSsl) {
        warnings.push('SMTP encryption is disabled; credentials and mail will travel in plaintext');
    }
    if (smtp.useSsl && smtp.port !== SSL_PORT) {
        warnings.push(`SMTP_USE_SSL is enabled on port ${smtp.port}; implicit TLS normally runs on port ${SSL_PORT}`);
    }
    if (smtp.useTls && smtp.port === SSL_PORT) {
        warnings.push(`STARTTLS is enabled on port ${SSL_PORT}, which normally expects SMTP_USE_SSL`);
    }

    const host = smtp.host.trim().toLowerCase();
    if (GMAIL_HOSTS.includes(host) && smtp.password && !APP_PASSWORD.test(smtp.password.replace(/\s+/g, ''))) {
        warnings.push(
            'Gmail requires a 16-character app password; signing in with the account password ("less secure apps") is not supported',
        );
    }

    return report(errors, warnings);
}

/**
 * Check generation API settings. A missing key is only a warning: generation
 * then falls back to the prompt.
 */
export function validateApiSettings(api: ApiSettings): ValidationReport {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!api.key) {
        warnings.push('EMAIL_API_KEY is not set; the prompt will be used as email content');
    }
    if (!api.url) {
        errors.push('Email API URL is required');
    } else if (!detectProvider(api.url)) {
        errors.push(`Email API URL is not a valid http(s) URL: ${api.url}`);
    }

    return report(errors, warnings);
}

export function validateSettings(settings: Settings): ValidationReport {
    const smtp = validateSmtpSettings(settings.smtp);
    const api = validateApiSettings(settings.api);
    return report([...smtp.errors, ...api.errors], [...smtp.warnings, ...api.warnings]);
}
