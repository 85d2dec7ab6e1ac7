// Provider families the generation layer knows how to talk to
export type ProviderKind = 'openai' | 'anthropic' | 'google' | 'custom';

// Generation API settings
export interface ApiSettings {
    readonly key: string;
    readonly url: string;
    readonly model?: string;
    readonly timeoutMs: number;
    readonly maxAttempts: number;
    readonly retryBaseDelayMs: number;
}

// SMTP settings. useTls and useSsl are never both true.
export interface SmtpSettings {
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password: string;
    readonly from: string;
    readonly useTls: boolean;
    readonly useSsl: boolean;
    // Both TLS and SSL were requested; SSL was dropped
    readonly encryptionConflict: boolean;
    readonly timeoutSeconds: number;
}

// Process-wide configuration snapshot
export interface Settings {
    readonly api: ApiSettings;
    readonly smtp: SmtpSettings;
    readonly databasePath: string;
}

export type EncryptionMode = 'ssl' | 'starttls' | 'none';

// Input to the content generator
export interface GenerationRequest {
    prompt: string;
    tone?: string;
    emailType?: string;
    maxLength?: number;
}

export type GenerationSource = 'api' | 'fallback';

// Output of the content generator. content is always set.
export interface GenerationResult {
    subject?: string;
    content: string;
    source: GenerationSource;
    provider?: ProviderKind;
    attempts: number;
}

export type ContentType = 'plain' | 'html';

// Message handed to the email sender
export interface OutboundEmail {
    to: string[];
    subject: string;
    body: string;
    contentType: ContentType;
    cc: string[];
    bcc: string[];
    replyTo?: string;
    // Plain-text part sent next to an html body
    textAlternative?: string;
}

export type SendErrorKind = 'config' | 'invalid_message' | 'auth' | 'connection' | 'protocol' | 'unknown';

export interface SendSuccess {
    success: true;
    messageId: string;
    accepted: string[];
    rejected: string[];
}

export interface SendFailure {
    success: false;
    errorKind: SendErrorKind;
    error: string;
    responseCode?: number;
}

export type SendResult = SendSuccess | SendFailure;

export interface ValidationReport {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// Result of a connect + authenticate cycle
export type ConnectionTestResult = { success: true } | SendFailure;

// One row of a batch CSV, or a single compose request from the CLI
export interface ComposeJob {
    recipient: string;
    prompt: string;
    tone?: string;
    emailType?: string;
    maxLength?: number;
}

export type DraftStatus = 'draft' | 'sent' | 'failed';

// Stored draft
export interface Draft {
    id: number;
    prompt: string;
    content: string;
    subject: string | null;
    recipient: string;
    tone: string;
    emailType: string;
    source: GenerationSource;
    status: DraftStatus;
    error: string | null;
    createdAt: Date;
    sentAt: Date | null;
}

export interface NewDraft {
    prompt: string;
    content: string;
    subject?: string;
    recipient: string;
    tone: string;
    emailType: string;
    source: GenerationSource;
}

// Aggregated draft statistics
export interface DraftStats {
    totalDrafts: number;
    totalSent: number;
    totalFailed: number;
    totalEmails: number;
    successRate: number;
    recentActivity: number;
    popularTones: { tone: string; count: number }[];
    monthlyStats: { month: string; sent: number; drafts: number }[];
    generatedAt: Date;
}

// API configuration status reported by the service layer
export interface ApiStatus {
    configured: boolean;
    provider: ProviderKind | null;
    url: string;
    maskedKey: string;
    validation: ValidationReport;
}
