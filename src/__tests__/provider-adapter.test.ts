import { describe, it, expect } from 'vitest';
import { ResponseParseError } from '../services/errors';
import {
    ANTHROPIC_VERSION,
    defaultModelFor,
    detectProvider,
    getProviderAdapter,
    renderPrompt,
    splitSubjectLine,
} from '../services/provider-adapter';

describe('detectProvider', () => {
    it.each([
        ['https://api.openai.com/v1/chat/completions', 'openai'],
        ['https://openrouter.ai/api/v1/chat/completions', 'openai'],
        ['http://localhost:11434/v1/chat/completions/', 'openai'],
        ['https://api.anthropic.com/v1/messages', 'anthropic'],
        ['https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent', 'google'],
        ['https://mail-ai.example.com/generate', 'custom'],
    ])('maps %s to %s', (url, kind) => {
        expect(detectProvider(url)).toBe(kind);
    });

    it('rejects URLs that are not absolute http(s) URLs', () => {
        expect(detectProvider('not a url')).toBeNull();
        expect(detectProvider('ftp://files.example.com/generate')).toBeNull();
    });

    it('picks an OpenRouter model only for OpenRouter endpoints', () => {
        expect(defaultModelFor('openai', 'https://openrouter.ai/api/v1/chat/completions')).toBe('mistralai/mistral-7b-instruct');
        expect(defaultModelFor('openai', 'https://api.openai.com/v1/chat/completions')).toBeUndefined();
    });
});

describe('auth headers', () => {
    it('uses each provider header contract', () => {
        expect(getProviderAdapter('openai').buildHeaders('test-key')).toEqual({ Authorization: 'Bearer test-key' });
        expect(getProviderAdapter('anthropic').buildHeaders('test-key')).toEqual({
            'x-api-key': 'test-key',
            'anthropic-version': ANTHROPIC_VERSION,
        });
        expect(getProviderAdapter('google').buildHeaders('test-key')).toEqual({ 'x-goog-api-key': 'test-key' });
        expect(getProviderAdapter('custom').buildHeaders('test-key')).toEqual({ Authorization: 'Bearer test-key' });
    });
});

describe('buildRequest', () => {
    const request = { prompt: 'Invite the team to Friday lunch', tone: 'casual', maxLength: 200 };

    it('builds a chat completion payload', () => {
        const payload = getProviderAdapter('openai').buildRequest({ request, renderedPrompt: 'RENDERED' });

        expect(payload).toEqual({
            model: 'gpt-4o-mini',
            messages: [
                { role: 'system', content: 'You are an assistant that writes clear, well-structured emails.' },
                { role: 'user', content: 'RENDERED' },
            ],
            max_tokens: 200,
        });
    });

    it('builds an anthropic messages payload with a default token budget', () => {
        const payload = getProviderAdapter('anthropic').buildRequest({
            request: { prompt: 'Hello' },
            renderedPrompt: 'RENDERED',
            model: 'claude-test',
        });

        expect(payload).toEqual({
            model: 'claude-test',
            max_tokens: 1024,
            messages: [{ role: 'user', content: 'RENDERED' }],
        });
    });

    it('builds a generateContent payload', () => {
        const payload = getProviderAdapter('google').buildRequest({ request, renderedPrompt: 'RENDERED' });

        expect(payload).toEqual({
            contents: [{ role: 'user', parts: [{ text: 'RENDERED' }] }],
            generationConfig: { maxOutputTokens: 200 },
        });
    });

    it('sends the raw request fields to a custom endpoint', () => {
        const payload = getProviderAdapter('custom').buildRequest({ request, renderedPrompt: 'RENDERED' });

        expect(payload).toEqual({
            prompt: 'Invite the team to Friday lunch',
            tone: 'casual',
            email_type: 'general',
            max_length: 200,
        });
    });
});

describe('parseResponse', () => {
    it('reads chat completion content and splits the subject line', () => {
        const parsed = getProviderAdapter('openai').parseResponse({
            choices: [{ message: { role: 'assistant', content: 'Subject: Friday lunch\n\nHi team,\nLunch is on me.' } }],
        });

        expect(parsed).toEqual({ subject: 'Friday lunch', content: 'Hi team,\nLunch is on me.' });
    });

    it('joins anthropic text blocks', () => {
        const parsed = getProviderAdapter('anthropic').parseResponse({
            content: [
                { type: 'text', text: 'Hello ' },
                { type: 'tool_use', id: 'x' },
                { type: 'text', text: 'there' },
            ],
        });

        expect(parsed).toEqual({ content: 'Hello there' });
    });

    it('joins google candidate parts', () => {
        const parsed = getProviderAdapter('google').parseResponse({
            candidates: [{ content: { parts: [{ text: 'Line one\n' }, { text: 'Line two' }] } }],
        });

        expect(parsed).toEqual({ content: 'Line one\nLine two' });
    });

    it('reads content or text from a custom response, with an optional subject', () => {
        const adapter = getProviderAdapter('custom');

        expect(adapter.parseResponse({ content: 'Body text' })).toEqual({ content: 'Body text' });
        expect(adapter.parseResponse({ text: ' Body text ', subject: 'Hello' })).toEqual({ subject: 'Hello', content: 'Body text' });
    });

    it.each([
        ['openai', { id: 'x' }],
        ['openai', { choices: [{ message: { content: null } }] }],
        ['anthropic', { content: 'not-an-array' }],
        ['google', { candidates: [] }],
        ['custom', { message: 'no content here' }],
        ['custom', 'plain string'],
    ] as const)('raises a parse error for an unexpected %s shape', (kind, body) => {
        expect(() => getProviderAdapter(kind).parseResponse(body)).toThrow(ResponseParseError);
    });
});

describe('splitSubjectLine', () => {
    it('tolerates markdown around the label', () => {
        expect(splitSubjectLine('**Subject:** Meeting moved\n\nHi team')).toEqual({ subject: 'Meeting moved', content: 'Hi team' });
    });

    it('leaves text without a body untouched', () => {
        expect(splitSubjectLine('Subject: only a subject')).toEqual({ content: 'Subject: only a subject' });
        expect(splitSubjectLine('No subject here\nBody')).toEqual({ content: 'No subject here\nBody' });
    });
});

describe('renderPrompt', () => {
    it('fills placeholders with defaults and keeps dollar signs literal', () => {
        const rendered = renderPrompt('Write a {{tone}} {{emailType}} email about: {{prompt}}', {
            prompt: 'a refund of $5 for order $1',
        });

        expect(rendered).toBe('Write a professional general email about: a refund of $5 for order $1');
    });
});
