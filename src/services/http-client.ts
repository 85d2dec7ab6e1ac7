import { TransportError, errorMessage } from './errors';

export interface JsonResponse {
    status: number;
    // undefined when the body was not valid JSON
    body: unknown;
    rawText: string;
}

/**
 * Sends one JSON POST and returns whatever came back. Non-2xx statuses are
 * returned, not thrown; only failures without a response throw.
 */
export interface JsonTransport {
    postJson(url: string, payload: unknown, headers: Record<string, string>, timeoutMs: number): Promise<JsonResponse>;
}

// AbortSignal.timeout rejects with a DOMException named TimeoutError
function isAbortError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'AbortError' || error.name === 'TimeoutError';
}

export class FetchJsonTransport implements JsonTransport {
    async postJson(
        url: string,
        payload: unknown,
        headers: Record<string, string>,
        timeoutMs: number,
    ): Promise<JsonResponse> {
        let response: Response;
        try {
            response = await fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json', ...headers },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (error) {
            if (isAbortError(error)) {
                throw new TransportError(`Request to ${url} timed out after ${timeoutMs}ms`, true);
            }
            throw new TransportError(`Request to ${url} failed: ${errorMessage(error)}`, false);
        }

        let rawText: string;
        try {
            rawText = await response.text();
        } catch (error) {
            throw new TransportError(`Reading response from ${url} failed: ${errorMessage(error)}`, isAbortError(error));
        }

        let body: unknown;
        try {
            body = rawText ? JSON.parse(rawText) : undefined;
        } catch {
            body = undefined;
        }

        return { status: response.status, body, rawText };
    }
}
