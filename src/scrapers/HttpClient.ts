import UserAgent from 'user-agents';
import { FetchError, errorMessage } from '../errors';

export interface HttpClient {
    getText(url: string): Promise<string>;
}

export interface FetchHttpClientOptions {
    timeoutMs: number;
    userAgent?: string;
}

// statuses worth another attempt
const RETRYABLE_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Generate a random desktop Chrome/Edge user agent, skipping Linux builds.
 */
export function generateUserAgent(): string {
    let uaStr = new UserAgent({ deviceCategory: 'desktop' }).toString();

    let attempts = 0;
    while (attempts < 20) {
        if (!uaStr.includes('Linux') && (uaStr.includes('Chrome') || uaStr.includes('Edg'))) break;
        uaStr = new UserAgent({ deviceCategory: 'desktop' }).toString();
        attempts++;
    }

    return uaStr;
}

export class FetchHttpClient implements HttpClient {
    private readonly timeoutMs: number;
    private readonly userAgent: string;

    constructor(options: FetchHttpClientOptions) {
        this.timeoutMs = options.timeoutMs;
        this.userAgent = options.userAgent ?? generateUserAgent();
    }

    async getText(url: string): Promise<string> {
        let response: Response;
        try {
            response = await fetch(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.9'
                },
                signal: AbortSignal.timeout(this.timeoutMs)
            });
        } catch (err) {
            throw new FetchError(`NETWORK: ${url}: ${errorMessage(err)}`, { cause: err });
        }

        if (!response.ok) {
            throw new FetchError(`HTTP ${response.status} for ${url}`, {
                transient: RETRYABLE_STATUS.has(response.status)
            });
        }

        return response.text();
    }
}
