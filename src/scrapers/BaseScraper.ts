import { FetchError, errorMessage } from '../errors';
import type { FetchOutcome, ScrapedRecord, Scraper, ScraperKind } from '../scheduler/types';
import type { HttpClient } from './HttpClient';

export function isHttpUrl(url: string): boolean {
    try {
        const parsed = new URL(url);
        return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Resolve a scraped href against the page it came from; null when it does not
 * form a valid URL.
 */
export function resolveUrl(href: string | undefined, base: string): string | null {
    if (!href) return null;
    try {
        return new URL(href, base).toString();
    } catch {
        return null;
    }
}

/**
 * Collapse whitespace and drop stray markup from scraped text.
 */
export function cleanText(text: string | undefined): string {
    if (!text) return '';
    return text.replace(/<[^>]*>/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Base class for scrapers that download one document and parse records out of
 * it. Network and parse failures become failed outcomes; an invalid URL is not
 * transient.
 */
export abstract class BaseScraper implements Scraper {
    abstract readonly kind: ScraperKind;
    protected readonly http: HttpClient;

    constructor(http: HttpClient) {
        this.http = http;
    }

    async fetch(url: string, searchWord?: string): Promise<FetchOutcome> {
        const target = this.targetUrl(url);
        if (!isHttpUrl(target)) {
            return { ok: false, error: new FetchError(`Invalid URL: '${target}'`, { transient: false }) };
        }

        let body: string;
        try {
            body = await this.http.getText(target);
        } catch (err) {
            if (err instanceof FetchError) return { ok: false, error: err };
            return { ok: false, error: new FetchError(errorMessage(err), { cause: err }) };
        }

        try {
            const scrapedAt = new Date().toISOString();
            const records = this.parse(body, target, searchWord).map(record => ({
                ...record,
                sourceType: this.kind,
                scrapedAt
            }));
            console.log(`[${this.constructor.name}] Scraped ${records.length} records from ${target}`);
            return { ok: true, records };
        } catch (err) {
            return { ok: false, error: new FetchError(`Site structure error at ${target}: ${errorMessage(err)}`, { cause: err }) };
        }
    }

    /** Where to fetch for a task URL. Feed scrapers override this to supply a default. */
    protected targetUrl(url: string): string {
        return url;
    }

    protected abstract parse(body: string, url: string, searchWord?: string): ScrapedRecord[];
}
