import { FetchError, ResolutionError } from '../src/errors';
import type {
    FetchOutcome,
    ResolveOutcome,
    ScrapedRecord,
    Scraper,
    ScraperKind,
    ScraperSelector,
    Task
} from '../src/scheduler/types';

export interface FetchCall {
    url: string;
    searchWord?: string;
    at: number;
}

/** `call` counts invocations for this url, starting at 1. */
export type FetchHandler = (url: string, call: number) => FetchOutcome | Promise<FetchOutcome>;

export class FakeScraper implements Scraper {
    calls: FetchCall[] = [];
    private readonly handler: FetchHandler;

    constructor(handler: FetchHandler = url => ok([{ url }])) {
        this.handler = handler;
    }

    async fetch(url: string, searchWord?: string): Promise<FetchOutcome> {
        this.calls.push({ url, searchWord, at: Date.now() });
        const call = this.calls.filter(c => c.url === url).length;
        return this.handler(url, call);
    }

    callsFor(url: string): FetchCall[] {
        return this.calls.filter(c => c.url === url);
    }
}

export class FakeSelector implements ScraperSelector {
    resolved: ScraperKind[] = [];
    private readonly scrapers: Partial<Record<ScraperKind, Scraper>>;

    constructor(scrapers: Partial<Record<ScraperKind, Scraper>>) {
        this.scrapers = scrapers;
    }

    resolve(type: ScraperKind): ResolveOutcome {
        this.resolved.push(type);
        const scraper = this.scrapers[type];
        if (!scraper) return { ok: false, error: new ResolutionError(type) };
        return { ok: true, scraper };
    }
}

export const ok = (records: ScrapedRecord[] = []): FetchOutcome => ({ ok: true, records });

export const fail = (message: string, transient = true): FetchOutcome => ({
    ok: false,
    error: new FetchError(message, { transient })
});

export const delay = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms));

export function makeTask(id: number, priority = 1, overrides: Partial<Task> = {}): Task {
    return Object.freeze({
        id,
        priority,
        url: `https://example.com/${id}`,
        type: 'news' as const,
        createdAt: 0,
        ...overrides
    });
}

/**
 * Mute the pool's console chatter for a test file.
 */
export function silenceConsole() {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });
}
