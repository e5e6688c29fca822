import { ResolutionError } from '../errors';
import { SCRAPER_KINDS, ResolveOutcome, Scraper, ScraperKind, ScraperSelector } from '../scheduler/types';
import { BlogScraper } from './BlogScraper';
import type { HttpClient } from './HttpClient';
import { NewsScraper } from './NewsScraper';
import { RssScraper } from './RssScraper';

export interface DefaultSelectorOptions {
    http: HttpClient;
    defaultFeedUrl: string;
    enabled?: readonly ScraperKind[];
}

/**
 * Maps each scraper kind to its scraper. Scrapers are stateless apart from the
 * shared HTTP client, so one instance per kind is reused across tasks.
 */
export class DefaultScraperSelector implements ScraperSelector {
    private readonly enabled: ReadonlySet<ScraperKind>;
    private readonly scrapers: Map<ScraperKind, Scraper> = new Map();
    private readonly options: DefaultSelectorOptions;

    constructor(options: DefaultSelectorOptions) {
        this.options = options;
        this.enabled = new Set(options.enabled ?? SCRAPER_KINDS);
    }

    resolve(type: ScraperKind): ResolveOutcome {
        if (!this.enabled.has(type)) {
            return { ok: false, error: new ResolutionError(type, `Scraper kind '${type}' is disabled`) };
        }

        let scraper = this.scrapers.get(type);
        if (!scraper) {
            scraper = this.create(type);
            this.scrapers.set(type, scraper);
        }
        return { ok: true, scraper };
    }

    private create(type: ScraperKind): Scraper {
        switch (type) {
            case 'news':
                return new NewsScraper(this.options.http);
            case 'rss':
                return new RssScraper(this.options.http, this.options.defaultFeedUrl);
            case 'blog':
                return new BlogScraper(this.options.http);
            default: {
                const unreachable: never = type;
                throw new ResolutionError(String(unreachable));
            }
        }
    }
}
