import { load, type CheerioAPI } from 'cheerio';
import type { ScrapedRecord } from '../scheduler/types';
import { BaseScraper, cleanText, resolveUrl } from './BaseScraper';

export interface NewsSiteStrategy {
    siteName: string;
    matches(hostname: string): boolean;
    extract($: CheerioAPI, pageUrl: string): ScrapedRecord[];
}

const bbcStrategy: NewsSiteStrategy = {
    siteName: 'BBC News',
    matches: hostname => hostname === 'bbc.com' || hostname.endsWith('.bbc.com') || hostname.endsWith('.bbc.co.uk'),
    extract($, pageUrl) {
        const records: ScrapedRecord[] = [];
        $('[data-testid="anchor-inner-wrapper"]').each((_, card) => {
            const $card = $(card);
            const headline = cleanText($card.find('[data-testid="card-headline"]').first().text());
            const summary = cleanText($card.find('[data-testid="card-description"]').first().text());
            const link = resolveUrl($card.find('a[data-testid="internal-link"]').attr('href') ?? $card.closest('a').attr('href'), pageUrl);

            if (headline && link && summary) {
                records.push({ title: headline, url: link, summary, source: 'BBC News', tags: [] });
            }
        });
        return records;
    }
};

const foxStrategy: NewsSiteStrategy = {
    siteName: 'Fox News',
    matches: hostname => hostname === 'foxnews.com' || hostname.endsWith('.foxnews.com'),
    extract($, pageUrl) {
        const records: ScrapedRecord[] = [];
        $('div.article-list h3.title').each((_, heading) => {
            const $heading = $(heading);
            const link = resolveUrl($heading.find('a').attr('href'), pageUrl);
            const title = cleanText($heading.text());
            if (!link || !title) return;

            records.push({ title, url: link, summary: '', source: 'Fox News', tags: [] });
        });
        return records;
    }
};

// Any site that marks its stories up with <article>
const genericStrategy: NewsSiteStrategy = {
    siteName: 'Generic',
    matches: () => true,
    extract($, pageUrl) {
        const records: ScrapedRecord[] = [];
        const source = new URL(pageUrl).hostname;

        $('article').each((_, article) => {
            const $article = $(article);
            const $heading = $article.find('h1, h2, h3').first();
            const title = cleanText($heading.text());
            const link = resolveUrl($heading.find('a').attr('href') ?? $article.find('a[href]').first().attr('href'), pageUrl);
            if (!title || !link) return;

            const tags = $article.find('[rel="tag"], .tag, .category')
                .map((_, tag) => cleanText($(tag).text()).toLowerCase())
                .get()
                .filter(tag => tag.length > 0);

            records.push({
                title,
                url: link,
                summary: cleanText($article.find('p').first().text()),
                source,
                tags
            });
        });
        return records;
    }
};

const STRATEGIES: readonly NewsSiteStrategy[] = [bbcStrategy, foxStrategy, genericStrategy];

/**
 * Headline listings from news front pages, one strategy per site.
 */
export class NewsScraper extends BaseScraper {
    readonly kind = 'news' as const;

    static strategyFor(url: string): NewsSiteStrategy {
        const hostname = new URL(url).hostname.toLowerCase();
        return STRATEGIES.find(strategy => strategy.matches(hostname)) ?? genericStrategy;
    }

    protected parse(body: string, url: string): ScrapedRecord[] {
        const strategy = NewsScraper.strategyFor(url);
        console.log(`[NewsScraper] Using ${strategy.siteName} strategy for ${url}`);
        return strategy.extract(load(body), url);
    }
}
