import { load } from 'cheerio';
import type { ScrapedRecord } from '../scheduler/types';
import { BaseScraper, cleanText } from './BaseScraper';
import type { HttpClient } from './HttpClient';

const toIsoDate = (value: string): string | null => {
    if (!value) return null;
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
};

/**
 * RSS 2.0 and Atom feeds. A task without a URL reads the default feed; a
 * search word keeps only items that mention it.
 */
export class RssScraper extends BaseScraper {
    readonly kind = 'rss' as const;
    private readonly defaultFeedUrl: string;

    constructor(http: HttpClient, defaultFeedUrl: string) {
        super(http);
        this.defaultFeedUrl = defaultFeedUrl;
    }

    protected targetUrl(url: string): string {
        return url.trim() === '' ? this.defaultFeedUrl : url;
    }

    protected parse(body: string, url: string, searchWord?: string): ScrapedRecord[] {
        const $ = load(body, { xml: true });
        if ($('rss, feed').length === 0 && $('item').length === 0) {
            throw new Error('document is not an RSS or Atom feed');
        }

        const source = cleanText($('channel > title, feed > title').first().text()) || new URL(url).hostname;
        const records: ScrapedRecord[] = [];

        $('item, entry').each((_, node) => {
            const $item = $(node);
            // Atom entries may list a self/edit link first; the article is the alternate one
            const $alternate = $item.children('link[rel="alternate"]').first();
            const $plain = $item.children('link:not([rel])').first();
            const $link = $alternate.length > 0 ? $alternate : $plain.length > 0 ? $plain : $item.children('link').first();
            const link = $link.attr('href') ?? $link.text().trim();

            const tags = $item.children('category')
                .map((_, category) => cleanText($(category).attr('term') ?? $(category).text()).toLowerCase())
                .get()
                .filter(tag => tag.length > 0);

            records.push({
                title: cleanText($item.children('title').text()),
                url: link,
                summary: cleanText($item.children('description, summary, content').first().text()),
                author: cleanText($item.children('author').first().text()) || null,
                publishedAt: toIsoDate($item.children('pubDate, published, updated').first().text().trim()),
                tags,
                source
            });
        });

        if (!searchWord) return records;
        return RssScraper.filterBySearchWord(records, searchWord);
    }

    static filterBySearchWord(records: ScrapedRecord[], searchWord: string): ScrapedRecord[] {
        const needle = searchWord.toLowerCase();
        const mentions = (value: unknown): boolean => {
            if (typeof value === 'string') return value.toLowerCase().includes(needle);
            if (Array.isArray(value)) return value.some(mentions);
            return false;
        };
        return records.filter(record => mentions(record.title) || mentions(record.summary) || mentions(record.tags));
    }
}
