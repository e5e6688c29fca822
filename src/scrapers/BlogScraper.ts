import { load } from 'cheerio';
import type { ScrapedRecord } from '../scheduler/types';
import { BaseScraper, cleanText, resolveUrl } from './BaseScraper';

/**
 * Post listings from WordPress-style blogs (`li.wp-block-post` cards), with a
 * fallback to plain `<article>` markup.
 */
export class BlogScraper extends BaseScraper {
    readonly kind = 'blog' as const;

    protected parse(body: string, url: string): ScrapedRecord[] {
        const $ = load(body);
        const records: ScrapedRecord[] = [];
        const source = new URL(url).hostname;

        let posts = $('li.wp-block-post');
        if (posts.length === 0) posts = $('article');

        posts.each((_, post) => {
            const $post = $(post);
            const $titleLink = $post.find('.loop-card__title a, h2 a, h3 a').first();
            const title = cleanText($titleLink.text());
            const link = resolveUrl($titleLink.attr('href'), url);
            if (!title || !link) return;

            const $time = $post.find('time').first();
            const datetime = $time.attr('datetime');

            records.push({
                title,
                url: link,
                author: cleanText($post.find('.loop-card__author, [rel="author"], .author').first().text()) || null,
                publishedAt: datetime ?? null,
                publishedReadable: cleanText($time.text()) || null,
                summary: cleanText($post.find('.loop-card__excerpt, .excerpt, p').first().text()),
                tags: $post.find('.loop-card__cat, [rel="tag"]')
                    .map((_, tag) => cleanText($(tag).text()).toLowerCase())
                    .get()
                    .filter(tag => tag.length > 0),
                source
            });
        });

        return records;
    }
}
