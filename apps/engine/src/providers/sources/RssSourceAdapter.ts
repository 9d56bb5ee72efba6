import Parser from 'rss-parser';
import { FetchError } from '../../errors';
import type { RssSourceConfig } from '../../pipeline/runConfig';
import { BaseSourceAdapter, SourceItem } from './SourceAdapter';
import { FetchText, httpGetText } from './http';

/**
 * RSS / Atom feed adapter
 */
export class RssSourceAdapter extends BaseSourceAdapter<RssSourceConfig> {
    readonly name = 'rss';
    private parser: Parser;

    constructor(private readonly fetchText: FetchText = httpGetText) {
        super();
        this.parser = new Parser();
    }

    protected async fetchOnce(config: RssSourceConfig, timeoutMs: number, signal?: AbortSignal): Promise<SourceItem[]> {
        const xml = await this.fetchText(config.sourceUrl, {
            sourceName: config.name,
            timeoutMs,
            signal,
            accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
        });

        let feed: Parser.Output<Record<string, unknown>>;
        try {
            feed = await this.parser.parseString(xml);
        } catch (error) {
            throw new FetchError(
                config.name,
                `Invalid feed: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        return (feed.items || []).slice(0, config.maxItems).map(item => ({
            title: item.title || '',
            url: item.link || null,
            summary: item.contentSnippet || item.content || '',
            publishedAt: item.isoDate || item.pubDate || null,
            trendingBoost: 0,
            payload: {
                guid: item.guid || null,
                feedTitle: feed.title || null,
                categories: item.categories || [],
            },
        }));
    }
}

// Export singleton instance
export const rssSourceAdapter = new RssSourceAdapter();
