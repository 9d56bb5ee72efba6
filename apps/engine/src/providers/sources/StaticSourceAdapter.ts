import type { StaticSourceConfig } from '../../pipeline/runConfig';
import { BaseSourceAdapter, SourceItem } from './SourceAdapter';

/**
 * Inline items from the run configuration: curated picks, trending signals
 * with an explicit boost, fixtures
 */
export class StaticSourceAdapter extends BaseSourceAdapter<StaticSourceConfig> {
    readonly name = 'static';

    protected async fetchOnce(config: StaticSourceConfig): Promise<SourceItem[]> {
        return config.items.map((item, index) => ({
            title: item.title,
            url: item.url,
            summary: item.summary,
            publishedAt: item.publishedAt,
            trendingBoost: item.trendingBoost,
            payload: { inlineIndex: index },
        }));
    }
}

// Export singleton instance
export const staticSourceAdapter = new StaticSourceAdapter();
