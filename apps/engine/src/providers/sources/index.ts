import type { RssSourceConfig, SheetSourceConfig, StaticSourceConfig } from '../../pipeline/runConfig';
import { RssSourceAdapter, rssSourceAdapter } from './RssSourceAdapter';
import { SheetSourceAdapter, sheetSourceAdapter } from './SheetSourceAdapter';
import { SourceAdapter } from './SourceAdapter';
import { StaticSourceAdapter, staticSourceAdapter } from './StaticSourceAdapter';
import { FetchText } from './http';

/**
 * Adapter per source kind; the pipeline looks adapters up here so tests can
 * substitute any of them
 */
export interface SourceAdapterRegistry {
    rss: SourceAdapter<RssSourceConfig>;
    static: SourceAdapter<StaticSourceConfig>;
    sheet: SourceAdapter<SheetSourceConfig, RssSourceConfig>;
}

export const defaultSourceAdapters: SourceAdapterRegistry = {
    rss: rssSourceAdapter,
    static: staticSourceAdapter,
    sheet: sheetSourceAdapter,
};

/**
 * Adapters sharing one text transport
 */
export function createSourceAdapters(fetchText: FetchText): SourceAdapterRegistry {
    return {
        rss: new RssSourceAdapter(fetchText),
        static: new StaticSourceAdapter(),
        sheet: new SheetSourceAdapter(fetchText),
    };
}

export type { SourceAdapter, SourceItem, FetchResult, SourcePolicy } from './SourceAdapter';
export { BaseSourceAdapter, isSourceItem } from './SourceAdapter';
export { RssSourceAdapter, rssSourceAdapter } from './RssSourceAdapter';
export { StaticSourceAdapter, staticSourceAdapter } from './StaticSourceAdapter';
export { SheetSourceAdapter, sheetSourceAdapter, parseCsv, parseCsvLine, rowsToSources } from './SheetSourceAdapter';
export type { FetchText, FetchTextOptions } from './http';
export { httpGetText } from './http';
