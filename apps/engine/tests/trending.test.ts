/**
 * Tests for trending.ts
 */

import { ConfigError } from '../src/errors';
import {
    DEFAULT_TRENDING_CAP,
    loadTrendingCatalog,
    parseTrendingCatalog,
    resolveTrendingTable,
    selectTrendingTable,
} from '../src/pipeline/trending';

describe('selectTrendingTable', () => {
    const catalog = loadTrendingCatalog();

    it('should pick the latest version in force and merge the weekday rotation', () => {
        // 2025-09-02 is a Tuesday
        const table = selectTrendingTable(catalog, new Date('2025-09-02T12:00:00Z'));

        expect(table.version).toBe('2025.2/tuesday');
        expect(table.cap).toBe(3);
        expect(table.keywords['reasoning model']).toBe(0.9);
        expect(table.keywords.chip).toBe(0.6);
        expect(table.keywords.earnings).toBeUndefined();
    });

    it('should use the older version before the newer one takes effect', () => {
        // 2025-03-01 is a Saturday
        const table = selectTrendingTable(catalog, new Date('2025-03-01T12:00:00Z'));

        expect(table.version).toBe('2025.1/saturday');
        expect(table.keywords['open source']).toBe(0.5);
        expect(table.keywords['reasoning model']).toBeUndefined();
    });

    it('should return an empty table before any version is in force', () => {
        const table = selectTrendingTable(catalog, new Date('2024-06-01T00:00:00Z'));

        expect(table.version).toBe('none');
        expect(table.cap).toBe(DEFAULT_TRENDING_CAP);
        expect(table.keywords).toEqual({});
    });

    it('should freeze the table', () => {
        const table = selectTrendingTable(catalog, new Date('2025-09-02T12:00:00Z'));
        expect(Object.isFrozen(table)).toBe(true);
        expect(Object.isFrozen(table.keywords)).toBe(true);
    });
});

describe('resolveTrendingTable', () => {
    const at = new Date('2025-09-02T12:00:00Z');

    it('should use inline keywords, lower-cased and trimmed', () => {
        const table = resolveTrendingTable({ keywords: { '  GPU ': 2 }, cap: 4 }, at);

        expect(table).toEqual({ version: 'inline', cap: 4, keywords: { gpu: 2 } });
    });

    it('should apply an explicit cap to the catalogue table', () => {
        const table = resolveTrendingTable({ cap: 5 }, at);

        expect(table.version).toBe('2025.2/tuesday');
        expect(table.cap).toBe(5);
    });

    it('should read from a supplied catalogue', () => {
        const catalog = parseTrendingCatalog({
            versions: [{ version: 'test', effectiveFrom: '2025-01-01T00:00:00Z', base: { robots: 1 } }],
        });
        const table = resolveTrendingTable({}, at, catalog);

        expect(table).toEqual({ version: 'test/tuesday', cap: DEFAULT_TRENDING_CAP, keywords: { robots: 1 } });
    });
});

describe('parseTrendingCatalog', () => {
    it('should reject negative weights', () => {
        expect(() => parseTrendingCatalog({
            versions: [{ version: 'bad', effectiveFrom: '2025-01-01T00:00:00Z', base: { robots: -1 } }],
        })).toThrow(ConfigError);
    });

    it('should reject unparseable dates', () => {
        expect(() => parseTrendingCatalog({
            versions: [{ version: 'bad', effectiveFrom: 'soon', base: {} }],
        })).toThrow('Invalid trending catalogue');
    });
});
