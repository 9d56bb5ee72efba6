/**
 * Spreadsheet source list
 *
 * Reads a CSV export of a shared spreadsheet whose rows list feed sources
 * (name, url, category, weight, enabled). It is queried once per run and
 * answers with RSS source configurations instead of stories.
 */

import { FetchError } from '../../errors';
import { createLogger } from '../../logger';
import { RssSourceConfig, RssSourceSchema, SheetSourceConfig } from '../../pipeline/runConfig';
import { BaseSourceAdapter } from './SourceAdapter';
import { FetchText, httpGetText } from './http';

const logger = createLogger('sheet-sources');

const REQUIRED_COLUMNS = ['name', 'url'];

/**
 * Split one CSV line, honouring double-quoted fields and "" escapes
 */
export function parseCsvLine(line: string): string[] {
    const fields: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const char = line[i];
        if (quoted) {
            if (char === '"' && line[i + 1] === '"') {
                current += '"';
                i++;
            } else if (char === '"') {
                quoted = false;
            } else {
                current += char;
            }
        } else if (char === '"') {
            quoted = true;
        } else if (char === ',') {
            fields.push(current.trim());
            current = '';
        } else {
            current += char;
        }
    }
    fields.push(current.trim());

    return fields;
}

/**
 * Parse CSV text into header-keyed rows
 */
export function parseCsv(text: string): Array<Record<string, string>> {
    const lines = text.split(/\r?\n/).filter(line => line.trim().length > 0);
    if (lines.length === 0) return [];

    const header = parseCsvLine(lines[0]).map(column => column.toLowerCase());
    return lines.slice(1).map(line => {
        const values = parseCsvLine(line);
        const row: Record<string, string> = {};
        header.forEach((column, index) => {
            row[column] = values[index] ?? '';
        });
        return row;
    });
}

function parseEnabled(value: string | undefined): boolean {
    if (!value) return true;
    return !['false', 'no', '0', 'off'].includes(value.toLowerCase());
}

/**
 * Turn sheet rows into RSS source configurations. Rows inherit the sheet
 * entry's fetch policy; invalid and disabled rows are skipped.
 */
export function rowsToSources(rows: Array<Record<string, string>>, sheet: SheetSourceConfig): RssSourceConfig[] {
    const sources: RssSourceConfig[] = [];

    rows.forEach((row, index) => {
        if (!parseEnabled(row.enabled)) {
            return;
        }

        const weight = row.weight ? Number(row.weight) : sheet.weight;
        const parsed = RssSourceSchema.safeParse({
            kind: 'rss',
            name: row.name,
            sourceUrl: row.url,
            category: row.category || sheet.category,
            weight,
            maxItems: sheet.maxItems,
            timeoutSeconds: sheet.timeoutSeconds,
            retryCount: sheet.retryCount,
            retryBackoffSeconds: sheet.retryBackoffSeconds,
        });

        if (!parsed.success) {
            logger.warn('Skipping invalid sheet row', {
                sheet: sheet.name,
                row: index + 2,
                issues: parsed.error.issues.map(issue => issue.message),
            });
            return;
        }
        sources.push(parsed.data);
    });

    return sources;
}

export class SheetSourceAdapter extends BaseSourceAdapter<SheetSourceConfig, RssSourceConfig> {
    readonly name = 'sheet';

    constructor(private readonly fetchText: FetchText = httpGetText) {
        super();
    }

    protected async fetchOnce(config: SheetSourceConfig, timeoutMs: number, signal?: AbortSignal): Promise<RssSourceConfig[]> {
        const csv = await this.fetchText(config.sourceUrl, {
            sourceName: config.name,
            timeoutMs,
            signal,
            accept: 'text/csv, text/plain',
        });

        const rows = parseCsv(csv);
        const header = rows.length > 0 ? Object.keys(rows[0]) : [];
        const missing = REQUIRED_COLUMNS.filter(column => !header.includes(column));
        if (rows.length > 0 && missing.length > 0) {
            throw new FetchError(config.name, `Sheet is missing columns: ${missing.join(', ')}`);
        }

        return rowsToSources(rows, config);
    }
}

// Export singleton instance
export const sheetSourceAdapter = new SheetSourceAdapter();
