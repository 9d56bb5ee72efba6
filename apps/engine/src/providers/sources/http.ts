import axios from 'axios';
import { FetchError, FetchTimeout } from '../../errors';

const USER_AGENT = 'Mozilla/5.0 (compatible; BriefcastBot/1.0; +content research)';

export interface FetchTextOptions {
    sourceName: string;
    timeoutMs: number;
    signal?: AbortSignal;
    accept?: string;
}

/**
 * Text transport used by adapters; swapped for an in-process fake in tests
 */
export type FetchText = (url: string, options: FetchTextOptions) => Promise<string>;

/**
 * GET a URL as text, mapping transport failures onto FetchTimeout / FetchError
 */
export const httpGetText: FetchText = async (url, options) => {
    try {
        const response = await axios.get<string>(url, {
            timeout: options.timeoutMs,
            signal: options.signal,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            headers: {
                'User-Agent': USER_AGENT,
                Accept: options.accept ?? '*/*',
            },
        });
        return typeof response.data === 'string' ? response.data : String(response.data);
    } catch (error) {
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                throw new FetchTimeout(options.sourceName, options.timeoutMs);
            }
            throw new FetchError(options.sourceName, error.message, error.response?.status);
        }
        throw new FetchError(
            options.sourceName,
            error instanceof Error ? error.message : 'Unknown error'
        );
    }
};

export default httpGetText;
