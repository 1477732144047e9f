/**
 * URL Builder
 * @module utils/common/urlBuilder
 */

/**
 * Returns a builder that appends path segments to `base`.
 * Segments are percent-encoded, so `'a/b'` stays a single segment.
 *
 * @example
 * const youtubeApi = defineUrlBase('https://www.googleapis.com/youtube/v3');
 * youtubeApi(['search']).toString(); // 'https://www.googleapis.com/youtube/v3/search'
 */
export function defineUrlBase(base: string): (segments: Iterable<string>) => URL {
    const root = new URL(base);

    return (segments) => {
        const url = new URL(root.toString());
        let path = url.pathname.replace(/\/+$/, '');
        for (const segment of segments) {
            path += `/${encodeURIComponent(segment)}`;
        }
        url.pathname = path || '/';
        return url;
    };
}
