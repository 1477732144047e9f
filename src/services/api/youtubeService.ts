/**
 * YouTube Service
 * Video lookup through the YouTube Data API v3
 * @module services/api/youtubeService
 */

import { z } from 'zod';
import { AppError } from '../../errors/index.js';
import { HttpJsonClient } from '../../utils/common/httpClient.js';
import { defineUrlBase } from '../../utils/common/urlBuilder.js';
import { youtube as youtubeConfig, type YoutubeConfig } from '../../config/services.js';
// TYPES & SCHEMAS
export interface YoutubeVideo {
    id: string;
    title: string;
    channelTitle: string;
    url: string;
}

const searchResponseSchema = z.object({
    items: z.array(z.object({
        id: z.object({ videoId: z.string() }),
        snippet: z.object({
            title: z.string(),
            channelTitle: z.string(),
        }),
    })),
});

export type YoutubeSearchResponse = z.infer<typeof searchResponseSchema>;
// CONSTANTS
const VIDEO_ID_PATTERN = /^[\w-]{11}$/;
const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'music.youtube.com']);
const PATH_PREFIXES = ['shorts', 'embed', 'live', 'v'];
// HELPERS
function extractVideoId(url: URL): string | null {
    if (url.hostname === 'youtu.be') {
        return url.pathname.split('/')[1] || null;
    }
    if (!YOUTUBE_HOSTS.has(url.hostname)) {
        return null;
    }
    if (url.pathname === '/watch') {
        return url.searchParams.get('v');
    }

    const [, prefix, id] = url.pathname.split('/');
    return prefix && PATH_PREFIXES.includes(prefix) ? id || null : null;
}
// YOUTUBE SERVICE CLASS
class YoutubeService {
    private readonly http: HttpJsonClient;
    private readonly apiKey: string;
    private readonly apiUrl: (segments: Iterable<string>) => URL;

    constructor(http: HttpJsonClient = new HttpJsonClient(), config: YoutubeConfig = youtubeConfig) {
        this.http = http;
        this.apiKey = config.apiKey;
        this.apiUrl = defineUrlBase(config.baseUrl);
    }

    /**
     * Best match for a free-text query
     */
    async findVideo(query: string): Promise<YoutubeVideo> {
        const response = await this.http.getJson(
            this.apiUrl(['search']),
            {
                part: 'snippet',
                type: 'video',
                maxResults: 1,
                q: query,
                key: this.apiKey,
            },
            searchResponseSchema
        );

        const [item] = response.items;
        if (!item) {
            throw AppError.from({ type: 'YtVidNotFound', query });
        }

        return {
            id: item.id.videoId,
            title: item.snippet.title,
            channelTitle: item.snippet.channelTitle,
            url: this.videoUrl(item.id.videoId),
        };
    }

    /**
     * Pull the video id out of any of the usual YouTube link shapes
     */
    inferVideoId(url: string): string {
        let parsed: URL | null = null;
        try {
            parsed = new URL(url);
        } catch {
            parsed = null;
        }

        const id = parsed ? extractVideoId(parsed) : null;
        if (id === null || !VIDEO_ID_PATTERN.test(id)) {
            throw AppError.from({ type: 'YtInferVideoId', url });
        }
        return id;
    }

    videoUrl(id: string): string {
        return `https://www.youtube.com/watch?v=${encodeURIComponent(id)}`;
    }
}

export { YoutubeService };
export default YoutubeService;
