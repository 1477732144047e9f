/**
 * External Services Configuration
 * @module config/services
 */

import dotenv from 'dotenv';

dotenv.config();

export const http = {
    userAgent: process.env.HTTP_USER_AGENT || 'Veebot',
    timeout: 30_000, // whole request including connect, ms
};

export const youtube = {
    baseUrl: 'https://www.googleapis.com/youtube/v3',
    apiKey: process.env.YOUTUBE_API_KEY || '',
};

export type HttpConfig = typeof http;
export type YoutubeConfig = typeof youtube;

export default {
    http,
    youtube
};
