/**
 * YoutubeService Unit Tests
 * Search and video id inference
 */

// Mock Logger
jest.mock('../../../../src/core/Logger', () => ({
    __esModule: true,
    default: {
        error: jest.fn(),
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        success: jest.fn(),
    },
}));

import { AppError } from '../../../../src/errors';
import { HttpJsonClient } from '../../../../src/utils/common/httpClient';
import { YoutubeService } from '../../../../src/services/api/youtubeService';

const mockGet = jest.fn();

function jsonResponse(status: number, body: unknown): { status: number; data: Buffer } {
    return { status, data: Buffer.from(typeof body === 'string' ? body : JSON.stringify(body)) };
}

function catchAppError(fn: () => unknown): AppError {
    try {
        fn();
    } catch (error) {
        if (error instanceof AppError) return error;
        throw error;
    }
    throw new Error('expected an AppError');
}

describe('YoutubeService', () => {
    let youtubeService: YoutubeService;

    beforeEach(() => {
        mockGet.mockReset();
        youtubeService = new YoutubeService(
            new HttpJsonClient({ get: mockGet }),
            { baseUrl: 'https://www.googleapis.com/youtube/v3', apiKey: 'test-key' }
        );
    });

    describe('findVideo', () => {
        it('should return the first search result', async () => {
            mockGet.mockResolvedValue(jsonResponse(200, {
                kind: 'youtube#searchListResponse',
                items: [{
                    id: { kind: 'youtube#video', videoId: 'aaaaaaaaaaa' },
                    snippet: { title: 'Test Song', channelTitle: 'Test Channel' },
                }],
            }));

            const video = await youtubeService.findVideo('test song');

            expect(video).toEqual({
                id: 'aaaaaaaaaaa',
                title: 'Test Song',
                channelTitle: 'Test Channel',
                url: 'https://www.youtube.com/watch?v=aaaaaaaaaaa',
            });
        });

        it('should query the search endpoint', async () => {
            mockGet.mockResolvedValue(jsonResponse(200, { items: [] }));

            await youtubeService.findVideo('test song').catch(() => undefined);

            const [url, config] = mockGet.mock.calls[0];
            expect(url).toBe('https://www.googleapis.com/youtube/v3/search');
            expect(config.params).toEqual({
                part: 'snippet',
                type: 'video',
                maxResults: 1,
                q: 'test song',
                key: 'test-key',
            });
        });

        it('should fail with YtVidNotFound when nothing matches', async () => {
            mockGet.mockResolvedValue(jsonResponse(200, { items: [] }));

            const error = await youtubeService.findVideo('nothing here').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AppError);
            if (error instanceof AppError) {
                expect(error.kind).toEqual({ type: 'YtVidNotFound', query: 'nothing here' });
                expect(error.title).toBe('YouTube error');
            }
        });

        it('should surface API errors as GetRequest', async () => {
            mockGet.mockResolvedValue(jsonResponse(403, 'quotaExceeded'));

            const error = await youtubeService.findVideo('q').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AppError);
            if (error instanceof AppError) {
                expect(error.kind).toEqual({ type: 'GetRequest', status: 403, body: 'quotaExceeded' });
            }
        });

        it('should surface unexpected payloads as UnexpectedJsonShape', async () => {
            mockGet.mockResolvedValue(jsonResponse(200, { items: [{ id: {} }] }));

            const error = await youtubeService.findVideo('q').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(AppError);
            if (error instanceof AppError) {
                expect(error.kind.type).toBe('UnexpectedJsonShape');
            }
        });
    });

    describe('inferVideoId', () => {
        it.each([
            ['https://www.youtube.com/watch?v=abcdefghijk', 'abcdefghijk'],
            ['https://youtube.com/watch?v=abc-def_123&t=42', 'abc-def_123'],
            ['https://m.youtube.com/watch?v=abcdefghijk', 'abcdefghijk'],
            ['https://music.youtube.com/watch?v=abcdefghijk', 'abcdefghijk'],
            ['https://youtu.be/abcdefghijk', 'abcdefghijk'],
            ['https://youtu.be/abcdefghijk?si=share', 'abcdefghijk'],
            ['https://www.youtube.com/shorts/abcdefghijk', 'abcdefghijk'],
            ['https://www.youtube.com/embed/abcdefghijk', 'abcdefghijk'],
            ['https://www.youtube.com/live/abcdefghijk', 'abcdefghijk'],
        ])('should infer the id from %s', (url, id) => {
            expect(youtubeService.inferVideoId(url)).toBe(id);
        });

        it.each([
            'https://example.com/watch?v=abcdefghijk',
            'https://www.youtube.com/watch',
            'https://www.youtube.com/watch?v=short',
            'https://www.youtube.com/channel/abcdefghijk',
            'https://youtu.be/',
            'not a url',
        ])('should fail with YtInferVideoId for %s', (url) => {
            const error = catchAppError(() => youtubeService.inferVideoId(url));

            expect(error.kind).toEqual({ type: 'YtInferVideoId', url });
            expect(error.title).toBe('Bad YouTube URL');
        });
    });

    describe('videoUrl', () => {
        it('should build the watch url', () => {
            expect(youtubeService.videoUrl('abcdefghijk')).toBe('https://www.youtube.com/watch?v=abcdefghijk');
        });
    });
});
