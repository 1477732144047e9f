/**
 * Veebot core
 * Error taxonomy, error envelopes and the outbound HTTP JSON client
 * @module index
 */

import logger from './core/Logger.js';

export * from './errors/index.js';
export { logger, Logger, ConsoleSink } from './core/Logger.js';
export type { LogLevel, LogRecord, LogSink, LogFields } from './core/Logger.js';
export { HttpJsonClient, createHttpClient } from './utils/common/httpClient.js';
export type { QueryParams, HttpGetter, GetJsonOptions, HttpClientOptions } from './utils/common/httpClient.js';
export { defineUrlBase } from './utils/common/urlBuilder.js';
export { parseIntArg, parseArg, parseImageTags } from './utils/common/args.js';
export { requireGuildMember, requireVoiceChannel } from './middleware/checks.js';
export { createErrorEmbed } from './middleware/embeds.js';
export { toAppError, replyWithError, runCommand } from './handlers/commandErrorHandler.js';
export { TrackQueue } from './services/music/TrackQueue.js';
export { VoiceService } from './services/music/VoiceService.js';
export type { VoiceGateway } from './services/music/VoiceService.js';
export { YoutubeService } from './services/api/youtubeService.js';
export type { YoutubeVideo } from './services/api/youtubeService.js';

/**
 * Flush pending log records before the process exits
 */
export async function shutdown(): Promise<void> {
    await logger.flush();
}
