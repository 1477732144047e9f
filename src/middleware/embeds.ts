/**
 * Embed Helpers Middleware
 * @module middleware/embeds
 */

import { EmbedBuilder } from 'discord.js';
import { COLORS, EMOJIS } from '../constants.js';
import { errorThumbnailUrl } from '../config/bot.js';

// Discord rejects descriptions longer than this
export const EMBED_DESCRIPTION_LIMIT = 4096;

export function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit - 1)}…` : text;
}

/**
 * Create error embed
 */
export function createErrorEmbed(title: string, description: string): EmbedBuilder {
    return new EmbedBuilder()
        .setColor(COLORS.ERROR)
        .setTitle(`${EMOJIS.ERROR} ${title}`)
        .setDescription(truncate(description, EMBED_DESCRIPTION_LIMIT))
        .setThumbnail(errorThumbnailUrl);
}
