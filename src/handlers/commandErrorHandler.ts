/**
 * Command Error Handler
 * Turns a failed command into an error embed in the channel it came from
 * @module handlers/commandErrorHandler
 */

import { DiscordAPIError, type RepliableInteraction } from 'discord.js';
import { AppError, isAppError, toError } from '../errors/index.js';
import { EMBED_DESCRIPTION_LIMIT, createErrorEmbed } from '../middleware/embeds.js';

/**
 * Map a caught value onto the taxonomy. Values outside it are bugs and are rethrown.
 */
export function toAppError(error: unknown): AppError {
    if (isAppError(error)) return error;
    if (error instanceof DiscordAPIError) return AppError.from(error);
    throw error;
}

/**
 * Show the rendered error to the user who ran the command
 */
export async function replyWithError(interaction: RepliableInteraction, error: AppError): Promise<void> {
    const { title, body } = error.toMessage(EMBED_DESCRIPTION_LIMIT);
    const payload = { embeds: [createErrorEmbed(title, body)], ephemeral: true };

    try {
        if (interaction.deferred || interaction.replied) {
            await interaction.followUp(payload);
        } else {
            await interaction.reply(payload);
        }
    } catch (replyError) {
        // Nobody to show it to, the envelope logs it
        if (!isAppError(replyError)) {
            AppError.from(replyError instanceof DiscordAPIError
                ? replyError
                : { type: 'UnknownDiscord', cause: toError(replyError) });
        }
    }
}

/**
 * Run a command handler, replying with the error embed when it fails
 */
export async function runCommand(interaction: RepliableInteraction, handler: () => Promise<void>): Promise<void> {
    try {
        await handler();
    } catch (error) {
        await replyWithError(interaction, toAppError(error));
    }
}
