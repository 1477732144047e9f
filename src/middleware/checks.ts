/**
 * Command Checks Middleware
 * Guild and voice channel preconditions for music commands
 * @module middleware/checks
 */

import type {
    ChatInputCommandInteraction,
    GuildMember,
    VoiceBasedChannel
} from 'discord.js';
import { AppError } from '../errors/index.js';

/**
 * Member who invoked the command, only available inside a guild
 */
export function requireGuildMember(interaction: ChatInputCommandInteraction): GuildMember {
    if (!interaction.inCachedGuild()) {
        throw AppError.from({ type: 'UserNotInGuild' });
    }
    return interaction.member;
}

/**
 * Voice channel the invoking member is connected to
 */
export function requireVoiceChannel(interaction: ChatInputCommandInteraction): VoiceBasedChannel {
    const member = requireGuildMember(interaction);
    const channel = member.voice.channel;

    if (!channel) {
        throw AppError.from({ type: 'UserNotInVoiceChannel' });
    }
    return channel;
}
