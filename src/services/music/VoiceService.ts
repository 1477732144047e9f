/**
 * Voice Service
 * Joins voice channels and starts playback through Lavalink
 * @module services/music/VoiceService
 */

import type { Player, Shoukaku } from 'shoukaku';
import type { VoiceBasedChannel } from 'discord.js';
import { AppError, toError } from '../../errors/index.js';
import logger from '../../core/Logger.js';

export type VoiceGateway = Pick<Shoukaku, 'joinVoiceChannel'>;

class VoiceService {
    private readonly gateway: VoiceGateway;

    constructor(gateway: VoiceGateway) {
        this.gateway = gateway;
    }

    async join(channel: VoiceBasedChannel): Promise<Player> {
        try {
            const player = await this.gateway.joinVoiceChannel({
                guildId: channel.guild.id,
                channelId: channel.id,
                shardId: channel.guild.shardId,
                deaf: true,
            });
            logger.debug('Voice', `Joined "${channel.name}" in ${channel.guild.id}`);
            return player;
        } catch (error) {
            throw AppError.from({ type: 'JoinVoiceChannel', channelName: channel.name, cause: toError(error) });
        }
    }

    async play(player: Player, encodedTrack: string): Promise<void> {
        try {
            await player.playTrack({ track: { encoded: encodedTrack } });
        } catch (error) {
            throw AppError.from({ type: 'AudioStart', cause: toError(error) });
        }
    }
}

export { VoiceService };
export default VoiceService;
