/**
 * Track Queue
 * Per-guild playback queue: the current track plus upcoming ones
 * @module services/music/TrackQueue
 */

import { AppError } from '../../errors/index.js';

export class TrackQueue<T> {
    private playing: T | null = null;
    private upcoming: T[] = [];

    get size(): number {
        return this.upcoming.length;
    }

    get isPlaying(): boolean {
        return this.playing !== null;
    }

    /**
     * Queue a track, starting it right away when nothing is playing
     * @returns true when the track became the current one
     */
    add(track: T): boolean {
        if (this.playing === null) {
            this.playing = track;
            return true;
        }
        this.upcoming.push(track);
        return false;
    }

    current(): T {
        if (this.playing === null) {
            throw AppError.from({ type: 'NoActiveTrack' });
        }
        return this.playing;
    }

    /**
     * Move to the next track, null once the queue runs dry
     */
    advance(): T | null {
        this.playing = this.upcoming.shift() ?? null;
        return this.playing;
    }

    at(index: number): T {
        this.assertIndex(index);
        return this.upcoming[index];
    }

    remove(index: number): T {
        this.assertIndex(index);
        const [removed] = this.upcoming.splice(index, 1);
        return removed;
    }

    clear(): void {
        this.playing = null;
        this.upcoming = [];
    }

    private assertIndex(index: number): void {
        if (Number.isInteger(index) && index >= 0 && index < this.upcoming.length) return;

        throw AppError.from({
            type: 'TrackIndexOutOfBounds',
            index,
            available: this.upcoming.length > 0 ? { start: 0, end: this.upcoming.length } : null,
        });
    }
}

export default TrackQueue;
