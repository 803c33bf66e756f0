import Artist from "./artist";
import { Entity } from "./entity";
import Tag from "./tag";
import Track from "./track";
import User, { UserSnapshot } from "./user";

export interface SimilarUserSnapshot extends UserSnapshot {
    match: number;
    relatedTo: string;
}

/**
 * A user from another user's neighbours feed, with its `match` (0-100)
 * against `relatedTo`.
 */
export default class SimilarUser implements Entity {
    readonly kind = "user";

    constructor(
        public readonly user: User,
        public readonly match: number,
        public readonly relatedTo: User
    ) {}

    get name(): string {
        return this.user.name;
    }

    get url(): undefined | string {
        return this.user.url;
    }

    get pictureUrl(): undefined | string {
        return this.user.pictureUrl;
    }

    resourceUrl(): string {
        return this.user.resourceUrl();
    }

    tracks(): Promise<Track[]> {
        return this.user.tracks();
    }

    tags(): Promise<Tag[]> {
        return this.user.tags();
    }

    artists(): Promise<Artist[]> {
        return this.user.artists();
    }

    neighbours(threshold?: number): Promise<SimilarUser[]> {
        return this.user.neighbours(threshold);
    }

    friends(): Promise<User[]> {
        return this.user.friends();
    }

    toJSON(): SimilarUserSnapshot {
        return {
            ...this.user.toJSON(),
            match: this.match,
            relatedTo: this.relatedTo.name,
        };
    }
}
