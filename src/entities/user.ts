import {
    friendUsers,
    neighbourUsers,
    topArtists,
    topTags,
    topTracks,
} from "../feed/relationships";
import Artist from "./artist";
import { Entity, EntityContext, EntitySnapshot, identityFrom, resourceUrlFor } from "./entity";
import SimilarUser from "./similar_user";
import Tag from "./tag";
import Track from "./track";

export interface UserFields {
    name?: string;
    /** Accepted in place of `name`; the user feeds use it. */
    username?: string;
    url?: string;
    pictureUrl?: string;
}

export interface UserSnapshot extends EntitySnapshot {
    kind: "user";
    url?: string;
    pictureUrl?: string;
}

export default class User implements Entity {
    readonly kind = "user";
    readonly name: string;
    readonly url: undefined | string;
    readonly pictureUrl: undefined | string;

    constructor(
        private readonly _context: EntityContext,
        nameOrFields: string | UserFields
    ) {
        const fields: UserFields =
            typeof nameOrFields === "string"
                ? { name: nameOrFields }
                : nameOrFields;
        this.name = identityFrom("user", [fields.name, fields.username]);
        this.url = fields.url;
        this.pictureUrl = fields.pictureUrl;
    }

    resourceUrl(): string {
        return resourceUrlFor(this._context.config, this.kind, [this.name]);
    }

    /**
     * The user's most played tracks.
     */
    tracks(): Promise<Track[]> {
        return topTracks(this._context, this, this._context.config.user.tracks);
    }

    tags(): Promise<Tag[]> {
        return topTags(this._context, this, this._context.config.user.tags);
    }

    /**
     * The user's most played artists.
     */
    artists(): Promise<Artist[]> {
        return topArtists(this._context, this, this._context.config.user.artists);
    }

    /**
     * Users with a similar taste, best match first, leaving out those with a
     * `match` below `threshold` (default: the configured `filterThreshold`).
     */
    neighbours(threshold?: number): Promise<SimilarUser[]> {
        return neighbourUsers(
            this._context,
            this,
            this._context.config.user.neighbours,
            threshold ?? this._context.config.filterThreshold
        );
    }

    friends(): Promise<User[]> {
        return friendUsers(this._context, this, this._context.config.user.friends);
    }

    toJSON(): UserSnapshot {
        return {
            kind: this.kind,
            name: this.name,
            url: this.url,
            pictureUrl: this.pictureUrl,
        };
    }
}
