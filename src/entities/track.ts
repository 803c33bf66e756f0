import { UnsupportedRelationshipError } from "../errors";
import { topArtists, topTags } from "../feed/relationships";
import Artist from "./artist";
import { Entity, EntityContext, EntitySnapshot, identityFrom, resourceUrlFor } from "./entity";
import Tag from "./tag";

export interface TrackFields {
    artist: Artist;
    name?: string;
    /** Accepted in place of `name`. */
    title?: string;
    mbid?: string;
    url?: string;
    streamable?: boolean;
}

export interface TrackSnapshot extends EntitySnapshot {
    kind: "track";
    artist: string;
    mbid?: string;
    url?: string;
    streamable?: boolean;
}

export default class Track implements Entity {
    readonly kind = "track";
    readonly artist: Artist;
    readonly name: string;
    readonly mbid: undefined | string;
    readonly url: undefined | string;
    readonly streamable: undefined | boolean;

    constructor(context: EntityContext, artist: Artist, title: string);
    constructor(context: EntityContext, fields: TrackFields);
    constructor(
        private readonly _context: EntityContext,
        artistOrFields: Artist | TrackFields,
        title?: string
    ) {
        const fields: TrackFields =
            artistOrFields instanceof Artist
                ? { artist: artistOrFields, name: title }
                : artistOrFields;
        this.artist = fields.artist;
        this.name = identityFrom("track", [fields.name, fields.title]);
        this.mbid = fields.mbid;
        this.url = fields.url;
        this.streamable = fields.streamable;
    }

    get title(): string {
        return this.name;
    }

    resourceUrl(): string {
        return resourceUrlFor(this._context.config, this.kind, [
            this.artist.name,
            this.name,
        ]);
    }

    async tracks(): Promise<Track[]> {
        throw new UnsupportedRelationshipError(this.kind, "tracks");
    }

    tags(): Promise<Tag[]> {
        return topTags(this._context, this, this._context.config.track.tags);
    }

    artists(): Promise<Artist[]> {
        return topArtists(this._context, this, this._context.config.track.artists);
    }

    toJSON(): TrackSnapshot {
        return {
            kind: this.kind,
            name: this.name,
            artist: this.artist.name,
            mbid: this.mbid,
            url: this.url,
            streamable: this.streamable,
        };
    }
}
