import { similarArtists, topTags, topTracks } from "../feed/relationships";
import { artistDetailsOf } from "../feed/mappers";
import { Entity, EntityContext, EntitySnapshot, identityFrom, resourceUrlFor } from "./entity";
import SimilarArtist from "./similar_artist";
import Tag from "./tag";
import Track from "./track";

export interface ArtistDetails {
    /** MusicBrainz ID. */
    mbid?: string;
    /** Whether the service has streamable content for the artist. */
    streamable?: boolean;
    pictureUrl?: string;
}

export interface ArtistFields extends ArtistDetails {
    name?: string;
    /** Element text, used as the name when `name` is missing. */
    content?: string;
}

export interface ArtistSnapshot extends EntitySnapshot, ArtistDetails {
    kind: "artist";
}

export default class Artist implements Entity {
    readonly kind = "artist";
    readonly name: string;

    private _mbid: undefined | string;
    private _streamable: undefined | boolean;
    private _pictureUrl: undefined | string;

    /**
     * Usually only called by {@link Client.artist} and the feed mappers; no
     * request is made.
     */
    constructor(
        private readonly _context: EntityContext,
        nameOrFields: string | ArtistFields
    ) {
        const fields: ArtistFields =
            typeof nameOrFields === "string"
                ? { name: nameOrFields }
                : nameOrFields;
        this.name = identityFrom("artist", [fields.name, fields.content]);
        this._mbid = fields.mbid;
        this._streamable = fields.streamable;
        this._pictureUrl = fields.pictureUrl;
    }

    get mbid(): undefined | string {
        return this._mbid;
    }

    get streamable(): undefined | boolean {
        return this._streamable;
    }

    get pictureUrl(): undefined | string {
        return this._pictureUrl;
    }

    /**
     * Fills in details that are still unset. A detail that already has a
     * value keeps it, whatever `details` says.
     */
    loadFields(details: ArtistDetails): void {
        if (this._mbid === undefined) {
            this._mbid = details.mbid;
        }
        if (this._streamable === undefined) {
            this._streamable = details.streamable;
        }
        if (this._pictureUrl === undefined) {
            this._pictureUrl = details.pictureUrl;
        }
    }

    resourceUrl(): string {
        return resourceUrlFor(this._context.config, this.kind, [this.name]);
    }

    /**
     * The artist's top tracks, most listeners first.
     */
    tracks(): Promise<Track[]> {
        return topTracks(this._context, this, this._context.config.artist.tracks);
    }

    tags(): Promise<Tag[]> {
        return topTags(this._context, this, this._context.config.artist.tags);
    }

    /**
     * Same as {@link similar}.
     */
    artists(threshold?: number): Promise<SimilarArtist[]> {
        return this.similar(threshold);
    }

    /**
     * Artists similar to this one, best match first. Those with a `match`
     * below `threshold` (default: the configured `filterThreshold`) are left
     * out.
     *
     * The feed also describes this artist; any of its details still unset
     * are filled in from it.
     */
    async similar(threshold?: number): Promise<SimilarArtist[]> {
        const { document, items } = await similarArtists(
            this._context,
            this,
            this._context.config.artist.similar,
            threshold ?? this._context.config.filterThreshold
        );
        this.loadFields(artistDetailsOf(document, "picture"));
        return items;
    }

    toJSON(): ArtistSnapshot {
        return {
            kind: this.kind,
            name: this.name,
            mbid: this._mbid,
            streamable: this._streamable,
            pictureUrl: this._pictureUrl,
        };
    }
}
