import { UnsupportedRelationshipError } from "../errors";
import { topArtists, topTracks } from "../feed/relationships";
import Artist from "./artist";
import { Entity, EntityContext, EntitySnapshot, identityFrom, resourceUrlFor } from "./entity";
import Track from "./track";

export interface TagFields {
    name?: string;
    url?: string;
}

export interface TagSnapshot extends EntitySnapshot {
    kind: "tag";
    url?: string;
}

export default class Tag implements Entity {
    readonly kind = "tag";
    readonly name: string;
    readonly url: undefined | string;

    constructor(
        private readonly _context: EntityContext,
        nameOrFields: string | TagFields
    ) {
        const fields: TagFields =
            typeof nameOrFields === "string"
                ? { name: nameOrFields }
                : nameOrFields;
        this.name = identityFrom("tag", [fields.name]);
        this.url = fields.url;
    }

    get title(): string {
        return this.name;
    }

    resourceUrl(): string {
        return resourceUrlFor(this._context.config, this.kind, [this.name]);
    }

    /**
     * Tracks most tagged with this tag.
     */
    tracks(): Promise<Track[]> {
        return topTracks(this._context, this, this._context.config.tag.tracks);
    }

    async tags(): Promise<Tag[]> {
        throw new UnsupportedRelationshipError(this.kind, "tags");
    }

    artists(): Promise<Artist[]> {
        return topArtists(this._context, this, this._context.config.tag.artists);
    }

    toJSON(): TagSnapshot {
        return { kind: this.kind, name: this.name, url: this.url };
    }
}
