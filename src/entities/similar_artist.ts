import Artist, { ArtistSnapshot } from "./artist";
import { Entity } from "./entity";
import Tag from "./tag";
import Track from "./track";

export interface SimilarArtistSnapshot extends ArtistSnapshot {
    match: number;
    relatedTo: string;
}

/**
 * An artist as found in another artist's similar-artists feed: the artist
 * itself plus how similar it is (`match`, 0-100) to `relatedTo`.
 *
 * Relationship calls go to the wrapped artist.
 */
export default class SimilarArtist implements Entity {
    readonly kind = "artist";

    constructor(
        public readonly artist: Artist,
        public readonly match: number,
        public readonly relatedTo: Artist
    ) {}

    get name(): string {
        return this.artist.name;
    }

    get mbid(): undefined | string {
        return this.artist.mbid;
    }

    get streamable(): undefined | boolean {
        return this.artist.streamable;
    }

    get pictureUrl(): undefined | string {
        return this.artist.pictureUrl;
    }

    resourceUrl(): string {
        return this.artist.resourceUrl();
    }

    tracks(): Promise<Track[]> {
        return this.artist.tracks();
    }

    tags(): Promise<Tag[]> {
        return this.artist.tags();
    }

    artists(threshold?: number): Promise<SimilarArtist[]> {
        return this.artist.similar(threshold);
    }

    similar(threshold?: number): Promise<SimilarArtist[]> {
        return this.artist.similar(threshold);
    }

    toJSON(): SimilarArtistSnapshot {
        return {
            ...this.artist.toJSON(),
            match: this.match,
            relatedTo: this.relatedTo.name,
        };
    }
}
