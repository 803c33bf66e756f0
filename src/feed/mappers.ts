// Record Mappers
// ===========================================================================
//
// One function per kind of feed record. Keyed-collection records get their
// name from their key; list records carry it themselves.
//

import Artist, { ArtistDetails, ArtistFields } from "../entities/artist";
import { Entity, EntityContext } from "../entities/entity";
import SimilarArtist from "../entities/similar_artist";
import SimilarUser from "../entities/similar_user";
import Tag from "../entities/tag";
import Track from "../entities/track";
import User from "../entities/user";
import { MappingError } from "../errors";
import {
    FeedMap,
    FeedNode,
    firstTextOf,
    flagOf,
    isFeedMap,
    numberOf,
    textOf,
} from "./nodes";

// Helpers
// ---------------------------------------------------------------------------

/**
 * The artist behind `entity`, when it is artist-typed.
 */
export function artistOf(entity: Entity): undefined | Artist {
    if (entity instanceof Artist) {
        return entity;
    }
    if (entity instanceof SimilarArtist) {
        return entity.artist;
    }
    return undefined;
}

/**
 * Artist details as a record spells them; the picture sits under `picture`
 * in some feeds and `image` in others.
 */
export function artistDetailsOf(
    record: FeedMap,
    pictureKey: "picture" | "image"
): ArtistDetails {
    return {
        mbid: textOf(record, "mbid"),
        streamable: flagOf(record, "streamable"),
        pictureUrl: textOf(record, pictureKey),
    };
}

function artistFieldsOf(node: FeedNode, key: string): ArtistFields {
    if (typeof node === "string") {
        return { name: node.trim() };
    }
    if (!isFeedMap(node)) {
        throw new MappingError(
            `Track '${key}' lists more than one artist`,
            key
        );
    }
    return {
        name: textOf(node, "name"),
        content: textOf(node, "content"),
        ...artistDetailsOf(node, "picture"),
    };
}

function matchOf(record: FeedMap, key: string): number {
    const match = numberOf(record, "match");
    if (match === undefined) {
        throw new MappingError(`Record '${key}' has no match score`, key);
    }
    return match;
}

// Keyed-Collection Mappers
// ---------------------------------------------------------------------------

export function mapArtist(
    context: EntityContext,
    record: FeedMap,
    key: string
): Artist {
    return new Artist(context, {
        name: key,
        ...artistDetailsOf(record, "picture"),
    });
}

/**
 * A track's artist comes from its own `artist` sub-record when there is one,
 * else from the entity whose feed it is, when that is an artist.
 */
export function mapTrack(
    context: EntityContext,
    owner: Entity,
    record: FeedMap,
    key: string
): Track {
    const node = record.artist;
    let artist: undefined | Artist;
    if (node !== undefined) {
        artist = new Artist(context, artistFieldsOf(node, key));
    } else {
        artist = artistOf(owner);
    }
    if (artist === undefined) {
        throw new MappingError(`Couldn't determine artist for track '${key}'`, key);
    }
    return new Track(context, {
        artist,
        name: key,
        mbid: textOf(record, "mbid"),
        url: textOf(record, "url"),
        streamable: flagOf(record, "streamable"),
    });
}

export function mapTag(
    context: EntityContext,
    record: FeedMap,
    key: string
): Tag {
    return new Tag(context, { name: key, url: textOf(record, "url") });
}

// List Mappers
// ---------------------------------------------------------------------------

export function mapSimilarArtist(
    context: EntityContext,
    relatedTo: Artist,
    record: FeedMap,
    key: string
): SimilarArtist {
    const artist = new Artist(context, {
        name: textOf(record, "name"),
        ...artistDetailsOf(record, "image"),
    });
    return new SimilarArtist(artist, matchOf(record, key), relatedTo);
}

/**
 * Friends are plain users; the feeds name them by `username`, sometimes by
 * `name`.
 */
export function mapUser(
    context: EntityContext,
    record: FeedMap,
    key: string
): User {
    return new User(context, {
        name: firstTextOf(record, ["username", "name"]),
        url: textOf(record, "url"),
        pictureUrl: textOf(record, "image"),
    });
}

export function mapSimilarUser(
    context: EntityContext,
    relatedTo: User,
    record: FeedMap,
    key: string
): SimilarUser {
    return new SimilarUser(
        mapUser(context, record, key),
        matchOf(record, key),
        relatedTo
    );
}
