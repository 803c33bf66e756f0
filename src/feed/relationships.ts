// Relationship Feeds
// ===========================================================================
//
// The feed requests entities share. Each pairs a feed's configuration with
// the record key and mapper that read it.
//

import { FeedConfig } from "../config";
import Artist from "../entities/artist";
import { Entity, EntityContext } from "../entities/entity";
import SimilarArtist from "../entities/similar_artist";
import SimilarUser from "../entities/similar_user";
import Tag from "../entities/tag";
import Track from "../entities/track";
import User from "../entities/user";
import { FeedResult } from "./fetcher";
import {
    mapArtist,
    mapSimilarArtist,
    mapSimilarUser,
    mapTag,
    mapTrack,
    mapUser,
} from "./mappers";

// Keyed-Collection Feeds
// ---------------------------------------------------------------------------

export function topTracks(
    context: EntityContext,
    owner: Entity,
    feed: FeedConfig
): Promise<Track[]> {
    return context.fetcher.fetch(owner, {
        ...feed,
        recordKey: "track",
        shape: "keyed",
        map: (record, key) => mapTrack(context, owner, record, key),
    });
}

export function topTags(
    context: EntityContext,
    owner: Entity,
    feed: FeedConfig
): Promise<Tag[]> {
    return context.fetcher.fetch(owner, {
        ...feed,
        recordKey: "tag",
        shape: "keyed",
        map: (record, key) => mapTag(context, record, key),
    });
}

export function topArtists(
    context: EntityContext,
    owner: Entity,
    feed: FeedConfig
): Promise<Artist[]> {
    return context.fetcher.fetch(owner, {
        ...feed,
        recordKey: "artist",
        shape: "keyed",
        map: (record, key) => mapArtist(context, record, key),
    });
}

// List Feeds
// ---------------------------------------------------------------------------

/**
 * Resolves the whole result: the caller also wants the document, which
 * describes `artist` itself.
 */
export function similarArtists(
    context: EntityContext,
    artist: Artist,
    feed: FeedConfig,
    threshold: number
): Promise<FeedResult<SimilarArtist>> {
    return context.fetcher.fetchFeed(artist, {
        ...feed,
        recordKey: "artist",
        shape: "list",
        threshold,
        map: (record, key) => mapSimilarArtist(context, artist, record, key),
    });
}

export function neighbourUsers(
    context: EntityContext,
    user: User,
    feed: FeedConfig,
    threshold: number
): Promise<SimilarUser[]> {
    return context.fetcher.fetch(user, {
        ...feed,
        recordKey: "user",
        shape: "list",
        threshold,
        map: (record, key) => mapSimilarUser(context, user, record, key),
    });
}

export function friendUsers(
    context: EntityContext,
    user: User,
    feed: FeedConfig
): Promise<User[]> {
    return context.fetcher.fetch(user, {
        ...feed,
        recordKey: "user",
        shape: "list",
        map: (record, key) => mapUser(context, record, key),
    });
}
