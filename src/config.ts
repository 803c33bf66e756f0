import { ConfigError } from "./errors";

// Constants
// ===========================================================================

export const DEFAULT_BASE_URL = "http://ws.audioscrobbler.com/1.0/";

// Types
// ===========================================================================

export type EntityKind = "artist" | "track" | "tag" | "user";

export const ENTITY_KINDS: EntityKind[] = ["artist", "track", "tag", "user"];

/**
 * Where a feed lives relative to an entity's resource URL, and which record
 * field orders its results (descending). Without a `sortKey` the feed's own
 * order is kept.
 */
export interface FeedConfig {
    readonly postfix: string;
    readonly sortKey?: string;
}

export interface ArtistConfig {
    readonly segment: string;
    readonly tracks: FeedConfig;
    readonly tags: FeedConfig;
    readonly similar: FeedConfig;
}

export interface TrackConfig {
    readonly segment: string;
    readonly tags: FeedConfig;
    readonly artists: FeedConfig;
}

export interface TagConfig {
    readonly segment: string;
    readonly tracks: FeedConfig;
    readonly artists: FeedConfig;
}

export interface UserConfig {
    readonly segment: string;
    readonly tracks: FeedConfig;
    readonly tags: FeedConfig;
    readonly artists: FeedConfig;
    readonly neighbours: FeedConfig;
    readonly friends: FeedConfig;
}

export interface Config {
    readonly baseUrl: string;
    /** Default minimum `match` for the similar-artist and neighbour feeds. */
    readonly filterThreshold: number;
    /** Sort field used for records missing their feed's `sortKey`. */
    readonly fallbackSortKey: string;
    readonly artist: ArtistConfig;
    readonly track: TrackConfig;
    readonly tag: TagConfig;
    readonly user: UserConfig;
}

type KindOverrides<T> = {
    [K in keyof T]?: T[K] extends FeedConfig ? Partial<FeedConfig> : T[K];
};

export interface ConfigOverrides {
    baseUrl?: string;
    filterThreshold?: number;
    fallbackSortKey?: string;
    artist?: KindOverrides<ArtistConfig>;
    track?: KindOverrides<TrackConfig>;
    tag?: KindOverrides<TagConfig>;
    user?: KindOverrides<UserConfig>;
}

// Defaults
// ===========================================================================

export const DEFAULT_CONFIG: Config = {
    baseUrl: DEFAULT_BASE_URL,
    filterThreshold: 1,
    fallbackSortKey: "count",
    artist: {
        segment: "artist",
        tracks: { postfix: "toptracks.xml", sortKey: "reach" },
        tags: { postfix: "toptags.xml", sortKey: "count" },
        similar: { postfix: "similar.xml", sortKey: "match" },
    },
    track: {
        segment: "track",
        tags: { postfix: "toptags.xml", sortKey: "count" },
        artists: { postfix: "topartists.xml", sortKey: "count" },
    },
    tag: {
        segment: "tag",
        tracks: { postfix: "toptracks.xml", sortKey: "count" },
        artists: { postfix: "topartists.xml", sortKey: "count" },
    },
    user: {
        segment: "user",
        tracks: { postfix: "toptracks.xml", sortKey: "playcount" },
        tags: { postfix: "tags.xml", sortKey: "count" },
        artists: { postfix: "topartists.xml", sortKey: "playcount" },
        neighbours: { postfix: "neighbours.xml", sortKey: "match" },
        friends: { postfix: "friends.xml" },
    },
};

// Functions
// ===========================================================================

/**
 * An unset or `undefined` postfix keeps the default. `sortKey` may be set to
 * `undefined` on purpose: that keeps the feed's own order.
 */
function mergeFeed(
    defaults: FeedConfig,
    overrides: undefined | Partial<FeedConfig>
): FeedConfig {
    if (overrides === undefined) {
        return defaults;
    }
    return {
        postfix: overrides.postfix ?? defaults.postfix,
        sortKey: "sortKey" in overrides ? overrides.sortKey : defaults.sortKey,
    };
}

function check(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new ConfigError(message);
    }
}

/**
 * Every feed in `config`, labelled `<kind>.<feed>`.
 */
export function feedsOf(config: Config): Array<[string, FeedConfig]> {
    const { artist, track, tag, user } = config;
    return [
        ["artist.tracks", artist.tracks],
        ["artist.tags", artist.tags],
        ["artist.similar", artist.similar],
        ["track.tags", track.tags],
        ["track.artists", track.artists],
        ["tag.tracks", tag.tracks],
        ["tag.artists", tag.artists],
        ["user.tracks", user.tracks],
        ["user.tags", user.tags],
        ["user.artists", user.artists],
        ["user.neighbours", user.neighbours],
        ["user.friends", user.friends],
    ];
}

export function validateConfig(config: Config): Config {
    let url: URL;
    try {
        url = new URL(config.baseUrl);
    } catch (error) {
        throw new ConfigError(`Invalid baseUrl: ${config.baseUrl}`);
    }
    check(
        url.protocol === "http:" || url.protocol === "https:",
        `Expected an http(s) baseUrl, given ${config.baseUrl}`
    );
    check(
        Number.isFinite(config.filterThreshold) && config.filterThreshold >= 0,
        `Expected filterThreshold ≥ 0, given ${config.filterThreshold}`
    );
    check(config.fallbackSortKey !== "", "fallbackSortKey must not be empty");
    for (const kind of ENTITY_KINDS) {
        const segment = config[kind].segment;
        check(
            segment !== "" && !segment.includes("/"),
            `Expected ${kind}.segment to be a single path segment, given "${segment}"`
        );
    }
    for (const [label, feed] of feedsOf(config)) {
        check(
            typeof feed.postfix === "string" && feed.postfix !== "",
            `${label}.postfix must be a non-empty string`
        );
        check(
            feed.sortKey === undefined ||
                (typeof feed.sortKey === "string" && feed.sortKey !== ""),
            `${label}.sortKey must be a non-empty string when set`
        );
    }
    return config;
}

/**
 * Builds a validated configuration from {@link DEFAULT_CONFIG} and
 * `overrides`. Feed overrides merge field by field, so
 * `{ user: { tags: { sortKey: "weight" } } }` keeps the `tags.xml` postfix.
 */
export function makeConfig(overrides: ConfigOverrides = {}): Config {
    const d = DEFAULT_CONFIG;
    const { artist = {}, track = {}, tag = {}, user = {} } = overrides;
    return validateConfig({
        baseUrl: overrides.baseUrl ?? d.baseUrl,
        filterThreshold: overrides.filterThreshold ?? d.filterThreshold,
        fallbackSortKey: overrides.fallbackSortKey ?? d.fallbackSortKey,
        artist: {
            segment: artist.segment ?? d.artist.segment,
            tracks: mergeFeed(d.artist.tracks, artist.tracks),
            tags: mergeFeed(d.artist.tags, artist.tags),
            similar: mergeFeed(d.artist.similar, artist.similar),
        },
        track: {
            segment: track.segment ?? d.track.segment,
            tags: mergeFeed(d.track.tags, track.tags),
            artists: mergeFeed(d.track.artists, track.artists),
        },
        tag: {
            segment: tag.segment ?? d.tag.segment,
            tracks: mergeFeed(d.tag.tracks, tag.tracks),
            artists: mergeFeed(d.tag.artists, tag.artists),
        },
        user: {
            segment: user.segment ?? d.user.segment,
            tracks: mergeFeed(d.user.tracks, user.tracks),
            tags: mergeFeed(d.user.tags, user.tags),
            artists: mergeFeed(d.user.artists, user.artists),
            neighbours: mergeFeed(d.user.neighbours, user.neighbours),
            friends: mergeFeed(d.user.friends, user.friends),
        },
    });
}
