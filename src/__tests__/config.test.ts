import {
    DEFAULT_BASE_URL,
    DEFAULT_CONFIG,
    feedsOf,
    makeConfig,
    validateConfig,
} from "../config";
import { ConfigError } from "../errors";

describe("makeConfig", () => {
    it("returns the defaults when given no overrides", () => {
        const config = makeConfig();

        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
        expect(config.filterThreshold).toBe(1);
        expect(config.fallbackSortKey).toBe("count");
    });

    it("sorts each kind's feeds on the documented fields", () => {
        const config = makeConfig();

        expect(config.artist.tracks).toEqual({
            postfix: "toptracks.xml",
            sortKey: "reach",
        });
        expect(config.user.tracks.sortKey).toBe("playcount");
        expect(config.user.artists.sortKey).toBe("playcount");
        expect(config.user.tags.postfix).toBe("tags.xml");
        expect(config.user.friends.sortKey).toBeUndefined();
    });

    it("merges feed overrides field by field", () => {
        const config = makeConfig({ user: { tags: { sortKey: "weight" } } });

        expect(config.user.tags).toEqual({
            postfix: "tags.xml",
            sortKey: "weight",
        });
        expect(config.user.tracks).toEqual(DEFAULT_CONFIG.user.tracks);
    });

    it("keeps the default postfix when an override leaves it undefined", () => {
        const config = makeConfig({ user: { tags: { postfix: undefined } } });

        expect(config.user.tags.postfix).toBe("tags.xml");
        expect(config.user.tags.sortKey).toBe("count");
    });

    it("drops the sort key when an override sets it to undefined", () => {
        const config = makeConfig({ artist: { tracks: { sortKey: undefined } } });

        expect(config.artist.tracks.postfix).toBe("toptracks.xml");
        expect(config.artist.tracks.sortKey).toBeUndefined();
    });

    it("takes a segment override without touching the feeds", () => {
        const config = makeConfig({ artist: { segment: "band" } });

        expect(config.artist.segment).toBe("band");
        expect(config.artist.similar).toEqual(DEFAULT_CONFIG.artist.similar);
    });

    it("keeps an explicit zero threshold", () => {
        expect(makeConfig({ filterThreshold: 0 }).filterThreshold).toBe(0);
    });

    it.each([
        [{ baseUrl: "not a url" }, "Invalid baseUrl: not a url"],
        [
            { baseUrl: "ftp://feeds.test/" },
            "Expected an http(s) baseUrl, given ftp://feeds.test/",
        ],
        [{ filterThreshold: -1 }, "Expected filterThreshold ≥ 0, given -1"],
        [
            { filterThreshold: Number.NaN },
            "Expected filterThreshold ≥ 0, given NaN",
        ],
        [{ fallbackSortKey: "" }, "fallbackSortKey must not be empty"],
        [
            { tag: { segment: "a/b" } },
            'Expected tag.segment to be a single path segment, given "a/b"',
        ],
        [
            { track: { tags: { postfix: "" } } },
            "track.tags.postfix must be a non-empty string",
        ],
        [
            { user: { friends: { sortKey: "" } } },
            "user.friends.sortKey must be a non-empty string when set",
        ],
    ])("rejects %j", (overrides, message) => {
        expect(() => makeConfig(overrides)).toThrow(ConfigError);
        expect(() => makeConfig(overrides)).toThrow(message);
    });
});

describe("feedsOf", () => {
    it("labels all twelve feeds", () => {
        const labels = feedsOf(DEFAULT_CONFIG).map(([label]) => label);

        expect(labels).toHaveLength(12);
        expect(labels[0]).toBe("artist.tracks");
        expect(labels[11]).toBe("user.friends");
    });
});

describe("validateConfig", () => {
    it("returns a valid configuration unchanged", () => {
        expect(validateConfig(DEFAULT_CONFIG)).toBe(DEFAULT_CONFIG);
    });

    it("rejects a feed without a postfix", () => {
        const feed: { postfix: string; sortKey?: string } = {
            postfix: "tags.xml",
        };
        Reflect.deleteProperty(feed, "postfix");

        expect(() =>
            validateConfig({
                ...DEFAULT_CONFIG,
                user: { ...DEFAULT_CONFIG.user, tags: feed },
            })
        ).toThrow("user.tags.postfix must be a non-empty string");
    });

    it("reports the config_error code", () => {
        try {
            validateConfig({ ...DEFAULT_CONFIG, fallbackSortKey: "" });
            throw new Error("expected a ConfigError");
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            expect(error).toMatchObject({ code: "config_error" });
        }
    });
});
