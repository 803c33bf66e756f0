// Imports
// ===========================================================================

import { Config, ConfigOverrides, makeConfig } from "./config";
import Artist from "./entities/artist";
import { EntityContext } from "./entities/entity";
import Tag from "./entities/tag";
import Track from "./entities/track";
import User from "./entities/user";
import XmlFeedDecoder, { FeedDecoder } from "./feed/decoder";
import FeedFetcher from "./feed/fetcher";
import HttpTransport, { Transport } from "./feed/transport";
import Logging, { HasLogger, Logger } from "./logging";

// Constants
// ===========================================================================

const LOG = Logging.get(__filename);

// Types
// ===========================================================================

export interface ClientKwds {
    /** Merged over the defaults; see {@link makeConfig}. */
    config?: ConfigOverrides;
    transport?: Transport;
    decoder?: FeedDecoder;
}

// Class Definition
// ===========================================================================

/**
 * Entry point: hands out artist, track, tag and user handles. Handing one out
 * makes no request, so it says nothing about whether the service knows the
 * name; requests happen when a handle's relationship methods are called.
 *
 *      const client = new Client();
 *      const similar = await client.artist("Nina Simone").similar(20);
 *      for (const artist of similar) {
 *          console.log(artist.name, artist.match);
 *      }
 */
export default class Client implements HasLogger {
    private static readonly LOG = LOG.childFor(Client);

    public readonly config: Config;
    public readonly fetcher: FeedFetcher;

    protected readonly _context: EntityContext;

    constructor({
        config = {},
        transport = new HttpTransport(),
        decoder = new XmlFeedDecoder(),
    }: ClientKwds = {}) {
        this.config = makeConfig(config);
        this.fetcher = new FeedFetcher({
            transport,
            decoder,
            fallbackSortKey: this.config.fallbackSortKey,
        });
        this._context = { config: this.config, fetcher: this.fetcher };
        this.log.debug("Constructed.", { baseUrl: this.config.baseUrl });
    }

    get log(): Logger {
        return Client.LOG;
    }

    artist(name: string): Artist {
        return new Artist(this._context, name);
    }

    /**
     * @param artist The artist's name, or an artist handle (used as-is).
     */
    track(artist: string | Artist, title: string): Track {
        const owner = typeof artist === "string" ? this.artist(artist) : artist;
        return new Track(this._context, owner, title);
    }

    tag(name: string): Tag {
        return new Tag(this._context, name);
    }

    user(name: string): User {
        return new User(this._context, name);
    }
}
