import { ConfigOverrides, makeConfig } from "../../config";
import { EntityContext } from "../../entities/entity";
import { FetchError } from "../../errors";
import XmlFeedDecoder from "../../feed/decoder";
import FeedFetcher from "../../feed/fetcher";
import { Transport } from "../../feed/transport";

export const BASE = "http://feeds.test/1.0/";

/**
 * Serves canned bodies by URL and records every request. Unknown URLs fail
 * the way a 404 does.
 */
export class FakeTransport implements Transport {
    readonly calls: string[] = [];

    constructor(private readonly bodies: Record<string, string> = {}) {}

    serve(url: string, body: string): this {
        this.bodies[url] = body;
        return this;
    }

    async get(url: string): Promise<string> {
        this.calls.push(url);
        const body = this.bodies[url];
        if (body === undefined) {
            throw new FetchError(url, "HTTP 404 Error", 404);
        }
        return body;
    }
}

export function makeContext(
    transport: Transport,
    overrides: ConfigOverrides = {}
): EntityContext {
    const config = makeConfig({ baseUrl: BASE, ...overrides });
    const fetcher = new FeedFetcher({
        transport,
        decoder: new XmlFeedDecoder(),
        fallbackSortKey: config.fallbackSortKey,
    });
    return { config, fetcher };
}

export function xml(body: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
}
