// Imports
// ===========================================================================

import { Entity } from "../entities/entity";
import {
    ConstructionError,
    DecodeError,
    FetchError,
    MappingError,
} from "../errors";
import Logging, { HasLogger, Logger } from "../logging";
import { DecodeOptions, FeedDecoder } from "./decoder";
import {
    asRecord,
    FeedMap,
    FeedNode,
    isFeedMap,
    isFeedSeq,
    numberOf,
    textOf,
} from "./nodes";
import { Transport } from "./transport";

// Constants
// ===========================================================================

const LOG = Logging.get(__filename);

/** Keyed-collection records carry their natural key in this field. */
export const KEY_ATTR = "name";

export const DEFAULT_FALLBACK_SORT_KEY = "count";

// Types
// ===========================================================================

/**
 * -   `keyed`: each record names itself (a name or title) in its
 *     {@link KEY_ATTR} field; that is its key, and the field is left out of
 *     the record handed to the mapper.
 * -   `list`: records are a sequence whose first item describes the entity
 *     the feed is about, and is dropped.
 *
 * Either way the records keep the document's order.
 */
export type FeedShape = "keyed" | "list";

/**
 * Turns one record into an entity. `key` is the record's natural key in a
 * keyed feed and its position (from 1) in a list feed.
 */
export type RecordMapper<T> = (record: FeedMap, key: string) => T;

export interface FeedRequest<T> {
    postfix: string;
    recordKey: string;
    shape: FeedShape;
    map: RecordMapper<T>;
    /** Orders results descending; omit to keep the feed's order. */
    sortKey?: string;
    /** List feeds only: drop records whose `match` is below this. */
    threshold?: number;
}

export interface FeedResult<T> {
    url: string;
    document: FeedMap;
    items: T[];
}

interface Candidate {
    key: string;
    record: FeedMap;
}

// Class Definition
// ===========================================================================

export default class FeedFetcher implements HasLogger {
    private static readonly LOG = LOG.childFor(FeedFetcher);

    public readonly transport: Transport;
    public readonly decoder: FeedDecoder;
    public readonly fallbackSortKey: string;

    constructor({
        transport,
        decoder,
        fallbackSortKey = DEFAULT_FALLBACK_SORT_KEY,
    }: {
        transport: Transport;
        decoder: FeedDecoder;
        fallbackSortKey?: string;
    }) {
        this.transport = transport;
        this.decoder = decoder;
        this.fallbackSortKey = fallbackSortKey;
    }

    get log(): Logger {
        return FeedFetcher.LOG;
    }

    feedUrl(entity: Entity, postfix: string): string {
        return `${entity.resourceUrl()}/${postfix}`;
    }

    /**
     * Fetches and decodes the feed at `url`. Whatever goes wrong comes out as
     * a {@link FetchError} or a {@link DecodeError} naming the URL.
     */
    async fetchDocument(url: string, options: DecodeOptions): Promise<FeedMap> {
        let body: string;
        try {
            body = await this.transport.get(url);
        } catch (reason: unknown) {
            if (reason instanceof FetchError) {
                throw reason;
            }
            const message =
                reason instanceof Error ? reason.message : String(reason);
            throw new FetchError(url, `Request failed: ${message}`, undefined, reason);
        }

        if (!body) {
            throw new FetchError(url, "Empty response body");
        }

        try {
            return this.decoder.decode(body, options);
        } catch (error: unknown) {
            throw DecodeError.from(error, url);
        }
    }

    /**
     * Fetches one feed of `entity` and maps its records: the header of a list
     * feed is dropped, low matches filtered out, the rest ordered and mapped.
     * Any record that fails to map fails the whole call.
     */
    async fetchFeed<T>(
        entity: Entity,
        request: FeedRequest<T>
    ): Promise<FeedResult<T>> {
        const url = this.feedUrl(entity, request.postfix);
        const log = this.log.childFor(this.fetchFeed, {
            url,
            shape: request.shape,
        });

        const document = await this.fetchDocument(url, {
            forceArray: [request.recordKey],
        });

        let candidates = this.candidatesOf(url, document, request);
        const found = candidates.length;

        const { threshold } = request;
        if (request.shape === "list" && threshold !== undefined) {
            candidates = candidates.filter(({ record }) => {
                const match = numberOf(record, "match");
                return match !== undefined && match >= threshold;
            });
        }

        if (request.sortKey !== undefined) {
            candidates = this.order(candidates, request.sortKey);
        }

        const items = candidates.map((candidate) =>
            this.mapCandidate(url, request.map, candidate)
        );

        log.debug("Mapped feed records.", { found, mapped: items.length });

        return { url, document, items };
    }

    fetch<T>(entity: Entity, request: FeedRequest<T>): Promise<T[]> {
        return this.fetchFeed(entity, request).then((result) => result.items);
    }

    // Helper Methods
    // -----------------------------------------------------------------------

    private candidatesOf(
        url: string,
        document: FeedMap,
        { recordKey, shape }: FeedRequest<unknown>
    ): Candidate[] {
        const node = document[recordKey];
        const candidates: Candidate[] = [];

        if (!isFeedSeq(node)) {
            return candidates;
        }

        if (shape === "keyed") {
            // A root attribute named like the records decodes as a bare
            // string ahead of them; it names no record.
            node.forEach((value, index) => {
                if (isFeedMap(value)) {
                    candidates.push(this.keyedCandidate(url, index + 1, value));
                }
            });
            return candidates;
        }

        // Item 0 is the entity the feed is about
        node.forEach((value, index) => {
            if (index > 0) {
                const key = String(index);
                candidates.push({ key, record: this.recordOf(url, key, value) });
            }
        });
        return candidates;
    }

    private keyedCandidate(
        url: string,
        position: number,
        value: FeedMap
    ): Candidate {
        const key = textOf(value, KEY_ATTR);
        if (key === undefined) {
            throw new MappingError(
                `Record ${position} has no ${KEY_ATTR}`,
                String(position),
                url
            );
        }
        const record = Object.fromEntries(
            Object.entries(value).filter(([field]) => field !== KEY_ATTR)
        );
        return { key, record };
    }

    private recordOf(url: string, key: string, value: FeedNode): FeedMap {
        const record = asRecord(value);
        if (record === undefined) {
            throw new MappingError(`Record '${key}' is not a record`, key, url);
        }
        return record;
    }

    /**
     * Descending by `sortKey`, or the fallback key where that is missing.
     * Records with neither go last, in feed order.
     */
    private order(candidates: Candidate[], sortKey: string): Candidate[] {
        const weighed = candidates.map((candidate) => ({
            candidate,
            weight:
                numberOf(candidate.record, sortKey) ??
                numberOf(candidate.record, this.fallbackSortKey),
        }));
        weighed.sort((a, b) => {
            if (a.weight === undefined) {
                return b.weight === undefined ? 0 : 1;
            }
            if (b.weight === undefined) {
                return -1;
            }
            return b.weight - a.weight;
        });
        return weighed.map(({ candidate }) => candidate);
    }

    private mapCandidate<T>(
        url: string,
        map: RecordMapper<T>,
        { key, record }: Candidate
    ): T {
        try {
            return map(record, key);
        } catch (error: unknown) {
            if (error instanceof MappingError) {
                throw error.url === undefined
                    ? new MappingError(error.message, error.recordKey, url, error.reason)
                    : error;
            }
            if (error instanceof ConstructionError) {
                throw new MappingError(
                    `Can't map record '${key}': ${error.message}`,
                    key,
                    url,
                    error
                );
            }
            throw error;
        }
    }
}
