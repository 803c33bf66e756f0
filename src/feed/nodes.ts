// Types
// ===========================================================================
//
// The decoded shape of a feed document: element names become keys, repeated
// elements become sequences and every leaf is a string.
//

export type FeedNode = string | FeedSeq | FeedMap;

export interface FeedSeq extends ReadonlyArray<FeedNode> {}

export interface FeedMap {
    readonly [key: string]: FeedNode;
}

// Guards
// ===========================================================================

export function isFeedSeq(node: undefined | FeedNode): node is FeedSeq {
    return Array.isArray(node);
}

export function isFeedMap(node: undefined | FeedNode): node is FeedMap {
    return typeof node === "object" && !Array.isArray(node);
}

/**
 * Records are normally maps; a bare string record (an element holding only
 * text) is read as `{ content: <text> }`.
 */
export function asRecord(node: FeedNode): undefined | FeedMap {
    if (typeof node === "string") {
        return { content: node };
    }
    return isFeedMap(node) ? node : undefined;
}

// Scalar Accessors
// ===========================================================================

/**
 * The string at `record[key]`, or `undefined` when it is missing, empty or
 * not a string.
 */
export function textOf(record: FeedMap, key: string): undefined | string {
    const value = record[key];
    if (typeof value !== "string") {
        return undefined;
    }
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
}

export function numberOf(record: FeedMap, key: string): undefined | number {
    const text = textOf(record, key);
    if (text === undefined) {
        return undefined;
    }
    const value = Number(text);
    return Number.isNaN(value) ? undefined : value;
}

/**
 * Feeds flag things with `1` / `0`; `true` / `false` and `yes` / `no` are
 * read too.
 */
export function flagOf(record: FeedMap, key: string): undefined | boolean {
    const text = textOf(record, key);
    if (text === undefined) {
        return undefined;
    }
    switch (text.toLowerCase()) {
        case "1":
        case "true":
        case "yes":
            return true;
        case "0":
        case "false":
        case "no":
            return false;
        default:
            return undefined;
    }
}

/**
 * First of `keys` that holds text.
 */
export function firstTextOf(
    record: FeedMap,
    keys: readonly string[]
): undefined | string {
    for (const key of keys) {
        const text = textOf(record, key);
        if (text !== undefined) {
            return text;
        }
    }
    return undefined;
}
