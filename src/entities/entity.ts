import { Config, EntityKind } from "../config";
import { ConstructionError } from "../errors";
import FeedFetcher from "../feed/fetcher";

/**
 * What every handle shares: a kind, a name and a resource URL that all of its
 * feed URLs hang off.
 */
export interface Entity {
    readonly kind: EntityKind;
    readonly name: string;
    resourceUrl(): string;
    toJSON(): EntitySnapshot;
}

export interface EntitySnapshot {
    kind: EntityKind;
    name: string;
}

/**
 * Shared by every entity a client hands out (and every entity those fetch).
 */
export interface EntityContext {
    readonly config: Config;
    readonly fetcher: FeedFetcher;
}

/**
 * `<baseUrl>/<segment>/<path...>`, each path part escaped on its own so a
 * `/` inside a name stays inside its segment.
 */
export function resourceUrlFor(
    config: Config,
    kind: EntityKind,
    path: readonly string[]
): string {
    const base = config.baseUrl.endsWith("/")
        ? config.baseUrl
        : `${config.baseUrl}/`;
    const escaped = path.map((part) => encodeURIComponent(part));
    return `${base}${config[kind].segment}/${escaped.join("/")}`;
}

/**
 * First non-empty candidate, else a {@link ConstructionError}.
 */
export function identityFrom(
    kind: EntityKind,
    candidates: ReadonlyArray<undefined | string>
): string {
    for (const candidate of candidates) {
        if (candidate !== undefined && candidate !== "") {
            return candidate;
        }
    }
    throw new ConstructionError(kind, `Can't create ${kind} without a name`);
}
