import * as Path from "path";

import * as Winston from "winston";
import { TransformableInfo } from "logform";

export type LogMeta = Record<string, unknown>;

export interface Named {
    name: string;
}

export interface Logger extends Winston.Logger {
    readonly id: LoggerId;

    /**
     * A logger for a member of whatever this logger covers (a class, a
     * method), with `defaultMeta` merged into every entry it writes.
     */
    childFor(obj: Named, defaultMeta?: LogMeta): Logger;
}

export function modulePathFor(filePath: string, runRoot: string): string {
    const relPath = Path.relative(runRoot, filePath);
    return Path.join(
        Path.dirname(relPath),
        Path.basename(relPath, Path.extname(relPath))
    );
}

/**
 * Identifies a logger as `<package>/<module path>.<member path>`, for example
 * `audioscrobbler-feeds/src/feed/fetcher.FeedFetcher.fetchFeed`.
 */
export class LoggerId {
    public static from(
        packageName: string,
        filePath: string,
        runRoot: string
    ): LoggerId {
        return new LoggerId(packageName, modulePathFor(filePath, runRoot));
    }

    constructor(
        public readonly packageName: string,
        public readonly modulePath: string,
        public readonly memberPath?: string
    ) {}

    child(name: string): LoggerId {
        const memberPath = this.memberPath ? `${this.memberPath}.${name}` : name;
        return new LoggerId(this.packageName, this.modulePath, memberPath);
    }

    toString(): string {
        const str = Path.join(this.packageName, this.modulePath);
        return this.memberPath === undefined
            ? str
            : `${str}.${this.memberPath}`;
    }

    toJSON(): Record<string, string> {
        const obj: Record<string, string> = {
            pkg: this.packageName,
            mod: this.modulePath,
        };
        if (this.memberPath !== undefined) {
            obj["member"] = this.memberPath;
        }
        return obj;
    }
}

function extendLogger(
    id: LoggerId,
    proto: Winston.Logger,
    defaultMeta?: LogMeta
): Logger {
    return Object.create(proto, {
        id: {
            value: id,
            enumerable: true,
            writable: false,
        },

        write: {
            value(info: TransformableInfo) {
                const infoClone = Object.assign(
                    { logger: id },
                    defaultMeta,
                    info
                );

                // Object.assign skips the inherited Error properties
                if (info instanceof Error) {
                    infoClone.stack = info.stack;
                    infoClone.message = info.message;
                }

                proto.write(infoClone);
            },
        },

        childFor: {
            value(this: Logger, obj: Named, meta?: LogMeta) {
                return extendLogger(id.child(obj.name), this, meta);
            },
        },
    });
}

export function createLogger(
    id: LoggerId,
    options: Winston.LoggerOptions
): Logger {
    return extendLogger(id, Winston.createLogger(options));
}
