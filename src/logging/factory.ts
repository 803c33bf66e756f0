import * as Winston from "winston";

import { findPackageName } from "./helpers";
import { Logger, createLogger, LoggerId } from "./logger";

export interface FactoryKwds extends Winston.LoggerOptions {
    runRoot: string;
    packageName?: string;
}

/**
 * Hands out one logger per source file; repeated `get` calls for the same
 * file share it until it is closed.
 */
export default class Factory {
    public readonly runRoot: string;
    public readonly packageName: string;
    public readonly options: Winston.LoggerOptions;

    private readonly _loggers = new Map<string, Logger>();

    constructor({ runRoot, packageName, ...options }: FactoryKwds) {
        this.runRoot = runRoot;
        this.packageName = packageName || findPackageName(runRoot);
        this.options = options;
    }

    public mergeOptions(options: Winston.LoggerOptions): Winston.LoggerOptions {
        return {
            ...this.options,
            ...options,
            defaultMeta: {
                ...this.options.defaultMeta,
                ...options.defaultMeta,
            },
        };
    }

    /**
     * Changes the level of every logger handed out so far, and of those to
     * come.
     */
    public setLevel(level: string): void {
        this.options.level = level;
        for (const logger of this._loggers.values()) {
            logger.level = level;
        }
    }

    public get(filePath: string, options: Winston.LoggerOptions = {}): Logger {
        const id = LoggerId.from(this.packageName, filePath, this.runRoot);
        const key = String(id);
        const cached = this._loggers.get(key);
        if (cached !== undefined) {
            return cached;
        }
        const logger = createLogger(id, this.mergeOptions(options));
        logger.on("close", () => this._loggers.delete(key));
        this._loggers.set(key, logger);
        return logger;
    }
}
