import { inspect } from "util";

import { MESSAGE } from "triple-beam";
import { TransformableInfo } from "logform";

import { LoggerId } from "../logger";
import { colWidth, DEFAULT_COLORIZE, ColorMap } from "../helpers";
import Theme, { DEFAULT_THEME } from "./theme";

// Constants
// ===========================================================================

export const LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

const LEVEL_COL_WIDTH = colWidth(LEVELS);
const INDENT = " ".repeat(LEVEL_COL_WIDTH);

const BASE_OMIT = new Set(["level", "message", "durationMs", "logger"]);

// Types
// ===========================================================================

export type PrettySimpleOptions = {
    colorize?: boolean;
    depth?: null | number;
    omit?: Iterable<string>;
    theme?: Theme | ColorMap;
};

// Class
// ===========================================================================

/**
 * Multi-line console format:
 *
 *      HTTP    audioscrobbler-feeds/src/feed/transport.HttpTransport.get
 *              ⏱   152 ms
 *              url     http://ws.audioscrobbler.com/1.0/artist/Cher/similar.xml
 *
 * Header (level and logger id), then the message, the profiler duration and
 * one row per remaining meta property, each block optional.
 */
export class PrettySimple {
    public readonly colorize: boolean;
    public readonly depth: null | number;
    public readonly omit: Set<string>;
    public readonly theme: Theme;

    constructor({
        colorize = DEFAULT_COLORIZE,
        depth = null,
        omit = [],
        theme,
    }: PrettySimpleOptions = {}) {
        this.colorize = colorize;
        this.depth = depth;
        this.omit = new Set([...BASE_OMIT, ...omit]);
        this.theme =
            theme instanceof Theme
                ? theme
                : DEFAULT_THEME.extend(theme, { enabled: colorize });
    }

    get options(): PrettySimpleOptions {
        return { colorize: this.colorize, depth: this.depth, omit: this.omit };
    }

    private style(content: string, style: string): string {
        return this.theme.apply(content, style);
    }

    formatHeader(info: TransformableInfo): string {
        const level = this.style(
            info.level.toUpperCase().padEnd(LEVEL_COL_WIDTH),
            `level.${info.level}`
        );
        const id = info.logger;
        if (!(id instanceof LoggerId)) {
            return level + "\n";
        }
        const sep = (s: string) => this.style(s, "id.separator");
        let str =
            this.style(id.packageName, "id.package") +
            sep("/") +
            this.style(id.modulePath, "id.module");
        if (id.memberPath !== undefined) {
            str += sep(".") + this.style(id.memberPath, "id.member");
        }
        return level + str + "\n";
    }

    formatMessage(info: TransformableInfo): string {
        const message = info.message;
        if (typeof message !== "string" || message === "") {
            return "";
        }
        return (
            message
                .trim()
                .split("\n")
                .map((line) => INDENT + line)
                .join("\n") + "\n"
        );
    }

    formatDuration(info: TransformableInfo): string {
        const durationMs = info.durationMs;
        if (typeof durationMs !== "number") {
            return "";
        }
        const [amount, units] =
            durationMs > 1000 ? [durationMs / 1000, "sec"] : [durationMs, "ms"];
        return (
            INDENT +
            "⏱".padEnd(4) +
            this.style(String(amount).padStart(6), "duration.amount") +
            ` ${units}\n`
        );
    }

    formatMeta(info: TransformableInfo): string {
        const names = Object.keys(info)
            .filter((name) => !this.omit.has(name))
            .sort();
        if (names.length === 0) {
            return "";
        }
        const nameWidth = colWidth(names);
        const nameSpacer = " ".repeat(nameWidth);
        const lines: string[] = [];
        for (const name of names) {
            const value = info[name];
            const [first, ...rest] = (
                typeof value === "string"
                    ? value
                    : inspect(value, false, this.depth, this.colorize)
            )
                .trim()
                .split("\n");
            lines.push(
                INDENT + this.style(name.padEnd(nameWidth), "meta.name") + first
            );
            for (const line of rest) {
                lines.push(INDENT + nameSpacer + line);
            }
        }
        return lines.join("\n") + "\n";
    }

    transform(info: TransformableInfo): TransformableInfo {
        info[MESSAGE] =
            this.formatHeader(info) +
            this.formatMessage(info) +
            this.formatDuration(info) +
            this.formatMeta(info);
        return info;
    }
}

export default function prettySimple(opts: PrettySimpleOptions = {}) {
    return new PrettySimple(opts);
}
