import { blue, green, cyan, magenta, yellow, bold, italic, dim, red, gray, white } from "colors/safe";

import { composeColors, ColorMap, DEFAULT_COLORIZE } from "../helpers";

export interface ThemeOptions {
    enabled?: boolean;
}

/**
 * Maps dotted style names (`level.warn`, `id.module`, ...) to colors. Styles
 * missing from the map, and everything when disabled, pass through as-is.
 */
export default class Theme {
    public readonly map: ColorMap;
    public readonly enabled: boolean;

    constructor(map: ColorMap, { enabled = DEFAULT_COLORIZE }: ThemeOptions = {}) {
        this.map = map;
        this.enabled = enabled;
    }

    apply(content: string, style: string): string {
        const color = this.map[style];
        if (!this.enabled || color === undefined) {
            return content;
        }
        return color(content);
    }

    extend(overrides: undefined | ColorMap, options: ThemeOptions): Theme {
        return new Theme(
            { ...this.map, ...overrides },
            { enabled: this.enabled, ...options }
        );
    }
}

export const DEFAULT_THEME = new Theme({
    "id.package": composeColors(blue, dim),
    "id.module": composeColors(cyan, dim),
    "id.member": composeColors(green, dim),
    "id.separator": gray,

    "level.debug": green,
    "level.verbose": cyan,
    "level.http": magenta,
    "level.info": blue,
    "level.warn": composeColors(yellow, bold),
    "level.error": composeColors(red, bold),

    "meta.name": composeColors(blue, italic),

    "duration.amount": composeColors(white, bold),
});
