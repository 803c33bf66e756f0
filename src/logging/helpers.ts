import * as Path from "path";
import * as FS from "fs";

import * as Colors from "colors/safe";

// Constants
// ===========================================================================

export const DEFAULT_TAB_SIZE = 4;
export const DEFAULT_COLORIZE = Colors.enabled;

// Types
// ===========================================================================

export type Color = (str: string) => string;
export type ColorMap = Record<string, Color>;

// Functions
// ===========================================================================

export function composeColors(...colors: Color[]): Color {
    return colors.reduce((f1, f2) => (str: string) => f2(f1(str)));
}

/**
 * Width of a column that fits `content`, rounded up to the next tab stop.
 */
export function colWidth(
    content: number | string | string[],
    tabSize: number = DEFAULT_TAB_SIZE
): number {
    let maxLength: number;
    if (typeof content === "number") {
        maxLength = content;
    } else if (typeof content === "string") {
        maxLength = content.length;
    } else {
        maxLength = content.reduce((max, str) => Math.max(max, str.length), 0);
    }
    return (Math.floor(maxLength / tabSize) + 1) * tabSize;
}

export function findPackageJSONPath(startDir: string): string {
    let lastDir: null | string = null;
    let currentDir: string = startDir;
    do {
        const path = Path.resolve(currentDir, "package.json");
        if (FS.existsSync(path) && FS.statSync(path).isFile()) {
            return path;
        }
        lastDir = currentDir;
        currentDir = Path.resolve(currentDir, "..");
    } while (currentDir !== lastDir);

    throw new Error(
        `Unable to find package.json in ${startDir} or its ancestors`
    );
}

export function findPackageName(startDir: string): string {
    const packageJSONPath = findPackageJSONPath(startDir);
    let packageJSON: unknown;
    try {
        packageJSON = JSON.parse(FS.readFileSync(packageJSONPath, "utf8"));
    } catch (error) {
        throw new Error(`Unable to read/parse ${packageJSONPath}: ${error}`);
    }
    if (
        typeof packageJSON !== "object" ||
        packageJSON === null ||
        !("name" in packageJSON)
    ) {
        throw new Error(
            `package.json file has no "name" property: ${packageJSONPath}`
        );
    }
    const name = packageJSON.name;
    if (typeof name !== "string") {
        throw new TypeError(
            `package.json file has non-string "name" property: ${packageJSONPath}`
        );
    }
    return name;
}
