import * as Path from "path";

import * as Winston from "winston";

import prettySimple from "./format/pretty_simple";
import Factory from "./factory";
import { Logger } from "./logger";

const RUN_ROOT = Path.resolve(__dirname, "..", "..");

export const DEFAULT_LEVEL = "info";

interface HasLogger {
    log: Logger;
}

export { Logger, HasLogger };

export default new Factory({
    runRoot: RUN_ROOT,
    level: process.env.AUDIOSCROBBLER_LOG_LEVEL || DEFAULT_LEVEL,
    silent: process.env.NODE_ENV === "test",
    transports: [
        new Winston.transports.Console({
            format: prettySimple({ colorize: true }),
        }),
    ],
});
