// Imports
// ===========================================================================
// Dependencies
// ---------------------------------------------------------------------------

import { Helpers } from "thingpedia";

// Package
// ---------------------------------------------------------------------------

import { FetchError } from "../errors";
import Logging, { HasLogger, Logger } from "../logging";

// Constants
// ===========================================================================

const LOG = Logging.get(__filename);

// Types
// ===========================================================================

/**
 * Fetches one URL and resolves its body. Rejects on a non-2xx status or a
 * connection failure; timeouts, redirects and the like are the
 * implementation's business.
 */
export interface Transport {
    get(url: string): Promise<string>;
}

// Class Definition
// ===========================================================================

export default class HttpTransport implements Transport, HasLogger {
    private static readonly LOG = LOG.childFor(HttpTransport);

    static readonly ACCEPT = "application/xml, text/xml;q=0.9, */*;q=0.1";

    get log(): Logger {
        return HttpTransport.LOG;
    }

    private failure(url: string, reason: unknown): FetchError {
        if (reason instanceof Helpers.Http.HTTPError) {
            return new FetchError(
                url,
                `HTTP ${reason.code} Error`,
                reason.code,
                reason
            );
        }
        const message = reason instanceof Error ? reason.message : String(reason);
        return new FetchError(url, `Request failed: ${message}`, undefined, reason);
    }

    async get(url: string): Promise<string> {
        const log = this.log.childFor(this.get, { url });
        const options: Helpers.Http.HTTPRequestOptions = {
            accept: HttpTransport.ACCEPT,
        };

        let body: string;
        const timer = log.startTimer();

        try {
            body = await Helpers.Http.request(url, "GET", null, options);
        } catch (reason: unknown) {
            const error = this.failure(url, reason);
            timer.done({ level: "http", status: error.status ?? 600 }); // 600 means ???
            throw error;
        }

        timer.done({ level: "http" });

        if (!body) {
            throw new FetchError(url, "Empty response body");
        }
        return body;
    }
}
