import * as Repl from "repl";

import { Command, Option } from "commander";
import * as Winston from "winston";

import Client from "../../../src/client";
import { Entity } from "../../../src/entities/entity";
import Logging from "../../../src/logging";
import Factory from "../../../src/logging/factory";
import prettySimple from "../../../src/logging/format/pretty_simple";

// Constants
// ===========================================================================

const CONSOLE_TRANSPORT = new Winston.transports.Console({
    format: prettySimple({ colorize: true }),
});

const LOG_FACTORY = new Factory({
    runRoot: __dirname,
    packageName: "audioscrobbler-feeds-dev",
    level: "info",
    transports: [CONSOLE_TRANSPORT],
    handleExceptions: true,
});

const LOG = LOG_FACTORY.get(__filename);

const KINDS = ["artist", "track", "tag", "user"];

// Types
// ===========================================================================

type GlobalOptions = {
    baseUrl?: string;
    debug?: boolean;
};

type FetchOptions = {
    title?: string;
    threshold?: string;
};

// Functions
// ===========================================================================

function createClient(opts: GlobalOptions): Client {
    if (opts.debug) {
        Logging.setLevel("debug");
        LOG_FACTORY.setLevel("debug");
    }
    return new Client({
        config: opts.baseUrl === undefined ? {} : { baseUrl: opts.baseUrl },
    });
}

function dump(x: Entity | Entity[], message: string[] = []): void {
    if (Array.isArray(x)) {
        x.forEach((item, index) =>
            dump(item, [...message, `Item ${index + 1}`])
        );
    } else {
        LOG.info(message.join(" -- "), x.toJSON());
    }
}

function parseThreshold(value: undefined | string): undefined | number {
    if (value === undefined) {
        return undefined;
    }
    const threshold = Number(value);
    if (Number.isNaN(threshold)) {
        throw new Error(`Expected a number for --threshold, given ${value}`);
    }
    return threshold;
}

function related(
    client: Client,
    kind: string,
    name: string,
    relationship: string,
    opts: FetchOptions
): Promise<Entity[]> {
    const threshold = parseThreshold(opts.threshold);
    switch (kind) {
        case "artist": {
            const artist = client.artist(name);
            if (relationship === "tracks") return artist.tracks();
            if (relationship === "tags") return artist.tags();
            if (relationship === "similar" || relationship === "artists")
                return artist.similar(threshold);
            break;
        }
        case "track": {
            if (opts.title === undefined) {
                throw new Error("Tracks need --title");
            }
            const track = client.track(name, opts.title);
            if (relationship === "tracks") return track.tracks();
            if (relationship === "tags") return track.tags();
            if (relationship === "artists") return track.artists();
            break;
        }
        case "tag": {
            const tag = client.tag(name);
            if (relationship === "tracks") return tag.tracks();
            if (relationship === "tags") return tag.tags();
            if (relationship === "artists") return tag.artists();
            break;
        }
        case "user": {
            const user = client.user(name);
            if (relationship === "tracks") return user.tracks();
            if (relationship === "tags") return user.tags();
            if (relationship === "artists") return user.artists();
            if (relationship === "neighbours") return user.neighbours(threshold);
            if (relationship === "friends") return user.friends();
            break;
        }
    }
    throw new Error(`Unknown relationship for ${kind}: ${relationship}`);
}

function repl(opts: GlobalOptions) {
    const client = createClient(opts);
    const local = Repl.start("audioscrobbler-feeds> ");

    local.context.client = client;
    local.context.log = LOG;
    local.context.dump = dump;
}

function createProgram() {
    const program = new Command();

    program
        .option("-d, --debug", "Enable debug logging")
        .addOption(
            new Option("-b, --base-url <url>", "Service root URL").env(
                "AUDIOSCROBBLER_BASE_URL"
            )
        );

    program
        .command("repl")
        .description("Start a Node REPL session with a client in context")
        .action(() => repl(program.opts<GlobalOptions>()));

    program
        .command("fetch")
        .description("Fetch one relationship feed and dump the results")
        .addArgument(program.createArgument("<kind>").choices(KINDS))
        .argument("<name>", "Artist, tag or user name (a track's artist)")
        .argument("<relationship>", "tracks, tags, artists, similar, ...")
        .option("--title <title>", "Track title")
        .option("--threshold <match>", "Minimum match for similarity feeds")
        .action(
            async (
                kind: string,
                name: string,
                relationship: string,
                opts: FetchOptions
            ) => {
                const client = createClient(program.opts<GlobalOptions>());
                dump(await related(client, kind, name, relationship, opts), [
                    `${kind} ${name} ${relationship}`,
                ]);
            }
        );

    return program;
}

function main() {
    createProgram()
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            LOG.error("Failed --", error);
            process.exitCode = 1;
        });
}

// Execution Hook
// ===========================================================================

if (require.main === module) {
    main();
}
