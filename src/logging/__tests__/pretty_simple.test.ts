import { Writable } from "stream";

import { MESSAGE } from "triple-beam";
import * as Winston from "winston";

import Factory from "../factory";
import prettySimple from "../format/pretty_simple";
import Theme from "../format/theme";
import { LoggerId, modulePathFor } from "../logger";

const INDENT = " ".repeat(8);

describe("prettySimple", () => {
    const format = prettySimple({ colorize: false });

    it("renders header, message, duration and meta rows", () => {
        const info = format.transform({
            level: "http",
            message: "Fetched.",
            logger: new LoggerId("pkg", "src/feed/transport", "HttpTransport.get"),
            durationMs: 12,
            url: "http://feeds.test/1.0/artist/Cher/similar.xml",
        });

        expect(info[MESSAGE]).toBe(
            "HTTP    pkg/src/feed/transport.HttpTransport.get\n" +
                `${INDENT}Fetched.\n` +
                `${INDENT}⏱       12 ms\n` +
                `${INDENT}url http://feeds.test/1.0/artist/Cher/similar.xml\n`
        );
    });

    it("shows long durations in seconds", () => {
        expect(format.formatDuration({ level: "info", message: "", durationMs: 1500 })).toBe(
            `${INDENT}⏱      1.5 sec\n`
        );
    });

    it("leaves out empty blocks", () => {
        const info = format.transform({ level: "warn", message: "" });

        expect(info[MESSAGE]).toBe("WARN    \n");
    });

    it("indents every line of a multi-line meta value", () => {
        expect(
            format.formatMeta({ level: "info", message: "", detail: "one\ntwo" })
        ).toBe(`${INDENT}detail  one\n${INDENT}        two\n`);
    });
});

describe("Theme", () => {
    const brackets = (s: string) => `[${s}]`;

    it("applies the color mapped to a style", () => {
        const theme = new Theme({ "level.info": brackets }, { enabled: true });

        expect(theme.apply("INFO", "level.info")).toBe("[INFO]");
        expect(theme.apply("WARN", "level.warn")).toBe("WARN");
    });

    it("passes everything through when disabled", () => {
        const theme = new Theme({ "level.info": brackets }, { enabled: false });

        expect(theme.apply("INFO", "level.info")).toBe("INFO");
    });

    it("extends its map with overrides", () => {
        const theme = new Theme({}, { enabled: true }).extend(
            { "meta.name": brackets },
            {}
        );

        expect(theme.apply("url", "meta.name")).toBe("[url]");
    });
});

describe("LoggerId", () => {
    it("names a member of a module of a package", () => {
        const id = new LoggerId("pkg", "src/client").child("Client").child("artist");

        expect(String(id)).toBe("pkg/src/client.Client.artist");
        expect(id.toJSON()).toEqual({
            pkg: "pkg",
            mod: "src/client",
            member: "Client.artist",
        });
    });

    it("derives the module path from a file under the run root", () => {
        expect(modulePathFor("/srv/app/src/feed/fetcher.ts", "/srv/app")).toBe(
            "src/feed/fetcher"
        );
    });
});

describe("Factory", () => {
    function capture() {
        const chunks: string[] = [];
        const stream = new Writable({
            write(chunk: unknown, _encoding, callback) {
                chunks.push(String(chunk));
                callback();
            },
        });
        const factory = new Factory({
            runRoot: "/srv/app",
            packageName: "pkg",
            level: "debug",
            format: prettySimple({ colorize: false }),
            transports: [new Winston.transports.Stream({ stream })],
        });
        return { chunks, factory };
    }

    it("hands out one logger per file", () => {
        const { factory } = capture();

        const log = factory.get("/srv/app/src/client.ts");

        expect(factory.get("/srv/app/src/client.ts")).toBe(log);
        expect(String(log.id)).toBe("pkg/src/client");
    });

    it("changes the level of loggers given out before and after", () => {
        const { factory } = capture();
        const before = factory.get("/srv/app/src/client.ts");

        factory.setLevel("warn");

        expect(before.level).toBe("warn");
        expect(factory.get("/srv/app/src/config.ts").level).toBe("warn");
    });

    it("tags entries with the logger id and member meta", async () => {
        const { chunks, factory } = capture();
        const log = factory
            .get("/srv/app/src/feed/fetcher.ts")
            .childFor({ name: "FeedFetcher" }, { shape: "keyed" });

        log.info("Fetched.", { url: "http://feeds.test/x.xml" });
        await new Promise((resolve) => setImmediate(resolve));

        expect(chunks).toEqual([
            "INFO    pkg/src/feed/fetcher.FeedFetcher\n" +
                `${INDENT}Fetched.\n` +
                `${INDENT}shape   keyed\n` +
                `${INDENT}url     http://feeds.test/x.xml\n` +
                "\n",
        ]);
    });
});
