import { FakeTransport, makeContext, xml } from "../../__tests__/helpers/feeds";
import { MappingError, UnsupportedRelationshipError } from "../../errors";
import Tag from "../tag";

const DISCO = "http://feeds.test/1.0/tag/disco";

describe("Tag", () => {
    it("builds its resource URL from its name", () => {
        const tag = new Tag(makeContext(new FakeTransport()), "hip hop");

        expect(tag.resourceUrl()).toBe("http://feeds.test/1.0/tag/hip%20hop");
        expect(tag.title).toBe("hip hop");
    });

    it("has no related tags and asks nothing of the service", async () => {
        const transport = new FakeTransport();
        const tag = new Tag(makeContext(transport), "disco");

        await expect(tag.tags()).rejects.toBeInstanceOf(
            UnsupportedRelationshipError
        );
        expect(transport.calls).toEqual([]);
    });

    it("lists top tracks with the artist each names", async () => {
        const transport = new FakeTransport().serve(
            `${DISCO}/toptracks.xml`,
            xml(`<toptracks tag="disco">
                <track>
                    <name>Believe</name>
                    <count>10</count>
                    <artist><name>Cher</name><mbid>a-1</mbid></artist>
                </track>
                <track>
                    <name>Le Freak</name>
                    <count>30</count>
                    <artist>Chic</artist>
                </track>
            </toptracks>`)
        );

        const tracks = await new Tag(makeContext(transport), "disco").tracks();

        expect(tracks.map((track) => track.toJSON())).toEqual([
            { kind: "track", name: "Le Freak", artist: "Chic" },
            { kind: "track", name: "Believe", artist: "Cher" },
        ]);
        expect(tracks[1].artist.mbid).toBe("a-1");
        expect(tracks[1].resourceUrl()).toBe(
            "http://feeds.test/1.0/track/Cher/Believe"
        );
    });

    it("fails the whole call when a track has no artist", async () => {
        const transport = new FakeTransport().serve(
            `${DISCO}/toptracks.xml`,
            xml(`<toptracks tag="disco">
                <track><name>Believe</name><artist>Cher</artist></track>
                <track><name>Orphan</name></track>
            </toptracks>`)
        );

        const error: unknown = await new Tag(makeContext(transport), "disco")
            .tracks()
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(MappingError);
        expect(error).toMatchObject({
            message: "Couldn't determine artist for track 'Orphan'",
            recordKey: "Orphan",
            url: `${DISCO}/toptracks.xml`,
        });
    });

    it("fails the whole call when a track names two artists", async () => {
        const transport = new FakeTransport().serve(
            `${DISCO}/toptracks.xml`,
            xml(`<toptracks tag="disco">
                <track>
                    <name>Duet</name>
                    <artist><name>Cher</name></artist>
                    <artist><name>Chic</name></artist>
                </track>
            </toptracks>`)
        );

        await expect(
            new Tag(makeContext(transport), "disco").tracks()
        ).rejects.toMatchObject({
            code: "mapping_error",
            message: "Track 'Duet' lists more than one artist",
            recordKey: "Duet",
            url: `${DISCO}/toptracks.xml`,
        });
    });

    it("lists top artists", async () => {
        const transport = new FakeTransport().serve(
            `${DISCO}/topartists.xml`,
            xml(`<topartists tag="disco">
                <artist><name>Chic</name><count>90</count></artist>
            </topartists>`)
        );

        const artists = await new Tag(makeContext(transport), "disco").artists();

        expect(artists.map((artist) => artist.name)).toEqual(["Chic"]);
    });
});
