export { default as Client, ClientKwds } from "./client";
export * from "./config";
export * from "./errors";

export { default as Artist, ArtistDetails, ArtistFields, ArtistSnapshot } from "./entities/artist";
export { Entity, EntityContext, EntitySnapshot } from "./entities/entity";
export { default as SimilarArtist, SimilarArtistSnapshot } from "./entities/similar_artist";
export { default as SimilarUser, SimilarUserSnapshot } from "./entities/similar_user";
export { default as Tag, TagFields, TagSnapshot } from "./entities/tag";
export { default as Track, TrackFields, TrackSnapshot } from "./entities/track";
export { default as User, UserFields, UserSnapshot } from "./entities/user";

export { default as XmlFeedDecoder, DecodeOptions, FeedDecoder } from "./feed/decoder";
export {
    default as FeedFetcher,
    FeedRequest,
    FeedResult,
    FeedShape,
    RecordMapper,
} from "./feed/fetcher";
export { FeedMap, FeedNode, FeedSeq } from "./feed/nodes";
export { default as HttpTransport, Transport } from "./feed/transport";
