export { Loader } from "./loader";
export type { ByteSource, LoaderConfig, TaggedDeserializeOptions } from "./loader";
