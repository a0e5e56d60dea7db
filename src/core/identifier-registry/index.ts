export { IdentifierRegistry, sequentialIdentifiers } from "./identifier-registry";
export type { IdentifierGenerator, IdentifierRegistryOptions } from "./identifier-registry";
