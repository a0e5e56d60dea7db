/**
 * Schema Wire
 *
 * Schema-driven binary serialization, including:
 * - Compact identifier registries for field aliases and type tags
 * - Class Definitions declared by hand, by static `schema` or with defineSchema
 * - Built-in codecs for bool, int, float, str, bytes, set, map and list
 * - Pluggable per-type serializers with a schema-driven fallback
 * - A Loader that dispatches encode/decode and reads/writes files
 */

// Core utilities: byte codec, errors, identifier registries
export * from "./core";

// Type references and schema registries
export * from "./schema";

// Serializer contract and built-in codecs
export * from "./serializers";

// Process-wide registration API
export * from "./registration";

// Dispatch engine
export * from "./loader";
