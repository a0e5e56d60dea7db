export * from "./binary-codec";
export * from "./errors";
export * from "./identifier-registry";
