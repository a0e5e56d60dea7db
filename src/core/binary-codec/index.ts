export { BinaryPrimitives, ByteReader, ByteWriter } from "./binary-codec";
export type { Field } from "./binary-codec";
