export type { DeserializeOptions, SerializeOptions, Serializer } from "./serializer";
export {
  BoolSerializer,
  BytesSerializer,
  FloatSerializer,
  IntSerializer,
  ListSerializer,
  MapSerializer,
  SetSerializer,
  StringSerializer,
  builtinSerializers,
} from "./builtin-serializers";
export { SchemaSerializer } from "./schema-serializer";
export { SerializerRegistry } from "./serializer-registry";
export type { SerializerRegistryOptions } from "./serializer-registry";
