export {
  SchemaWireError,
  SerializationError,
  SchemaNotFoundError,
  UnregisteredTypeError,
  UnknownTypeTagError,
  MalformedStreamError,
  InvalidValueError,
  RegistrationError,
  IdentifierConflictError,
  FieldAliasConflictError,
  TypeTagConflictError,
  InvalidIdentifierError,
  FileAccessError,
} from "./errors";
