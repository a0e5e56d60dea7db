/**
 * Base error for every failure raised by the engine.
 *
 * @example
 * ```ts
 * try {
 *   loader.deserialize(bytes, Player);
 * } catch (error) {
 *   if (error instanceof SerializationError) {
 *     // bad data
 *   } else if (error instanceof FileAccessError) {
 *     // bad storage
 *   }
 * }
 * ```
 */
export class SchemaWireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemaWireError";
    Object.setPrototypeOf(this, SchemaWireError.prototype);
  }
}

/**
 * Raised while encoding or decoding a value. Fatal to the current call.
 */
export class SerializationError extends SchemaWireError {
  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Thrown when a type has no Class Definition.
 */
export class SchemaNotFoundError extends SerializationError {
  constructor(public readonly typeName: string) {
    super(`No schema registered for type ${typeName}`);
    this.name = "SchemaNotFoundError";
    Object.setPrototypeOf(this, SchemaNotFoundError.prototype);
  }
}

/**
 * Thrown when no codec can be resolved for a value or target type.
 */
export class UnregisteredTypeError extends SerializationError {
  constructor(public readonly typeName: string) {
    super(`No serializer registered for type ${typeName}`);
    this.name = "UnregisteredTypeError";
    Object.setPrototypeOf(this, UnregisteredTypeError.prototype);
  }
}

/**
 * Thrown when a type tag read from a stream has no registered type.
 */
export class UnknownTypeTagError extends SerializationError {
  constructor(public readonly tag: number) {
    super(`Type tag ${tag} does not exist or is not registered`);
    this.name = "UnknownTypeTagError";
    Object.setPrototypeOf(this, UnknownTypeTagError.prototype);
  }
}

/**
 * Thrown when a stream is truncated or carries bytes no codec accepts.
 */
export class MalformedStreamError extends SerializationError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedStreamError";
    Object.setPrototypeOf(this, MalformedStreamError.prototype);
  }
}

/**
 * Thrown when a value does not fit the codec chosen for it,
 * e.g. a fractional number given to the int codec.
 */
export class InvalidValueError extends SerializationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidValueError";
    Object.setPrototypeOf(this, InvalidValueError.prototype);
  }
}

/**
 * Raised when mutating a registry. Always reported at registration time.
 */
export class RegistrationError extends SchemaWireError {
  constructor(message: string) {
    super(message);
    this.name = "RegistrationError";
    Object.setPrototypeOf(this, RegistrationError.prototype);
  }
}

/**
 * Thrown when an identifier is already bound to a different key.
 */
export class IdentifierConflictError extends RegistrationError {
  constructor(
    public readonly key: string,
    public readonly identifier: number,
    public readonly boundTo: string
  ) {
    super(`Identifier ${identifier} for ${key} is already bound to ${boundTo}`);
    this.name = "IdentifierConflictError";
    Object.setPrototypeOf(this, IdentifierConflictError.prototype);
  }
}

/**
 * Thrown when two fields of one Class Definition share an alias.
 */
export class FieldAliasConflictError extends IdentifierConflictError {
  constructor(key: string, identifier: number, boundTo: string) {
    super(key, identifier, boundTo);
    this.message = `Field alias ${identifier} for field ${key} is already bound to field ${boundTo}`;
    this.name = "FieldAliasConflictError";
    Object.setPrototypeOf(this, FieldAliasConflictError.prototype);
  }
}

/**
 * Thrown when an explicit type tag collides with an existing binding.
 */
export class TypeTagConflictError extends IdentifierConflictError {
  constructor(key: string, identifier: number, boundTo: string) {
    super(key, identifier, boundTo);
    this.message = `Type tag ${identifier} for type ${key} is already bound to type ${boundTo}`;
    this.name = "TypeTagConflictError";
    Object.setPrototypeOf(this, TypeTagConflictError.prototype);
  }
}

/**
 * Thrown when an identifier does not fit its wire width.
 */
export class InvalidIdentifierError extends RegistrationError {
  constructor(
    public readonly identifier: number,
    public readonly min: number,
    public readonly max: number
  ) {
    super(`Identifier ${identifier} must be an integer between ${min} and ${max}`);
    this.name = "InvalidIdentifierError";
    Object.setPrototypeOf(this, InvalidIdentifierError.prototype);
  }
}

/**
 * Raised by the file wrappers when storage cannot be read or written.
 */
export class FileAccessError extends SchemaWireError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(`${message}: ${path}`, { cause });
    this.name = "FileAccessError";
    Object.setPrototypeOf(this, FileAccessError.prototype);
  }
}
