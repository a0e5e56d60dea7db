import {
  FieldAliasConflictError,
  IdentifierRegistry,
  RegistrationError,
  sequentialIdentifiers,
} from "../core";
import type { IdentifierGenerator } from "../core";
import { typeName } from "./types";
import type { AliasOverrides, FieldDeclarations, SchemaClass, TypeRef } from "./types";

/** First auto-generated field alias */
export const FIELD_ALIAS_BASE = 1;

/** Field aliases are written as a single byte */
export const FIELD_ALIAS_MAX = 0xff;

export interface FieldDefinition {
  readonly name: string;
  readonly type: TypeRef;
}

/**
 * Registered layout of one class: its fields in declaration order and the
 * alias registry mapping each field name to its one-byte wire token.
 *
 * Explicit aliases are bound before any auto-generated one is drawn, so
 * generated aliases never collide with overrides.
 */
export class ClassDefinition {
  readonly fields: ReadonlyArray<FieldDefinition>;
  readonly aliases: IdentifierRegistry<string>;
  private readonly byName: ReadonlyMap<string, FieldDefinition>;

  constructor(
    readonly type: SchemaClass,
    fields: FieldDeclarations,
    aliasOverrides: AliasOverrides = {},
    generator: IdentifierGenerator<string> = sequentialIdentifiers(FIELD_ALIAS_BASE)
  ) {
    this.fields = Object.entries(fields).map(([name, fieldType]) => ({ name, type: fieldType }));
    this.byName = new Map(this.fields.map((field) => [field.name, field]));
    this.aliases = new IdentifierRegistry<string>({
      generator,
      min: 0,
      max: FIELD_ALIAS_MAX,
      conflict: (key, identifier, boundTo) => new FieldAliasConflictError(key, identifier, boundTo),
    });

    for (const [name, alias] of Object.entries(aliasOverrides)) {
      if (!this.byName.has(name)) {
        throw new RegistrationError(
          `Cannot alias unknown field ${name} of ${typeName(type)}`
        );
      }
      this.aliases.put(name, alias);
    }

    for (const field of this.fields) {
      this.aliases.get(field.name);
    }
  }

  /** Number of fields a decoder reads for this type */
  get fieldCount(): number {
    return this.fields.length;
  }

  field(name: string): FieldDefinition | undefined {
    return this.byName.get(name);
  }

  aliasOf(name: string): number {
    if (!this.byName.has(name)) {
      throw new RegistrationError(`${typeName(this.type)} has no field ${name}`);
    }
    return this.aliases.get(name);
  }

  /** Resolves a wire token back to its field */
  fieldOf(alias: number): FieldDefinition | undefined {
    const name = this.aliases.getByIdentifier(alias);
    return name === undefined ? undefined : this.byName.get(name);
  }
}
