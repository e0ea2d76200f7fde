import { SchemaError } from './errors'
import {
  dateAfter,
  defineValidator,
  email,
  isAfter,
  isBefore,
  matches,
  maxItems,
  maxLength,
  maxValue,
  mimeType,
  minItems,
  minLength,
  minValue,
  pattern,
  phone,
  required,
} from './validators'
import type { FileLike, Validator } from './validators'

// ---------------------------------------------------------------------------
// FieldSpec — what a builder hands to defineSchema
// ---------------------------------------------------------------------------

export type FieldKind = 'string' | 'number' | 'boolean' | 'date' | 'list' | 'file' | 'custom'

export interface FieldSpec<T> {
  readonly kind: FieldKind
  readonly initial: T | null
  readonly validators: ReadonlyArray<Validator<T>>
  /** Runtime check that a value belongs to this field's value type. */
  accepts(value: unknown): value is T
}

// ---------------------------------------------------------------------------
// FieldBuilder — shared rules; every call returns a new builder
// ---------------------------------------------------------------------------

abstract class FieldBuilder<T, Self extends FieldBuilder<T, Self>> implements FieldSpec<T> {
  abstract readonly kind: FieldKind

  constructor(
    readonly initial: T | null,
    readonly validators: ReadonlyArray<Validator<T>> = [],
  ) {}

  protected abstract create(validators: ReadonlyArray<Validator<T>>): Self

  abstract accepts(value: unknown): value is T

  /** Append validators, in order. */
  use(...validators: Validator<T>[]): Self {
    return this.create([...this.validators, ...validators])
  }

  required(message?: string): Self {
    return this.use(required<T>(message))
  }

  /** Must equal the current value of another field of the same schema. */
  matches(field: string, message?: string): Self {
    return this.use(matches<T>(field, message))
  }

  refine(test: (value: T | null) => boolean, errorCode = 'invalid', message?: string): Self {
    return this.use(defineValidator<T>({ errorCode, message, test }))
  }
}

export class StringFieldBuilder extends FieldBuilder<string, StringFieldBuilder> {
  readonly kind = 'string' as const

  protected create(validators: ReadonlyArray<Validator<string>>): StringFieldBuilder {
    return new StringFieldBuilder(this.initial, validators)
  }

  accepts(value: unknown): value is string {
    return typeof value === 'string'
  }

  email(message?: string): StringFieldBuilder {
    return this.use(email(message))
  }

  phone(message?: string): StringFieldBuilder {
    return this.use(phone(message))
  }

  pattern(regex: RegExp, message?: string): StringFieldBuilder {
    return this.use(pattern(regex, message))
  }

  minLength(length: number, message?: string): StringFieldBuilder {
    return this.use(minLength(length, message))
  }

  maxLength(length: number, message?: string): StringFieldBuilder {
    return this.use(maxLength(length, message))
  }

  /** Alias of `minLength`. */
  min(length: number, message?: string): StringFieldBuilder {
    return this.minLength(length, message)
  }

  /** Alias of `maxLength`. */
  max(length: number, message?: string): StringFieldBuilder {
    return this.maxLength(length, message)
  }
}

export class NumberFieldBuilder extends FieldBuilder<number, NumberFieldBuilder> {
  readonly kind = 'number' as const

  protected create(validators: ReadonlyArray<Validator<number>>): NumberFieldBuilder {
    return new NumberFieldBuilder(this.initial, validators)
  }

  accepts(value: unknown): value is number {
    return typeof value === 'number'
  }

  min(min: number, message?: string): NumberFieldBuilder {
    return this.use(minValue(min, message))
  }

  max(max: number, message?: string): NumberFieldBuilder {
    return this.use(maxValue(max, message))
  }
}

export class BooleanFieldBuilder extends FieldBuilder<boolean, BooleanFieldBuilder> {
  readonly kind = 'boolean' as const

  protected create(validators: ReadonlyArray<Validator<boolean>>): BooleanFieldBuilder {
    return new BooleanFieldBuilder(this.initial, validators)
  }

  accepts(value: unknown): value is boolean {
    return typeof value === 'boolean'
  }
}

export class DateFieldBuilder extends FieldBuilder<Date, DateFieldBuilder> {
  readonly kind = 'date' as const

  protected create(validators: ReadonlyArray<Validator<Date>>): DateFieldBuilder {
    return new DateFieldBuilder(this.initial, validators)
  }

  accepts(value: unknown): value is Date {
    return value instanceof Date
  }

  isAfter(date: Date | string, message?: string): DateFieldBuilder {
    return this.use(isAfter(date, message))
  }

  isBefore(date: Date | string, message?: string): DateFieldBuilder {
    return this.use(isBefore(date, message))
  }

  /** Must not be earlier than the date held by another field. */
  after(field: string, message?: string): DateFieldBuilder {
    return this.use(dateAfter(field, message))
  }
}

export class ListFieldBuilder<E> extends FieldBuilder<E[], ListFieldBuilder<E>> {
  readonly kind = 'list' as const

  protected create(validators: ReadonlyArray<Validator<E[]>>): ListFieldBuilder<E> {
    return new ListFieldBuilder<E>(this.initial, validators)
  }

  accepts(value: unknown): value is E[] {
    return Array.isArray(value)
  }

  minItems(count: number, message?: string): ListFieldBuilder<E> {
    return this.use(minItems(count, message))
  }

  maxItems(count: number, message?: string): ListFieldBuilder<E> {
    return this.use(maxItems(count, message))
  }
}

export class FileFieldBuilder extends FieldBuilder<FileLike, FileFieldBuilder> {
  readonly kind = 'file' as const

  protected create(validators: ReadonlyArray<Validator<FileLike>>): FileFieldBuilder {
    return new FileFieldBuilder(this.initial, validators)
  }

  accepts(value: unknown): value is FileLike {
    return (
      typeof value === 'object' &&
      value !== null &&
      'name' in value &&
      'type' in value &&
      typeof value.name === 'string' &&
      typeof value.type === 'string'
    )
  }

  mimeType(allowed: Iterable<string>, message?: string): FileFieldBuilder {
    return this.use(mimeType(allowed, message))
  }
}

export class CustomFieldBuilder<T> extends FieldBuilder<T, CustomFieldBuilder<T>> {
  readonly kind = 'custom' as const

  constructor(
    private readonly guard: (value: unknown) => value is T,
    initial: T | null,
    validators: ReadonlyArray<Validator<T>> = [],
  ) {
    super(initial, validators)
  }

  protected create(validators: ReadonlyArray<Validator<T>>): CustomFieldBuilder<T> {
    return new CustomFieldBuilder(this.guard, this.initial, validators)
  }

  accepts(value: unknown): value is T {
    return this.guard(value)
  }
}

// ---------------------------------------------------------------------------
// s — fluent field builder namespace
// ---------------------------------------------------------------------------

export const s = {
  string(initial: string | null = ''): StringFieldBuilder {
    return new StringFieldBuilder(initial)
  },
  number(initial: number | null = null): NumberFieldBuilder {
    return new NumberFieldBuilder(initial)
  },
  boolean(initial: boolean | null = false): BooleanFieldBuilder {
    return new BooleanFieldBuilder(initial)
  },
  date(initial: Date | null = null): DateFieldBuilder {
    return new DateFieldBuilder(initial)
  },
  list<E>(initial: E[] | null = null): ListFieldBuilder<E> {
    return new ListFieldBuilder<E>(initial)
  },
  file(initial: FileLike | null = null): FileFieldBuilder {
    return new FileFieldBuilder(initial)
  },
  /** Any other value type; `guard` is the runtime type check for it. */
  custom<T>(guard: (value: unknown) => value is T, initial: T | null = null): CustomFieldBuilder<T> {
    return new CustomFieldBuilder(guard, initial)
  },
}

// ---------------------------------------------------------------------------
// FieldId — typed, immutable handle naming one field of one schema
// ---------------------------------------------------------------------------

export class FieldId<T> {
  constructor(
    readonly name: string,
    readonly kind: FieldKind,
    private readonly guard: (value: unknown) => value is T,
  ) {
    Object.freeze(this)
  }

  accepts(value: unknown): value is T {
    return this.guard(value)
  }

  toString(): string {
    return this.name
  }
}

// ---------------------------------------------------------------------------
// Schema types
// ---------------------------------------------------------------------------

export type SchemaShape = Record<string, FieldSpec<unknown>>

export type FieldValue<F> = F extends FieldSpec<infer T> ? T : never

export type FieldIds<S extends SchemaShape> = {
  readonly [K in keyof S]: FieldId<FieldValue<S[K]>>
}

export type FormValues<S extends SchemaShape> = {
  [K in keyof S]: FieldValue<S[K]> | null
}

export type InitialValues<S extends SchemaShape> = {
  readonly [K in keyof S]?: FieldValue<S[K]> | null
}

export interface FieldSchemaEntry<T> {
  readonly id: FieldId<T>
  readonly validators: ReadonlyArray<Validator<T>>
  readonly initialValue: T | null
}

export interface FormSchema<S extends SchemaShape> {
  /** One id per declared field: `schema.fields.email`. */
  readonly fields: FieldIds<S>
  readonly entries: ReadonlyArray<FieldSchemaEntry<unknown>>
  entry<T>(id: FieldId<T>): FieldSchemaEntry<T> | undefined
  entryByName(name: string): FieldSchemaEntry<unknown> | undefined
  has(id: FieldId<unknown>): boolean
}

// ---------------------------------------------------------------------------
// defineSchema
// ---------------------------------------------------------------------------

function compatibleKinds(a: FieldKind, b: FieldKind): boolean {
  return a === b || a === 'custom' || b === 'custom'
}

function assertCrossFieldTargets(shape: SchemaShape): void {
  for (const name of Object.keys(shape)) {
    const spec = shape[name]
    for (const validator of spec.validators) {
      if (validator.scope !== 'cross') continue
      const target = shape[validator.field]
      if (!target) {
        throw new SchemaError(
          `Field "${name}" has a cross-field validator referencing unknown field "${validator.field}"`,
          name,
        )
      }
      if (validator.rule.kind === 'matches' && !compatibleKinds(spec.kind, target.kind)) {
        throw new SchemaError(
          `Field "${name}" (${spec.kind}) cannot match "${validator.field}" (${target.kind})`,
          name,
        )
      }
      if (validator.rule.kind === 'dateAfterField' && !compatibleKinds(target.kind, 'date')) {
        throw new SchemaError(
          `Field "${name}" compares against "${validator.field}", which is ${target.kind}, not date`,
          name,
        )
      }
    }
  }
}

/**
 * defineSchema(shape)
 *
 * Fixes the set of fields, their validator chains and initial values, and
 * creates one FieldId per field. Authoring mistakes throw `SchemaError` here
 * rather than at validation time.
 *
 * @example
 *   const signUp = defineSchema({
 *     email: s.string().required().email(),
 *     password: s.string().required().minLength(8),
 *     confirmPassword: s.string().required().matches('password'),
 *   })
 *
 *   signUp.fields.email   // FieldId<string>
 */
export function defineSchema<S extends SchemaShape>(shape: S): FormSchema<S> {
  assertCrossFieldTargets(shape)

  const ids: Record<string, FieldId<unknown>> = {}
  const entries: FieldSchemaEntry<unknown>[] = []

  for (const name of Object.keys(shape)) {
    const spec = shape[name]
    if (spec.initial !== null && !spec.accepts(spec.initial)) {
      throw new SchemaError(`Initial value of "${name}" is not a valid ${spec.kind}`, name)
    }
    const id = new FieldId<unknown>(name, spec.kind, (value): value is unknown => spec.accepts(value))
    ids[name] = id
    entries.push(Object.freeze({ id, validators: Object.freeze([...spec.validators]), initialValue: spec.initial }))
  }

  const byName = new Map(entries.map((e) => [e.id.name, e]))

  return Object.freeze({
    fields: Object.freeze(ids) as FieldIds<S>,
    entries: Object.freeze(entries),
    entry<T>(id: FieldId<T>): FieldSchemaEntry<T> | undefined {
      return entries.find((e): e is FieldSchemaEntry<T> => e.id === id)
    },
    entryByName(name: string): FieldSchemaEntry<unknown> | undefined {
      return byName.get(name)
    },
    has(id: FieldId<unknown>): boolean {
      return byName.get(id.name)?.id === id
    },
  })
}
