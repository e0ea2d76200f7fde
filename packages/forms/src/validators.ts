import { SchemaError } from './errors'
import { isEmptyValue, sameValue } from './values'

// ---------------------------------------------------------------------------
// Rules — the tagged payload the message resolver switches on
// ---------------------------------------------------------------------------

export type FieldRule =
  | { readonly kind: 'required' }
  | { readonly kind: 'email' }
  | { readonly kind: 'phone' }
  | { readonly kind: 'pattern'; readonly pattern: RegExp }
  | { readonly kind: 'minLength'; readonly length: number }
  | { readonly kind: 'maxLength'; readonly length: number }
  | { readonly kind: 'minValue'; readonly min: number }
  | { readonly kind: 'maxValue'; readonly max: number }
  | { readonly kind: 'mimeType'; readonly mimeTypes: ReadonlySet<string> }
  | { readonly kind: 'isAfter'; readonly date: Date }
  | { readonly kind: 'isBefore'; readonly date: Date }
  | { readonly kind: 'minItems'; readonly count: number }
  | { readonly kind: 'maxItems'; readonly count: number }
  | { readonly kind: 'custom' }

export type CrossFieldRule = { readonly kind: 'matches' } | { readonly kind: 'dateAfterField' }

export type RuleKind = FieldRule['kind'] | CrossFieldRule['kind']

// ---------------------------------------------------------------------------
// Validator types
// ---------------------------------------------------------------------------

/** Read access to the other fields of a form, used by cross-field validators. */
export interface FieldValueReader {
  readField(field: string): unknown
}

interface ValidatorBase {
  /** Stable identifier of why the validator failed, independent of language. */
  readonly errorCode: string
  /** Inline message; when set it is shown verbatim instead of the message table. */
  readonly message: string | null
}

export interface FieldValidator<T> extends ValidatorBase {
  readonly scope: 'field'
  readonly rule: FieldRule
  /** Returns `null` on pass, otherwise the error code or the inline message. */
  validate(value: T | null): string | null
}

export interface CrossFieldValidator<T> extends ValidatorBase {
  readonly scope: 'cross'
  readonly rule: CrossFieldRule
  /** Name of the field this validator compares against. */
  readonly field: string
  validate(value: T | null, form: FieldValueReader): string | null
}

export type Validator<T> = FieldValidator<T> | CrossFieldValidator<T>

/** Minimal file shape; a DOM `File` satisfies it. `type` is the media type. */
export interface FileLike {
  readonly name: string
  readonly type: string
}

// ---------------------------------------------------------------------------
// Internal builders
// ---------------------------------------------------------------------------

const EMAIL_PATTERN = /^[\w.-]+@([\w-]+\.)+[\w-]{2,4}$/
const PHONE_PATTERN = /^\+?[0-9]{9,14}$/

function fieldValidator<T>(
  rule: FieldRule,
  errorCode: string,
  message: string | undefined,
  isInvalid: (value: T | null) => boolean,
): FieldValidator<T> {
  const failure = message ?? errorCode
  return Object.freeze({
    scope: 'field' as const,
    rule,
    errorCode,
    message: message ?? null,
    validate(value: T | null): string | null {
      return isInvalid(value) ? failure : null
    },
  })
}

/** Strings that are null or empty are left to `required`. */
function isBlank(value: string | null): value is null | '' {
  return value === null || value === ''
}

/** Strip the stateful `g`/`y` flags so `test()` stays pure. */
function statelessPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '')
  return flags === pattern.flags ? pattern : new RegExp(pattern.source, flags)
}

function toDate(input: Date | string, factory: string): Date {
  const date = input instanceof Date ? new Date(input.getTime()) : new Date(input)
  if (Number.isNaN(date.getTime())) {
    throw new SchemaError(`${factory}() received an invalid date: ${String(input)}`)
  }
  return date
}

function assertCount(count: number, factory: string): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new SchemaError(`${factory}() expects a non-negative integer, got ${count}`)
  }
}

// ---------------------------------------------------------------------------
// Built-in field validators
// ---------------------------------------------------------------------------

/** Fails on an empty value (see `isEmptyValue`). */
export function required<T>(message?: string): FieldValidator<T> {
  return fieldValidator<T>({ kind: 'required' }, 'required', message, isEmptyValue)
}

export function email(message?: string): FieldValidator<string> {
  return fieldValidator<string>({ kind: 'email' }, 'invalid_email', message, (v) =>
    isBlank(v) ? false : !EMAIL_PATTERN.test(v),
  )
}

/** 9 to 14 digits with an optional leading `+`. */
export function phone(message?: string): FieldValidator<string> {
  return fieldValidator<string>({ kind: 'phone' }, 'invalid_phone', message, (v) =>
    isBlank(v) ? false : !PHONE_PATTERN.test(v),
  )
}

export function pattern(regex: RegExp, message?: string): FieldValidator<string> {
  const re = statelessPattern(regex)
  return fieldValidator<string>({ kind: 'pattern', pattern: re }, 'invalid_pattern', message, (v) =>
    isBlank(v) ? false : !re.test(v),
  )
}

export function minLength(length: number, message?: string): FieldValidator<string> {
  assertCount(length, 'minLength')
  return fieldValidator<string>({ kind: 'minLength', length }, 'min_length', message, (v) =>
    isBlank(v) ? false : v.length < length,
  )
}

export function maxLength(length: number, message?: string): FieldValidator<string> {
  assertCount(length, 'maxLength')
  return fieldValidator<string>({ kind: 'maxLength', length }, 'max_length', message, (v) =>
    isBlank(v) ? false : v.length > length,
  )
}

export function minValue(min: number, message?: string): FieldValidator<number> {
  return fieldValidator<number>({ kind: 'minValue', min }, 'min_value', message, (v) =>
    v === null ? false : v < min,
  )
}

export function maxValue(max: number, message?: string): FieldValidator<number> {
  return fieldValidator<number>({ kind: 'maxValue', max }, 'max_value', message, (v) =>
    v === null ? false : v > max,
  )
}

export function mimeType(allowed: Iterable<string>, message?: string): FieldValidator<FileLike> {
  const mimeTypes: ReadonlySet<string> = new Set(allowed)
  return fieldValidator<FileLike>({ kind: 'mimeType', mimeTypes }, 'invalid_file_format', message, (file) =>
    file === null ? false : !mimeTypes.has(file.type),
  )
}

/** Fails for dates earlier than `date`; the bound itself passes. */
export function isAfter(date: Date | string, message?: string): FieldValidator<Date> {
  const bound = toDate(date, 'isAfter')
  return fieldValidator<Date>({ kind: 'isAfter', date: bound }, 'date_after', message, (v) =>
    v === null ? false : v.getTime() < bound.getTime(),
  )
}

/** Fails for dates later than `date`; the bound itself passes. */
export function isBefore(date: Date | string, message?: string): FieldValidator<Date> {
  const bound = toDate(date, 'isBefore')
  return fieldValidator<Date>({ kind: 'isBefore', date: bound }, 'date_before', message, (v) =>
    v === null ? false : v.getTime() > bound.getTime(),
  )
}

export function minItems(count: number, message?: string): FieldValidator<ReadonlyArray<unknown>> {
  assertCount(count, 'minItems')
  return fieldValidator<ReadonlyArray<unknown>>({ kind: 'minItems', count }, 'min_items', message, (v) =>
    v === null ? false : v.length < count,
  )
}

export function maxItems(count: number, message?: string): FieldValidator<ReadonlyArray<unknown>> {
  assertCount(count, 'maxItems')
  return fieldValidator<ReadonlyArray<unknown>>({ kind: 'maxItems', count }, 'max_items', message, (v) =>
    v === null ? false : v.length > count,
  )
}

// ---------------------------------------------------------------------------
// Custom validators
// ---------------------------------------------------------------------------

export interface CustomValidatorOptions<T> {
  /** Code handed to `FormMessages.parseErrorCode` when no message is given. */
  readonly errorCode: string
  readonly message?: string
  /** Returns true when the value is acceptable. Must be pure and synchronous. */
  readonly test: (value: T | null) => boolean
}

/**
 * defineValidator({ errorCode, test, message? })
 *
 * @example
 *   const noAdmin = defineValidator<string>({
 *     errorCode: 'reserved_name',
 *     test: (v) => v !== 'admin',
 *   })
 */
export function defineValidator<T>(options: CustomValidatorOptions<T>): FieldValidator<T> {
  if (options.errorCode.length === 0) {
    throw new SchemaError('defineValidator() requires a non-empty errorCode')
  }
  const { test } = options
  return fieldValidator<T>({ kind: 'custom' }, options.errorCode, options.message, (v) => !test(v))
}

// ---------------------------------------------------------------------------
// Cross-field validators
// ---------------------------------------------------------------------------

/** Fails when the value differs from the current value of `field`. */
export function matches<T>(field: string, message?: string): CrossFieldValidator<T> {
  const errorCode = 'field_does_not_match'
  return Object.freeze({
    scope: 'cross' as const,
    rule: { kind: 'matches' as const },
    field,
    errorCode,
    message: message ?? null,
    validate(value: T | null, form: FieldValueReader): string | null {
      return sameValue(value, form.readField(field)) ? null : (message ?? errorCode)
    },
  })
}

/**
 * Fails when the date is earlier than the date currently held by `field`.
 * An equal date passes; either side being null passes.
 */
export function dateAfter(field: string, message?: string): CrossFieldValidator<Date> {
  const errorCode = 'date_after'
  return Object.freeze({
    scope: 'cross' as const,
    rule: { kind: 'dateAfterField' as const },
    field,
    errorCode,
    message: message ?? null,
    validate(value: Date | null, form: FieldValueReader): string | null {
      if (value === null) return null
      const other = form.readField(field)
      if (other === null || other === undefined) return null
      if (!(other instanceof Date)) {
        throw new SchemaError(`dateAfter() expects "${field}" to hold a Date`, field)
      }
      return value.getTime() < other.getTime() ? (message ?? errorCode) : null
    },
  })
}
