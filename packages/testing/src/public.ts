import { Observable, Subscription } from 'rxjs'
import { FormErrorMessages } from '@formbind/forms'
import type { FieldId, FormController, FormMessages, SchemaShape } from '@formbind/forms'

// ---------------------------------------------------------------------------
// collectFrom — reduce test boilerplate for Observable assertions
// ---------------------------------------------------------------------------

/**
 * collectFrom(obs$)
 *
 * Subscribes to an Observable and collects all emitted values into an array.
 * Call `.subscription.unsubscribe()` when done.
 *
 * @example
 *   const result = collectFrom(form.fieldError$(form.fields.email))
 *   form.validate()
 *   expect(result.values).toEqual([null, 'Required'])
 *   result.subscription.unsubscribe()
 */
export function collectFrom<T>(obs$: Observable<T>): {
  values: T[]
  subscription: Subscription
} {
  const values: T[] = []
  const subscription = obs$.subscribe((v) => values.push(v))
  return { values, subscription }
}

// ---------------------------------------------------------------------------
// Field mounting and simulated input
// ---------------------------------------------------------------------------

/**
 * mountFields(form, ids?)
 *
 * Mounts the given fields, or every field of the schema, the way bindings do
 * on first render. Lets a test drive a controller without a DOM.
 */
export function mountFields<S extends SchemaShape>(form: FormController<S>, ids?: Iterable<FieldId<unknown>>): void {
  const targets = ids ?? form.schema.entries.map((e) => e.id)
  for (const id of targets) form.fieldHandle(id).mount()
}

export interface SimulateInputOptions {
  /** Follow the edit with a blur: mark as interacted and validate the field. */
  blur?: boolean
}

/**
 * simulateInput(form, id, value, options?)
 *
 * A user edit: mounts the field if needed, then calls `didChange`. Returns the
 * field's error afterwards.
 *
 * @example
 *   simulateInput(form, form.fields.email, 'nope', { blur: true })  // 'Invalid email address'
 */
export function simulateInput<S extends SchemaShape, T>(
  form: FormController<S>,
  id: FieldId<T>,
  value: T | null,
  options?: SimulateInputOptions,
): string | null {
  const field = form.fieldHandle(id)
  field.mount()
  field.didChange(value)
  if (options?.blur) {
    field.touch()
    form.validateField(id)
  }
  return form.getFieldError(id)
}

// ---------------------------------------------------------------------------
// RecordingMessages — a message table that records what it was asked
// ---------------------------------------------------------------------------

export interface MessageCall {
  method: keyof FormMessages
  args: unknown[]
}

export interface RecordingMessages extends FormMessages {
  /** Every call made to the table, in order. */
  readonly calls: MessageCall[]
}

/**
 * createRecordingMessages(codes?)
 *
 * English default messages that record every lookup. `codes` maps custom
 * error codes to the text `parseErrorCode` should return for them.
 *
 * @example
 *   const messages = createRecordingMessages({ email_taken: 'Already registered' })
 *   const form = createFormController(schema, { messages })
 *   form.setError(form.fields.email, 'email_taken')
 *   form.getFieldError(form.fields.email)   // 'Already registered'
 *   messages.calls                           // [{ method: 'parseErrorCode', args: ['email_taken', ''] }]
 */
export function createRecordingMessages(codes: Readonly<Record<string, string>> = {}): RecordingMessages {
  const calls: MessageCall[] = []
  const defaults = new FormErrorMessages()

  function record<A extends unknown[], R>(method: keyof FormMessages, fn: (...args: A) => R): (...args: A) => R {
    return (...args) => {
      calls.push({ method, args })
      return fn(...args)
    }
  }

  return {
    calls,
    required: record('required', () => defaults.required()),
    invalidEmail: record('invalidEmail', () => defaults.invalidEmail()),
    invalidPhone: record('invalidPhone', () => defaults.invalidPhone()),
    invalidPattern: record('invalidPattern', () => defaults.invalidPattern()),
    minLength: record('minLength', (length: number) => defaults.minLength(length)),
    maxLength: record('maxLength', (length: number) => defaults.maxLength(length)),
    minValue: record('minValue', (min: number) => defaults.minValue(min)),
    maxValue: record('maxValue', (max: number) => defaults.maxValue(max)),
    invalidFileFormat: record('invalidFileFormat', (allowed: ReadonlySet<string>) =>
      defaults.invalidFileFormat(allowed),
    ),
    dateBefore: record('dateBefore', (date: Date) => defaults.dateBefore(date)),
    dateAfter: record('dateAfter', (date: Date) => defaults.dateAfter(date)),
    minItems: record('minItems', (count: number) => defaults.minItems(count)),
    maxItems: record('maxItems', (count: number) => defaults.maxItems(count)),
    fieldDoesNotMatch: record('fieldDoesNotMatch', () => defaults.fieldDoesNotMatch()),
    fieldIsNotAfter: record('fieldIsNotAfter', () => defaults.fieldIsNotAfter()),
    parseErrorCode: record('parseErrorCode', (code: string, _value: unknown) =>
      Object.prototype.hasOwnProperty.call(codes, code) ? codes[code] : null,
    ),
  }
}
