import { Observable, Subject, Subscription, merge } from 'rxjs'
import { distinctUntilChanged, map, skip } from 'rxjs/operators'
import { SchemaError } from './errors'
import { handleFormError } from './error-handler'
import type { FormErrorHandler } from './error-handler'
import { FieldState, isStateOf } from './field-state'
import type { AnyFieldState } from './field-state'
import { MessageResolver } from './messages'
import type { FormMessages } from './messages'
import { resolveValidators } from './resolver'
import type { FieldId, FieldIds, FormSchema, InitialValues, SchemaShape } from './schema'
import type { FieldValueReader, Validator } from './validators'

// ---------------------------------------------------------------------------
// FormChange — what listeners receive
// ---------------------------------------------------------------------------

export type FormChange =
  | { readonly type: 'updateValue'; readonly field: string }
  | { readonly type: 'setError'; readonly field: string }
  | { readonly type: 'clearForcedErrors' }
  | { readonly type: 'validate'; readonly valid: boolean }
  | { readonly type: 'validateField'; readonly field: string; readonly valid: boolean }
  | { readonly type: 'reset' }
  | { readonly type: 'save' }
  | { readonly type: 'messages' }

export type FormListener = (change: FormChange) => void

// ---------------------------------------------------------------------------
// FormController
// ---------------------------------------------------------------------------

export interface FormControllerOptions<S extends SchemaShape> {
  /** Per-field values that override the schema's initial values. */
  initialValues?: InitialValues<S>
  /**
   * A message table, or a shared MessageResolver so several forms switch
   * language together. Defaults to the English table.
   */
  messages?: FormMessages | MessageResolver
  /**
   * Receives listener, binding and async-check failures. Defaults to the
   * handler set with `setFormErrorHandler`.
   */
  onError?: FormErrorHandler
}

export interface FormController<S extends SchemaShape> extends FieldValueReader {
  readonly schema: FormSchema<S>
  readonly fields: FieldIds<S>
  readonly messages: MessageResolver
  /** Hot stream of change notifications. Does not replay. */
  readonly changes$: Observable<FormChange>
  /** True when any mounted field has been edited by the user. */
  readonly hasBeenInteracted: boolean
  /** True when any mounted field's value differs from its initial value. */
  readonly hasChanged: boolean

  /** Get-or-create the state handle of a field; always the same object per field. */
  fieldHandle<T>(id: FieldId<T>): FieldState<T>
  getValue<T>(id: FieldId<T>): T | null
  getInitialValue<T>(id: FieldId<T>): T | null
  updateValue<T>(id: FieldId<T>, value: T | null, notify?: boolean): T | null
  /** The forced error if one is set, else the last validation error, else null. */
  getFieldError<T>(id: FieldId<T>): string | null
  getForcedError<T>(id: FieldId<T>): string | null
  /** Inject an error from outside the validator chain; `null` removes it. Last write wins. */
  setError<T>(id: FieldId<T>, message: string | null, notify?: boolean): void
  hasFieldError<T>(id: FieldId<T>): boolean
  validators<T>(id: FieldId<T>): ReadonlyArray<Validator<T>> | null
  /** The field's resolved, localized validation function, reading cross-fields from this form. */
  validator<T>(id: FieldId<T>): (value: T | null) => string | null
  validate(notify?: boolean, clearForcedErrors?: boolean): boolean
  clearForcedErrors(notify?: boolean): void
  reset(): void
  validateField<T>(id: FieldId<T>): boolean
  /** True when every given field is mounted and has been edited by the user. */
  isDirty(ids: Iterable<FieldId<unknown>>): boolean
  isAllDirty(): boolean
  getValues(): Map<FieldId<unknown>, unknown>
  save(): Map<FieldId<unknown>, unknown>
  setMessages(messages: FormMessages): void
  /** Error text of one field, emitted whenever it may have changed. */
  fieldError$<T>(id: FieldId<T>): Observable<string | null>
  addListener(listener: FormListener): Subscription
  /** Hands a failure to this form's `onError`. */
  reportError(error: unknown, context: string): void
  destroy(): void
}

// ---------------------------------------------------------------------------
// createFormController
// ---------------------------------------------------------------------------

/**
 * createFormController(schema, options?)
 *
 * The runtime object behind one rendered form. Fields are mounted lazily by
 * their bindings; values written before that are cached and picked up on
 * mount.
 *
 * @example
 *   const form = createFormController(signUp, { initialValues: { email: 'a@b.co' } })
 *   const { email, password } = form.fields
 *
 *   form.fieldHandle(email).mount()
 *   form.fieldHandle(email).didChange('')
 *   form.validate()              // false
 *   form.getFieldError(email)    // 'Required'
 */
export function createFormController<S extends SchemaShape>(
  schema: FormSchema<S>,
  options?: FormControllerOptions<S>,
): FormController<S> {
  const ownsMessages = !(options?.messages instanceof MessageResolver)
  const messages =
    options?.messages instanceof MessageResolver ? options.messages : new MessageResolver(options?.messages)
  const onError = options?.onError ?? handleFormError

  const initialValues = new Map<string, unknown>()
  const cache = new Map<string, unknown>()
  const states = new Map<string, AnyFieldState>()
  const forcedErrors = new Map<string, string>()
  const changes = new Subject<FormChange>()

  for (const entry of schema.entries) {
    initialValues.set(entry.id.name, entry.initialValue)
  }
  const overrides: Array<[string, unknown]> = Object.entries(options?.initialValues ?? {})
  for (const [name, value] of overrides) {
    const entry = schema.entryByName(name)
    if (!entry) {
      throw new SchemaError(`Initial value given for undeclared field "${name}"`, name)
    }
    if (value === undefined) continue
    if (value !== null && !entry.id.accepts(value)) {
      throw new SchemaError(`Initial value of "${name}" is not a valid ${entry.id.kind}`, name)
    }
    initialValues.set(name, value)
  }
  for (const [name, value] of initialValues) cache.set(name, value)

  function assertDeclared(id: FieldId<unknown>): void {
    if (!schema.has(id)) {
      throw new SchemaError(`Field "${id.name}" is not declared in this form's schema`, id.name)
    }
  }

  function stateOf<T>(id: FieldId<T>): FieldState<T> | undefined {
    assertDeclared(id)
    const state = states.get(id.name)
    return state && isStateOf(state, id) ? state : undefined
  }

  function mountedStates(): AnyFieldState[] {
    return [...states.values()].filter((s) => s.mounted)
  }

  function cached<T>(id: FieldId<T>): T | null {
    const value = cache.get(id.name)
    return id.accepts(value) ? value : null
  }

  function getValue<T>(id: FieldId<T>): T | null {
    const state = stateOf(id)
    return state?.mounted ? state.value : cached(id)
  }

  function getInitialValue<T>(id: FieldId<T>): T | null {
    assertDeclared(id)
    const value = initialValues.get(id.name)
    return id.accepts(value) ? value : null
  }

  function notify(change: FormChange): void {
    changes.next(change)
  }

  const reader: FieldValueReader = {
    readField(name: string): unknown {
      const entry = schema.entryByName(name)
      if (!entry) throw new SchemaError(`Unknown field "${name}"`, name)
      return getValue(entry.id)
    },
  }

  const messagesSub = messages.messages$.pipe(skip(1)).subscribe(() => {
    states.forEach((s) => s.refresh())
    notify({ type: 'messages' })
  })

  function getFieldError<T>(id: FieldId<T>): string | null {
    const forced = forcedErrors.get(id.name)
    if (forced !== undefined) return messages.localize(forced, getValue(id))
    const state = stateOf(id)
    return state?.mounted ? state.error : null
  }

  function getValues(): Map<FieldId<unknown>, unknown> {
    return new Map(mountedStates().map((s): [FieldId<unknown>, unknown] => [s.id, s.value]))
  }

  function clearForcedErrors(notifyListeners = true): void {
    forcedErrors.clear()
    if (notifyListeners) notify({ type: 'clearForcedErrors' })
  }

  return {
    schema,
    fields: schema.fields,
    messages,
    changes$: changes.asObservable(),

    get hasBeenInteracted(): boolean {
      return mountedStates().some((s) => s.interacted)
    },

    get hasChanged(): boolean {
      return mountedStates().some((s) => s.hasChanged())
    },

    readField: reader.readField,

    fieldHandle<T>(id: FieldId<T>): FieldState<T> {
      const existing = stateOf(id)
      if (existing) return existing
      const entry = schema.entry(id)
      if (!entry) throw new SchemaError(`Field "${id.name}" is not declared in this form's schema`, id.name)
      const state = new FieldState<T>(id, entry.validators, getInitialValue(id), cached(id), {
        messages,
        form: reader,
      })
      states.set(id.name, state)
      return state
    },

    getValue,
    getInitialValue,

    updateValue<T>(id: FieldId<T>, value: T | null, notifyListeners = true): T | null {
      assertDeclared(id)
      cache.set(id.name, value)
      stateOf(id)?.setValue(value)
      if (notifyListeners) notify({ type: 'updateValue', field: id.name })
      return value
    },

    getFieldError,

    getForcedError<T>(id: FieldId<T>): string | null {
      assertDeclared(id)
      return forcedErrors.get(id.name) ?? null
    },

    setError<T>(id: FieldId<T>, message: string | null, notifyListeners = true): void {
      assertDeclared(id)
      if (message === null) forcedErrors.delete(id.name)
      else forcedErrors.set(id.name, message)
      if (notifyListeners) notify({ type: 'setError', field: id.name })
    },

    hasFieldError<T>(id: FieldId<T>): boolean {
      return getFieldError(id) !== null
    },

    validators<T>(id: FieldId<T>): ReadonlyArray<Validator<T>> | null {
      assertDeclared(id)
      const entry = schema.entry(id)
      return entry && entry.validators.length > 0 ? entry.validators : null
    },

    validator<T>(id: FieldId<T>): (value: T | null) => string | null {
      assertDeclared(id)
      const resolved = resolveValidators(schema.entry(id)?.validators, messages)
      return (value) => resolved(value, reader)
    },

    validate(notifyListeners = true, clearForced = true): boolean {
      if (clearForced) forcedErrors.clear()
      let valid = true
      for (const state of mountedStates()) {
        if (!state.validate()) valid = false
      }
      if (forcedErrors.size > 0) valid = false
      if (notifyListeners) notify({ type: 'validate', valid })
      return valid
    },

    clearForcedErrors,

    reset(): void {
      states.forEach((s) => s.reset())
      for (const [name, value] of initialValues) cache.set(name, value)
      forcedErrors.clear()
      notify({ type: 'reset' })
    },

    validateField<T>(id: FieldId<T>): boolean {
      const state = stateOf(id)
      const valid = state?.mounted ? state.validate() && !forcedErrors.has(id.name) : false
      notify({ type: 'validateField', field: id.name, valid })
      return valid
    },

    isDirty(ids: Iterable<FieldId<unknown>>): boolean {
      for (const id of ids) {
        const state = stateOf(id)
        if (!state?.mounted || !state.interacted) return false
      }
      return true
    },

    isAllDirty(): boolean {
      return mountedStates().every((s) => s.interacted)
    },

    getValues,

    save(): Map<FieldId<unknown>, unknown> {
      const values = getValues()
      notify({ type: 'save' })
      return values
    },

    setMessages(table: FormMessages): void {
      messages.use(table)
    },

    fieldError$<T>(id: FieldId<T>): Observable<string | null> {
      return merge(this.fieldHandle(id).state$, changes).pipe(
        map(() => getFieldError(id)),
        distinctUntilChanged(),
      )
    },

    addListener(listener: FormListener): Subscription {
      return changes.subscribe((change) => {
        try {
          listener(change)
        } catch (error) {
          onError(error, 'listener')
        }
      })
    },

    reportError(error: unknown, context: string): void {
      onError(error, context)
    },

    destroy(): void {
      messagesSub.unsubscribe()
      changes.complete()
      states.forEach((s) => s.complete())
      if (ownsMessages) messages.complete()
    },
  }
}
