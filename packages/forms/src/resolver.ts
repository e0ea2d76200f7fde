import type { MessageResolver } from './messages'
import type { FieldValueReader, Validator } from './validators'

// ---------------------------------------------------------------------------
// Chain evaluation
// ---------------------------------------------------------------------------

/** The first validator that rejected a value, and what its predicate returned. */
export interface ValidationFailure<T> {
  readonly validator: Validator<T>
  readonly output: string
  readonly value: T | null
}

export type ResolvedValidator<T> = (value: T | null, form: FieldValueReader) => string | null

const noFields: FieldValueReader = {
  readField: () => null,
}

/**
 * Run validators in declared order and stop at the first failure.
 * Validators after it are never called.
 */
export function evaluateValidators<T>(
  validators: ReadonlyArray<Validator<T>> | null | undefined,
  value: T | null,
  form: FieldValueReader = noFields,
): ValidationFailure<T> | null {
  if (!validators) return null
  for (const validator of validators) {
    const output =
      validator.scope === 'field' ? validator.validate(value) : validator.validate(value, form)
    if (output !== null) return { validator, output, value }
  }
  return null
}

/**
 * Turn a failure into display text. A predicate output that differs from the
 * validator's error code is an inline message and is returned verbatim; the
 * code itself goes through the message table.
 */
export function describeFailure<T>(failure: ValidationFailure<T>, messages: MessageResolver): string {
  const { validator, output, value } = failure
  if (output !== validator.errorCode) return output
  return messages.message(validator.rule, validator.errorCode, value)
}

/**
 * resolveValidators(validators, messages)
 *
 * Compose a field's validator chain into one function returning the display
 * text of the first failure, or `null`.
 *
 * @example
 *   const check = resolveValidators([required(), email()], new MessageResolver())
 *   check('', form)          // 'Required'
 *   check('nope', form)      // 'Invalid email address'
 */
export function resolveValidators<T>(
  validators: ReadonlyArray<Validator<T>> | null | undefined,
  messages: MessageResolver,
): ResolvedValidator<T> {
  if (!validators || validators.length === 0) return () => null
  return (value, form) => {
    const failure = evaluateValidators(validators, value, form)
    return failure ? describeFailure(failure, messages) : null
  }
}
