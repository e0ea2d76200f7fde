import { BehaviorSubject, Observable } from 'rxjs'
import type { CrossFieldRule, FieldRule } from './validators'

// ---------------------------------------------------------------------------
// FormMessages — the injectable message table
// ---------------------------------------------------------------------------

export interface FormMessages {
  required(): string
  invalidEmail(): string
  invalidPhone(): string
  invalidPattern(): string
  minLength(length: number): string
  maxLength(length: number): string
  minValue(min: number): string
  maxValue(max: number): string
  invalidFileFormat(allowedTypes: ReadonlySet<string>): string
  dateBefore(date: Date): string
  dateAfter(date: Date): string
  minItems(count: number): string
  maxItems(count: number): string
  fieldDoesNotMatch(): string
  fieldIsNotAfter(): string
  /**
   * Catch-all for codes the table does not know (custom validators, forced
   * errors). Return `null` to fall back to the raw code.
   */
  parseErrorCode(errorCode: string, value: unknown): string | null
}

/**
 * Default English messages. Extend it to translate or reword a subset.
 *
 * @example
 *   class FrenchMessages extends FormErrorMessages {
 *     override required() { return 'Champ obligatoire' }
 *   }
 */
export class FormErrorMessages implements FormMessages {
  required(): string {
    return 'Required'
  }

  invalidEmail(): string {
    return 'Invalid email address'
  }

  invalidPhone(): string {
    return 'Invalid phone number'
  }

  invalidPattern(): string {
    return 'Invalid pattern'
  }

  minLength(length: number): string {
    return `Must be at least ${length} characters`
  }

  maxLength(length: number): string {
    return `Must be at most ${length} characters`
  }

  minValue(min: number): string {
    return `Must be at least ${min}`
  }

  maxValue(max: number): string {
    return `Must be at most ${max}`
  }

  invalidFileFormat(allowedTypes: ReadonlySet<string>): string {
    return `Invalid file format. Allowed types: ${[...allowedTypes].join(', ')}`
  }

  dateBefore(date: Date): string {
    return `Must be before ${date.toISOString()}`
  }

  dateAfter(date: Date): string {
    return `Must be after ${date.toISOString()}`
  }

  minItems(count: number): string {
    return `Must have at least ${count} items`
  }

  maxItems(count: number): string {
    return `Must have at most ${count} items`
  }

  fieldDoesNotMatch(): string {
    return 'Fields do not match'
  }

  fieldIsNotAfter(): string {
    return 'Date must be after the compared field'
  }

  parseErrorCode(_errorCode: string, _value: unknown): string | null {
    return null
  }
}

export const defaultMessages: FormMessages = new FormErrorMessages()

// ---------------------------------------------------------------------------
// MessageResolver
// ---------------------------------------------------------------------------

/**
 * Holds the current message table and turns error codes into display text.
 * The table is read on every call, so `use()` changes every message rendered
 * afterwards without rebuilding validators.
 */
export class MessageResolver {
  private readonly table$: BehaviorSubject<FormMessages>

  constructor(messages: FormMessages = defaultMessages) {
    this.table$ = new BehaviorSubject(messages)
  }

  /** Emits the current table, then every replacement. */
  get messages$(): Observable<FormMessages> {
    return this.table$.asObservable()
  }

  get messages(): FormMessages {
    return this.table$.value
  }

  use(messages: FormMessages): void {
    if (messages !== this.table$.value) this.table$.next(messages)
  }

  /** Message for a validator rule whose predicate returned its own code. */
  message(rule: FieldRule | CrossFieldRule, errorCode: string, value: unknown): string {
    const m = this.messages
    switch (rule.kind) {
      case 'required':
        return m.required()
      case 'email':
        return m.invalidEmail()
      case 'phone':
        return m.invalidPhone()
      case 'pattern':
        return m.invalidPattern()
      case 'minLength':
        return m.minLength(rule.length)
      case 'maxLength':
        return m.maxLength(rule.length)
      case 'minValue':
        return m.minValue(rule.min)
      case 'maxValue':
        return m.maxValue(rule.max)
      case 'mimeType':
        return m.invalidFileFormat(rule.mimeTypes)
      case 'isAfter':
        return m.dateAfter(rule.date)
      case 'isBefore':
        return m.dateBefore(rule.date)
      case 'minItems':
        return m.minItems(rule.count)
      case 'maxItems':
        return m.maxItems(rule.count)
      case 'matches':
        return m.fieldDoesNotMatch()
      case 'dateAfterField':
        return m.fieldIsNotAfter()
      case 'custom':
        return this.localize(errorCode, value)
      default: {
        const unknownRule: never = rule
        return unknownRule
      }
    }
  }

  /** Translate a bare code (custom validator or forced error); raw code as last resort. */
  localize(errorCode: string, value: unknown): string {
    return this.messages.parseErrorCode(errorCode, value) ?? errorCode
  }

  /** Completes `messages$`. */
  complete(): void {
    this.table$.complete()
  }
}
