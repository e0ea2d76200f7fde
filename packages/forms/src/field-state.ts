import { BehaviorSubject, Observable } from 'rxjs'
import { describeFailure, evaluateValidators } from './resolver'
import type { ValidationFailure } from './resolver'
import type { MessageResolver } from './messages'
import type { FieldId } from './schema'
import type { FieldValueReader, Validator } from './validators'
import { sameValue } from './values'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FieldSnapshot<T> {
  readonly value: T | null
  /** Display text of the last validation pass, or null. */
  readonly error: string | null
  readonly interacted: boolean
  readonly mounted: boolean
}

/** The untyped view the controller iterates over. */
export interface AnyFieldState {
  readonly id: FieldId<unknown>
  readonly value: unknown
  readonly error: string | null
  readonly interacted: boolean
  readonly mounted: boolean
  hasChanged(): boolean
  validate(): boolean
  reset(): void
  refresh(): void
  complete(): void
}

export interface FieldStateContext {
  readonly messages: MessageResolver
  readonly form: FieldValueReader
}

// ---------------------------------------------------------------------------
// FieldState — the live state behind one rendered input
// ---------------------------------------------------------------------------

/**
 * Per-field widget state: Unmounted → Mounted(pristine) → Mounted(dirty).
 *
 * The error is kept as the failing validator plus its output, and turned into
 * text each time it is read, so a new message table applies immediately.
 */
export class FieldState<T> implements AnyFieldState {
  private current: T | null
  private failure: ValidationFailure<T> | null = null
  private interactedByUser = false
  private isMounted = false
  private readonly snapshots: BehaviorSubject<FieldSnapshot<T>>

  constructor(
    readonly id: FieldId<T>,
    private readonly validators: ReadonlyArray<Validator<T>>,
    readonly initialValue: T | null,
    startValue: T | null,
    private readonly context: FieldStateContext,
  ) {
    this.current = startValue
    this.snapshots = new BehaviorSubject<FieldSnapshot<T>>(this.snapshot())
  }

  /** Replays the latest snapshot, then every change. */
  get state$(): Observable<FieldSnapshot<T>> {
    return this.snapshots.asObservable()
  }

  get value(): T | null {
    return this.current
  }

  get error(): string | null {
    return this.failure ? describeFailure(this.failure, this.context.messages) : null
  }

  get interacted(): boolean {
    return this.interactedByUser
  }

  get mounted(): boolean {
    return this.isMounted
  }

  /** Called by a binding on first render. Idempotent. */
  mount(): void {
    if (this.isMounted) return
    this.isMounted = true
    this.emit()
  }

  /** A user edit: stores the value and marks the field as interacted. */
  didChange(value: T | null): void {
    this.current = value
    this.interactedByUser = true
    this.emit()
  }

  /** A programmatic write; does not count as interaction. */
  setValue(value: T | null): void {
    this.current = value
    this.emit()
  }

  /** Mark as interacted without changing the value (e.g. on blur). */
  touch(): void {
    if (this.interactedByUser) return
    this.interactedByUser = true
    this.emit()
  }

  validate(): boolean {
    this.failure = evaluateValidators(this.validators, this.current, this.context.form)
    this.emit()
    return this.failure === null
  }

  reset(): void {
    this.current = this.initialValue
    this.failure = null
    this.interactedByUser = false
    this.emit()
  }

  hasChanged(): boolean {
    return !sameValue(this.current, this.initialValue)
  }

  /** Re-emit the snapshot, e.g. after the message table changed. */
  refresh(): void {
    this.emit()
  }

  complete(): void {
    this.snapshots.complete()
  }

  private snapshot(): FieldSnapshot<T> {
    return {
      value: this.current,
      error: this.error,
      interacted: this.interactedByUser,
      mounted: this.isMounted,
    }
  }

  private emit(): void {
    this.snapshots.next(this.snapshot())
  }
}

/** The one place an untyped registry entry is narrowed back to its field type. */
export function isStateOf<T>(state: AnyFieldState, id: FieldId<T>): state is FieldState<T> {
  return state instanceof FieldState && state.id === id
}
