import { EMPTY, Observable, Subscription, from } from 'rxjs'
import type { ObservableInput } from 'rxjs'
import { catchError, debounceTime, distinctUntilChanged, map, switchMap } from 'rxjs/operators'
import type { FormController } from './form'
import type { FieldId, SchemaShape } from './schema'

export interface AsyncCheckOptions<T> {
  /** Values to check. Defaults to the field's own value stream. */
  value$?: Observable<T | null>
  /** Wait this many milliseconds of quiet before checking. */
  debounceMs?: number
}

/**
 * connectAsyncCheck(form, id, check, options?)
 *
 * Runs an asynchronous check (typically a server call) for each value and
 * reports the result with `form.setError`. `switchMap` drops the result of a
 * check once a newer value arrives, so a slow stale response cannot overwrite
 * a fresh one. A check that throws or errors is reported to the form's
 * `onError` and leaves the forced error untouched.
 *
 * @example
 *   const sub = connectAsyncCheck(form, form.fields.username, (name) =>
 *     http.get<{ taken: boolean }>(`/api/users/${name}`).pipe(
 *       map((r) => (r.taken ? 'username_taken' : null)),
 *     ),
 *     { debounceMs: 300 },
 *   )
 */
export function connectAsyncCheck<S extends SchemaShape, T>(
  form: FormController<S>,
  id: FieldId<T>,
  check: (value: T | null) => ObservableInput<string | null>,
  options?: AsyncCheckOptions<T>,
): Subscription {
  const source$ =
    options?.value$ ??
    form.fieldHandle(id).state$.pipe(
      map((snapshot) => snapshot.value),
      distinctUntilChanged(),
    )
  const settled$ = options?.debounceMs !== undefined ? source$.pipe(debounceTime(options.debounceMs)) : source$

  return settled$
    .pipe(
      switchMap((value) =>
        from(check(value)).pipe(
          catchError((error: unknown) => {
            form.reportError(error, `asyncCheck/${id.name}`)
            return EMPTY
          }),
        ),
      ),
    )
    .subscribe((error) => form.setError(id, error))
}
