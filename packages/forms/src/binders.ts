import { Observable, Subscription, fromEvent } from 'rxjs'
import { handleFormError } from './error-handler'
import type { FormErrorHandler } from './error-handler'
import type { FieldState } from './field-state'
import type { FormController } from './form'
import type { FieldId, SchemaShape } from './schema'

// ---------------------------------------------------------------------------
// BindOptions
// ---------------------------------------------------------------------------

export interface BindOptions {
  /**
   * When to run the field's validators:
   *   'blur'   — on blur (default)
   *   'change' — on every user edit
   *   'submit' — only through `controller.validate()`
   */
  validateOn?: 'blur' | 'change' | 'submit'
}

function guarded<T>(
  report: FormErrorHandler,
  context: string,
  fn: (value: T) => void,
): (value: T) => void {
  return (value) => {
    try {
      fn(value)
    } catch (error) {
      report(error, context)
    }
  }
}

function bindControl<S extends SchemaShape, T>(
  el: HTMLElement,
  form: FormController<S>,
  id: FieldId<T>,
  changeEvent: 'input' | 'change',
  read: () => T | null,
  render: (field: FieldState<T>) => void,
  context: string,
  options?: BindOptions,
): Subscription {
  const field = form.fieldHandle(id)
  const validateOn = options?.validateOn ?? 'blur'
  const sub = new Subscription()
  const report: FormErrorHandler = (error, ctx) => form.reportError(error, ctx)

  field.mount()

  // state$ → element (one-way from state to DOM)
  sub.add(field.state$.subscribe(guarded(report, context, () => render(field))))

  // DOM edit → didChange
  sub.add(
    fromEvent(el, changeEvent).subscribe(
      guarded(report, context, () => {
        field.didChange(read())
        if (validateOn === 'change') form.validateField(id)
      }),
    ),
  )

  // blur → interacted, and validate when asked
  sub.add(
    fromEvent(el, 'blur').subscribe(
      guarded(report, context, () => {
        field.touch()
        if (validateOn === 'blur') form.validateField(id)
      }),
    ),
  )

  return sub
}

// ---------------------------------------------------------------------------
// bindInput — text / email / tel / password / textarea
// ---------------------------------------------------------------------------

export function bindInput<S extends SchemaShape>(
  input: HTMLInputElement | HTMLTextAreaElement,
  form: FormController<S>,
  id: FieldId<string>,
  options?: BindOptions,
): Subscription {
  return bindControl(
    input,
    form,
    id,
    'input',
    () => input.value,
    (field) => {
      const v = field.value ?? ''
      if (input.value !== v) input.value = v
    },
    'bindInput',
    options,
  )
}

// ---------------------------------------------------------------------------
// bindCheckbox
// ---------------------------------------------------------------------------

export function bindCheckbox<S extends SchemaShape>(
  input: HTMLInputElement,
  form: FormController<S>,
  id: FieldId<boolean>,
  options?: BindOptions,
): Subscription {
  return bindControl(
    input,
    form,
    id,
    'change',
    () => input.checked,
    (field) => {
      input.checked = field.value === true
    },
    'bindCheckbox',
    options,
  )
}

// ---------------------------------------------------------------------------
// bindSelect
// ---------------------------------------------------------------------------

export function bindSelect<S extends SchemaShape>(
  select: HTMLSelectElement,
  form: FormController<S>,
  id: FieldId<string>,
  options?: BindOptions,
): Subscription {
  return bindControl(
    select,
    form,
    id,
    'change',
    () => select.value,
    (field) => {
      const v = field.value ?? ''
      if (select.value !== v) select.value = v
    },
    'bindSelect',
    options,
  )
}

// ---------------------------------------------------------------------------
// bindError — display error message in an element
// ---------------------------------------------------------------------------

export function bindError(
  el: HTMLElement,
  error$: Observable<string | null>,
  onError: FormErrorHandler = handleFormError,
): Subscription {
  return error$.subscribe({
    next: guarded(onError, 'bindError', (err: string | null) => {
      el.textContent = err ?? ''
      if (err) {
        el.classList.add('has-error')
      } else {
        el.classList.remove('has-error')
      }
    }),
    error: (error: unknown) => onError(error, 'bindError'),
  })
}

// ---------------------------------------------------------------------------
// bindField — convenience: bindInput + bindError for a container element
//
// Expects the container to have:
//   - An <input>, <textarea> or <select> as a descendant
//   - An element with class `.field-error` for the error message
// ---------------------------------------------------------------------------

export function bindField<S extends SchemaShape>(
  container: HTMLElement,
  form: FormController<S>,
  id: FieldId<string>,
  options?: BindOptions,
): Subscription {
  const sub = new Subscription()
  const errorEl = container.querySelector<HTMLElement>('.field-error')

  const inputEl = container.querySelector<HTMLInputElement | HTMLTextAreaElement>(
    'input:not([type="checkbox"]):not([type="radio"]), textarea',
  )
  const selectEl = container.querySelector<HTMLSelectElement>('select')

  if (inputEl) sub.add(bindInput(inputEl, form, id, options))
  else if (selectEl) sub.add(bindSelect(selectEl, form, id, options))

  if (errorEl) sub.add(bindError(errorEl, form.fieldError$(id), (e, c) => form.reportError(e, c)))

  return sub
}
