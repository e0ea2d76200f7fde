// ---------------------------------------------------------------------------
// Configurable error handler for the forms package
// ---------------------------------------------------------------------------

/**
 * Signature for custom error handlers set via `setFormErrorHandler`.
 * @param error  The error thrown by a listener, binding or async check
 * @param context  A string identifying where it happened
 *                 (e.g. `'listener'`, `'bindInput'`, `'asyncCheck/email'`)
 */
export type FormErrorHandler = (error: unknown, context: string) => void

const defaultHandler: FormErrorHandler = (error, context) => {
  console.warn(`[@formbind/forms] Error in ${context}:`, error)
}

let handler: FormErrorHandler = defaultHandler

/**
 * Replace the default error handler for form listeners, DOM bindings and
 * async checks.
 *
 * The default handler logs to `console.warn`. Pass `formErrorReporter(handler)`
 * from `@formbind/errors` to route everything into a central error bus.
 *
 * @example
 * ```ts
 * setFormErrorHandler((error, context) => {
 *   errorHandler.reportError(error, 'form', context)
 * })
 * ```
 */
export function setFormErrorHandler(fn: FormErrorHandler): void {
  handler = fn
}

/** Restore the `console.warn` handler. */
export function resetFormErrorHandler(): void {
  handler = defaultHandler
}

/**
 * Internal: call the configured error handler. An exception thrown by the
 * handler itself is logged and dropped so it never breaks a notification.
 */
export function handleFormError(error: unknown, context: string): void {
  try {
    handler(error, context)
  } catch (handlerError) {
    console.warn('[@formbind/forms] Error handler threw:', handlerError)
  }
}
