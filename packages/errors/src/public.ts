import { Subject, Subscription, fromEvent } from 'rxjs'
import type { Observable } from 'rxjs'
import { resetFormErrorHandler, setFormErrorHandler } from '@formbind/forms'
import type { FormErrorHandler } from '@formbind/forms'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppError {
  /**
   * Where the error originated:
   *   'observable'  — reported from an RxJS pipeline's error callback
   *   'form'        — a form listener, DOM binding or async field check
   *   'global'      — window.onerror (uncaught JS error)
   *   'promise'     — unhandledrejection (uncaught Promise rejection)
   *   'manual'      — explicitly reported via handler.reportError(...)
   */
  source: 'observable' | 'form' | 'global' | 'promise' | 'manual'
  /** The native Error object (always normalised). */
  error: Error
  /** Human-readable message (alias for error.message). */
  message: string
  /** Unix timestamp (Date.now()) when the error was captured. */
  timestamp: number
  /** Optional label identifying the pipeline, binding or field. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * If true (default), attaches window.onerror and
   * window.addEventListener('unhandledrejection') listeners.
   * Set to false in Node or where global capture is unwanted.
   */
  enableGlobalCapture?: boolean
  /** Called synchronously whenever an error is reported. */
  onError?: (error: AppError) => void
}

export interface ErrorHandler {
  /** Hot Observable stream of all captured AppErrors. Does NOT replay. */
  errors$: Observable<AppError>
  /**
   * Report an error manually.
   *
   * @example
   *   try { submit() } catch (e) { handler.reportError(e, 'manual', 'signUp/submit') }
   */
  reportError(error: unknown, source?: AppError['source'], context?: string): void
}

function toError(raw: unknown): Error {
  if (raw instanceof Error) return raw
  if (typeof raw === 'string') return new Error(raw)
  try {
    return new Error(JSON.stringify(raw))
  } catch {
    return new Error(String(raw))
  }
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

/**
 * createErrorHandler(config?)
 *
 * Creates a centralized error handler. Returns the handler and a Subscription
 * that removes any global event listeners when unsubscribed.
 *
 * @example
 *   const [handler, sub] = createErrorHandler({ enableGlobalCapture: true })
 *   handler.errors$.subscribe((e) => showToast(e.message))
 */
export function createErrorHandler(config?: ErrorHandlerConfig): [ErrorHandler, Subscription] {
  const enableGlobal = config?.enableGlobalCapture ?? true
  const onError = config?.onError

  const bus = new Subject<AppError>()
  const cleanupSub = new Subscription()

  function reportError(raw: unknown, source: AppError['source'] = 'manual', context?: string): void {
    const error = toError(raw)
    const appError: AppError = {
      source,
      error,
      message: error.message,
      timestamp: Date.now(),
      context,
    }
    onError?.(appError)
    bus.next(appError)
  }

  if (enableGlobal && typeof window !== 'undefined') {
    cleanupSub.add(
      fromEvent<ErrorEvent>(window, 'error').subscribe((e) => {
        reportError(e.error ?? new Error(e.message), 'global')
      }),
    )
    cleanupSub.add(
      fromEvent<PromiseRejectionEvent>(window, 'unhandledrejection').subscribe((e) => {
        reportError(e.reason, 'promise')
      }),
    )
  }

  return [{ errors$: bus.asObservable(), reportError }, cleanupSub]
}

// ---------------------------------------------------------------------------
// Form error routing
// ---------------------------------------------------------------------------

/**
 * formErrorReporter(handler)
 *
 * Adapts an ErrorHandler to the forms package's handler signature. Pass it to
 * `createFormController(schema, { onError })` for one form, or use
 * `connectFormErrors` for every form.
 */
export function formErrorReporter(handler: ErrorHandler): FormErrorHandler {
  return (error, context) => handler.reportError(error, 'form', context)
}

/**
 * connectFormErrors(handler)
 *
 * Routes every form listener, binding and async-check failure into `handler`
 * until the returned Subscription is unsubscribed, which restores the
 * `console.warn` default.
 *
 * @example
 *   const [handler] = createErrorHandler()
 *   const sub = connectFormErrors(handler)
 */
export function connectFormErrors(handler: ErrorHandler): Subscription {
  setFormErrorHandler(formErrorReporter(handler))
  return new Subscription(() => resetFormErrorHandler())
}
