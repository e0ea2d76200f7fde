import { describe, it, expect, vi, afterEach } from 'vitest'
import { createFormController, defineSchema, handleFormError, resetFormErrorHandler, s } from '@formbind/forms'
import {
  createErrorHandler,
  formErrorReporter,
  connectFormErrors,
} from './public'
import type { AppError, ErrorHandler } from './public'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let cleanupSubs: Array<{ unsubscribe(): void }> = []

afterEach(() => {
  cleanupSubs.forEach((sub) => sub.unsubscribe())
  cleanupSubs = []
  resetFormErrorHandler()
})

function makeHandler(): [ErrorHandler, AppError[]] {
  const [handler, sub] = createErrorHandler({ enableGlobalCapture: false })
  const collected: AppError[] = []
  cleanupSubs.push(sub, handler.errors$.subscribe((e) => collected.push(e)))
  return [handler, collected]
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

describe('createErrorHandler', () => {
  it('emits reported errors with source "manual" by default', () => {
    const [handler, collected] = makeHandler()
    handler.reportError(new Error('boom'))

    expect(collected).toHaveLength(1)
    expect(collected[0].message).toBe('boom')
    expect(collected[0].source).toBe('manual')
  })

  it('keeps an explicit source and context', () => {
    const [handler, collected] = makeHandler()
    handler.reportError(new Error('fail'), 'observable', 'signUp/submit')

    expect(collected[0].source).toBe('observable')
    expect(collected[0].context).toBe('signUp/submit')
  })

  it('normalises strings and plain objects into Error instances', () => {
    const [handler, collected] = makeHandler()
    handler.reportError('plain string')
    handler.reportError({ code: 42 })

    expect(collected[0].error).toBeInstanceOf(Error)
    expect(collected[0].message).toBe('plain string')
    expect(collected[1].message).toBe('{"code":42}')
  })

  it('calls config.onError synchronously', () => {
    const onError = vi.fn()
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: false, onError })
    cleanupSubs.push(sub)

    handler.reportError(new Error('sync'))

    expect(onError).toHaveBeenCalledOnce()
    expect(onError.mock.calls[0][0].message).toBe('sync')
  })

  it('does not replay to late subscribers', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: false })
    cleanupSubs.push(sub)
    handler.reportError(new Error('early'))

    const collected: AppError[] = []
    cleanupSubs.push(handler.errors$.subscribe((e) => collected.push(e)))
    expect(collected).toHaveLength(0)
  })

  it('captures window error events while subscribed', () => {
    // jsdom reports an error event with no listener left as uncaught.
    const handled = (e: ErrorEvent) => e.preventDefault()
    window.addEventListener('error', handled)
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: true })
    const collected: AppError[] = []
    cleanupSubs.push(handler.errors$.subscribe((e) => collected.push(e)))

    try {
      window.dispatchEvent(new ErrorEvent('error', { error: new Error('global boom'), message: 'global boom' }))
      sub.unsubscribe()
      window.dispatchEvent(new ErrorEvent('error', { error: new Error('after'), message: 'after' }))
    } finally {
      window.removeEventListener('error', handled)
    }

    expect(collected).toHaveLength(1)
    expect(collected[0].source).toBe('global')
    expect(collected[0].message).toBe('global boom')
  })
})

// ---------------------------------------------------------------------------
// Form error routing
// ---------------------------------------------------------------------------

describe('formErrorReporter', () => {
  const profile = defineSchema({ nickname: s.string() })

  it('reports form listener failures with source "form"', () => {
    const [handler, collected] = makeHandler()
    const form = createFormController(profile, { onError: formErrorReporter(handler) })
    form.addListener(() => {
      throw new Error('listener exploded')
    })

    form.updateValue(form.fields.nickname, 'neo')

    expect(collected).toHaveLength(1)
    expect(collected[0].source).toBe('form')
    expect(collected[0].context).toBe('listener')
    expect(collected[0].message).toBe('listener exploded')
  })
})

describe('connectFormErrors', () => {
  it('routes the global form error handler until unsubscribed', () => {
    const [handler, collected] = makeHandler()
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)

    const sub = connectFormErrors(handler)
    handleFormError(new Error('binding failed'), 'bindInput')
    sub.unsubscribe()
    handleFormError(new Error('after'), 'bindInput')

    expect(collected).toHaveLength(1)
    expect(collected[0].context).toBe('bindInput')
    expect(warn).toHaveBeenCalledOnce()
    warn.mockRestore()
  })
})
