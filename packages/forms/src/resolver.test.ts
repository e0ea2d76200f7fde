import { describe, it, expect, vi } from 'vitest'
import { describeFailure, evaluateValidators, resolveValidators } from './resolver'
import { FormErrorMessages, MessageResolver } from './messages'
import {
  required,
  email,
  minLength,
  maxLength,
  mimeType,
  isAfter,
  isBefore,
  minItems,
  maxItems,
  defineValidator,
  matches,
  dateAfter,
} from './validators'
import type { FieldValueReader, Validator } from './validators'

const noFields: FieldValueReader = { readField: () => null }

class FrenchMessages extends FormErrorMessages {
  override required(): string {
    return 'Champ obligatoire'
  }

  override minLength(length: number): string {
    return `Au moins ${length} caractères`
  }
}

// ---------------------------------------------------------------------------
// Chain semantics
// ---------------------------------------------------------------------------

describe('resolveValidators — chain', () => {
  const messages = new MessageResolver()

  it('returns null for an empty or missing chain', () => {
    expect(resolveValidators<string>([], messages)('', noFields)).toBeNull()
    expect(resolveValidators<string>(null, messages)('', noFields)).toBeNull()
    expect(resolveValidators<string>(undefined, messages)('', noFields)).toBeNull()
  })

  it('surfaces the first declared failure', () => {
    const ab = resolveValidators([minLength(5), email()], messages)
    const ba = resolveValidators([email(), minLength(5)], messages)

    expect(ab('x@y', noFields)).toBe('Must be at least 5 characters')
    expect(ba('x@y', noFields)).toBe('Invalid email address')
  })

  it('lets required win on empty input whatever its position', () => {
    const check = resolveValidators([email(), required<string>()], messages)
    expect(check('', noFields)).toBe('Required')
    expect(check('nope', noFields)).toBe('Invalid email address')
    expect(check('a@b.com', noFields)).toBeNull()
  })

  it('never calls validators after the first failure', () => {
    const test = vi.fn(() => true)
    const stub = defineValidator<string>({ errorCode: 'stub', test })
    const check = resolveValidators([required<string>(), stub], messages)

    expect(check(null, noFields)).toBe('Required')
    expect(test).not.toHaveBeenCalled()

    expect(check('ok', noFields)).toBeNull()
    expect(test).toHaveBeenCalledTimes(1)
  })

  it('returns an inline message verbatim, bypassing the table', () => {
    const parse = vi.fn(() => 'from table')
    const custom = new MessageResolver(Object.assign(new FormErrorMessages(), { parseErrorCode: parse }))
    const check = resolveValidators([minLength(8, 'Use a longer password')], custom)

    expect(check('short', noFields)).toBe('Use a longer password')
    expect(parse).not.toHaveBeenCalled()
  })

  it('passes the reader to cross-field validators', () => {
    const check = resolveValidators([matches<string>('password')], messages)
    expect(check('abc', { readField: () => 'abc' })).toBeNull()
    expect(check('abc', { readField: () => 'xyz' })).toBe('Fields do not match')
  })
})

describe('evaluateValidators', () => {
  it('reports which validator failed and what it returned', () => {
    const first = required<string>()
    const failure = evaluateValidators([first, email()], '', noFields)
    expect(failure).toEqual({ validator: first, output: 'required', value: '' })
  })

  it('returns null when everything passes', () => {
    expect(evaluateValidators([required<string>()], 'x')).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// Message resolution
// ---------------------------------------------------------------------------

describe('message resolution', () => {
  const messages = new MessageResolver()
  const D = new Date(Date.UTC(2024, 0, 1))

  function text<T>(validators: ReadonlyArray<Validator<T>>, value: T, form = noFields): string | null {
    const failure = evaluateValidators(validators, value, form)
    return failure ? describeFailure(failure, messages) : null
  }

  it('renders parameterised defaults', () => {
    expect(text([maxLength(3)], 'abcd')).toBe('Must be at most 3 characters')
    expect(text([minItems(2)], ['a'])).toBe('Must have at least 2 items')
    expect(text([maxItems(1)], ['a', 'b'])).toBe('Must have at most 1 items')
    expect(text([isAfter(D)], new Date(D.getTime() - 1))).toBe('Must be after 2024-01-01T00:00:00.000Z')
    expect(text([isBefore(D)], new Date(D.getTime() + 1))).toBe('Must be before 2024-01-01T00:00:00.000Z')
    expect(text([mimeType(['image/png', 'image/gif'])], { name: 'a.txt', type: 'text/plain' })).toBe(
      'Invalid file format. Allowed types: image/png, image/gif',
    )
  })

  it('uses the cross-field messages for cross-field rules', () => {
    const start = new Date(Date.UTC(2024, 5, 1))
    expect(text([dateAfter('start')], D, { readField: () => start })).toBe(
      'Date must be after the compared field',
    )
  })

  it('falls back to the raw code for an unknown custom code', () => {
    const fooBar = defineValidator<string>({ errorCode: 'foo_bar', test: () => false })
    expect(text([fooBar], 'anything')).toBe('foo_bar')
  })

  it('asks parseErrorCode for custom codes', () => {
    const parse = vi.fn((code: string, _value: unknown) => (code === 'foo_bar' ? 'Foo is not bar' : null))
    const custom = new MessageResolver(Object.assign(new FormErrorMessages(), { parseErrorCode: parse }))
    const fooBar = defineValidator<string>({ errorCode: 'foo_bar', test: () => false })

    expect(resolveValidators([fooBar], custom)('v', noFields)).toBe('Foo is not bar')
    expect(parse).toHaveBeenCalledWith('foo_bar', 'v')
  })

  it('reads the current table on every call', () => {
    const resolver = new MessageResolver()
    const check = resolveValidators([required<string>(), minLength(8)], resolver)

    expect(check('', noFields)).toBe('Required')
    resolver.use(new FrenchMessages())
    expect(check('', noFields)).toBe('Champ obligatoire')
    expect(check('court', noFields)).toBe('Au moins 8 caractères')
  })

  it('emits the table on messages$ only when it changes', () => {
    const resolver = new MessageResolver()
    const french = new FrenchMessages()
    const seen: unknown[] = []
    const sub = resolver.messages$.subscribe((m) => seen.push(m))

    resolver.use(french)
    resolver.use(french)

    expect(seen).toHaveLength(2)
    expect(seen[1]).toBe(french)
    sub.unsubscribe()
  })

  it('localize falls back to the code', () => {
    expect(messages.localize('server_said_no', null)).toBe('server_said_no')
  })
})
