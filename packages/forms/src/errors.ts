/**
 * Thrown when a schema is authored incorrectly: a validator attached to a
 * field of the wrong kind, a cross-field validator pointing at a field that
 * does not exist, an initial value of the wrong type, or a field id used with
 * a controller built from a different schema.
 *
 * Validation failures are never thrown; they are returned as `string | null`.
 */
export class SchemaError extends Error {
  readonly field: string | undefined

  constructor(message: string, field?: string) {
    super(message)
    this.name = 'SchemaError'
    this.field = field
  }
}
