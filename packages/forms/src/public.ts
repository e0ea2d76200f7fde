export { SchemaError } from './errors'
export { setFormErrorHandler, resetFormErrorHandler, handleFormError } from './error-handler'
export type { FormErrorHandler } from './error-handler'
export {
  required,
  email,
  phone,
  pattern,
  minLength,
  maxLength,
  minValue,
  maxValue,
  mimeType,
  isAfter,
  isBefore,
  minItems,
  maxItems,
  defineValidator,
  matches,
  dateAfter,
} from './validators'
export type {
  Validator,
  FieldValidator,
  CrossFieldValidator,
  FieldRule,
  CrossFieldRule,
  RuleKind,
  FieldValueReader,
  FileLike,
  CustomValidatorOptions,
} from './validators'
export { FormErrorMessages, MessageResolver, defaultMessages } from './messages'
export type { FormMessages } from './messages'
export { evaluateValidators, describeFailure, resolveValidators } from './resolver'
export type { ValidationFailure, ResolvedValidator } from './resolver'
export {
  s,
  defineSchema,
  FieldId,
  StringFieldBuilder,
  NumberFieldBuilder,
  BooleanFieldBuilder,
  DateFieldBuilder,
  ListFieldBuilder,
  FileFieldBuilder,
  CustomFieldBuilder,
} from './schema'
export type {
  FieldKind,
  FieldSpec,
  SchemaShape,
  FieldValue,
  FieldIds,
  FormValues,
  InitialValues,
  FieldSchemaEntry,
  FormSchema,
} from './schema'
export { FieldState } from './field-state'
export type { FieldSnapshot } from './field-state'
export { createFormController } from './form'
export type { FormController, FormControllerOptions, FormChange, FormListener } from './form'
export { bindInput, bindCheckbox, bindSelect, bindError, bindField } from './binders'
export type { BindOptions } from './binders'
export { connectAsyncCheck } from './async'
export type { AsyncCheckOptions } from './async'
export { isEmptyValue, sameValue } from './values'
