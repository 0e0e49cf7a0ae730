/**
 * Arma Value Module
 * Exports the value model, conversion protocols and error taxonomy
 */

export * from './runtime/index.js';
export type { ArmaScalarTypeName, ArmaTypeName } from './value-types.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  ArmaError,
  ConversionError,
  createError,
  type ArmaErrorData,
} from './error-classes.js';
