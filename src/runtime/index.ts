/**
 * Arma Value Runtime
 *
 * Public API for exchanging values with the Arma scripting runtime.
 *
 * Module Structure:
 * - core/: Value model and conversion protocols
 *   - values.ts: ArmaValue, constructors, accessors, formatting
 *   - into-arma.ts: Host value to ArmaValue conversion
 *   - from-arma.ts: Argument text to host scalar parsing
 *   - args.ts: Decoding of whole argument lists
 */

// ============================================================
// VALUE MODEL
// ============================================================

export type {
  ArmaArray,
  ArmaBoolean,
  ArmaNil,
  ArmaNumber,
  ArmaString,
  ArmaValue,
  Ordering,
} from './core/values.js';

export {
  asArray,
  asBoolean,
  asNull,
  asNumber,
  asString,
  compareValues,
  createArray,
  createBoolean,
  createNil,
  createNumber,
  createString,
  deepEquals,
  formatNumber,
  formatValue,
  inferType,
  isArmaValue,
  isArray,
  isBoolean,
  isEmpty,
  isNil,
  isNumber,
  isString,
  NIL,
  quoteString,
} from './core/values.js';

// ============================================================
// OUTBOUND CONVERSION
// ============================================================

export type {
  IntoArma,
  IntoArmaNative,
  NumericArray,
} from './core/into-arma.js';

export {
  isIntoArma,
  toArmaLiteral,
  toValue,
  toValueArray,
} from './core/into-arma.js';

// ============================================================
// INBOUND CONVERSION
// ============================================================

export type {
  FromArma,
  FromArmaOutput,
  FromArmaResult,
} from './core/from-arma.js';

export {
  ARMA_PARSERS,
  fromArma,
  fromArmaOrThrow,
} from './core/from-arma.js';

// ============================================================
// ARGUMENT DECODING
// ============================================================

export type {
  ArgDecodedEvent,
  ArgErrorEvent,
  ArgParsers,
  DecodeArgsOptions,
  DecodeArgsResult,
  DecodedArgs,
  DecodeObservabilityCallbacks,
} from './core/args.js';

export { decodeArgs } from './core/args.js';
