/**
 * Argument Decoding
 *
 * Applies one inbound parser per argument to the raw strings of a host
 * call. Decoding stops at the first failure.
 */

import { createError, type ConversionError } from '../../error-classes.js';
import type { ArmaScalarTypeName } from '../../value-types.js';
import type { FromArma, FromArmaOutput } from './from-arma.js';

/** Parser list for one call signature */
export type ArgParsers = readonly FromArma<unknown>[] | [];

/** Decoded values, one per parser, in declaration order */
export type DecodedArgs<P extends ArgParsers> = {
  -readonly [K in keyof P]: FromArmaOutput<P[K]>;
};

/** Event emitted after an argument parses */
export interface ArgDecodedEvent {
  /** Argument position (0-based) */
  index: number;
  typeName: ArmaScalarTypeName;
  value: unknown;
}

/** Event emitted when an argument fails to parse */
export interface ArgErrorEvent {
  /** Argument position (0-based) */
  index: number;
  typeName: ArmaScalarTypeName;
  error: ConversionError;
}

/** Observability callbacks for monitoring argument decoding */
export interface DecodeObservabilityCallbacks {
  onArgDecoded?: (event: ArgDecodedEvent) => void;
  onArgError?: (event: ArgErrorEvent) => void;
}

export interface DecodeArgsOptions {
  observability?: DecodeObservabilityCallbacks;
}

export type DecodeArgsResult<P extends ArgParsers> =
  | { readonly success: true; readonly values: DecodedArgs<P> }
  | { readonly success: false; readonly error: ConversionError };

/**
 * Decode the raw arguments of one call.
 *
 * @example
 * decodeArgs([ARMA_PARSERS.string, ARMA_PARSERS.i32], ['player1', '42'])
 * // { success: true, values: ['player1', 42] }
 */
export function decodeArgs<P extends ArgParsers>(
  parsers: P,
  args: readonly string[],
  options: DecodeArgsOptions = {}
): DecodeArgsResult<P> {
  const observability = options.observability ?? {};

  if (args.length !== parsers.length) {
    return {
      success: false,
      error: createError('ARMA-C007', {
        expectedCount: parsers.length,
        actualCount: args.length,
      }),
    };
  }

  const signature: readonly FromArma<unknown>[] = parsers;
  const values: unknown[] = [];
  for (const [index, parser] of signature.entries()) {
    const text = args[index] ?? '';
    const result = parser.fromArma(text);

    if (!result.success) {
      const error = createError('ARMA-C008', {
        index,
        typeName: parser.typeName,
        reason: result.error,
        reasonId: result.errorId,
        input: text,
      });
      observability.onArgError?.({ index, typeName: parser.typeName, error });
      return { success: false, error };
    }

    observability.onArgDecoded?.({
      index,
      typeName: parser.typeName,
      value: result.value,
    });
    values.push(result.value);
  }

  // One value per parser, each produced by the parser at the same position
  return { success: true, values: values as DecodedArgs<P> };
}
