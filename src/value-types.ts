/** Arma type names, one per value variant */
export type ArmaTypeName = 'nil' | 'number' | 'boolean' | 'string' | 'array';

/** Scalar type names accepted by inbound parsers */
export type ArmaScalarTypeName =
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'f32'
  | 'f64'
  | 'bool'
  | 'string';
