import {
  TLiteral,
  TNumber,
  TString,
  TTransform,
  TUnion,
  Type,
} from '@sinclair/typebox';

export const booleanFromString = (
  defaultValue = 'false',
  options?: { description?: string },
): TTransform<TString, boolean> =>
  Type.Transform(
    Type.String({
      default: defaultValue,
      ...(options?.description && { description: options.description }),
    }),
  )
    .Decode((val) => val === 'true' || val === '1' || val === 'yes')
    .Encode((val) => (val ? 'true' : 'false'));

export const variantsSchema = <T extends readonly string[]>(
  values: T,
  options?: {
    default?: T[number];
    description?: string;
    examples?: string[];
  },
): TUnion<TLiteral<T[number]>[]> =>
  Type.Union(
    values.map((value) => Type.Literal(value)),
    {
      ...(options?.default && { default: options.default }),
      ...(options?.description && { description: options.description }),
      ...(options?.examples && { examples: options.examples }),
    },
  );

export const positiveNumberFromString = (
  defaultValue: number,
  options?: { description?: string },
): TTransform<TUnion<[TString, TNumber]>, number> =>
  Type.Transform(
    Type.Union([Type.String(), Type.Number()], {
      default: defaultValue,
      ...(options?.description && { description: options.description }),
    }),
  )
    .Decode((value) => {
      const n = typeof value === 'string' ? Number(value.trim()) : value;
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`Invalid positive number: ${value}`);
      }
      return n;
    })
    .Encode((value) => value);

export const optionalString = (options?: {
  description?: string;
  pattern?: string;
  examples?: string[];
}) =>
  Type.Optional(
    Type.String({
      ...(options?.description && { description: options.description }),
      ...(options?.pattern && { pattern: options.pattern }),
      ...(options?.examples && { examples: options.examples }),
    }),
  );
