import { TSchema } from '@sinclair/typebox';
import { AssertError, TransformDecodeError } from '@sinclair/typebox/value';

type SchemaLike = TSchema & {
  anyOf?: TSchema[];
  description?: string;
};

function extractDescription(
  schema: SchemaLike | undefined,
): string | undefined {
  if (!schema) return undefined;
  if (typeof schema.description === 'string') return schema.description;
  if (Array.isArray(schema.anyOf)) {
    for (const variant of schema.anyOf) {
      if (typeof variant.description === 'string') return variant.description;
    }
  }
  return undefined;
}

function getSchemaHint(variable: string): string {
  if (variable.startsWith('LOGGER_LEVEL')) {
    return 'Tip: LOGGER_LEVEL should be one of: error, warn, info, debug, verbose';
  }
  if (variable.endsWith('_URL')) {
    return 'Tip: URLs must be absolute and start with http:// or https://';
  }
  if (variable === 'API_CLIENT_REQUESTS_PER_SECOND') {
    return 'Tip: the rate limit is a whole number of requests per second, at least 1';
  }

  return '';
}

function describeFailure(
  variable: string,
  expectation: string,
  value: unknown,
  schema: SchemaLike | undefined,
): string {
  const valueDisplay =
    value !== undefined ? ` (received: ${JSON.stringify(value)})` : '';
  const fieldDescription = extractDescription(schema);

  return [
    `Environment variable validation failed: ${variable}`,
    `Expected: ${expectation}${valueDisplay}`,
    fieldDescription ? `Description: ${fieldDescription}` : '',
    `Please set the correct value for the ${variable} environment variable.`,
    getSchemaHint(variable),
  ]
    .filter(Boolean)
    .join('\n');
}

function variableFromPath(path: string): string {
  return path.replace(/^\//, '') || 'unknown';
}

export function handleValidationError(error: unknown, context: string): never {
  if (error instanceof AssertError && error.error) {
    const details = error.error;
    throw new Error(
      describeFailure(
        variableFromPath(details.path),
        details.message,
        details.value,
        details.schema,
      ),
      { cause: error },
    );
  }

  if (error instanceof TransformDecodeError) {
    throw new Error(
      describeFailure(
        variableFromPath(error.path),
        error.message,
        error.value,
        error.schema,
      ),
      { cause: error },
    );
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  throw new Error([context, `Error: ${errorMessage}`].join('\n'), {
    cause: error,
  });
}
