export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readProperty(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readProperty(error, 'code');
    if (typeof code === 'string') {
      serialized.code = code;
    }

    if (error.cause) {
      serialized.cause = serializeError(error.cause);
    }

    const details = readProperty(error, 'details');
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      serialized.details = Object.fromEntries(Object.entries(details));
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    const message = readProperty(error, 'message') ?? readProperty(error, 'error');
    const name = readProperty(error, 'name');
    const code = readProperty(error, 'code');
    return {
      message: message !== undefined ? String(message) : JSON.stringify(error),
      name: typeof name === 'string' ? name : undefined,
      code: typeof code === 'string' ? code : undefined,
    };
  }

  return { message: String(error) };
}
