/**
 * Error classes for the Hexagon light controller.
 */

export class HexagonLightError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HexagonLightError';
  }
}

/** A frame or payload does not fit the wire format. Not retried. */
export class EncodingError extends HexagonLightError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

export class UnknownSceneError extends HexagonLightError {
  constructor(readonly sceneName: string) {
    super(`Unknown scene name: ${JSON.stringify(sceneName)}`);
    this.name = 'UnknownSceneError';
  }
}

/** Every connect attempt failed; `cause` holds the last underlying error. */
export class ConnectionError extends HexagonLightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** A write failed again after one reconnect. */
export class WriteError extends HexagonLightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WriteError';
  }
}

/**
 * The caller stopped waiting. The operation itself keeps running on the
 * background queue and may still complete.
 */
export class OperationTimeout extends HexagonLightError {
  constructor(message: string) {
    super(message);
    this.name = 'OperationTimeout';
  }
}

export class OperationCancelled extends HexagonLightError {
  constructor(message: string) {
    super(message);
    this.name = 'OperationCancelled';
  }
}

export class NotConnectedError extends HexagonLightError {
  constructor(message = 'Not connected; call connect() first') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

/** The control service or one of its characteristics is missing on the device. */
export class NotFoundError extends HexagonLightError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class UsageError extends HexagonLightError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
