// src/errors.ts

/**
 * Base class for all NBE errors
 */
export class NbeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NbeError';
  }
}

/**
 * Error class for a request that got no answer in time
 */
export class NbeTimeoutError extends NbeError {
  seqNo: number;

  constructor(seqNo: number, timeout: number) {
    super(`Timeout waiting for response to request ${seqNo} after ${timeout}ms`);
    this.name = 'NbeTimeoutError';
    this.seqNo = seqNo;
  }
}

// --- Frame codec ---

/**
 * Error class for frames that cannot be decoded
 */
export class NbeFrameDecodeError extends NbeError {
  constructor(message: string = 'Invalid NBE frame') {
    super(message);
    this.name = 'NbeFrameDecodeError';
  }
}

/**
 * Error class for a frame that ended before a field was complete
 */
export class NbeShortFrameError extends NbeFrameDecodeError {
  field: string;

  constructor(field: string, received: number, required: number) {
    super(`Failed to read ${field}: received ${received} bytes, required ${required} bytes`);
    this.name = 'NbeShortFrameError';
    this.field = field;
  }
}

/**
 * Error class for a start or end marker mismatch
 */
export class NbeMarkerError extends NbeFrameDecodeError {
  constructor(field: string, expected: number, received: number) {
    super(
      `Invalid ${field}: expected 0x${expected.toString(16).padStart(2, '0')}, got 0x${received
        .toString(16)
        .padStart(2, '0')}`
    );
    this.name = 'NbeMarkerError';
  }
}

/**
 * Error class for frames that cannot be encoded
 */
export class NbeFrameEncodeError extends NbeError {
  constructor(message: string) {
    super(message);
    this.name = 'NbeFrameEncodeError';
  }
}

/**
 * Error class for a request frame that is missing a mandatory field
 */
export class NbeFrameValidationError extends NbeFrameEncodeError {
  constructor(field: string) {
    super(`${field} is empty`);
    this.name = 'NbeFrameValidationError';
  }
}

/**
 * Error class for a numeric field wider than its slot
 */
export class NbeFieldOverflowError extends NbeFrameEncodeError {
  constructor(field: string, value: number, digits: number) {
    super(`${field} value ${value} too large for ${digits} digits`);
    this.name = 'NbeFieldOverflowError';
  }
}

// --- Protocol ---

/**
 * Error class for error frames sent by the controller (sequence number -1)
 */
export class NbeProtocolError extends NbeError {
  constructor(message: string) {
    super(`Protocol error: ${message}`);
    this.name = 'NbeProtocolError';
  }
}

/**
 * Error class for socket write failures
 */
export class NbeSendError extends NbeError {
  constructor(message: string, cause?: unknown) {
    super(`Failed to send request: ${message}`, { cause });
    this.name = 'NbeSendError';
  }
}

/**
 * Error class for a transport used before it was opened or after it was closed
 */
export class NbeNotConnectedError extends NbeError {
  constructor() {
    super('Not connected to NBE controller');
    this.name = 'NbeNotConnectedError';
  }
}

/**
 * Error class for authenticated writes without a usable public key
 */
export class NbeEncryptionError extends NbeError {
  constructor(message: string = 'No RSA public key available for authenticated write') {
    super(message);
    this.name = 'NbeEncryptionError';
  }
}

/**
 * Error class for a failed session bootstrap
 */
export class NbeDiscoveryError extends NbeError {
  constructor(message: string, cause?: unknown) {
    super(`Discovery failed: ${message}`, { cause });
    this.name = 'NbeDiscoveryError';
  }
}

// --- MQTT ---

/**
 * Error class for broker connection and publish failures
 */
export class MqttBusError extends NbeError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MqttBusError';
  }
}

// --- Configuration ---

export class ConfigError extends NbeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// --- Polling ---

export class PollingManagerError extends NbeError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingManagerError';
  }
}

export class PollingTaskAlreadyExistsError extends PollingManagerError {
  constructor(id: string) {
    super(`Polling task with id "${id}" already exists.`);
    this.name = 'PollingTaskAlreadyExistsError';
  }
}

export class PollingTaskNotFoundError extends PollingManagerError {
  constructor(id: string) {
    super(`Polling task with id "${id}" does not exist.`);
    this.name = 'PollingTaskNotFoundError';
  }
}

export class PollingTaskValidationError extends PollingManagerError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingTaskValidationError';
  }
}
