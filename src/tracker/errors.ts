export type TrackerErrorCode =
  | 'NOT_CONNECTED'
  | 'ALREADY_CONNECTED'
  | 'CONNECTION_FAILED'
  | 'MALFORMED_FRAME'
  | 'UNSOLICITED_REPLY'
  | 'REENTRANT_PROTOCOL'
  | 'TRACKER_PROTOCOL'
  | 'STREAM_PROTOCOL'
  | 'CONNECTION_LOST'
  | 'SHUTDOWN_TIMEOUT';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotConnectedError extends TrackerError {
  constructor(message = 'Tracker is not connected') {
    super('NOT_CONNECTED', message);
  }
}

export class AlreadyConnectedError extends TrackerError {
  constructor() {
    super('ALREADY_CONNECTED', 'Tracker is already connected; close it first');
  }
}

export class ConnectionFailedError extends TrackerError {
  constructor(host: string, port: number, cause: unknown) {
    super('CONNECTION_FAILED', `Could not connect to tracker at ${host}:${port}`, { cause });
  }
}

export class MalformedFrameError extends TrackerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('MALFORMED_FRAME', message);
    this.issues = issues;
  }
}

export class UnsolicitedReplyError extends TrackerError {
  constructor(category: string, statusCode: number) {
    super(
      'UNSOLICITED_REPLY',
      `Received a ${category} reply (${statusCode}) with no request in flight`,
    );
  }
}

export class ReentrantProtocolError extends TrackerError {
  constructor() {
    super('REENTRANT_PROTOCOL', 'A previous exchange is still holding the reply slot');
  }
}

export class TrackerProtocolError extends TrackerError {
  readonly statusCode: number;

  constructor(statusCode: number, statusMessage?: string) {
    super(
      'TRACKER_PROTOCOL',
      statusMessage
        ? `Tracker protocol error (${statusCode}): ${statusMessage}`
        : `Tracker protocol error (${statusCode})`,
    );
    this.statusCode = statusCode;
  }
}

export class StreamProtocolError extends TrackerError {
  readonly statusCode: number;

  constructor(statusCode: number) {
    super('STREAM_PROTOCOL', `Push stream failed with tracker status ${statusCode}`);
    this.statusCode = statusCode;
  }
}

export class ConnectionLostError extends TrackerError {
  constructor(reason: string, cause?: unknown) {
    super('CONNECTION_LOST', `Lost tracker connection: ${reason}`, { cause });
  }
}

export class ShutdownTimeoutError extends TrackerError {
  readonly waitedMs: number;

  constructor(waitedMs: number) {
    super('SHUTDOWN_TIMEOUT', `Tracker link did not shut down within ${waitedMs}ms`);
    this.waitedMs = waitedMs;
  }
}
