/**
 * Application error taxonomy.
 *
 * Every error the service raises on purpose extends {@link AppError} and carries
 * the HTTP status it maps to and a stable `kind` that clients can switch on.
 */

export type ErrorKind =
  | 'VALIDATION_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'SPOTIFY_AUTH_EXPIRED'
  | 'SPOTIFY_NOT_CONNECTED'
  | 'NOT_FOUND'
  | 'LYRICS_NOT_FOUND'
  | 'CONFLICT'
  | 'NO_ACTIVE_DEVICE'
  | 'NO_MOOD_DATA'
  | 'NO_TRACKS_AVAILABLE'
  | 'NO_ANALYZABLE_TRACKS'
  | 'EMPTY_INPUT'
  | 'UPSTREAM_SERVICE_ERROR'
  | 'STREAMING_SERVICE_ERROR'
  | 'LYRICS_SERVICE_ERROR'
  | 'PREDICTION_SERVICE_ERROR'
  | 'RECOMMENDATION_SERVICE_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'INTERNAL_ERROR';

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly kind: ErrorKind;

  constructor(message: string, statusCode: number, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.kind = kind;
  }
}

export class ValidationError extends AppError {
  readonly errors: FieldError[];

  constructor(message: string = 'Validation failed', errors: FieldError[] = []) {
    super(message, 400, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Could not validate credentials') {
    super(message, 401, 'AUTHENTICATION_ERROR');
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Not enough permissions', kind: ErrorKind = 'AUTHORIZATION_ERROR') {
    super(message, 403, kind);
  }
}

/** The stored Spotify token is invalid or expired; the user must reconnect. */
export class AuthExpiredError extends AuthorizationError {
  constructor(
    message: string = 'Spotify session expired. Please reconnect your Spotify account.',
    kind: ErrorKind = 'SPOTIFY_AUTH_EXPIRED'
  ) {
    super(message, kind);
  }
}

export class SpotifyNotConnectedError extends AuthExpiredError {
  constructor() {
    super('Not authenticated with Spotify. Please connect your Spotify account first.', 'SPOTIFY_NOT_CONNECTED');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', kind: ErrorKind = 'NOT_FOUND') {
    super(message, 404, kind);
  }
}

export class LyricsNotFoundError extends NotFoundError {
  constructor(title: string, artist: string) {
    super(`No lyrics found for "${title}" by ${artist}`, 'LYRICS_NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

export class NoActiveDeviceError extends AppError {
  constructor(message: string = 'Spotify active device not found. Please start playback on a Spotify device.') {
    super(message, 409, 'NO_ACTIVE_DEVICE');
  }
}

export class NoMoodDataError extends AppError {
  constructor(message: string = 'No mood data recorded yet') {
    super(message, 404, 'NO_MOOD_DATA');
  }
}

export class NoTracksAvailableError extends AppError {
  constructor(message: string = 'No recently played tracks to analyze') {
    super(message, 422, 'NO_TRACKS_AVAILABLE');
  }
}

export class NoAnalyzableTracksError extends AppError {
  constructor(trackCount: number) {
    super(`No mood data could be generated from ${trackCount} recent track(s)`, 422, 'NO_ANALYZABLE_TRACKS');
  }
}

export class EmptyInputError extends AppError {
  constructor(message: string = 'Cannot aggregate an empty set of mood vectors') {
    super(message, 422, 'EMPTY_INPUT');
  }
}

export class UpstreamServiceError extends AppError {
  constructor(message: string, kind: ErrorKind = 'UPSTREAM_SERVICE_ERROR', cause?: unknown) {
    super(message, 502, kind, { cause });
  }
}

export class StreamingServiceError extends UpstreamServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STREAMING_SERVICE_ERROR', cause);
  }
}

export class LyricsServiceError extends UpstreamServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 'LYRICS_SERVICE_ERROR', cause);
  }
}

export class PredictionServiceError extends UpstreamServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PREDICTION_SERVICE_ERROR', cause);
  }
}

export class RecommendationServiceError extends UpstreamServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RECOMMENDATION_SERVICE_ERROR', cause);
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'PERSISTENCE_ERROR', { cause });
  }
}
