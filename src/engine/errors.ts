export type ConfigErrorCode =
  | "MISSING_OPTIONS"
  | "CONFLICTING_OPTIONS"
  | "UNKNOWN_DIFFICULTY"
  | "INVALID_ROWS"
  | "INVALID_COLUMNS"
  | "INVALID_MINES"
  | "TOO_MANY_MINES"
  | "INVALID_GAME_COUNT";

// Thrown synchronously while building a game; nothing is created.
export class ConfigError extends Error {
  constructor(message: string, public readonly code: ConfigErrorCode) {
    super(message);
    this.name = "ConfigError";
  }
}
