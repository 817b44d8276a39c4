export const UNKNOWN_ERROR_CODE = "APP/UNKNOWN" as const;

export type AppError = {
  message: string;
  code?: string;
  context?: Record<string, string>;
  cause?: AppError;
};

export class UnknownCommandError extends Error {
  readonly code = UNKNOWN_ERROR_CODE;
  readonly knownCommands: readonly string[];

  constructor(command: string, knownCommands: readonly string[]) {
    super(`Unknown HTTP command '${command}'. Known commands: ${knownCommands.join(", ")}`);
    this.name = "UnknownCommandError";
    this.knownCommands = knownCommands;
  }
}

export class HttpAdapterResolutionError extends Error {
  readonly code = UNKNOWN_ERROR_CODE;

  constructor(requested: string) {
    super(`Unknown HTTP adapter '${requested}'. Set VITE_HTTP_ADAPTER to "axios" or "fake".`);
    this.name = "HttpAdapterResolutionError";
  }
}
