export interface Logger {
  info(message: string): void;
}

/**
 * Collaborators handed to every repo by its caller.
 * The repo keeps a reference and never manages its lifecycle.
 */
export interface Context {
  logger: Logger;
}

export function createContext(logger: Logger = console): Context {
  return { logger };
}
