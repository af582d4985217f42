import * as core from '@actions/core';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

// Routes through the Actions toolkit so warnings and errors show up as annotations.
export const actionsLogger: Logger = {
  debug: message => core.debug(message),
  info: message => core.info(message),
  warning: message => core.warning(message),
  error: message => core.error(message),
};

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
