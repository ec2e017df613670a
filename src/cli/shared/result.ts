import { ToolError, asErrorMessage } from '../../tools/errors.js';

export function formatCliError(error: unknown): string {
  if (error instanceof ToolError && error.errorCode) {
    return `ERROR: [${error.errorCode}] ${error.message}`;
  }
  return `ERROR: ${asErrorMessage(error)}`;
}

export async function runCommand(execute: () => Promise<number> | number): Promise<number> {
  try {
    return await Promise.resolve(execute());
  } catch (error) {
    console.error(formatCliError(error));
    return 1;
  }
}
