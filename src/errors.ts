/**
 * Raised when a caller hands us something we cannot work with:
 * an empty signing secret, an unknown enum value, a malformed request body.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
