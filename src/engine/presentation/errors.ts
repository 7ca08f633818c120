/**
 * Raised when the coordinator is wired incorrectly, such as a second
 * coordinator constructed while another is still active.
 */
export class CoordinatorConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoordinatorConfigurationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
