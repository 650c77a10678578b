/**
 * Deployment error taxonomy
 */

/**
 * - environment: a required local tool is missing
 * - input: bad configuration or source directory
 * - archive: local packaging failed
 * - transport: scp/ssh exited non-zero (remote sub-steps included)
 */
export type DeployErrorKind = 'environment' | 'input' | 'archive' | 'transport';

export class DeployError extends Error {
  readonly kind: DeployErrorKind;

  constructor(kind: DeployErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeployError';
    this.kind = kind;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
