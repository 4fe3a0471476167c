// ============================================
// ECS Errors
// ============================================

/**
 * Thrown when the world breaks a structural rule a system depends on,
 * such as the single-player requirement of the enemy bullet pass.
 * Indicates broken spawn setup; never retried.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
