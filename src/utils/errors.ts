export class GraphPipelineError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'GraphPipelineError';
  }
}

/**
 * Required store constraints are still absent after the one-time repair.
 * Raised before the first write, so nothing has been mutated.
 */
export class SchemaConstraintError extends GraphPipelineError {
  constructor(public readonly missingConstraints: string[]) {
    super(`Schema constraints missing after setup: ${missingConstraints.join(', ')}`);
    this.name = 'SchemaConstraintError';
  }
}

export class ConstraintViolationError extends GraphPipelineError {
  constructor(
    public readonly constraint: string,
    message: string,
    cause?: Error
  ) {
    super(message, cause);
    this.name = 'ConstraintViolationError';
  }
}

export class ArtifactFormatError extends GraphPipelineError {
  constructor(
    public readonly artifactPath: string,
    message: string
  ) {
    super(`Invalid artifact ${artifactPath}: ${message}`);
    this.name = 'ArtifactFormatError';
  }
}
