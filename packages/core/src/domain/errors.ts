export class ConfigMissingError extends Error {
  public readonly key: string;

  constructor(key: string, detail?: string) {
    super(detail ? `Configuration ${key} is unusable: ${detail}` : `Configuration ${key} is missing`);
    this.name = 'ConfigMissingError';
    this.key = key;
  }
}

export class NoEligibleQuestionError extends Error {
  public readonly regionId: string;

  constructor(regionId: string) {
    super(`No eligible question for region ${regionId}`);
    this.name = 'NoEligibleQuestionError';
    this.regionId = regionId;
  }
}

export class RotationConflictError extends Error {
  public readonly expectedCycleId: number | null;

  constructor(expectedCycleId: number | null, options?: { cause?: unknown }) {
    super(
      expectedCycleId === null
        ? 'Rotation conflict: a cycle was bootstrapped concurrently'
        : `Rotation conflict: active cycle ${expectedCycleId} changed concurrently`,
      options
    );
    this.name = 'RotationConflictError';
    this.expectedCycleId = expectedCycleId;
  }
}

/** The new cycle's rows already exist while the active pointer is unchanged. */
export class RotationIntegrityError extends Error {
  public readonly cycleId: number;
  public readonly conflictingKeys: string[];

  constructor(cycleId: number, conflictingKeys: string[], options?: { cause?: unknown }) {
    super(`Rotation to cycle ${cycleId} collides with existing rows: ${conflictingKeys.join(', ')}`, options);
    this.name = 'RotationIntegrityError';
    this.cycleId = cycleId;
    this.conflictingKeys = conflictingKeys;
  }
}

export class RotationCapacityError extends Error {
  public readonly itemCount: number;
  public readonly limit: number;

  constructor(itemCount: number, limit: number) {
    super(`Rotation needs ${itemCount} transactional writes; the limit is ${limit}`);
    this.name = 'RotationCapacityError';
    this.itemCount = itemCount;
    this.limit = limit;
  }
}

export class UnknownRegionError extends Error {
  public readonly regionId: string;

  constructor(regionId: string) {
    super(`Unknown region ${regionId}`);
    this.name = 'UnknownRegionError';
    this.regionId = regionId;
  }
}

export class NoActiveAssignmentError extends Error {
  public readonly regionId: string;

  constructor(regionId: string) {
    super(`No assignment in the active cycle for region ${regionId}`);
    this.name = 'NoActiveAssignmentError';
    this.regionId = regionId;
  }
}

export class TransientStoreError extends Error {
  public readonly operation: string;
  public readonly retryable = true;

  constructor(operation: string, cause: unknown) {
    super(`Store operation ${operation} failed transiently`, { cause });
    this.name = 'TransientStoreError';
    this.operation = operation;
  }
}

export class TimeoutError extends Error {
  public readonly label: string;
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export class QuestionAlreadyExistsError extends Error {
  public readonly questionId: string;

  constructor(questionId: string) {
    super(`Question ${questionId} already exists`);
    this.name = 'QuestionAlreadyExistsError';
    this.questionId = questionId;
  }
}
