export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type BlackboardValue = JsonValue;

export type BlackboardSnapshot = Record<string, BlackboardValue>;

/** Keys written by the reference refactoring pipeline. */
export const StateKeys = {
  className: 'class_name',
  methodName: 'method_name',
  codeReview: 'code_review',
  refactoredCode: 'refactored_code',
  validationResult: 'validation_result',
  releaseStatus: 'release_status',
} as const;

export type StateKey = (typeof StateKeys)[keyof typeof StateKeys];

/**
 * Run-scoped key/value store the stages communicate through. Later stages
 * may overwrite a key an earlier stage wrote; nothing is ever deleted.
 * Not synchronised: the executor guarantees one run touches it at a time.
 */
export class Blackboard {
  private readonly values = new Map<string, BlackboardValue>();

  constructor(seed: BlackboardSnapshot = {}) {
    for (const [k, v] of Object.entries(seed)) this.values.set(k, v);
  }

  get(key: string): BlackboardValue | undefined {
    return this.values.get(key);
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  set(key: string, value: BlackboardValue): void {
    this.values.set(key, value);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  snapshot(): BlackboardSnapshot {
    return Object.fromEntries(this.values);
  }
}
