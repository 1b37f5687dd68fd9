export enum TailRecoveryPolicy {
  TRUNCATE = 'truncate',
  KEEP = 'keep',
}

export interface RecordLimits {
  readonly maxKeyBytes: number;
  readonly maxValueBytes: number;
}

export interface StoreConfig extends RecordLimits {
  readonly dataFile: string;
  readonly tailRecovery: TailRecoveryPolicy;
}

/** Largest length the 4-byte record length fields can carry. */
export const MAX_U32 = 0xffffffff;

export const DEFAULT_CONFIG: StoreConfig = {
  dataFile: 'data.db',
  maxKeyBytes: 64 * 1024,
  maxValueBytes: 1024 * 1024,
  tailRecovery: TailRecoveryPolicy.TRUNCATE,
};

export function resolveConfig(config?: Partial<StoreConfig>): StoreConfig {
  const resolved: StoreConfig = { ...DEFAULT_CONFIG, ...config };

  if (resolved.dataFile.trim() === '') {
    throw new Error('dataFile must not be empty');
  }
  checkLimit('maxKeyBytes', resolved.maxKeyBytes);
  checkLimit('maxValueBytes', resolved.maxValueBytes);

  return resolved;
}

function checkLimit(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer`);
  }
  if (value > MAX_U32) {
    throw new Error(`${name} must be <= ${MAX_U32}`);
  }
}
