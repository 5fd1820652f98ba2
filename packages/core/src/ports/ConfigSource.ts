export const CYCLE_DURATION_KEY = 'cycle-duration';

export interface ConfigSource {
  /** Returns the duration in milliseconds; throws `ConfigMissingError` when absent or unparsable. */
  getDuration(key: string): Promise<number>;
}
