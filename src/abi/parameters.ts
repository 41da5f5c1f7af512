import { NotConfiguredError } from '../utils/errors.js';

export interface LensParameters {
  readonly abi: string;
}

/**
 * Holds the ABI text the lens decodes against.
 *
 * A new value replaces the previous one as a single frozen snapshot, and
 * every call runs to completion before another starts, so a reader always
 * sees either the whole old value or the whole new one.
 */
export class ParameterStore {
  private current: LensParameters | null = null;

  set(abi: string): void {
    this.current = Object.freeze({ abi });
  }

  /**
   * @throws NotConfiguredError if no ABI has been set
   */
  get(): string {
    if (this.current === null) {
      throw new NotConfiguredError();
    }
    return this.current.abi;
  }

  isConfigured(): boolean {
    return this.current !== null;
  }
}
