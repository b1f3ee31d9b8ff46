/**
 * Base module interface for renaming pipeline stages
 */

import type { RenameOptions } from '../types/index.js';

export interface PipelineModule<TInput, TOutput> {
  /** Module name */
  readonly name: string;

  /** Module description */
  readonly description: string;

  /**
   * Process the input and return the stage result
   * @param input - Module-specific input
   * @param options - Run options
   */
  process(input: TInput, options?: RenameOptions): Promise<TOutput>;
}

/**
 * Base abstract class for modules to extend
 */
export abstract class BaseModule<TInput, TOutput> implements PipelineModule<TInput, TOutput> {
  abstract readonly name: string;
  abstract readonly description: string;

  abstract process(input: TInput, options?: RenameOptions): Promise<TOutput>;

  protected log(message: string, verbose?: boolean): void {
    if (verbose) {
      console.log(`[${this.name}] ${message}`);
    }
  }

  protected logError(message: string): void {
    console.error(`[${this.name}] ERROR: ${message}`);
  }
}
