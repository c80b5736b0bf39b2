/**
 * Context Manager
 *
 * Computes the active ContextSet for a subject from registered calculators.
 * Hosts register a ContextCalculator per source of context (world, server,
 * game mode) at startup instead of the engine probing for integrations.
 */

import { ContextSet, type ContextSetBuilder } from '../types/context';
import { type Logger, silentLogger } from '../utils/logger';

export interface ContextCalculator {
  /** Identifies the calculator in logs */
  readonly name: string;
  calculate(subjectId: string, builder: ContextSetBuilder): void;
}

/**
 * Contributes one fixed pair, e.g. the name of this server
 */
export class StaticContextCalculator implements ContextCalculator {
  readonly name: string;

  constructor(
    private readonly key: string,
    private readonly value: string
  ) {
    this.name = `static:${key}`;
  }

  calculate(_subjectId: string, builder: ContextSetBuilder): void {
    if (this.value.length > 0) {
      builder.add(this.key, this.value);
    }
  }
}

export class ContextManager {
  private readonly calculators: ContextCalculator[] = [];
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  register(calculator: ContextCalculator): void {
    this.calculators.push(calculator);
  }

  unregister(calculator: ContextCalculator): boolean {
    const index = this.calculators.indexOf(calculator);
    if (index === -1) {
      return false;
    }
    this.calculators.splice(index, 1);
    return true;
  }

  /**
   * Run every calculator into one set. A failing calculator is logged and
   * skipped so the others still contribute.
   */
  getContexts(subjectId: string): ContextSet {
    const builder = ContextSet.builder();
    for (const calculator of this.calculators) {
      try {
        calculator.calculate(subjectId, builder);
      } catch (error) {
        this.logger.warn('Context calculator failed', {
          calculator: calculator.name,
          subject: subjectId,
          error,
        });
      }
    }
    return builder.build();
  }

  calculatorCount(): number {
    return this.calculators.length;
  }

  clear(): void {
    this.calculators.length = 0;
  }
}
