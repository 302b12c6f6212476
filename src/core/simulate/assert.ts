/**
 * Named assertions for scenarios. A failure throws ScenarioAssertionError.
 */
import { ScenarioAssertionError } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';

function show(value: unknown): string {
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

function excerpt(text: string, limit = 200): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export class ScenarioAssert {
  equal<T>(assertion: string, actual: T, expected: T): void {
    if (actual !== expected) {
      throw new ScenarioAssertionError(assertion, show(expected), show(actual));
    }
  }

  ok(assertion: string, condition: boolean): void {
    if (!condition) {
      throw new ScenarioAssertionError(assertion, 'true', 'false');
    }
  }

  contains(assertion: string, text: string, needle: string): void {
    if (!text.includes(needle)) {
      throw new ScenarioAssertionError(assertion, `text containing ${show(needle)}`, excerpt(text));
    }
  }

  notContains(assertion: string, text: string, needle: string): void {
    if (text.includes(needle)) {
      throw new ScenarioAssertionError(assertion, `text without ${show(needle)}`, excerpt(text));
    }
  }

  async fileExists(assertion: string, filePath: string): Promise<void> {
    if (!(await fileExists(filePath))) {
      throw new ScenarioAssertionError(assertion, `file ${filePath}`, 'missing');
    }
  }

  /**
   * Expect `fn` to reject, optionally with a specific error class. Returns the error.
   */
  async throws<E extends Error>(
    assertion: string,
    fn: () => Promise<unknown>,
    errorClass?: new (...args: never[]) => E
  ): Promise<Error> {
    try {
      await fn();
    } catch (error) {
      if (!(error instanceof Error)) {
        throw new ScenarioAssertionError(assertion, errorClass?.name ?? 'Error', String(error));
      }
      if (errorClass && !(error instanceof errorClass)) {
        throw new ScenarioAssertionError(assertion, errorClass.name, `${error.name}: ${error.message}`);
      }
      return error;
    }
    throw new ScenarioAssertionError(assertion, errorClass?.name ?? 'an error', 'no error');
  }
}
