/**
 * Error helpers: message extraction, the shared message table, and the
 * aggregate error used to report every configuration problem at once.
 */

/**
 * Extract a printable message from anything thrown or rejected
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Collects errors from many independent checks and formats them as one.
 *
 * Appending another MultiError flattens it, so nested sub-configurations
 * (communicator, disks) contribute their errors at the top level.
 */
export class MultiError extends Error {
  readonly errors: Error[];

  constructor(errors: Error[] = []) {
    super('');
    this.name = 'MultiError';
    this.errors = [];
    this.append(...errors);
  }

  append(...errors: Array<Error | string | null | undefined>): this {
    for (const error of errors) {
      if (error == null) continue;
      if (error instanceof MultiError) {
        this.errors.push(...error.errors);
      } else {
        this.errors.push(typeof error === 'string' ? new Error(error) : error);
      }
    }
    this.message = formatErrors(this.errors);
    return this;
  }

  get size(): number {
    return this.errors.length;
  }

  /** Messages of the collected errors, in the order they were appended */
  messages(): string[] {
    return this.errors.map((error) => error.message);
  }

  /** The aggregate itself when it holds errors, otherwise null */
  orNull(): MultiError | null {
    return this.errors.length > 0 ? this : null;
  }
}

function formatErrors(errors: Error[]): string {
  const points = errors.map((error) => `* ${error.message}`);
  return `${errors.length} error(s) occurred:\n\n${points.join('\n')}`;
}

/**
 * Error message builders shared across the config modules
 */
export const ERROR_MESSAGES = {
  UNKNOWN_KEY: (key: string, scope?: string) =>
    scope ? `${scope}: unknown configuration key: "${key}"` : `unknown configuration key: "${key}"`,
  REQUIRED: (key: string) => `a ${key} must be specified`,
  INVALID_VALUE: (key: string, reason: string) => `${key}: ${reason}`,
  FILE_NOT_FOUND: (key: string, file: string) => `${key}: file "${file}" does not exist`,
  FILE_UNREADABLE: (key: string, file: string, reason: string) =>
    `${key}: could not read "${file}": ${reason}`,
  MUTUALLY_EXCLUSIVE: (keys: string[]) =>
    `only one of ${keys.map((key) => `'${key}'`).join(', ')} may be set`,
  MACHINE_IMAGE_EXISTS: (name: string, project: string) =>
    `Machine Image ${name} already exists in project ${project}.\n` +
    'Use the force flag to delete it prior to building.',
  STATE_MISSING: (key: string) => `build state has no "${key}" entry`,
  CANCELLED: (step: string) => `${step} was cancelled`,
} as const;
