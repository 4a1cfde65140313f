/**
 * EnvironmentAdapter - Read access to environment variables
 *
 * The process environment is read only through this interface, so the
 * configuration merge and platform detection can be fed fixed values in tests.
 */

export interface EnvironmentSource {
  get(key: string): string | undefined;
  /** Snapshot of every variable */
  toRecord(): Record<string, string>;
}

/**
 * Environment backed by `process.env`. Empty values count as unset.
 */
export class ProcessEnvironment implements EnvironmentSource {
  get(key: string): string | undefined {
    const value = process.env[key];
    return value === '' ? undefined : value;
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined && value !== '') {
        record[key] = value;
      }
    }
    return record;
  }
}

/**
 * Fixed environment (tests, or a sanitized snapshot).
 */
export class StaticEnvironment implements EnvironmentSource {
  private readonly values: Record<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = { ...values };
  }

  get(key: string): string | undefined {
    const value = this.values[key];
    return value === '' ? undefined : value;
  }

  toRecord(): Record<string, string> {
    return { ...this.values };
  }
}
