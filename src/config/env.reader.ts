const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Reads typed values from an environment map. A value that cannot be parsed
 * falls back to the default and is recorded in `warnings`.
 */
export class EnvReader {
  public readonly warnings: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  float(key: string, defaultValue: number): number {
    const raw = this.raw(key);
    if (raw === undefined) return defaultValue;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.warnings.push(`${key}="${raw}" is not a number, using ${defaultValue}`);
      return defaultValue;
    }
    return value;
  }

  int(key: string, defaultValue: number): number {
    const raw = this.raw(key);
    if (raw === undefined) return defaultValue;

    if (!INTEGER_PATTERN.test(raw)) {
      this.warnings.push(`${key}="${raw}" is not an integer, using ${defaultValue}`);
      return defaultValue;
    }
    return Number.parseInt(raw, 10);
  }

  string(key: string, defaultValue: string): string {
    return this.raw(key) ?? defaultValue;
  }

  list(key: string, defaultValue: readonly string[]): string[] {
    const raw = this.raw(key);
    if (raw === undefined) return [...defaultValue];

    const items = raw
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean);
    return items.length > 0 ? items : [...defaultValue];
  }

  bool(key: string, defaultValue: boolean): boolean {
    const raw = this.raw(key);
    if (raw === undefined) return defaultValue;

    const normalized = raw.toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;

    this.warnings.push(`${key}="${raw}" is not a boolean, using ${defaultValue}`);
    return defaultValue;
  }

  // empty and whitespace-only values count as unset
  private raw(key: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : undefined;
  }
}
