/**
 * Argument readers for MCP tool calls
 *
 * Tool arguments arrive as untyped JSON; these narrow them or throw with the
 * offending key named.
 */

export type ToolArgs = Record<string, unknown>;

export function toArgs(raw: unknown): ToolArgs {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Tool arguments must be an object');
  }
  return Object.fromEntries(Object.entries(raw));
}

export function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new Error(`"${key}" must be a string`);
  }
  return value;
}

export function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`"${key}" must be a string`);
  }
  return value;
}

export function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`"${key}" must be a number`);
  }
  return value;
}

export function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`"${key}" must be a boolean`);
  }
  return value;
}

export function optionalEnum<T extends string>(args: ToolArgs, key: string, values: readonly T[]): T | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  const match = values.find(v => v === value);
  if (match === undefined) {
    throw new Error(`"${key}" must be one of: ${values.join(', ')}`);
  }
  return match;
}
