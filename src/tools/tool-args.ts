/**
 * Typed readers for validated tool arguments
 *
 * The tool system checks arguments against the declared schema before a
 * handler runs; these readers narrow the values for the handler and throw
 * if a handler is called directly with something else.
 */

export function stringArg(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new TypeError(`Argument '${name}' must be a string`);
  }
  return value;
}

export function optionalStringArg(args: Record<string, unknown>, name: string): string | undefined {
  const value = args[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new TypeError(`Argument '${name}' must be a string`);
  }
  return value;
}

export function optionalNumberArg(args: Record<string, unknown>, name: string): number | undefined {
  const value = args[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new TypeError(`Argument '${name}' must be a number`);
  }
  return value;
}

export function optionalStringArrayArg(args: Record<string, unknown>, name: string): string[] | undefined {
  const value = args[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new TypeError(`Argument '${name}' must be an array of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new TypeError(`Argument '${name}' must be an array of strings`);
    }
    items.push(item);
  }
  return items;
}
