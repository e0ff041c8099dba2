/**
 * Secret provider contract.
 *
 * A provider resolves a logical name (e.g. "JWT_SECRET") from one source.
 * `undefined` means "not here, ask the next provider"; throw only for an
 * unexpected failure of the source itself.
 */
export interface ISecretProvider {
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'resolve') === 'function'
  );
}
