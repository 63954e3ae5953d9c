import type { AnyOperationDescriptor } from './descriptor';
import { UnknownOperationError } from './errors';

/**
 * Explicit mapping from operation identifiers to descriptors. Lookups keep the
 * concrete descriptor type, so results of `dispatcher.execute(registry.get(id), args)`
 * stay typed.
 */
export class OperationRegistry<TOps extends Record<string, AnyOperationDescriptor>> {
  private readonly operations: Readonly<TOps>;

  constructor(operations: TOps) {
    this.operations = Object.freeze({ ...operations });
  }

  get<K extends keyof TOps & string>(name: K): TOps[K] {
    if (!Object.hasOwn(this.operations, name)) {
      throw new UnknownOperationError(name);
    }
    return this.operations[name];
  }

  has(name: string): name is keyof TOps & string {
    return Object.hasOwn(this.operations, name);
  }

  names(): string[] {
    return Object.keys(this.operations);
  }
}

export function createOperationRegistry<TOps extends Record<string, AnyOperationDescriptor>>(
  operations: TOps,
): OperationRegistry<TOps> {
  return new OperationRegistry(operations);
}
