/**
 * Named factories for pluggable implementations.
 */
import { Effect } from "effect";
import { InvalidInput } from "./errors.js";

export class Registry<T> {
  private readonly _map = new Map<string, () => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T): void {
    this._map.set(name, factory);
  }

  /** Construct a fresh instance of the named implementation. */
  get(name: string): Effect.Effect<T, InvalidInput> {
    return Effect.suspend((): Effect.Effect<T, InvalidInput> => {
      const factory = this._map.get(name);
      if (!factory) {
        const avail = this.list().join(", ");
        return Effect.fail(
          new InvalidInput({
            message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
            entry: name,
          }),
        );
      }
      return Effect.succeed(factory());
    });
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
