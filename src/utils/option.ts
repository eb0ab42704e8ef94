/**
 * A simple Option monad for handling nullable values. Only `null` and
 * `undefined` count as empty, so readings of 0 or false survive a `map`.
 */
export class Option<T> {
  readonly value: T | null;

  constructor(value: T | null | undefined) {
    this.value = value ?? null;
  }

  /**
   * Applies a function to the value if it exists
   */
  map<TNext>(mapF: (value: T) => TNext | null | undefined): Option<TNext> {
    if (this.value !== null) {
      return new Option(mapF(this.value));
    }
    return new Option<TNext>(null);
  }

  /**
   * Returns the value or a fallback if the value is null
   */
  orElse<TElse>(elseValue: TElse): T | TElse {
    if (this.value === null) {
      return elseValue;
    }
    return this.value;
  }
}
