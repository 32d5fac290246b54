/**
 * Marker for a value that is not known until apply.
 */
export class UnknownValue {
  readonly unknown = true;

  toString(): string {
    return "(known after apply)";
  }
}

export const UNKNOWN = new UnknownValue();

/** A planned attribute: either a concrete value or unknown */
export type Planned<T> = T | UnknownValue;

export function isUnknown(value: unknown): value is UnknownValue {
  return value instanceof UnknownValue;
}
