import type { Property, PropertyStore } from "./types.ts";

export type PropertyValues = Partial<Record<Property, string>>;

export class Properties implements PropertyStore {
  private readonly values: PropertyValues;

  constructor(values: PropertyValues = {}) {
    this.values = { ...values };
  }

  getString(key: Property, defaultValue: string): string {
    return this.values[key] ?? defaultValue;
  }

  /** New store with `overrides` layered over these values. */
  with(overrides: PropertyValues): Properties {
    return new Properties({ ...this.values, ...overrides });
  }
}
