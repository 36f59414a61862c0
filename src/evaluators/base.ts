/**
 * Serialization base for report evaluators.
 */

import { isDeepStrictEqual } from 'node:util';
import type { EvaluatorSpec } from '../types.js';

export abstract class BaseEvaluator {
  /**
   * Name used for this evaluator in dataset files. Defaults to the class name.
   */
  static getSerializationName(): string {
    // biome-ignore lint/complexity/noThisInStatic: `this` refers to the subclass
    return this.name;
  }

  getSerializationName(): string {
    return (this.constructor as typeof BaseEvaluator).getSerializationName();
  }

  /**
   * The constructor options that define this instance, in declaration order.
   * The first entry is the one a single positional argument sets.
   */
  protected abstract getFields(): Record<string, unknown>;

  /** Default values of the fields, omitted when serializing. */
  protected abstract getDefaults(): Record<string, unknown>;

  /** Fields whose value differs from its default. */
  buildSerializationArguments(): Record<string, unknown> {
    const defaults = this.getDefaults();
    return Object.fromEntries(
      Object.entries(this.getFields()).filter(
        ([key, value]) => !(key in defaults && isDeepStrictEqual(value, defaults[key])),
      ),
    );
  }

  asSpec(): EvaluatorSpec {
    const args = this.buildSerializationArguments();
    const keys = Object.keys(args);
    const name = this.getSerializationName();

    if (keys.length === 0) {
      return { name, arguments: null };
    }
    // compact form only when the lone argument is the positional field
    if (keys.length === 1 && keys[0] === Object.keys(this.getFields())[0]) {
      return { name, arguments: [args[keys[0]]] };
    }
    return { name, arguments: args };
  }

  toString(): string {
    const args = Object.entries(this.buildSerializationArguments())
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(', ');
    return `${this.getSerializationName()}(${args})`;
  }
}
