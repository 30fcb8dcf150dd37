import { Husker, TextHusker, requireValue } from './internal.js';
import type { ListHusker } from './internal.js';
import type { Replacement, SpecArg } from './types.js';

/**
 * A number or boolean, typically from structured data. Searches and string
 * operations run on its text form.
 */
export class ScalarHusker extends Husker<number | boolean> {
  constructor(value: number | boolean) {
    super(requireValue(value, 'ScalarHusker'));
  }

  selection(pattern: string | RegExp, flags = ''): ListHusker {
    return this.text.selection(pattern, flags);
  }

  get text(): TextHusker {
    return new TextHusker(String(this.value));
  }

  get multiline(): TextHusker {
    return this.text;
  }

  get str(): string {
    return String(this.value);
  }

  get raw(): number | boolean {
    return this.value;
  }

  get int(): number {
    return typeof this.value === 'boolean' ? Number(this.value) : Math.trunc(this.value);
  }

  get float(): number {
    return Number(this.value);
  }

  sub(pattern: string | RegExp, replacement: Replacement, flags = ''): TextHusker {
    return this.text.sub(pattern, replacement, flags);
  }

  reprSpec(...spec: SpecArg[]): string {
    return this.text.reprSpec(...spec);
  }
}
