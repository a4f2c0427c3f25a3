import { Element, type ElementClass } from './Element.js';

/**
 * Node that carries its own text and is never subdivided by type.
 */
export abstract class LeafElement extends Element {
  protected *allStrings(strip: boolean, types: readonly ElementClass[]): Generator<string> {
    if (types.length > 0) {
      throw new TypeError(`${this.constructor.name} does not support type filters`);
    }
    yield this.renderText(strip);
  }
}
