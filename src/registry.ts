import { ShapeNotRegisteredError } from "./errors";
import type { Shape } from "./shape";

/**
 * Registry maps names to shapes so that `ref` shapes can point at them.
 * Because references resolve lazily during decoding, a shape may refer to
 * itself (trees, linked lists).
 */
export class Registry {
  private byName: Map<string, Shape> = new Map();

  /**
   * Registers a shape under `name`, replacing any earlier definition.
   */
  define(name: string, shape: Shape): void {
    this.byName.set(name, shape);
  }

  /**
   * Gets the shape registered under `name`.
   */
  resolve(name: string): Shape {
    const shape = this.byName.get(name);
    if (!shape) {
      throw new ShapeNotRegisteredError(name);
    }
    return shape;
  }

  /**
   * Checks if a shape name is registered.
   */
  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.byName.clear();
  }
}

/**
 * Global default registry instance.
 */
export const defaultRegistry = new Registry();

/**
 * Registers a shape with the default registry.
 */
export function define(name: string, shape: Shape): void {
  defaultRegistry.define(name, shape);
}
