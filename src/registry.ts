import { CustomError, TypeNotRegisteredError } from "./errors";
import type { ResolvedShape, Shape } from "./shape";

/**
 * Registry of named shapes, used to resolve `ref` shapes.
 */
export class ShapeRegistry {
  private byName: Map<string, Shape> = new Map();

  /**
   * Registers a shape under a name, replacing any earlier registration.
   */
  register(name: string, shape: Shape): void {
    this.byName.set(name, shape);
  }

  /**
   * Gets the shape registered under a name.
   */
  get(name: string): Shape {
    const shape = this.byName.get(name);
    if (!shape) {
      throw new TypeNotRegisteredError(name);
    }
    return shape;
  }

  /**
   * Checks if a name is registered.
   */
  isRegistered(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Returns the number of registered shapes.
   */
  get size(): number {
    return this.byName.size;
  }

  /**
   * Follows references until a concrete shape is reached. Shapes nested inside
   * the result are left as they are and resolved when they are reached.
   */
  resolve(shape: Shape): ResolvedShape {
    const seen = new Set<string>();
    let current = shape;
    for (;;) {
      if (current.kind !== "ref") {
        return current;
      }
      if (seen.has(current.name)) {
        throw new CustomError(`reference cycle through \`${current.name}\``);
      }
      seen.add(current.name);
      current = this.get(current.name);
    }
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
export const defaultRegistry = new ShapeRegistry();

/**
 * Registers a shape with the default registry.
 */
export function register(name: string, shape: Shape): void {
  defaultRegistry.register(name, shape);
}
