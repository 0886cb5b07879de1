export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }

    return value;
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

class LiteralNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    if (value === null || value === undefined) {
      return null;
    }

    return this.inner.parse(value, path);
  }
}

class FallbackNode<T> implements JotSchema<T> {
  constructor(readonly inner: JotSchema<T>, readonly fallback: T) {}

  parse(value: unknown, path: string = 'value'): T {
    if (value === null || value === undefined) {
      return this.fallback;
    }

    return this.inner.parse(value, path);
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }> {
  constructor(readonly shape: Shape) {}

  // Unknown keys are ignored; Reddit things carry far more fields than we read.
  parse(value: unknown, path: string = 'value') {
    if (!isRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  number: (): JotSchema<number> => new NumberNode(),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  literal: <TValue extends readonly string[]>(values: TValue): JotSchema<TValue[number]> => new LiteralNode(values),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  withDefault: <T>(schema: JotSchema<T>, fallback: T): JotSchema<T> => new FallbackNode(schema, fallback),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape) => new ObjectNode(shape),
};
