import { TypeRef } from './types';

/**
 * Shared type references for the primitive types
 */
export const Types = {
  boolean: { kind: 'boolean' },
  string: { kind: 'string' },
  number: { kind: 'number' },
  date: { kind: 'date' },
  objectId: { kind: 'objectId' },
  regexp: { kind: 'regexp' },
  null: { kind: 'null' },
  unknown: { kind: 'unknown' },

  arrayOf(element: TypeRef): TypeRef {
    return { kind: 'array', element };
  },

  mapOf(key: TypeRef, value: TypeRef): TypeRef {
    return { kind: 'map', key, value };
  },

  classOf(name: string): TypeRef {
    return { kind: 'class', name };
  },

  enumOf(name: string): TypeRef {
    return { kind: 'enum', name };
  },

  functionOf(parameters: readonly TypeRef[], returnType: TypeRef): TypeRef {
    return { kind: 'function', parameters, returnType };
  }
} as const satisfies Record<string, TypeRef | ((...args: never[]) => TypeRef)>;

export function isBooleanType(type: TypeRef): boolean {
  return type.kind === 'boolean';
}

/**
 * Structural equality of two type references
 */
export function typesEqual(a: TypeRef, b: TypeRef): boolean {
  switch (a.kind) {
    case 'array':
      return b.kind === 'array' && typesEqual(a.element, b.element);
    case 'map':
      return b.kind === 'map' && typesEqual(a.key, b.key) && typesEqual(a.value, b.value);
    case 'class':
    case 'enum':
      return b.kind === a.kind && b.name === a.name;
    case 'function': {
      if (b.kind !== 'function' || a.parameters.length !== b.parameters.length) {
        return false;
      }
      const others = b.parameters;
      return (
        a.parameters.every((parameter, i) => typesEqual(parameter, others[i])) &&
        typesEqual(a.returnType, b.returnType)
      );
    }
    default:
      return a.kind === b.kind;
  }
}

/**
 * Human readable name of a type, used in diagnostics
 */
export function typeName(type: TypeRef): string {
  switch (type.kind) {
    case 'array':
      return `${typeName(type.element)}[]`;
    case 'map':
      return `Map<${typeName(type.key)}, ${typeName(type.value)}>`;
    case 'class':
    case 'enum':
      return type.name;
    case 'function':
      return `(${type.parameters.map(typeName).join(', ')}) => ${typeName(type.returnType)}`;
    case 'date':
      return 'Date';
    case 'objectId':
      return 'ObjectId';
    case 'regexp':
      return 'RegExp';
    default:
      return type.kind;
  }
}

/**
 * Infer the type of a literal value
 */
export function typeOfValue(value: unknown): TypeRef {
  if (value === null || value === undefined) return Types.null;
  if (typeof value === 'string') return Types.string;
  if (typeof value === 'number' || typeof value === 'bigint') return Types.number;
  if (typeof value === 'boolean') return Types.boolean;
  if (value instanceof Date) return Types.date;
  if (value instanceof RegExp) return Types.regexp;
  if (Array.isArray(value)) {
    const element = value.length > 0 ? typeOfValue(value[0]) : Types.unknown;
    return Types.arrayOf(element);
  }
  return Types.unknown;
}
