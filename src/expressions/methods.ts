/**
 * Method descriptors for the calls the source language can express.
 *
 * A call expression carries the signature of the method it invokes; these
 * helpers build the signatures for the methods docfilter knows about. Callers
 * may describe other methods by hand; translators only claim a call whose
 * signature matches one they recognize.
 */

import { Types } from './type-refs';
import { IMethodInfo, TypeRef } from './types';

function instanceMethod(
  declaringType: TypeRef,
  name: string,
  parameters: IMethodInfo['parameters'],
  returnType: TypeRef = Types.boolean
): IMethodInfo {
  return {
    name,
    declaringType,
    parameters,
    returnType,
    isStatic: false,
    isPublic: true
  };
}

function keyType(mapType: TypeRef): TypeRef {
  return mapType.kind === 'map' ? mapType.key : Types.unknown;
}

function valueType(mapType: TypeRef): TypeRef {
  return mapType.kind === 'map' ? mapType.value : Types.unknown;
}

function elementType(arrayType: TypeRef): TypeRef {
  return arrayType.kind === 'array' ? arrayType.element : Types.unknown;
}

export const Methods = {
  /**
   * `dictionary.containsKey(key)`
   */
  containsKey(mapType: TypeRef): IMethodInfo {
    return instanceMethod(mapType, 'containsKey', [{ name: 'key', type: keyType(mapType) }]);
  },

  /**
   * `map.has(key)`, the Map spelling of containsKey
   */
  has(mapType: TypeRef): IMethodInfo {
    return instanceMethod(mapType, 'has', [{ name: 'key', type: keyType(mapType) }]);
  },

  /**
   * `dictionary.containsValue(value)`
   */
  containsValue(mapType: TypeRef): IMethodInfo {
    return instanceMethod(mapType, 'containsValue', [
      { name: 'value', type: valueType(mapType) }
    ]);
  },

  startsWith(): IMethodInfo {
    return instanceMethod(Types.string, 'startsWith', [{ name: 'searchString', type: Types.string }]);
  },

  endsWith(): IMethodInfo {
    return instanceMethod(Types.string, 'endsWith', [{ name: 'searchString', type: Types.string }]);
  },

  stringIncludes(): IMethodInfo {
    return instanceMethod(Types.string, 'includes', [{ name: 'searchString', type: Types.string }]);
  },

  /**
   * `regexp.test(value)`
   */
  test(): IMethodInfo {
    return instanceMethod(Types.regexp, 'test', [{ name: 'string', type: Types.string }]);
  },

  /**
   * `array.includes(value)`
   */
  arrayIncludes(arrayType: TypeRef): IMethodInfo {
    return instanceMethod(arrayType, 'includes', [
      { name: 'searchElement', type: elementType(arrayType) }
    ]);
  },

  /**
   * `array.some(element => predicate)`
   */
  some(arrayType: TypeRef): IMethodInfo {
    return instanceMethod(arrayType, 'some', [
      {
        name: 'predicate',
        type: Types.functionOf([elementType(arrayType)], Types.boolean)
      }
    ]);
  }
};
