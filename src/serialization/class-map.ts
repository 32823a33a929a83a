/**
 * Class maps describe how the members of a model type are stored.
 *
 * A class map is configured once, then frozen when a ClassSerializer is built
 * from it. Translators read it through the document serializer capability.
 */

import { member } from '../expressions/factory';
import { Types } from '../expressions/type-refs';
import { Expression, IMemberExpression, TypeRef } from '../expressions/types';
import { BsonValue } from './bson-value';
import { BsonSerializationError, ClassMapError } from './errors';
import { IBsonSerializer, IDocumentSerializer, IMemberSerializationInfo } from './types';

/**
 * Options for mapping a member
 */
export interface IMemberMapOptions {
  /**
   * Name of the element in the stored document. Defaults to the member name.
   */
  elementName?: string;

  /**
   * Serializer for the member's values. A function may be given for members
   * whose type refers back to a class that is not yet built.
   */
  serializer: IBsonSerializer | (() => IBsonSerializer);
}

interface IMemberMap {
  memberName: string;
  elementName: string;
  serializer: IBsonSerializer | (() => IBsonSerializer);
}

export class ClassMap {
  public readonly type: TypeRef;
  private readonly memberMaps = new Map<string, IMemberMap>();
  private readonly elementNames = new Set<string>();
  private frozen = false;

  constructor(public readonly typeName: string) {
    this.type = Types.classOf(typeName);
  }

  /**
   * Map a member of the class
   * @throws {ClassMapError} If the class map is frozen or the member or element is already mapped
   */
  public mapMember(memberName: string, options: IMemberMapOptions): this {
    if (this.frozen) {
      throw new ClassMapError(`Class map for ${this.typeName} is frozen`);
    }
    const elementName = options.elementName ?? memberName;
    if (this.memberMaps.has(memberName)) {
      throw new ClassMapError(`Member ${this.typeName}.${memberName} is already mapped`);
    }
    if (this.elementNames.has(elementName)) {
      throw new ClassMapError(
        `Element name "${elementName}" is already used by another member of ${this.typeName}`
      );
    }

    this.memberMaps.set(memberName, { memberName, elementName, serializer: options.serializer });
    this.elementNames.add(elementName);
    return this;
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public get memberNames(): string[] {
    return Array.from(this.memberMaps.keys());
  }

  public getMemberSerializationInfo(memberName: string): IMemberSerializationInfo | undefined {
    const memberMap = this.memberMaps.get(memberName);
    if (!memberMap) {
      return undefined;
    }
    const serializer =
      typeof memberMap.serializer === 'function' ? memberMap.serializer() : memberMap.serializer;
    return { elementName: memberMap.elementName, serializer };
  }

  /**
   * Build a member access node typed from the member's serializer
   * @throws {ClassMapError} If the member is not mapped
   */
  public property(target: Expression, memberName: string): IMemberExpression {
    const info = this.getMemberSerializationInfo(memberName);
    if (!info) {
      throw new ClassMapError(`${this.typeName} has no mapped member named ${memberName}`);
    }
    return member(target, memberName, info.serializer.valueType);
  }
}

/**
 * Serializes instances of a mapped class as documents
 */
export class ClassSerializer implements IDocumentSerializer {
  public readonly kind = 'ClassSerializer';
  public readonly valueType: TypeRef;

  constructor(public readonly classMap: ClassMap) {
    classMap.freeze();
    this.valueType = classMap.type;
  }

  public tryGetMemberSerializationInfo(memberName: string): IMemberSerializationInfo | undefined {
    return this.classMap.getMemberSerializationInfo(memberName);
  }

  public serialize(value: unknown): BsonValue {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new BsonSerializationError(
        `Expected an instance of ${this.classMap.typeName}`,
        this.kind
      );
    }

    const members = new Map<string, unknown>(Object.entries(value));
    const document: Record<string, BsonValue> = {};
    for (const memberName of this.classMap.memberNames) {
      const info = this.classMap.getMemberSerializationInfo(memberName);
      const memberValue = members.get(memberName);
      if (info && memberValue !== undefined) {
        document[info.elementName] = memberValue === null ? null : info.serializer.serialize(memberValue);
      }
    }
    return document;
  }
}
