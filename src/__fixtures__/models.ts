import { call, constant, parameter } from '../expressions/factory';
import { Methods } from '../expressions/methods';
import { Expression, IMethodCallExpression } from '../expressions/types';
import { ClassMap, ClassSerializer } from '../serialization/class-map';
import {
  ArraySerializer,
  BooleanSerializer,
  DateTimeSerializer,
  DictionarySerializer,
  DoubleSerializer,
  EnumSerializer,
  Int32Serializer,
  ObjectIdSerializer,
  StringSerializer
} from '../serialization/serializers';

export enum Color {
  Red = 1,
  Green = 2
}

const COLOR_VALUES = { Red: Color.Red, Green: Color.Green };

export const itemMap = new ClassMap('Item')
  .mapMember('Sku', { serializer: new StringSerializer() })
  .mapMember('Price', { serializer: new DoubleSerializer() })
  .mapMember('Qty', { serializer: new Int32Serializer() });

export const addressMap = new ClassMap('Address')
  .mapMember('City', { serializer: new StringSerializer() })
  .mapMember('Zip', { elementName: 'zip', serializer: new StringSerializer() });

const tags = new DictionarySerializer('Document', new StringSerializer(), new Int32Serializer());

export const personMap = new ClassMap('Person')
  .mapMember('Id', { elementName: '_id', serializer: new ObjectIdSerializer() })
  .mapMember('Name', { serializer: new StringSerializer() })
  .mapMember('Age', { serializer: new Int32Serializer() })
  .mapMember('Active', { serializer: new BooleanSerializer() })
  .mapMember('Born', { serializer: new DateTimeSerializer() })
  .mapMember('Tags', { serializer: tags })
  .mapMember('TagsAsDocuments', { serializer: tags.withDictionaryRepresentation('ArrayOfDocuments') })
  .mapMember('TagsAsArrays', { serializer: tags.withDictionaryRepresentation('ArrayOfArrays') })
  .mapMember('Scores', {
    serializer: new DictionarySerializer('Document', new Int32Serializer(), new Int32Serializer())
  })
  .mapMember('Palette', {
    serializer: new DictionarySerializer(
      'Document',
      new EnumSerializer('Color', COLOR_VALUES, 'int'),
      new Int32Serializer()
    )
  })
  .mapMember('Labels', {
    serializer: new DictionarySerializer(
      'Document',
      new EnumSerializer('Color', COLOR_VALUES, 'string'),
      new StringSerializer()
    )
  })
  .mapMember('Nicknames', { serializer: new ArraySerializer(new StringSerializer()) })
  .mapMember('Items', { serializer: new ArraySerializer(new ClassSerializer(itemMap)) })
  .mapMember('Address', { elementName: 'addr', serializer: new ClassSerializer(addressMap) });

export const personSerializer = new ClassSerializer(personMap);

/**
 * The document parameter `x` of a Person predicate
 */
export const x = parameter('x', personMap.type);

export function prop(name: string, target: Expression = x): Expression {
  return personMap.property(target, name);
}

export function containsKey(target: Expression, key: Expression): IMethodCallExpression {
  return call(target, Methods.containsKey(target.type), [key]);
}

export function containsKeyOf(memberName: string, key: unknown): IMethodCallExpression {
  return containsKey(prop(memberName), constant(key));
}
