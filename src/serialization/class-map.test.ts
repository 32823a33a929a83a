import { parameter } from '../expressions/factory';
import { Types } from '../expressions/type-refs';
import { ClassMap, ClassSerializer } from './class-map';
import { BsonSerializationError, ClassMapError } from './errors';
import { Int32Serializer, StringSerializer } from './serializers';
import { isDocumentSerializer } from './types';

describe('ClassMap', () => {
  const createMap = () =>
    new ClassMap('Account')
      .mapMember('Id', { elementName: '_id', serializer: new StringSerializer() })
      .mapMember('Balance', { serializer: new Int32Serializer() });

  it('should describe mapped members', () => {
    const classMap = createMap();

    expect(classMap.type).toEqual(Types.classOf('Account'));
    expect(classMap.memberNames).toEqual(['Id', 'Balance']);
    expect(classMap.getMemberSerializationInfo('Id')).toEqual({
      elementName: '_id',
      serializer: new StringSerializer()
    });
    expect(classMap.getMemberSerializationInfo('Missing')).toBeUndefined();
  });

  it('should reject duplicate members and element names', () => {
    const classMap = createMap();

    expect(() => classMap.mapMember('Id', { serializer: new StringSerializer() })).toThrow(
      'Member Account.Id is already mapped'
    );
    expect(() => classMap.mapMember('Other', { elementName: '_id', serializer: new StringSerializer() })).toThrow(
      'Element name "_id" is already used by another member of Account'
    );
  });

  it('should be frozen once a serializer is built from it', () => {
    const classMap = createMap();
    new ClassSerializer(classMap);

    expect(classMap.isFrozen).toBe(true);
    expect(() => classMap.mapMember('Owner', { serializer: new StringSerializer() })).toThrow(ClassMapError);
  });

  it('should resolve lazily provided serializers', () => {
    const node = new ClassMap('Node');
    const nodeSerializer: ClassSerializer = new ClassSerializer(
      node.mapMember('Parent', { serializer: () => nodeSerializer })
    );

    expect(node.getMemberSerializationInfo('Parent')?.serializer).toBe(nodeSerializer);
  });

  it('should build member expressions typed by the member serializer', () => {
    const classMap = createMap();
    const account = parameter('a', classMap.type);

    expect(classMap.property(account, 'Balance')).toEqual({
      kind: 'member',
      target: account,
      name: 'Balance',
      type: Types.number
    });
    expect(() => classMap.property(account, 'Owner')).toThrow('Account has no mapped member named Owner');
  });
});

describe('ClassSerializer', () => {
  const serializer = new ClassSerializer(
    new ClassMap('Account')
      .mapMember('Id', { elementName: '_id', serializer: new StringSerializer() })
      .mapMember('Balance', { serializer: new Int32Serializer() })
  );

  it('should expose the document capability', () => {
    expect(isDocumentSerializer(serializer)).toBe(true);
    expect(serializer.tryGetMemberSerializationInfo('Balance')?.elementName).toBe('Balance');
  });

  it('should serialize mapped members under their element names', () => {
    expect(serializer.serialize({ Id: 'a1', Balance: 10, Unmapped: true })).toEqual({ _id: 'a1', Balance: 10 });
  });

  it('should reject values that are not objects', () => {
    expect(() => serializer.serialize('a1')).toThrow(BsonSerializationError);
  });
});
