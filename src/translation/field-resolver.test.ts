import { captureError } from '../__fixtures__/errors';
import { itemMap, personSerializer, prop, x } from '../__fixtures__/models';
import { astField } from '../ast/factory';
import { constant, index, member, parameter } from '../expressions/factory';
import { Types } from '../expressions/type-refs';
import { StringSerializer } from '../serialization/serializers';
import { TranslationContext } from './context';
import { UnresolvedFieldError } from './errors';
import { translatedFieldsEqual, translateFilterField } from './field-resolver';

describe('translateFilterField', () => {
  const context = TranslationContext.forRoot(x, personSerializer);

  it('should resolve a member to its element name', () => {
    const { field, serializer } = translateFilterField(context, prop('Id'));

    expect(field).toEqual(astField('_id'));
    expect(serializer.kind).toBe('ObjectIdSerializer');
  });

  it('should resolve nested members', () => {
    const zip = member(prop('Address'), 'Zip', Types.string);

    expect(translateFilterField(context, zip).field).toEqual(astField('addr', 'zip'));
  });

  it('should resolve dictionary keys and array positions', () => {
    const red = index(prop('Tags'), constant('red'), Types.number);
    const secondSku = member(
      index(prop('Items'), constant(1), itemMap.type),
      'Sku',
      Types.string
    );

    expect(translateFilterField(context, red).field).toEqual(astField('Tags', 'red'));
    expect(translateFilterField(context, secondSku).field).toEqual(astField('Items', '1', 'Sku'));
  });

  it('should reject the document itself', () => {
    const error = captureError(() => translateFilterField(context, x));

    expect(error).toBeInstanceOf(UnresolvedFieldError);
    expect(error).toHaveProperty('reason', 'the root document is not a field');
  });

  it('should reject parameters that are not in scope', () => {
    expect(() => translateFilterField(context, parameter('y', Types.string))).toThrow(
      'parameter y is not in scope'
    );
  });

  it('should reject unmapped members', () => {
    expect(() => translateFilterField(context, member(x, 'Nope', Types.string))).toThrow(
      'serializer ClassSerializer has no member named Nope'
    );
  });

  it('should reject members of values that are not documents', () => {
    expect(() => translateFilterField(context, member(prop('Name'), 'first', Types.string))).toThrow(
      'serializer StringSerializer does not have members'
    );
  });

  it('should reject indexes that are not constants', () => {
    const byName = index(prop('Tags'), prop('Name'), Types.number);

    expect(() => translateFilterField(context, byName)).toThrow('index must be a constant');
  });

  it('should reject negative array positions', () => {
    const last = index(prop('Nicknames'), constant(-1), Types.string);

    expect(() => translateFilterField(context, last)).toThrow(
      'array index must be a non-negative integer'
    );
  });

  it('should reject keys that do not serialize as strings', () => {
    const third = index(prop('Scores'), constant(3), Types.number);

    expect(() => translateFilterField(context, third)).toThrow(
      'key serializes as int instead of a string'
    );
  });

  it('should reject indexing the document', () => {
    expect(() => translateFilterField(context, index(x, constant('Name'), Types.string))).toThrow(
      'the root document cannot be indexed'
    );
  });

  it('should reject other expression kinds', () => {
    expect(() => translateFilterField(context, constant('Name'))).toThrow(
      'a constant expression does not denote a field'
    );
  });

  describe('inside an element scope', () => {
    const nickname = parameter('n', Types.string);
    const elementContext = context.withElementScope(astField('Nicknames'), nickname, new StringSerializer());

    it('should resolve the element parameter to the empty path', () => {
      expect(translateFilterField(elementContext, nickname).field).toEqual({ kind: 'field', path: [] });
    });

    it('should reject fields of the document', () => {
      expect(() => translateFilterField(elementContext, prop('Name'))).toThrow(
        'fields of x cannot be referenced inside $elemMatch on Nicknames'
      );
    });
  });

  describe('translatedFieldsEqual', () => {
    it('should compare paths and value types', () => {
      const name = translateFilterField(context, prop('Name'));
      const zip = translateFilterField(context, member(prop('Address'), 'Zip', Types.string));

      expect(translatedFieldsEqual(name, translateFilterField(context, prop('Name')))).toBe(true);
      expect(translatedFieldsEqual(name, zip)).toBe(false);
    });
  });
});

describe('TranslationContext', () => {
  it('should bind the root parameter', () => {
    const context = TranslationContext.forRoot(x, personSerializer);

    expect(context.symbolNames).toEqual(['x']);
    expect(context.tryGetSymbol(x)).toEqual({ parameter: x, serializer: personSerializer, isCurrent: false });
    expect(context.fieldScope).toBeUndefined();
  });

  it('should leave the enclosing context unchanged', () => {
    const context = TranslationContext.forRoot(x, personSerializer);
    const nickname = parameter('n', Types.string);
    const inner = context.withElementScope(astField('Nicknames'), nickname, new StringSerializer());

    expect(inner.symbolNames).toEqual(['x', 'n']);
    expect(context.symbolNames).toEqual(['x']);
  });

  it('should demote the previous element when scopes nest', () => {
    const outer = parameter('a', Types.string);
    const inner = parameter('b', Types.string);
    const context = TranslationContext.create()
      .withElementScope(astField('A'), outer, new StringSerializer())
      .withElementScope(astField('A', 'B'), inner, new StringSerializer());

    expect(context.tryGetSymbol(outer)?.isCurrent).toBe(false);
    expect(context.tryGetSymbol(inner)?.isCurrent).toBe(true);
    expect(context.fieldScope).toEqual(astField('A', 'B'));
  });
});
