import { captureError } from '../../__fixtures__/errors';
import { containsKey, containsKeyOf, Color, personSerializer, prop, x } from '../../__fixtures__/models';
import { renderFilter } from '../../ast/render';
import { call, constant, lambda } from '../../expressions/factory';
import { Methods } from '../../expressions/methods';
import { Types } from '../../expressions/type-refs';
import { Expression } from '../../expressions/types';
import { BsonSerializationError } from '../../serialization/errors';
import { FilterTranslator } from '../../translators/filter';
import {
  NonConstantOrNonStringKeyError,
  NotADictionaryError,
  UnsupportedExpressionError,
  UnsupportedRepresentationError
} from '../errors';
import { isContainsKeyMethod } from './contains-key';

describe('containsKey translation', () => {
  const translator = new FilterTranslator(personSerializer);
  const where = (body: Expression) => translator.translate(lambda([x], body));

  describe('Document representation', () => {
    it('should check that the sub-field named by the key exists', () => {
      expect(where(containsKeyOf('Tags', 'red'))).toEqual({
        type: 'exists',
        field: { kind: 'field', path: ['Tags', 'red'] },
        exists: true
      });
    });

    it('should render as an $exists condition on the dotted path', () => {
      expect(renderFilter(where(containsKeyOf('Tags', 'red')))).toEqual({
        'Tags.red': { $exists: true }
      });
    });

    it('should treat Map.has like containsKey', () => {
      const tags = prop('Tags');
      const has = call(tags, Methods.has(tags.type), [constant('blue')]);

      expect(renderFilter(where(has))).toEqual({ 'Tags.blue': { $exists: true } });
    });

    it('should accept enum keys stored by name', () => {
      expect(renderFilter(where(containsKeyOf('Labels', Color.Green)))).toEqual({
        'Labels.Green': { $exists: true }
      });
    });

    it('should produce the same filter for the same input', () => {
      const predicate = lambda([x], containsKeyOf('Tags', 'red'));

      expect(translator.translate(predicate)).toEqual(translator.translate(predicate));
    });
  });

  describe('other representations', () => {
    it('should reject ArrayOfDocuments and name the representation', () => {
      const error = captureError(() => where(containsKeyOf('TagsAsDocuments', 'red')));

      expect(error).toBeInstanceOf(UnsupportedRepresentationError);
      expect(error).toBeInstanceOf(UnsupportedExpressionError);
      expect(error).toMatchObject({
        representation: 'ArrayOfDocuments',
        message: expect.stringMatching(/array/i)
      });
      expect(error).toHaveProperty(
        'message',
        'Expression not supported: x.TagsAsDocuments.containsKey("red") because containsKey is not supported when the dictionary representation is ArrayOfDocuments.'
      );
    });

    it('should reject ArrayOfArrays', () => {
      const error = captureError(() => where(containsKeyOf('TagsAsArrays', 'red')));

      expect(error).toBeInstanceOf(UnsupportedRepresentationError);
      expect(error).toHaveProperty('representation', 'ArrayOfArrays');
    });
  });

  describe('keys', () => {
    it('should reject a key that is not a constant', () => {
      const error = captureError(() => where(containsKey(prop('Tags'), prop('Name'))));

      expect(error).toBeInstanceOf(NonConstantOrNonStringKeyError);
      expect(error).toHaveProperty(
        'message',
        'Expression not supported: x.Tags.containsKey(x.Name) because key must be a constant represented as a string.'
      );
    });

    it('should reject integer keys', () => {
      expect(() => where(containsKeyOf('Scores', 3))).toThrow(NonConstantOrNonStringKeyError);
    });

    it('should reject enum keys stored as integers', () => {
      expect(() => where(containsKeyOf('Palette', Color.Red))).toThrow(NonConstantOrNonStringKeyError);
    });

    it('should keep the serializer failure as the cause', () => {
      const error = captureError(() => where(containsKeyOf('Tags', 5)));

      expect(error).toBeInstanceOf(NonConstantOrNonStringKeyError);
      expect(error).toMatchObject({
        reason: 'key cannot be serialized by StringSerializer',
        cause: expect.any(BsonSerializationError)
      });
    });
  });

  it('should reject a receiver that is not a dictionary', () => {
    const error = captureError(() => where(containsKey(prop('Name'), constant('red'))));

    expect(error).toBeInstanceOf(NotADictionaryError);
    expect(error).toMatchObject({
      serializerKind: 'StringSerializer',
      message:
        'Expression not supported: x.Name.containsKey("red") because serializer StringSerializer does not implement the dictionary serializer capability.'
    });
  });

  describe('isContainsKeyMethod', () => {
    const mapType = Types.mapOf(Types.string, Types.number);

    it('should claim containsKey and has', () => {
      expect(isContainsKeyMethod(Methods.containsKey(mapType))).toBe(true);
      expect(isContainsKeyMethod(Methods.has(mapType))).toBe(true);
    });

    it('should not claim static methods', () => {
      expect(isContainsKeyMethod({ ...Methods.containsKey(mapType), isStatic: true })).toBe(false);
    });

    it('should not claim non-public methods', () => {
      expect(isContainsKeyMethod({ ...Methods.containsKey(mapType), isPublic: false })).toBe(false);
    });

    it('should not claim methods that do not return a boolean', () => {
      expect(isContainsKeyMethod({ ...Methods.containsKey(mapType), returnType: Types.number })).toBe(false);
    });

    it('should not claim methods with another arity', () => {
      const method = Methods.containsKey(mapType);
      expect(
        isContainsKeyMethod({ ...method, parameters: [...method.parameters, { name: 'other', type: Types.string }] })
      ).toBe(false);
    });

    it('should leave an unclaimed call to the base error', () => {
      const tags = prop('Tags');
      const staticCall = call(tags, { ...Methods.containsKey(tags.type), isStatic: true }, [constant('red')]);
      const error = captureError(() => where(staticCall));

      expect(Object.getPrototypeOf(error)).toBe(UnsupportedExpressionError.prototype);
      expect(error).toHaveProperty(
        'message',
        'Expression not supported: x.Tags.containsKey("red") because method containsKey is not supported.'
      );
    });
  });
});
