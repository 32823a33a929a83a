import { personSerializer, prop, x } from '../../__fixtures__/models';
import { renderFilter } from '../../ast/render';
import { call, constant, lambda } from '../../expressions/factory';
import { Methods } from '../../expressions/methods';
import { FilterTranslator } from '../../translators/filter';
import { UnsupportedExpressionError, UnsupportedRepresentationError } from '../errors';

describe('containsValue translation', () => {
  const translator = new FilterTranslator(personSerializer);
  const containsValue = (memberName: string, value: unknown) => {
    const dictionary = prop(memberName);
    return translator.translate(
      lambda([x], call(dictionary, Methods.containsValue(dictionary.type), [constant(value)]))
    );
  };

  it('should match the value slot of ArrayOfDocuments entries', () => {
    expect(renderFilter(containsValue('TagsAsDocuments', 3))).toEqual({
      TagsAsDocuments: { $elemMatch: { v: 3 } }
    });
  });

  it('should match the second position of ArrayOfArrays entries', () => {
    expect(renderFilter(containsValue('TagsAsArrays', 3))).toEqual({
      TagsAsArrays: { $elemMatch: { '1': 3 } }
    });
  });

  it('should reject the Document representation', () => {
    expect(() => containsValue('Tags', 3)).toThrow(UnsupportedRepresentationError);
    expect(() => containsValue('Tags', 3)).toThrow(
      'containsValue is not supported when the dictionary representation is Document'
    );
  });

  it('should serialize the value with the value serializer', () => {
    expect(() => containsValue('TagsAsDocuments', 'three')).toThrow(UnsupportedExpressionError);
  });
});
